/**
 * Frames exchanged between a WebSocketTransport and the TransportHub.
 *
 * Every client request carries a requestId and is answered with an "ack"
 * (or an "error") bearing the same ID. Topic traffic flows back to the client
 * as "message" frames.
 */

import { z } from "zod";

export const clientFrameSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("subscribe"), requestId: z.string(), topic: z.string().min(1) }),
  z.object({ type: z.literal("unsubscribe"), requestId: z.string(), topic: z.string().min(1) }),
  z.object({
    type: z.literal("publish"),
    requestId: z.string(),
    topic: z.string().min(1),
    message: z.string(),
  }),
]);

export type ClientFrame = z.infer<typeof clientFrameSchema>;

export const hubFrameSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("status"), status: z.literal("connected"), clientId: z.string() }),
  z.object({ type: z.literal("ack"), requestId: z.string(), receivers: z.number().int().optional() }),
  z.object({ type: z.literal("error"), requestId: z.string().optional(), error: z.string() }),
  z.object({ type: z.literal("message"), topic: z.string(), message: z.string() }),
]);

export type HubFrame = z.infer<typeof hubFrameSchema>;

/**
 * Normalize the payload of a ws "message" event to text
 */
export function rawDataToString(data: Buffer | ArrayBuffer | Buffer[]): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf8");
  }
  return data.toString("utf8");
}
