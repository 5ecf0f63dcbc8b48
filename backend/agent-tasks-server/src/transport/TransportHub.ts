/**
 * TransportHub
 *
 * Server side of the WebSocket transport. Every connected socket is bridged
 * into a shared InMemoryTransport, so remote workers, remote submitters and
 * in-process participants all see the same topics.
 *
 * Design Notes:
 * - One fabric subscription per (client, topic); repeated subscribes are acked
 *   without adding a second one
 * - Frames are validated before use; malformed frames get an "error" reply
 * - Client disconnection removes all of its subscriptions
 */

import { WebSocket } from "ws";
import { InMemoryTransport, LocalSubscription } from "./InMemoryTransport";
import { ClientFrame, HubFrame, clientFrameSchema, rawDataToString } from "./protocol";

export interface TransportHubOptions {
  logger?: Pick<Console, "log" | "warn">;
}

interface ClientConnection {
  socket: WebSocket;
  /** Active fabric subscriptions by topic */
  topics: Map<string, LocalSubscription>;
}

export class TransportHub {
  /** Map of client ID to connection info */
  private clients: Map<string, ClientConnection> = new Map();
  /** Counter for generating unique client IDs */
  private clientIdCounter: number = 0;
  private readonly logger: Pick<Console, "log" | "warn">;

  constructor(
    private readonly fabric: InMemoryTransport,
    options: TransportHubOptions = {}
  ) {
    this.logger = options.logger ?? console;
  }

  /**
   * Register a newly connected socket and start serving its frames.
   *
   * @returns The client ID for this connection
   */
  addClient(socket: WebSocket): string {
    const clientId = `client-${++this.clientIdCounter}-${Date.now()}`;

    this.clients.set(clientId, { socket, topics: new Map() });

    socket.on("message", (data: Buffer | ArrayBuffer | Buffer[]) => {
      this.handleFrame(clientId, rawDataToString(data));
    });

    socket.on("close", () => {
      this.removeClient(clientId);
    });

    socket.on("error", (error: Error) => {
      this.logger.warn(`[TransportHub] Socket error for ${clientId}: ${error.message}`);
      this.removeClient(clientId);
    });

    this.send(clientId, { type: "status", status: "connected", clientId });
    this.logger.log(`[TransportHub] ${clientId} connected`);

    return clientId;
  }

  /**
   * Remove a client and all its subscriptions
   */
  removeClient(clientId: string): void {
    const client = this.clients.get(clientId);
    if (!client) return;

    for (const [topic, subscription] of client.topics) {
      this.fabric.unsubscribe(topic, subscription.id);
    }

    this.clients.delete(clientId);
    this.logger.log(`[TransportHub] ${clientId} disconnected`);
  }

  /**
   * Apply a single frame received from a client
   */
  handleFrame(clientId: string, raw: string): void {
    const client = this.clients.get(clientId);
    if (!client) return;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.rejectFrame(clientId, "Invalid frame: expected JSON");
      return;
    }

    const parsed = clientFrameSchema.safeParse(json);
    if (!parsed.success) {
      this.rejectFrame(clientId, "Invalid frame: expected subscribe, unsubscribe or publish");
      return;
    }

    try {
      this.applyFrame(clientId, client, parsed.data);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`[TransportHub] ${clientId}: ${parsed.data.type} failed: ${message}`);
      this.send(clientId, { type: "error", requestId: parsed.data.requestId, error: message });
    }
  }

  private applyFrame(clientId: string, client: ClientConnection, frame: ClientFrame): void {
    switch (frame.type) {
      case "subscribe": {
        if (!client.topics.has(frame.topic)) {
          const subscription = this.fabric.subscribeSync(frame.topic, (message, topic) => {
            this.send(clientId, { type: "message", topic, message });
          });
          client.topics.set(frame.topic, subscription);
        }
        this.send(clientId, { type: "ack", requestId: frame.requestId });
        return;
      }
      case "unsubscribe": {
        const subscription = client.topics.get(frame.topic);
        if (subscription) {
          this.fabric.unsubscribe(frame.topic, subscription.id);
          client.topics.delete(frame.topic);
        }
        this.send(clientId, { type: "ack", requestId: frame.requestId });
        return;
      }
      case "publish": {
        const receivers = this.fabric.publishSync(frame.topic, frame.message);
        this.send(clientId, { type: "ack", requestId: frame.requestId, receivers });
        return;
      }
    }
  }

  private rejectFrame(clientId: string, error: string): void {
    this.logger.warn(`[TransportHub] ${clientId}: ${error}`);
    this.send(clientId, { type: "error", error });
  }

  /**
   * Send a frame to a specific client
   */
  private send(clientId: string, frame: HubFrame): void {
    const client = this.clients.get(clientId);
    if (client && client.socket.readyState === WebSocket.OPEN) {
      client.socket.send(JSON.stringify(frame));
    }
  }

  /**
   * Get the total number of connected clients
   */
  getClientCount(): number {
    return this.clients.size;
  }

  /**
   * Topics a client is currently subscribed to
   */
  getClientTopics(clientId: string): string[] {
    return Array.from(this.clients.get(clientId)?.topics.keys() ?? []);
  }

  /**
   * Close all connections and clean up
   */
  dispose(): void {
    for (const [clientId, client] of this.clients) {
      for (const [topic, subscription] of client.topics) {
        this.fabric.unsubscribe(topic, subscription.id);
      }
      client.socket.close();
      this.clients.delete(clientId);
    }
  }
}
