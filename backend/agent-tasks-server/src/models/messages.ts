/**
 * Wire records exchanged between submitters and workers.
 *
 * Every message is a JSON document with lower camel case keys. Timestamps
 * travel as ISO-8601 strings and are revived to Date on receipt. Incoming
 * messages are validated with zod; anything that does not match is dropped
 * by the receiver.
 */

import { z } from "zod";
import { AgentTaskStatus, TerminalStatus } from "./AgentTaskStatus";

/**
 * Structured payload produced by an executor.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

/**
 * A unit of work handed to the worker pool. Immutable once submitted.
 */
export interface TaskRequest {
  /** Opaque, globally unique ID generated by the submitter */
  readonly taskId: string;
  /** Tag selecting the executor (e.g. "research") */
  readonly agentType: string;
  /** Free-form instruction for the executor */
  readonly prompt: string;
  readonly submittedAt: Date;
  /** Where the caller wants a persisted copy written; never read by the core */
  readonly outputPath?: string;
}

/**
 * The single terminal record published for a task.
 *
 * `data` is present iff status is COMPLETED, `error` iff status is FAILED.
 */
export interface TaskResult {
  readonly taskId: string;
  readonly status: TerminalStatus;
  readonly data?: JsonValue;
  readonly error?: string;
  readonly completedAt: Date;
}

/**
 * Best-effort progress note emitted while a task runs.
 */
export interface TaskProgress {
  readonly taskId: string;
  readonly message: string;
  readonly timestamp: Date;
  readonly toolName?: string;
  readonly agentName?: string;
  readonly modelId?: string;
  readonly inputTokens?: number;
  readonly outputTokens?: number;
}

/**
 * Optional details an executor may attach to a progress note.
 */
export type ProgressDetails = Pick<
  TaskProgress,
  "toolName" | "agentName" | "modelId" | "inputTokens" | "outputTokens"
>;

export const taskRequestSchema = z.object({
  taskId: z.string().min(1),
  agentType: z.string().min(1),
  prompt: z.string(),
  submittedAt: z.coerce.date(),
  outputPath: z.string().optional(),
});

const terminalStatusSchema = z.union([
  z.literal(AgentTaskStatus.COMPLETED),
  z.literal(AgentTaskStatus.FAILED),
  z.literal(AgentTaskStatus.CANCELLED),
]);

export const taskResultSchema = z.object({
  taskId: z.string().min(1),
  status: terminalStatusSchema,
  data: jsonValueSchema.optional(),
  error: z.string().optional(),
  completedAt: z.coerce.date(),
});

export const taskProgressSchema = z.object({
  taskId: z.string().min(1),
  message: z.string(),
  timestamp: z.coerce.date(),
  toolName: z.string().optional(),
  agentName: z.string().optional(),
  modelId: z.string().optional(),
  inputTokens: z.number().int().nonnegative().optional(),
  outputTokens: z.number().int().nonnegative().optional(),
});

/**
 * Parse a raw wire message against a schema.
 * Returns undefined for invalid JSON or a shape mismatch.
 */
export function parseMessage<T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return undefined;
  }
  const parsed = schema.safeParse(json);
  return parsed.success ? parsed.data : undefined;
}

export function createTaskRequest(
  taskId: string,
  agentType: string,
  prompt: string,
  outputPath?: string,
  submittedAt: Date = new Date()
): TaskRequest {
  return outputPath === undefined
    ? { taskId, agentType, prompt, submittedAt }
    : { taskId, agentType, prompt, submittedAt, outputPath };
}

export function completedResult(
  taskId: string,
  data: JsonValue,
  completedAt: Date = new Date()
): TaskResult {
  return { taskId, status: AgentTaskStatus.COMPLETED, data, completedAt };
}

export function failedResult(
  taskId: string,
  error: string,
  completedAt: Date = new Date()
): TaskResult {
  return { taskId, status: AgentTaskStatus.FAILED, error, completedAt };
}

export function cancelledResult(taskId: string, completedAt: Date = new Date()): TaskResult {
  return { taskId, status: AgentTaskStatus.CANCELLED, completedAt };
}
