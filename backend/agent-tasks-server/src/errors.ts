/**
 * Error taxonomy shared by submitters and workers.
 *
 * Only sanitized messages ever cross the process boundary (inside a
 * TaskResult); the classes below stay local to the process that raised them.
 */

export class AgentTasksError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The pub/sub connection was unavailable at publish/subscribe time.
 * Not retried by the core.
 */
export class TransportError extends AgentTasksError {}

/**
 * No executor is registered for a task's agent type.
 */
export class UnknownAgentTypeError extends AgentTasksError {
  readonly agentType: string;

  constructor(agentType: string) {
    super(`unknown agent type: ${agentType}`);
    this.agentType = agentType;
  }
}

/**
 * Abort reason used when a task exceeds the worker's execution timeout.
 */
export class ExecutionTimeoutError extends AgentTasksError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Task timeout after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Abort reason used when the worker shuts down with tasks still running.
 */
export class WorkerShutdownError extends AgentTasksError {
  constructor() {
    super("Worker is shutting down");
  }
}

/**
 * Overflow payload could not be written to the result store.
 */
export class ResultStoreError extends AgentTasksError {}

/**
 * A result could not be turned into JSON (a cycle, a BigInt, a throwing toJSON).
 */
export class ResultSerializationError extends AgentTasksError {}

/**
 * Reduce any thrown value to a message that is safe to hand to a submitter.
 * Stack traces and error internals are never included.
 */
export function toErrorMessage(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.trim().length > 0 ? message : "Task failed";
}

/**
 * Whether an abort reason came from the dispatcher's timeout or shutdown path.
 */
export function isCancellationReason(reason: unknown): boolean {
  return reason instanceof ExecutionTimeoutError || reason instanceof WorkerShutdownError;
}
