/**
 * AgentTaskStatus
 *
 * Lifecycle of an agent task as seen from the outside:
 *
 *   PENDING → RUNNING → COMPLETED
 *                ↓
 *         FAILED / CANCELLED
 *
 * PENDING and RUNNING are transient and only ever observed through progress
 * updates. A published TaskResult always carries one of the terminal states.
 */
export enum AgentTaskStatus {
  /** Submitted, not yet picked up by a worker */
  PENDING = "Pending",
  /** Being executed by a worker */
  RUNNING = "Running",
  /** Executor returned a result */
  COMPLETED = "Completed",
  /** Routing failed or the executor threw */
  FAILED = "Failed",
  /** Execution timed out or the worker shut down */
  CANCELLED = "Cancelled",
}

export type TerminalStatus =
  | AgentTaskStatus.COMPLETED
  | AgentTaskStatus.FAILED
  | AgentTaskStatus.CANCELLED;

/**
 * Check if a status is terminal (may be published as a TaskResult)
 */
export function isTerminalStatus(status: AgentTaskStatus): status is TerminalStatus {
  return (
    status === AgentTaskStatus.COMPLETED ||
    status === AgentTaskStatus.FAILED ||
    status === AgentTaskStatus.CANCELLED
  );
}
