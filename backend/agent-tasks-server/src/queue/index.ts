/**
 * Queue Module
 *
 * Worker-side dispatch: consumes task requests, runs executors, publishes
 * terminal results.
 */

export { TaskBacklog } from "./TaskBacklog";
export { Dispatcher, DEFAULT_MAX_CONCURRENT, DEFAULT_TASK_TIMEOUT_MS } from "./Dispatcher";
export type {
  AgentExecutor,
  ExecutionContext,
  TaskExecutionResult,
  DispatcherOptions,
  DispatcherStats,
} from "./Dispatcher";
