/**
 * @agent-tasks/server
 * Agent task broker, worker dispatcher and submitter service
 */

// Errors
export {
  AgentTasksError,
  TransportError,
  UnknownAgentTypeError,
  ExecutionTimeoutError,
  WorkerShutdownError,
  ResultStoreError,
  ResultSerializationError,
  toErrorMessage,
} from "./errors";

// Data model
export * from "./models";

// Configuration
export { loadConfig } from "./config";
export type { AgentTasksConfig } from "./config";

// Database exports
export { getDatabase, closeDatabase, createTables, getDefaultDbPath, schema } from "./db/connection";
export type { AgentTasksDatabase, ResultPayload, NewResultPayload } from "./db/connection";

// Transport, store, broker
export * from "./transport";
export * from "./store";
export * from "./broker";

// Worker side
export { Dispatcher, TaskBacklog } from "./queue";
export type {
  AgentExecutor,
  ExecutionContext,
  TaskExecutionResult,
  DispatcherOptions,
  DispatcherStats,
} from "./queue";
export { createEchoExecutor, ECHO_AGENT_TYPE } from "./executors";
export { startWorker } from "./worker";
export type { WorkerOptions, RunningWorker } from "./worker";

// Submitter side
export { AgentTaskService, generateTaskId } from "./services";
export type { AgentTaskServiceOptions, PendingTaskInfo } from "./services";

// API exports
export { createServer, startServer, appRouter, tasksRouter, createContext } from "./api";
export type { ServerOptions, AppRouter, Context } from "./api";
