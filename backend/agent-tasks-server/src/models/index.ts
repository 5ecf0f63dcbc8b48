export { AgentTaskStatus, isTerminalStatus } from "./AgentTaskStatus";
export type { TerminalStatus } from "./AgentTaskStatus";
export {
  jsonValueSchema,
  taskRequestSchema,
  taskResultSchema,
  taskProgressSchema,
  parseMessage,
  createTaskRequest,
  completedResult,
  failedResult,
  cancelledResult,
} from "./messages";
export type { JsonValue, TaskRequest, TaskResult, TaskProgress, ProgressDetails } from "./messages";
