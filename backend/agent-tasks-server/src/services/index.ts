/**
 * Service layer exports
 */

export {
  AgentTaskService,
  generateTaskId,
  type AgentTaskServiceOptions,
  type PendingTaskInfo,
} from "./AgentTaskService";
