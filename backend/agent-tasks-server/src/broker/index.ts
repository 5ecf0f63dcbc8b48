export { TASKS_TOPIC, resultTopic, progressTopic } from "./topics";
export {
  TaskBroker,
  DEFAULT_OVERFLOW_THRESHOLD_BYTES,
  DEFAULT_OVERFLOW_TTL_MS,
  DEFAULT_CLAIM_TTL_MS,
} from "./TaskBroker";
export type { TaskBrokerOptions, TaskSubscription } from "./TaskBroker";
