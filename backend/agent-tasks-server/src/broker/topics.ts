/** Topic every worker listens on for new tasks */
export const TASKS_TOPIC = "agents:tasks";

/** Topic carrying the single terminal result of a task */
export function resultTopic(taskId: string): string {
  return `agents:results:${taskId}`;
}

/** Topic carrying best-effort progress notes for a task */
export function progressTopic(taskId: string): string {
  return `agents:progress:${taskId}`;
}
