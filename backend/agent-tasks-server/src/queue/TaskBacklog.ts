/**
 * TaskBacklog
 *
 * FIFO holding area for task requests a worker has accepted but cannot run
 * yet because every execution slot is busy. Requests leave in arrival order.
 */

import { TaskRequest } from "../models";

export class TaskBacklog {
  private readonly requests: Map<string, TaskRequest> = new Map();

  /**
   * Append a request. A task ID that is already waiting is not added twice.
   *
   * @returns false if the task was already in the backlog
   */
  enqueue(request: TaskRequest): boolean {
    if (this.requests.has(request.taskId)) {
      return false;
    }
    this.requests.set(request.taskId, request);
    return true;
  }

  /**
   * Remove and return the oldest waiting request
   */
  dequeue(): TaskRequest | undefined {
    for (const [taskId, request] of this.requests) {
      this.requests.delete(taskId);
      return request;
    }
    return undefined;
  }

  has(taskId: string): boolean {
    return this.requests.has(taskId);
  }

  get size(): number {
    return this.requests.size;
  }

  /**
   * Remove every waiting request, oldest first
   */
  drain(): TaskRequest[] {
    const drained = Array.from(this.requests.values());
    this.requests.clear();
    return drained;
  }
}
