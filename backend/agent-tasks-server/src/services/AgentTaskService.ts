/**
 * AgentTaskService
 *
 * Submitter-side facade over the TaskBroker. Keeps a correlation table of
 * task ID → pending completion handle so callers can submit a task and later
 * await, look up or list its result.
 *
 * Architecture:
 * ```
 * UI → submitTask() → subscribeToResult(taskId) → broker.submit()
 *                                                       ↓
 *                                             worker executes, publishes
 *                                                       ↓
 *        result subscription → resolveTask() → pending entry → completed set
 * ```
 *
 * Abandoning a wait (timeout, abort signal, dispose) only stops the local
 * wait. The remote task keeps running.
 */

import { v4 as uuidv4 } from "uuid";
import { AgentTasksError } from "../errors";
import { TaskProgress, TaskResult, createTaskRequest } from "../models";
import { TaskBroker, TaskSubscription } from "../broker";
import { clampTimerDelay } from "../timers";

/**
 * Snapshot of a task still waiting for its result
 */
export interface PendingTaskInfo {
  taskId: string;
  agentType: string;
  submittedAt: Date;
}

export interface AgentTaskServiceOptions {
  /** Task ID generator (default: UUID v4 as 32 hex characters) */
  generateTaskId?: () => string;
  logger?: Pick<Console, "log" | "warn" | "error">;
}

interface CorrelationEntry extends PendingTaskInfo {
  /** Settles with the result, or null if the entry is abandoned */
  completion: Promise<TaskResult | null>;
  settle: (result: TaskResult | null) => void;
  controller: AbortController;
  subscription?: TaskSubscription;
}

/**
 * Fresh task ID: a UUID v4 without dashes
 */
export function generateTaskId(): string {
  return uuidv4().replace(/-/g, "");
}

export class AgentTaskService {
  private readonly broker: TaskBroker;
  private readonly generateTaskId: () => string;
  private readonly logger: Pick<Console, "log" | "warn" | "error">;

  /** Correlation table: tasks submitted by this process still awaiting a result */
  private readonly pending: Map<string, CorrelationEntry> = new Map();
  /** Results delivered to this process, by task ID */
  private readonly completed: Map<string, TaskResult> = new Map();
  private disposed: boolean = false;

  constructor(broker: TaskBroker, options: AgentTaskServiceOptions = {}) {
    this.broker = broker;
    this.generateTaskId = options.generateTaskId ?? generateTaskId;
    this.logger = options.logger ?? console;
  }

  /**
   * Submit a task to the worker pool.
   * Returns once the request is published; does not wait for a worker.
   *
   * @returns The new task ID
   * @throws AgentTasksError if the generated ID is already pending or completed
   * @throws TransportError if the subscription or the publish fails
   */
  async submitTask(agentType: string, prompt: string, outputPath?: string): Promise<string> {
    if (this.disposed) {
      throw new AgentTasksError("Task service has been disposed");
    }

    const taskId = this.generateTaskId();
    if (this.pending.has(taskId) || this.completed.has(taskId)) {
      throw new AgentTasksError(`Task ID ${taskId} is already in use`);
    }
    const entry = this.createEntry(taskId, agentType);
    this.pending.set(taskId, entry);

    try {
      // Subscribe before publishing so the result cannot slip past us
      entry.subscription = await this.broker.subscribeToResult(
        taskId,
        (result) => this.resolveTask(taskId, result),
        entry.controller.signal
      );
      await this.broker.submit(createTaskRequest(taskId, agentType, prompt, outputPath, entry.submittedAt));
    } catch (error) {
      this.abandon(entry);
      throw error;
    }

    this.logger.log(`[AgentTaskService] Submitted task ${taskId} (agentType=${agentType})`);
    return taskId;
  }

  /**
   * Wait for a task's terminal result.
   *
   * @param timeoutMs - Local wait limit; the task itself keeps running
   * @param signal - Abandons this wait only
   * @returns The result, or null on timeout, abort, dispose, or an unknown task ID
   */
  async waitForResult(taskId: string, timeoutMs: number, signal?: AbortSignal): Promise<TaskResult | null> {
    const done = this.completed.get(taskId);
    if (done) {
      return done;
    }

    const entry = this.pending.get(taskId);
    if (!entry || signal?.aborted) {
      return null;
    }

    return new Promise<TaskResult | null>((resolve) => {
      const finish = (result: TaskResult | null) => {
        clearTimeout(timeoutId);
        signal?.removeEventListener("abort", onAbort);
        resolve(result);
      };
      const onAbort = () => finish(null);
      const timeoutId = setTimeout(() => finish(null), clampTimerDelay(timeoutMs));

      signal?.addEventListener("abort", onAbort, { once: true });
      void entry.completion.then(finish);
    });
  }

  /**
   * Non-blocking lookup in the completed set
   */
  getResult(taskId: string): TaskResult | null {
    return this.completed.get(taskId) ?? null;
  }

  /**
   * Look up a result, falling back to the result store for overflowed
   * payloads still within their TTL. A hit is recorded as completed.
   */
  async fetchResult(taskId: string): Promise<TaskResult | null> {
    const done = this.completed.get(taskId);
    if (done) {
      return done;
    }

    const stored = await this.broker.retrieveStoredResult(taskId);
    if (stored) {
      this.resolveTask(taskId, stored);
    }
    return stored;
  }

  getPendingTaskIds(): string[] {
    return Array.from(this.pending.keys());
  }

  getPendingTasks(): PendingTaskInfo[] {
    return Array.from(this.pending.values(), ({ taskId, agentType, submittedAt }) => ({
      taskId,
      agentType,
      submittedAt,
    }));
  }

  getCompletedTasks(): TaskResult[] {
    return Array.from(this.completed.values());
  }

  get hasPendingTasks(): boolean {
    return this.pending.size > 0;
  }

  get pendingTaskCount(): number {
    return this.pending.size;
  }

  /**
   * Receive progress notes for a task. Passthrough to the broker.
   */
  async subscribeToProgress(
    taskId: string,
    onProgress: (progress: TaskProgress) => void,
    signal?: AbortSignal
  ): Promise<TaskSubscription> {
    return this.broker.subscribeToProgress(taskId, onProgress, signal);
  }

  /**
   * Cancel every outstanding result subscription. Pending waits resolve
   * with null; remote tasks are not cancelled.
   */
  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.disposed = true;

    const entries = Array.from(this.pending.values());
    if (entries.length > 0) {
      this.logger.warn(`[AgentTaskService] Disposing with ${entries.length} pending task(s)`);
    }

    await Promise.all(entries.map((entry) => this.abandon(entry)));
  }

  /**
   * Record a delivered result. Ignored once the entry is gone.
   */
  private resolveTask(taskId: string, result: TaskResult): void {
    const entry = this.pending.get(taskId);
    if (this.completed.has(taskId)) {
      return;
    }
    if (!entry && this.disposed) {
      return;
    }

    this.completed.set(taskId, result);
    if (entry) {
      this.pending.delete(taskId);
      entry.settle(result);
      this.logger.log(`[AgentTaskService] Task ${taskId} finished: ${result.status}`);
    }
  }

  private async abandon(entry: CorrelationEntry): Promise<void> {
    if (this.pending.get(entry.taskId) === entry) {
      this.pending.delete(entry.taskId);
    }
    entry.settle(null);
    entry.controller.abort();
    await entry.subscription?.closed;
  }

  private createEntry(taskId: string, agentType: string): CorrelationEntry {
    let settle: (result: TaskResult | null) => void = () => undefined;
    const completion = new Promise<TaskResult | null>((resolve) => {
      settle = resolve;
    });

    return {
      taskId,
      agentType,
      submittedAt: new Date(),
      completion,
      settle,
      controller: new AbortController(),
    };
  }
}
