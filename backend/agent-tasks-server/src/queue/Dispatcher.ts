/**
 * Dispatcher
 *
 * The worker side of the task pipeline. The Dispatcher:
 * 1. Consumes TaskRequests from the broker's submission topic
 * 2. Routes each request to the executor registered for its agent type
 * 3. Enforces the execution timeout and the concurrency limit
 * 4. Publishes exactly one terminal TaskResult per task through the broker
 *
 * Every worker sees every request. Before running one, a dispatcher claims
 * its task ID in the shared store; a request another worker claimed first is
 * skipped without a result.
 *
 * Per message: Received → Routing → Executing → Publishing (Completed | Failed | Cancelled)
 *
 * Lifecycle:
 *   await dispatcher.start() → consuming begins
 *   await dispatcher.stop()  → stops consuming, waits for accepted tasks
 */

import { v4 as uuidv4 } from "uuid";
import {
  AgentTasksError,
  ExecutionTimeoutError,
  ResultSerializationError,
  ResultStoreError,
  UnknownAgentTypeError,
  WorkerShutdownError,
  isCancellationReason,
  toErrorMessage,
} from "../errors";
import {
  AgentTaskStatus,
  JsonValue,
  ProgressDetails,
  TaskProgress,
  TaskRequest,
  TaskResult,
  cancelledResult,
  completedResult,
  failedResult,
} from "../models";
import { TaskBroker, TaskSubscription } from "../broker";
import { TaskBacklog } from "./TaskBacklog";
import { clampTimerDelay } from "../timers";

/**
 * Context handed to an executor for one task
 */
export interface ExecutionContext {
  readonly taskId: string;
  readonly agentType: string;
  /** Passed through from the request untouched */
  readonly outputPath?: string;
  /** Aborted on timeout or forced shutdown; the reason tells which */
  readonly signal: AbortSignal;
  /**
   * Publish a progress note for this task. Never throws. Once token usage
   * has been added, notes carry the running totals unless `details` gives
   * its own counts.
   */
  reportProgress(message: string, details?: ProgressDetails): void;
  /** Add to the task's running token totals */
  addTokenUsage(inputTokens: number, outputTokens: number): void;
}

/**
 * Runs a prompt for one agent type. Returning nothing yields `null` data.
 */
export type AgentExecutor = (
  prompt: string,
  context: ExecutionContext
) => Promise<JsonValue | void> | JsonValue | void;

/**
 * Outcome of one dispatched task
 */
export interface TaskExecutionResult {
  request: TaskRequest;
  result: TaskResult;
  /** Whether the result reached the broker */
  published: boolean;
  durationMs: number;
}

export interface DispatcherOptions {
  /** Maximum tasks executing at once (default: 3) */
  maxConcurrent?: number;
  /** Task timeout in milliseconds (default: 4 hours) */
  taskTimeoutMs?: number;
  /** Identifies this dispatcher's claims in the shared store (default: random) */
  workerId?: string;
  logger?: Pick<Console, "log" | "warn" | "error">;
}

export interface DispatcherStats {
  isRunning: boolean;
  totalProcessed: number;
  successCount: number;
  failureCount: number;
  cancelledCount: number;
  timeoutCount: number;
  /** Requests ignored because their task ID was already accepted */
  duplicateCount: number;
  /** Requests skipped because another worker claimed them */
  claimedElsewhereCount: number;
  runningCount: number;
  /** Requests waiting for a free slot */
  queuedCount: number;
  avgDurationMs: number;
  uptimeMs: number;
}

interface ExecutorRegistration {
  agentType: string;
  executor: AgentExecutor;
}

export const DEFAULT_MAX_CONCURRENT = 3;
export const DEFAULT_TASK_TIMEOUT_MS = 4 * 60 * 60 * 1000;

const STOP_POLL_INTERVAL_MS = 50;

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

type ClaimOutcome = "claimed" | "taken" | "unavailable";

interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export class Dispatcher {
  private readonly broker: TaskBroker;
  /** Registered executors keyed by lower-cased agent type */
  private readonly executors: Map<string, ExecutorRegistration> = new Map();

  private readonly maxConcurrent: number;
  private readonly taskTimeoutMs: number;
  private readonly workerId: string;
  private readonly logger: Pick<Console, "log" | "warn" | "error">;

  /** Runtime state */
  private running: boolean = false;
  private forcing: boolean = false;
  private subscription?: TaskSubscription;
  private readonly runningTasks: Map<string, AbortController> = new Map();
  private readonly backlog = new TaskBacklog();
  /** Task IDs whose terminal result has been handed to the broker */
  private readonly published: Set<string> = new Set();
  /** Task IDs another worker claimed first */
  private readonly claimedElsewhere: Set<string> = new Set();
  private startedAt?: Date;

  private stats = {
    totalProcessed: 0,
    successCount: 0,
    failureCount: 0,
    cancelledCount: 0,
    timeoutCount: 0,
    duplicateCount: 0,
    claimedElsewhereCount: 0,
    totalDurationMs: 0,
  };

  constructor(broker: TaskBroker, options: DispatcherOptions = {}) {
    this.broker = broker;
    this.maxConcurrent = Math.max(1, options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT);
    this.taskTimeoutMs = options.taskTimeoutMs ?? DEFAULT_TASK_TIMEOUT_MS;
    this.workerId = options.workerId ?? `worker-${uuidv4()}`;
    this.logger = options.logger ?? console;
  }

  /**
   * Register the executor for an agent type. Tags are matched
   * case-insensitively; registering a tag again replaces its executor.
   *
   * @returns this for chaining
   */
  registerExecutor(agentType: string, executor: AgentExecutor): this {
    const key = agentType.trim().toLowerCase();
    if (key.length === 0) {
      throw new AgentTasksError("Agent type must not be empty");
    }
    this.executors.set(key, { agentType: agentType.trim(), executor });
    return this;
  }

  /**
   * @returns true if an executor was found and removed
   */
  unregisterExecutor(agentType: string): boolean {
    return this.executors.delete(agentType.trim().toLowerCase());
  }

  hasExecutor(agentType: string): boolean {
    return this.executors.has(agentType.trim().toLowerCase());
  }

  /**
   * Agent types as they were registered
   */
  getRegisteredAgentTypes(): string[] {
    return Array.from(this.executors.values(), (registration) => registration.agentType);
  }

  /**
   * Start consuming the submission topic.
   * Resolves once the subscription is active. Does nothing if already running.
   *
   * @throws TransportError if the subscription cannot be established
   */
  async start(): Promise<void> {
    if (this.running) {
      return;
    }

    this.running = true;
    this.forcing = false;
    this.startedAt = new Date();

    try {
      this.subscription = await this.broker.subscribeToTasks((request) => this.accept(request));
    } catch (error) {
      this.running = false;
      throw error;
    }

    this.logger.log(
      `[Dispatcher] Started ${this.workerId} (maxConcurrent=${this.maxConcurrent}, taskTimeoutMs=${this.taskTimeoutMs}, ` +
        `agentTypes=${this.getRegisteredAgentTypes().join(",") || "none"})`
    );
  }

  /**
   * Stop the dispatcher gracefully.
   * Stops consuming at once, then waits for accepted tasks (running and
   * queued) to finish.
   *
   * @param forceTimeoutMs - After this many ms, abort running tasks and
   *   publish Cancelled for queued ones (default: wait indefinitely)
   */
  async stop(forceTimeoutMs?: number): Promise<void> {
    if (!this.running) {
      return;
    }

    this.running = false;

    const subscription = this.subscription;
    this.subscription = undefined;
    await subscription?.unsubscribe();

    const waitForIdle = async () => {
      while (this.runningTasks.size > 0 || (this.backlog.size > 0 && !this.forcing)) {
        await sleep(STOP_POLL_INTERVAL_MS);
      }
    };

    if (forceTimeoutMs !== undefined) {
      let forceTimeoutId: ReturnType<typeof setTimeout> | undefined;
      const forced = await Promise.race([
        waitForIdle().then(() => false),
        new Promise<boolean>((resolve) => {
          forceTimeoutId = setTimeout(() => resolve(true), clampTimerDelay(forceTimeoutMs));
        }),
      ]);
      clearTimeout(forceTimeoutId);

      if (forced) {
        await this.forceStop();
      }
    } else {
      await waitForIdle();
    }

    this.logger.log(`[Dispatcher] Stopped: ${JSON.stringify(this.getStats())}`);
  }

  private async forceStop(): Promise<void> {
    this.forcing = true;
    this.logger.warn(
      `[Dispatcher] Forcing shutdown: aborting ${this.runningTasks.size} running task(s), ` +
        `cancelling ${this.backlog.size} queued task(s)`
    );

    for (const [, controller] of this.runningTasks) {
      controller.abort(new WorkerShutdownError());
    }

    const queued = this.backlog.drain();
    await Promise.all(
      queued.map(async (request) => {
        if ((await this.claim(request.taskId)) === "taken") {
          return;
        }
        this.stats.cancelledCount++;
        this.stats.totalProcessed++;
        await this.publishTerminal(cancelledResult(request.taskId));
      })
    );

    while (this.runningTasks.size > 0) {
      await sleep(STOP_POLL_INTERVAL_MS);
    }
  }

  /**
   * Take a request off the submission topic: start it, queue it, or ignore
   * it as a duplicate.
   */
  private accept(request: TaskRequest): void {
    if (this.isKnownTask(request.taskId)) {
      this.stats.duplicateCount++;
      this.logger.warn(`[Dispatcher] Ignoring duplicate request for task ${request.taskId}`);
      return;
    }

    this.logger.log(`[Dispatcher] Received task ${request.taskId} (agentType=${request.agentType})`);

    if (this.runningTasks.size < this.maxConcurrent) {
      this.launch(request);
    } else {
      this.backlog.enqueue(request);
    }
  }

  private isKnownTask(taskId: string): boolean {
    return (
      this.runningTasks.has(taskId) ||
      this.backlog.has(taskId) ||
      this.published.has(taskId) ||
      this.claimedElsewhere.has(taskId)
    );
  }

  private launch(request: TaskRequest): void {
    const controller = new AbortController();
    this.runningTasks.set(request.taskId, controller);

    this.executeTask(request, controller)
      .catch((error: unknown) => {
        // executeTask settles every outcome itself
        this.logger.error(`[Dispatcher] Unexpected error executing ${request.taskId}:`, error);
      })
      .finally(() => this.fillSlots());
  }

  /**
   * Move queued requests into free execution slots, oldest first
   */
  private fillSlots(): void {
    while (!this.forcing && this.backlog.size > 0 && this.runningTasks.size < this.maxConcurrent) {
      const next = this.backlog.dequeue();
      if (!next) break;
      this.launch(next);
    }
  }

  /**
   * Claim a task, execute it and publish its terminal result.
   * The controller must already be registered in runningTasks.
   *
   * @returns undefined if another worker claimed the task first
   */
  private async executeTask(
    request: TaskRequest,
    controller: AbortController
  ): Promise<TaskExecutionResult | undefined> {
    const startTime = Date.now();
    let result: TaskResult;

    try {
      const claim = await this.claim(request.taskId);
      if (claim === "taken") {
        return undefined;
      }

      const registration = this.executors.get(request.agentType.trim().toLowerCase());

      if (claim === "unavailable") {
        result = failedResult(request.taskId, "task could not be claimed");
      } else if (!registration) {
        result = failedResult(request.taskId, new UnknownAgentTypeError(request.agentType).message);
      } else {
        result = await this.runExecutor(registration.executor, request, controller);
      }

      const outcome = await this.publishTerminal(result);
      const durationMs = Date.now() - startTime;
      this.recordOutcome(request, outcome.result, durationMs);

      return { request, result: outcome.result, published: outcome.published, durationMs };
    } finally {
      this.runningTasks.delete(request.taskId);
    }
  }

  private async claim(taskId: string): Promise<ClaimOutcome> {
    try {
      if (await this.broker.claimTask(taskId, this.workerId)) {
        return "claimed";
      }
    } catch (error) {
      this.logger.error(`[Dispatcher] Could not claim task ${taskId}: ${toErrorMessage(error)}`);
      return "unavailable";
    }

    this.claimedElsewhere.add(taskId);
    this.stats.claimedElsewhereCount++;
    this.logger.log(`[Dispatcher] Task ${taskId} was claimed by another worker; skipping`);
    return "taken";
  }

  private async runExecutor(
    executor: AgentExecutor,
    request: TaskRequest,
    controller: AbortController
  ): Promise<TaskResult> {
    const { taskId } = request;

    // The timeout aborts with its own reason so it is told apart from shutdown
    const timeoutId = setTimeout(() => {
      controller.abort(new ExecutionTimeoutError(this.taskTimeoutMs));
    }, clampTimerDelay(this.taskTimeoutMs));

    const cancellationPromise = new Promise<never>((_, reject) => {
      if (controller.signal.aborted) {
        reject(controller.signal.reason);
      } else {
        controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
      }
    });

    let usage: TokenUsage | undefined;

    const context: ExecutionContext = {
      taskId,
      agentType: request.agentType,
      outputPath: request.outputPath,
      signal: controller.signal,
      reportProgress: (message, details) =>
        this.reportProgress(taskId, controller.signal, message, { ...usage, ...details }),
      addTokenUsage: (inputTokens, outputTokens) => {
        usage = {
          inputTokens: (usage?.inputTokens ?? 0) + inputTokens,
          outputTokens: (usage?.outputTokens ?? 0) + outputTokens,
        };
      },
    };

    try {
      const output = await Promise.race([
        Promise.resolve(executor(request.prompt, context)),
        cancellationPromise,
      ]);
      return completedResult(taskId, output === undefined ? null : output);
    } catch (error) {
      const reason: unknown = controller.signal.aborted ? controller.signal.reason : undefined;
      if (isCancellationReason(reason)) {
        if (reason instanceof ExecutionTimeoutError) {
          this.stats.timeoutCount++;
        }
        return cancelledResult(taskId);
      }
      return failedResult(taskId, toErrorMessage(error));
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private reportProgress(
    taskId: string,
    signal: AbortSignal,
    message: string,
    details: ProgressDetails = {}
  ): void {
    if (signal.aborted || this.published.has(taskId)) {
      return;
    }

    const progress: TaskProgress = { ...details, taskId, message, timestamp: new Date() };

    this.broker.publishProgress(progress).catch((error: unknown) => {
      this.logger.warn(`[Dispatcher] Progress for ${taskId} was not published: ${toErrorMessage(error)}`);
    });
  }

  /**
   * Hand a terminal result to the broker, at most once per task ID.
   * A result the broker cannot serialize or store is replaced by a Failed one.
   *
   * @returns The result that was handed over, and whether the broker accepted it
   */
  private async publishTerminal(result: TaskResult): Promise<{ result: TaskResult; published: boolean }> {
    if (this.published.has(result.taskId)) {
      this.logger.error(
        `[Dispatcher] Refusing to publish a second terminal result (${result.status}) for task ${result.taskId}`
      );
      return { result, published: false };
    }
    this.published.add(result.taskId);

    let fallbackError: string;
    try {
      await this.broker.publishResult(result);
      return { result, published: true };
    } catch (error) {
      if (error instanceof ResultSerializationError) {
        fallbackError = "result could not be serialized";
      } else if (error instanceof ResultStoreError) {
        fallbackError = "result payload could not be stored";
      } else {
        this.logger.error(`[Dispatcher] Failed to publish result for ${result.taskId}: ${toErrorMessage(error)}`);
        return { result, published: false };
      }
      this.logger.error(`[Dispatcher] ${toErrorMessage(error)}; publishing a Failed result instead`);
    }

    // The original payload never left this process
    const fallback = failedResult(result.taskId, fallbackError);
    try {
      await this.broker.publishResult(fallback);
      return { result: fallback, published: true };
    } catch (error) {
      this.logger.error(`[Dispatcher] Failed to publish result for ${result.taskId}: ${toErrorMessage(error)}`);
      return { result: fallback, published: false };
    }
  }

  private recordOutcome(request: TaskRequest, result: TaskResult, durationMs: number): void {
    this.stats.totalProcessed++;
    this.stats.totalDurationMs += durationMs;

    const summary = `[Dispatcher] Task ${request.taskId} (${request.agentType}) ${result.status} in ${durationMs}ms`;

    switch (result.status) {
      case AgentTaskStatus.COMPLETED:
        this.stats.successCount++;
        this.logger.log(summary);
        break;
      case AgentTaskStatus.CANCELLED:
        this.stats.cancelledCount++;
        this.logger.warn(summary);
        break;
      case AgentTaskStatus.FAILED:
        this.stats.failureCount++;
        this.logger.error(`${summary}: ${result.error ?? ""}`);
        break;
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  getStats(): DispatcherStats {
    return {
      isRunning: this.running,
      totalProcessed: this.stats.totalProcessed,
      successCount: this.stats.successCount,
      failureCount: this.stats.failureCount,
      cancelledCount: this.stats.cancelledCount,
      timeoutCount: this.stats.timeoutCount,
      duplicateCount: this.stats.duplicateCount,
      claimedElsewhereCount: this.stats.claimedElsewhereCount,
      runningCount: this.runningTasks.size,
      queuedCount: this.backlog.size,
      avgDurationMs:
        this.stats.totalProcessed > 0 ? this.stats.totalDurationMs / this.stats.totalProcessed : 0,
      uptimeMs: this.startedAt ? Date.now() - this.startedAt.getTime() : 0,
    };
  }

  /**
   * Execute a single request immediately, outside the consume loop and the
   * concurrency limit. Useful for testing or one-off executions.
   *
   * @throws AgentTasksError if the task ID was already accepted here or
   *   claimed by another worker
   */
  async executeOnce(request: TaskRequest): Promise<TaskExecutionResult> {
    if (this.isKnownTask(request.taskId)) {
      this.stats.duplicateCount++;
      throw new AgentTasksError(`Task ${request.taskId} was already dispatched`);
    }

    const controller = new AbortController();
    this.runningTasks.set(request.taskId, controller);
    const execution = await this.executeTask(request, controller);
    if (!execution) {
      throw new AgentTasksError(`Task ${request.taskId} was claimed by another worker`);
    }
    return execution;
  }
}
