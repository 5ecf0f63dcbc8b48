/**
 * TaskBroker
 *
 * The shared abstraction submitters and workers use to reach the transport
 * and the result store:
 *
 *   submitter: submit() ──► agents:tasks ──► subscribeToTasks(): worker
 *   worker: publishResult() ──► agents:results:{id} ──► subscribeToResult(): submitter
 *   worker: publishProgress() ──► agents:progress:{id} ──► subscribeToProgress(): submitter
 *
 * Results whose data is larger than the overflow threshold are written to the
 * ResultStore first; the notification then carries the storage key in a
 * top-level `dataRef` field in place of `data`, and subscribeToResult() swaps
 * the stored result back in before invoking its callback. Executor data never
 * reaches that field, so any data shape travels inline unchanged.
 *
 * Every worker receives every request; claimTask() decides which one runs it.
 */

import { z } from "zod";
import { ResultSerializationError, TransportError } from "../errors";
import {
  TaskProgress,
  TaskRequest,
  TaskResult,
  failedResult,
  parseMessage,
  taskProgressSchema,
  taskRequestSchema,
  taskResultSchema,
} from "../models";
import { ResultStore, RESULT_KEY_PREFIX, resultStorageKey } from "../store";
import { TaskTransport, TransportSubscription } from "../transport";
import { TASKS_TOPIC, progressTopic, resultTopic } from "./topics";

/**
 * Handle for a broker-level subscription
 */
export interface TaskSubscription {
  readonly topic: string;
  /** Settles when the subscription ends: delivered, aborted or unsubscribed */
  readonly closed: Promise<void>;
  /** End the subscription. Safe to call more than once. */
  unsubscribe(): Promise<void>;
}

export interface TaskBrokerOptions {
  /** Serialized data larger than this (UTF-8 bytes) goes to the store (default: 32768) */
  overflowThresholdBytes?: number;
  /** How long overflowed results stay retrievable (default: 24 hours) */
  overflowTtlMs?: number;
  /** How long a worker's claim on a task ID blocks other workers (default: 24 hours) */
  claimTtlMs?: number;
  logger?: Pick<Console, "log" | "warn" | "error">;
}

/** A result as it travels: `dataRef` replaces `data` for overflowed payloads */
const resultMessageSchema = taskResultSchema.extend({
  dataRef: z.string().startsWith(RESULT_KEY_PREFIX).optional(),
});

type ResultMessage = z.infer<typeof resultMessageSchema>;

type MessageCallback = (raw: string, finish: () => Promise<void>) => void | Promise<void>;

export const DEFAULT_OVERFLOW_THRESHOLD_BYTES = 32 * 1024;
export const DEFAULT_OVERFLOW_TTL_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_CLAIM_TTL_MS = 24 * 60 * 60 * 1000;

export class TaskBroker {
  private readonly transport: TaskTransport;
  private readonly store: ResultStore;
  private readonly overflowThresholdBytes: number;
  private readonly overflowTtlMs: number;
  private readonly claimTtlMs: number;
  private readonly logger: Pick<Console, "log" | "warn" | "error">;

  constructor(transport: TaskTransport, store: ResultStore, options: TaskBrokerOptions = {}) {
    this.transport = transport;
    this.store = store;
    this.overflowThresholdBytes = options.overflowThresholdBytes ?? DEFAULT_OVERFLOW_THRESHOLD_BYTES;
    this.overflowTtlMs = options.overflowTtlMs ?? DEFAULT_OVERFLOW_TTL_MS;
    this.claimTtlMs = options.claimTtlMs ?? DEFAULT_CLAIM_TTL_MS;
    this.logger = options.logger ?? console;
  }

  /**
   * Publish a task for the worker pool. Does not wait for a worker to pick
   * it up.
   *
   * @returns Number of workers listening when the task was published
   * @throws TransportError when the transport is unavailable
   */
  async submit(request: TaskRequest): Promise<number> {
    const receivers = await this.publish(TASKS_TOPIC, JSON.stringify(request));
    if (receivers === 0) {
      this.logger.warn(`[TaskBroker] No worker is listening; task ${request.taskId} will not be picked up`);
    }
    return receivers;
  }

  /**
   * Receive every task published on the submission topic until the signal
   * aborts or the subscription is closed.
   */
  async subscribeToTasks(
    handler: (request: TaskRequest) => void | Promise<void>,
    signal?: AbortSignal
  ): Promise<TaskSubscription> {
    return this.openSubscription(
      TASKS_TOPIC,
      (raw) => {
        const request = parseMessage(raw, taskRequestSchema);
        if (!request) {
          this.logger.warn("[TaskBroker] Dropped malformed task request");
          return;
        }
        return handler(request);
      },
      signal
    );
  }

  /**
   * Wait for the terminal result of one task. `onResult` runs at most once,
   * after any overflow reference has been resolved; the subscription then
   * closes itself.
   *
   * The returned promise resolves once the subscription is active: a result
   * published after that point is guaranteed to be seen.
   */
  async subscribeToResult(
    taskId: string,
    onResult: (result: TaskResult) => void,
    signal?: AbortSignal
  ): Promise<TaskSubscription> {
    let delivered = false;

    return this.openSubscription(
      resultTopic(taskId),
      async (raw, finish) => {
        if (delivered) return;

        const result = parseMessage(raw, resultMessageSchema);
        if (!result || result.taskId !== taskId) {
          this.logger.warn(`[TaskBroker] Dropped malformed result on ${resultTopic(taskId)}`);
          return;
        }

        delivered = true;
        try {
          onResult(await this.resolveOverflow(result));
        } finally {
          await finish();
        }
      },
      signal
    );
  }

  /**
   * Receive progress notes for a task until the signal aborts or the
   * subscription is closed. Delivery is best-effort.
   */
  async subscribeToProgress(
    taskId: string,
    onProgress: (progress: TaskProgress) => void,
    signal?: AbortSignal
  ): Promise<TaskSubscription> {
    return this.openSubscription(
      progressTopic(taskId),
      (raw) => {
        const progress = parseMessage(raw, taskProgressSchema);
        if (!progress || progress.taskId !== taskId) {
          this.logger.warn(`[TaskBroker] Dropped malformed progress on ${progressTopic(taskId)}`);
          return;
        }
        onProgress(progress);
      },
      signal
    );
  }

  /**
   * Publish the terminal result of a task. Only the worker dispatcher calls
   * this, once per task.
   *
   * @returns Number of subscribers that received the notification
   * @throws ResultSerializationError if the result cannot be serialized
   * @throws ResultStoreError if an overflow payload cannot be stored
   * @throws TransportError when the transport is unavailable
   */
  async publishResult(result: TaskResult): Promise<number> {
    let serialized: string;
    let dataJson: string | undefined;
    try {
      serialized = JSON.stringify(result);
      dataJson = result.data === undefined ? undefined : JSON.stringify(result.data);
    } catch (error) {
      throw new ResultSerializationError(`Result for task ${result.taskId} could not be serialized`, {
        cause: error,
      });
    }
    let message = serialized;

    if (dataJson !== undefined) {
      const dataBytes = Buffer.byteLength(dataJson, "utf8");
      if (dataBytes > this.overflowThresholdBytes) {
        const reference = await this.store.put(result.taskId, serialized, this.overflowTtlMs);
        const overflowed: ResultMessage = {
          taskId: result.taskId,
          status: result.status,
          dataRef: reference,
          completedAt: result.completedAt,
        };
        message = JSON.stringify(overflowed);
        this.logger.log(
          `[TaskBroker] Result for ${result.taskId} is ${dataBytes} bytes; stored as ${reference}`
        );
      }
    }

    return this.publish(resultTopic(result.taskId), message);
  }

  /**
   * Publish a progress note for a running task.
   */
  async publishProgress(progress: TaskProgress): Promise<number> {
    return this.publish(progressTopic(progress.taskId), JSON.stringify(progress));
  }

  /**
   * Claim a task for one worker across every process sharing the store.
   *
   * @returns true if the caller should run the task
   * @throws ResultStoreError when the claim cannot be recorded
   */
  async claimTask(taskId: string, ownerId: string): Promise<boolean> {
    return this.store.claim(taskId, ownerId, this.claimTtlMs);
  }

  /**
   * Read an overflowed result straight from the store, for callers that were
   * not subscribed when it was published.
   *
   * @returns The result, or null if none was stored or it has expired
   */
  async retrieveStoredResult(taskId: string): Promise<TaskResult | null> {
    const raw = await this.store.get(resultStorageKey(taskId));
    if (raw === null) {
      return null;
    }
    return parseMessage(raw, taskResultSchema) ?? null;
  }

  private async resolveOverflow(message: ResultMessage): Promise<TaskResult> {
    const { dataRef: key, ...result } = message;
    if (key === undefined) {
      return result;
    }

    const raw = await this.store.get(key);
    const stored = raw === null ? undefined : parseMessage(raw, taskResultSchema);

    if (!stored || stored.taskId !== result.taskId) {
      this.logger.warn(`[TaskBroker] Overflow payload ${key} is no longer available`);
      return failedResult(result.taskId, `result payload expired or missing: ${key}`, result.completedAt);
    }

    return stored;
  }

  private async publish(topic: string, message: string): Promise<number> {
    try {
      return await this.transport.publish(topic, message);
    } catch (error) {
      throw asTransportError(error, `Failed to publish on ${topic}`);
    }
  }

  private async openSubscription(
    topic: string,
    callback: MessageCallback,
    signal?: AbortSignal
  ): Promise<TaskSubscription> {
    let finished = false;
    let transportSubscription: TransportSubscription | undefined;
    let resolveClosed: () => void = () => undefined;
    const closed = new Promise<void>((resolve) => {
      resolveClosed = resolve;
    });

    const finish = async (): Promise<void> => {
      if (finished) return;
      finished = true;
      signal?.removeEventListener("abort", onAbort);
      try {
        await transportSubscription?.unsubscribe();
      } catch (error) {
        const text = error instanceof Error ? error.message : String(error);
        this.logger.warn(`[TaskBroker] Unsubscribe from ${topic} failed: ${text}`);
      } finally {
        resolveClosed();
      }
    };

    const onAbort = () => {
      void finish();
    };

    if (signal?.aborted) {
      finished = true;
      resolveClosed();
      return { topic, closed, unsubscribe: finish };
    }

    try {
      transportSubscription = await this.transport.subscribe(topic, (raw) => {
        if (finished) return;
        return callback(raw, finish);
      });
    } catch (error) {
      throw asTransportError(error, `Failed to subscribe to ${topic}`);
    }

    // A message (or the signal) may have ended things while subscribe() was in flight
    if (finished) {
      await transportSubscription.unsubscribe();
    } else if (signal) {
      signal.addEventListener("abort", onAbort, { once: true });
      if (signal.aborted) {
        await finish();
      }
    }

    return { topic, closed, unsubscribe: finish };
  }
}

function asTransportError(error: unknown, context: string): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(`${context}: ${message}`, { cause: error });
}
