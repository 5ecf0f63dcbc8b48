/**
 * AgentTaskService Tests
 *
 * Submitter and worker share one in-memory transport, so every test runs the
 * full submit → dispatch → publish → correlate path.
 */

import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { AgentTaskService, generateTaskId } from "./AgentTaskService";
import { TaskBroker, TASKS_TOPIC, resultTopic } from "../broker";
import { Dispatcher } from "../queue";
import { InMemoryTransport } from "../transport";
import { MemoryResultStore } from "../store";
import { AgentTaskStatus, TaskProgress, createTaskRequest } from "../models";
import { AgentTasksError, TransportError } from "../errors";

const quiet = { log: () => undefined, warn: () => undefined, error: () => undefined };

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error("Timed out waiting for condition");
    }
    await sleep(5);
  }
}

/**
 * Transport whose submission topic is unreachable
 */
class FailingSubmitTransport extends InMemoryTransport {
  async publish(topic: string, message: string): Promise<number> {
    if (topic === TASKS_TOPIC) {
      throw new TransportError("hub unavailable");
    }
    return super.publish(topic, message);
  }
}

describe("AgentTaskService", () => {
  let transport: InMemoryTransport;
  let broker: TaskBroker;
  let dispatcher: Dispatcher;
  let service: AgentTaskService;

  beforeEach(async () => {
    transport = new InMemoryTransport();
    broker = new TaskBroker(transport, new MemoryResultStore(), { overflowThresholdBytes: 128, logger: quiet });
    dispatcher = new Dispatcher(broker, { logger: quiet });
    dispatcher.registerExecutor("echo", async (prompt) => {
      await sleep(Number(prompt) || 0);
      return prompt;
    });
    dispatcher.registerExecutor("bulk", (prompt) => ({ report: prompt.repeat(50) }));
    await dispatcher.start();
    service = new AgentTaskService(broker, { logger: quiet });
  });

  afterEach(async () => {
    await service.dispose();
    await dispatcher.stop(0);
    await transport.close();
  });

  it("generates 32-character hex task IDs", () => {
    const first = generateTaskId();

    assert.match(first, /^[0-9a-f]{32}$/);
    assert.notEqual(generateTaskId(), first);
  });

  it("reports an unknown agent type as a Failed result", async () => {
    service = new AgentTaskService(broker, { generateTaskId: () => "abc123", logger: quiet });

    const taskId = await service.submitTask("research", "find X");
    const result = await service.waitForResult(taskId, 5000);

    assert.equal(taskId, "abc123");
    assert.ok(result);
    assert.equal(result.taskId, "abc123");
    assert.equal(result.status, AgentTaskStatus.FAILED);
    assert.equal(result.error, "unknown agent type: research");
    assert.ok(result.completedAt instanceof Date);
  });

  it("returns null from a short wait and the result from a later one", async () => {
    const taskId = await service.submitTask("echo", "60");

    assert.equal(await service.waitForResult(taskId, 10), null);
    assert.equal(service.getResult(taskId), null);
    assert.deepEqual(service.getPendingTaskIds(), [taskId]);
    assert.equal(service.hasPendingTasks, true);

    const result = await service.waitForResult(taskId, 2000);

    assert.equal(result?.status, AgentTaskStatus.COMPLETED);
    assert.equal(result?.data, "60");
    assert.equal(service.getResult(taskId), result);
    assert.equal(service.pendingTaskCount, 0);
    assert.deepEqual(service.getCompletedTasks(), [result]);
  });

  it("resolves each wait with its own task's result regardless of completion order", async () => {
    const slowId = await service.submitTask("echo", "40");
    const fastId = await service.submitTask("echo", "5");

    const [slow, fast] = await Promise.all([
      service.waitForResult(slowId, 2000),
      service.waitForResult(fastId, 2000),
    ]);

    assert.equal(slow?.taskId, slowId);
    assert.equal(slow?.data, "40");
    assert.equal(fast?.taskId, fastId);
    assert.equal(fast?.data, "5");
  });

  it("records the submitted agent type for pending tasks", async () => {
    const taskId = await service.submitTask("echo", "50");

    const [pending] = service.getPendingTasks();

    assert.equal(pending?.taskId, taskId);
    assert.equal(pending?.agentType, "echo");
    assert.ok(pending?.submittedAt instanceof Date);
  });

  it("dereferences an overflowed result on the way to the waiter", async () => {
    const taskId = await service.submitTask("bulk", "abcdef");
    const result = await service.waitForResult(taskId, 2000);

    assert.deepEqual(result?.data, { report: "abcdef".repeat(50) });
  });

  it("cannot see an inline result it was not subscribed for", async () => {
    await broker.submit(createTaskRequest("elsewhere", "echo", "0"));
    await waitFor(() => dispatcher.getStats().totalProcessed === 1);

    assert.equal(await service.waitForResult("elsewhere", 20), null);
    assert.equal(await service.fetchResult("elsewhere"), null);
  });

  it("fetches an overflowed result from the store for a task submitted elsewhere", async () => {
    await broker.submit(createTaskRequest("elsewhere-big", "bulk", "xyz"));
    await waitFor(() => dispatcher.getStats().totalProcessed === 1);

    const result = await service.fetchResult("elsewhere-big");

    assert.equal(result?.status, AgentTaskStatus.COMPLETED);
    assert.deepEqual(result?.data, { report: "xyz".repeat(50) });
    assert.equal(service.getResult("elsewhere-big"), result);
  });

  it("passes progress notes through", async () => {
    dispatcher.registerExecutor("chatty", async (_prompt, context) => {
      await sleep(10);
      context.reportProgress("halfway", { agentName: "chatty" });
      return "done";
    });
    const progress: TaskProgress[] = [];

    const taskId = await service.submitTask("chatty", "go");
    await service.subscribeToProgress(taskId, (note) => progress.push(note));
    await service.waitForResult(taskId, 2000);

    assert.deepEqual(
      progress.map((note) => [note.taskId, note.message, note.agentName]),
      [[taskId, "halfway", "chatty"]]
    );
  });

  it("abandons a wait when its signal aborts", async () => {
    const taskId = await service.submitTask("echo", "100");
    const controller = new AbortController();

    const waiting = service.waitForResult(taskId, 5000, controller.signal);
    controller.abort();

    assert.equal(await waiting, null);
    assert.deepEqual(service.getPendingTaskIds(), [taskId]);
  });

  it("refuses a task ID that is already in use", async () => {
    service = new AgentTaskService(broker, { generateTaskId: () => "same", logger: quiet });

    const taskId = await service.submitTask("echo", "30");

    await assert.rejects(
      () => service.submitTask("echo", "0"),
      (error: unknown) => error instanceof AgentTasksError && error.message === "Task ID same is already in use"
    );
    assert.equal(service.pendingTaskCount, 1);

    const result = await service.waitForResult(taskId, 2000);
    assert.equal(result?.data, "30");

    await assert.rejects(() => service.submitTask("echo", "0"), AgentTasksError);
  });

  it("waits for the result when the timeout exceeds the timer range", async () => {
    const first = await service.submitTask("echo", "30");
    const second = await service.submitTask("echo", "30");

    const [beyondRange, unbounded] = await Promise.all([
      service.waitForResult(first, 2 ** 31),
      service.waitForResult(second, Infinity),
    ]);

    assert.equal(beyondRange?.status, AgentTaskStatus.COMPLETED);
    assert.equal(beyondRange?.data, "30");
    assert.equal(unbounded?.status, AgentTaskStatus.COMPLETED);
    assert.equal(unbounded?.data, "30");
  });

  it("returns null for a task ID it never submitted", async () => {
    assert.equal(await service.waitForResult("unknown", 1000), null);
  });

  it("removes the entry and subscription when submission fails", async () => {
    const failing = new FailingSubmitTransport();
    const failingService = new AgentTaskService(
      new TaskBroker(failing, new MemoryResultStore(), { logger: quiet }),
      { generateTaskId: () => "doomed", logger: quiet }
    );

    await assert.rejects(
      () => failingService.submitTask("echo", "hi"),
      (error: unknown) => error instanceof TransportError && error.message === "hub unavailable"
    );
    assert.equal(failingService.pendingTaskCount, 0);
    assert.equal(failing.getSubscriberCount(resultTopic("doomed")), 0);
  });

  it("releases waiters and subscriptions on dispose without stopping the task", async () => {
    const taskId = await service.submitTask("echo", "40");
    const waiting = service.waitForResult(taskId, 5000);

    await service.dispose();

    assert.equal(await waiting, null);
    assert.equal(service.pendingTaskCount, 0);
    assert.equal(transport.getSubscriberCount(resultTopic(taskId)), 0);
    await assert.rejects(() => service.submitTask("echo", "0"), AgentTasksError);

    // The worker still finishes; the disposed service ignores it
    await waitFor(() => dispatcher.getStats().totalProcessed === 1);
    assert.equal(dispatcher.getStats().successCount, 1);
    assert.equal(service.getResult(taskId), null);
  });
});
