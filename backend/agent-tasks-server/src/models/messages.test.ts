import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  AgentTaskStatus,
  cancelledResult,
  completedResult,
  createTaskRequest,
  failedResult,
  isTerminalStatus,
  parseMessage,
  taskProgressSchema,
  taskRequestSchema,
  taskResultSchema,
} from "./index";

const AT = new Date("2026-01-15T10:00:00.000Z");

describe("wire messages", () => {
  it("serializes a request with camelCase keys and an ISO timestamp", () => {
    const request = createTaskRequest("abc123", "research", "find X", undefined, AT);

    assert.equal(
      JSON.stringify(request),
      '{"taskId":"abc123","agentType":"research","prompt":"find X","submittedAt":"2026-01-15T10:00:00.000Z"}'
    );
  });

  it("revives timestamps when parsing", () => {
    const parsed = parseMessage(
      JSON.stringify(createTaskRequest("abc123", "research", "find X", "/tmp/out.md", AT)),
      taskRequestSchema
    );

    assert.deepEqual(parsed, {
      taskId: "abc123",
      agentType: "research",
      prompt: "find X",
      submittedAt: AT,
      outputPath: "/tmp/out.md",
    });
  });

  it("returns undefined for malformed messages", () => {
    assert.equal(parseMessage("{not json", taskRequestSchema), undefined);
    assert.equal(parseMessage('{"taskId":"t1","agentType":"echo"}', taskRequestSchema), undefined);
    assert.equal(parseMessage('{"taskId":"t1","message":"x","timestamp":"yesterday"}', taskProgressSchema), undefined);
  });

  it("only accepts terminal statuses in a result", () => {
    const running = JSON.stringify({ taskId: "t1", status: "Running", completedAt: AT.toISOString() });
    const failed = JSON.stringify(failedResult("t1", "boom", AT));

    assert.equal(parseMessage(running, taskResultSchema), undefined);
    assert.deepEqual(parseMessage(failed, taskResultSchema), {
      taskId: "t1",
      status: AgentTaskStatus.FAILED,
      error: "boom",
      completedAt: AT,
    });
  });

  it("builds results with data only when completed and an error only when failed", () => {
    assert.deepEqual(completedResult("t1", null, AT), {
      taskId: "t1",
      status: AgentTaskStatus.COMPLETED,
      data: null,
      completedAt: AT,
    });
    assert.deepEqual(cancelledResult("t1", AT), {
      taskId: "t1",
      status: AgentTaskStatus.CANCELLED,
      completedAt: AT,
    });
  });

  it("tells terminal statuses apart from transient ones", () => {
    assert.equal(isTerminalStatus(AgentTaskStatus.PENDING), false);
    assert.equal(isTerminalStatus(AgentTaskStatus.RUNNING), false);
    assert.equal(isTerminalStatus(AgentTaskStatus.COMPLETED), true);
    assert.equal(isTerminalStatus(AgentTaskStatus.FAILED), true);
    assert.equal(isTerminalStatus(AgentTaskStatus.CANCELLED), true);
  });
});
