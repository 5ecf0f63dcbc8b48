import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { TaskBacklog } from "./TaskBacklog";
import { createTaskRequest } from "../models";

describe("TaskBacklog", () => {
  it("hands requests out in arrival order", () => {
    const backlog = new TaskBacklog();
    backlog.enqueue(createTaskRequest("a", "echo", "1"));
    backlog.enqueue(createTaskRequest("b", "echo", "2"));
    backlog.enqueue(createTaskRequest("c", "echo", "3"));

    assert.equal(backlog.dequeue()?.taskId, "a");
    assert.equal(backlog.dequeue()?.taskId, "b");
    assert.equal(backlog.size, 1);
    assert.equal(backlog.dequeue()?.taskId, "c");
    assert.equal(backlog.dequeue(), undefined);
  });

  it("refuses a task ID that is already waiting", () => {
    const backlog = new TaskBacklog();

    assert.equal(backlog.enqueue(createTaskRequest("a", "echo", "first")), true);
    assert.equal(backlog.enqueue(createTaskRequest("a", "echo", "second")), false);
    assert.equal(backlog.size, 1);
    assert.equal(backlog.dequeue()?.prompt, "first");
    assert.equal(backlog.has("a"), false);
  });

  it("drains everything oldest first", () => {
    const backlog = new TaskBacklog();
    backlog.enqueue(createTaskRequest("a", "echo", "1"));
    backlog.enqueue(createTaskRequest("b", "echo", "2"));

    assert.deepEqual(
      backlog.drain().map((request) => request.taskId),
      ["a", "b"]
    );
    assert.equal(backlog.size, 0);
  });
});
