import { describe, expect, it } from "vitest";
import { DependencyNotSatisfiedError, IllegalTransitionError } from "../src/errors.js";
import { createTaskGraph, getTask } from "../src/planner/task-graph.js";
import { createTaskExecution, TaskStateMachine } from "../src/state/task-machine.js";

const graph = createTaskGraph([
  { id: "fetch" },
  { id: "build", dependencies: ["fetch"], maxAttempts: 2, metadata: { command: "make" } },
]);

function machineFor(id: string): TaskStateMachine {
  let n = 0;
  return new TaskStateMachine(createTaskExecution(getTask(graph, id), { idGenerator: () => `trace-${id}-${++n}` }));
}

describe("createTaskExecution", () => {
  it("starts PENDING with no attempts and copies the task", () => {
    const execution = createTaskExecution(getTask(graph, "build"), { idGenerator: () => "trace-1" });
    expect(execution).toEqual({
      taskId: "build",
      state: "PENDING",
      attempt: 0,
      maxAttempts: 2,
      traceId: "trace-1",
      dependencies: ["fetch"],
      metadata: { command: "make" },
    });
  });

  it("mints a UUID trace id by default", () => {
    const execution = createTaskExecution(getTask(graph, "fetch"));
    expect(execution.traceId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
  });
});

describe("TaskStateMachine", () => {
  it("completes on the first attempt", () => {
    const m = machineFor("fetch");
    m.start();
    m.complete();
    expect(m.state).toBe("COMPLETED");
    expect(m.execution.attempt).toBe(1);
    expect(m.isTerminal()).toBe(true);
  });

  it("rejects PENDING -> COMPLETED", () => {
    const m = machineFor("fetch");
    expect(m.canTransition("COMPLETED")).toBe(false);
    expect(() => m.complete()).toThrow("Invalid transition from PENDING to COMPLETED for task fetch");
    expect(m.state).toBe("PENDING");
  });

  it("consumes the budget across retries", () => {
    const m = machineFor("build");

    m.start();
    m.fail();
    expect(m.execution.attempt).toBe(1);
    expect(m.canRetry()).toBe(true);
    m.reset();

    m.start();
    m.fail();
    expect(m.execution.attempt).toBe(2);
    expect(m.canRetry()).toBe(false);
    expect(m.isExhausted()).toBe(true);
    expect(m.canTransition("PENDING")).toBe(false);

    try {
      m.reset();
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(IllegalTransitionError);
      expect((err as IllegalTransitionError).code).toBe("RETRY_BUDGET_EXHAUSTED");
      expect((err as IllegalTransitionError).message).toBe('Task "build" cannot be retried; 2 of 2 attempt(s) used');
    }
    expect(m.state).toBe("FAILED");
  });

  it("refuses to start once the budget is spent", () => {
    const execution = createTaskExecution(getTask(graph, "build"), { idGenerator: () => "t" });
    execution.attempt = 2;
    const m = new TaskStateMachine(execution);

    expect(m.canTransition("RUNNING")).toBe(false);
    expect(() => m.start()).toThrow('Task "build" has used all 2 attempt(s)');
    expect(m.execution.attempt).toBe(2);
  });

  it("keeps one trace id across attempts", () => {
    const m = machineFor("build");
    const traceId = m.execution.traceId;
    m.start();
    m.fail();
    m.reset();
    m.start();
    m.complete();
    expect(m.execution.traceId).toBe(traceId);
    expect(traceId).toBe("trace-build-1");
  });

  it("cancels from PENDING and from FAILED", () => {
    const pending = machineFor("fetch");
    pending.cancel();
    expect(pending.state).toBe("CANCELLED");

    const failed = machineFor("build");
    failed.start();
    failed.fail();
    failed.cancel();
    expect(failed.state).toBe("CANCELLED");
  });

  it("skips only from PENDING", () => {
    const m = machineFor("fetch");
    m.skip();
    expect(m.state).toBe("SKIPPED");
    expect(() => m.start()).toThrow(IllegalTransitionError);
  });

  it("keeps the execution record in step with the machine", () => {
    const m = machineFor("fetch");
    m.start();
    expect(m.execution.state).toBe("RUNNING");
    m.fail();
    expect(m.execution.state).toBe("FAILED");
  });

  it("checks dependencies against completed tasks", () => {
    const m = machineFor("build");
    try {
      m.ensureDependenciesSatisfied(new Set());
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DependencyNotSatisfiedError);
      expect((err as DependencyNotSatisfiedError).unmet).toEqual(["fetch"]);
      expect((err as DependencyNotSatisfiedError).message).toBe('Task "build" cannot run; unmet dependencies: fetch');
    }
    expect(() => m.ensureDependenciesSatisfied(new Set(["fetch"]))).not.toThrow();
  });

  it("returns snapshots detached from the live record", () => {
    const m = machineFor("build");
    const before = m.snapshot();
    m.start();

    expect(before.state).toBe("PENDING");
    expect(before.attempt).toBe(0);
    expect(m.snapshot().state).toBe("RUNNING");
    expect(before.metadata).not.toBe(m.execution.metadata);
  });
});
