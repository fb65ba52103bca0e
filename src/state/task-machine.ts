import { randomUUID } from "node:crypto";
import { DependencyNotSatisfiedError, IllegalTransitionError } from "../errors.js";
import type { Task } from "../planner/types.js";
import { StateMachine } from "./machine.js";
import { executionTable, type ExecutionState, type TaskExecution } from "./types.js";

export type CreateExecutionOptions = {
  /** Trace id generator; defaults to a random UUID. */
  idGenerator?: () => string;
};

export function createTaskExecution(task: Task, opts?: CreateExecutionOptions): TaskExecution {
  return {
    taskId: task.id,
    state: "PENDING",
    attempt: 0,
    maxAttempts: task.maxAttempts,
    traceId: (opts?.idGenerator ?? randomUUID)(),
    dependencies: [...task.dependencies],
    metadata: { ...task.metadata },
  };
}

export type TaskExecutionSnapshot = Readonly<TaskExecution>;

/**
 * Execution state machine for one task. Composes the generic machine over the
 * execution table and couples it to the record's attempt budget: entering
 * RUNNING consumes an attempt, and FAILED may only return to PENDING while
 * attempts remain.
 */
export class TaskStateMachine {
  readonly execution: TaskExecution;
  private readonly machine: StateMachine<ExecutionState>;

  constructor(execution: TaskExecution) {
    this.execution = execution;
    this.machine = new StateMachine(executionTable, execution.state);
  }

  get state(): ExecutionState {
    return this.machine.state;
  }

  get taskId(): string {
    return this.execution.taskId;
  }

  canTransition(target: ExecutionState): boolean {
    if (target === "RUNNING" && this.isExhausted()) return false;
    if (this.state === "FAILED" && target === "PENDING" && !this.canRetry()) return false;
    return this.machine.can(target);
  }

  /** PENDING -> RUNNING, consuming one attempt. */
  start(): void {
    if (this.state === "PENDING" && this.isExhausted()) {
      throw new IllegalTransitionError(
        this.state,
        "RUNNING",
        `Task "${this.taskId}" has used all ${this.execution.maxAttempts} attempt(s)`,
        "RETRY_BUDGET_EXHAUSTED",
      );
    }
    this.move("RUNNING");
    this.execution.attempt += 1;
  }

  complete(): void {
    this.move("COMPLETED");
  }

  fail(): void {
    this.move("FAILED");
  }

  /** FAILED -> PENDING for another attempt. */
  reset(): void {
    if (this.state === "FAILED" && !this.canRetry()) {
      throw new IllegalTransitionError(
        this.state,
        "PENDING",
        `Task "${this.taskId}" cannot be retried; ${this.execution.attempt} of ${this.execution.maxAttempts} attempt(s) used`,
        "RETRY_BUDGET_EXHAUSTED",
      );
    }
    this.move("PENDING");
  }

  cancel(): void {
    this.move("CANCELLED");
  }

  skip(): void {
    this.move("SKIPPED");
  }

  canRetry(): boolean {
    return this.execution.attempt < this.execution.maxAttempts;
  }

  isExhausted(): boolean {
    return this.execution.attempt >= this.execution.maxAttempts;
  }

  isTerminal(): boolean {
    return executionTable.isTerminal(this.state);
  }

  ensureDependenciesSatisfied(completed: ReadonlySet<string>): void {
    const unmet = this.execution.dependencies.filter((d) => !completed.has(d)).sort();
    if (unmet.length > 0) {
      throw new DependencyNotSatisfiedError(this.taskId, unmet);
    }
  }

  snapshot(): TaskExecutionSnapshot {
    return {
      ...this.execution,
      dependencies: [...this.execution.dependencies],
      metadata: { ...this.execution.metadata },
    };
  }

  private move(target: ExecutionState): void {
    if (!this.machine.can(target)) {
      throw new IllegalTransitionError(
        this.state,
        target,
        `Invalid transition from ${this.state} to ${target} for task ${this.taskId}`,
      );
    }
    this.execution.state = this.machine.transition(target);
  }
}
