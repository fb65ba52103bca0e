import type { TaskResult } from "../orchestrator.js";
import type { Task, TaskGraph } from "../planner/types.js";
import type { TaskExecutionSnapshot } from "../state/task-machine.js";

type MaybePromise<T> = T | Promise<T>;

/**
 * Lifecycle observer. Every hook is optional; hooks see copies of run state and
 * cannot drive task transitions.
 */
export interface WorkflowPlugin {
  name: string;
  /** Once, before the first wave. */
  beforeWorkflow?(graph: TaskGraph, traceId: string): MaybePromise<void>;
  /** Once per terminal task transition. */
  afterTask?(task: Task, execution: TaskExecutionSnapshot): MaybePromise<void>;
  /** Once, after the last wave or when the run aborts. */
  afterWorkflow?(results: Readonly<Record<string, TaskResult>>, traceId: string): MaybePromise<void>;
}

export type HookName = "beforeWorkflow" | "afterTask" | "afterWorkflow";
