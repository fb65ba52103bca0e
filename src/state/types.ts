import { TransitionTable, type TransitionMap } from "./machine.js";

export type ExecutionState = "PENDING" | "RUNNING" | "COMPLETED" | "FAILED" | "SKIPPED" | "CANCELLED";

export const EXECUTION_TRANSITIONS: TransitionMap<ExecutionState> = {
  PENDING: ["RUNNING", "SKIPPED", "CANCELLED"],
  RUNNING: ["COMPLETED", "FAILED", "CANCELLED"],
  FAILED: ["PENDING", "CANCELLED"],
  COMPLETED: [],
  SKIPPED: [],
  CANCELLED: [],
};

export const executionTable = new TransitionTable(EXECUTION_TRANSITIONS);

/** Mutable per-task record, owned by the orchestrator for the length of one run. */
export type TaskExecution = {
  taskId: string;
  state: ExecutionState;
  /** Number of times the task has entered RUNNING. */
  attempt: number;
  maxAttempts: number;
  /** Minted once at creation; shared by every attempt. */
  traceId: string;
  dependencies: string[];
  metadata: Record<string, unknown>;
};
