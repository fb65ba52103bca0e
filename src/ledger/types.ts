import type { ExecutionState } from "../state/types.js";

export type LedgerEventType =
  | "workflow.started"
  | "workflow.finished"
  | "task.completed"
  | "task.failed"
  | "task.cancelled"
  | "task.skipped";

export type LedgerEvent = {
  eventType: LedgerEventType;
  /** Trace id of the run the event belongs to. */
  runTraceId: string;
  taskId?: string;
  /** Stable trace id of the task execution. */
  taskTraceId?: string;
  /** 0-based wave index. */
  wave?: number;
  state?: ExecutionState;
  attempt?: number;
  /** ISO-8601 timestamp. */
  timestamp: string;
  payload?: Record<string, unknown>;
};

/** Append-only audit sink. `record` must not throw on a well-formed event. */
export interface Ledger {
  record(event: LedgerEvent): void;
}
