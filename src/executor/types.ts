import type { TaskExecutionSnapshot } from "../state/task-machine.js";

/**
 * Performs the work of one task attempt. Throwing (or rejecting) marks the
 * attempt as failed; the orchestrator retries while the task has attempts left.
 */
export type TaskExecutor<T = unknown> = (taskId: string, execution: TaskExecutionSnapshot) => T | Promise<T>;
