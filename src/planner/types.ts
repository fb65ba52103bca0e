export type TaskMetadata = Readonly<Record<string, unknown>>;

export type TaskInput = {
  id: string;
  dependencies?: string[];
  priority?: number;
  maxAttempts?: number;
  metadata?: Record<string, unknown>;
};

export type Task = Readonly<{
  id: string;
  /** Distinct dependency ids, in declaration order. */
  dependencies: readonly string[];
  /** Higher runs first among tasks that become ready together. */
  priority: number;
  maxAttempts: number;
  metadata: TaskMetadata;
}>;

export type TaskGraph = Readonly<{
  /** Tasks in input order. */
  tasks: readonly Task[];
  byId: ReadonlyMap<string, Task>;
}>;

export type ExecutionPlanWave = {
  /** 1-based wave number. */
  wave: number;
  tasks: string[];
  canParallel: boolean;
};

export type ExecutionPlan = {
  totalTasks: number;
  totalWaves: number;
  maxParallelism: number;
  executionOrder: ExecutionPlanWave[];
};
