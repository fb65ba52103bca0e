export type ErrorCode =
  | "VALIDATION_FAILED"
  | "DUPLICATE_TASK"
  | "UNKNOWN_DEPENDENCY"
  | "UNKNOWN_TASK"
  | "EMPTY_GRAPH"
  | "DUPLICATE_REGISTRATION"
  | "CYCLE_DETECTED"
  | "ILLEGAL_TRANSITION"
  | "RETRY_BUDGET_EXHAUSTED"
  | "DEPENDENCY_NOT_SATISFIED"
  | "TASK_FAILED"
  | "HOOK_FAILED"
  | "CONFIG_INVALID"
  | "PARSE_FAILED";

/** Base class for every error raised by taskwave. */
export class OrchestratorError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OrchestratorError";
    this.code = code;
  }
}

/** Task graph construction and registry errors. */
export class ValidationError extends OrchestratorError {
  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "ValidationError";
  }
}

export class CycleError extends OrchestratorError {
  /** Task ids the topological sort could not consume, sorted. */
  readonly remaining: string[];

  constructor(remaining: string[]) {
    super("CYCLE_DETECTED", `Cycle detected in task graph: ${remaining.join(", ")}`);
    this.name = "CycleError";
    this.remaining = remaining;
  }
}

export class IllegalTransitionError extends OrchestratorError {
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string, message?: string, code: ErrorCode = "ILLEGAL_TRANSITION") {
    super(code, message ?? `${from} -> ${to} not allowed`);
    this.name = "IllegalTransitionError";
    this.from = from;
    this.to = to;
  }
}

export class DependencyNotSatisfiedError extends OrchestratorError {
  readonly taskId: string;
  readonly unmet: string[];

  constructor(taskId: string, unmet: string[]) {
    super("DEPENDENCY_NOT_SATISFIED", `Task "${taskId}" cannot run; unmet dependencies: ${unmet.join(", ")}`);
    this.name = "DependencyNotSatisfiedError";
    this.taskId = taskId;
    this.unmet = unmet;
  }
}

/**
 * Raised by a run once a task has exhausted its retry budget. Carries the
 * results collected before the abort; `cause` is the last executor error.
 */
export class TaskFailedError<R = unknown> extends OrchestratorError {
  readonly taskId: string;
  readonly attempts: number;
  readonly results: Record<string, R>;

  constructor(taskId: string, attempts: number, results: Record<string, R>, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("TASK_FAILED", `Task "${taskId}" failed after ${attempts} attempt(s): ${reason}`, { cause });
    this.name = "TaskFailedError";
    this.taskId = taskId;
    this.attempts = attempts;
    this.results = results;
  }
}

export class HookFailedError extends OrchestratorError {
  readonly plugin: string;
  readonly hook: string;

  constructor(plugin: string, hook: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("HOOK_FAILED", `Plugin "${plugin}" failed in ${hook}: ${reason}`, { cause });
    this.name = "HookFailedError";
    this.plugin = plugin;
    this.hook = hook;
  }
}

export class ConfigError extends OrchestratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_INVALID", message, options);
    this.name = "ConfigError";
  }
}

export class ParseError extends OrchestratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PARSE_FAILED", message, options);
    this.name = "ParseError";
  }
}
