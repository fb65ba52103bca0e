// Config
export { getConfig, configure, resetConfig, loadConfigFile, defaults } from "./config.js";
export type { TaskwaveConfig, HookErrorPolicy, DeepPartial } from "./config.js";

// Errors
export {
  OrchestratorError,
  ValidationError,
  CycleError,
  IllegalTransitionError,
  DependencyNotSatisfiedError,
  TaskFailedError,
  HookFailedError,
  ConfigError,
  ParseError,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  formatIssues,
  TaskEntrySchema,
  TaskGraphInputSchema,
  ConfigFileSchema,
  LedgerEventSchema,
} from "./schemas.js";
export type { TaskEntry, TaskGraphInput, ConfigFile } from "./schemas.js";

// Task graph + scheduling
export {
  createTaskGraph,
  parseTaskGraph,
  loadTaskGraphFile,
  getTask,
  dependenciesOf,
  dependentsOf,
  transitiveDependents,
} from "./planner/task-graph.js";
export { Scheduler, computeWaves, compareTasks } from "./planner/scheduler.js";
export type { Task, TaskGraph, TaskInput, TaskMetadata, ExecutionPlan, ExecutionPlanWave } from "./planner/types.js";

// State machines
export { TransitionTable, StateMachine } from "./state/machine.js";
export type { TransitionMap, StateDefinition, TransitionRecord } from "./state/machine.js";
export { EXECUTION_TRANSITIONS, executionTable } from "./state/types.js";
export type { ExecutionState, TaskExecution } from "./state/types.js";
export { TaskStateMachine, createTaskExecution } from "./state/task-machine.js";
export type { TaskExecutionSnapshot, CreateExecutionOptions } from "./state/task-machine.js";

// Core
export { Orchestrator } from "./orchestrator.js";
export type {
  OrchestratorOptions,
  RunOptions,
  RunState,
  RunStatus,
  TaskResult,
  HookFailure,
} from "./orchestrator.js";

// Executors
export type { TaskExecutor } from "./executor/types.js";
export { createShellExecutor, commandOf } from "./executor/shell-executor.js";
export type { ShellExecutorOptions, ShellOutput } from "./executor/shell-executor.js";

// Ledger
export type { Ledger, LedgerEvent, LedgerEventType } from "./ledger/types.js";
export { MemoryLedger } from "./ledger/memory-ledger.js";
export { JsonlLedger, stableStringify } from "./ledger/jsonl-ledger.js";

// Tracing
export { noopTracer, OpenTelemetryTracer, initTracing, shutdownTracing } from "./observability/tracer.js";
export type { RunTracer, RunSpan, SpanAttributes, TracingOptions } from "./observability/tracer.js";

// Plugins
export { PluginRegistry } from "./plugins/registry.js";
export type { WorkflowPlugin, HookName } from "./plugins/types.js";

// Utils
export { log, createLogger, setLogLevel, getLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
export { backoffDelay, sleep } from "./utils/retry.js";
export { runPool } from "./utils/pool.js";
export { parsePositiveInt } from "./utils/args.js";
