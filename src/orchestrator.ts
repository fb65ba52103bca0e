import { randomUUID } from "node:crypto";
import { getConfig, type HookErrorPolicy } from "./config.js";
import { HookFailedError, TaskFailedError, ValidationError } from "./errors.js";
import type { TaskExecutor } from "./executor/types.js";
import type { Ledger, LedgerEvent, LedgerEventType } from "./ledger/types.js";
import { noopTracer, type RunSpan, type RunTracer } from "./observability/tracer.js";
import { Scheduler } from "./planner/scheduler.js";
import { getTask } from "./planner/task-graph.js";
import type { ExecutionPlan, TaskGraph } from "./planner/types.js";
import { PluginRegistry } from "./plugins/registry.js";
import type { HookName, WorkflowPlugin } from "./plugins/types.js";
import { createTaskExecution, TaskStateMachine, type TaskExecutionSnapshot } from "./state/task-machine.js";
import type { ExecutionState } from "./state/types.js";
import { createLogger } from "./utils/logger.js";
import { runPool } from "./utils/pool.js";
import { backoffDelay, sleep } from "./utils/retry.js";

const log = createLogger("orchestrator");

const TERMINAL_EVENTS: Partial<Record<ExecutionState, LedgerEventType>> = {
  COMPLETED: "task.completed",
  FAILED: "task.failed",
  SKIPPED: "task.skipped",
  CANCELLED: "task.cancelled",
};

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TaskResult<T = unknown> = {
  taskId: string;
  state: ExecutionState;
  /** Attempts consumed. */
  attempt: number;
  traceId: string;
  /** 0-based wave the task belongs to. */
  wave: number;
  output?: T;
  /** Last executor error, for a task that exhausted its budget. */
  error?: unknown;
};

export type RunStatus = "running" | "completed" | "failed" | "aborted";

export type HookFailure = {
  plugin: string;
  hook: HookName;
  error: string;
};

export type RunState = {
  /** Run trace id; every ledger record of the run carries it. */
  runId: string;
  status: RunStatus;
  waves: string[][];
  startedAt: number;
  finishedAt?: number;
  /** Task whose exhausted retry budget stopped the run. */
  failedTask?: string;
  hookErrors: HookFailure[];
};

export type OrchestratorOptions = {
  ledger?: Ledger;
  /** Span collaborator; defaults to a no-op. */
  tracer?: RunTracer;
  plugins?: WorkflowPlugin[] | PluginRegistry;
  /** What a throwing hook does to the run (default: `hooks.onError`). */
  hookErrorPolicy?: HookErrorPolicy;
  /** Tasks of one wave allowed in flight at once (default: `execution.maxConcurrency`). */
  maxConcurrency?: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  /** Source of run and task trace ids (default: random UUIDs). */
  idGenerator?: () => string;
};

export type RunOptions = {
  maxConcurrency?: number;
};

type RunContext<T> = {
  graph: TaskGraph;
  executor: TaskExecutor<T>;
  state: RunState;
  machines: Map<string, TaskStateMachine>;
  results: Record<string, TaskResult<T>>;
  completed: Set<string>;
  waveOf: Map<string, number>;
  failure?: { taskId: string; attempts: number; error: unknown };
  abort?: HookFailedError;
};

type AttemptOutcome<T> = { ok: true; output: T } | { ok: false; error: unknown };

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

/**
 * Runs a task graph wave by wave. Each run owns fresh execution records, one
 * state machine per task; waves are barriers, and a task that exhausts its
 * retry budget stops the run before anything else starts.
 */
export class Orchestrator {
  readonly plugins: PluginRegistry;
  private ledger?: Ledger;
  private tracer: RunTracer;
  private hookErrorPolicy?: HookErrorPolicy;
  private maxConcurrency?: number;
  private retryBaseDelayMs?: number;
  private retryMaxDelayMs?: number;
  private idGenerator: () => string;
  private current?: { state: RunState; machines: Map<string, TaskStateMachine> };

  constructor(opts?: OrchestratorOptions) {
    this.ledger = opts?.ledger;
    this.tracer = opts?.tracer ?? noopTracer;
    this.plugins = opts?.plugins instanceof PluginRegistry ? opts.plugins : new PluginRegistry(opts?.plugins);
    this.hookErrorPolicy = opts?.hookErrorPolicy;
    this.maxConcurrency = opts?.maxConcurrency;
    this.retryBaseDelayMs = opts?.retryBaseDelayMs;
    this.retryMaxDelayMs = opts?.retryMaxDelayMs;
    this.idGenerator = opts?.idGenerator ?? randomUUID;
  }

  addPlugin(plugin: WorkflowPlugin): void {
    this.plugins.add(plugin);
  }

  /** Dry-run: the plan a run of `graph` would follow. */
  plan(graph: TaskGraph): ExecutionPlan {
    return new Scheduler(graph).executionPlan();
  }

  /** State of the most recent run, if any. */
  get lastRun(): Readonly<RunState> | undefined {
    if (!this.current) return undefined;
    const { state } = this.current;
    return { ...state, waves: state.waves.map((w) => [...w]), hookErrors: [...state.hookErrors] };
  }

  /** Copies of the most recent run's execution records, in graph order. */
  snapshot(): TaskExecutionSnapshot[] {
    if (!this.current) return [];
    return [...this.current.machines.values()].map((m) => m.snapshot());
  }

  /**
   * Execute every task of `graph`. Resolves with one COMPLETED result per task;
   * throws `TaskFailedError` when a task exhausts its attempts, or the error of
   * any contract violation (cycle, illegal transition, unmet dependency).
   */
  async run<T>(graph: TaskGraph, executor: TaskExecutor<T>, opts?: RunOptions): Promise<Record<string, TaskResult<T>>> {
    const maxConcurrency = opts?.maxConcurrency ?? this.maxConcurrency ?? getConfig().execution.maxConcurrency;
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new ValidationError("VALIDATION_FAILED", `maxConcurrency must be a positive integer, got ${maxConcurrency}`);
    }

    const waves = new Scheduler(graph).waves();
    const ctx: RunContext<T> = {
      graph,
      executor,
      state: {
        runId: this.idGenerator(),
        status: "running",
        waves,
        startedAt: Date.now(),
        hookErrors: [],
      },
      machines: new Map(
        graph.tasks.map((t) => [t.id, new TaskStateMachine(createTaskExecution(t, { idGenerator: this.idGenerator }))]),
      ),
      results: {},
      completed: new Set(),
      waveOf: new Map(waves.flatMap((wave, index) => wave.map((id): [string, number] => [id, index]))),
    };
    this.current = { state: ctx.state, machines: ctx.machines };

    const { runId } = ctx.state;
    log.info("Run started", { runId, tasks: graph.tasks.length, waves: waves.length, maxConcurrency });

    return this.tracer.withSpan(
      "workflow",
      { "taskwave.run.id": runId, "taskwave.run.tasks": graph.tasks.length, "taskwave.run.waves": waves.length },
      async (span) => {
        this.record({ eventType: "workflow.started", runTraceId: runId, payload: { totalTasks: graph.tasks.length, totalWaves: waves.length } });
        await this.callHooks(ctx, "beforeWorkflow", (p) => p.beforeWorkflow?.(graph, runId));

        const stopped = (): boolean => ctx.failure !== undefined || ctx.abort !== undefined;
        try {
          for (let index = 0; index < waves.length && !stopped(); index++) {
            log.debug(`Wave ${index}: ${waves[index].join(", ")}`, { runId });
            await runPool(waves[index], maxConcurrency, (id) => this.runTask(ctx, id), stopped);
          }
        } catch (err) {
          // Contract violation: surface it as-is once the run is closed out.
          ctx.state.status = "failed";
          await this.finish(ctx, span);
          throw err;
        }

        await this.cancelUnstarted(ctx);
        ctx.state.status = ctx.failure ? "failed" : ctx.abort ? "aborted" : "completed";
        await this.finish(ctx, span);

        if (ctx.failure) {
          const { taskId, attempts, error } = ctx.failure;
          throw new TaskFailedError(taskId, attempts, { ...ctx.results }, error);
        }
        if (ctx.abort) throw ctx.abort;
        return { ...ctx.results };
      },
    );
  }

  private async runTask<T>(ctx: RunContext<T>, taskId: string): Promise<void> {
    const machine = this.machineFor(ctx, taskId);
    const wave = ctx.waveOf.get(taskId) ?? 0;
    const { runId } = ctx.state;

    await this.tracer.withSpan(
      "task",
      { "taskwave.run.id": runId, "taskwave.task.id": taskId, "taskwave.task.trace_id": machine.execution.traceId, "taskwave.task.wave": wave },
      async (span) => {
        machine.ensureDependenciesSatisfied(ctx.completed);

        for (;;) {
          machine.start();
          log.debug(`[${taskId}] attempt ${machine.execution.attempt}/${machine.execution.maxAttempts}`, { runId });
          const outcome = await this.attempt(ctx.executor, taskId, machine.snapshot());

          if (outcome.ok) {
            machine.complete();
            ctx.completed.add(taskId);
            ctx.results[taskId] = this.resultOf(machine, wave, { output: outcome.output });
            break;
          }

          machine.fail();
          span.recordException(outcome.error);
          const reason = outcome.error instanceof Error ? outcome.error.message : String(outcome.error);

          if (machine.canRetry()) {
            const delay = backoffDelay(machine.execution.attempt, {
              baseDelayMs: this.retryBaseDelayMs ?? getConfig().execution.retryBaseDelayMs,
              maxDelayMs: this.retryMaxDelayMs ?? getConfig().execution.retryMaxDelayMs,
            });
            log.warn(`[${taskId}] attempt ${machine.execution.attempt} failed, retrying`, { runId, error: reason, delayMs: delay });
            await sleep(delay);
            machine.reset();
            continue;
          }

          log.error(`[${taskId}] failed after ${machine.execution.attempt} attempt(s)`, { runId, error: reason });
          ctx.results[taskId] = this.resultOf(machine, wave, { error: outcome.error });
          ctx.failure ??= { taskId, attempts: machine.execution.attempt, error: outcome.error };
          break;
        }

        span.setAttribute("taskwave.task.state", machine.state);
        span.setAttribute("taskwave.task.attempts", machine.execution.attempt);
        await this.settle(ctx, taskId, machine, wave);
      },
    );
  }

  private async attempt<T>(executor: TaskExecutor<T>, taskId: string, execution: TaskExecutionSnapshot): Promise<AttemptOutcome<T>> {
    try {
      return { ok: true, output: await executor(taskId, execution) };
    } catch (error) {
      return { ok: false, error };
    }
  }

  /** Tasks that never started once the run stopped move PENDING -> CANCELLED, in plan order. */
  private async cancelUnstarted<T>(ctx: RunContext<T>): Promise<void> {
    for (const taskId of ctx.state.waves.flat()) {
      const machine = this.machineFor(ctx, taskId);
      if (machine.state !== "PENDING") continue;
      machine.cancel();
      const wave = ctx.waveOf.get(taskId) ?? 0;
      ctx.results[taskId] = this.resultOf(machine, wave, {});
      await this.settle(ctx, taskId, machine, wave);
    }
  }

  /** Ledger record plus `afterTask` hooks for a terminal transition. */
  private async settle<T>(ctx: RunContext<T>, taskId: string, machine: TaskStateMachine, wave: number): Promise<void> {
    const { execution } = machine;
    this.record({
      eventType: TERMINAL_EVENTS[machine.state] ?? "task.cancelled",
      runTraceId: ctx.state.runId,
      taskId,
      taskTraceId: execution.traceId,
      wave,
      state: machine.state,
      attempt: execution.attempt,
    });

    const task = getTask(ctx.graph, taskId);
    await this.callHooks(ctx, "afterTask", (p) => p.afterTask?.(task, machine.snapshot()));
  }

  private async finish<T>(ctx: RunContext<T>, span: RunSpan): Promise<void> {
    const { state } = ctx;
    await this.callHooks(ctx, "afterWorkflow", (p) => p.afterWorkflow?.({ ...ctx.results }, state.runId));
    if (state.status === "completed" && ctx.abort) state.status = "aborted";

    state.finishedAt = Date.now();
    span.setAttribute("taskwave.run.status", state.status);
    this.record({
      eventType: "workflow.finished",
      runTraceId: state.runId,
      payload: {
        status: state.status,
        failedTask: ctx.failure?.taskId ?? null,
        completed: ctx.completed.size,
        durationMs: state.finishedAt - state.startedAt,
      },
    });
    if (ctx.failure) state.failedTask = ctx.failure.taskId;
    log.info("Run finished", { runId: state.runId, status: state.status, durationMs: state.finishedAt - state.startedAt });
  }

  /**
   * Invoke one hook on every plugin that has it, in registration order. A
   * failure is logged and kept on the run state; under the "abort" policy the
   * first one also stops the run.
   */
  private async callHooks<T>(ctx: RunContext<T>, hook: HookName, invoke: (plugin: WorkflowPlugin) => unknown): Promise<void> {
    const policy = this.hookErrorPolicy ?? getConfig().hooks.onError;

    for (const plugin of this.plugins.withHook(hook)) {
      try {
        await invoke(plugin);
      } catch (err) {
        const error = err instanceof Error ? err.message : String(err);
        ctx.state.hookErrors.push({ plugin: plugin.name, hook, error });
        log.warn(`Plugin "${plugin.name}" failed in ${hook}`, { runId: ctx.state.runId, error, policy });
        if (policy === "abort" && !ctx.abort) {
          ctx.abort = new HookFailedError(plugin.name, hook, err);
        }
      }
    }
  }

  private record(event: Omit<LedgerEvent, "timestamp">): void {
    if (!this.ledger) return;
    try {
      this.ledger.record({ ...event, timestamp: new Date().toISOString() });
    } catch (err) {
      log.error("Ledger write failed", { eventType: event.eventType, taskId: event.taskId, error: String(err) });
    }
  }

  private resultOf<T>(machine: TaskStateMachine, wave: number, extra: { output?: T; error?: unknown }): TaskResult<T> {
    return {
      taskId: machine.taskId,
      state: machine.state,
      attempt: machine.execution.attempt,
      traceId: machine.execution.traceId,
      wave,
      ...extra,
    };
  }

  private machineFor<T>(ctx: RunContext<T>, taskId: string): TaskStateMachine {
    const machine = ctx.machines.get(taskId);
    if (!machine) {
      throw new ValidationError("UNKNOWN_TASK", `Unknown task "${taskId}"`);
    }
    return machine;
  }
}
