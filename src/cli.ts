#!/usr/bin/env node

import { Command } from "commander";
import { getConfig, loadConfigFile, type HookErrorPolicy } from "./config.js";
import { TaskFailedError } from "./errors.js";
import { createShellExecutor } from "./executor/shell-executor.js";
import { JsonlLedger } from "./ledger/jsonl-ledger.js";
import { initTracing, OpenTelemetryTracer, shutdownTracing } from "./observability/tracer.js";
import { Orchestrator } from "./orchestrator.js";
import { loadTaskGraphFile } from "./planner/task-graph.js";
import { parsePositiveInt } from "./utils/args.js";
import { setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason instanceof Error ? reason.message : reason);
});

const program = new Command();

program
  .name("taskwave")
  .description("Run dependency-ordered task graphs in deterministic waves")
  .version("0.1.0")
  .option("--debug", "Enable debug logging")
  .option("--config <file>", "JSON config file");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals();
  if (typeof opts.config === "string") {
    setLogLevel(loadConfigFile(opts.config).logging.level);
  }
  if (opts.debug) setLogLevel("debug");
});

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isHookErrorPolicy(value: string): value is HookErrorPolicy {
  return value === "continue" || value === "abort";
}

function printRun(orch: Orchestrator): void {
  const records = new Map(orch.snapshot().map((r) => [r.taskId, r]));
  for (const [index, wave] of (orch.lastRun?.waves ?? []).entries()) {
    console.log(`\n  Wave ${index + 1}:`);
    for (const id of wave) {
      const r = records.get(id);
      if (r) console.log(`    [${r.state}] ${id} (attempts: ${r.attempt}, trace: ${r.traceId})`);
    }
  }
}

// --- plan ---
program
  .command("plan")
  .description("Print the wave plan for a task graph file (dry-run)")
  .argument("<file>", "Task graph JSON file")
  .option("--waves", "Print only the wave arrays")
  .action((file: string, opts: { waves?: boolean }) => {
    try {
      const plan = new Orchestrator().plan(loadTaskGraphFile(file));
      const output = opts.waves ? plan.executionOrder.map((w) => w.tasks) : plan;
      console.log(JSON.stringify(output, null, 2));
    } catch (err) {
      console.error("Error:", errorMessage(err));
      process.exitCode = 1;
    }
  });

// --- run ---
program
  .command("run")
  .description("Run every task's command in dependency order")
  .argument("<file>", "Task graph JSON file")
  .option("--ledger <path>", "JSONL ledger file (default: ledger.path from config)")
  .option("-c, --concurrency <n>", "Max parallel tasks within a wave", parsePositiveInt)
  .option("--trace-endpoint <url>", "Export spans to this OTLP/HTTP endpoint")
  .option("--hook-errors <policy>", "continue | abort")
  .option("--cwd <dir>", "Working directory for task commands")
  .action(
    async (
      file: string,
      opts: { ledger?: string; concurrency?: number; traceEndpoint?: string; hookErrors?: string; cwd?: string },
    ) => {
      const hookErrorPolicy = opts.hookErrors;
      if (hookErrorPolicy !== undefined && !isHookErrorPolicy(hookErrorPolicy)) {
        console.error(`Error: --hook-errors must be "continue" or "abort", got "${hookErrorPolicy}"`);
        process.exitCode = 1;
        return;
      }

      const orch = new Orchestrator({
        ledger: new JsonlLedger(opts.ledger ?? getConfig().ledger.path),
        tracer: new OpenTelemetryTracer(),
        hookErrorPolicy,
        maxConcurrency: opts.concurrency,
      });
      const tracing = getConfig().tracing;
      initTracing(opts.traceEndpoint ? { ...tracing, enabled: true, endpoint: opts.traceEndpoint } : tracing);

      try {
        const graph = loadTaskGraphFile(file);
        const results = await orch.run(graph, createShellExecutor({ cwd: opts.cwd }));
        console.log("\n--- Result ---");
        printRun(orch);
        const run = orch.lastRun;
        const durationMs = run ? (run.finishedAt ?? Date.now()) - run.startedAt : 0;
        console.log(`\nCompleted ${Object.keys(results).length} task(s) in ${durationMs}ms`);
      } catch (err) {
        if (err instanceof TaskFailedError) printRun(orch);
        console.error("Run failed:", errorMessage(err));
        process.exitCode = 1;
      } finally {
        await shutdownTracing();
      }
    },
  );

// --- ledger ---
const ledgerCmd = program.command("ledger").description("Inspect a JSONL ledger");

ledgerCmd
  .command("tail")
  .description("Print the most recent ledger entries")
  .argument("[path]", "Ledger file (default: ledger.path from config)")
  .option("-n, --lines <n>", "Number of entries", parsePositiveInt, 10)
  .action((path: string | undefined, opts: { lines: number }) => {
    try {
      const ledger = new JsonlLedger(path ?? getConfig().ledger.path);
      for (const entry of ledger.tail(opts.lines)) {
        const task = entry.taskId ? ` ${entry.taskId}` : "";
        const state = entry.state ? ` ${entry.state}` : "";
        console.log(`${entry.timestamp} ${entry.eventType}${task}${state} run=${entry.runTraceId}`);
      }
    } catch (err) {
      console.error("Error:", errorMessage(err));
      process.exitCode = 1;
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
