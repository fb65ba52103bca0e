import { exec } from "node:child_process";
import { getConfig } from "../config.js";
import { log } from "../utils/logger.js";
import type { TaskExecutor } from "./types.js";

export type ShellOutput = {
  command: string;
  stdout: string;
  stderr: string;
};

export type ShellExecutorOptions = {
  cwd?: string;
  /** Kill the command after this many ms (default: `shell.timeoutMs`, 0 = never). */
  timeoutMs?: number;
  env?: Record<string, string>;
};

/** The `command` a task carries in its metadata, if any. */
export function commandOf(metadata: Readonly<Record<string, unknown>>): string | undefined {
  const command = metadata.command;
  return typeof command === "string" && command.trim().length > 0 ? command : undefined;
}

/**
 * Executor that runs each task's `metadata.command` through the shell. Tasks
 * without a command succeed with `null`. A non-zero exit fails the attempt.
 */
export function createShellExecutor(opts?: ShellExecutorOptions): TaskExecutor<ShellOutput | null> {
  const timeout = opts?.timeoutMs ?? getConfig().shell.timeoutMs;

  return (taskId, execution) => {
    const command = commandOf(execution.metadata);
    if (!command) {
      log.debug(`Task "${taskId}" has no command, nothing to run`);
      return null;
    }

    log.info(`[${taskId}] $ ${command}`, { attempt: execution.attempt });
    return new Promise<ShellOutput>((resolve, reject) => {
      exec(
        command,
        {
          cwd: opts?.cwd,
          timeout,
          env: {
            ...process.env,
            ...opts?.env,
            TASKWAVE_TASK_ID: taskId,
            TASKWAVE_TRACE_ID: execution.traceId,
            TASKWAVE_ATTEMPT: String(execution.attempt),
          },
        },
        (err, stdout, stderr) => {
          if (err) {
            reject(new Error(`Command for task "${taskId}" failed: ${err.message.trim()}`, { cause: err }));
            return;
          }
          resolve({ command, stdout, stderr });
        },
      );
    });
  };
}
