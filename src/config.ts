import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { ConfigError } from "./errors.js";
import { ConfigFileSchema, formatIssues } from "./schemas.js";
import type { LogLevel } from "./utils/logger.js";

export type HookErrorPolicy = "continue" | "abort";

export type TaskwaveConfig = {
  tasks: {
    defaultMaxAttempts: number;
    defaultPriority: number;
  };
  execution: {
    /** Tasks of one wave that may run at the same time (1 = sequential). */
    maxConcurrency: number;
    /** Delay before the first retry; doubles per attempt. 0 retries immediately. */
    retryBaseDelayMs: number;
    retryMaxDelayMs: number;
  };
  hooks: {
    onError: HookErrorPolicy;
  };
  ledger: {
    path: string;
  };
  logging: {
    level: LogLevel;
  };
  shell: {
    /** 0 disables the timeout. */
    timeoutMs: number;
  };
  tracing: {
    enabled: boolean;
    /** OTLP/HTTP traces endpoint. */
    endpoint?: string;
    serviceName: string;
  };
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: TaskwaveConfig = {
  tasks: {
    defaultMaxAttempts: 3,
    defaultPriority: 0,
  },
  execution: {
    maxConcurrency: 1,
    retryBaseDelayMs: 0,
    retryMaxDelayMs: 10_000,
  },
  hooks: {
    onError: "continue",
  },
  ledger: {
    path: join(homedir(), ".taskwave", "ledger.jsonl"),
  },
  logging: {
    level: "info",
  },
  shell: {
    timeoutMs: 0,
  },
  tracing: {
    enabled: false,
    serviceName: "taskwave",
  },
};

/**
 * Environment overrides, applied over the defaults whenever the config is built:
 * `TASKWAVE_LEDGER_PATH` sets `ledger.path`, `TASKWAVE_TRACE_ENDPOINT` sets
 * `tracing.endpoint` and turns tracing on.
 */
function fromEnv(env: NodeJS.ProcessEnv): TaskwaveConfig {
  const base = structuredClone(DEFAULTS);
  if (env.TASKWAVE_LEDGER_PATH) base.ledger.path = env.TASKWAVE_LEDGER_PATH;
  if (env.TASKWAVE_TRACE_ENDPOINT) {
    base.tracing.endpoint = env.TASKWAVE_TRACE_ENDPOINT;
    base.tracing.enabled = true;
  }
  return base;
}

let current: TaskwaveConfig = fromEnv(process.env);

/** Override config values. Merges section by section over the defaults and environment. */
export function configure(overrides: DeepPartial<TaskwaveConfig>): void {
  const base = fromEnv(process.env);
  current = {
    tasks: { ...base.tasks, ...overrides.tasks },
    execution: { ...base.execution, ...overrides.execution },
    hooks: { ...base.hooks, ...overrides.hooks },
    ledger: { ...base.ledger, ...overrides.ledger },
    logging: { ...base.logging, ...overrides.logging },
    shell: { ...base.shell, ...overrides.shell },
    tracing: { ...base.tracing, ...overrides.tracing },
  };
}

/** Reset config to the defaults plus environment overrides. */
export function resetConfig(): void {
  current = fromEnv(process.env);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<TaskwaveConfig> {
  return current;
}

/** Read a JSON config file, validate it and apply it over the defaults. */
export function loadConfigFile(path: string): Readonly<TaskwaveConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }

  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid config file ${path}: ${formatIssues(result.error)}`);
  }
  configure(result.data);
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<TaskwaveConfig> = Object.freeze(structuredClone(DEFAULTS));
