import { mkdtempSync, writeFileSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { configure, defaults, getConfig, loadConfigFile, resetConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

afterEach(() => {
  vi.unstubAllEnvs();
  resetConfig();
});

function configFile(content: string): string {
  const path = join(mkdtempSync(join(tmpdir(), "taskwave-config-")), "taskwave.json");
  writeFileSync(path, content);
  return path;
}

describe("config", () => {
  it("starts from the defaults", () => {
    expect(getConfig()).toEqual({
      tasks: { defaultMaxAttempts: 3, defaultPriority: 0 },
      execution: { maxConcurrency: 1, retryBaseDelayMs: 0, retryMaxDelayMs: 10_000 },
      hooks: { onError: "continue" },
      ledger: { path: join(homedir(), ".taskwave", "ledger.jsonl") },
      logging: { level: "info" },
      shell: { timeoutMs: 0 },
      tracing: { enabled: false, serviceName: "taskwave" },
    });
    expect(Object.isFrozen(defaults)).toBe(true);
  });

  it("merges overrides section by section", () => {
    configure({ execution: { maxConcurrency: 4 }, hooks: { onError: "abort" } });

    expect(getConfig().execution).toEqual({ maxConcurrency: 4, retryBaseDelayMs: 0, retryMaxDelayMs: 10_000 });
    expect(getConfig().hooks.onError).toBe("abort");
    expect(getConfig().tasks).toEqual(defaults.tasks);
  });

  it("replaces earlier overrides rather than stacking them", () => {
    configure({ tasks: { defaultPriority: 9 } });
    configure({ shell: { timeoutMs: 500 } });
    expect(getConfig().tasks.defaultPriority).toBe(0);
    expect(getConfig().shell.timeoutMs).toBe(500);
  });

  it("resets to defaults", () => {
    configure({ logging: { level: "debug" } });
    resetConfig();
    expect(getConfig().logging.level).toBe("info");
  });
});

describe("environment overrides", () => {
  it("takes the ledger path from TASKWAVE_LEDGER_PATH", () => {
    vi.stubEnv("TASKWAVE_LEDGER_PATH", "/srv/taskwave/ledger.jsonl");
    resetConfig();
    expect(getConfig().ledger.path).toBe("/srv/taskwave/ledger.jsonl");
    expect(defaults.ledger.path).toBe(join(homedir(), ".taskwave", "ledger.jsonl"));
  });

  it("enables tracing from TASKWAVE_TRACE_ENDPOINT", () => {
    vi.stubEnv("TASKWAVE_TRACE_ENDPOINT", "http://localhost:4318/v1/traces");
    resetConfig();
    expect(getConfig().tracing).toEqual({
      enabled: true,
      endpoint: "http://localhost:4318/v1/traces",
      serviceName: "taskwave",
    });
  });

  it("keeps environment values under configure and lets explicit overrides win", () => {
    vi.stubEnv("TASKWAVE_LEDGER_PATH", "/srv/taskwave/ledger.jsonl");
    configure({ execution: { maxConcurrency: 2 } });
    expect(getConfig().ledger.path).toBe("/srv/taskwave/ledger.jsonl");

    configure({ ledger: { path: "/tmp/explicit.jsonl" } });
    expect(getConfig().ledger.path).toBe("/tmp/explicit.jsonl");
  });

  it("ignores empty variables", () => {
    vi.stubEnv("TASKWAVE_LEDGER_PATH", "");
    resetConfig();
    expect(getConfig().ledger.path).toBe(defaults.ledger.path);
  });
});

describe("loadConfigFile", () => {
  it("applies a valid file", () => {
    const path = configFile(JSON.stringify({ tasks: { defaultMaxAttempts: 5 }, ledger: { path: "/var/tmp/tw.jsonl" } }));

    const config = loadConfigFile(path);
    expect(config.tasks).toEqual({ defaultMaxAttempts: 5, defaultPriority: 0 });
    expect(getConfig().ledger.path).toBe("/var/tmp/tw.jsonl");
  });

  it("rejects malformed JSON", () => {
    const path = configFile("{ nope");
    expect(() => loadConfigFile(path)).toThrow(ConfigError);
    expect(() => loadConfigFile(path)).toThrow(`Cannot read config file ${path}`);
  });

  it("rejects invalid values with their path", () => {
    const path = configFile(JSON.stringify({ execution: { maxConcurrency: 0 } }));
    expect(() => loadConfigFile(path)).toThrow(
      `Invalid config file ${path}: execution.maxConcurrency: Number must be greater than 0`,
    );
  });

  it("reads the tracing section", () => {
    const path = configFile(JSON.stringify({ tracing: { enabled: true, endpoint: "http://collector:4318/v1/traces" } }));
    expect(loadConfigFile(path).tracing).toEqual({
      enabled: true,
      endpoint: "http://collector:4318/v1/traces",
      serviceName: "taskwave",
    });
  });

  it("rejects a tracing endpoint that is not a URL", () => {
    const path = configFile(JSON.stringify({ tracing: { endpoint: "collector" } }));
    expect(() => loadConfigFile(path)).toThrow(`Invalid config file ${path}: tracing.endpoint: Invalid url`);
  });

  it("rejects unknown sections", () => {
    const path = configFile(JSON.stringify({ telemetry: {} }));
    expect(() => loadConfigFile(path)).toThrow("Unrecognized key(s) in object: 'telemetry'");
  });

  it("leaves the config alone on failure", () => {
    const path = configFile(JSON.stringify({ hooks: { onError: "explode" } }));
    expect(() => loadConfigFile(path)).toThrow(ConfigError);
    expect(getConfig().hooks.onError).toBe("continue");
  });
});
