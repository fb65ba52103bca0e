import { SpanStatusCode, trace } from "@opentelemetry/api";
import { InMemorySpanExporter } from "@opentelemetry/sdk-trace-node";
import { afterEach, describe, expect, it } from "vitest";
import { initTracing, noopTracer, OpenTelemetryTracer, shutdownTracing } from "../src/observability/tracer.js";
import { Orchestrator } from "../src/orchestrator.js";
import { createTaskGraph } from "../src/planner/task-graph.js";
import { setLogLevel } from "../src/utils/logger.js";

afterEach(async () => {
  await shutdownTracing();
  setLogLevel("info");
});

describe("noopTracer", () => {
  it("runs the callback and returns its value", async () => {
    const value = await noopTracer.withSpan("task", { "taskwave.task.id": "a" }, async (span) => {
      span.setAttribute("taskwave.task.state", "COMPLETED");
      span.recordException(new Error("ignored"));
      return 42;
    });
    expect(value).toBe(42);
  });
});

describe("OpenTelemetryTracer without a provider", () => {
  const tracer = new OpenTelemetryTracer("test");

  it("returns the callback value", async () => {
    const value = await tracer.withSpan("workflow", { "taskwave.run.id": "run-1" }, async (span) => {
      span.setAttribute("taskwave.run.status", "completed");
      return trace.getActiveSpan()?.isRecording() ?? false;
    });
    expect(value).toBe(false);
  });

  it("rethrows callback errors", async () => {
    await expect(
      tracer.withSpan("task", {}, async (span) => {
        span.recordException("not an error object");
        throw new Error("executor failed");
      }),
    ).rejects.toThrow("executor failed");
  });
});

describe("initTracing", () => {
  it("leaves tracing off when disabled", () => {
    expect(initTracing({ enabled: false, serviceName: "taskwave-test" })).toBe(false);
  });

  it("records spans once a provider is registered", async () => {
    const exporter = new InMemorySpanExporter();
    expect(initTracing({ enabled: true, serviceName: "taskwave-test" }, exporter)).toBe(true);

    const recording = await new OpenTelemetryTracer().withSpan("check", {}, async () => {
      return trace.getActiveSpan()?.isRecording() ?? false;
    });
    expect(recording).toBe(true);
    expect(exporter.getFinishedSpans().map((s) => s.name)).toEqual(["check"]);
  });

  it("exports the workflow span and one child span per task", async () => {
    const exporter = new InMemorySpanExporter();
    initTracing({ enabled: true, serviceName: "taskwave-test" }, exporter);
    setLogLevel("error");

    let n = 0;
    const orch = new Orchestrator({ tracer: new OpenTelemetryTracer(), idGenerator: () => `id-${++n}` });
    await orch.run(createTaskGraph([{ id: "a" }, { id: "b", dependencies: ["a"] }]), () => "ok");

    const spans = exporter.getFinishedSpans();
    const workflow = spans.find((s) => s.name === "workflow");
    const tasks = spans.filter((s) => s.name === "task");

    expect(spans).toHaveLength(3);
    expect(workflow?.attributes["taskwave.run.id"]).toBe("id-1");
    expect(workflow?.attributes["taskwave.run.status"]).toBe("completed");
    expect(workflow?.status.code).toBe(SpanStatusCode.OK);
    expect(workflow?.resource.attributes["service.name"]).toBe("taskwave-test");

    expect(tasks.map((s) => s.attributes["taskwave.task.id"]).sort()).toEqual(["a", "b"]);
    for (const span of tasks) {
      expect(span.parentSpanId).toBe(workflow?.spanContext().spanId);
      expect(span.spanContext().traceId).toBe(workflow?.spanContext().traceId);
      expect(span.attributes["taskwave.task.state"]).toBe("COMPLETED");
    }
  });

  it("marks a failing span with an error status", async () => {
    const exporter = new InMemorySpanExporter();
    initTracing({ enabled: true, serviceName: "taskwave-test" }, exporter);

    await expect(
      new OpenTelemetryTracer().withSpan("task", {}, async () => {
        throw new Error("executor failed");
      }),
    ).rejects.toThrow("executor failed");

    const [span] = exporter.getFinishedSpans();
    expect(span.status).toEqual({ code: SpanStatusCode.ERROR, message: "executor failed" });
  });

  it("can start again after shutdown", async () => {
    initTracing({ enabled: true, serviceName: "first" }, new InMemorySpanExporter());
    await shutdownTracing();

    const exporter = new InMemorySpanExporter();
    expect(initTracing({ enabled: true, serviceName: "second" }, exporter)).toBe(true);
    await new OpenTelemetryTracer().withSpan("again", {}, async () => undefined);
    expect(exporter.getFinishedSpans().map((s) => s.resource.attributes["service.name"])).toEqual(["second"]);
  });
});
