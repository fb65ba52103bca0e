import { context, propagation, SpanKind, SpanStatusCode, trace, type Tracer } from "@opentelemetry/api";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { Resource } from "@opentelemetry/resources";
import {
  BatchSpanProcessor,
  NodeTracerProvider,
  SimpleSpanProcessor,
  type SpanExporter,
} from "@opentelemetry/sdk-trace-node";
import { ATTR_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import { createLogger } from "../utils/logger.js";

const log = createLogger("tracing");

export type SpanAttributes = Record<string, string | number | boolean>;

export interface RunSpan {
  setAttribute(key: string, value: string | number | boolean): void;
  recordException(error: unknown): void;
}

/**
 * Scoped span acquisition: the span is open for the duration of `fn` and
 * closed when it settles, with an error status if it throws.
 */
export interface RunTracer {
  withSpan<T>(name: string, attributes: SpanAttributes, fn: (span: RunSpan) => Promise<T>): Promise<T>;
}

export type TracingOptions = {
  enabled: boolean;
  /** OTLP/HTTP traces endpoint, e.g. http://localhost:4318/v1/traces. */
  endpoint?: string;
  serviceName: string;
};

let provider: NodeTracerProvider | null = null;

/**
 * Register a global trace provider. Spans go to `exporter` when given (flushed
 * per span), else batched to the OTLP endpoint. Returns whether a provider is
 * active; disabled config leaves the API's no-op in place.
 */
export function initTracing(opts: TracingOptions, exporter?: SpanExporter): boolean {
  if (provider) return true;
  if (!opts.enabled) return false;

  const active = new NodeTracerProvider({
    resource: new Resource({ [ATTR_SERVICE_NAME]: opts.serviceName }),
  });
  if (exporter) {
    active.addSpanProcessor(new SimpleSpanProcessor(exporter));
  } else if (opts.endpoint) {
    active.addSpanProcessor(new BatchSpanProcessor(new OTLPTraceExporter({ url: opts.endpoint })));
  } else {
    log.warn("Tracing enabled without an endpoint; spans are recorded but not exported");
  }
  active.register();
  provider = active;
  log.debug("Tracing started", { serviceName: opts.serviceName, endpoint: opts.endpoint });
  return true;
}

/** Flush and drop the provider registered by `initTracing`. */
export async function shutdownTracing(): Promise<void> {
  if (!provider) return;
  const active = provider;
  provider = null;
  try {
    await active.shutdown();
  } finally {
    trace.disable();
    context.disable();
    propagation.disable();
  }
}

const noopSpan: RunSpan = {
  setAttribute() {},
  recordException() {},
};

export const noopTracer: RunTracer = {
  withSpan(_name, _attributes, fn) {
    return fn(noopSpan);
  },
};

/**
 * Tracer backed by the OpenTelemetry API. Spans are recorded once
 * `initTracing` has registered a provider; before that the API hands out
 * non-recording spans.
 */
export class OpenTelemetryTracer implements RunTracer {
  private component: string;

  constructor(component = "orchestrator") {
    this.component = component;
  }

  // Looked up per span so a provider registered after construction is used.
  private get tracer(): Tracer {
    return trace.getTracer(`taskwave.${this.component}`);
  }

  withSpan<T>(name: string, attributes: SpanAttributes, fn: (span: RunSpan) => Promise<T>): Promise<T> {
    return this.tracer.startActiveSpan(name, { kind: SpanKind.INTERNAL, attributes }, async (span) => {
      const handle: RunSpan = {
        setAttribute: (key, value) => {
          span.setAttribute(key, value);
        },
        recordException: (error) => {
          span.recordException(error instanceof Error ? error : String(error));
        },
      };
      try {
        const result = await fn(handle);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (err) {
        span.setStatus({
          code: SpanStatusCode.ERROR,
          message: err instanceof Error ? err.message : String(err),
        });
        throw err;
      } finally {
        span.end();
      }
    });
  }
}
