import { z } from "zod";
import { ValidationError } from "./errors.js";

// ---------------------------------------------------------------------------
// Task graph input
// ---------------------------------------------------------------------------

export const TaskEntrySchema = z
  .object({
    id: z.string().min(1, "Task id must be a non-empty string"),
    dependencies: z.array(z.string()).optional(),
    priority: z.number().int("priority must be an integer").optional(),
    max_attempts: z.number().int().positive("max_attempts must be positive").optional(),
    metadata: z.record(z.unknown()).optional(),
  })
  // Unknown keys are kept and end up in the task's metadata.
  .passthrough();

export const TaskGraphInputSchema = z.object({
  tasks: z.array(TaskEntrySchema),
});

export type TaskEntry = z.infer<typeof TaskEntrySchema>;
export type TaskGraphInput = z.infer<typeof TaskGraphInputSchema>;

// ---------------------------------------------------------------------------
// Config file
// ---------------------------------------------------------------------------

export const ConfigFileSchema = z
  .object({
    tasks: z
      .object({
        defaultMaxAttempts: z.number().int().positive(),
        defaultPriority: z.number().int(),
      })
      .partial(),
    execution: z
      .object({
        maxConcurrency: z.number().int().positive(),
        retryBaseDelayMs: z.number().int().nonnegative(),
        retryMaxDelayMs: z.number().int().nonnegative(),
      })
      .partial(),
    hooks: z.object({ onError: z.enum(["continue", "abort"]) }).partial(),
    ledger: z.object({ path: z.string().min(1) }).partial(),
    logging: z.object({ level: z.enum(["debug", "info", "warn", "error"]) }).partial(),
    shell: z.object({ timeoutMs: z.number().int().nonnegative() }).partial(),
    tracing: z
      .object({
        enabled: z.boolean(),
        endpoint: z.string().url(),
        serviceName: z.string().min(1),
      })
      .partial(),
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ---------------------------------------------------------------------------
// Ledger entries (as read back from disk)
// ---------------------------------------------------------------------------

export const LedgerEventSchema = z.object({
  eventType: z.enum([
    "workflow.started",
    "workflow.finished",
    "task.completed",
    "task.failed",
    "task.cancelled",
    "task.skipped",
  ]),
  runTraceId: z.string(),
  taskId: z.string().optional(),
  taskTraceId: z.string().optional(),
  wave: z.number().int().nonnegative().optional(),
  state: z.enum(["PENDING", "RUNNING", "COMPLETED", "FAILED", "SKIPPED", "CANCELLED"]).optional(),
  attempt: z.number().int().nonnegative().optional(),
  timestamp: z.string(),
  payload: z.record(z.unknown()).optional(),
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

/** Parse `data` with `schema`, throwing a `ValidationError` that lists every issue. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, data: unknown): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError("VALIDATION_FAILED", formatIssues(result.error));
  }
  return result.data;
}
