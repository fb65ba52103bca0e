import { readFileSync } from "node:fs";
import { getConfig } from "../config.js";
import { ParseError, ValidationError } from "../errors.js";
import { TaskGraphInputSchema, parseOrThrow } from "../schemas.js";
import { computeWaves } from "./scheduler.js";
import type { Task, TaskGraph, TaskInput } from "./types.js";

/**
 * Build an immutable task graph. Rejects duplicate ids, unknown dependencies
 * and cycles (a self-dependency is a cycle of one).
 */
export function createTaskGraph(inputs: TaskInput[]): TaskGraph {
  const { defaultMaxAttempts, defaultPriority } = getConfig().tasks;
  const byId = new Map<string, Task>();

  for (const input of inputs) {
    if (byId.has(input.id)) {
      throw new ValidationError("DUPLICATE_TASK", `Duplicate task id "${input.id}"`);
    }
    const priority = input.priority ?? defaultPriority;
    const maxAttempts = input.maxAttempts ?? defaultMaxAttempts;
    if (!Number.isInteger(priority)) {
      throw new ValidationError("VALIDATION_FAILED", `Task "${input.id}" priority must be an integer`);
    }
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new ValidationError("VALIDATION_FAILED", `Task "${input.id}" maxAttempts must be a positive integer`);
    }

    byId.set(
      input.id,
      Object.freeze({
        id: input.id,
        dependencies: Object.freeze([...new Set(input.dependencies ?? [])]),
        priority,
        maxAttempts,
        metadata: Object.freeze({ ...input.metadata }),
      }),
    );
  }

  for (const task of byId.values()) {
    for (const dep of task.dependencies) {
      if (!byId.has(dep)) {
        throw new ValidationError("UNKNOWN_DEPENDENCY", `Task "${task.id}" depends on unknown task "${dep}"`);
      }
    }
  }

  const graph: TaskGraph = Object.freeze({
    tasks: Object.freeze([...byId.values()]),
    byId,
  });
  computeWaves(graph);
  return graph;
}

/** Build a graph from the `{ tasks: [...] }` input format (e.g. a parsed JSON file). */
export function parseTaskGraph(input: unknown): TaskGraph {
  if (typeof input !== "object" || input === null || !("tasks" in input)) {
    throw new ValidationError("EMPTY_GRAPH", "Task graph must contain a 'tasks' collection");
  }
  const parsed = parseOrThrow(TaskGraphInputSchema, input);
  if (parsed.tasks.length === 0) {
    throw new ValidationError("EMPTY_GRAPH", "Task graph 'tasks' collection is empty");
  }

  return createTaskGraph(
    parsed.tasks.map((entry) => {
      const { id, dependencies, priority, max_attempts, metadata, ...extra } = entry;
      return {
        id,
        dependencies,
        priority,
        maxAttempts: max_attempts,
        metadata: { ...extra, ...metadata },
      };
    }),
  );
}

export function getTask(graph: TaskGraph, id: string): Task {
  const task = graph.byId.get(id);
  if (!task) {
    throw new ValidationError("UNKNOWN_TASK", `Unknown task "${id}"`);
  }
  return task;
}

export function dependenciesOf(graph: TaskGraph, id: string): string[] {
  return [...getTask(graph, id).dependencies].sort();
}

export function dependentsOf(graph: TaskGraph, id: string): string[] {
  getTask(graph, id);
  return graph.tasks
    .filter((t) => t.dependencies.includes(id))
    .map((t) => t.id)
    .sort();
}

/** Every task downstream of `id`, directly or transitively. */
export function transitiveDependents(graph: TaskGraph, id: string): string[] {
  const queue = dependentsOf(graph, id);
  const visited = new Set<string>();

  for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
    if (visited.has(next)) continue;
    visited.add(next);
    queue.push(...dependentsOf(graph, next));
  }

  return [...visited].sort();
}

/** Read and build a task graph from a JSON file in the `{ tasks: [...] }` format. */
export function loadTaskGraphFile(path: string): TaskGraph {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ParseError(`Cannot read task graph ${path}: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }
  return parseTaskGraph(raw);
}
