import { CycleError, ValidationError } from "../errors.js";
import type { ExecutionPlan, Task, TaskGraph } from "./types.js";

/** Tie-break order for ready tasks: descending priority, then ascending id. */
export function compareTasks(a: Task, b: Task): number {
  if (a.priority !== b.priority) return b.priority - a.priority;
  // Code unit comparison keeps the order independent of the host locale.
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

/**
 * Group the graph into dependency-respecting waves (Kahn's algorithm).
 * Every wave is sorted with `compareTasks`; throws `CycleError` when some
 * tasks can never become ready.
 */
export function computeWaves(graph: TaskGraph): string[][] {
  const inDegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const task of graph.tasks) {
    inDegree.set(task.id, task.dependencies.length);
    for (const dep of task.dependencies) {
      const list = dependents.get(dep) ?? [];
      list.push(task.id);
      dependents.set(dep, list);
    }
  }

  const byPriority = (ids: string[]): string[] =>
    ids
      .map((id) => lookup(graph, id))
      .sort(compareTasks)
      .map((t) => t.id);

  let ready = byPriority(graph.tasks.filter((t) => t.dependencies.length === 0).map((t) => t.id));
  const waves: string[][] = [];
  let visited = 0;

  while (ready.length > 0) {
    waves.push(ready);
    visited += ready.length;

    const next: string[] = [];
    for (const id of ready) {
      for (const dependent of dependents.get(id) ?? []) {
        const remaining = (inDegree.get(dependent) ?? 0) - 1;
        inDegree.set(dependent, remaining);
        if (remaining === 0) next.push(dependent);
      }
    }
    ready = byPriority(next);
  }

  if (visited !== graph.tasks.length) {
    const scheduled = new Set(waves.flat());
    const remaining = graph.tasks
      .map((t) => t.id)
      .filter((id) => !scheduled.has(id))
      .sort();
    throw new CycleError(remaining);
  }

  return waves;
}

function lookup(graph: TaskGraph, id: string): Task {
  const task = graph.byId.get(id);
  if (!task) {
    throw new ValidationError("UNKNOWN_TASK", `Unknown task "${id}"`);
  }
  return task;
}

/**
 * Stateless planner over a task graph. Every call recomputes the plan, so a
 * scheduler can be shared across runs of the same graph.
 */
export class Scheduler {
  readonly graph: TaskGraph;

  constructor(graph: TaskGraph) {
    this.graph = graph;
  }

  waves(): string[][] {
    return computeWaves(this.graph);
  }

  /** Plan summary with 1-based wave numbers. */
  executionPlan(): ExecutionPlan {
    const waves = this.waves();
    return {
      totalTasks: this.graph.tasks.length,
      totalWaves: waves.length,
      maxParallelism: waves.reduce((max, wave) => Math.max(max, wave.length), 0),
      executionOrder: waves.map((tasks, index) => ({
        wave: index + 1,
        tasks,
        canParallel: tasks.length > 1,
      })),
    };
  }

  /** The waves flattened into a single run order. */
  linearize(): Task[] {
    return this.waves()
      .flat()
      .map((id) => lookup(this.graph, id));
  }

  dependenciesOf(taskId: string): readonly string[] {
    return lookup(this.graph, taskId).dependencies;
  }
}
