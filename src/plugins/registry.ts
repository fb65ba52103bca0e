import { ValidationError } from "../errors.js";
import type { HookName, WorkflowPlugin } from "./types.js";

/** Plugins in registration order; hooks run in that order too. */
export class PluginRegistry {
  private plugins = new Map<string, WorkflowPlugin>();

  constructor(plugins: WorkflowPlugin[] = []) {
    for (const plugin of plugins) this.add(plugin);
  }

  add(plugin: WorkflowPlugin): void {
    if (this.plugins.has(plugin.name)) {
      throw new ValidationError("DUPLICATE_REGISTRATION", `Plugin "${plugin.name}" already registered`);
    }
    this.plugins.set(plugin.name, plugin);
  }

  remove(name: string): boolean {
    return this.plugins.delete(name);
  }

  get(name: string): WorkflowPlugin | undefined {
    return this.plugins.get(name);
  }

  list(): WorkflowPlugin[] {
    return [...this.plugins.values()];
  }

  names(): string[] {
    return [...this.plugins.keys()];
  }

  /** Plugins that implement the given hook. */
  withHook(hook: HookName): WorkflowPlugin[] {
    return this.list().filter((p) => typeof p[hook] === "function");
  }
}
