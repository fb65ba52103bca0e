import { describe, expect, it } from "vitest";
import { ValidationError } from "../src/errors.js";
import { PluginRegistry } from "../src/plugins/registry.js";
import type { WorkflowPlugin } from "../src/plugins/types.js";

const audit: WorkflowPlugin = { name: "audit", afterTask: () => {} };
const timer: WorkflowPlugin = { name: "timer", beforeWorkflow: () => {}, afterWorkflow: () => {} };

describe("PluginRegistry", () => {
  it("registers and retrieves plugins", () => {
    const registry = new PluginRegistry();
    registry.add(audit);

    expect(registry.get("audit")).toBe(audit);
    expect(registry.names()).toEqual(["audit"]);
    expect(registry.list()).toHaveLength(1);
  });

  it("accepts plugins at construction", () => {
    const registry = new PluginRegistry([timer, audit]);
    expect(registry.names()).toEqual(["timer", "audit"]);
  });

  it("throws on duplicate name", () => {
    const registry = new PluginRegistry([audit]);
    try {
      registry.add({ name: "audit" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      expect((err as ValidationError).code).toBe("DUPLICATE_REGISTRATION");
      expect((err as ValidationError).message).toBe('Plugin "audit" already registered');
    }
  });

  it("removes plugins", () => {
    const registry = new PluginRegistry([audit]);
    expect(registry.remove("audit")).toBe(true);
    expect(registry.get("audit")).toBeUndefined();
    expect(registry.remove("audit")).toBe(false);
  });

  it("selects plugins by hook in registration order", () => {
    const both: WorkflowPlugin = { name: "both", beforeWorkflow: () => {}, afterTask: () => {} };
    const registry = new PluginRegistry([audit, timer, both]);

    expect(registry.withHook("afterTask").map((p) => p.name)).toEqual(["audit", "both"]);
    expect(registry.withHook("beforeWorkflow").map((p) => p.name)).toEqual(["timer", "both"]);
    expect(registry.withHook("afterWorkflow").map((p) => p.name)).toEqual(["timer"]);
  });

  it("is empty by default", () => {
    const registry = new PluginRegistry();
    expect(registry.list()).toEqual([]);
    expect(registry.withHook("afterTask")).toEqual([]);
  });
});
