import { appendFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { ParseError } from "../errors.js";
import { LedgerEventSchema, formatIssues } from "../schemas.js";
import type { Ledger, LedgerEvent } from "./types.js";

/** JSON with object keys sorted, so identical events serialise identically. */
export function stableStringify(value: unknown): string {
  return JSON.stringify(value, (_key, val: unknown) => {
    if (typeof val !== "object" || val === null || Array.isArray(val)) return val;
    return Object.fromEntries(Object.entries(val).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
  });
}

/**
 * Append-only JSONL ledger. Each event is one line; writes are synchronous so
 * the file order matches the order `record` was called in.
 */
export class JsonlLedger implements Ledger {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
    mkdirSync(dirname(path), { recursive: true });
  }

  record(event: LedgerEvent): void {
    appendFileSync(this.path, `${stableStringify(event)}\n`, "utf-8");
  }

  /** Read entries in insertion order, optionally only the first `limit`. */
  entries(limit?: number): LedgerEvent[] {
    if (!existsSync(this.path)) return [];

    const lines = readFileSync(this.path, "utf-8")
      .split("\n")
      .map((l) => l.trim())
      .filter((l) => l.length > 0);
    const selected = limit === undefined ? lines : lines.slice(0, limit);

    return selected.map((line, index) => {
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch (err) {
        throw new ParseError(`Ledger ${this.path} line ${index + 1} is not valid JSON`, { cause: err });
      }
      const result = LedgerEventSchema.safeParse(raw);
      if (!result.success) {
        throw new ParseError(`Ledger ${this.path} line ${index + 1}: ${formatIssues(result.error)}`);
      }
      return result.data;
    });
  }

  /** The last `limit` entries; empty unless `limit` is a positive integer. */
  tail(limit = 10): LedgerEvent[] {
    if (!Number.isInteger(limit) || limit <= 0) return [];
    return this.entries().slice(-limit);
  }

  /** Erase the contents while keeping the file. */
  clear(): void {
    writeFileSync(this.path, "", "utf-8");
  }
}
