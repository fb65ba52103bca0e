import type { Ledger, LedgerEvent } from "./types.js";

export class MemoryLedger implements Ledger {
  private readonly events: LedgerEvent[] = [];

  record(event: LedgerEvent): void {
    this.events.push({ ...event });
  }

  entries(): readonly LedgerEvent[] {
    return this.events;
  }

  forTask(taskId: string): LedgerEvent[] {
    return this.events.filter((e) => e.taskId === taskId);
  }

  forRun(runTraceId: string): LedgerEvent[] {
    return this.events.filter((e) => e.runTraceId === runTraceId);
  }

  clear(): void {
    this.events.length = 0;
  }
}
