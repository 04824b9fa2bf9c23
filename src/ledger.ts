/** Per-run record of import outcomes, in row order. */

import type { ResultEntry } from "./types.js";

export const LEDGER_FIELDS = ["task_name", "status", "task_id", "task_url", "error"] as const;

export type LedgerRecord = Record<(typeof LEDGER_FIELDS)[number], string>;

export class Ledger {
  private readonly items: ResultEntry[] = [];

  recordSuccess(name: string, row: number, taskId: string, url: string): void {
    this.items.push({ kind: "success", name, row, taskId, url });
  }

  recordFailure(name: string, row: number, error: string): void {
    this.items.push({ kind: "failure", name, row, error });
  }

  get entries(): readonly ResultEntry[] {
    return this.items;
  }

  get successCount(): number {
    return this.items.filter((e) => e.kind === "success").length;
  }

  get errorCount(): number {
    return this.items.filter((e) => e.kind === "failure").length;
  }

  toRecords(): LedgerRecord[] {
    return this.items.map((e) =>
      e.kind === "success"
        ? { task_name: e.name, status: "SUCCESS", task_id: e.taskId, task_url: e.url, error: "" }
        : { task_name: e.name, status: "FAILED", task_id: "", task_url: "", error: e.error },
    );
  }
}
