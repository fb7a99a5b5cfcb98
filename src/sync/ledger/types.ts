import type { RunCounts, RunMode, RunStatus, StateSummary } from "@/sync/types";

/** Durable record of which GoodLinks ids have reached Instapaper. */
export interface SyncStateStore {
  isSynced(id: string): boolean;
  /** No-op when the id is already recorded; the first timestamp wins. */
  markSynced(id: string, timestamp: Date): void;
  /** Forget every synced id at once. Returns how many were removed. */
  reset(): number;
  loadSummary(): StateSummary;
  close(): void;
}

export interface RunHistory {
  /** Real runs only; dry runs leave no history. */
  createRun(runId: string, mode: RunMode): void;
  completeRun(runId: string, counts: RunCounts, status: Exclude<RunStatus, "running">, error?: string): void;
  lastRun(): SyncRunRecord | undefined;
}

export interface SyncRunRecord {
  id: number;
  runId: string;
  startedAt: string;
  completedAt: string | null;
  mode: RunMode;
  counts: RunCounts | null;
  status: RunStatus;
  errorMessage: string | null;
}
