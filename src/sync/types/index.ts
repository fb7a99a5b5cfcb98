export interface LinkRecord {
  id: string;
  url: string;
  title: string;
  savedAt: Date;
}

export interface SyncedEntry {
  id: string;
  syncedAt: string;
}

export interface StateSummary {
  count: number;
  oldest: string | null;
  newest: string | null;
}

export interface RunCounts {
  candidatesTotal: number;
  alreadySynced: number;
  newlySynced: number;
  failed: number;
}

export interface RunReport {
  runId: string;
  dryRun: boolean;
  startedAt: string;
  completedAt: string;
  counts: RunCounts;
  /** Ids rejected by Instapaper or lost to a transport error, in submission order. */
  failedIds: string[];
  /** Dry runs only: the backlog in the order it would be submitted. */
  wouldSync: LinkRecord[];
}

export type RunMode = "interactive" | "automated";

export type RunStatus = "running" | "completed" | "failed";

export * from "./errors";
