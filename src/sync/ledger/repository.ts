import type Database from "better-sqlite3";
import { z } from "zod";
import { StateStoreError, errorMessage } from "@/sync/types";
import type { RunCounts, RunMode, RunStatus, StateSummary } from "@/sync/types";
import { openLedgerDatabase } from "./db";
import type { RunHistory, SyncRunRecord, SyncStateStore } from "./types";

/** better-sqlite3 backed sync state plus run history. */
export class LedgerStore implements SyncStateStore, RunHistory {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = openLedgerDatabase(dbPath);
  }

  // --- Synced links ---

  isSynced(id: string): boolean {
    return this.guard("read sync state", () =>
      this.db.prepare<[string], { found: number }>("SELECT 1 AS found FROM synced_links WHERE link_id = ?").get(id) !== undefined
    );
  }

  markSynced(id: string, timestamp: Date): void {
    this.guard("record synced link", () => {
      this.db
        .prepare("INSERT INTO synced_links (link_id, synced_at) VALUES (?, ?) ON CONFLICT(link_id) DO NOTHING")
        .run(id, timestamp.toISOString());
    });
  }

  reset(): number {
    return this.guard("reset sync state", () => {
      const clear = this.db.transaction(() => this.db.prepare("DELETE FROM synced_links").run().changes);
      return clear();
    });
  }

  loadSummary(): StateSummary {
    return this.guard("read sync state", () => {
      const row = this.db
        .prepare<[], RawSummaryRow>(
          "SELECT COUNT(*) AS count, MIN(synced_at) AS oldest, MAX(synced_at) AS newest FROM synced_links"
        )
        .get();
      return {
        count: row?.count ?? 0,
        oldest: row?.oldest ?? null,
        newest: row?.newest ?? null,
      };
    });
  }

  /** Seed the ledger from the id list the previous `synced.json` state file held. */
  importLegacyIds(ids: readonly string[], timestamp: Date): number {
    return this.guard("import legacy state", () => {
      const insert = this.db.prepare(
        "INSERT INTO synced_links (link_id, synced_at) VALUES (?, ?) ON CONFLICT(link_id) DO NOTHING"
      );
      const importAll = this.db.transaction((all: readonly string[]) => {
        let added = 0;
        for (const id of all) {
          added += insert.run(id, timestamp.toISOString()).changes;
        }
        return added;
      });
      return importAll(ids);
    });
  }

  // --- Sync runs ---

  createRun(runId: string, mode: RunMode): void {
    this.guard("record run", () => {
      this.db.prepare(`
        INSERT INTO sync_runs (run_id, started_at, mode, counts_json, status)
        VALUES (?, ?, ?, ?, ?)
      `).run(runId, new Date().toISOString(), mode, "{}", "running");
    });
  }

  completeRun(runId: string, counts: RunCounts, status: Exclude<RunStatus, "running">, error?: string): void {
    this.guard("record run", () => {
      this.db.prepare(`
        UPDATE sync_runs
        SET completed_at = ?, counts_json = ?, status = ?, error_message = ?
        WHERE run_id = ?
      `).run(new Date().toISOString(), JSON.stringify(counts), status, error ?? null, runId);
    });
  }

  lastRun(): SyncRunRecord | undefined {
    return this.guard("read run history", () => {
      const row = this.db
        .prepare<[], RawRunRow>("SELECT * FROM sync_runs ORDER BY id DESC LIMIT 1")
        .get();
      return row ? toRunRecord(row) : undefined;
    });
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private guard<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof StateStoreError) throw error;
      throw new StateStoreError(`Failed to ${action}: ${errorMessage(error)}`, { cause: error });
    }
  }
}

// --- Internal helpers ---

interface RawSummaryRow {
  count: number;
  oldest: string | null;
  newest: string | null;
}

interface RawRunRow {
  id: number;
  run_id: string;
  started_at: string;
  completed_at: string | null;
  mode: string;
  counts_json: string;
  status: string;
  error_message: string | null;
}

const runCountsSchema = z.object({
  candidatesTotal: z.number(),
  alreadySynced: z.number(),
  newlySynced: z.number(),
  failed: z.number(),
});

const runModeSchema = z.enum(["interactive", "automated"]).catch("automated");
const runStatusSchema = z.enum(["running", "completed", "failed"]).catch("failed");

function parseCounts(json: string): RunCounts | null {
  try {
    const parsed = runCountsSchema.safeParse(JSON.parse(json));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function toRunRecord(row: RawRunRow): SyncRunRecord {
  return {
    id: row.id,
    runId: row.run_id,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    mode: runModeSchema.parse(row.mode),
    counts: parseCounts(row.counts_json),
    status: runStatusSchema.parse(row.status),
    errorMessage: row.error_message,
  };
}
