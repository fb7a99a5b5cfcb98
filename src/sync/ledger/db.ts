import fs from "fs";
import path from "path";
import Database from "better-sqlite3";
import { StateStoreError, errorMessage } from "@/sync/types";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS synced_links (
  link_id TEXT PRIMARY KEY,
  synced_at TEXT NOT NULL
) WITHOUT ROWID;

CREATE INDEX IF NOT EXISTS idx_synced_at ON synced_links(synced_at);

CREATE TABLE IF NOT EXISTS sync_runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  run_id TEXT NOT NULL UNIQUE,
  started_at TEXT NOT NULL,
  completed_at TEXT,
  mode TEXT NOT NULL,
  counts_json TEXT NOT NULL,
  status TEXT NOT NULL,
  error_message TEXT
);
`;

/**
 * Open (creating if needed) the ledger database. Every write is committed
 * and fsynced before the statement returns.
 */
export function openLedgerDatabase(dbPath: string): Database.Database {
  try {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    const db = new Database(dbPath);
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = FULL");
    db.exec(SCHEMA);
    return db;
  } catch (error) {
    throw new StateStoreError(`Cannot open sync ledger at ${dbPath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
