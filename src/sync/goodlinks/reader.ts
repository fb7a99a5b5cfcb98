import fs from "fs";
import Database from "better-sqlite3";
import type { LinkRecord } from "@/sync/types";
import { SourceUnavailableError, errorMessage } from "@/sync/types";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("goodlinks-reader");

export interface SourceReader {
  /** Every saved link. Order carries no meaning. */
  listCandidates(): Promise<LinkRecord[]>;
}

interface RawLinkRow {
  id: string | null;
  url: string | null;
  title: string | null;
  addedAt: number | null;
}

const LIST_LINKS = "SELECT id, url, title, addedAt FROM link";

/**
 * Reads the GoodLinks SQLite store directly, opened read-only so the app
 * does not have to be running and its data is never touched.
 */
export class GoodLinksReader implements SourceReader {
  constructor(private readonly dbPath: string) {}

  async listCandidates(): Promise<LinkRecord[]> {
    if (!fs.existsSync(this.dbPath)) {
      throw new SourceUnavailableError(
        `GoodLinks data store not found at ${this.dbPath}\nIs GoodLinks installed and has it been opened at least once?`
      );
    }

    let db: Database.Database | undefined;
    let rows: RawLinkRow[];
    try {
      db = new Database(this.dbPath, { readonly: true, fileMustExist: true });
      rows = db.prepare<[], RawLinkRow>(LIST_LINKS).all();
    } catch (error) {
      throw new SourceUnavailableError(`Cannot read GoodLinks data store: ${describeSqliteError(error)}`, {
        cause: error,
      });
    } finally {
      db?.close();
    }

    const links: LinkRecord[] = [];
    for (const row of rows) {
      const link = toLinkRecord(row);
      if (link) {
        links.push(link);
      } else {
        log.warn("Skipping GoodLinks row without id or url", { id: row.id, url: row.url });
      }
    }

    log.debug("Read GoodLinks store", { rows: rows.length, links: links.length });
    return links;
  }
}

export function toLinkRecord(row: RawLinkRow): LinkRecord | null {
  if (!row.id || !row.url) return null;
  return {
    id: row.id,
    url: row.url,
    title: row.title ?? "",
    // GoodLinks stores seconds since the Unix epoch
    savedAt: new Date((row.addedAt ?? 0) * 1000),
  };
}

function describeSqliteError(error: unknown): string {
  const code = error instanceof Error && "code" in error ? error.code : undefined;
  switch (code) {
    case "SQLITE_BUSY":
    case "SQLITE_LOCKED":
      return "the store is locked by another process";
    case "SQLITE_NOTADB":
    case "SQLITE_CORRUPT":
      return "the store is corrupt or not a SQLite database";
    default:
      return errorMessage(error);
  }
}
