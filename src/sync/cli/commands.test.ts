import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import * as p from "@clack/prompts";
import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { parseEnv, type SyncEnv } from "@/sync/config/env";
import type { AppLauncher } from "@/sync/goodlinks/launcher";
import { LedgerStore } from "@/sync/ledger/repository";
import { ConfigError, SourceUnavailableError } from "@/sync/types";
import { parseCliArgs } from "./args";
import { runCommand } from "./commands";
import { exitCodeForError } from "./format";

vi.mock("@clack/prompts");

const T1 = new Date("2026-03-01T10:00:00.000Z");

function createStore(file: string, rows: Array<[string, string, string, number]>) {
  const db = new Database(file);
  db.exec("CREATE TABLE link (id TEXT, url TEXT, title TEXT, addedAt REAL)");
  const insert = db.prepare("INSERT INTO link (id, url, title, addedAt) VALUES (?, ?, ?, ?)");
  for (const row of rows) {
    insert.run(...row);
  }
  db.close();
}

function spyLauncher() {
  return {
    isRunning: vi.fn(async () => false),
    launch: vi.fn(async () => {}),
    quit: vi.fn(async () => {}),
  } satisfies AppLauncher;
}

describe("runCommand", () => {
  let dir: string;
  let env: SyncEnv;
  let configFile: string;
  let sourcePath: string;
  let statePath: string;
  let printed: string[];

  function writeSettings(launchGoodLinks: boolean) {
    fs.writeFileSync(
      configFile,
      JSON.stringify({
        username: "reader@example.com",
        password: "test-secret",
        launch_goodlinks: launchGoodLinks,
        log_file: null,
        source_path: sourcePath,
        state_path: statePath,
      })
    );
  }

  function seedLedger(...ids: string[]) {
    const ledger = new LedgerStore(statePath);
    for (const id of ids) {
      ledger.markSynced(id, T1);
    }
    ledger.close();
  }

  function syncedIds(...ids: string[]): boolean[] {
    const ledger = new LedgerStore(statePath);
    try {
      return ids.map((id) => ledger.isSynced(id));
    } finally {
      ledger.close();
    }
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "sync-cli-"));
    env = parseEnv({ SYNC_HOME: dir, SYNC_LOG_LEVEL: "error" });
    configFile = path.join(dir, "config.json");
    sourcePath = path.join(dir, "data.sqlite");
    statePath = path.join(dir, "sync_ledger.db");
    printed = [];
    vi.spyOn(console, "log").mockImplementation((line: unknown) => {
      printed.push(String(line));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.mocked(p.text).mockClear();
    vi.mocked(p.password).mockClear();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("init", () => {
    it("leaves an existing config alone without --force", async () => {
      writeSettings(false);
      const before = fs.readFileSync(configFile, "utf8");

      const code = await runCommand(parseCliArgs(["init"]), { env });

      expect(code).toBe(0);
      expect(fs.readFileSync(configFile, "utf8")).toBe(before);
      expect(p.text).not.toHaveBeenCalled();
      expect(p.password).not.toHaveBeenCalled();
    });

    it("imports legacy state into an existing setup without prompting", async () => {
      writeSettings(false);
      const before = fs.readFileSync(configFile, "utf8");
      const legacy = path.join(dir, "synced.json");
      fs.writeFileSync(legacy, JSON.stringify(["id-1", "id-2"]));

      const code = await runCommand(parseCliArgs(["init", "--import", legacy]), { env });

      expect(code).toBe(0);
      expect(syncedIds("id-1", "id-2", "id-3")).toEqual([true, true, false]);
      expect(fs.readFileSync(configFile, "utf8")).toBe(before);
      expect(p.text).not.toHaveBeenCalled();
    });

    it("rejects a legacy file that isn't a list of ids", async () => {
      writeSettings(false);
      const legacy = path.join(dir, "synced.json");
      fs.writeFileSync(legacy, JSON.stringify({ ids: ["id-1"] }));

      const result = runCommand(parseCliArgs(["init", "--import", legacy]), { env });

      await expect(result).rejects.toBeInstanceOf(ConfigError);
      await expect(result).rejects.toThrow(`${legacy} is not a JSON array of link ids`);
      expect(fs.existsSync(statePath)).toBe(false);
    });

    it("rejects a legacy file that isn't JSON", async () => {
      writeSettings(false);
      const legacy = path.join(dir, "synced.json");
      fs.writeFileSync(legacy, "id-1\nid-2\n");

      await expect(runCommand(parseCliArgs(["init", "--import", legacy]), { env })).rejects.toThrow(
        `Cannot read ${legacy}: `
      );
    });
  });

  describe("reset", () => {
    it("reports how many entries it removed", async () => {
      writeSettings(false);
      seedLedger("a", "b");

      expect(await runCommand(parseCliArgs(["reset"]), { env })).toBe(0);
      expect(await runCommand(parseCliArgs(["reset"]), { env })).toBe(0);

      expect(printed).toEqual(["Sync state reset (2 links will be sent again)", "No sync state to reset"]);
      expect(syncedIds("a", "b")).toEqual([false, false]);
    });
  });

  describe("status", () => {
    it("prints counts and the pending links", async () => {
      writeSettings(true);
      createStore(sourcePath, [
        ["b", "https://example.com/b", "Second", 2],
        ["a", "https://example.com/a", "First", 1],
      ]);
      seedLedger("a");
      const launcher = spyLauncher();

      const code = await runCommand(parseCliArgs(["status"]), { env, launcher });

      expect(code).toBe(0);
      expect(printed).toEqual([
        "GoodLinks: 2 links",
        "Synced:    1",
        "Pending:   1",
        "",
        "Pending links:",
        "  - Second",
      ]);
      expect(launcher.isRunning).not.toHaveBeenCalled();
    });

    it("never launches GoodLinks, even when launching is enabled", async () => {
      writeSettings(true);
      const launcher = spyLauncher();

      await expect(runCommand(parseCliArgs(["status"]), { env, launcher })).rejects.toBeInstanceOf(
        SourceUnavailableError
      );
      expect(launcher.isRunning).not.toHaveBeenCalled();
      expect(launcher.launch).not.toHaveBeenCalled();
    });
  });

  describe("sync", () => {
    it("sends the backlog and exits 1 when a link is rejected", async () => {
      writeSettings(false);
      createStore(sourcePath, [
        ["b", "https://example.com/b", "Second", 2],
        ["a", "https://example.com/a", "First", 1],
      ]);
      const fetchMock = vi
        .fn<typeof fetch>()
        .mockResolvedValueOnce(new Response("201", { status: 201 }))
        .mockResolvedValueOnce(new Response("bad request", { status: 400 }));

      const code = await runCommand(parseCliArgs(["sync", "-q"]), { env, fetch: fetchMock });

      expect(code).toBe(1);
      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(syncedIds("a", "b")).toEqual([true, false]);
    });

    it("exits 0 when every link went through", async () => {
      writeSettings(false);
      createStore(sourcePath, [["a", "https://example.com/a", "First", 1]]);
      const fetchMock = vi.fn<typeof fetch>(async () => new Response("201", { status: 201 }));

      const code = await runCommand(parseCliArgs(["sync", "-q"]), { env, fetch: fetchMock });

      expect(code).toBe(0);
      expect(syncedIds("a")).toEqual([true]);
    });

    it("fails the run with exit code 1 when GoodLinks can't be read", async () => {
      writeSettings(false);
      const fetchMock = vi.fn<typeof fetch>();
      const launcher = spyLauncher();

      const error = await runCommand(parseCliArgs(["sync", "-q"]), { env, launcher, fetch: fetchMock }).then(
        () => undefined,
        (e: unknown) => e
      );

      expect(error).toBeInstanceOf(SourceUnavailableError);
      expect(exitCodeForError(error)).toBe(1);
      expect(fetchMock).not.toHaveBeenCalled();
      expect(launcher.launch).not.toHaveBeenCalled();
    });
  });
});
