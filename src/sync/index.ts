import { randomUUID } from "crypto";
import type { LinkRecord, RunCounts, RunMode, RunReport, StateSummary } from "@/sync/types";
import { AuthenticationFailedError, SourceUnavailableError, errorMessage } from "@/sync/types";
import type { SourceReader } from "@/sync/goodlinks/reader";
import type { AppLauncher } from "@/sync/goodlinks/launcher";
import type { LinkSubmitter } from "@/sync/instapaper/client";
import type { RunHistory, SyncRunRecord, SyncStateStore } from "@/sync/ledger/types";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("sync-engine");

export interface SyncEngineDeps {
  source: SourceReader;
  state: SyncStateStore;
  submitter: LinkSubmitter;
  history?: RunHistory;
  launcher?: AppLauncher;
  /** Start GoodLinks when its store can't be read. Requires `launcher`. */
  launchIfNeeded?: boolean;
  now?: () => Date;
}

export interface SyncOptions {
  dryRun?: boolean;
  mode?: RunMode;
}

export interface SyncStatus {
  total: number;
  synced: StateSummary;
  pending: number;
  /** The first few of the backlog, in the order they would be sent. */
  pendingLinks: LinkRecord[];
  lastRun?: SyncRunRecord;
}

/**
 * Oldest first, so an interrupted backlog is worked off in the same order on
 * every run. Array#sort is stable: equal timestamps keep source order.
 */
export function orderBacklog(links: LinkRecord[]): LinkRecord[] {
  return [...links].sort((a, b) => a.savedAt.getTime() - b.savedAt.getTime());
}

function shortTitle(link: LinkRecord, max = 60): string {
  const title = link.title || link.url;
  return title.length > max ? title.slice(0, max) : title;
}

export class SyncEngine {
  private source: SourceReader;
  private state: SyncStateStore;
  private submitter: LinkSubmitter;
  private history?: RunHistory;
  private launcher?: AppLauncher;
  private launchIfNeeded: boolean;
  private now: () => Date;

  constructor(deps: SyncEngineDeps) {
    this.source = deps.source;
    this.state = deps.state;
    this.submitter = deps.submitter;
    this.history = deps.history;
    this.launcher = deps.launcher;
    this.launchIfNeeded = deps.launchIfNeeded ?? false;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Send every GoodLinks link not yet in the ledger to Instapaper, one at a
   * time. Each success is written to the ledger before the next link is
   * sent. Item failures are collected in the report; source and ledger
   * failures abort the run.
   */
  async run(options: SyncOptions = {}): Promise<RunReport> {
    const runId = randomUUID();
    const startedAt = this.now().toISOString();
    const dryRun = options.dryRun ?? false;
    const mode = options.mode ?? "automated";
    const counts: RunCounts = { candidatesTotal: 0, alreadySynced: 0, newlySynced: 0, failed: 0 };
    const failedIds: string[] = [];
    const wouldSync: LinkRecord[] = [];

    log.info("Starting sync", { runId, dryRun });

    // Dry runs leave the ledger file untouched, run history included
    if (!dryRun) {
      this.history?.createRun(runId, mode);
    }

    let launched = false;
    try {
      const read = await this.readCandidates();
      launched = read.launched;
      const candidates = read.links;

      const backlog = orderBacklog(candidates.filter((link) => !this.state.isSynced(link.id)));
      counts.candidatesTotal = candidates.length;
      counts.alreadySynced = candidates.length - backlog.length;

      log.info(`Found ${backlog.length} new links to sync (of ${candidates.length} total)`);

      for (const [index, link] of backlog.entries()) {
        const label = `[${index + 1}/${backlog.length}] ${shortTitle(link)}`;

        if (dryRun) {
          wouldSync.push(link);
          log.info(`  Would sync: ${shortTitle(link, 70)}`);
          continue;
        }

        try {
          await this.submitter.submit(link.url, link.title);
        } catch (error) {
          if (error instanceof AuthenticationFailedError) {
            // Refused credentials: the rest of the backlog is not sent this run
            const unsent = backlog.slice(index);
            counts.failed += unsent.length;
            failedIds.push(...unsent.map((l) => l.id));
            log.error(`${label}... FAILED, stopping`, { error: error.message, unsent: unsent.length });
            break;
          }
          counts.failed++;
          failedIds.push(link.id);
          log.warn(`${label}... FAILED`, { id: link.id, url: link.url, error: errorMessage(error) });
          continue;
        }

        // Durable before the next link goes out; a ledger failure ends the run
        this.state.markSynced(link.id, this.now());
        counts.newlySynced++;
        log.info(`${label}... ok`);
      }
    } catch (error) {
      log.error("Sync run failed", { runId, error: errorMessage(error) });
      if (!dryRun) {
        this.recordCompletion(runId, counts, "failed", errorMessage(error));
      }
      throw error;
    } finally {
      if (launched) {
        await this.releaseApp();
      }
    }

    if (dryRun) {
      log.info(`Would sync ${wouldSync.length} links`);
    } else {
      this.history?.completeRun(runId, counts, "completed");
      log.info(`Done: ${counts.newlySynced} synced, ${counts.failed} failed`);
    }

    return {
      runId,
      dryRun,
      startedAt,
      completedAt: this.now().toISOString(),
      counts,
      failedIds,
      wouldSync,
    };
  }

  /** Counts for the `status` command. Never launches GoodLinks. */
  async getStatus(limit = 10): Promise<SyncStatus> {
    const links = await this.listSource();
    const backlog = orderBacklog(links.filter((link) => !this.state.isSynced(link.id)));
    return {
      total: links.length,
      synced: this.state.loadSummary(),
      pending: backlog.length,
      pendingLinks: backlog.slice(0, limit),
      lastRun: this.history?.lastRun(),
    };
  }

  private async listSource(): Promise<LinkRecord[]> {
    try {
      return await this.source.listCandidates();
    } catch (error) {
      if (error instanceof SourceUnavailableError) throw error;
      throw new SourceUnavailableError(`Cannot read GoodLinks: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Read the source, starting GoodLinks and trying once more if the first
   * read fails and launching is enabled. `launched` is true only when this
   * run started the app.
   */
  private async readCandidates(): Promise<{ links: LinkRecord[]; launched: boolean }> {
    let firstError: SourceUnavailableError;
    try {
      return { links: await this.listSource(), launched: false };
    } catch (error) {
      if (!(error instanceof SourceUnavailableError) || !this.launchIfNeeded) {
        throw error;
      }
      firstError = error;
    }

    const launcher = this.launcher;
    if (!launcher) throw firstError;
    try {
      if (await launcher.isRunning()) {
        // Already up, so launching won't help
        throw firstError;
      }
      await launcher.launch();
      if (!(await launcher.isRunning())) {
        throw new SourceUnavailableError("GoodLinks failed to start");
      }
    } catch (error) {
      if (error instanceof SourceUnavailableError) throw error;
      throw new SourceUnavailableError(`GoodLinks failed to start: ${errorMessage(error)}`, { cause: error });
    }

    try {
      return { links: await this.listSource(), launched: true };
    } catch (error) {
      await this.releaseApp();
      throw error;
    }
  }

  private async releaseApp(): Promise<void> {
    if (!this.launcher) return;
    try {
      await this.launcher.quit();
    } catch (error) {
      log.warn("Failed to close GoodLinks", { error: errorMessage(error) });
    }
  }

  private recordCompletion(runId: string, counts: RunCounts, status: "completed" | "failed", error?: string): void {
    try {
      this.history?.completeRun(runId, counts, status, error);
    } catch (historyError) {
      log.warn("Could not record run outcome", { runId, error: errorMessage(historyError) });
    }
  }
}

export type { SourceReader, AppLauncher, LinkSubmitter, SyncStateStore, RunHistory };
