import type { RunReport } from "@/sync/types";
import type { SyncStatus } from "@/sync";
import { UsageError } from "./args";

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text;
}

export function formatStatus(status: SyncStatus): string[] {
  const lines = [
    `GoodLinks: ${status.total} links`,
    `Synced:    ${status.synced.count}`,
    `Pending:   ${status.pending}`,
  ];

  const run = status.lastRun;
  if (run) {
    const when = run.completedAt ?? run.startedAt;
    const detail = run.counts ? `, ${run.counts.newlySynced} synced, ${run.counts.failed} failed` : "";
    lines.push(`Last run:  ${when} (${run.status}${detail})`);
  }

  if (status.pendingLinks.length > 0) {
    lines.push("", "Pending links:");
    for (const link of status.pendingLinks) {
      lines.push(`  - ${truncate(link.title || link.url, 60)}`);
    }
    const more = status.pending - status.pendingLinks.length;
    if (more > 0) {
      lines.push(`  ... and ${more} more`);
    }
  }

  return lines;
}

/** Non-zero when any link failed, so schedulers can flag the run. */
export function exitCodeFor(report: RunReport): number {
  return report.failedIds.length > 0 ? 1 : 0;
}

/** 2 for a bad command line, 1 for anything that stopped the run. */
export function exitCodeForError(error: unknown): number {
  return error instanceof UsageError ? 2 : 1;
}
