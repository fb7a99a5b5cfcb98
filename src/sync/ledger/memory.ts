import type { StateSummary, SyncedEntry } from "@/sync/types";
import type { SyncStateStore } from "./types";

/** Process-local sync state. Nothing survives the process. */
export class MemoryStateStore implements SyncStateStore {
  private entries = new Map<string, string>();

  constructor(initial: Iterable<[id: string, syncedAt: string]> = []) {
    for (const [id, syncedAt] of initial) {
      this.entries.set(id, syncedAt);
    }
  }

  isSynced(id: string): boolean {
    return this.entries.has(id);
  }

  markSynced(id: string, timestamp: Date): void {
    if (!this.entries.has(id)) {
      this.entries.set(id, timestamp.toISOString());
    }
  }

  reset(): number {
    const removed = this.entries.size;
    this.entries.clear();
    return removed;
  }

  loadSummary(): StateSummary {
    let oldest: string | null = null;
    let newest: string | null = null;
    for (const syncedAt of this.entries.values()) {
      if (oldest === null || syncedAt < oldest) oldest = syncedAt;
      if (newest === null || syncedAt > newest) newest = syncedAt;
    }
    return { count: this.entries.size, oldest, newest };
  }

  /** Snapshot of the stored entries, for comparing state across runs. */
  snapshot(): SyncedEntry[] {
    return [...this.entries].map(([id, syncedAt]) => ({ id, syncedAt }));
  }

  close(): void {}
}
