import { DedupEntry } from './types.js';

/**
 * Set of previously observed item identifiers with first-seen timestamps.
 *
 * Entries are never mutated once recorded; the only way to forget an item
 * is `reset()`. Runs in progress claim the ids they are about to report, so
 * two runs sharing an item never both treat it as new. Persistence is
 * handled by the snapshot store through `entries()` and `load()`.
 */
export class DedupStore {
  private readonly records = new Map<string, Date>();
  private readonly claimed = new Set<string>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  seen(id: string): boolean {
    return this.records.has(id);
  }

  /**
   * Record an id as seen and drop any claim on it. Returns false when it
   * was already known.
   */
  mark(id: string): boolean {
    this.claimed.delete(id);
    if (this.records.has(id)) {
      return false;
    }
    this.records.set(id, this.clock());
    return true;
  }

  /**
   * Claim the ids that are neither seen nor claimed by another run, in
   * input order and without repeats. Each claim ends with `mark` or `release`.
   */
  reserve(ids: string[]): string[] {
    const fresh: string[] = [];
    for (const id of ids) {
      if (this.seen(id) || this.claimed.has(id)) {
        continue;
      }
      this.claimed.add(id);
      fresh.push(id);
    }
    return fresh;
  }

  /**
   * Give up claims without recording the ids
   */
  release(ids: string[]): void {
    for (const id of ids) {
      this.claimed.delete(id);
    }
  }

  reset(): void {
    this.records.clear();
  }

  get size(): number {
    return this.records.size;
  }

  entries(): DedupEntry[] {
    return [...this.records.entries()].map(([id, firstSeen]) => ({ id, firstSeen }));
  }

  /**
   * Replace the contents with persisted entries
   */
  load(entries: DedupEntry[]): void {
    this.records.clear();
    for (const entry of entries) {
      if (!this.records.has(entry.id)) {
        this.records.set(entry.id, entry.firstSeen);
      }
    }
  }
}

/**
 * Key under which an item is recorded for the configured scope
 */
export function dedupKey(scope: 'global' | 'task', taskId: string, itemId: string): string {
  return scope === 'task' ? `${taskId}:${itemId}` : itemId;
}
