import type { ShortTermMessage } from "@convomem/shared";

export interface FallbackCacheOptions {
  maxEntries: number;
}

/**
 * In-memory holding area for short-term messages accepted while the graph
 * store is unreachable. Entries expire with their message TTL and the oldest
 * entry is evicted once `maxEntries` is reached.
 */
export class FallbackCache {
  private readonly entries = new Map<string, ShortTermMessage>();
  private evictedCount = 0;

  constructor(private readonly options: FallbackCacheOptions) {}

  append(message: ShortTermMessage, now: Date): ShortTermMessage {
    this.prune(now);

    const entry: ShortTermMessage = { ...message, degraded: true };
    this.entries.set(entry.id, entry);

    while (this.entries.size > this.options.maxEntries) {
      const oldest = this.oldestEntry();
      if (!oldest) {
        break;
      }
      this.entries.delete(oldest.id);
      this.evictedCount += 1;
    }

    return { ...entry };
  }

  /** Live entries ordered by session, then by chain position. */
  list(now: Date, sessionId?: string): ShortTermMessage[] {
    this.prune(now);
    return [...this.entries.values()]
      .filter((entry) => sessionId === undefined || entry.sessionId === sessionId)
      .sort((a, b) => a.sessionId.localeCompare(b.sessionId) || a.sequence - b.sequence)
      .map((entry) => ({ ...entry }));
  }

  remove(ids: Iterable<string>): void {
    for (const id of ids) {
      this.entries.delete(id);
    }
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  size(now: Date): number {
    this.prune(now);
    return this.entries.size;
  }

  get evictions(): number {
    return this.evictedCount;
  }

  clear(): void {
    this.entries.clear();
  }

  private prune(now: Date): void {
    const nowMs = now.getTime();
    for (const [id, entry] of this.entries) {
      if (entry.expiresAt.getTime() <= nowMs) {
        this.entries.delete(id);
      }
    }
  }

  private oldestEntry(): ShortTermMessage | undefined {
    let oldest: ShortTermMessage | undefined;
    for (const entry of this.entries.values()) {
      if (!oldest || entry.sequence < oldest.sequence) {
        oldest = entry;
      }
    }
    return oldest;
  }
}
