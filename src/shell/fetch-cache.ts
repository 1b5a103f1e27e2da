interface CacheEntry<T> {
  records: T[];
  /** Limit the records were fetched with. */
  limit: number;
  expiresAtMs: number;
}

/**
 * Session-scoped cache for code-host lookups, keyed by `codeHostCacheKey`.
 * A hit needs an entry fetched with at least the requested limit, or one that
 * came back short of its own limit (the remote had nothing more).
 */
export class InMemoryFetchCache<T> {
  private readonly store = new Map<string, CacheEntry<T>>();

  constructor(
    private readonly defaultTtlMs: number,
    private readonly nowMs: () => number = () => Date.now(),
  ) {}

  get(key: string, limit: number): T[] | null {
    const entry = this.store.get(key);
    if (!entry) return null;
    if (entry.expiresAtMs <= this.nowMs()) {
      this.store.delete(key);
      return null;
    }
    const exhausted = entry.records.length < entry.limit;
    if (entry.limit < limit && !exhausted) return null;
    return entry.records.slice(0, limit);
  }

  set(key: string, records: T[], limit: number, ttlMs?: number): void {
    const ttl = ttlMs ?? this.defaultTtlMs;
    this.store.set(key, {
      records: [...records],
      limit,
      expiresAtMs: this.nowMs() + Math.max(1, ttl),
    });
  }

  get size(): number {
    return this.store.size;
  }

  clear(): void {
    this.store.clear();
  }
}
