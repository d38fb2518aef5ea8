type CacheEntry<V> = {
  expiresAt: number;
  value: V;
};

export type CacheStats = {
  size: number;
  hits: number;
  misses: number;
  hitRatio: number;
};

export type LruTtlCacheOptions = {
  maxEntries: number;
  defaultTtlMs: number;
  /** 0 disables the background sweep. */
  sweepIntervalMs?: number;
  now?: () => number;
};

const DEFAULT_SWEEP_INTERVAL_MS = 30_000;

/**
 * Size-bounded cache with per-entry expiry. Recency follows `get` and `set`; the Map's
 * insertion order is the recency order, so the first key is always the eviction victim.
 */
export class LruTtlCache<V extends {}> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly maxEntries: number;
  private readonly defaultTtlMs: number;
  private readonly now: () => number;
  private readonly sweepTimer: NodeJS.Timeout | null;
  private hits = 0;
  private misses = 0;

  constructor(options: LruTtlCacheOptions) {
    this.maxEntries = Math.max(1, Math.floor(options.maxEntries));
    this.defaultTtlMs = Math.max(1, options.defaultTtlMs);
    this.now = options.now ?? (() => Date.now());
    const interval = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    if (interval > 0) {
      this.sweepTimer = setInterval(() => this.sweepExpired(), interval);
      this.sweepTimer.unref();
    } else {
      this.sweepTimer = null;
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): V | null {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses += 1;
      return null;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      this.misses += 1;
      return null;
    }
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits += 1;
    return entry.value;
  }

  set(key: string, value: V, ttlMs = this.defaultTtlMs): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(key, { value, expiresAt: this.now() + Math.max(1, ttlMs) });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  /** Removes every expired entry and returns how many went. */
  sweepExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      hitRatio: lookups === 0 ? 0 : this.hits / lookups,
    };
  }

  close(): void {
    if (this.sweepTimer) clearInterval(this.sweepTimer);
  }
}
