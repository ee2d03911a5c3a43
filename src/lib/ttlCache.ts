// ============================================
// TTL Cache — bounded in-memory cache with expiry
// ============================================

import { logger } from "./logger.js";

interface CacheEntry<V> {
  value: V;
  createdAt: number;
}

export interface TtlCacheOptions {
  /** Name used in log entries */
  name: string;
  ttlMs: number;
  maxSize: number;
  /** Clock override for tests */
  now?: () => number;
}

export interface TtlCacheStats {
  hits: number;
  misses: number;
  evictions: number;
  size: number;
}

/**
 * Entries are replaced whole, never mutated in place, so concurrent
 * readers only ever see a complete value. Oldest entries are evicted
 * first once maxSize is exceeded.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(private readonly options: TtlCacheOptions) {
    this.now = options.now ?? Date.now;
  }

  get enabled(): boolean {
    return this.options.ttlMs > 0 && this.options.maxSize > 0;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.now() - entry.createdAt >= this.options.ttlMs) {
      this.entries.delete(key);
      this.misses++;
      this.evictions++;
      logger.debug("Cache entry expired", {
        stage: "cache",
        cache: this.options.name,
      });
      return undefined;
    }

    this.hits++;
    return entry.value;
  }

  set(key: string, value: V): void {
    if (!this.enabled) return;

    // Re-insert so Map iteration order tracks age
    this.entries.delete(key);
    this.entries.set(key, { value, createdAt: this.now() });

    this.cleanupExpired();
    this.enforceSizeLimit();
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /** Remove every entry whose key starts with `prefix`; returns the count */
  deleteByPrefix(prefix: string): number {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  stats(): TtlCacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      size: this.entries.size,
    };
  }

  private cleanupExpired(): void {
    const now = this.now();
    let cleaned = 0;

    for (const [key, entry] of this.entries) {
      if (now - entry.createdAt >= this.options.ttlMs) {
        this.entries.delete(key);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      this.evictions += cleaned;
      logger.debug("Cleaned up expired cache entries", {
        stage: "cache",
        cache: this.options.name,
        cleanedCount: cleaned,
        remainingCount: this.entries.size,
      });
    }
  }

  private enforceSizeLimit(): void {
    while (this.entries.size > this.options.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
    }
  }
}
