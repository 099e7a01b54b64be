/**
 * Content Cache
 *
 * In-memory LRU cache with per-entry TTL for library browse results.
 * Map insertion order doubles as recency: a hit re-inserts the entry at the
 * tail, so the head is always the least recently used key.
 *
 * Every operation is synchronous. Invalidation from the push path and
 * get/put from the browse path therefore never observe a half-applied change.
 */

import { systemClock, type Clock } from '../utils/clock.js';

export interface CacheEntry<T> {
  key: string;
  /** Parent container the entry was browsed from, when known */
  containerId?: string;
  value: T;
  insertedAt: number;      // ms timestamp
  expiresAt: number;       // ms timestamp, Infinity for no expiry
}

export interface CacheStats {
  entryCount: number;
  hits: number;
  misses: number;
  hitRate: number;         // hits / (hits + misses)
  evictions: number;       // capacity evictions
  expirations: number;     // entries dropped because their TTL ran out
  invalidations: number;
}

export interface ContentCacheOptions {
  /** Default 1000 */
  maxEntries?: number;
  /** Default 300 000 (5 min) */
  defaultTtlMs?: number;
  clock?: Clock;
}

export interface CacheKeyParts {
  containerId: string;
  cursor?: number | string;
  filters?: Record<string, string | number | boolean | undefined>;
}

/**
 * Composite key for one browse page: container + pagination cursor + the
 * filter parameters in a stable (sorted) order.
 */
export function buildCacheKey(parts: CacheKeyParts): string {
  const filters = Object.entries(parts.filters ?? {})
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([name, value]) => `${encodeURIComponent(name)}=${encodeURIComponent(String(value))}`)
    .join('&');
  return `${parts.containerId}|${parts.cursor ?? 0}|${filters}`;
}

export class ContentCache<T> {
  private entries = new Map<string, CacheEntry<T>>();
  private readonly maxEntries: number;
  private readonly defaultTtlMs: number;
  private readonly clock: Clock;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;
  private invalidations = 0;
  /** Bumped by every invalidation; see generationOf() */
  private globalGeneration = 0;
  private containerGenerations = new Map<string, number>();

  constructor(options: ContentCacheOptions = {}) {
    this.maxEntries = options.maxEntries ?? 1000;
    this.defaultTtlMs = options.defaultTtlMs ?? 300_000;
    this.clock = options.clock ?? systemClock;
    if (this.maxEntries < 1) {
      throw new RangeError(`maxEntries must be at least 1 (got ${this.maxEntries})`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    if (this.isExpired(entry)) {
      this.entries.delete(key);
      this.expirations++;
      this.misses++;
      return undefined;
    }
    // Move to the most-recently-used end
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry.value;
  }

  put(key: string, value: T, ttlMs: number = this.defaultTtlMs, containerId?: string): void {
    const now = this.clock.now();
    this.entries.delete(key);
    this.entries.set(key, {
      key,
      containerId,
      value,
      insertedAt: now,
      expiresAt: now + ttlMs,
    });
    this.evict();
  }

  has(key: string): boolean {
    const entry = this.entries.get(key);
    if (!entry) return false;
    if (this.isExpired(entry)) {
      this.entries.delete(key);
      this.expirations++;
      return false;
    }
    return true;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /** Drop every entry. Returns the number removed. */
  invalidateAll(): number {
    this.globalGeneration++;
    const count = this.entries.size;
    this.entries.clear();
    this.invalidations += count;
    return count;
  }

  /** Drop every entry the predicate selects. Returns the number removed. */
  invalidate(predicate: (entry: Readonly<CacheEntry<T>>) => boolean): number {
    // The predicate cannot be asked about pages still being fetched
    this.globalGeneration++;
    return this.removeWhere(predicate);
  }

  /** Drop the entries browsed from any of the given containers. */
  invalidateContainers(containerIds: Iterable<string>): number {
    const ids = new Set(containerIds);
    if (ids.size === 0) return 0;
    for (const id of ids) {
      this.containerGenerations.set(id, (this.containerGenerations.get(id) ?? 0) + 1);
    }
    return this.removeWhere((entry) => entry.containerId !== undefined && ids.has(entry.containerId));
  }

  /**
   * Changes whenever an invalidation may have covered `containerId`. A reader
   * that fetched across a change must not put its result.
   */
  generationOf(containerId: string): number {
    return this.globalGeneration + (this.containerGenerations.get(containerId) ?? 0);
  }

  /** Purge expired entries. Returns the number removed. */
  sweep(): number {
    let count = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        count++;
      }
    }
    this.expirations += count;
    return count;
  }

  startSweeping(intervalMs: number): void {
    this.stopSweeping();
    this.sweepTimer = setInterval(() => this.sweep(), intervalMs);
    this.sweepTimer.unref();
  }

  stopSweeping(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  getStats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      entryCount: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: total === 0 ? 0 : this.hits / total,
      evictions: this.evictions,
      expirations: this.expirations,
      invalidations: this.invalidations,
    };
  }

  resetStats(): void {
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
    this.expirations = 0;
    this.invalidations = 0;
  }

  // ─── Eviction ────────────────────────────────────────────────────────────────

  private removeWhere(predicate: (entry: Readonly<CacheEntry<T>>) => boolean): number {
    let count = 0;
    for (const [key, entry] of this.entries) {
      if (predicate(entry)) {
        this.entries.delete(key);
        count++;
      }
    }
    this.invalidations += count;
    return count;
  }

  private evict(): void {
    if (this.entries.size <= this.maxEntries) return;

    // Expired entries go before live ones
    this.sweep();

    for (const key of this.entries.keys()) {
      if (this.entries.size <= this.maxEntries) break;
      this.entries.delete(key);
      this.evictions++;
    }
  }

  private isExpired(entry: CacheEntry<T>): boolean {
    return this.clock.now() >= entry.expiresAt;
  }
}
