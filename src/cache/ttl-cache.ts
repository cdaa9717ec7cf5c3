/**
 * ttl-cache.ts — Bounded in-memory cache with per-entry TTL and LRU eviction.
 *
 * Pure bookkeeping: no I/O, no timers. Time comes from the injected clock.
 *
 *   get(k)  → value iff an entry exists and now - fetchedAt < ttl; bumps lastAccessAt
 *   put(k)  → stores (value, now, now); evicts min lastAccessAt while over capacity
 *
 * Eviction ties (equal lastAccessAt) go to the entry put earliest: the map
 * is kept in put order and the scan keeps the first minimum it sees.
 *
 * Expired entries stay until evicted, invalidated or purged so readers can
 * fall back to them with peek() when a refresh fails.
 */

import { CacheMissError } from "../errors.js";
import { log } from "../logger.js";
import { matchesPattern } from "./cache-keys.js";

// ─── Types ──────────────────────────────────────────────────

export interface CacheEntry<V> {
  value: V;
  fetchedAt: number;
  lastAccessAt: number;
  ttlMs: number;
}

export interface TtlCacheOptions {
  /** Default TTL for put() without an explicit ttl */
  ttlMs: number;
  capacity: number;
  now?: () => number;
  /** Called once per evicted key (not for invalidate/clear) */
  onEvict?: (key: string) => void;
}

// ─── Cache ──────────────────────────────────────────────────

export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly ttlMs: number;
  private readonly capacity: number;
  private readonly now: () => number;
  private readonly onEvict?: (key: string) => void;

  constructor(options: TtlCacheOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${options.capacity}`);
    }
    this.ttlMs = options.ttlMs;
    this.capacity = options.capacity;
    this.now = options.now ?? Date.now;
    this.onEvict = options.onEvict;
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  get(key: string): V | undefined {
    return this.lookup(key)?.value;
  }

  /** Like get(), but a miss throws CacheMissError. */
  require(key: string): V {
    const entry = this.lookup(key);
    if (!entry) throw new CacheMissError(key);
    return entry.value;
  }

  /** The raw entry, fresh or expired, without counting as an access. */
  peek(key: string): Readonly<CacheEntry<V>> | undefined {
    const entry = this.entries.get(key);
    return entry ? { ...entry } : undefined;
  }

  put(key: string, value: V, ttlMs: number = this.ttlMs): void {
    const now = this.now();
    // Re-insert so map order reflects the latest put
    this.entries.delete(key);
    this.entries.set(key, { value, fetchedAt: now, lastAccessAt: now, ttlMs });
    while (this.entries.size > this.capacity) {
      this.evictOne();
    }
  }

  invalidate(key: string): boolean {
    return this.entries.delete(key);
  }

  /** Drop every key matching an exact or `*`-suffixed prefix pattern. */
  invalidatePattern(pattern: string): number {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (matchesPattern(key, pattern)) {
        this.entries.delete(key);
        removed++;
      }
    }
    if (removed > 0) log.cache.debug({ pattern, removed }, "cache:invalidate");
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  /** Remove entries expired for longer than maxStaleMs. */
  purgeExpired(maxStaleMs = 0): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of [...this.entries]) {
      if (now - entry.fetchedAt >= entry.ttlMs + maxStaleMs) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  // ── Internals ─────────────────────────────────────────────

  private lookup(key: string): CacheEntry<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    const now = this.now();
    if (now - entry.fetchedAt >= entry.ttlMs) return undefined;
    entry.lastAccessAt = now;
    return entry;
  }

  private evictOne(): void {
    let victim: string | undefined;
    let oldest = Infinity;
    for (const [key, entry] of this.entries) {
      if (entry.lastAccessAt < oldest) {
        oldest = entry.lastAccessAt;
        victim = key;
      }
    }
    if (victim === undefined) return;
    this.entries.delete(victim);
    log.cache.debug({ key: victim, lastAccessAt: oldest }, "cache:evict");
    this.onEvict?.(victim);
  }
}
