/**
 * cache-metrics.ts — Performance counters for the read path.
 *
 * One instance per data core; counters reset on clearAll() or explicitly.
 */

// ─── Snapshot ───────────────────────────────────────────────

export interface CacheMetricsSnapshot {
  hits: number;
  misses: number;
  localHits: number;
  staleFallbacks: number;
  evictions: number;
  flightJoins: number;
  remoteFetches: number;
  total: number;
  hitRate: number;        // 0.0–1.0, local + cache hits over all reads
}

export type CacheCounter = Exclude<keyof CacheMetricsSnapshot, "total" | "hitRate">;

// ─── Counters ───────────────────────────────────────────────

export class CacheMetrics {
  private counters: Record<CacheCounter, number> = CacheMetrics.zero();

  private static zero(): Record<CacheCounter, number> {
    return {
      hits: 0,
      misses: 0,
      localHits: 0,
      staleFallbacks: 0,
      evictions: 0,
      flightJoins: 0,
      remoteFetches: 0,
    };
  }

  record(counter: CacheCounter, by = 1): void {
    this.counters[counter] += by;
  }

  hitRate(): number {
    const { hits, localHits, misses } = this.counters;
    const total = hits + localHits + misses;
    return total > 0 ? (hits + localHits) / total : 0;
  }

  snapshot(): CacheMetricsSnapshot {
    const { hits, localHits, misses } = this.counters;
    return {
      ...this.counters,
      total: hits + localHits + misses,
      hitRate: this.hitRate(),
    };
  }

  reset(): void {
    this.counters = CacheMetrics.zero();
  }
}
