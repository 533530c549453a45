/**
 * Cache Statistics Manager
 * Single source of truth for hit, miss and expiration counters
 */

import type { CacheStats, InstrumentationHooks } from '../../types';

const emptyStats = (): CacheStats => ({
  hits: 0,
  misses: 0,
  evictions: 0,
  expirations: 0,
  refreshes: 0,
  itemCount: 0,
  hitRate: 0,
  lastUpdated: Date.now(),
});

export class CacheStatsManager {
  private stats: CacheStats = emptyStats();

  constructor(private readonly instrumentation?: InstrumentationHooks) {}

  recordHit(count = 1): void {
    this.stats.hits += count;
    this.updateHitRate();
  }

  recordMiss(count = 1): void {
    this.stats.misses += count;
    this.updateHitRate();
  }

  /**
   * Record elements whose expiry elapsed
   */
  recordExpirations(count: number): void {
    this.stats.expirations += count;
  }

  /**
   * Record expired elements removed from the cache
   */
  recordEvictions(count = 1): void {
    this.stats.evictions += count;
  }

  recordRefreshes(count = 1): void {
    this.stats.refreshes += count;
  }

  updateItemCount(itemCount: number): void {
    this.stats.itemCount = itemCount;
  }

  /**
   * Get current statistics snapshot
   */
  getStats(): Readonly<CacheStats> {
    return Object.freeze({ ...this.stats });
  }

  resetStats(): void {
    this.stats = emptyStats();
  }

  /**
   * Stamp the stats and hand a snapshot to the instrumentation hook
   */
  updateAndNotify(): void {
    this.stats.lastUpdated = Date.now();
    this.instrumentation?.onStats?.({ ...this.stats });
  }

  private updateHitRate(): void {
    const total = this.stats.hits + this.stats.misses;
    this.stats.hitRate = total > 0 ? (this.stats.hits / total) * 100 : 0;
  }
}
