// CHANGE: Combine the statistics client with the cache.
// WHY: Statistics are fetched only on a miss or a stale record, and an unavailable service reads as zero downloads.

import { fetchRecentPopularity } from "./api.js";
import { isFresh } from "./cache.js";
import type { PopularityCache } from "./cache.js";
import type { NetworkError } from "./errors.js";
import { debug, warn } from "./logger.js";
import { systemClock } from "./types.js";
import type { Clock, PopularityLookup, PopularityStats, Result } from "./types.js";

/**
 * Remote fetch signature, injectable for tests.
 */
export type StatsFetcher = (name: string, now: Date) => Promise<Result<PopularityStats, NetworkError>>;

export interface PopularityOracleOptions {
  readonly cache: PopularityCache;
  readonly maxCacheAgeMinutes: number;
  readonly fetcher: StatsFetcher;
  readonly clock?: Clock;
}

/**
 * Build the production fetcher against a statistics API.
 */
export function httpStatsFetcher(baseUrl: string, timeoutMs: number): StatsFetcher {
  return (name, now) => fetchRecentPopularity(baseUrl, name, timeoutMs, now);
}

export function zeroStats(name: string, now: Date): PopularityStats {
  return { name, lastDay: 0, lastWeek: 0, lastMonth: 0, fetchedAt: now.toISOString() };
}

export class PopularityOracle {
  private readonly clock: Clock;

  constructor(private readonly options: PopularityOracleOptions) {
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Fetch from the service and, on success, record the result in the cache before returning it.
   */
  async fetch(name: string): Promise<Result<PopularityStats, NetworkError>> {
    const result = await this.options.fetcher(name, this.clock());
    if (!result.ok) {
      return result;
    }
    const written = await this.options.cache.put(name, result.value);
    if (!written.ok) {
      warn(written.error.message);
    }
    return result;
  }

  /**
   * Cache-first lookup. Fresh hit → cached; miss or stale → fetch; failed fetch → all windows zero.
   */
  async lookup(name: string): Promise<PopularityLookup> {
    const now = this.clock();
    const entry = await this.options.cache.get(name);
    if (entry && isFresh(entry, this.options.maxCacheAgeMinutes * 60_000, now)) {
      debug(`Cache hit for ${name} (modified ${entry.modifiedAt.toISOString()})`);
      return { stats: entry.stats, source: "cache" };
    }
    if (entry) {
      debug(`Cache stale for ${name} (modified ${entry.modifiedAt.toISOString()})`);
    }
    const fetched = await this.fetch(name);
    if (fetched.ok) {
      return { stats: fetched.value, source: "network" };
    }
    warn(`${fetched.error.message}; treating downloads as zero`);
    return { stats: zeroStats(name, now), source: "fallback" };
  }
}
