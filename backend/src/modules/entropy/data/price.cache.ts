/**
 * ENTROPY MODULE — Price Cache
 *
 * Key → PriceSeries. The date range is the cache version: a different range
 * is a different entry. A ticker the source had no data for is remembered
 * per key as a missing entry with its reason. Implementations:
 * - InMemoryPriceCache (tests, offline runs)
 * - FilePriceCache (one CSV per market namespace and range)
 */

import type { DateRange, PriceSeries } from '../entropy.types.js';

export interface PriceCacheKey {
  /** cache namespace of the market / universe */
  market: string;
  ticker: string;
  range: DateRange;
}

export interface PriceCache {
  readonly name: string;
  get(key: PriceCacheKey): Promise<PriceSeries | null>;
  put(key: PriceCacheKey, series: PriceSeries): Promise<void>;
  has(key: PriceCacheKey): Promise<boolean>;
  /** reason recorded by putMissing, or null */
  getMissing(key: PriceCacheKey): Promise<string | null>;
  putMissing(key: PriceCacheKey, reason: string): Promise<void>;
}

export function cacheKeyToString(key: PriceCacheKey): string {
  return `${key.market}/${key.ticker}@${key.range.from}_${key.range.to}`;
}

export class InMemoryPriceCache implements PriceCache {
  readonly name = 'memory';
  private readonly store = new Map<string, PriceSeries>();
  private readonly missing = new Map<string, string>();

  async get(key: PriceCacheKey): Promise<PriceSeries | null> {
    return this.store.get(cacheKeyToString(key)) ?? null;
  }

  async put(key: PriceCacheKey, series: PriceSeries): Promise<void> {
    this.store.set(cacheKeyToString(key), series);
  }

  async has(key: PriceCacheKey): Promise<boolean> {
    return this.store.has(cacheKeyToString(key));
  }

  async getMissing(key: PriceCacheKey): Promise<string | null> {
    return this.missing.get(cacheKeyToString(key)) ?? null;
  }

  async putMissing(key: PriceCacheKey, reason: string): Promise<void> {
    this.missing.set(cacheKeyToString(key), reason);
  }

  size(): number {
    return this.store.size;
  }
}
