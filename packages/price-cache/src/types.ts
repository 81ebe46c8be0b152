/**
 * Type definitions for the price cache.
 */

/**
 * Identifies one cached retrieval: a symbol as seen on one UTC day.
 *
 * Example:
 * ```typescript
 * const key: PriceCacheKey = { symbol: 'rivn', asOf: new Date() };
 * const same: PriceCacheKey = { symbol: 'RIVN', asOf: '2025-01-02' };
 * ```
 */
export interface PriceCacheKey {
  /** Ticker symbol; normalised to upper case */
  symbol: string;

  /** A Date (reduced to its UTC day) or a YYYY-MM-DD string */
  asOf: Date | string;
}

export interface PriceCacheOptions {
  /**
   * Time to live for each entry in milliseconds.
   * @default 3600000 (1 hour)
   */
  ttlMs?: number;

  /**
   * Maximum entries before the least recently used one is evicted.
   * @default 100
   */
  maxEntries?: number;

  /**
   * Clock in Unix milliseconds. Tests inject a fake one.
   * @default Date.now
   */
  now?: () => number;
}

/**
 * Counters since construction (or the last {@link PriceCache.clear}).
 */
export interface PriceCacheStats {
  hits: number;
  misses: number;
  sets: number;
  /** Entries dropped to make room */
  evictions: number;
  /** Entries dropped because their TTL ran out */
  expirations: number;
  /** Entries currently held, expired or not */
  size: number;
}

/**
 * Where {@link PriceCache.getOrLoadWithSource} found its value.
 */
export type CacheLoadSource = 'cache' | 'in-flight' | 'loader';

export interface CacheLoadResult<T> {
  value: T;
  source: CacheLoadSource;
}

/**
 * @internal
 */
export interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}
