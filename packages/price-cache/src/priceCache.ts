/**
 * In-memory TTL cache with LRU eviction.
 *
 * Entries expire a fixed time after they are written. Expiry is checked on
 * access and by {@link PriceCache.prune}; there are no background timers, so
 * an idle cache never keeps the process alive.
 */

import type {
  CacheEntry,
  CacheLoadResult,
  PriceCacheKey,
  PriceCacheOptions,
  PriceCacheStats,
} from './types.js';

export const DEFAULT_TTL_MS = 60 * 60 * 1000;
export const DEFAULT_MAX_ENTRIES = 100;

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Serialises a key as `{SYMBOL}:{YYYY-MM-DD}`.
 *
 * @throws RangeError for an empty symbol, an invalid Date or a malformed day string
 */
export function serializeKey(key: PriceCacheKey): string {
  const symbol = key.symbol.trim().toUpperCase();
  if (!symbol) {
    throw new RangeError('Cache key symbol must not be empty');
  }

  let day: string;
  if (typeof key.asOf === 'string') {
    if (!DAY_PATTERN.test(key.asOf)) {
      throw new RangeError(`Cache key day must be YYYY-MM-DD, got "${key.asOf}"`);
    }
    day = key.asOf;
  } else {
    if (Number.isNaN(key.asOf.getTime())) {
      throw new RangeError('Cache key date is invalid');
    }
    day = key.asOf.toISOString().slice(0, 10);
  }

  return `${symbol}:${day}`;
}

/**
 * Example:
 * ```typescript
 * const cache = new PriceCache<MarketData>({ ttlMs: 60 * 60 * 1000 });
 *
 * const data = await cache.getOrLoad({ symbol: 'RIVN', asOf: new Date() }, () =>
 *   fetchMarketData('RIVN')
 * );
 * ```
 */
export class PriceCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly pending = new Map<string, Promise<T>>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  private hits = 0;
  private misses = 0;
  private sets = 0;
  private evictions = 0;
  private expirations = 0;

  constructor(options: PriceCacheOptions = {}) {
    const { ttlMs = DEFAULT_TTL_MS, maxEntries = DEFAULT_MAX_ENTRIES, now = Date.now } = options;

    if (!(ttlMs > 0)) {
      throw new RangeError(`ttlMs must be positive, got ${ttlMs}`);
    }
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}`);
    }

    this.ttlMs = ttlMs;
    this.maxEntries = maxEntries;
    this.now = now;
  }

  /**
   * Returns the live value for `key`, or `null` on a miss or an expired entry.
   * A hit moves the entry to the most recently used position.
   */
  get(key: PriceCacheKey): T | null {
    const id = serializeKey(key);
    const entry = this.liveEntry(id);

    if (entry === null) {
      this.misses += 1;
      return null;
    }

    this.entries.delete(id);
    this.entries.set(id, entry);
    this.hits += 1;
    return entry.value;
  }

  /**
   * Stores `value`, replacing any previous entry, and evicts the least
   * recently used entry when the cache is full.
   */
  set(key: PriceCacheKey, value: T): void {
    const id = serializeKey(key);

    this.entries.delete(id);
    if (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next().value;
      if (oldest !== undefined) {
        this.entries.delete(oldest);
        this.evictions += 1;
      }
    }

    this.entries.set(id, { value, expiresAt: this.now() + this.ttlMs });
    this.sets += 1;
  }

  /**
   * True when a live entry exists. Does not touch hit/miss counters or LRU order.
   */
  has(key: PriceCacheKey): boolean {
    return this.liveEntry(serializeKey(key)) !== null;
  }

  delete(key: PriceCacheKey): boolean {
    return this.entries.delete(serializeKey(key));
  }

  /**
   * Drops every entry and resets the counters.
   */
  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.sets = 0;
    this.evictions = 0;
    this.expirations = 0;
  }

  /**
   * Removes every expired entry.
   *
   * @returns Number of entries removed
   */
  prune(): number {
    const now = this.now();
    let removed = 0;

    for (const [id, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(id);
        removed += 1;
      }
    }

    this.expirations += removed;
    return removed;
  }

  /**
   * Returns the cached value or runs `loader` and caches its result.
   *
   * Concurrent calls for the same key share one load. A rejected load is not
   * cached and its error propagates to every waiting caller.
   */
  async getOrLoad(key: PriceCacheKey, loader: () => Promise<T>): Promise<T> {
    const { value } = await this.getOrLoadWithSource(key, loader);
    return value;
  }

  /**
   * Like {@link getOrLoad}, also reporting where the value came from:
   * `cache` for a stored entry, `in-flight` when the call joined a load
   * another caller started, `loader` when this call ran `loader`.
   */
  async getOrLoadWithSource(
    key: PriceCacheKey,
    loader: () => Promise<T>
  ): Promise<CacheLoadResult<T>> {
    const cached = this.get(key);
    if (cached !== null) {
      return { value: cached, source: 'cache' };
    }

    const id = serializeKey(key);
    const inFlight = this.pending.get(id);
    if (inFlight) {
      return { value: await inFlight, source: 'in-flight' };
    }

    const load = loader()
      .then((value) => {
        this.set(key, value);
        return value;
      })
      .finally(() => {
        this.pending.delete(id);
      });

    this.pending.set(id, load);
    return { value: await load, source: 'loader' };
  }

  stats(): PriceCacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      sets: this.sets,
      evictions: this.evictions,
      expirations: this.expirations,
      size: this.entries.size,
    };
  }

  size(): number {
    return this.entries.size;
  }

  private liveEntry(id: string): CacheEntry<T> | null {
    const entry = this.entries.get(id);
    if (entry === undefined) {
      return null;
    }
    if (this.now() >= entry.expiresAt) {
      this.entries.delete(id);
      this.expirations += 1;
      return null;
    }
    return entry;
  }
}
