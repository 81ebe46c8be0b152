/**
 * @chartwise/price-cache
 *
 * Explicit TTL cache for per-symbol, per-day market data.
 */

export { PriceCache, serializeKey, DEFAULT_TTL_MS, DEFAULT_MAX_ENTRIES } from './priceCache.js';
export type {
  PriceCacheKey,
  PriceCacheOptions,
  PriceCacheStats,
  CacheLoadResult,
  CacheLoadSource,
} from './types.js';
