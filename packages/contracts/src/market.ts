/**
 * @fileoverview Market data types shared by the retrieval, cache and indicator packages.
 *
 * All types are pure data structures with no I/O or business logic.
 *
 * @module @chartwise/contracts/market
 */

/**
 * One trading day of OHLCV data.
 *
 * @invariant high >= low
 * @invariant open, high, low, close > 0
 * @invariant volume >= 0
 * @invariant timestamp is Unix milliseconds (UTC) of the session date
 *
 * @example
 * ```typescript
 * const bar: PriceBar = {
 *   timestamp: Date.UTC(2025, 0, 15),
 *   open: 12.4,
 *   high: 12.95,
 *   low: 12.1,
 *   close: 12.8,
 *   volume: 41_250_000
 * };
 * ```
 */
export interface PriceBar {
  /** Unix milliseconds (UTC) of the session date */
  timestamp: number;

  /** Opening price */
  open: number;

  /** Highest traded price */
  high: number;

  /** Lowest traded price */
  low: number;

  /** Closing price */
  close: number;

  /** Shares traded */
  volume: number;
}

/**
 * Daily bars for one security, sorted ascending by timestamp with no duplicates.
 *
 * Missing trading days are allowed and are never interpolated: the array
 * index, not the calendar, defines adjacency.
 */
export type PriceSeries = readonly PriceBar[];

/**
 * Point-in-time figures shown alongside the indicator table.
 *
 * These values pass through the indicator pipeline untouched. Any of them may
 * be absent (`null`) when the data source does not report it.
 */
export interface MarketSnapshot {
  /** Last trade price, or the latest minute close when no trade is reported */
  currentPrice: number | null;

  /** Previous session close */
  previousClose: number | null;

  /** Volume traded in the current session */
  volume: number | null;

  /** Market capitalisation in dollars */
  marketCap: number | null;
}

/**
 * Snapshot with every figure absent.
 */
export const EMPTY_SNAPSHOT: Readonly<MarketSnapshot> = Object.freeze({
  currentPrice: null,
  previousClose: null,
  volume: null,
  marketCap: null,
});

/**
 * Everything the retrieval collaborator hands to the pipeline for one symbol.
 */
export interface MarketData {
  /** Upper-case ticker symbol */
  symbol: string;

  /** Daily bars, ascending */
  bars: PriceSeries;

  /** Current figures for the header metrics */
  snapshot: MarketSnapshot;

  /** Unix milliseconds when the data was retrieved */
  fetchedAt: number;
}

/**
 * Query for a range of daily bars.
 *
 * @example
 * ```typescript
 * const query: DailyBarsQuery = {
 *   symbol: 'RIVN',
 *   from: new Date('2024-01-02T00:00:00Z'),
 *   to: new Date('2025-01-02T00:00:00Z'),
 * };
 * ```
 */
export interface DailyBarsQuery {
  /** Ticker symbol, case-insensitive */
  symbol: string;

  /** First session date (inclusive, UTC day) */
  from: Date;

  /** Last session date (inclusive, UTC day) */
  to: Date;

  /** Optional cap on the number of bars requested */
  limit?: number;
}

/**
 * Static description of what a data provider supports.
 */
export interface ProviderCapabilities {
  /** Provider identifier, e.g. "polygon" */
  provider: string;

  /** Maximum bars returnable in a single request */
  maxBarsPerRequest: number;

  /** Whether an API key is required */
  requiresAuthentication: boolean;

  rateLimits: {
    requestsPerMinute: number;
    requestsPerDay?: number;
  };
}

/**
 * Retrieval collaborator that feeds the pipeline.
 */
export interface MarketDataProvider {
  /**
   * Daily bars in the range, ascending with unique timestamps. An unknown
   * range yields an empty array, not an error.
   */
  getDailyBars(query: DailyBarsQuery): Promise<PriceBar[]>;

  /** Current figures for the symbol; absent values are `null` */
  getSnapshot(symbol: string): Promise<MarketSnapshot>;

  capabilities(): ProviderCapabilities;
}
