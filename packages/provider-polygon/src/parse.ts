/**
 * Validation and mapping of Polygon.io responses into contract types.
 */

import { z } from 'zod';
import type { MarketSnapshot, PriceBar } from '@chartwise/contracts';
import { ApiError, ParseError } from './errors.js';

const aggregateSchema = z.object({
  t: z.number(),
  o: z.number(),
  h: z.number(),
  l: z.number(),
  c: z.number(),
  v: z.number(),
});

const aggregatesResponseSchema = z.object({
  status: z.string(),
  ticker: z.string().optional(),
  resultsCount: z.number().optional(),
  results: z.array(aggregateSchema).optional(),
  error: z.string().optional(),
  message: z.string().optional(),
});

const closeOnly = z.object({ c: z.number() }).partial();

const snapshotResponseSchema = z.object({
  status: z.string().optional(),
  ticker: z
    .object({
      ticker: z.string().optional(),
      day: z.object({ c: z.number(), v: z.number() }).partial().optional(),
      lastTrade: z.object({ p: z.number() }).partial().nullable().optional(),
      min: closeOnly.optional(),
      prevDay: closeOnly.optional(),
    })
    .optional(),
});

const tickerDetailsResponseSchema = z.object({
  status: z.string().optional(),
  results: z
    .object({
      ticker: z.string().optional(),
      name: z.string().optional(),
      market_cap: z.number().nullable().optional(),
    })
    .optional(),
});

export type PolygonAggregate = z.infer<typeof aggregateSchema>;
export type PolygonAggregatesResponse = z.infer<typeof aggregatesResponseSchema>;
export type PolygonSnapshotResponse = z.infer<typeof snapshotResponseSchema>;
export type PolygonTickerDetailsResponse = z.infer<typeof tickerDetailsResponseSchema>;

/**
 * Statuses Polygon uses for successful aggregate queries. Free plans get
 * DELAYED.
 */
const SUCCESS_STATUSES = new Set(['OK', 'DELAYED']);

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function validate<T>(schema: z.ZodType<T>, body: unknown, what: string): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ParseError(`Malformed Polygon ${what} response`, {
      issues: describeIssues(result.error),
    });
  }
  return result.data;
}

/**
 * Converts one aggregate, enforcing the OHLC invariants.
 *
 * @throws ParseError if high < low, high is below open or close, low is above
 * open or close, or volume is negative
 */
export function parseAggregate(aggregate: PolygonAggregate): PriceBar {
  const { t, o, h, l, c, v } = aggregate;

  if (h < l) {
    throw new ParseError('High price must be >= low price', { field: 'h,l', high: h, low: l });
  }
  if (h < o || h < c) {
    throw new ParseError('High price must be >= open and close', {
      field: 'h,o,c',
      high: h,
      open: o,
      close: c,
    });
  }
  if (l > o || l > c) {
    throw new ParseError('Low price must be <= open and close', {
      field: 'l,o,c',
      low: l,
      open: o,
      close: c,
    });
  }
  if (v < 0) {
    throw new ParseError('Volume must be non-negative', { field: 'v', volume: v });
  }

  return { timestamp: t, open: o, high: h, low: l, close: c, volume: v };
}

/**
 * Sorts ascending and collapses duplicate timestamps, keeping the later entry.
 */
export function normalizeBars(bars: readonly PriceBar[]): PriceBar[] {
  const byTimestamp = new Map<number, PriceBar>();
  for (const bar of bars) {
    byTimestamp.set(bar.timestamp, bar);
  }
  return [...byTimestamp.values()].sort((a, b) => a.timestamp - b.timestamp);
}

/**
 * Daily bars from an aggregates response. A successful response without
 * `results` means no sessions in range and yields `[]`.
 *
 * @throws ApiError when Polygon reports an ERROR status
 * @throws ParseError when the body or an aggregate is malformed
 *
 * @example
 * ```typescript
 * parseAggregatesResponse({
 *   status: 'OK',
 *   results: [{ t: 1704153600000, o: 20.1, h: 20.9, l: 19.8, c: 20.5, v: 31000000 }],
 * });
 * // [{ timestamp: 1704153600000, open: 20.1, high: 20.9, low: 19.8, close: 20.5, volume: 31000000 }]
 * ```
 */
export function parseAggregatesResponse(body: unknown): PriceBar[] {
  const response = validate(aggregatesResponseSchema, body, 'aggregates');

  if (!SUCCESS_STATUSES.has(response.status)) {
    throw new ApiError(
      `Polygon API returned status ${response.status}: ${response.error ?? response.message ?? 'no details'}`,
      { status: response.status }
    );
  }

  const bars = (response.results ?? []).map((aggregate, index) => {
    try {
      return parseAggregate(aggregate);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ParseError(`Invalid aggregate at index ${index}: ${reason}`, {
        field: `results[${index}]`,
        aggregate,
      });
    }
  });

  return normalizeBars(bars);
}

/**
 * Snapshot figures without market cap, which comes from ticker details.
 *
 * `currentPrice` is the last trade price, falling back to the latest minute
 * close when no trade is reported.
 */
export function parseSnapshotResponse(body: unknown): Omit<MarketSnapshot, 'marketCap'> {
  const response = validate(snapshotResponseSchema, body, 'snapshot');
  const ticker = response.ticker;

  if (!ticker) {
    throw new ParseError('Snapshot response has no ticker section', { field: 'ticker' });
  }

  return {
    currentPrice: ticker.lastTrade?.p ?? ticker.min?.c ?? null,
    previousClose: ticker.prevDay?.c ?? null,
    volume: ticker.day?.v ?? null,
  };
}

/**
 * Market capitalisation from a ticker details response, `null` when not reported.
 */
export function parseMarketCap(body: unknown): number | null {
  const response = validate(tickerDetailsResponseSchema, body, 'ticker details');
  return response.results?.market_cap ?? null;
}
