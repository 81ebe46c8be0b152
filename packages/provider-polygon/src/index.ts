/**
 * @chartwise/provider-polygon
 *
 * Polygon.io retrieval of daily aggregates and current snapshot figures.
 *
 * @example
 * ```typescript
 * import { createPolygonProvider } from '@chartwise/provider-polygon';
 * import { createLogger } from '@chartwise/logger';
 *
 * const provider = createPolygonProvider({
 *   apiKey: process.env.POLYGON_API_KEY ?? '',
 *   logger: createLogger({ level: 'info' }),
 * });
 *
 * const bars = await provider.getDailyBars({
 *   symbol: 'RIVN',
 *   from: new Date('2024-01-02T00:00:00Z'),
 *   to: new Date('2025-01-02T00:00:00Z'),
 * });
 * const snapshot = await provider.getSnapshot('RIVN');
 * ```
 *
 * @packageDocumentation
 */

import type {
  DailyBarsQuery,
  MarketDataProvider,
  MarketSnapshot,
  PriceBar,
  ProviderCapabilities,
} from '@chartwise/contracts';
import { SymbolResolutionError } from '@chartwise/contracts';
import { startTimer } from '@chartwise/logger';
import type { PolygonProviderConfig } from './types.js';
import { DEFAULT_TIMEOUT_MS, POLYGON_BASE_URL, PolygonClient } from './client.js';
import { parseAggregatesResponse, parseMarketCap, parseSnapshotResponse } from './parse.js';

/**
 * Polygon caps a single aggregates request at 50,000 base bars.
 */
const MAX_BARS_PER_REQUEST = 50_000;

function normalizeSymbol(symbol: string): string {
  const ticker = symbol.trim().toUpperCase();
  if (!ticker) {
    throw new SymbolResolutionError('Symbol is required', { symbol, provider: 'polygon' });
  }
  return ticker;
}

/**
 * Creates a Polygon.io backed {@link MarketDataProvider}.
 *
 * @throws Error if `apiKey` is empty
 */
export function createPolygonProvider(config: PolygonProviderConfig): MarketDataProvider {
  if (!config.apiKey) {
    throw new Error('PolygonProviderConfig.apiKey is required');
  }

  const { logger } = config;
  const client = new PolygonClient({
    apiKey: config.apiKey,
    baseUrl: config.baseUrl ?? POLYGON_BASE_URL,
    timeout: config.timeout ?? DEFAULT_TIMEOUT_MS,
    httpClient: config.httpClient,
    logger,
  });

  const fetchMarketCap = async (ticker: string): Promise<number | null> => {
    try {
      return parseMarketCap(await client.getTickerDetails(ticker));
    } catch (error) {
      logger?.warn('Ticker details unavailable, market cap omitted', {
        symbol: ticker,
        provider: 'polygon',
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  };

  return {
    /**
     * @throws RateLimitError on 429
     * @throws SymbolResolutionError on 404 or an empty symbol
     * @throws ApiError for other HTTP or transport failures
     * @throws ParseError if the response is malformed
     */
    async getDailyBars(query: DailyBarsQuery): Promise<PriceBar[]> {
      const ticker = normalizeSymbol(query.symbol);
      const timer = startTimer();

      logger?.info('Fetching daily bars from Polygon', {
        symbol: ticker,
        provider: 'polygon',
        from: query.from.toISOString(),
        to: query.to.toISOString(),
      });

      const body = await client.getDailyAggregates(ticker, query.from, query.to, query.limit);
      const bars = parseAggregatesResponse(body);
      const first = bars[0];
      const last = bars[bars.length - 1];

      logger?.info('Daily bars fetched', {
        symbol: ticker,
        provider: 'polygon',
        count: bars.length,
        firstTimestamp: first ? new Date(first.timestamp).toISOString() : null,
        lastTimestamp: last ? new Date(last.timestamp).toISOString() : null,
        duration_ms: timer.stop(),
      });

      return bars;
    },

    /**
     * Snapshot failures propagate; a ticker-details failure only drops the
     * market cap.
     */
    async getSnapshot(symbol: string): Promise<MarketSnapshot> {
      const ticker = normalizeSymbol(symbol);

      const [snapshotBody, marketCap] = await Promise.all([
        client.getSnapshot(ticker),
        fetchMarketCap(ticker),
      ]);

      return { ...parseSnapshotResponse(snapshotBody), marketCap };
    },

    capabilities(): ProviderCapabilities {
      return {
        provider: 'polygon',
        maxBarsPerRequest: MAX_BARS_PER_REQUEST,
        requiresAuthentication: true,
        // Free tier
        rateLimits: { requestsPerMinute: 5 },
      };
    },
  };
}

export type { PolygonProviderConfig, HttpClient, HttpResponse, QueryParams } from './types.js';

export {
  RateLimitError,
  ApiError,
  ParseError,
  isRateLimitError,
  isApiError,
  isParseError,
} from './errors.js';

export {
  parseAggregatesResponse,
  parseAggregate,
  parseSnapshotResponse,
  parseMarketCap,
  normalizeBars,
} from './parse.js';

export {
  PolygonClient,
  createAxiosHttpClient,
  parseRetryAfter,
  toPolygonDate,
  POLYGON_BASE_URL,
  DEFAULT_TIMEOUT_MS,
} from './client.js';
