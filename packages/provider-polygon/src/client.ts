/**
 * HTTP client for the three Polygon.io endpoints the provider uses.
 *
 * Responses come back as `unknown`; parse.ts owns their shape. Status codes
 * are mapped to errors here so every endpoint fails the same way.
 */

import axios from 'axios';
import type { Logger } from '@chartwise/logger';
import { startTimer } from '@chartwise/logger';
import { SymbolResolutionError } from '@chartwise/contracts';
import type { HttpClient, HttpResponse, QueryParams } from './types.js';
import { ApiError, RateLimitError } from './errors.js';

export const POLYGON_BASE_URL = 'https://api.polygon.io';
export const DEFAULT_TIMEOUT_MS = 30_000;

export interface ClientConfig {
  apiKey: string;
  baseUrl: string;
  timeout: number;
  httpClient?: HttpClient;
  logger?: Logger;
}

/**
 * axios-backed transport. `validateStatus` accepts everything so that status
 * mapping happens in one place.
 */
export function createAxiosHttpClient(baseUrl: string, timeout: number): HttpClient {
  const instance = axios.create({ baseURL: baseUrl, timeout });

  return {
    async get(url, config) {
      const response = await instance.get<unknown>(url, {
        params: config?.params,
        validateStatus: () => true,
      });

      return {
        status: response.status,
        statusText: response.statusText,
        data: response.data,
        headers: Object.fromEntries(Object.entries(response.headers)),
      };
    },
  };
}

/**
 * Seconds from a `Retry-After` header. HTTP-date values are not supported
 * and yield `undefined`.
 */
export function parseRetryAfter(headers: Record<string, unknown> | undefined): number | undefined {
  const raw = headers?.['retry-after'] ?? headers?.['Retry-After'];
  if (typeof raw !== 'string' && typeof raw !== 'number') {
    return undefined;
  }
  const seconds = Number(raw);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

/**
 * UTC calendar day of `date` as YYYY-MM-DD.
 */
export function toPolygonDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * @internal
 */
export class PolygonClient {
  private readonly config: ClientConfig;
  private readonly http: HttpClient;

  constructor(config: ClientConfig) {
    this.config = config;
    this.http = config.httpClient ?? createAxiosHttpClient(config.baseUrl, config.timeout);
  }

  /**
   * `GET /v2/aggs/ticker/{ticker}/range/1/day/{from}/{to}`, split-adjusted and
   * sorted ascending.
   */
  async getDailyAggregates(ticker: string, from: Date, to: Date, limit?: number): Promise<unknown> {
    const path = `/v2/aggs/ticker/${encodeURIComponent(ticker)}/range/1/day/${toPolygonDate(from)}/${toPolygonDate(to)}`;

    const params: QueryParams = { adjusted: true, sort: 'asc' };
    if (limit !== undefined) {
      params['limit'] = limit;
    }

    return this.request(path, ticker, params);
  }

  /**
   * `GET /v2/snapshot/locale/us/markets/stocks/tickers/{ticker}`
   */
  async getSnapshot(ticker: string): Promise<unknown> {
    return this.request(
      `/v2/snapshot/locale/us/markets/stocks/tickers/${encodeURIComponent(ticker)}`,
      ticker
    );
  }

  /**
   * `GET /v3/reference/tickers/{ticker}`
   */
  async getTickerDetails(ticker: string): Promise<unknown> {
    return this.request(`/v3/reference/tickers/${encodeURIComponent(ticker)}`, ticker);
  }

  private async request(path: string, ticker: string, params: QueryParams = {}): Promise<unknown> {
    const timer = startTimer();
    this.config.logger?.debug('Polygon API request', { path, symbol: ticker, params });

    let response: HttpResponse;
    try {
      response = await this.http.get(path, { params: { ...params, apiKey: this.config.apiKey } });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ApiError(`Polygon request failed: ${message}`, { requestUrl: path });
    }

    this.config.logger?.debug('Polygon API response', {
      path,
      symbol: ticker,
      status: response.status,
      duration_ms: timer.stop(),
    });

    if (response.status === 429) {
      throw new RateLimitError({
        retryAfter: parseRetryAfter(response.headers),
        requestUrl: path,
      });
    }

    if (response.status === 404) {
      throw new SymbolResolutionError(`Polygon.io does not know symbol ${ticker}`, {
        symbol: ticker,
        provider: 'polygon',
      });
    }

    if (response.status < 200 || response.status >= 300) {
      const statusText = response.statusText ?? '';
      throw new ApiError(`Polygon API error: ${response.status} ${statusText}`.trimEnd(), {
        statusCode: response.status,
        statusText,
        requestUrl: path,
        responseBody: typeof response.data === 'string' ? response.data : JSON.stringify(response.data),
      });
    }

    return response.data;
  }
}
