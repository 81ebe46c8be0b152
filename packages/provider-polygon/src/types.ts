/**
 * Configuration and transport types for the Polygon.io provider.
 */

import type { Logger } from '@chartwise/logger';

/**
 * Query parameters sent with a request.
 */
export type QueryParams = Record<string, string | number | boolean>;

/**
 * Subset of an HTTP response the client reads.
 */
export interface HttpResponse {
  status: number;
  statusText?: string;
  data: unknown;
  headers?: Record<string, unknown>;
}

/**
 * Minimal GET transport. The default is backed by axios; tests inject a stub.
 *
 * Implementations must resolve for every HTTP status and reject only on
 * transport failures (DNS, timeout, connection reset).
 */
export interface HttpClient {
  get(url: string, config?: { params?: QueryParams }): Promise<HttpResponse>;
}

/**
 * Options for {@link createPolygonProvider}.
 *
 * @example
 * ```typescript
 * const config: PolygonProviderConfig = {
 *   apiKey: process.env.POLYGON_API_KEY ?? '',
 *   timeout: 30000,
 *   logger: createLogger({ level: 'info' }),
 * };
 * ```
 */
export interface PolygonProviderConfig {
  apiKey: string;

  /** @default 'https://api.polygon.io' */
  baseUrl?: string;

  /** Request timeout in milliseconds. @default 30000 */
  timeout?: number;

  /** Replaces the axios transport */
  httpClient?: HttpClient;

  logger?: Logger;
}
