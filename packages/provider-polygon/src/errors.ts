/**
 * Error classes for the Polygon.io provider.
 */

import { ChartwiseError, ProviderRateLimitError } from '@chartwise/contracts';

/**
 * Polygon.io answered 429.
 *
 * `retryAfter` carries the `Retry-After` header in seconds when present; the
 * caller owns any backoff.
 */
export class RateLimitError extends ProviderRateLimitError {
  constructor(data: { retryAfter?: number; requestUrl?: string; [key: string]: unknown }) {
    super('Polygon.io rate limit exceeded', {
      provider: 'polygon',
      ...data,
    });
    this.name = 'RateLimitError';
  }
}

/**
 * Non-2xx response other than 404 and 429, or a transport failure.
 *
 * @example
 * ```typescript
 * throw new ApiError('Polygon API error: 401 Unauthorized', {
 *   statusCode: 401,
 *   statusText: 'Unauthorized',
 *   requestUrl: '/v2/aggs/ticker/RIVN/range/1/day/2024-01-02/2025-01-02',
 * });
 * ```
 */
export class ApiError extends ChartwiseError {
  /** Absent for transport failures */
  readonly statusCode?: number;

  readonly statusText?: string;

  constructor(
    message: string,
    data: {
      statusCode?: number;
      statusText?: string;
      requestUrl?: string;
      responseBody?: string;
      [key: string]: unknown;
    }
  ) {
    super('POLYGON_API_ERROR', message, data);
    this.name = 'ApiError';
    this.statusCode = data.statusCode;
    this.statusText = data.statusText;
  }
}

/**
 * Response body did not have the expected shape or broke an OHLC invariant.
 */
export class ParseError extends ChartwiseError {
  constructor(
    message: string,
    data?: {
      field?: string;
      issues?: string[];
      [key: string]: unknown;
    }
  ) {
    super('POLYGON_PARSE_ERROR', message, data);
    this.name = 'ParseError';
  }
}

export function isRateLimitError(error: unknown): error is RateLimitError {
  return error instanceof RateLimitError;
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

export function isParseError(error: unknown): error is ParseError {
  return error instanceof ParseError;
}
