/**
 * @fileoverview Error taxonomy for chartwise.
 *
 * Every error carries a machine-readable code, a structured data payload and
 * the ISO timestamp of its creation.
 *
 * @module @chartwise/contracts/errors
 */

import type { IndicatorField } from './indicators.js';

/**
 * Base error class for all chartwise errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new ChartwiseError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class ChartwiseError extends Error {
  /**
   * Machine-readable error code (e.g., 'PROVIDER_RATE_LIMIT').
   */
  readonly code: string;

  /**
   * Structured context for debugging and retry logic.
   */
  readonly data?: Record<string, unknown>;

  /**
   * ISO 8601 timestamp when the error was created.
   */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'ChartwiseError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when signals are requested for a row whose indicators are not all
 * defined yet.
 *
 * The caller must pick a row from index 199 or later of a series of at least
 * 200 bars, or opt in to the reduced rule set.
 *
 * @example
 * ```typescript
 * throw new InsufficientHistoryError(
 *   'Signals need every indicator defined',
 *   { missingFields: ['sma200'], required: 200, received: 120 }
 * );
 * ```
 */
export class InsufficientHistoryError extends ChartwiseError {
  declare readonly data: {
    missingFields: IndicatorField[];
    required?: number;
    received?: number;
    [key: string]: unknown;
  };

  constructor(
    message: string,
    data: {
      missingFields: IndicatorField[];
      required?: number;
      received?: number;
      [key: string]: unknown;
    }
  ) {
    super('INSUFFICIENT_HISTORY', message, data);
    this.name = 'InsufficientHistoryError';
  }
}

/**
 * Thrown when a data provider's rate limit is exceeded.
 *
 * Indicates temporary throttling; the caller owns any backoff.
 */
export class ProviderRateLimitError extends ChartwiseError {
  declare readonly data: {
    provider: string;
    retryAfter?: number;
    [key: string]: unknown;
  };

  constructor(
    message: string,
    data: {
      provider: string;
      retryAfter?: number;
      limitType?: string;
      [key: string]: unknown;
    }
  ) {
    super('PROVIDER_RATE_LIMIT', message, data);
    this.name = 'ProviderRateLimitError';
  }
}

/**
 * Thrown when a provider does not know the requested symbol.
 */
export class SymbolResolutionError extends ChartwiseError {
  declare readonly data: {
    symbol: string;
    provider: string;
    [key: string]: unknown;
  };

  constructor(
    message: string,
    data: {
      symbol: string;
      provider: string;
      suggestion?: string;
      [key: string]: unknown;
    }
  ) {
    super('SYMBOL_RESOLUTION', message, data);
    this.name = 'SymbolResolutionError';
  }
}

/**
 * Type guard for {@link ChartwiseError}.
 *
 * @example
 * ```typescript
 * try {
 *   await service.analyze('RIVN');
 * } catch (err) {
 *   if (isChartwiseError(err)) {
 *     logger.error('Analysis failed', { code: err.code });
 *   }
 *   throw err;
 * }
 * ```
 */
export function isChartwiseError(error: unknown): error is ChartwiseError {
  return error instanceof ChartwiseError;
}

export function isInsufficientHistoryError(error: unknown): error is InsufficientHistoryError {
  return error instanceof InsufficientHistoryError;
}

export function isProviderRateLimitError(error: unknown): error is ProviderRateLimitError {
  return error instanceof ProviderRateLimitError;
}

export function isSymbolResolutionError(error: unknown): error is SymbolResolutionError {
  return error instanceof SymbolResolutionError;
}
