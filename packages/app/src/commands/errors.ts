/**
 * Error handling for commands
 *
 * Turns errors from configuration, the provider and the indicator pipeline
 * into one-line messages with an optional hint.
 */

import {
  isChartwiseError,
  isInsufficientHistoryError,
  isProviderRateLimitError,
  isSymbolResolutionError,
} from '@chartwise/contracts';
import { isConfigError } from '../config/index.js';

/**
 * Display form of an error
 */
export interface ErrorDescription {
  code: string;
  message: string;
  hint?: string;
}

/**
 * Describe any thrown value for display
 */
export function describeError(error: unknown): ErrorDescription {
  if (isProviderRateLimitError(error)) {
    const { retryAfter } = error.data;
    return {
      code: error.code,
      message: error.message,
      hint:
        retryAfter !== undefined
          ? `Rate limited by ${error.data.provider}. Retry in ${retryAfter}s.`
          : `Rate limited by ${error.data.provider}. Wait a minute before retrying.`,
    };
  }

  if (isSymbolResolutionError(error)) {
    return {
      code: error.code,
      message: error.message,
      hint: `Check that "${error.data.symbol}" is a listed ticker symbol.`,
    };
  }

  if (isConfigError(error)) {
    const missingKey = error.data.issues.some((issue) => issue.startsWith('provider.apiKey'));
    return {
      code: error.code,
      message: 'Invalid configuration',
      hint: missingKey
        ? 'Set POLYGON_API_KEY in the environment or in a .env file.'
        : error.data.issues.join('; '),
    };
  }

  if (isInsufficientHistoryError(error)) {
    return {
      code: error.code,
      message: error.message,
      hint: 'Increase --lookback or pass --partial-signals.',
    };
  }

  if (isChartwiseError(error)) {
    return { code: error.code, message: error.message };
  }

  if (error instanceof Error) {
    return { code: 'INTERNAL_ERROR', message: error.message };
  }

  return { code: 'INTERNAL_ERROR', message: String(error) };
}

/**
 * Create a friendly error message from any error
 */
export function formatCommandError(error: unknown, verbose: boolean = false): string {
  const { code, message, hint } = describeError(error);
  const lines: string[] = [`Error: ${message}`];

  if (hint) {
    lines.push(`Hint: ${hint}`);
  }

  if (verbose) {
    lines.push(`Code: ${code}`);
    if (error instanceof Error && error.stack) {
      lines.push('Stack trace:');
      lines.push(error.stack);
    }
  }

  return lines.join('\n');
}
