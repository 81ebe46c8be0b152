/**
 * Error sanitization utilities for safe logging
 */

import { isChartwiseError } from '@chartwise/contracts';

/**
 * Reduces an error to fields that are safe to log: name, message and code.
 * Stack traces are included in development or when explicitly requested.
 * Error `data` is left out because it can echo request parameters.
 */
export function sanitizeError(error: unknown, includeStack = false): Record<string, unknown> {
  const isDevelopment = process.env['NODE_ENV'] === 'development';

  if (error instanceof Error) {
    const sanitized: Record<string, unknown> = {
      message: error.message,
      name: error.name,
    };

    if (isChartwiseError(error)) {
      sanitized['code'] = error.code;
    }

    if ((isDevelopment || includeStack) && error.stack) {
      sanitized['stack'] = error.stack;
    }

    return sanitized;
  }

  // For non-Error objects, convert to string safely
  return {
    message: String(error),
    name: 'Unknown',
  };
}
