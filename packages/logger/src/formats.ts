/**
 * @fileoverview Winston formats: secret redaction, standard fields and the
 * two output styles.
 */

import { format } from 'winston';
import type { Logform } from 'winston';

/**
 * Field names whose values never reach a transport.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /private[_-]?key/i,
];

const REDACTED = '[REDACTED]';

/**
 * Core winston fields; never redacted.
 */
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'stack']);

export function isSensitiveField(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Returns a copy of `value` with every sensitive key replaced, at any depth.
 */
export function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item));
  }
  if (value === null || typeof value !== 'object' || value instanceof Error) {
    return value;
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    redacted[key] = isSensitiveField(key) ? REDACTED : redactValue(nested);
  }
  return redacted;
}

/**
 * Redacts sensitive metadata. Must run first in the chain so that no later
 * format ever sees a secret.
 *
 * @example
 * ```typescript
 * logger.info('Requesting aggregates', { url, apiKey: 'test-key' });
 * // {"apiKey":"[REDACTED]","level":"info","message":"Requesting aggregates",...}
 * ```
 */
export const redactSecrets = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    info[key] = isSensitiveField(key) ? REDACTED : redactValue(info[key]);
  }
  return info;
});

/**
 * ISO timestamp plus stack capture for logged Error instances.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

const formatContextValue = (value: unknown): string =>
  typeof value === 'string' ? value : JSON.stringify(value);

/**
 * Human-readable line for terminals:
 * `[2025-01-02T10:00:00.000+00:00] info: Fetched bars component=provider symbol=RIVN count=250`
 */
export const prettyLine = format.printf((info) => {
  const { timestamp, level, message, stack, component, symbol, ...rest } = info;

  const context: string[] = [];
  if (component !== undefined) context.push(`component=${formatContextValue(component)}`);
  if (symbol !== undefined) context.push(`symbol=${formatContextValue(symbol)}`);
  for (const [key, value] of Object.entries(rest)) {
    context.push(`${key}=${formatContextValue(value)}`);
  }

  const suffix = context.length > 0 ? ` ${context.join(' ')}` : '';
  const line = `[${String(timestamp)}] ${level}: ${String(message)}${suffix}`;

  return typeof stack === 'string' ? `${line}\n${stack}` : line;
});

/**
 * Full format chain: redact → standard fields → JSON or pretty output.
 */
export function createLogFormat(json: boolean, colorize = true): Logform.Format {
  const output = json
    ? format.json()
    : colorize
      ? format.combine(format.colorize(), prettyLine)
      : prettyLine;

  return format.combine(redactSecrets(), standardFields, output);
}
