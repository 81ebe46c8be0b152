/**
 * @fileoverview Logger configuration and structured field types.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity that reaches the transports.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Options for {@link createLogger}.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   stderr: true,
 * };
 * ```
 */
export interface LoggerConfig {
  /** @default 'info' */
  level: LogLevel;

  /**
   * Machine-readable JSON lines instead of the colourised pretty format.
   * @default true when NODE_ENV is 'production'
   */
  json?: boolean;

  /**
   * Also append every entry to this file.
   */
  filePath?: string;

  /**
   * Write to the console at all.
   * @default true
   */
  console?: boolean;

  /**
   * Send every console entry to stderr, leaving stdout free for command
   * output such as a rendered report.
   * @default false
   */
  stderr?: boolean;
}

/**
 * Fields the analysis pipeline attaches to its log entries. Anything else is
 * allowed through the index signature.
 */
export interface LogFields {
  /** Ticker being analysed, upper case */
  symbol?: string;

  /** Data provider, e.g. "polygon" */
  provider?: string;

  /** UTC day the analysis is for (YYYY-MM-DD) */
  asOf?: string;

  /** Component name, usually set on a child logger */
  component?: string;

  duration_ms?: number;

  /** Number of bars or rows involved */
  count?: number;

  cache?: 'hit' | 'miss';

  /** Outcome of signal evaluation */
  signal_status?: string;

  error_code?: string;

  [key: string]: unknown;
}

export type Logger = WinstonLogger;
