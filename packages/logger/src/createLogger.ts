/**
 * @fileoverview Logger factory.
 */

import winston from 'winston';
import type { LoggerConfig, Logger, LogFields } from './types.js';
import { createLogFormat } from './formats.js';

const ALL_LEVELS = ['error', 'warn', 'info', 'debug'];

/**
 * Creates a winston logger with secret redaction and structured fields.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', stderr: true });
 * const providerLogger = createChildLogger(logger, { component: 'provider', provider: 'polygon' });
 *
 * providerLogger.info('Fetched daily bars', { symbol: 'RIVN', count: 250, duration_ms: 412 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    stderr = false,
  } = config;

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: createLogFormat(json),
        stderrLevels: stderr ? ALL_LEVELS : [],
      })
    );
  }

  // Files never get ANSI colour codes.
  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: createLogFormat(json, false),
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  return winston.createLogger({
    level,
    transports,
    // Fatal errors are handled by attachGlobalHandlers.
    exitOnError: false,
  });
}

/**
 * Child logger that adds `context` to every entry.
 */
export function createChildLogger(logger: Logger, context: LogFields): Logger {
  return logger.child(context);
}
