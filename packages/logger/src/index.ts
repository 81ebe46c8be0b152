/**
 * @fileoverview Public API of @chartwise/logger.
 */

export { createLogger, createChildLogger } from './createLogger.js';
export { attachGlobalHandlers } from './errorHandler.js';
export { startTimer, measureSync, measureAsync } from './perf-timer.js';
export { createLogFormat, redactSecrets, redactValue, isSensitiveField } from './formats.js';

export type { Logger, LoggerConfig, LogLevel, LogFields } from './types.js';
export type { PerfTimer } from './perf-timer.js';
