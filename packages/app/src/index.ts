/**
 * Main exports for @chartwise/app package
 */

// Configuration exports
export { loadConfig, getConfigSummary, ConfigError, isConfigError } from './config/index.js';
export { configSchema, envMapping } from './config/schema.js';
export type { Config, ConfigInput } from './config/schema.js';

// Wiring
export { createApp, createAppLogger } from './app.js';
export type { App, AppDependencies } from './app.js';

// Service exports
export { AnalysisService, presentationRows, REPORT_SOURCE } from './services/analysis.service.js';
export type {
  AnalysisReport,
  AnalysisOptions,
  AnalysisServiceConfig,
  MarketPayload,
  SignalStatus,
} from './services/analysis.service.js';

// Formatter exports
export { ReportFormatter, OUTPUT_FORMATS, NO_DATA_MESSAGE, toneMarker } from './formatters/report-formatter.js';
export type { OutputFormat } from './formatters/report-formatter.js';
export { colorizeReport } from './formatters/colorize.js';

// Command exports
export { AnalyzeCommand } from './commands/analyze.command.js';
export type { AnalyzeCommandOptions, AnalyzeCommandConfig } from './commands/analyze.command.js';
export { describeError, formatCommandError } from './commands/errors.js';
export type { ErrorDescription } from './commands/errors.js';
export type { Command, CommandOptions, CommandResult } from './commands/types.js';
