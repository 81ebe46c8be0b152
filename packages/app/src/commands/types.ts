/**
 * Command types and interfaces
 */

import type { OutputFormat } from '../formatters/report-formatter.js';

/**
 * Base command interface
 */
export interface Command<TOptions extends CommandOptions = CommandOptions> {
  name: string;
  description: string;
  execute(args: string[], options: TOptions): Promise<CommandResult>;
}

/**
 * Command execution options
 */
export interface CommandOptions {
  verbose?: boolean;
  format?: OutputFormat;
}

/**
 * Command execution result. Failures are reported here rather than thrown.
 */
export interface CommandResult {
  success: boolean;
  output: string;
  error?: Error;
  duration: number;
  metadata?: Record<string, unknown>;
}
