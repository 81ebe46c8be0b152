/**
 * Analyze command implementation
 */

import type { Logger } from '@chartwise/logger';
import { startTimer } from '@chartwise/logger';
import type { Command, CommandOptions, CommandResult } from './types.js';
import type { AnalysisService } from '../services/analysis.service.js';
import { ReportFormatter } from '../formatters/report-formatter.js';
import { formatCommandError } from './errors.js';
import { sanitizeError } from '../utils/error-sanitizer.js';

export interface AnalyzeCommandOptions extends CommandOptions {
  /** Analysis day, default today */
  asOf?: Date;
  lookbackDays?: number;
  allowPartialSignals?: boolean;
  dropWarmupRows?: boolean;
}

export interface AnalyzeCommandConfig {
  analysisService: AnalysisService;
  logger: Logger;
  defaultSymbol: string;
}

/**
 * `analyze` command - indicator table and signals for one symbol
 */
export class AnalyzeCommand implements Command<AnalyzeCommandOptions> {
  name = 'analyze';
  description = 'Compute technical indicators and signals for a symbol';

  private analysisService: AnalysisService;
  private logger: Logger;
  private formatter: ReportFormatter;
  private defaultSymbol: string;

  constructor(config: AnalyzeCommandConfig) {
    this.analysisService = config.analysisService;
    this.logger = config.logger;
    this.formatter = new ReportFormatter();
    this.defaultSymbol = config.defaultSymbol;
  }

  async execute(args: string[], options: AnalyzeCommandOptions = {}): Promise<CommandResult> {
    const timer = startTimer();
    const symbol = (args[0] ?? this.defaultSymbol).toUpperCase();
    const format = options.format ?? 'text';

    this.logger.info('Executing analyze command', { symbol, format });

    try {
      const report = await this.analysisService.analyze(symbol, options.asOf, {
        lookbackDays: options.lookbackDays,
        allowPartialSignals: options.allowPartialSignals,
        dropWarmupRows: options.dropWarmupRows,
      });

      return {
        success: true,
        output: this.formatter.format(report, format),
        duration: timer.stop(),
        metadata: {
          symbol: report.symbol,
          barCount: report.barCount,
          signalStatus: report.signalStatus,
          cacheHit: report.cacheHit,
        },
      };
    } catch (error) {
      this.logger.error('Analyze command failed', {
        symbol,
        error: sanitizeError(error, options.verbose),
      });

      return {
        success: false,
        output: formatCommandError(error, options.verbose),
        error: error instanceof Error ? error : new Error(String(error)),
        duration: timer.stop(),
      };
    }
  }
}
