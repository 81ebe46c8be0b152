#!/usr/bin/env node

/**
 * Command line entry point
 *
 * Usage: chartwise analyze [symbol] [--format text|json|markdown] [--lookback days]
 */

import 'dotenv/config';

import chalk from 'chalk';
import { Command, Option } from 'commander';
import { attachGlobalHandlers } from '@chartwise/logger';
import { loadConfig } from './config/index.js';
import { createApp } from './app.js';
import { formatCommandError } from './commands/errors.js';
import { OUTPUT_FORMATS } from './formatters/report-formatter.js';
import { colorizeReport } from './formatters/colorize.js';
import { isOutputFormat, parseDay, parsePositiveInt } from './utils/cli-args.js';

const VERSION = '0.1.0';

interface AnalyzeCliOptions {
  format: string;
  lookback?: number;
  asOf?: Date;
  partialSignals?: boolean;
  dropWarmup: boolean;
  verbose: boolean;
}

async function runAnalyze(symbol: string | undefined, options: AnalyzeCliOptions): Promise<void> {
  try {
    const format = isOutputFormat(options.format) ? options.format : 'text';

    const config = loadConfig(process.env, {
      logging: options.verbose ? { level: 'debug' } : {},
      provider: { lookbackDays: options.lookback },
      analysis: {
        allowPartialSignals: options.partialSignals,
        dropWarmupRows: options.dropWarmup ? undefined : false,
      },
    });

    const app = createApp(config);
    attachGlobalHandlers(app.logger);

    const result = await app.analyzeCommand.execute(symbol ? [symbol] : [], {
      format,
      asOf: options.asOf,
      verbose: options.verbose,
    });

    if (!result.success) {
      console.error(chalk.red(result.output));
      process.exitCode = 1;
      return;
    }

    console.log(format === 'text' ? colorizeReport(result.output) : result.output);
  } catch (error) {
    console.error(chalk.red(formatCommandError(error, options.verbose)));
    process.exitCode = 1;
  }
}

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('chartwise')
    .description('Daily technical indicators and signals for a stock symbol')
    .version(VERSION);

  program
    .command('analyze')
    .description('Fetch daily bars, compute indicators and print signals')
    .argument('[symbol]', 'ticker symbol (default: DEFAULT_SYMBOL or RIVN)')
    .addOption(
      new Option('-f, --format <format>', 'output format').choices(OUTPUT_FORMATS).default('text')
    )
    .option('-l, --lookback <days>', 'calendar days of history to fetch', parsePositiveInt)
    .option('--as-of <date>', 'analysis day as YYYY-MM-DD (default: today)', parseDay)
    .option('--partial-signals', 'evaluate the rules that can run on a short series')
    .option('--no-drop-warmup', 'show rows whose indicators are still undefined')
    .option('-v, --verbose', 'debug logging and stack traces', false)
    .action(runAnalyze);

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(chalk.red('Fatal error:'), error);
  process.exit(1);
});
