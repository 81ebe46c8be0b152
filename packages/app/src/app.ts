/**
 * Application wiring
 *
 * Builds the logger, provider, cache, analysis service and commands from a
 * validated configuration.
 */

import type { MarketDataProvider } from '@chartwise/contracts';
import { createChildLogger, createLogger, type Logger } from '@chartwise/logger';
import { PriceCache } from '@chartwise/price-cache';
import { createPolygonProvider } from '@chartwise/provider-polygon';
import { ConfigError, getConfigSummary, type Config } from './config/index.js';
import { AnalysisService, type MarketPayload } from './services/analysis.service.js';
import { AnalyzeCommand } from './commands/analyze.command.js';

/**
 * Collaborators that replace the defaults built from configuration
 */
export interface AppDependencies {
  logger?: Logger;
  provider?: MarketDataProvider;
  now?: () => Date;
}

export interface App {
  config: Config;
  logger: Logger;
  provider: MarketDataProvider;
  cache: PriceCache<MarketPayload>;
  analysisService: AnalysisService;
  analyzeCommand: AnalyzeCommand;
}

/**
 * Create the root logger. Logs go to stderr so stdout carries only the report.
 */
export function createAppLogger(config: Config): Logger {
  return createLogger({
    level: config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
    stderr: true,
  });
}

/**
 * Wire the application.
 *
 * @throws ConfigError when no provider is injected and no API key is configured
 */
export function createApp(config: Config, deps: AppDependencies = {}): App {
  const logger = deps.logger ?? createAppLogger(config);

  const provider = deps.provider ?? createProvider(config, logger);

  const { now } = deps;
  const cache = new PriceCache<MarketPayload>({
    ttlMs: config.cache.ttlMs,
    maxEntries: config.cache.maxEntries,
    now: now ? () => now().getTime() : undefined,
  });

  const analysisService = new AnalysisService({
    provider,
    cache,
    logger: createChildLogger(logger, { component: 'analysis' }),
    now,
    lookbackDays: config.provider.lookbackDays,
    recentRows: config.analysis.recentRows,
    dropWarmupRows: config.analysis.dropWarmupRows,
    allowPartialSignals: config.analysis.allowPartialSignals,
  });

  const analyzeCommand = new AnalyzeCommand({
    analysisService,
    logger: createChildLogger(logger, { component: 'analyze-command' }),
    defaultSymbol: config.analysis.symbol,
  });

  logger.debug('Application wired', getConfigSummary(config));

  return { config, logger, provider, cache, analysisService, analyzeCommand };
}

function createProvider(config: Config, logger: Logger): MarketDataProvider {
  const { apiKey, baseUrl, timeout } = config.provider;

  if (!apiKey) {
    const issues = ['provider.apiKey: POLYGON_API_KEY is required'];
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, { issues });
  }

  return createPolygonProvider({
    apiKey,
    baseUrl,
    timeout,
    logger: createChildLogger(logger, { component: 'provider', provider: 'polygon' }),
  });
}
