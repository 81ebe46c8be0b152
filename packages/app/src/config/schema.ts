/**
 * Configuration schema using Zod
 *
 * Every value arrives as an environment string, so numbers and booleans are
 * coerced here rather than guessed at load time.
 */

import { z } from 'zod';

const positiveInt = z.coerce.number().int().positive();

/**
 * Accepts booleans and the strings "true"/"false" (any case).
 */
const envBoolean = z.preprocess((value) => {
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  return value;
}, z.boolean());

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  app: z
    .object({
      env: z.enum(['development', 'test', 'production']).default('development'),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().min(1).optional(),
    })
    .default({}),

  provider: z
    .object({
      apiKey: z.string().min(1).optional(),
      baseUrl: z.string().url().default('https://api.polygon.io'),
      timeout: positiveInt.default(30_000),
      lookbackDays: positiveInt.default(365),
    })
    .default({}),

  cache: z
    .object({
      ttlMs: positiveInt.default(60 * 60 * 1000),
      maxEntries: positiveInt.default(100),
    })
    .default({}),

  analysis: z
    .object({
      symbol: z
        .string()
        .trim()
        .min(1)
        .transform((symbol) => symbol.toUpperCase())
        .default('RIVN'),
      recentRows: positiveInt.default(10),
      dropWarmupRows: envBoolean.default(true),
      allowPartialSignals: envBoolean.default(false),
    })
    .default({}),
});

/**
 * Validated configuration
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Raw, unvalidated configuration as accepted by the schema. Command-line
 * overrides use this shape.
 */
export type ConfigInput = z.input<typeof configSchema>;

/**
 * Environment variable → config path
 */
export const envMapping: Record<string, string> = {
  NODE_ENV: 'app.env',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  POLYGON_API_KEY: 'provider.apiKey',
  POLYGON_BASE_URL: 'provider.baseUrl',
  POLYGON_TIMEOUT_MS: 'provider.timeout',
  LOOKBACK_DAYS: 'provider.lookbackDays',
  CACHE_TTL_MS: 'cache.ttlMs',
  CACHE_MAX_ENTRIES: 'cache.maxEntries',
  DEFAULT_SYMBOL: 'analysis.symbol',
  RECENT_ROWS: 'analysis.recentRows',
  DROP_WARMUP_ROWS: 'analysis.dropWarmupRows',
  ALLOW_PARTIAL_SIGNALS: 'analysis.allowPartialSignals',
};
