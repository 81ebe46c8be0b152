/**
 * Configuration loading and management
 */

import { ChartwiseError } from '@chartwise/contracts';
import type { Logger } from '@chartwise/logger';
import { configSchema, envMapping, type Config, type ConfigInput } from './schema.js';

/**
 * Configuration failed validation. `issues` lists every problem as
 * `path: message`.
 */
export class ConfigError extends ChartwiseError {
  declare readonly data: { issues: string[]; [key: string]: unknown };

  constructor(message: string, data: { issues: string[]; [key: string]: unknown }) {
    super('CONFIG_INVALID', message, data);
    this.name = 'ConfigError';
  }
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

type RawConfig = Record<string, Record<string, unknown>>;

function setPath(raw: RawConfig, path: string, value: unknown): void {
  const [section, key] = path.split('.');
  if (!section || !key) return;
  raw[section] = { ...raw[section], [key]: value };
}

/**
 * Loads configuration from environment variables, applies `overrides` on top
 * and validates the result. Empty variables and undefined overrides count as
 * unset.
 *
 * @throws ConfigError listing every invalid value
 *
 * @example
 * ```typescript
 * const config = loadConfig(process.env, { provider: { lookbackDays: 500 } });
 * ```
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigInput = {},
  logger?: Logger
): Config {
  const raw: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setPath(raw, configPath, value);
    }
  }

  for (const [section, values] of Object.entries(overrides)) {
    if (!values || typeof values !== 'object') continue;
    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        setPath(raw, `${section}.${key}`, value);
      }
    }
  }

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, { issues });
  }

  logger?.info('Configuration loaded', getConfigSummary(result.data));

  return result.data;
}

/**
 * Log-safe summary. The API key is reported only as present or absent.
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    environment: config.app.env,
    logging: { level: config.logging.level, format: config.logging.format },
    provider: {
      baseUrl: config.provider.baseUrl,
      hasApiKey: config.provider.apiKey !== undefined,
      lookbackDays: config.provider.lookbackDays,
    },
    cache: { ttlMs: config.cache.ttlMs, maxEntries: config.cache.maxEntries },
    analysis: config.analysis,
  };
}

export type { Config, ConfigInput } from './schema.js';
