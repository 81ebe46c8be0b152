/**
 * Tests for configuration loading
 */

import { describe, it, expect } from 'vitest';
import { ConfigError, getConfigSummary, isConfigError, loadConfig } from '../src/config/index.js';

function configErrorOf(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (error) {
    if (isConfigError(error)) return error;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('loadConfig', () => {
  it('should apply defaults when the environment is empty', () => {
    const config = loadConfig({});

    expect(config.app.env).toBe('development');
    expect(config.logging).toEqual({ level: 'info', format: 'pretty' });
    expect(config.provider).toEqual({
      baseUrl: 'https://api.polygon.io',
      timeout: 30_000,
      lookbackDays: 365,
    });
    expect(config.cache).toEqual({ ttlMs: 3_600_000, maxEntries: 100 });
    expect(config.analysis).toEqual({
      symbol: 'RIVN',
      recentRows: 10,
      dropWarmupRows: true,
      allowPartialSignals: false,
    });
  });

  it('should map and coerce environment variables', () => {
    const config = loadConfig({
      POLYGON_API_KEY: 'test-key',
      LOOKBACK_DAYS: '500',
      CACHE_MAX_ENTRIES: '5',
      DROP_WARMUP_ROWS: 'false',
      ALLOW_PARTIAL_SIGNALS: 'TRUE',
      DEFAULT_SYMBOL: ' aapl ',
      LOG_FORMAT: 'json',
      LOG_FILE: '/tmp/chartwise.log',
    });

    expect(config.provider.apiKey).toBe('test-key');
    expect(config.provider.lookbackDays).toBe(500);
    expect(config.cache.maxEntries).toBe(5);
    expect(config.analysis.dropWarmupRows).toBe(false);
    expect(config.analysis.allowPartialSignals).toBe(true);
    expect(config.analysis.symbol).toBe('AAPL');
    expect(config.logging.format).toBe('json');
    expect(config.logging.filePath).toBe('/tmp/chartwise.log');
  });

  it('should treat empty variables as unset', () => {
    const config = loadConfig({ LOOKBACK_DAYS: '', POLYGON_API_KEY: '' });

    expect(config.provider.lookbackDays).toBe(365);
    expect(config.provider.apiKey).toBeUndefined();
  });

  it('should let overrides win over the environment', () => {
    const config = loadConfig(
      { LOOKBACK_DAYS: '500', RECENT_ROWS: '20' },
      { provider: { lookbackDays: 90 }, analysis: { recentRows: undefined } }
    );

    expect(config.provider.lookbackDays).toBe(90);
    expect(config.analysis.recentRows).toBe(20);
  });

  it('should list every invalid value', () => {
    const error = configErrorOf(() =>
      loadConfig({ LOG_LEVEL: 'loud', LOOKBACK_DAYS: 'abc' })
    );

    expect(error).toBeInstanceOf(ConfigError);
    expect(error.code).toBe('CONFIG_INVALID');
    expect(error.data.issues).toHaveLength(2);
    expect(error.data.issues[0]?.startsWith('logging.level: ')).toBe(true);
    expect(error.data.issues[1]?.startsWith('provider.lookbackDays: ')).toBe(true);
  });

  it('should reject booleans other than true and false', () => {
    const error = configErrorOf(() => loadConfig({ DROP_WARMUP_ROWS: 'yes' }));

    expect(error.data.issues).toHaveLength(1);
    expect(error.data.issues[0]?.startsWith('analysis.dropWarmupRows: ')).toBe(true);
  });

  it('should reject a non-positive lookback', () => {
    const error = configErrorOf(() => loadConfig({ LOOKBACK_DAYS: '0' }));

    expect(error.data.issues[0]?.startsWith('provider.lookbackDays: ')).toBe(true);
  });
});

describe('getConfigSummary', () => {
  it('should report the API key only as present or absent', () => {
    const summary = getConfigSummary(loadConfig({ POLYGON_API_KEY: 'test-key' }));

    expect(summary['provider']).toEqual({
      baseUrl: 'https://api.polygon.io',
      hasApiKey: true,
      lookbackDays: 365,
    });
    expect(JSON.stringify(summary)).not.toContain('test-key');
  });
});
