import { vi, type Mock } from 'vitest';
import type {
  DailyBarsQuery,
  MarketDataProvider,
  MarketSnapshot,
  PriceBar,
  ProviderCapabilities,
} from '@chartwise/contracts';
import { createLogger, type Logger } from '@chartwise/logger';
import { PriceCache } from '@chartwise/price-cache';
import { AnalysisService, type MarketPayload } from '../src/services/analysis.service.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** 2025-01-15 14:30 UTC */
export const NOW = new Date(Date.UTC(2025, 0, 15, 14, 30));

export const SNAPSHOT: MarketSnapshot = {
  currentPrice: 12.64,
  previousClose: 12.18,
  volume: 38_500_000,
  marketCap: 12_345_678_901,
};

/**
 * Daily bars from close prices, one calendar day apart starting 2024-01-02.
 */
export function seriesFromCloses(closes: readonly number[]): PriceBar[] {
  const start = Date.UTC(2024, 0, 2);
  return closes.map((close, index) => ({
    timestamp: start + index * DAY_MS,
    open: close,
    high: close,
    low: close,
    close,
    volume: 1_000_000,
  }));
}

/**
 * `length` closes rising linearly from `from` to `to` inclusive.
 */
export function linearCloses(length: number, from: number, to: number): number[] {
  const step = (to - from) / (length - 1);
  return Array.from({ length }, (_, index) => from + index * step);
}

export interface FakeProvider extends MarketDataProvider {
  getDailyBars: Mock<(query: DailyBarsQuery) => Promise<PriceBar[]>>;
  getSnapshot: Mock<(symbol: string) => Promise<MarketSnapshot>>;
}

export function fakeProvider(bars: PriceBar[], snapshot: MarketSnapshot = SNAPSHOT): FakeProvider {
  const capabilities: ProviderCapabilities = {
    provider: 'fake',
    maxBarsPerRequest: 50_000,
    requiresAuthentication: false,
    rateLimits: { requestsPerMinute: 1000 },
  };

  return {
    getDailyBars: vi.fn<(query: DailyBarsQuery) => Promise<PriceBar[]>>().mockResolvedValue(bars),
    getSnapshot: vi.fn<(symbol: string) => Promise<MarketSnapshot>>().mockResolvedValue(snapshot),
    capabilities: () => capabilities,
  };
}

export function quietLogger(): Logger {
  return createLogger({ level: 'debug', console: false });
}

export function serviceWith(
  provider: MarketDataProvider,
  options: { allowPartialSignals?: boolean; dropWarmupRows?: boolean; logger?: Logger } = {}
): AnalysisService {
  return new AnalysisService({
    provider,
    cache: new PriceCache<MarketPayload>({ now: () => NOW.getTime() }),
    logger: options.logger ?? quietLogger(),
    now: () => NOW,
    lookbackDays: 365,
    recentRows: 10,
    dropWarmupRows: options.dropWarmupRows ?? true,
    allowPartialSignals: options.allowPartialSignals ?? false,
  });
}
