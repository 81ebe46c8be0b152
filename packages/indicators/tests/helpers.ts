import type { IndicatorRow, PriceBar } from '@chartwise/contracts';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Builds a daily series from close prices, one calendar day apart starting 2024-01-02.
 */
export function seriesFromCloses(closes: readonly number[], stepDays = 1): PriceBar[] {
  const start = Date.UTC(2024, 0, 2);
  return closes.map((close, index) => ({
    timestamp: start + index * stepDays * DAY_MS,
    open: close,
    high: close,
    low: close,
    close,
    volume: 1_000_000,
  }));
}

export function constantCloses(length: number, value: number): number[] {
  return Array.from({ length }, () => value);
}

/**
 * `length` closes rising linearly from `from` to `to` inclusive.
 */
export function linearCloses(length: number, from: number, to: number): number[] {
  const step = (to - from) / (length - 1);
  return Array.from({ length }, (_, index) => from + index * step);
}

export function makeRow(overrides: Partial<IndicatorRow> = {}): IndicatorRow {
  return {
    timestamp: Date.UTC(2024, 11, 31),
    open: 100,
    high: 101,
    low: 99,
    close: 100,
    volume: 1_000_000,
    rsi14: 50,
    macd: 0.5,
    macdSignal: 0.25,
    sma50: 95,
    sma200: 90,
    bbUpper: 105,
    bbLower: 95,
    ...overrides,
  };
}
