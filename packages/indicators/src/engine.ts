/**
 * Indicator pipeline: turns a daily price series into a row-aligned indicator table.
 *
 * The pipeline is a pure function of its input. It never mutates the series,
 * never throws for a well-formed one (including an empty series) and marks
 * every value that lacks history as `null` instead of substituting a default.
 */

import type { IndicatorRow, IndicatorValue, PriceSeries } from '@chartwise/contracts';
import { INDICATOR_FIELDS } from '@chartwise/contracts';
import { rsiSeries } from './rsi.js';
import { macdSeries } from './macd.js';
import { smaSeries } from './rolling.js';
import { bollingerSeries } from './bollinger.js';

export const RSI_PERIOD = 14;
export const MACD_FAST = 12;
export const MACD_SLOW = 26;
export const MACD_SIGNAL = 9;
export const SMA_FAST = 50;
export const SMA_SLOW = 200;
export const BOLLINGER_PERIOD = 20;
export const BOLLINGER_STD_DEV = 2;

/**
 * Bars needed before every indicator of a row is defined (SMA200 dominates).
 */
export const WARMUP_BARS = SMA_SLOW;

/**
 * Computes RSI(14), MACD(12, 26, 9), SMA(50), SMA(200) and Bollinger(20, 2)
 * for every bar of `series`.
 *
 * @returns One frozen row per input bar, in input order
 *
 * @example
 * ```typescript
 * const rows = computeIndicators(bars);
 * const latest = latestRow(rows);
 * if (latest && isWarmedUp(latest)) {
 *   console.log(evaluateSignals(latest));
 * }
 * ```
 */
export function computeIndicators(series: PriceSeries): IndicatorRow[] {
  if (series.length === 0) {
    return [];
  }

  const closes = series.map((bar) => bar.close);

  const rsi = rsiSeries(closes, RSI_PERIOD);
  const macd = macdSeries(closes, MACD_FAST, MACD_SLOW, MACD_SIGNAL);
  const sma50 = smaSeries(closes, SMA_FAST);
  const sma200 = smaSeries(closes, SMA_SLOW);
  const bands = bollingerSeries(closes, BOLLINGER_PERIOD, BOLLINGER_STD_DEV);

  const at = (values: IndicatorValue[], index: number): IndicatorValue => values[index] ?? null;

  return series.map((bar, index) =>
    Object.freeze({
      timestamp: bar.timestamp,
      open: bar.open,
      high: bar.high,
      low: bar.low,
      close: bar.close,
      volume: bar.volume,
      rsi14: at(rsi, index),
      macd: at(macd.macd, index),
      macdSignal: at(macd.signal, index),
      sma50: at(sma50, index),
      sma200: at(sma200, index),
      bbUpper: at(bands.upper, index),
      bbLower: at(bands.lower, index),
    })
  );
}

/**
 * True when every indicator on the row is defined.
 */
export function isWarmedUp(row: IndicatorRow): boolean {
  return INDICATOR_FIELDS.every((field) => row[field] !== null);
}

/**
 * Drops rows that still carry undefined indicators.
 *
 * The warm-up rows are always a prefix, so this keeps the tail from the first
 * fully computed row.
 */
export function dropWarmupRows(rows: readonly IndicatorRow[]): IndicatorRow[] {
  return rows.filter(isWarmedUp);
}

/**
 * Last row of the table, or `null` for an empty table.
 */
export function latestRow(rows: readonly IndicatorRow[]): IndicatorRow | null {
  return rows[rows.length - 1] ?? null;
}
