import type { IndicatorValue } from '@chartwise/contracts';
import { emaSpan, exponentialSmoothing } from './smoothing.js';

export interface MacdSeries {
  macd: IndicatorValue[];
  signal: IndicatorValue[];
  histogram: IndicatorValue[];
}

/**
 * Span EMA of a close series, seeded at the first close.
 */
export function emaSeries(values: readonly number[], span: number): IndicatorValue[] {
  return exponentialSmoothing(values, emaSpan(span));
}

/**
 * MACD line, signal line and histogram, row-aligned with `closes`.
 *
 * Both EMAs seed at `closes[0]` and the signal EMA seeds at the first MACD
 * value, so every position of a non-empty series is defined.
 */
export function macdSeries(
  closes: readonly number[],
  fast = 12,
  slow = 26,
  signalLength = 9
): MacdSeries {
  const fastSeries = emaSeries(closes, fast);
  const slowSeries = emaSeries(closes, slow);

  const macd = fastSeries.map((fastValue, index) => {
    const slowValue = slowSeries[index] ?? null;
    if (fastValue === null || slowValue === null) {
      return null;
    }
    return fastValue - slowValue;
  });

  const signal = exponentialSmoothing(macd, emaSpan(signalLength));

  const histogram = macd.map((macdValue, index) => {
    const signalValue = signal[index] ?? null;
    if (macdValue === null || signalValue === null) {
      return null;
    }
    return macdValue - signalValue;
  });

  return { macd, signal, histogram };
}
