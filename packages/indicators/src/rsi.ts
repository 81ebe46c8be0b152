import type { IndicatorValue } from '@chartwise/contracts';
import { exponentialSmoothing, rsiSmoothing } from './smoothing.js';

/**
 * Wilder RSI over the whole series.
 *
 * Gains and losses are smoothed independently with alpha = 1/period, seeded
 * at the first change (index 1). Index 0 has no change and stays `null`.
 * When the smoothed loss is zero the ratio is infinite and RSI saturates to
 * 100, including a flat series where both averages are zero.
 */
export function rsiSeries(closes: readonly number[], period = 14): IndicatorValue[] {
  if (period < 1) {
    throw new RangeError(`RSI period must be positive, got ${period}`);
  }

  const gains: IndicatorValue[] = [];
  const losses: IndicatorValue[] = [];
  let previous: number | null = null;

  for (const close of closes) {
    if (previous === null) {
      gains.push(null);
      losses.push(null);
    } else {
      const change = close - previous;
      gains.push(Math.max(change, 0));
      losses.push(Math.max(-change, 0));
    }
    previous = close;
  }

  const alpha = rsiSmoothing(period - 1);
  const avgGains = exponentialSmoothing(gains, alpha);
  const avgLosses = exponentialSmoothing(losses, alpha);

  return avgGains.map((avgGain, i) => {
    const avgLoss = avgLosses[i] ?? null;
    if (avgGain === null || avgLoss === null) {
      return null;
    }
    if (avgLoss === 0) {
      return 100;
    }
    const rs = avgGain / avgLoss;
    return 100 - 100 / (1 + rs);
  });
}
