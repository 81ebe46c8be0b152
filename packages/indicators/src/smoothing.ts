/**
 * Recursive exponential smoothing shared by RSI and MACD.
 *
 * Every caller passes an explicit smoothing constant. The two presets below
 * are the only places a constant is derived from a period, so RSI
 * (center-of-mass convention) and MACD (span convention) cannot drift apart.
 */

import type { IndicatorValue } from '@chartwise/contracts';

/**
 * Smoothing constant for a center-of-mass parameter: `1 / (1 + com)`.
 *
 * Wilder's RSI(14) uses com = 13, i.e. alpha = 1/14.
 */
export function rsiSmoothing(centerOfMass: number): number {
  if (!(centerOfMass >= 0)) {
    throw new RangeError(`Center of mass must be >= 0, got ${centerOfMass}`);
  }
  return 1 / (1 + centerOfMass);
}

/**
 * Smoothing constant for a span parameter: `2 / (span + 1)`.
 */
export function emaSpan(span: number): number {
  if (!(span >= 1)) {
    throw new RangeError(`EMA span must be >= 1, got ${span}`);
  }
  return 2 / (span + 1);
}

/**
 * Unadjusted recursive EMA.
 *
 * Seeds at the first defined value (`ema = x`) and then applies
 * `ema += alpha * (x - ema)`, which equals `alpha * x + (1 - alpha) * ema`
 * and keeps a constant input exactly constant. Positions before the seed are
 * `null`; a `null` after the seed repeats the previous value.
 */
export function exponentialSmoothing(
  values: readonly IndicatorValue[],
  alpha: number
): IndicatorValue[] {
  if (!(alpha > 0 && alpha <= 1)) {
    throw new RangeError(`Smoothing constant must be in (0, 1], got ${alpha}`);
  }

  const smoothed: IndicatorValue[] = [];
  let current: number | null = null;

  for (const value of values) {
    if (value !== null) {
      current = current === null ? value : current + alpha * (value - current);
    }
    smoothed.push(current);
  }

  return smoothed;
}
