import type { IndicatorValue } from '@chartwise/contracts';

/**
 * Applies `reducer` to every trailing window of `period` values.
 *
 * Positions before `period - 1` have no full window and are `null`.
 */
export function rollingWindow(
  values: readonly number[],
  period: number,
  reducer: (window: readonly number[]) => number
): IndicatorValue[] {
  if (!Number.isInteger(period) || period < 1) {
    throw new RangeError(`Window period must be a positive integer, got ${period}`);
  }

  return values.map((_, index) => {
    if (index < period - 1) {
      return null;
    }
    return reducer(values.slice(index - period + 1, index + 1));
  });
}

const isFlat = (window: readonly number[]): boolean =>
  window.every((value) => value === window[0]);

/**
 * Neumaier-compensated sum.
 */
export function compensatedSum(values: readonly number[]): number {
  let sum = 0;
  let compensation = 0;
  for (const value of values) {
    const next = sum + value;
    compensation +=
      Math.abs(sum) >= Math.abs(value) ? sum - next + value : value - next + sum;
    sum = next;
  }
  return sum + compensation;
}

/**
 * Arithmetic mean. A flat window returns its value exactly.
 */
export const mean = (window: readonly number[]): number => {
  const [first] = window;
  if (first !== undefined && isFlat(window)) {
    return first;
  }
  return compensatedSum(window) / window.length;
};

/**
 * Sample standard deviation (divides by n - 1). Exactly 0 on a flat window.
 */
export const sampleStdDev = (window: readonly number[]): number => {
  if (isFlat(window)) {
    return 0;
  }
  const avg = mean(window);
  const squared = compensatedSum(window.map((value) => (value - avg) ** 2));
  return Math.sqrt(squared / (window.length - 1));
};

/**
 * Trailing simple moving average.
 */
export function smaSeries(values: readonly number[], period: number): IndicatorValue[] {
  return rollingWindow(values, period, mean);
}

/**
 * Trailing sample standard deviation. Needs at least two values per window.
 */
export function rollingStdDev(values: readonly number[], period: number): IndicatorValue[] {
  if (period < 2) {
    throw new RangeError(`Sample standard deviation needs a window of at least 2, got ${period}`);
  }
  return rollingWindow(values, period, sampleStdDev);
}
