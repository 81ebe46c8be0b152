import type { IndicatorValue } from '@chartwise/contracts';
import { rollingStdDev, smaSeries } from './rolling.js';

export interface BollingerSeries {
  middle: IndicatorValue[];
  upper: IndicatorValue[];
  lower: IndicatorValue[];
}

/**
 * Bollinger Bands: trailing mean plus/minus `multiplier` sample standard deviations.
 *
 * @invariant lower <= middle <= upper wherever defined
 */
export function bollingerSeries(
  closes: readonly number[],
  period = 20,
  multiplier = 2
): BollingerSeries {
  const middle = smaSeries(closes, period);
  const deviation = rollingStdDev(closes, period);

  const band = (sign: 1 | -1): IndicatorValue[] =>
    middle.map((mid, index) => {
      const std = deviation[index] ?? null;
      if (mid === null || std === null) {
        return null;
      }
      return mid + sign * multiplier * std;
    });

  return { middle, upper: band(1), lower: band(-1) };
}
