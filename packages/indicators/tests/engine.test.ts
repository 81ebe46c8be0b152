/**
 * @fileoverview Properties of the indicator table: alignment, purity,
 * warm-up boundaries and the reference scenarios.
 */

import { describe, it, expect } from 'vitest';
import { InsufficientHistoryError, Signal } from '@chartwise/contracts';
import {
  computeIndicators,
  dropWarmupRows,
  isWarmedUp,
  latestRow,
  WARMUP_BARS,
} from '../src/engine.js';
import { evaluateSignals } from '../src/signals.js';
import { constantCloses, linearCloses, seriesFromCloses } from './helpers.js';

describe('computeIndicators', () => {
  describe('shape', () => {
    it('should return an empty table for an empty series', () => {
      expect(computeIndicators([])).toEqual([]);
    });

    it.each([1, 5, 19, 20, 50, 199, 200, 250])(
      'should return one row per bar for %i bars',
      (length) => {
        const series = seriesFromCloses(linearCloses(Math.max(length, 2), 10, 20).slice(0, length));
        const rows = computeIndicators(series);

        expect(rows).toHaveLength(length);
        rows.forEach((row, index) => {
          expect(row.timestamp).toBe(series[index]?.timestamp);
          expect(row.close).toBe(series[index]?.close);
        });
      }
    );

    it('should carry the bar fields through unchanged', () => {
      const timestamp = Date.UTC(2024, 5, 3);
      const [row] = computeIndicators([{ timestamp, open: 41, high: 43, low: 40, close: 42, volume: 7 }]);

      expect(row).toMatchObject({ timestamp, open: 41, high: 43, low: 40, close: 42, volume: 7 });
    });
  });

  describe('purity', () => {
    it('should be deterministic', () => {
      const series = seriesFromCloses(linearCloses(220, 5, 9));
      expect(computeIndicators(series)).toEqual(computeIndicators(series));
    });

    it('should not mutate the input series', () => {
      const series = seriesFromCloses(linearCloses(60, 5, 9));
      const before = structuredClone(series);

      computeIndicators(series);

      expect(series).toEqual(before);
    });

    it('should return frozen rows', () => {
      const rows = computeIndicators(seriesFromCloses([1, 2, 3]));
      expect(rows.every((row) => Object.isFrozen(row))).toBe(true);
    });

    it('should depend on bar order only, not on timestamp gaps', () => {
      const closes = linearCloses(80, 30, 12);
      const daily = computeIndicators(seriesFromCloses(closes, 1));
      const sparse = computeIndicators(seriesFromCloses(closes, 3));

      const values = (rows: typeof daily) => rows.map((row) => ({ ...row, timestamp: 0 }));
      expect(values(sparse)).toEqual(values(daily));
    });
  });

  describe('warm-up', () => {
    const rows = computeIndicators(seriesFromCloses(linearCloses(250, 10, 35)));

    it('should leave RSI undefined only at index 0', () => {
      expect(rows[0]?.rsi14).toBeNull();
      expect(rows[1]?.rsi14).not.toBeNull();
    });

    it('should define MACD and its signal from index 0', () => {
      expect(rows[0]?.macd).toBe(0);
      expect(rows[0]?.macdSignal).toBe(0);
    });

    it('should define SMA50 from index 49', () => {
      expect(rows[48]?.sma50).toBeNull();
      expect(rows[49]?.sma50).not.toBeNull();
    });

    it('should define SMA200 from index 199', () => {
      expect(rows[198]?.sma200).toBeNull();
      expect(rows[199]?.sma200).not.toBeNull();
    });

    it('should define the Bollinger Bands from index 19', () => {
      expect(rows[18]?.bbUpper).toBeNull();
      expect(rows[18]?.bbLower).toBeNull();
      expect(rows[19]?.bbUpper).not.toBeNull();
      expect(rows[19]?.bbLower).not.toBeNull();
    });

    it('should keep lower band <= upper band wherever defined', () => {
      for (const row of rows) {
        if (row.bbUpper !== null && row.bbLower !== null) {
          expect(row.bbLower).toBeLessThanOrEqual(row.bbUpper);
        }
      }
    });
  });

  describe('flat series', () => {
    const rows = computeIndicators(seriesFromCloses(constantCloses(200, 20)));
    const latest = rows[199];

    it('should collapse averages and bands onto the price', () => {
      expect(latest?.sma50).toBe(20);
      expect(latest?.sma200).toBe(20);
      expect(latest?.bbUpper).toBe(20);
      expect(latest?.bbLower).toBe(20);
    });

    it('should keep MACD and signal at exactly zero', () => {
      expect(rows.every((row) => row.macd === 0 && row.macdSignal === 0)).toBe(true);
    });

    it('should saturate RSI to 100', () => {
      expect(rows.slice(1).every((row) => row.rsi14 === 100)).toBe(true);
    });

    it('should evaluate to Overbought and BearishMomentum', () => {
      expect(latest && evaluateSignals(latest)).toEqual([Signal.Overbought, Signal.BearishMomentum]);
    });
  });

  describe.each([7.77, 12.34, 20.1])('flat series at %s', (price) => {
    const rows = computeIndicators(seriesFromCloses(constantCloses(200, price)));
    const latest = rows[199];

    it('should keep both averages equal to the close', () => {
      expect(latest?.sma50).toBe(price);
      expect(latest?.sma200).toBe(price);
    });

    it('should collapse the bands onto the close', () => {
      expect(latest?.bbUpper).toBe(price);
      expect(latest?.bbLower).toBe(price);
    });

    it('should fire no trend signal', () => {
      expect(latest && evaluateSignals(latest)).toEqual([Signal.Overbought, Signal.BearishMomentum]);
    });
  });

  describe('steady uptrend', () => {
    const rows = computeIndicators(seriesFromCloses(linearCloses(250, 10, 35)));
    const latest = latestRow(rows);

    it('should order close > SMA50 > SMA200', () => {
      expect(latest).not.toBeNull();
      expect(latest?.close).toBeGreaterThan(latest?.sma50 ?? Infinity);
      expect(latest?.sma50).toBeGreaterThan(latest?.sma200 ?? Infinity);
    });

    it('should pin RSI at 100 and keep MACD above its signal', () => {
      expect(latest?.rsi14).toBe(100);
      expect(latest?.macd).toBeGreaterThan(latest?.macdSignal ?? Infinity);
    });

    it('should evaluate to StrongBullish, Overbought and BullishMomentum', () => {
      expect(latest && evaluateSignals(latest)).toEqual([
        Signal.StrongBullish,
        Signal.Overbought,
        Signal.BullishMomentum,
      ]);
    });
  });

  describe('short series', () => {
    const rows = computeIndicators(seriesFromCloses([10, 10.5, 10.2, 10.8, 11]));

    it('should leave every SMA and band undefined', () => {
      for (const row of rows) {
        expect(row.sma50).toBeNull();
        expect(row.sma200).toBeNull();
        expect(row.bbUpper).toBeNull();
        expect(row.bbLower).toBeNull();
      }
    });

    it('should refuse to evaluate signals on the latest row', () => {
      const latest = latestRow(rows);
      expect(latest).not.toBeNull();
      if (latest) {
        expect(() => evaluateSignals(latest)).toThrow(InsufficientHistoryError);
      }
    });
  });
});

describe('warm-up helpers', () => {
  it('isWarmedUp should be true only when every indicator is defined', () => {
    const rows = computeIndicators(seriesFromCloses(linearCloses(201, 10, 12)));

    expect(rows[198] && isWarmedUp(rows[198])).toBe(false);
    expect(rows[199] && isWarmedUp(rows[199])).toBe(true);
  });

  it('dropWarmupRows should keep the tail from index 199', () => {
    const series = seriesFromCloses(linearCloses(250, 10, 35));
    const kept = dropWarmupRows(computeIndicators(series));

    expect(kept).toHaveLength(250 - WARMUP_BARS + 1);
    expect(kept[0]?.timestamp).toBe(series[199]?.timestamp);
  });

  it('dropWarmupRows should return nothing for a short series', () => {
    expect(dropWarmupRows(computeIndicators(seriesFromCloses([1, 2, 3])))).toEqual([]);
  });

  it('latestRow should return null for an empty table', () => {
    expect(latestRow([])).toBeNull();
  });
});
