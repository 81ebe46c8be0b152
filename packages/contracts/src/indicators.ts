/**
 * @fileoverview Indicator table and signal vocabulary.
 *
 * @module @chartwise/contracts/indicators
 */

import type { PriceBar } from './market.js';

/**
 * A computed indicator value, or `null` when the row does not yet have enough
 * history for it. `null` is never replaced by zero or any other default.
 */
export type IndicatorValue = number | null;

/**
 * One input bar plus the indicators derived at its position.
 *
 * Rows are frozen once built.
 */
export interface IndicatorRow extends PriceBar {
  /** RSI(14), Wilder smoothing. `null` at index 0 */
  readonly rsi14: IndicatorValue;

  /** EMA(12) - EMA(26) of close */
  readonly macd: IndicatorValue;

  /** EMA(9) of the MACD line */
  readonly macdSignal: IndicatorValue;

  /** 50-bar simple moving average. `null` before index 49 */
  readonly sma50: IndicatorValue;

  /** 200-bar simple moving average. `null` before index 199 */
  readonly sma200: IndicatorValue;

  /** 20-bar mean + 2 sample standard deviations. `null` before index 19 */
  readonly bbUpper: IndicatorValue;

  /** 20-bar mean - 2 sample standard deviations. `null` before index 19 */
  readonly bbLower: IndicatorValue;
}

/**
 * Names of the computed fields on {@link IndicatorRow}.
 */
export type IndicatorField =
  | 'rsi14'
  | 'macd'
  | 'macdSignal'
  | 'sma50'
  | 'sma200'
  | 'bbUpper'
  | 'bbLower';

/**
 * Computed fields in table order.
 */
export const INDICATOR_FIELDS: readonly IndicatorField[] = [
  'rsi14',
  'macd',
  'macdSignal',
  'sma50',
  'sma200',
  'bbUpper',
  'bbLower',
];

/**
 * Qualitative signals derived from the latest fully computed row.
 */
export enum Signal {
  /** close > SMA50 > SMA200 */
  StrongBullish = 'StrongBullish',
  /** close > SMA50, SMA50 not above SMA200 */
  ModerateBullish = 'ModerateBullish',
  /** RSI above 70 */
  Overbought = 'Overbought',
  /** RSI below 30 */
  Oversold = 'Oversold',
  /** MACD above its signal line */
  BullishMomentum = 'BullishMomentum',
  /** MACD at or below its signal line */
  BearishMomentum = 'BearishMomentum',
  /** Neither a trend nor an RSI extreme fired */
  Neutral = 'Neutral',
}

/**
 * Direction a signal points in, used for colouring and markers.
 */
export type SignalTone = 'bullish' | 'bearish' | 'neutral';

/**
 * A signal with its presentation label.
 */
export interface SignalDescriptor {
  signal: Signal;
  tone: SignalTone;
  label: string;
}
