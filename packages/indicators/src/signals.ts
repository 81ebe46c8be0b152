/**
 * Rule-based reduction of the latest indicator row into qualitative signals.
 *
 * Rule order (which is also output order):
 * 1. Trend: close > SMA50 > SMA200 => StrongBullish, else close > SMA50 => ModerateBullish
 * 2. RSI extreme: > 70 => Overbought, else < 30 => Oversold
 * 3. MACD: macd > signal => BullishMomentum, otherwise BearishMomentum
 * 4. Neutral, only when rules 1 and 2 produced nothing
 */

import type { IndicatorField, IndicatorRow, SignalDescriptor } from '@chartwise/contracts';
import { INDICATOR_FIELDS, InsufficientHistoryError, Signal } from '@chartwise/contracts';
import { WARMUP_BARS } from './engine.js';

export const RSI_OVERBOUGHT = 70;
export const RSI_OVERSOLD = 30;

const trendSignal = (close: number, sma50: number, sma200: number | null): Signal | null => {
  if (!(close > sma50)) {
    return null;
  }
  return sma200 !== null && sma50 > sma200 ? Signal.StrongBullish : Signal.ModerateBullish;
};

const rsiSignal = (rsi14: number): Signal | null => {
  if (rsi14 > RSI_OVERBOUGHT) {
    return Signal.Overbought;
  }
  if (rsi14 < RSI_OVERSOLD) {
    return Signal.Oversold;
  }
  return null;
};

const macdSignal = (macd: number, signal: number): Signal =>
  macd > signal ? Signal.BullishMomentum : Signal.BearishMomentum;

/**
 * Fields of `row` that are still undefined, in table order.
 */
export function missingIndicatorFields(row: IndicatorRow): IndicatorField[] {
  return INDICATOR_FIELDS.filter((field) => row[field] === null);
}

/**
 * Evaluates the full rule set on a fully computed row.
 *
 * @throws InsufficientHistoryError if any indicator on the row is undefined
 *
 * @example
 * ```typescript
 * evaluateSignals(latest);
 * // [Signal.StrongBullish, Signal.Overbought, Signal.BullishMomentum]
 * ```
 */
export function evaluateSignals(latest: IndicatorRow): Signal[] {
  const { rsi14, macd, macdSignal: signalLine, sma50, sma200 } = latest;

  if (
    rsi14 === null ||
    macd === null ||
    signalLine === null ||
    sma50 === null ||
    sma200 === null ||
    latest.bbUpper === null ||
    latest.bbLower === null
  ) {
    const missingFields = missingIndicatorFields(latest);
    throw new InsufficientHistoryError(
      `Cannot evaluate signals: ${missingFields.join(', ')} undefined on the latest row`,
      { missingFields, required: WARMUP_BARS, timestamp: latest.timestamp }
    );
  }

  const signals: Signal[] = [];

  const trend = trendSignal(latest.close, sma50, sma200);
  if (trend) {
    signals.push(trend);
  }

  const extreme = rsiSignal(rsi14);
  if (extreme) {
    signals.push(extreme);
  }

  signals.push(macdSignal(macd, signalLine));

  if (!trend && !extreme) {
    signals.push(Signal.Neutral);
  }

  return signals;
}

/**
 * Reduced rule set for rows that are not fully warmed up.
 *
 * Each rule runs only when the fields it reads are defined. Without SMA200 the
 * trend rule can only yield ModerateBullish. Neutral is appended when the
 * trend and RSI rules both ran and produced nothing. Never throws.
 */
export function evaluateAvailableSignals(row: IndicatorRow): Signal[] {
  const signals: Signal[] = [];
  const { rsi14, macd, macdSignal: signalLine, sma50, sma200 } = row;

  const trend = sma50 !== null ? trendSignal(row.close, sma50, sma200) : null;
  if (trend) {
    signals.push(trend);
  }

  const extreme = rsi14 !== null ? rsiSignal(rsi14) : null;
  if (extreme) {
    signals.push(extreme);
  }

  if (macd !== null && signalLine !== null) {
    signals.push(macdSignal(macd, signalLine));
  }

  if (sma50 !== null && rsi14 !== null && !trend && !extreme) {
    signals.push(Signal.Neutral);
  }

  return signals;
}

const DESCRIPTORS: Record<Signal, Omit<SignalDescriptor, 'signal'>> = {
  [Signal.StrongBullish]: { tone: 'bullish', label: 'Strong bullish trend' },
  [Signal.ModerateBullish]: { tone: 'bullish', label: 'Moderate bullish trend' },
  [Signal.Overbought]: { tone: 'bearish', label: 'Overbought – possible pullback' },
  [Signal.Oversold]: { tone: 'bullish', label: 'Oversold – possible rebound' },
  [Signal.BullishMomentum]: { tone: 'bullish', label: 'Bullish momentum' },
  [Signal.BearishMomentum]: { tone: 'bearish', label: 'Bearish momentum' },
  [Signal.Neutral]: { tone: 'neutral', label: 'Neutral – no strong trend or RSI extreme' },
};

/**
 * Presentation label and tone for a signal.
 */
export function describeSignal(signal: Signal): SignalDescriptor {
  return { signal, ...DESCRIPTORS[signal] };
}
