/**
 * @chartwise/indicators
 *
 * Daily indicator pipeline (RSI, MACD, SMA, Bollinger Bands) and the rule
 * engine that reduces its latest row into signals. Everything here is pure
 * and synchronous.
 *
 * @example
 * ```typescript
 * import { computeIndicators, evaluateSignals, latestRow } from '@chartwise/indicators';
 *
 * const rows = computeIndicators(bars);
 * const latest = latestRow(rows);
 * const signals = latest ? evaluateSignals(latest) : [];
 * ```
 *
 * @packageDocumentation
 */

export {
  computeIndicators,
  isWarmedUp,
  dropWarmupRows,
  latestRow,
  RSI_PERIOD,
  MACD_FAST,
  MACD_SLOW,
  MACD_SIGNAL,
  SMA_FAST,
  SMA_SLOW,
  BOLLINGER_PERIOD,
  BOLLINGER_STD_DEV,
  WARMUP_BARS,
} from './engine.js';

export {
  evaluateSignals,
  evaluateAvailableSignals,
  missingIndicatorFields,
  describeSignal,
  RSI_OVERBOUGHT,
  RSI_OVERSOLD,
} from './signals.js';

export { rsiSmoothing, emaSpan, exponentialSmoothing } from './smoothing.js';
export { rsiSeries } from './rsi.js';
export { emaSeries, macdSeries } from './macd.js';
export type { MacdSeries } from './macd.js';
export {
  rollingWindow,
  smaSeries,
  rollingStdDev,
  mean,
  sampleStdDev,
  compensatedSum,
} from './rolling.js';
export { bollingerSeries } from './bollinger.js';
export type { BollingerSeries } from './bollinger.js';
