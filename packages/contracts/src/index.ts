/**
 * @fileoverview Main entry point for @chartwise/contracts.
 *
 * @module @chartwise/contracts
 */

// Market data types
export type {
  PriceBar,
  PriceSeries,
  MarketSnapshot,
  MarketData,
  DailyBarsQuery,
  ProviderCapabilities,
  MarketDataProvider,
} from './market.js';

export { EMPTY_SNAPSHOT } from './market.js';

// Indicator table and signals
export type {
  IndicatorValue,
  IndicatorRow,
  IndicatorField,
  SignalTone,
  SignalDescriptor,
} from './indicators.js';

export { INDICATOR_FIELDS, Signal } from './indicators.js';

// Error classes and guards
export {
  ChartwiseError,
  InsufficientHistoryError,
  ProviderRateLimitError,
  SymbolResolutionError,
  isChartwiseError,
  isInsufficientHistoryError,
  isProviderRateLimitError,
  isSymbolResolutionError,
} from './errors.js';
