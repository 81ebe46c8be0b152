/**
 * Analysis service
 *
 * Fetches daily bars and the current snapshot for a symbol, computes the
 * indicator table and reduces the latest row to signals.
 */

import type {
  IndicatorField,
  IndicatorRow,
  MarketDataProvider,
  MarketSnapshot,
  PriceBar,
  SignalDescriptor,
} from '@chartwise/contracts';
import { SymbolResolutionError } from '@chartwise/contracts';
import {
  computeIndicators,
  describeSignal,
  dropWarmupRows,
  evaluateAvailableSignals,
  evaluateSignals,
  latestRow,
  missingIndicatorFields,
  WARMUP_BARS,
} from '@chartwise/indicators';
import type { PriceCache } from '@chartwise/price-cache';
import { measureSync, startTimer, type Logger } from '@chartwise/logger';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * How far the signal rules could run on the latest row.
 */
export type SignalStatus = 'complete' | 'partial' | 'insufficient-history' | 'no-data';

/**
 * Cached provider payload for one symbol and day.
 */
export interface MarketPayload {
  bars: PriceBar[];
  snapshot: MarketSnapshot;
}

export interface AnalysisReport {
  symbol: string;
  /** UTC day the analysis was requested for */
  asOf: string;
  /** ISO timestamp of report creation */
  generatedAt: string;
  snapshot: MarketSnapshot;
  /** Bars the indicators were computed over */
  barCount: number;
  /** Recent rows for display, oldest first */
  rows: IndicatorRow[];
  latest: IndicatorRow | null;
  signals: SignalDescriptor[];
  signalStatus: SignalStatus;
  missingFields: IndicatorField[];
  source: string;
  cacheHit: boolean;
}

export interface AnalysisOptions {
  lookbackDays: number;
  recentRows: number;
  dropWarmupRows: boolean;
  allowPartialSignals: boolean;
}

export interface AnalysisServiceConfig extends AnalysisOptions {
  provider: MarketDataProvider;
  cache: PriceCache<MarketPayload>;
  logger: Logger;
  now?: () => Date;
}

export const REPORT_SOURCE = 'Polygon API';

/**
 * Runs one analysis per call. Provider payloads are cached per symbol and UTC
 * day, so repeated requests on the same day reuse the fetched bars.
 */
export class AnalysisService {
  private readonly provider: MarketDataProvider;
  private readonly cache: PriceCache<MarketPayload>;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly defaults: AnalysisOptions;

  constructor(config: AnalysisServiceConfig) {
    this.provider = config.provider;
    this.cache = config.cache;
    this.logger = config.logger;
    this.now = config.now ?? (() => new Date());
    this.defaults = {
      lookbackDays: config.lookbackDays,
      recentRows: config.recentRows,
      dropWarmupRows: config.dropWarmupRows,
      allowPartialSignals: config.allowPartialSignals,
    };
  }

  /**
   * Analyzes `symbol` as of `asOf` (default: now).
   *
   * The cache key ignores `overrides.lookbackDays`; a payload cached earlier
   * the same day is reused as is. Provider errors propagate unchanged.
   */
  async analyze(
    symbol: string,
    asOf: Date = this.now(),
    overrides: Partial<AnalysisOptions> = {}
  ): Promise<AnalysisReport> {
    const options: AnalysisOptions = {
      lookbackDays: overrides.lookbackDays ?? this.defaults.lookbackDays,
      recentRows: overrides.recentRows ?? this.defaults.recentRows,
      dropWarmupRows: overrides.dropWarmupRows ?? this.defaults.dropWarmupRows,
      allowPartialSignals: overrides.allowPartialSignals ?? this.defaults.allowPartialSignals,
    };
    const ticker = symbol.trim().toUpperCase();
    if (!ticker) {
      throw new SymbolResolutionError('Symbol is required', { symbol, provider: 'polygon' });
    }
    const key = { symbol: ticker, asOf };

    const fetchTimer = startTimer();
    const { value: payload, source } = await this.cache.getOrLoadWithSource(key, () =>
      this.load(ticker, asOf, options.lookbackDays)
    );
    // A joined in-flight load fetched nothing for this call
    const cacheHit = source !== 'loader';

    this.logger.info('Market data ready', {
      symbol: ticker,
      count: payload.bars.length,
      cache: cacheHit ? 'hit' : 'miss',
      duration_ms: fetchTimer.stop(),
    });

    const { result: table, duration_ms } = measureSync(() => computeIndicators(payload.bars));
    this.logger.debug('Indicators computed', { symbol: ticker, count: table.length, duration_ms });

    const latest = latestRow(table);
    const { signals, signalStatus, missingFields } = this.evaluate(
      ticker,
      latest,
      options.allowPartialSignals
    );

    this.logger.info('Analysis complete', {
      symbol: ticker,
      signal_status: signalStatus,
      signals: signals.map((s) => s.signal),
    });

    return {
      symbol: ticker,
      asOf: asOf.toISOString().slice(0, 10),
      generatedAt: this.now().toISOString(),
      snapshot: payload.snapshot,
      barCount: payload.bars.length,
      rows: presentationRows(table, options),
      latest,
      signals,
      signalStatus,
      missingFields,
      source: REPORT_SOURCE,
      cacheHit,
    };
  }

  private async load(symbol: string, asOf: Date, lookbackDays: number): Promise<MarketPayload> {
    const from = new Date(asOf.getTime() - lookbackDays * DAY_MS);
    const [bars, snapshot] = await Promise.all([
      this.provider.getDailyBars({ symbol, from, to: asOf }),
      this.provider.getSnapshot(symbol),
    ]);
    return { bars, snapshot };
  }

  private evaluate(
    symbol: string,
    latest: IndicatorRow | null,
    allowPartialSignals: boolean
  ): { signals: SignalDescriptor[]; signalStatus: SignalStatus; missingFields: IndicatorField[] } {
    if (!latest) {
      return { signals: [], signalStatus: 'no-data', missingFields: [] };
    }

    const missingFields = missingIndicatorFields(latest);

    if (missingFields.length === 0) {
      return {
        signals: evaluateSignals(latest).map(describeSignal),
        signalStatus: 'complete',
        missingFields,
      };
    }

    if (allowPartialSignals) {
      return {
        signals: evaluateAvailableSignals(latest).map(describeSignal),
        signalStatus: 'partial',
        missingFields,
      };
    }

    this.logger.warn('Not enough history for signals', {
      symbol,
      required: WARMUP_BARS,
      missing: missingFields,
    });

    return { signals: [], signalStatus: 'insufficient-history', missingFields };
  }
}

/**
 * Rows shown in the recent-data table. When dropping warm-up rows would leave
 * nothing, the raw rows are shown instead.
 */
export function presentationRows(
  table: readonly IndicatorRow[],
  options: Pick<AnalysisOptions, 'dropWarmupRows' | 'recentRows'>
): IndicatorRow[] {
  const warmed = options.dropWarmupRows ? dropWarmupRows(table) : [...table];
  const rows = warmed.length > 0 ? warmed : [...table];
  return rows.slice(-options.recentRows);
}
