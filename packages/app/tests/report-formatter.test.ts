/**
 * Tests for the report formatter
 */

import { describe, it, expect } from 'vitest';
import type { IndicatorRow } from '@chartwise/contracts';
import { Signal } from '@chartwise/contracts';
import { describeSignal } from '@chartwise/indicators';
import { ReportFormatter, toneMarker } from '../src/formatters/report-formatter.js';
import type { AnalysisReport } from '../src/services/analysis.service.js';
import { SNAPSHOT } from './helpers.js';

const row: IndicatorRow = {
  timestamp: Date.UTC(2025, 0, 14),
  open: 12.4,
  high: 12.95,
  low: 12.1,
  close: 12.8,
  volume: 41_250_000,
  rsi14: 71.234,
  macd: 0.123456,
  macdSignal: 0.1,
  sma50: 11.5,
  sma200: null,
  bbUpper: 13.25,
  bbLower: 10.75,
};

function report(overrides: Partial<AnalysisReport> = {}): AnalysisReport {
  return {
    symbol: 'RIVN',
    asOf: '2025-01-15',
    generatedAt: '2025-01-15T14:30:00.000Z',
    snapshot: SNAPSHOT,
    barCount: 250,
    rows: [row],
    latest: row,
    signals: [Signal.StrongBullish, Signal.Overbought, Signal.BullishMomentum].map(describeSignal),
    signalStatus: 'complete',
    missingFields: [],
    source: 'Polygon API',
    cacheHit: false,
    ...overrides,
  };
}

const FOOTER = 'Updated: 2025-01-15 14:30 | Source: Polygon API | Not investment advice';

describe('ReportFormatter', () => {
  const formatter = new ReportFormatter();

  describe('text', () => {
    it('should start with the header and end with the footer', () => {
      const lines = formatter.format(report()).split('\n');

      expect(lines[0]).toBe('Market Analysis: RIVN (2025-01-15)');
      expect(lines[1]).toBe('='.repeat(50));
      expect(lines[lines.length - 1]).toBe(FOOTER);
    });

    it('should format the current metrics', () => {
      const lines = formatter.format(report(), 'text').split('\n');

      expect(lines.slice(3, 8)).toEqual([
        'Current Metrics:',
        '  Current Price: $12.64',
        '  Previous Close: $12.18',
        '  Volume: 38,500,000',
        '  Market Cap: $12.35B',
      ]);
    });

    it('should show N/A for absent metrics', () => {
      const lines = formatter
        .format(
          report({
            snapshot: { currentPrice: null, previousClose: null, volume: null, marketCap: null },
          })
        )
        .split('\n');

      expect(lines.slice(4, 8)).toEqual([
        '  Current Price: N/A',
        '  Previous Close: N/A',
        '  Volume: N/A',
        '  Market Cap: N/A',
      ]);
    });

    it('should render the price table to two decimals', () => {
      const lines = formatter.format(report()).split('\n');

      expect(lines).toContain('  Date        Open      High      Low       Close     Volume');
      expect(lines).toContain('  2025-01-14  12.40     12.95     12.10     12.80     41,250,000');
    });

    it('should render the latest indicators with a dash for undefined values', () => {
      const lines = formatter.format(report()).split('\n');
      const start = lines.indexOf('Latest Indicators (2025-01-14):');

      expect(start).toBeGreaterThan(0);
      expect(lines.slice(start + 1, start + 8)).toEqual([
        '  RSI(14): 71.23',
        '  MACD: 0.1235',
        '  MACD Signal: 0.1000',
        '  SMA50: 11.50',
        '  SMA200: —',
        '  BB Upper: 13.25',
        '  BB Lower: 10.75',
      ]);
    });

    it('should mark each insight with its tone', () => {
      const lines = formatter.format(report()).split('\n');
      const start = lines.indexOf('Quick Insights:');

      expect(lines.slice(start + 1, start + 4)).toEqual([
        '  [+] Strong bullish trend',
        '  [-] Overbought – possible pullback',
        '  [+] Bullish momentum',
      ]);
    });

    it('should explain suppressed signals on a short series', () => {
      const lines = formatter
        .format(
          report({
            barCount: 60,
            signals: [],
            signalStatus: 'insufficient-history',
            missingFields: ['sma200'],
          })
        )
        .split('\n');
      const start = lines.indexOf('Quick Insights:');

      expect(lines[start + 1]).toBe('  [!] Not enough history for signals: need 200 bars, have 60');
      expect(lines[start + 2]).toBe('');
    });

    it('should list partial signals after a notice', () => {
      const lines = formatter
        .format(
          report({
            signals: [Signal.ModerateBullish, Signal.Neutral].map(describeSignal),
            signalStatus: 'partial',
            missingFields: ['sma200'],
          })
        )
        .split('\n');
      const start = lines.indexOf('Quick Insights:');

      expect(lines.slice(start + 1, start + 4)).toEqual([
        '  [!] Partial signals: sma200 not yet defined',
        '  [+] Moderate bullish trend',
        '  [=] Neutral – no strong trend or RSI extreme',
      ]);
    });

    it('should replace the tables when there is no data', () => {
      const output = formatter.format(
        report({ rows: [], latest: null, signals: [], signalStatus: 'no-data', barCount: 0 })
      );
      const lines = output.split('\n');

      expect(lines).toContain('No data available right now.');
      expect(lines).not.toContain('Recent Price Data:');
      expect(lines).not.toContain('Quick Insights:');
      expect(lines[lines.length - 1]).toBe(FOOTER);
    });

    it('should be deterministic', () => {
      expect(formatter.format(report())).toBe(formatter.format(report()));
    });
  });

  describe('markdown', () => {
    it('should render metrics, tables and insights', () => {
      const lines = formatter.format(report(), 'markdown').split('\n');

      expect(lines[0]).toBe('# RIVN Market Analysis');
      expect(lines).toContain('- **Market Cap**: $12.35B');
      expect(lines).toContain('| 2025-01-14 | 12.40 | 12.95 | 12.10 | 12.80 | 41,250,000 |');
      expect(lines).toContain('| SMA200 | — |');
      expect(lines).toContain('- [-] Overbought – possible pullback');
      expect(lines[lines.length - 1]).toBe(`_${FOOTER}_`);
    });
  });

  describe('json', () => {
    it('should serialize the whole report', () => {
      const parsed: unknown = JSON.parse(formatter.format(report(), 'json'));

      expect(parsed).toEqual(report());
    });
  });
});

describe('toneMarker', () => {
  it('should map tones to markers', () => {
    expect(toneMarker('bullish')).toBe('[+]');
    expect(toneMarker('bearish')).toBe('[-]');
    expect(toneMarker('neutral')).toBe('[=]');
  });
});
