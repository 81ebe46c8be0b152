/**
 * Analysis report formatter
 * Supports multiple output formats with deterministic output
 */

import type { IndicatorRow, IndicatorValue, SignalTone } from '@chartwise/contracts';
import { WARMUP_BARS } from '@chartwise/indicators';
import type { AnalysisReport } from '../services/analysis.service.js';

export type OutputFormat = 'text' | 'json' | 'markdown';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json', 'markdown'];

export const NO_DATA_MESSAGE = 'No data available right now.';

const NOT_AVAILABLE = 'N/A';
const UNDEFINED_INDICATOR = '—';

const TONE_MARKERS: Record<SignalTone, string> = {
  bullish: '[+]',
  bearish: '[-]',
  neutral: '[=]',
};

/**
 * Marker printed in front of a signal label.
 */
export function toneMarker(tone: SignalTone): string {
  return TONE_MARKERS[tone];
}

/**
 * Formatter for analysis reports
 */
export class ReportFormatter {
  /**
   * Format report in specified format
   */
  format(report: AnalysisReport, format: OutputFormat = 'text'): string {
    switch (format) {
      case 'json':
        return this.formatAsJSON(report);
      case 'markdown':
        return this.formatAsMarkdown(report);
      case 'text':
      default:
        return this.formatAsText(report);
    }
  }

  /**
   * Format as plain text (default)
   */
  private formatAsText(report: AnalysisReport): string {
    const lines: string[] = [];

    lines.push(`Market Analysis: ${report.symbol} (${report.asOf})`);
    lines.push('='.repeat(50));
    lines.push('');

    lines.push('Current Metrics:');
    for (const [label, value] of this.metrics(report)) {
      lines.push(`  ${label}: ${value}`);
    }
    lines.push('');

    if (report.rows.length === 0) {
      lines.push(NO_DATA_MESSAGE);
      lines.push('');
      lines.push(this.footer(report));
      return lines.join('\n');
    }

    lines.push('Recent Price Data:');
    lines.push(
      `  ${this.padRight('Date', 12)}${['Open', 'High', 'Low', 'Close']
        .map((h) => this.padRight(h, 10))
        .join('')}Volume`
    );
    for (const row of report.rows) {
      lines.push(
        `  ${this.padRight(this.formatDate(row.timestamp), 12)}${[row.open, row.high, row.low, row.close]
          .map((v) => this.padRight(v.toFixed(2), 10))
          .join('')}${this.formatVolume(row.volume)}`
      );
    }
    lines.push('');

    if (report.latest) {
      lines.push(`Latest Indicators (${this.formatDate(report.latest.timestamp)}):`);
      for (const [label, value] of this.indicators(report.latest)) {
        lines.push(`  ${label}: ${value}`);
      }
      lines.push('');
    }

    lines.push('Quick Insights:');
    for (const line of this.insights(report)) {
      lines.push(`  ${line}`);
    }
    lines.push('');

    lines.push(this.footer(report));

    return lines.join('\n');
  }

  /**
   * Format as JSON
   */
  private formatAsJSON(report: AnalysisReport): string {
    return JSON.stringify(report, null, 2);
  }

  /**
   * Format as markdown
   */
  private formatAsMarkdown(report: AnalysisReport): string {
    const lines: string[] = [];

    lines.push(`# ${report.symbol} Market Analysis`);
    lines.push('');
    lines.push(`_As of ${report.asOf}_`);
    lines.push('');

    lines.push('## Current Metrics');
    lines.push('');
    for (const [label, value] of this.metrics(report)) {
      lines.push(`- **${label}**: ${value}`);
    }
    lines.push('');

    if (report.rows.length === 0) {
      lines.push(NO_DATA_MESSAGE);
      lines.push('');
      lines.push(`_${this.footer(report)}_`);
      return lines.join('\n');
    }

    lines.push('## Recent Price Data');
    lines.push('');
    lines.push('| Date | Open | High | Low | Close | Volume |');
    lines.push('|------|------|------|-----|-------|--------|');
    for (const row of report.rows) {
      const prices = [row.open, row.high, row.low, row.close].map((v) => v.toFixed(2));
      lines.push(
        `| ${this.formatDate(row.timestamp)} | ${prices.join(' | ')} | ${this.formatVolume(row.volume)} |`
      );
    }
    lines.push('');

    if (report.latest) {
      lines.push('## Latest Indicators');
      lines.push('');
      lines.push('| Indicator | Value |');
      lines.push('|-----------|-------|');
      for (const [label, value] of this.indicators(report.latest)) {
        lines.push(`| ${label} | ${value} |`);
      }
      lines.push('');
    }

    lines.push('## Quick Insights');
    lines.push('');
    for (const line of this.insights(report)) {
      lines.push(`- ${line}`);
    }
    lines.push('');

    lines.push(`_${this.footer(report)}_`);

    return lines.join('\n');
  }

  private metrics(report: AnalysisReport): Array<[string, string]> {
    const { currentPrice, previousClose, volume, marketCap } = report.snapshot;
    return [
      ['Current Price', currentPrice !== null ? this.formatPrice(currentPrice) : NOT_AVAILABLE],
      ['Previous Close', previousClose !== null ? this.formatPrice(previousClose) : NOT_AVAILABLE],
      ['Volume', volume !== null ? this.formatVolume(volume) : NOT_AVAILABLE],
      ['Market Cap', marketCap !== null ? this.formatMarketCap(marketCap) : NOT_AVAILABLE],
    ];
  }

  private indicators(row: IndicatorRow): Array<[string, string]> {
    return [
      ['RSI(14)', this.formatIndicator(row.rsi14, 2)],
      ['MACD', this.formatIndicator(row.macd, 4)],
      ['MACD Signal', this.formatIndicator(row.macdSignal, 4)],
      ['SMA50', this.formatIndicator(row.sma50, 2)],
      ['SMA200', this.formatIndicator(row.sma200, 2)],
      ['BB Upper', this.formatIndicator(row.bbUpper, 2)],
      ['BB Lower', this.formatIndicator(row.bbLower, 2)],
    ];
  }

  /**
   * One line per signal, preceded by a notice when the rules could not all run.
   */
  private insights(report: AnalysisReport): string[] {
    switch (report.signalStatus) {
      case 'insufficient-history':
        return [
          `[!] Not enough history for signals: need ${WARMUP_BARS} bars, have ${report.barCount}`,
        ];
      case 'partial':
        return [
          `[!] Partial signals: ${report.missingFields.join(', ')} not yet defined`,
          ...report.signals.map((s) => `${toneMarker(s.tone)} ${s.label}`),
        ];
      case 'no-data':
        return [NO_DATA_MESSAGE];
      case 'complete':
      default:
        return report.signals.map((s) => `${toneMarker(s.tone)} ${s.label}`);
    }
  }

  private footer(report: AnalysisReport): string {
    const generated = `${report.generatedAt.slice(0, 10)} ${report.generatedAt.slice(11, 16)}`;
    return `Updated: ${generated} | Source: ${report.source} | Not investment advice`;
  }

  private formatPrice(price: number): string {
    return `$${price.toFixed(2)}`;
  }

  private formatVolume(volume: number): string {
    return Math.round(volume).toLocaleString('en-US');
  }

  private formatMarketCap(marketCap: number): string {
    return `$${(marketCap / 1e9).toFixed(2)}B`;
  }

  private formatIndicator(value: IndicatorValue, digits: number): string {
    return value === null ? UNDEFINED_INDICATOR : value.toFixed(digits);
  }

  private formatDate(timestamp: number): string {
    return new Date(timestamp).toISOString().slice(0, 10);
  }

  private padRight(str: string, length: number): string {
    return str.padEnd(length);
  }
}
