/**
 * Argument parsers for the command line
 */

import { InvalidArgumentError } from 'commander';
import { OUTPUT_FORMATS, type OutputFormat } from '../formatters/report-formatter.js';

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function parsePositiveInt(value: string): number {
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive whole number.');
  }
  return parsed;
}

/**
 * Parses `YYYY-MM-DD` as midnight UTC.
 */
export function parseDay(value: string): Date {
  const day = value.trim();
  const date = new Date(`${day}T00:00:00.000Z`);
  if (
    !DAY_PATTERN.test(day) ||
    Number.isNaN(date.getTime()) ||
    date.toISOString().slice(0, 10) !== day
  ) {
    throw new InvalidArgumentError('Expected a date as YYYY-MM-DD.');
  }
  return date;
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}
