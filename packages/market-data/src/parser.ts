/**
 * @fileoverview Normalisation of provider rows into PriceBars.
 *
 * Providers deliver rows keyed by a date string or epoch value, sometimes out
 * of order and with repeated timestamps at session boundaries. This module
 * converts them into validated, ordered, unique bars.
 *
 * @module @trendline/market-data/parser
 */

import type { PriceBar, RawBarRow } from '@trendline/contracts';
import { validateBar } from './bar-series.js';

/**
 * Converts a provider date value to epoch milliseconds.
 *
 * @returns epoch ms, or NaN if the value cannot be parsed
 */
export function toEpochMs(date: string | number): number {
  if (typeof date === 'number') {
    return date;
  }
  return new Date(date).getTime();
}

/**
 * Parses one provider row.
 *
 * @throws Error (InvalidBarError for field violations) if the row is malformed
 */
export function parseBarRow(row: RawBarRow, index: number): PriceBar {
  const timestamp = toEpochMs(row.date);
  if (Number.isNaN(timestamp)) {
    throw new Error(`Invalid timestamp at row ${index}: ${String(row.date)}`);
  }

  const bar: PriceBar = {
    timestamp,
    open: row.open,
    high: row.high,
    low: row.low,
    close: row.close,
    volume: row.volume,
  };
  validateBar(bar, index);
  return bar;
}

export interface ParseResult {
  /** Valid bars, ascending by timestamp, one per timestamp */
  bars: PriceBar[];

  /** Rows that failed to parse, with their original index */
  errors: Array<{ index: number; row: RawBarRow; error: Error }>;

  /** Number of rows dropped because a later row had the same timestamp */
  duplicates: number;
}

/**
 * Parses an array of provider rows.
 *
 * Collects per-row errors instead of throwing; the caller decides whether a
 * partial result is acceptable. Rows are sorted by time and, when two rows
 * share a timestamp, the later row in the input wins.
 *
 * @example
 * ```typescript
 * const { bars, errors } = parseBarRows(rows);
 * if (errors.length > 0) {
 *   logger.warn('Dropped malformed rows', { count: errors.length });
 * }
 * ```
 */
export function parseBarRows(rows: readonly RawBarRow[]): ParseResult {
  const byTimestamp = new Map<number, PriceBar>();
  const errors: ParseResult['errors'] = [];
  let duplicates = 0;

  rows.forEach((row, index) => {
    try {
      const bar = parseBarRow(row, index);
      if (byTimestamp.has(bar.timestamp)) {
        duplicates += 1;
      }
      byTimestamp.set(bar.timestamp, bar);
    } catch (error) {
      errors.push({
        index,
        row,
        error: error instanceof Error ? error : new Error(String(error)),
      });
    }
  });

  const bars = Array.from(byTimestamp.values()).sort((a, b) => a.timestamp - b.timestamp);

  return { bars, errors, duplicates };
}
