/**
 * @fileoverview Bar fixture loading.
 *
 * Fixtures stand in for the external market data provider: a JSON document
 * holding the request tags and the rows the provider returned.
 *
 * Fixture format:
 * {
 *   "symbol": "AAPL",
 *   "interval": "1d",
 *   "period": "6mo",
 *   "bars": [
 *     { "date": "2025-01-02T00:00:00.000Z", "open": 100, "high": 101, "low": 99, "close": 100.5, "volume": 15000 },
 *     ...
 *   ]
 * }
 *
 * @module @trendline/market-data/fixture
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { BarSeries } from '@trendline/contracts';
import { FixtureError } from '@trendline/contracts';
import { createBarSeries } from './bar-series.js';
import { parseBarRows } from './parser.js';

const rawBarRowSchema = z.object({
  date: z.union([z.string(), z.number()]),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number(),
});

export const barFixtureSchema = z.object({
  symbol: z.string().min(1),
  interval: z.string().min(1),
  period: z.string().min(1),
  bars: z.array(rawBarRowSchema),
});

export type BarFixture = z.infer<typeof barFixtureSchema>;

export interface LoadedFixture {
  series: BarSeries;

  /** Rows rejected by the parser, with the reason */
  skipped: Array<{ index: number; reason: string }>;

  duplicates: number;
}

/**
 * Reads and validates the fixture document at `path`.
 *
 * @throws FixtureError if the file is missing, is not JSON, or has the wrong shape
 */
export function readBarFixture(path: string): BarFixture {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? String(error.code) : undefined;
    throw new FixtureError(
      code === 'ENOENT' ? `Fixture file not found: ${path}` : `Failed to read fixture: ${path}`,
      { path, cause: code }
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new FixtureError(
      `Failed to parse fixture JSON: ${error instanceof Error ? error.message : String(error)}`,
      { path }
    );
  }

  const parsed = barFixtureSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'fixture';
    throw new FixtureError(`Invalid fixture: ${where}: ${issue?.message ?? 'unknown error'}`, {
      path,
      field: where,
    });
  }

  return parsed.data;
}

/**
 * Loads a fixture and builds a validated BarSeries from its rows.
 *
 * Malformed rows are skipped and reported; if no valid row remains the
 * series constructor raises NoDataError.
 *
 * @throws FixtureError | NoDataError
 */
export function loadBarFixture(path: string): LoadedFixture {
  const fixture = readBarFixture(path);
  const { bars, errors, duplicates } = parseBarRows(fixture.bars);

  const series = createBarSeries({
    symbol: fixture.symbol,
    interval: fixture.interval,
    period: fixture.period,
    bars,
  });

  return {
    series,
    skipped: errors.map(({ index, error }) => ({ index, reason: error.message })),
    duplicates,
  };
}
