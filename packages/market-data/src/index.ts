/**
 * @trendline/market-data
 *
 * Construction, validation and loading of bar series. Everything that
 * touches provider data shapes or the filesystem lives here so the analysis
 * packages stay pure.
 *
 * @packageDocumentation
 */

export { createBarSeries, validateBar } from './bar-series.js';
export type { BarSeriesInput } from './bar-series.js';

export { parseBarRows, parseBarRow, toEpochMs } from './parser.js';
export type { ParseResult } from './parser.js';

export { loadBarFixture, readBarFixture, barFixtureSchema } from './fixture.js';
export type { BarFixture, LoadedFixture } from './fixture.js';
