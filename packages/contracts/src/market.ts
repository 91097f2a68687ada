/**
 * @fileoverview Market data types consumed by the engine.
 *
 * Pure data structures with no I/O or business logic. Construction and
 * validation live in @trendline/market-data.
 *
 * @module @trendline/contracts/market
 */

/**
 * A single OHLCV observation for one sampling interval.
 *
 * @invariant low <= open <= high
 * @invariant low <= close <= high
 * @invariant open, high, low, close are positive finite numbers
 * @invariant volume is a non-negative integer
 *
 * @example
 * ```typescript
 * const bar: PriceBar = {
 *   timestamp: Date.UTC(2025, 0, 15),
 *   open: 100.5,
 *   high: 101.25,
 *   low: 100.0,
 *   close: 101.0,
 *   volume: 1500000,
 * };
 * ```
 */
export interface PriceBar {
  /** Bar open time in Unix epoch milliseconds (UTC) */
  readonly timestamp: number;

  /** Opening price */
  readonly open: number;

  /** Highest price during the interval */
  readonly high: number;

  /** Lowest price during the interval */
  readonly low: number;

  /** Closing price */
  readonly close: number;

  /** Traded volume during the interval */
  readonly volume: number;
}

/**
 * Ordered, immutable series of bars for a single instrument.
 *
 * `interval` and `period` are opaque tags produced by the data source
 * (e.g. '1d' and '1mo'); the engine only passes them through.
 *
 * @invariant bars are strictly increasing by timestamp
 * @invariant bars.length > 0
 */
export interface BarSeries {
  /** Instrument identifier (e.g. 'AAPL') */
  readonly symbol: string;

  /** Sampling interval tag */
  readonly interval: string;

  /** Lookback span tag */
  readonly period: string;

  readonly bars: readonly PriceBar[];
}

/**
 * Loosely typed row as delivered by a market data provider, before
 * normalisation into a PriceBar.
 *
 * `date` may be an ISO 8601 string or epoch milliseconds.
 */
export interface RawBarRow {
  date: string | number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}
