/**
 * @fileoverview Bar Series construction and validation.
 *
 * A BarSeries is validated once, frozen, and then handed to the engine. The
 * engine itself assumes well-formed input and never re-validates.
 *
 * @module @trendline/market-data/bar-series
 */

import type { BarSeries, PriceBar } from '@trendline/contracts';
import { InvalidBarError, NoDataError } from '@trendline/contracts';

/**
 * Tolerance for the OHLC ordering checks, absorbing rounding in provider data.
 */
const PRICE_EPSILON = 1e-9;

export interface BarSeriesInput {
  symbol: string;
  interval: string;
  period: string;
  bars: readonly PriceBar[];
}

/**
 * Validate a single bar's fields and OHLC relationships.
 *
 * @throws InvalidBarError naming the bar index and offending field
 */
export function validateBar(bar: PriceBar, index: number): void {
  const prices = { open: bar.open, high: bar.high, low: bar.low, close: bar.close };
  for (const [field, price] of Object.entries(prices)) {
    if (!Number.isFinite(price) || price <= 0) {
      throw new InvalidBarError(`Invalid bar[${index}]: ${field} (${price}) must be a positive finite number`, {
        index,
        field,
        value: price,
      });
    }
  }

  if (!Number.isFinite(bar.timestamp)) {
    throw new InvalidBarError(`Invalid bar[${index}]: timestamp (${bar.timestamp}) is not a finite number`, {
      index,
      field: 'timestamp',
      value: bar.timestamp,
    });
  }

  if (!Number.isInteger(bar.volume) || bar.volume < 0) {
    throw new InvalidBarError(`Invalid bar[${index}]: volume (${bar.volume}) must be a non-negative integer`, {
      index,
      field: 'volume',
      value: bar.volume,
    });
  }

  if (bar.high < bar.open - PRICE_EPSILON || bar.high < bar.close - PRICE_EPSILON) {
    throw new InvalidBarError(
      `Invalid bar[${index}]: high (${bar.high}) must be >= open (${bar.open}) and close (${bar.close})`,
      { index, field: 'high', value: bar.high }
    );
  }

  if (bar.low > bar.open + PRICE_EPSILON || bar.low > bar.close + PRICE_EPSILON) {
    throw new InvalidBarError(
      `Invalid bar[${index}]: low (${bar.low}) must be <= open (${bar.open}) and close (${bar.close})`,
      { index, field: 'low', value: bar.low }
    );
  }
}

/**
 * Builds an immutable BarSeries after validating every bar.
 *
 * @throws NoDataError if `bars` is empty
 * @throws InvalidBarError on a malformed bar or non-increasing timestamps
 *
 * @example
 * ```typescript
 * const series = createBarSeries({ symbol: 'AAPL', interval: '1d', period: '1y', bars });
 * const result = runEngine(series);
 * ```
 */
export function createBarSeries(input: BarSeriesInput): BarSeries {
  const { symbol, interval, period } = input;

  if (input.bars.length === 0) {
    throw new NoDataError(`No bars available for ${symbol} (${interval}, ${period})`, {
      symbol,
      interval,
      period,
    });
  }

  const bars: PriceBar[] = [];
  input.bars.forEach((bar, index) => {
    validateBar(bar, index);

    const previous = bars[index - 1];
    if (previous && bar.timestamp <= previous.timestamp) {
      throw new InvalidBarError(
        `Bars must be in chronological order: bar[${index}].timestamp (${bar.timestamp}) ` +
          `<= bar[${index - 1}].timestamp (${previous.timestamp})`,
        { index, field: 'timestamp', value: bar.timestamp }
      );
    }

    bars.push(
      Object.freeze({
        timestamp: bar.timestamp,
        open: bar.open,
        high: bar.high,
        low: bar.low,
        close: bar.close,
        volume: bar.volume,
      })
    );
  });

  return Object.freeze({
    symbol,
    interval,
    period,
    bars: Object.freeze(bars),
  });
}
