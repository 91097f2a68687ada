/**
 * Long-only trade simulator
 *
 * Replays crossover events through a Flat/Long state machine. Fills happen at
 * the event bar's close. At most one position is open at a time: a buy while
 * Long and a sell while Flat are ignored.
 */

import type { BarSeries, CrossoverEvent, OpenPosition, Trade } from '@trendline/contracts';
import type { SimulationResult } from '../types.js';

/** Percentage change from `from` to `to` */
export function percentChange(from: number, to: number): number {
  return ((to - from) / from) * 100;
}

/**
 * Builds the closed-trade ledger from `events`.
 *
 * A position still open after the last event is returned as `openPosition`,
 * marked to the last close of `series`, and is never added to `trades`.
 */
export function simulateTrades(events: readonly CrossoverEvent[], series: BarSeries): SimulationResult {
  const trades: Trade[] = [];
  let entry: CrossoverEvent | null = null;

  for (const event of events) {
    if (event.kind === 'buy') {
      if (entry === null) {
        entry = event;
      }
      continue;
    }

    if (entry === null) {
      continue;
    }

    trades.push(
      Object.freeze({
        entryIndex: entry.index,
        entryTimestamp: entry.timestamp,
        entryPrice: entry.price,
        exitIndex: event.index,
        exitTimestamp: event.timestamp,
        exitPrice: event.price,
        profitPct: percentChange(entry.price, event.price),
      })
    );
    entry = null;
  }

  return { trades, openPosition: entry === null ? null : markOpenPosition(entry, series) };
}

function markOpenPosition(entry: CrossoverEvent, series: BarSeries): OpenPosition {
  const last = series.bars[series.bars.length - 1];
  const markPrice = last ? last.close : entry.price;

  return Object.freeze({
    entryIndex: entry.index,
    entryTimestamp: entry.timestamp,
    entryPrice: entry.price,
    markPrice,
    unrealizedPct: percentChange(entry.price, markPrice),
  });
}
