/**
 * Backtest report: the `data` payload of a successful backtest run.
 */

import type {
  CrossoverEvent,
  EngineConfig,
  OpenPosition,
  PerformanceSummary,
  Trade,
  TrendState,
} from '@trendline/contracts';
import { rsiZone, type EngineResult, type RsiZone } from '@trendline/analysis-kit';

/**
 * Indicator readings at the last bar. Undefined readings are null so the
 * snapshot survives JSON serialisation.
 */
export interface LatestSnapshot {
  timestamp: number;
  close: number;
  smaShort: number | null;
  smaLong: number | null;
  rsi: number | null;
  rsiZone: RsiZone | null;
  resistance: number | null;
  support: number | null;
  volAvg: number | null;
  trend: TrendState;
}

export interface BacktestReport {
  fixture: string;
  symbol: string;
  interval: string;
  period: string;
  barCount: number;
  config: EngineConfig;
  events: CrossoverEvent[];
  trades: Trade[];
  openPosition: OpenPosition | null;
  summary: PerformanceSummary;
  latest: LatestSnapshot | null;
}

function reading(values: readonly number[], index: number): number | null {
  const value = values[index];
  return value === undefined || Number.isNaN(value) ? null : value;
}

export function buildReport(
  fixture: string,
  result: EngineResult,
  bars: ReadonlyArray<{ timestamp: number; close: number }>
): BacktestReport {
  const lastIndex = bars.length - 1;
  const lastBar = bars[lastIndex];
  const { frame } = result;

  const rsiValue = reading(frame.rsi, lastIndex);
  const latest: LatestSnapshot | null = lastBar
    ? {
        timestamp: lastBar.timestamp,
        close: lastBar.close,
        smaShort: reading(frame.smaShort, lastIndex),
        smaLong: reading(frame.smaLong, lastIndex),
        rsi: rsiValue,
        rsiZone: rsiValue === null ? null : rsiZone(rsiValue, result.config),
        resistance: reading(frame.resistance, lastIndex),
        support: reading(frame.support, lastIndex),
        volAvg: reading(frame.volAvg, lastIndex),
        trend: result.trend[lastIndex] ?? null,
      }
    : null;

  return {
    fixture,
    symbol: result.symbol,
    interval: result.interval,
    period: result.period,
    barCount: bars.length,
    config: result.config,
    events: result.events,
    trades: result.trades,
    openPosition: result.openPosition,
    summary: result.summary,
    latest,
  };
}
