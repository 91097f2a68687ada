/**
 * Types local to the analysis kit. Shared data model types live in
 * @trendline/contracts.
 */

import type {
  CrossoverEvent,
  EngineConfig,
  IndicatorFrame,
  OpenPosition,
  PerformanceSummary,
  Trade,
  TrendState,
} from '@trendline/contracts';
import type { Logger } from '@trendline/logger';

/**
 * Position of an RSI value relative to the overbought/oversold lines.
 */
export type RsiZone = 'overbought' | 'oversold' | 'neutral';

/**
 * Averaging function applied to the gain and loss series.
 */
export type RsiAverager = (values: readonly number[], window: number) => number[];

export interface SimulationResult {
  /** Closed trades in entry order */
  trades: Trade[];

  /** Trailing position still open at the last bar, if any */
  openPosition: OpenPosition | null;
}

export interface EngineOptions {
  /** Receives one debug entry per stage and an info entry per run */
  logger?: Logger;
}

/**
 * Everything one engine run produces. Nothing in it refers back to mutable
 * state, so two runs over the same input compare deeply equal.
 */
export interface EngineResult {
  symbol: string;
  interval: string;
  period: string;

  /** The validated configuration the run used */
  config: EngineConfig;

  frame: IndicatorFrame;
  trend: TrendState[];
  events: CrossoverEvent[];
  trades: Trade[];
  openPosition: OpenPosition | null;
  summary: PerformanceSummary;
}
