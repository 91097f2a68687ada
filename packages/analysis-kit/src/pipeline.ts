/**
 * Full engine run: indicators, signals, simulation and performance.
 */

import type { BarSeries, EngineConfig } from '@trendline/contracts';
import { createChildLogger, startTimer } from '@trendline/logger';
import { resolveEngineConfig } from './config.js';
import { computeIndicators } from './indicators/frame.js';
import { classifyTrend, detectCrossovers } from './signals/crossovers.js';
import { simulateTrades } from './backtest/simulator.js';
import { summarizePerformance } from './backtest/performance.js';
import type { EngineOptions, EngineResult } from './types.js';

/**
 * Runs every stage over `series`.
 *
 * The configuration is validated before anything is computed. The run keeps
 * no state, so repeated calls with the same input return equal results.
 *
 * @throws InvalidConfigError if the merged configuration is invalid
 *
 * @example
 * ```typescript
 * const result = runEngine(series, { wLong: 40 }, { logger });
 * console.log(result.summary.totalReturnPct);
 * ```
 */
export function runEngine(
  series: BarSeries,
  config: Partial<EngineConfig> = {},
  options: EngineOptions = {}
): EngineResult {
  const resolved = resolveEngineConfig(config);
  const logger = options.logger
    ? createChildLogger(options.logger, {
        component: 'engine',
        symbol: series.symbol,
        interval: series.interval,
      })
    : undefined;
  const timer = startTimer();

  const frame = computeIndicators(series, resolved);
  logger?.debug('Indicators computed', { count: series.bars.length, rsi_policy: resolved.rsiPolicy });

  const trend = classifyTrend(frame);
  const events = detectCrossovers(series, frame, resolved);
  logger?.debug('Crossovers detected', { count: events.length });

  const { trades, openPosition } = simulateTrades(events, series);
  logger?.debug('Trades simulated', { count: trades.length, open_position: openPosition !== null });

  const summary = summarizePerformance(trades);
  logger?.info('Engine run complete', {
    period: series.period,
    trades: summary.tradeCount,
    total_return_pct: summary.totalReturnPct,
    duration_ms: timer.stop(),
  });

  return {
    symbol: series.symbol,
    interval: series.interval,
    period: series.period,
    config: resolved,
    frame,
    trend,
    events,
    trades,
    openPosition,
    summary,
  };
}
