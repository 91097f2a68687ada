/**
 * @trendline/analysis-kit
 *
 * Indicator, crossover, trade simulation and performance functions over a
 * validated bar series.
 *
 * Every function is pure: same inputs always produce same outputs, and no
 * function mutates its arguments or keeps state between calls.
 *
 * @packageDocumentation
 */

// Export types
export type { RsiZone, RsiAverager, SimulationResult, EngineOptions, EngineResult } from './types.js';

// Export indicators
export { sma, rollingMax, rollingMin } from './indicators/moving-average.js';
export {
  splitGainsLosses,
  wilderAverage,
  rsiFromAverages,
  rsi,
  rsiZone,
  RSI_AVERAGERS,
} from './indicators/rsi.js';
export type { GainsLosses } from './indicators/rsi.js';
export { computeIndicators } from './indicators/frame.js';

// Export signal detection
export { classifyTrend, detectCrossovers } from './signals/crossovers.js';

// Export backtest
export { simulateTrades, percentChange } from './backtest/simulator.js';
export { summarizePerformance, NO_TRADES } from './backtest/performance.js';

// Export configuration
export { engineConfigSchema, validateEngineConfig, resolveEngineConfig } from './config.js';

// Export pipeline
export { runEngine } from './pipeline.js';
