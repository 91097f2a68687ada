/**
 * @fileoverview Main entry point for @trendline/contracts package.
 *
 * Exports the data model, engine configuration, interval tags and error
 * taxonomy shared by every Trendline package.
 *
 * @module @trendline/contracts
 */

// Market data types
export type { PriceBar, BarSeries, RawBarRow } from './market.js';

// Analysis output types
export type {
  VolumeDirection,
  IndicatorFrame,
  TrendState,
  CrossoverKind,
  CrossoverEvent,
  Trade,
  OpenPosition,
  PerformanceSummary,
} from './analysis.js';

// Engine configuration
export type { EngineConfig, RsiPolicy, InitialCrossPolicy, EnginePresetName } from './config.js';
export { DEFAULT_ENGINE_CONFIG, ENGINE_PRESETS, isEnginePresetName } from './config.js';

// Interval and period tags
export type { IntervalTag, PeriodTag } from './intervals.js';
export {
  INTERVAL_TAGS,
  PERIOD_TAGS,
  DEFAULT_INTERVAL,
  DEFAULT_PERIOD,
  isIntervalTag,
  isPeriodTag,
  getIntervalLabel,
  resolveInterval,
  isIntradayInterval,
} from './intervals.js';

// Error classes and guards
export {
  TrendlineError,
  InvalidConfigError,
  InvalidBarError,
  NoDataError,
  FixtureError,
  isTrendlineError,
  isInvalidConfigError,
  isInvalidBarError,
  isNoDataError,
  isFixtureError,
} from './errors.js';
