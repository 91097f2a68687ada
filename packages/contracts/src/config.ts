/**
 * @fileoverview Engine configuration types and defaults.
 *
 * Validation of user-supplied configuration lives in
 * @trendline/analysis-kit (engineConfigSchema).
 *
 * @module @trendline/contracts/config
 */

/**
 * RSI averaging strategy.
 * - simple: trailing simple mean of gains and losses
 * - wilder: Wilder smoothing (alpha = 1 / wMomentum), seeded with a simple mean
 */
export type RsiPolicy = 'simple' | 'wilder';

/**
 * Treatment of the first bar at which both SMAs are defined.
 * - baseline: the region before it counts as flat, so an initial bullish
 *   bar emits a buy crossover and an initial bearish bar emits nothing
 * - none: the first defined bar only seeds the trend state
 */
export type InitialCrossPolicy = 'baseline' | 'none';

export interface EngineConfig {
  /** Short SMA window */
  wShort: number;

  /** Long SMA window (> wShort) */
  wLong: number;

  /** RSI window */
  wMomentum: number;

  /** Support/resistance lookback */
  wExtrema: number;

  /** Volume SMA window */
  wVolume: number;

  rsiPolicy: RsiPolicy;
  initialCross: InitialCrossPolicy;

  /** RSI reference line above which a bar is overbought */
  rsiOverbought: number;

  /** RSI reference line below which a bar is oversold */
  rsiOversold: number;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  wShort: 18,
  wLong: 50,
  wMomentum: 14,
  wExtrema: 20,
  wVolume: 20,
  rsiPolicy: 'simple',
  initialCross: 'baseline',
  rsiOverbought: 70,
  rsiOversold: 30,
});

export type EnginePresetName = 'default' | 'legacy-40';

/**
 * Named parameter sets seen in deployments.
 */
export const ENGINE_PRESETS: Readonly<Record<EnginePresetName, Partial<EngineConfig>>> = {
  default: {},
  'legacy-40': { wLong: 40 },
};

export function isEnginePresetName(value: string): value is EnginePresetName {
  return Object.prototype.hasOwnProperty.call(ENGINE_PRESETS, value);
}
