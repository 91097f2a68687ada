/**
 * @fileoverview Output types of the indicator, signal and backtest stages.
 *
 * Undefined indicator values are represented as `NaN`. Leading bars where a
 * window is not yet full hold `NaN`; this is an expected state, not an error.
 *
 * @module @trendline/contracts/analysis
 */

/**
 * Direction of a bar's body, used to colour volume bars.
 */
export type VolumeDirection = 'up' | 'down';

/**
 * Indicator columns aligned 1:1 with the bars of a BarSeries.
 *
 * @invariant every column has the same length as the source series
 * @invariant defined rsi values lie in [0, 100]
 */
export interface IndicatorFrame {
  /** Simple moving average of close over wShort */
  readonly smaShort: readonly number[];

  /** Simple moving average of close over wLong */
  readonly smaLong: readonly number[];

  /** Relative Strength Index over wMomentum */
  readonly rsi: readonly number[];

  /** Simple moving average of volume over wVolume */
  readonly volAvg: readonly number[];

  /** Rolling max of high over wExtrema */
  readonly resistance: readonly number[];

  /** Rolling min of low over wExtrema */
  readonly support: readonly number[];

  /** 'up' when close >= open */
  readonly volumeDirection: readonly VolumeDirection[];
}

/**
 * Per-bar trend classification; `null` while either SMA is undefined.
 */
export type TrendState = 'bullish' | 'bearish' | null;

/**
 * Crossover kinds, tagged by the state being entered.
 */
export type CrossoverKind = 'buy' | 'sell';

/**
 * A change of trend state at a bar.
 */
export interface CrossoverEvent {
  readonly kind: CrossoverKind;

  /** Index into the source series */
  readonly index: number;

  readonly timestamp: number;

  /** Close of the bar, used as the fill price */
  readonly price: number;

  /** Short SMA at the bar, where charts place the marker */
  readonly smaShort: number;

  readonly smaLong: number;
}

/**
 * A closed long trade: entered on a buy crossover, exited on the next sell.
 */
export interface Trade {
  readonly entryIndex: number;
  readonly entryTimestamp: number;
  readonly entryPrice: number;
  readonly exitIndex: number;
  readonly exitTimestamp: number;
  readonly exitPrice: number;

  /** (exitPrice - entryPrice) / entryPrice * 100 */
  readonly profitPct: number;
}

/**
 * A position still open at the end of the series, marked to the last close.
 *
 * Reported for display only; never part of the performance statistics.
 */
export interface OpenPosition {
  readonly entryIndex: number;
  readonly entryTimestamp: number;
  readonly entryPrice: number;
  readonly markPrice: number;
  readonly unrealizedPct: number;
}

/**
 * Aggregate statistics over closed trades.
 *
 * With no closed trades, counts are 0, totalReturnPct is 0 and the
 * ratio fields are null.
 */
export interface PerformanceSummary {
  readonly tradeCount: number;
  readonly wins: number;
  readonly losses: number;

  /** Sum of profitPct over closed trades */
  readonly totalReturnPct: number;

  /** Fraction in [0, 1] of trades with profitPct > 0 */
  readonly winRate: number | null;

  readonly averageProfitPct: number | null;
  readonly bestTradePct: number | null;
  readonly worstTradePct: number | null;
}
