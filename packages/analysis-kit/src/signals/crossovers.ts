/**
 * SMA crossover detection
 *
 * One state machine over the per-bar trend: a bar is bullish when the short
 * SMA is strictly above the long SMA and bearish otherwise. Every change of
 * state emits one event tagged by the state being entered.
 */

import type {
  BarSeries,
  CrossoverEvent,
  CrossoverKind,
  EngineConfig,
  IndicatorFrame,
  TrendState,
} from '@trendline/contracts';

/**
 * Classifies every bar. Bars where either SMA is undefined are null; the
 * comparison is never evaluated on them.
 */
export function classifyTrend(frame: IndicatorFrame): TrendState[] {
  return frame.smaShort.map((short, i): TrendState => {
    const long = frame.smaLong[i] ?? Number.NaN;
    if (Number.isNaN(short) || Number.isNaN(long)) {
      return null;
    }
    return short > long ? 'bullish' : 'bearish';
  });
}

function kindFor(state: 'bullish' | 'bearish'): CrossoverKind {
  return state === 'bullish' ? 'buy' : 'sell';
}

/**
 * Detects crossover events.
 *
 * The first bar with both SMAs defined is handled by `config.initialCross`:
 * under 'baseline' it is flat, which reads as bearish, so the earliest
 * event is a buy on the bar after it (index `wLong`); under 'none' it
 * seeds the state with its own trend.
 *
 * @example
 * ```typescript
 * const frame = computeIndicators(series, config);
 * const events = detectCrossovers(series, frame, config);
 * // [{ kind: 'buy', index: 50, price: 150, ... }, { kind: 'sell', ... }]
 * ```
 */
export function detectCrossovers(
  series: BarSeries,
  frame: IndicatorFrame,
  config: Pick<EngineConfig, 'initialCross'>
): CrossoverEvent[] {
  const events: CrossoverEvent[] = [];
  let previous: TrendState = null;

  classifyTrend(frame).forEach((state, index) => {
    if (state === null) {
      return;
    }

    if (previous === null) {
      previous = config.initialCross === 'baseline' ? 'bearish' : state;
      return;
    }
    if (previous === state) {
      return;
    }
    previous = state;

    const bar = series.bars[index];
    if (!bar) {
      return;
    }
    events.push(
      Object.freeze({
        kind: kindFor(state),
        index,
        timestamp: bar.timestamp,
        price: bar.close,
        smaShort: frame.smaShort[index] ?? Number.NaN,
        smaLong: frame.smaLong[index] ?? Number.NaN,
      })
    );
  });

  return events;
}
