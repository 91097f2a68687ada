import { describe, it, expect } from 'vitest';
import type { IndicatorFrame, VolumeDirection } from '@trendline/contracts';
import { DEFAULT_ENGINE_CONFIG } from '@trendline/contracts';
import { computeIndicators } from '../src/indicators/frame.js';
import { classifyTrend, detectCrossovers } from '../src/signals/crossovers.js';
import { riseAndFall, seriesFromCloses } from './helpers.js';

function frameOf(smaShort: number[], smaLong: number[]): IndicatorFrame {
  const empty = smaShort.map(() => Number.NaN);
  return {
    smaShort,
    smaLong,
    rsi: empty,
    volAvg: empty,
    resistance: empty,
    support: empty,
    volumeDirection: smaShort.map((): VolumeDirection => 'up'),
  };
}

describe('classifyTrend', () => {
  it('should be null until both averages are defined', () => {
    const frame = frameOf([Number.NaN, 2, 3, 1], [Number.NaN, Number.NaN, 2, 2]);

    expect(classifyTrend(frame)).toEqual([null, null, 'bullish', 'bearish']);
  });

  it('should treat equal averages as bearish', () => {
    expect(classifyTrend(frameOf([5], [5]))).toEqual(['bearish']);
  });
});

describe('detectCrossovers', () => {
  const series = seriesFromCloses([10, 11, 12, 13, 14, 15]);

  it('should emit one event per state change, tagged by the new state', () => {
    const frame = frameOf([Number.NaN, 1, 3, 3, 1, 3], [Number.NaN, 2, 2, 2, 2, 2]);
    const events = detectCrossovers(series, frame, { initialCross: 'none' });

    expect(events.map((e) => [e.kind, e.index])).toEqual([
      ['buy', 2],
      ['sell', 4],
      ['buy', 5],
    ]);
  });

  it('should carry the close and both averages of the event bar', () => {
    const frame = frameOf([1, 3], [2, 2]);
    const [event] = detectCrossovers(series, frame, { initialCross: 'none' });

    expect(event).toEqual({
      kind: 'buy',
      index: 1,
      timestamp: series.bars[1]?.timestamp,
      price: 11,
      smaShort: 3,
      smaLong: 2,
    });
  });

  it('should treat the first defined bar as flat under the baseline policy', () => {
    const frame = frameOf([Number.NaN, 3, 3], [Number.NaN, 2, 2]);

    expect(detectCrossovers(series, frame, { initialCross: 'baseline' }).map((e) => [e.kind, e.index])).toEqual([
      ['buy', 2],
    ]);
  });

  it('should not emit on a bearish bar after the flat one under the baseline policy', () => {
    const frame = frameOf([Number.NaN, 3, 1, 3], [Number.NaN, 2, 2, 2]);

    expect(detectCrossovers(series, frame, { initialCross: 'baseline' }).map((e) => [e.kind, e.index])).toEqual([
      ['buy', 3],
    ]);
  });

  it('should only seed the state on the first bar under the none policy', () => {
    const frame = frameOf([Number.NaN, 3, 3], [Number.NaN, 2, 2]);

    expect(detectCrossovers(series, frame, { initialCross: 'none' })).toEqual([]);
  });

  it('should emit nothing for a series shorter than the long window', () => {
    const short = seriesFromCloses(Array.from({ length: 49 }, (_, i) => 100 + i));
    const frame = computeIndicators(short, DEFAULT_ENGINE_CONFIG);

    expect(detectCrossovers(short, frame, DEFAULT_ENGINE_CONFIG)).toEqual([]);
  });

  it('should emit nothing for a rising series exactly as long as the long window', () => {
    const exact = seriesFromCloses(Array.from({ length: 50 }, (_, i) => 100 + i));
    const frame = computeIndicators(exact, DEFAULT_ENGINE_CONFIG);

    expect(detectCrossovers(exact, frame, DEFAULT_ENGINE_CONFIG)).toEqual([]);
  });

  it('should emit exactly one buy for a strictly rising series', () => {
    const rising = seriesFromCloses(Array.from({ length: 120 }, (_, i) => 100 + i * 0.5));
    const frame = computeIndicators(rising, DEFAULT_ENGINE_CONFIG);
    const events = detectCrossovers(rising, frame, DEFAULT_ENGINE_CONFIG);

    expect(events.map((e) => [e.kind, e.index])).toEqual([['buy', 50]]);
  });

  it('should emit nothing for a flat series', () => {
    const flat = seriesFromCloses(new Array<number>(80).fill(100));
    const frame = computeIndicators(flat, DEFAULT_ENGINE_CONFIG);

    expect(detectCrossovers(flat, frame, DEFAULT_ENGINE_CONFIG)).toEqual([]);
  });

  it('should find the buy and the sell of a rise and fall', () => {
    const curve = seriesFromCloses(riseAndFall());
    const frame = computeIndicators(curve, DEFAULT_ENGINE_CONFIG);
    const events = detectCrossovers(curve, frame, DEFAULT_ENGINE_CONFIG);

    expect(events.map((e) => [e.kind, e.index, e.price])).toEqual([
      ['buy', 50, 150],
      ['sell', 82, 138],
    ]);
  });
});
