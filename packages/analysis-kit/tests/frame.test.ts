import { describe, it, expect } from 'vitest';
import { DEFAULT_ENGINE_CONFIG } from '@trendline/contracts';
import { computeIndicators } from '../src/indicators/frame.js';
import { definedValues, seriesFromCloses } from './helpers.js';

describe('computeIndicators', () => {
  it('should align every column with the bars', () => {
    const series = seriesFromCloses(Array.from({ length: 60 }, (_, i) => 100 + i));
    const frame = computeIndicators(series, DEFAULT_ENGINE_CONFIG);

    for (const column of [frame.smaShort, frame.smaLong, frame.rsi, frame.volAvg, frame.resistance, frame.support]) {
      expect(column).toHaveLength(60);
    }
    expect(frame.volumeDirection).toHaveLength(60);
  });

  it('should leave the long SMA undefined for a series shorter than its window', () => {
    const series = seriesFromCloses(Array.from({ length: 49 }, (_, i) => 100 + i));
    const frame = computeIndicators(series, DEFAULT_ENGINE_CONFIG);

    expect(definedValues(frame.smaLong)).toEqual([]);
    expect(definedValues(frame.smaShort)).toHaveLength(49 - 17);
  });

  it('should equal the constant price once windows fill on a flat series', () => {
    const series = seriesFromCloses(new Array<number>(60).fill(100));
    const frame = computeIndicators(series, DEFAULT_ENGINE_CONFIG);

    expect(definedValues(frame.smaShort)).toEqual(new Array<number>(60 - 17).fill(100));
    expect(definedValues(frame.smaLong)).toEqual(new Array<number>(60 - 49).fill(100));
    expect(definedValues(frame.rsi)).toEqual([]);
  });

  it('should take extrema from highs and lows', () => {
    const series = seriesFromCloses([10, 12, 11]);
    const frame = computeIndicators(series, { ...DEFAULT_ENGINE_CONFIG, wExtrema: 2 });

    // highs: 11, 13, 13; lows: 9, 9, 10
    expect(frame.resistance).toEqual([Number.NaN, 13, 13]);
    expect(frame.support).toEqual([Number.NaN, 9, 9]);
  });

  it('should average volume over its own window', () => {
    const series = seriesFromCloses([10, 11, 12]);
    const frame = computeIndicators(series, { ...DEFAULT_ENGINE_CONFIG, wVolume: 2 });

    expect(frame.volAvg).toEqual([Number.NaN, 1000.5, 1001.5]);
  });

  it('should mark volume direction from open and close', () => {
    const series = seriesFromCloses([10, 12, 11, 11]);
    const frame = computeIndicators(series, DEFAULT_ENGINE_CONFIG);

    expect(frame.volumeDirection).toEqual(['up', 'up', 'down', 'up']);
  });
});
