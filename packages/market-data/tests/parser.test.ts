import { describe, it, expect } from 'vitest';
import type { RawBarRow } from '@trendline/contracts';
import { parseBarRows, parseBarRow, toEpochMs } from '../src/parser.js';

function row(date: string | number, close: number, volume = 100): RawBarRow {
  return { date, open: close, high: close + 1, low: close - 0.5, close, volume };
}

describe('toEpochMs', () => {
  it('should pass numbers through', () => {
    expect(toEpochMs(1_700_000_000_000)).toBe(1_700_000_000_000);
  });

  it('should parse ISO strings', () => {
    expect(toEpochMs('2025-01-02T00:00:00.000Z')).toBe(Date.UTC(2025, 0, 2));
  });

  it('should return NaN for garbage', () => {
    expect(Number.isNaN(toEpochMs('not a date'))).toBe(true);
  });
});

describe('parseBarRow', () => {
  it('should convert a row into a bar', () => {
    expect(parseBarRow(row('2025-01-02T00:00:00.000Z', 50), 0)).toEqual({
      timestamp: Date.UTC(2025, 0, 2),
      open: 50,
      high: 51,
      low: 49.5,
      close: 50,
      volume: 100,
    });
  });

  it('should accept a bar priced at one unit', () => {
    expect(parseBarRow(row(1000, 1), 0).low).toBe(0.5);
  });

  it('should reject an unparseable date', () => {
    expect(() => parseBarRow(row('yesterday', 50), 4)).toThrow('Invalid timestamp at row 4: yesterday');
  });
});

describe('parseBarRows', () => {
  it('should sort rows by time', () => {
    const { bars } = parseBarRows([row(3000, 3), row(1000, 1), row(2000, 2)]);

    expect(bars.map((b) => b.timestamp)).toEqual([1000, 2000, 3000]);
  });

  it('should keep the last row for a repeated timestamp', () => {
    const { bars, duplicates } = parseBarRows([row(1000, 1), row(2000, 2), row(1000, 7)]);

    expect(bars.map((b) => b.close)).toEqual([7, 2]);
    expect(duplicates).toBe(1);
  });

  it('should collect malformed rows without throwing', () => {
    const bad: RawBarRow = { date: 2000, open: 10, high: 9, low: 8, close: 10, volume: 1 };
    const { bars, errors } = parseBarRows([row(1000, 1), bad, row(3000, 3)]);

    expect(bars).toHaveLength(2);
    expect(errors).toHaveLength(1);
    expect(errors[0]?.index).toBe(1);
    expect(errors[0]?.error.message).toBe('Invalid bar[1]: high (9) must be >= open (10) and close (10)');
  });

  it('should return an empty result for no rows', () => {
    expect(parseBarRows([])).toEqual({ bars: [], errors: [], duplicates: 0 });
  });
});
