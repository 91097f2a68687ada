import type { BarSeries, PriceBar } from '@trendline/contracts';

const DAY = 86_400_000;
const T0 = Date.UTC(2025, 0, 2);

/**
 * Daily series whose bars open at the previous close and span open..close
 * with one point of wick on each side.
 */
export function seriesFromCloses(closes: readonly number[], symbol = 'TEST'): BarSeries {
  const bars: PriceBar[] = closes.map((close, i) => {
    const open = closes[i - 1] ?? close;
    return {
      timestamp: T0 + i * DAY,
      open,
      high: Math.max(open, close) + 1,
      low: Math.min(open, close) - 1,
      close,
      volume: 1000 + i,
    };
  });
  return { symbol, interval: '1d', period: '6mo', bars };
}

/** 100..160 in steps of 1, then back down to 100 */
export function riseAndFall(): number[] {
  const up = Array.from({ length: 61 }, (_, i) => 100 + i);
  const down = Array.from({ length: 60 }, (_, k) => 159 - k);
  return [...up, ...down];
}

/** Deterministic pseudo-random walk (LCG) */
export function randomWalk(length: number, seed = 7): number[] {
  let state = seed;
  let price = 100;
  const out: number[] = [];
  for (let i = 0; i < length; i++) {
    state = (state * 1_103_515_245 + 12_345) % 2_147_483_648;
    price = Math.max(1, price + ((state / 2_147_483_648) - 0.5) * 6);
    out.push(price);
  }
  return out;
}

export function definedValues(values: readonly number[]): number[] {
  return values.filter((value) => !Number.isNaN(value));
}
