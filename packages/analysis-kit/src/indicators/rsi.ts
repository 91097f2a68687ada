/**
 * Relative Strength Index
 *
 * Two averaging policies share the gain/loss split and the final ratio but
 * produce different numbers on the same input:
 * - simple: trailing simple mean over the window
 * - wilder: Wilder smoothing (alpha = 1/window), seeded with the simple mean
 *   of the first full window
 *
 * The first bar has no predecessor and contributes a gain and loss of 0, so
 * both policies are defined from index `window - 1`.
 */

import type { EngineConfig, RsiPolicy } from '@trendline/contracts';
import type { RsiAverager, RsiZone } from '../types.js';
import { sma } from './moving-average.js';

export interface GainsLosses {
  gains: number[];
  losses: number[];
}

/**
 * Splits bar-to-bar close changes into non-negative gains and losses.
 */
export function splitGainsLosses(closes: readonly number[]): GainsLosses {
  const gains: number[] = [];
  const losses: number[] = [];

  closes.forEach((close, i) => {
    const previous = closes[i - 1];
    const delta = previous === undefined ? 0 : close - previous;
    gains.push(Math.max(delta, 0));
    losses.push(Math.max(-delta, 0));
  });

  return { gains, losses };
}

/**
 * Wilder's running average: `avg[i] = (avg[i-1] * (window-1) + x[i]) / window`,
 * seeded at `window - 1` with the mean of the first `window` values.
 */
export function wilderAverage(values: readonly number[], window: number): number[] {
  const seed = sma(values.slice(0, window), window)[window - 1];
  const out = new Array<number>(values.length).fill(Number.NaN);
  if (seed === undefined || Number.isNaN(seed)) {
    return out;
  }

  let previous = seed;
  out[window - 1] = seed;
  for (let i = window; i < values.length; i++) {
    const value = values[i] ?? Number.NaN;
    previous = (previous * (window - 1) + value) / window;
    out[i] = previous;
  }
  return out;
}

export const RSI_AVERAGERS: Readonly<Record<RsiPolicy, RsiAverager>> = {
  simple: sma,
  wilder: wilderAverage,
};

/**
 * RSI from one pair of averages.
 *
 * A flat run (both averages 0) has no defined RSI and yields NaN; no losses
 * with some gains yields 100.
 */
export function rsiFromAverages(avgGain: number, avgLoss: number): number {
  if (Number.isNaN(avgGain) || Number.isNaN(avgLoss)) {
    return Number.NaN;
  }
  if (avgLoss === 0) {
    return avgGain === 0 ? Number.NaN : 100;
  }
  return 100 - 100 / (1 + avgGain / avgLoss);
}

/**
 * RSI over `window` bars using the given averaging policy.
 *
 * @example
 * ```typescript
 * const values = rsi(closes, 14, 'wilder');
 * ```
 */
export function rsi(closes: readonly number[], window: number, policy: RsiPolicy = 'simple'): number[] {
  const average = RSI_AVERAGERS[policy];
  const { gains, losses } = splitGainsLosses(closes);
  const avgGains = average(gains, window);
  const avgLosses = average(losses, window);

  return avgGains.map((avgGain, i) => rsiFromAverages(avgGain, avgLosses[i] ?? Number.NaN));
}

/**
 * Classifies an RSI value against the reference lines. Values on a line
 * count as beyond it.
 *
 * @returns null for an undefined (NaN) value
 */
export function rsiZone(
  value: number,
  config: Pick<EngineConfig, 'rsiOverbought' | 'rsiOversold'>
): RsiZone | null {
  if (Number.isNaN(value)) {
    return null;
  }
  if (value >= config.rsiOverbought) {
    return 'overbought';
  }
  if (value <= config.rsiOversold) {
    return 'oversold';
  }
  return 'neutral';
}
