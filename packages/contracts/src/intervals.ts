/**
 * @fileoverview Sampling interval and lookback period tags.
 *
 * The engine treats these as opaque strings; they are defined here so the
 * CLI and data sources agree on labels and on which intervals are intraday.
 *
 * @module @trendline/contracts/intervals
 */

/**
 * Supported interval tags, smallest to largest.
 */
export const INTERVAL_TAGS = ['1m', '5m', '15m', '30m', '1h', '1d', '1wk'] as const;

export type IntervalTag = (typeof INTERVAL_TAGS)[number];

/**
 * Supported lookback period tags, shortest to longest.
 */
export const PERIOD_TAGS = ['1d', '5d', '1mo', '6mo', '1y', '2y', '5y', 'max'] as const;

export type PeriodTag = (typeof PERIOD_TAGS)[number];

/** Period used when a data source is not told otherwise */
export const DEFAULT_PERIOD: PeriodTag = '1mo';

/** Interval used when a data source is not told otherwise */
export const DEFAULT_INTERVAL: IntervalTag = '1d';

const INTERVAL_LABELS: Record<IntervalTag, string> = {
  '1m': '1 Minute',
  '5m': '5 Minutes',
  '15m': '15 Minutes',
  '30m': '30 Minutes',
  '1h': '1 Hour',
  '1d': '1 Day',
  '1wk': '1 Week',
};

const INTRADAY: ReadonlySet<IntervalTag> = new Set<IntervalTag>(['1m', '5m', '15m', '30m', '1h']);

export function isIntervalTag(value: string): value is IntervalTag {
  return INTERVAL_TAGS.some((tag) => tag === value);
}

export function isPeriodTag(value: string): value is PeriodTag {
  return PERIOD_TAGS.some((tag) => tag === value);
}

/**
 * Returns the display label for an interval tag.
 *
 * @example
 * ```typescript
 * getIntervalLabel('15m'); // '15 Minutes'
 * ```
 */
export function getIntervalLabel(tag: IntervalTag): string {
  return INTERVAL_LABELS[tag];
}

/**
 * Resolves either a tag ('5m') or a display label ('5 Minutes',
 * case-insensitive) to an interval tag.
 *
 * @returns The tag, or null if the input matches neither form
 */
export function resolveInterval(input: string): IntervalTag | null {
  const trimmed = input.trim();
  if (isIntervalTag(trimmed)) {
    return trimmed;
  }

  const needle = trimmed.toLowerCase();
  for (const tag of INTERVAL_TAGS) {
    if (INTERVAL_LABELS[tag].toLowerCase() === needle) {
      return tag;
    }
  }
  return null;
}

/**
 * Intraday intervals are the ones providers cap to a short history window
 * (typically around 60 days).
 */
export function isIntradayInterval(tag: IntervalTag): boolean {
  return INTRADAY.has(tag);
}
