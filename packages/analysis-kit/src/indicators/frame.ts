/**
 * Indicator frame assembly.
 */

import type { BarSeries, EngineConfig, IndicatorFrame, VolumeDirection } from '@trendline/contracts';
import { rollingMax, rollingMin, sma } from './moving-average.js';
import { rsi } from './rsi.js';

/**
 * Computes every indicator column for `series`.
 *
 * Columns are independent. A series shorter than a column's window yields
 * an all-NaN column for it; nothing here throws on short input.
 *
 * @param config - Must already be validated (see resolveEngineConfig)
 */
export function computeIndicators(series: BarSeries, config: EngineConfig): IndicatorFrame {
  const closes = series.bars.map((bar) => bar.close);
  const volumes = series.bars.map((bar) => bar.volume);

  const volumeDirection = series.bars.map(
    (bar): VolumeDirection => (bar.close >= bar.open ? 'up' : 'down')
  );

  return Object.freeze({
    smaShort: Object.freeze(sma(closes, config.wShort)),
    smaLong: Object.freeze(sma(closes, config.wLong)),
    rsi: Object.freeze(rsi(closes, config.wMomentum, config.rsiPolicy)),
    volAvg: Object.freeze(sma(volumes, config.wVolume)),
    resistance: Object.freeze(rollingMax(series.bars.map((bar) => bar.high), config.wExtrema)),
    support: Object.freeze(rollingMin(series.bars.map((bar) => bar.low), config.wExtrema)),
    volumeDirection: Object.freeze(volumeDirection),
  });
}
