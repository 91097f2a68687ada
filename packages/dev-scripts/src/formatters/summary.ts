/**
 * Text summary formatter for backtest results
 *
 * Generates human-readable deterministic text summaries of a backtest report.
 *
 * @module @trendline/dev-scripts/formatters/summary
 */

import type { BacktestReport } from '../report.js';

/** `+1.23%`, `-4.56%`, or `n/a` */
export function formatPct(value: number | null): string {
  if (value === null) {
    return 'n/a';
  }
  return `${value >= 0 ? '+' : ''}${value.toFixed(2)}%`;
}

function formatPrice(value: number | null): string {
  return value === null ? 'n/a' : value.toFixed(2);
}

function formatDate(timestamp: number): string {
  return new Date(timestamp).toISOString();
}

/**
 * Generate deterministic text summary of a backtest report
 *
 * Output is deterministic - same input always produces same output.
 *
 * @example
 * console.log(formatSummary(report));
 * // === Backtest Summary ===
 * // Fixture: examples/rise-and-fall.json
 * // Symbol: DEMO | Interval: 1d | Period: 6mo | Bars: 121
 * // Config: SMA 18/50 | RSI 14 (simple)
 * //
 * // Trades: 1 (0 wins / 1 losses)
 * // Total Return: -8.00%
 * // ...
 */
export function formatSummary(report: BacktestReport): string {
  const { config, summary } = report;
  const lines: string[] = [];

  lines.push('=== Backtest Summary ===');
  lines.push(`Fixture: ${report.fixture}`);
  lines.push(
    `Symbol: ${report.symbol} | Interval: ${report.interval} | Period: ${report.period} | Bars: ${report.barCount}`
  );
  lines.push(`Config: SMA ${config.wShort}/${config.wLong} | RSI ${config.wMomentum} (${config.rsiPolicy})`);
  lines.push('');

  if (summary.tradeCount === 0) {
    lines.push('Trades: none');
  } else {
    lines.push(`Trades: ${summary.tradeCount} (${summary.wins} wins / ${summary.losses} losses)`);
    lines.push(`Total Return: ${formatPct(summary.totalReturnPct)}`);
    lines.push(`Win Rate: ${summary.winRate === null ? 'n/a' : `${(summary.winRate * 100).toFixed(1)}%`}`);
    lines.push(
      `Average: ${formatPct(summary.averageProfitPct)} | Best: ${formatPct(summary.bestTradePct)} | ` +
        `Worst: ${formatPct(summary.worstTradePct)}`
    );
  }

  const open = report.openPosition;
  if (open) {
    lines.push('');
    lines.push(
      `Open Position: entered ${formatDate(open.entryTimestamp)} at ${formatPrice(open.entryPrice)}, ` +
        `now ${formatPrice(open.markPrice)} (${formatPct(open.unrealizedPct)})`
    );
  }

  const latest = report.latest;
  if (latest) {
    lines.push('');
    lines.push(
      `Latest: Close ${formatPrice(latest.close)} | SMA ${formatPrice(latest.smaShort)}/${formatPrice(latest.smaLong)} | ` +
        `RSI ${formatPrice(latest.rsi)}${latest.rsiZone ? ` (${latest.rsiZone})` : ''} | Trend ${latest.trend ?? 'n/a'}`
    );
    lines.push(`  Resistance: ${formatPrice(latest.resistance)} | Support: ${formatPrice(latest.support)}`);
  }

  return lines.join('\n');
}

/**
 * Generate compact one-line summary
 *
 * @example
 * formatCompactSummary(report);
 * // => "DEMO 1d | 1 trades | -8.00% total"
 */
export function formatCompactSummary(report: BacktestReport): string {
  const parts: string[] = [`${report.symbol} ${report.interval}`, `${report.summary.tradeCount} trades`];

  if (report.summary.tradeCount > 0) {
    parts.push(`${formatPct(report.summary.totalReturnPct)} total`);
  }
  if (report.openPosition) {
    parts.push('position open');
  }

  return parts.join(' | ');
}
