/**
 * Performance aggregation over closed trades.
 */

import type { PerformanceSummary, Trade } from '@trendline/contracts';

/**
 * Result for an empty ledger: zero counts, zero total, null ratios.
 */
export const NO_TRADES: PerformanceSummary = Object.freeze({
  tradeCount: 0,
  wins: 0,
  losses: 0,
  totalReturnPct: 0,
  winRate: null,
  averageProfitPct: null,
  bestTradePct: null,
  worstTradePct: null,
});

/**
 * Reduces the ledger to summary statistics.
 *
 * A trade wins when its profitPct is strictly positive; every other trade,
 * break-even included, counts as a loss, so `wins + losses === tradeCount`.
 *
 * @example
 * ```typescript
 * const { trades } = simulateTrades(events, series);
 * summarizePerformance(trades).winRate; // 0.5
 * ```
 */
export function summarizePerformance(trades: readonly Trade[]): PerformanceSummary {
  if (trades.length === 0) {
    return NO_TRADES;
  }

  let totalReturnPct = 0;
  let wins = 0;
  let bestTradePct = Number.NEGATIVE_INFINITY;
  let worstTradePct = Number.POSITIVE_INFINITY;

  for (const trade of trades) {
    totalReturnPct += trade.profitPct;
    if (trade.profitPct > 0) {
      wins += 1;
    }
    bestTradePct = Math.max(bestTradePct, trade.profitPct);
    worstTradePct = Math.min(worstTradePct, trade.profitPct);
  }

  const tradeCount = trades.length;

  return Object.freeze({
    tradeCount,
    wins,
    losses: tradeCount - wins,
    totalReturnPct,
    winRate: wins / tradeCount,
    averageProfitPct: totalReturnPct / tradeCount,
    bestTradePct,
    worstTradePct,
  });
}
