/**
 * CSV output formatter for the trade ledger
 *
 * One row per closed trade, for analysis in spreadsheets or notebooks.
 *
 * @module @trendline/dev-scripts/formatters/csv
 */

import type { BacktestReport } from '../report.js';

/**
 * CSV columns:
 * - symbol: Instrument identifier
 * - entryIndex / exitIndex: Bar indices of the fills
 * - entryDate / exitDate: ISO 8601 fill times
 * - entryPrice / exitPrice: Fill prices (bar close)
 * - profitPct: Percentage return of the trade
 */
const HEADER = [
  'symbol',
  'entryIndex',
  'entryDate',
  'entryPrice',
  'exitIndex',
  'exitDate',
  'exitPrice',
  'profitPct',
];

/**
 * Format the trade ledger as CSV (header plus one row per trade)
 *
 * The open position, if any, is not a closed trade and is not listed.
 *
 * @example
 * formatCsv(report);
 * // symbol,entryIndex,entryDate,entryPrice,exitIndex,exitDate,exitPrice,profitPct
 * // DEMO,50,2025-02-21T00:00:00.000Z,150,82,2025-03-25T00:00:00.000Z,138,-8
 */
export function formatCsv(report: BacktestReport): string {
  const rows = report.trades.map((trade) =>
    [
      escapeCsv(report.symbol),
      trade.entryIndex.toString(),
      new Date(trade.entryTimestamp).toISOString(),
      trade.entryPrice.toString(),
      trade.exitIndex.toString(),
      new Date(trade.exitTimestamp).toISOString(),
      trade.exitPrice.toString(),
      trade.profitPct.toString(),
    ].join(',')
  );

  return [HEADER.join(','), ...rows].join('\n');
}

/**
 * Quote a field containing a comma, quote or line break
 */
export function escapeCsv(value: string): string {
  if (!/[",\r\n]/.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}
