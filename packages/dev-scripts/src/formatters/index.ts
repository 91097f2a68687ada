/**
 * Output formatters for backtest results
 *
 * @module @trendline/dev-scripts/formatters
 */

export { formatCsv, escapeCsv } from './csv.js';
export { formatSummary, formatCompactSummary, formatPct } from './summary.js';
