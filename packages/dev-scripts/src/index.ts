/**
 * @trendline/dev-scripts
 *
 * The backtest command and the helpers it is built from.
 *
 * @packageDocumentation
 */

export { runBacktestCommand, COMMAND, type CommandOutcome, type BacktestOptions } from './commands/backtest.js';
export { parseArgs, formatHelp, formatResult, createResult, type ParsedArgs, type CliResult } from './cli-utils.js';
export { loadCliConfig, cliConfigSchema, envMapping, type CliConfig } from './config/index.js';
export { buildReport, type BacktestReport, type LatestSnapshot } from './report.js';
export { formatCsv, escapeCsv, formatSummary, formatCompactSummary, formatPct } from './formatters/index.js';
