/**
 * backtest - Run the SMA crossover engine over a bar fixture
 *
 * USAGE:
 *   backtest --fixture=path.json [--w-short=N] [--w-long=N] [--w-momentum=N]
 *            [--rsi=simple|wilder] [--preset=default|legacy-40] [--csv] [--pretty]
 *
 * EXIT CODES:
 *   0 - Backtest completed successfully
 *   2 - Fatal error (fixture not found, invalid fixture, invalid config, etc.)
 *
 * FIXTURE FORMAT (examples/rise-and-fall.json):
 * {
 *   "symbol": "DEMO",
 *   "interval": "1d",
 *   "period": "6mo",
 *   "bars": [
 *     { "date": "2025-01-02T00:00:00.000Z", "open": 100, "high": 101, "low": 99, "close": 100, "volume": 1000 },
 *     ...
 *   ]
 * }
 */

import { runBacktestCommand } from '../src/commands/backtest.js';

const { exitCode, stdout } = runBacktestCommand(process.argv.slice(2));
process.stdout.write(`${stdout}\n`);
process.exitCode = exitCode;
