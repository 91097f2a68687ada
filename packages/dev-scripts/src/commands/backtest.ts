/**
 * backtest - Run the crossover engine over a bar fixture
 *
 * Read-only and deterministic apart from the result timestamp. Results go
 * to stdout; diagnostics go through the logger.
 */

import type { EngineConfig } from '@trendline/contracts';
import {
  isEnginePresetName,
  isIntradayInterval,
  isNoDataError,
  isTrendlineError,
  resolveInterval,
} from '@trendline/contracts';
import { resolveEngineConfig, runEngine } from '@trendline/analysis-kit';
import { loadBarFixture } from '@trendline/market-data';
import { createLogger, startTimer, type Logger } from '@trendline/logger';
import { createResult, formatHelp, formatResult, parseArgs, type ParsedArgs } from '../cli-utils.js';
import { loadCliConfig, type CliConfig } from '../config/index.js';
import { formatCsv } from '../formatters/csv.js';
import { formatSummary } from '../formatters/summary.js';
import { buildReport } from '../report.js';

export const COMMAND = 'backtest';

export interface CommandOutcome {
  exitCode: 0 | 2;

  /** Text for stdout, without a trailing newline */
  stdout: string;
}

export interface BacktestOptions {
  env?: NodeJS.ProcessEnv;

  /** Overrides the logger built from the LOG_* variables */
  logger?: Logger;
}

const INTRADAY_HINT =
  'Intraday data is limited to roughly the last 60 days; reduce the history period and try again';

function createCliLogger(config: CliConfig): Logger {
  return createLogger({
    level: config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
    stderr: true,
  });
}

function usageError(args: ParsedArgs, message: string): CommandOutcome {
  return {
    exitCode: 2,
    stdout: formatResult(createResult(COMMAND, false, null, { errors: [message] }), args.pretty),
  };
}

/**
 * Engine overrides from flags over environment; unset values stay undefined
 * so the engine defaults and the preset apply.
 */
function engineOverrides(args: ParsedArgs, config: CliConfig): Partial<EngineConfig> {
  return {
    wShort: args.wShort ?? config.engine.wShort,
    wLong: args.wLong ?? config.engine.wLong,
    wMomentum: args.wMomentum ?? config.engine.wMomentum,
    rsiPolicy: args.rsi === 'simple' || args.rsi === 'wilder' ? args.rsi : config.engine.rsiPolicy,
  };
}

/**
 * Runs the backtest command for `argv` (arguments after the command name).
 */
export function runBacktestCommand(argv: readonly string[], options: BacktestOptions = {}): CommandOutcome {
  const args = parseArgs(argv);

  if (args.help) {
    return {
      exitCode: 0,
      stdout: formatHelp(
        COMMAND,
        'Run the SMA crossover backtest over a bar fixture',
        'Fixture format: { "symbol", "interval", "period", "bars": [{ "date", "open", "high", "low", "close", "volume" }] }'
      ),
    };
  }

  let cliConfig: CliConfig;
  try {
    cliConfig = loadCliConfig(options.env ?? process.env);
  } catch (error) {
    return usageError(args, error instanceof Error ? error.message : String(error));
  }

  const logger = options.logger ?? createCliLogger(cliConfig);

  if (args.unknown.length > 0) {
    return usageError(args, `Unknown option: ${args.unknown.join(', ')}`);
  }
  if (!args.fixture) {
    return usageError(args, 'Missing required argument: --fixture=path.json');
  }
  if (args.rsi !== undefined && args.rsi !== 'simple' && args.rsi !== 'wilder') {
    return usageError(args, `Invalid --rsi value: ${args.rsi} (expected simple or wilder)`);
  }
  const preset = args.preset ?? 'default';
  if (!isEnginePresetName(preset)) {
    return usageError(args, `Invalid --preset value: ${preset} (expected default or legacy-40)`);
  }

  const timer = startTimer();
  const warnings: string[] = [];

  try {
    const config = resolveEngineConfig(engineOverrides(args, cliConfig), preset);
    const { series, skipped, duplicates } = loadBarFixture(args.fixture);
    logger.info('Loaded fixture', {
      component: 'cli',
      symbol: series.symbol,
      interval: series.interval,
      count: series.bars.length,
    });

    if (skipped.length > 0) {
      warnings.push(`Skipped ${skipped.length} malformed row(s)`);
      for (const row of skipped) {
        logger.warn('Skipped malformed row', { component: 'cli', index: row.index, reason: row.reason });
      }
    }
    if (duplicates > 0) {
      warnings.push(`Dropped ${duplicates} duplicate timestamp(s); the last row was kept`);
    }
    if (series.bars.length < config.wLong) {
      warnings.push(
        `Series has ${series.bars.length} bars, fewer than wLong (${config.wLong}); no crossovers can occur`
      );
    }

    const result = runEngine(series, config, { logger });
    const report = buildReport(args.fixture, result, series.bars);
    logger.debug('Backtest finished', { component: 'cli', duration_ms: timer.stop() });

    if (args.csv) {
      return { exitCode: 0, stdout: formatCsv(report) };
    }
    if (args.pretty) {
      const text = formatSummary(report);
      return {
        exitCode: 0,
        stdout: warnings.length > 0 ? `${text}\n\nWarnings:\n${warnings.map((w) => `  - ${w}`).join('\n')}` : text,
      };
    }
    return {
      exitCode: 0,
      stdout: formatResult(createResult(COMMAND, true, report, { warnings }), false),
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Backtest failed', {
      component: 'cli',
      error_code: isTrendlineError(error) ? error.code : undefined,
      error: message,
    });

    if (isNoDataError(error)) {
      const interval = resolveInterval(error.data.interval);
      if (interval !== null && isIntradayInterval(interval)) {
        warnings.push(INTRADAY_HINT);
      }
    }

    return {
      exitCode: 2,
      stdout: formatResult(createResult(COMMAND, false, null, { errors: [message], warnings }), args.pretty),
    };
  }
}
