/**
 * Shared CLI utilities for @trendline/dev-scripts
 *
 * - Argument parsing with flag validation
 * - Consistent help text formatting
 * - Unified JSON/pretty output logic
 * - Standard result object structure
 *
 * All CLIs output JSON by default; --pretty switches to human-readable
 * text. Exit codes: 0 = success, 2 = fatal error or invalid usage.
 */

/**
 * Parsed command-line arguments
 */
export interface ParsedArgs {
  help: boolean; // --help: Show help text
  pretty: boolean; // --pretty: Human-readable formatted output
  csv: boolean; // --csv: Trade ledger as CSV
  fixture?: string; // --fixture=path: Path to bar fixture file
  wShort?: number; // --w-short=N
  wLong?: number; // --w-long=N
  wMomentum?: number; // --w-momentum=N
  rsi?: string; // --rsi=simple|wilder
  preset?: string; // --preset=default|legacy-40
  unknown: string[]; // Flags this parser does not recognise
  remaining: string[]; // Positional arguments (non-flag args)
}

/**
 * Standard result object structure returned by all CLIs
 */
export interface CliResult {
  success: boolean; // Overall operation success status
  command: string; // Name of the command that ran
  timestamp: string; // ISO 8601 timestamp of execution
  data: unknown; // Command-specific data
  warnings?: string[]; // Non-fatal warnings
  errors?: string[]; // Fatal errors
}

const NUMERIC_FLAGS = {
  '--w-short=': 'wShort',
  '--w-long=': 'wLong',
  '--w-momentum=': 'wMomentum',
} as const;

/**
 * Parse command-line arguments.
 *
 * Numeric flags are converted with Number(); a malformed value becomes NaN
 * and is rejected later by engine config validation, which names the
 * parameter.
 *
 * @example
 * const args = parseArgs(process.argv.slice(2));
 * if (args.help) {
 *   process.stdout.write(formatHelp('backtest', 'Run the crossover backtest over a bar fixture'));
 * }
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const args: ParsedArgs = {
    help: false,
    pretty: false,
    csv: false,
    unknown: [],
    remaining: [],
  };

  for (const arg of argv) {
    const numeric = Object.entries(NUMERIC_FLAGS).find(([prefix]) => arg.startsWith(prefix));

    if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--pretty') {
      args.pretty = true;
    } else if (arg === '--csv') {
      args.csv = true;
    } else if (arg.startsWith('--fixture=')) {
      args.fixture = arg.slice('--fixture='.length);
    } else if (numeric) {
      const [prefix, key] = numeric;
      const raw = arg.slice(prefix.length);
      args[key] = raw.trim() === '' ? Number.NaN : Number(raw);
    } else if (arg.startsWith('--rsi=')) {
      args.rsi = arg.slice('--rsi='.length);
    } else if (arg.startsWith('--preset=')) {
      args.preset = arg.slice('--preset='.length);
    } else if (arg.startsWith('-')) {
      args.unknown.push(arg);
    } else {
      args.remaining.push(arg);
    }
  }

  return args;
}

/**
 * Render standardized help text.
 *
 * @example
 * process.stdout.write(formatHelp('backtest', 'Run the crossover backtest',
 *   'Required: --fixture=path.json'));
 */
export function formatHelp(commandName: string, description: string, additionalHelp?: string): string {
  return `
${commandName} - ${description}

USAGE:
  ${commandName} --fixture=path.json [options]

OPTIONS:
  --help, -h          Show this help message
  --fixture=path      Path to bar fixture file (required)
  --w-short=N         Short SMA window (default 18)
  --w-long=N          Long SMA window (default 50)
  --w-momentum=N      RSI window (default 14)
  --rsi=POLICY        RSI averaging: simple (default) or wilder
  --preset=NAME       Parameter preset: default or legacy-40
  --csv               Output the trade ledger as CSV
  --pretty            Human-readable summary (default: JSON)

ENVIRONMENT:
  LOG_LEVEL, LOG_FORMAT, LOG_FILE, TRENDLINE_W_SHORT, TRENDLINE_W_LONG,
  TRENDLINE_W_MOMENTUM, TRENDLINE_RSI_POLICY (flags override environment)

OUTPUT:
  By default, outputs machine-readable JSON to stdout.
  Diagnostics are logged to stderr.

EXIT CODES:
  0  Success
  2  Fatal error or invalid usage
${additionalHelp ? `\n${additionalHelp}\n` : ''}`;
}

/**
 * Render a result in JSON or pretty format
 *
 * JSON mode: single-line JSON for machine parsing
 * Pretty mode: multi-line formatted output
 */
export function formatResult(result: CliResult, pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(result);
  }

  const lines: string[] = [];
  lines.push('='.repeat(60));
  lines.push(`Command: ${result.command}`);
  lines.push(`Status: ${result.success ? 'SUCCESS' : 'FAILED'}`);
  lines.push(`Timestamp: ${result.timestamp}`);
  lines.push('='.repeat(60));

  if (result.data !== null && result.data !== undefined) {
    lines.push('', 'Data:', JSON.stringify(result.data, null, 2));
  }

  if (result.warnings && result.warnings.length > 0) {
    lines.push('', 'Warnings:');
    result.warnings.forEach((w) => lines.push(`  - ${w}`));
  }

  if (result.errors && result.errors.length > 0) {
    lines.push('', 'Errors:');
    result.errors.forEach((e) => lines.push(`  - ${e}`));
  }

  return lines.join('\n');
}

/**
 * Create a standard result object
 *
 * Empty warning and error lists are omitted.
 *
 * @example
 * const result = createResult('backtest', true, report, {
 *   warnings: ['Skipped 2 malformed rows'],
 * });
 */
export function createResult(
  command: string,
  success: boolean,
  data: unknown,
  options: {
    warnings?: string[];
    errors?: string[];
  } = {}
): CliResult {
  const result: CliResult = {
    success,
    command,
    timestamp: new Date().toISOString(),
    data,
  };
  if (options.warnings && options.warnings.length > 0) {
    result.warnings = options.warnings;
  }
  if (options.errors && options.errors.length > 0) {
    result.errors = options.errors;
  }
  return result;
}
