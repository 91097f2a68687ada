/**
 * @fileoverview Main logger factory.
 *
 * Creates configured Winston logger instances with structured fields, secret
 * redaction and console, file or stream transports.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger, ChildLoggerContext, LogLevel } from './types.js';
import { redactSecrets, standardFields, prettyPrint } from './formats.js';

const ALL_LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Creates a logger with structured fields and secret redaction.
 *
 * The format chain redacts first, then stamps standard fields, then renders
 * JSON or a pretty line.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Engine finished', { symbol: 'AAPL', trades: 3 });
 * ```
 *
 * @example
 * ```typescript
 * // CLI: keep stdout for results, diagnostics to stderr
 * const logger = createLogger({ level: 'warn', stderr: true });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    stderr = false,
    stream,
  } = config;

  const logFormat = format.combine(
    redactSecrets(),
    standardFields,
    json ? format.json() : prettyPrint
  );

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: logFormat,
        stderrLevels: stderr ? ALL_LEVELS : ['error'],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: logFormat,
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  if (stream) {
    transports.push(
      new winston.transports.Stream({
        stream,
        level,
        format: logFormat,
      })
    );
  }

  return winston.createLogger({
    level,
    transports,
    // Winston must not exit the process; callers decide exit codes
    exitOnError: false,
    // Avoids winston's "no transports" warning when everything is disabled
    silent: transports.length === 0,
  });
}

/**
 * Creates a child logger whose entries all carry `context`.
 *
 * @example
 * ```typescript
 * const engineLogger = createChildLogger(logger, { component: 'engine', symbol: 'AAPL' });
 * engineLogger.debug('Indicators computed');
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}

/**
 * A logger that discards every entry.
 */
export function createSilentLogger(): Logger {
  return winston.createLogger({ level: 'error', silent: true });
}
