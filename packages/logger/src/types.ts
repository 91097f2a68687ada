/**
 * @fileoverview Type definitions for the Trendline logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity of messages that will be logged.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   filePath: './logs/backtest.log',
 * };
 * ```
 */
export interface LoggerConfig {
  level: LogLevel;

  /**
   * Machine-readable JSON output instead of pretty-print.
   * @default true in production, false otherwise
   */
  json?: boolean;

  /** Also write to this file */
  filePath?: string;

  /**
   * Console output.
   * @default true
   */
  console?: boolean;

  /**
   * Send every console level to stderr, keeping stdout free for command
   * output.
   * @default false
   */
  stderr?: boolean;

  /** Additional stream transport, e.g. to capture entries in memory */
  stream?: NodeJS.WritableStream;
}

/**
 * Structured log entry with the standard fields used across packages.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;

  /** ISO 8601 timestamp */
  timestamp: string;

  /** Instrument identifier (e.g. "AAPL") */
  symbol?: string;

  /** Sampling interval tag (e.g. "1d") */
  interval?: string;

  /** Component or module name (typically from a child logger) */
  component?: string;

  /** Pipeline stage or command name */
  operation?: string;

  duration_ms?: number;

  /** Number of items processed */
  count?: number;

  error_code?: string;

  [key: string]: unknown;
}

/**
 * Fields a child logger adds to every entry.
 */
export interface ChildLoggerContext {
  component?: string;
  symbol?: string;
  interval?: string;
  operation?: string;
  [key: string]: unknown;
}

export type Logger = WinstonLogger;
