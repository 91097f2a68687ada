/**
 * @fileoverview Public API exports for @trendline/logger
 * Structured logging for Trendline packages
 */

export { createLogger, createChildLogger, createSilentLogger } from './createLogger.js';

export { startTimer, measureSync } from './perf-timer.js';

export { redactValue, isSensitiveFieldName, REDACTED } from './formats.js';

export type { Logger, LoggerConfig, LogLevel, LogEntry, ChildLoggerContext } from './types.js';
export type { PerfTimer } from './perf-timer.js';
