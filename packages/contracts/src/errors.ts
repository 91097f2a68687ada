/**
 * @fileoverview Error taxonomy for the Trendline engine.
 *
 * Every error raised by the engine or its input layer extends TrendlineError
 * and carries a machine-readable code, a structured data payload and an ISO
 * timestamp.
 *
 * Conditions that are part of normal operation (a series shorter than a
 * window, a flat price run in the RSI) are values, not errors, and never
 * reach this module.
 *
 * @module @trendline/contracts/errors
 */

/**
 * Base error class for all Trendline errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new TrendlineError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class TrendlineError extends Error {
  /** Machine-readable error code (e.g., 'INVALID_CONFIG') */
  readonly code: string;

  /** Structured error data for debugging */
  readonly data?: Record<string, unknown>;

  /** ISO 8601 timestamp when the error was created */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'TrendlineError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when engine configuration fails validation, before any computation.
 *
 * `data.parameter` names the offending configuration key.
 *
 * @example
 * ```typescript
 * throw new InvalidConfigError('wShort (50) must be less than wLong (50)', {
 *   parameter: 'wShort',
 *   value: 50,
 * });
 * ```
 */
export class InvalidConfigError extends TrendlineError {
  declare readonly data: {
    parameter: string;
    value?: unknown;
    [key: string]: unknown;
  };

  constructor(
    message: string,
    data: { parameter: string; value?: unknown; [key: string]: unknown }
  ) {
    super('INVALID_CONFIG', message, data);
    this.name = 'InvalidConfigError';
  }
}

/**
 * Thrown when a bar violates the PriceBar invariants or the series ordering.
 */
export class InvalidBarError extends TrendlineError {
  declare readonly data: {
    index: number;
    [key: string]: unknown;
  };

  constructor(message: string, data: { index: number; [key: string]: unknown }) {
    super('INVALID_BAR', message, data);
    this.name = 'InvalidBarError';
  }
}

/**
 * Thrown when the data source returned no bars at all.
 *
 * The engine is never invoked on an empty series; callers surface this
 * upstream as "no data".
 */
export class NoDataError extends TrendlineError {
  declare readonly data: {
    symbol: string;
    interval: string;
    period: string;
    [key: string]: unknown;
  };

  constructor(
    message: string,
    data: { symbol: string; interval: string; period: string; [key: string]: unknown }
  ) {
    super('NO_DATA', message, data);
    this.name = 'NoDataError';
  }
}

/**
 * Thrown when a bar fixture file cannot be read or has the wrong shape.
 */
export class FixtureError extends TrendlineError {
  declare readonly data: {
    path: string;
    [key: string]: unknown;
  };

  constructor(message: string, data: { path: string; [key: string]: unknown }) {
    super('FIXTURE_INVALID', message, data);
    this.name = 'FixtureError';
  }
}

/**
 * Type guard to check if an error is a TrendlineError.
 *
 * @example
 * ```typescript
 * try {
 *   runEngine(series, config);
 * } catch (err) {
 *   if (isTrendlineError(err)) {
 *     logger.error(err.message, { error_code: err.code });
 *   }
 * }
 * ```
 */
export function isTrendlineError(error: unknown): error is TrendlineError {
  return error instanceof TrendlineError;
}

export function isInvalidConfigError(error: unknown): error is InvalidConfigError {
  return error instanceof InvalidConfigError;
}

export function isInvalidBarError(error: unknown): error is InvalidBarError {
  return error instanceof InvalidBarError;
}

export function isNoDataError(error: unknown): error is NoDataError {
  return error instanceof NoDataError;
}

export function isFixtureError(error: unknown): error is FixtureError {
  return error instanceof FixtureError;
}
