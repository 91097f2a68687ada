/**
 * @fileoverview Custom Winston formats: secret redaction, standard fields
 * and pretty-print output.
 */

import { format } from 'winston';

/**
 * Field names whose values must never reach a log sink (case-insensitive).
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /private[_-]?key/i,
  /credential/i,
];

export const REDACTED = '[REDACTED]';

/** Winston's own fields, never redacted */
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label']);

export function isSensitiveFieldName(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Returns a copy of `value` with sensitive fields replaced, recursing into
 * nested objects and arrays. The input is not mutated.
 *
 * @example
 * ```typescript
 * redactValue({ user: 'alice', apiKey: 'test-secret' });
 * // { user: 'alice', apiKey: '[REDACTED]' }
 * ```
 */
export function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item));
  }
  if (!isPlainRecord(value)) {
    return value;
  }

  const out: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    out[key] = isSensitiveFieldName(key) ? REDACTED : redactValue(nested);
  }
  return out;
}

/**
 * Redacts sensitive metadata. Must run first in the format chain.
 */
export const redactSecrets = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    info[key] = isSensitiveFieldName(key) ? REDACTED : redactValue(info[key]);
  }
  return info;
});

/**
 * Adds an ISO 8601 timestamp and expands Error objects with their stack.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

/**
 * Renders a single line for humans:
 *
 * `[2025-09-29T12:34:56.789Z] info: Engine finished component=engine symbol=AAPL trades=3`
 */
export const prettyLine = format.printf((info) => {
  const { timestamp, level, message, component, symbol, interval, ...rest } = info;

  const context: string[] = [];
  if (component) context.push(`component=${String(component)}`);
  if (symbol) context.push(`symbol=${String(symbol)}`);
  if (interval) context.push(`interval=${String(interval)}`);

  for (const [key, value] of Object.entries(rest)) {
    if (key === 'stack' || key === 'splat') {
      continue;
    }
    context.push(`${key}=${JSON.stringify(value)}`);
  }

  const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
  const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

  return typeof info['stack'] === 'string' ? `${baseMsg}\n${info['stack']}` : baseMsg;
});

export const prettyPrint = format.combine(format.colorize(), prettyLine);
