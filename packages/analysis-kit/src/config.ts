/**
 * Engine configuration validation
 *
 * Configuration is merged from defaults, an optional named preset and caller
 * overrides, then validated once before any computation runs.
 */

import { z } from 'zod';
import type { EngineConfig, EnginePresetName } from '@trendline/contracts';
import { DEFAULT_ENGINE_CONFIG, ENGINE_PRESETS, InvalidConfigError } from '@trendline/contracts';

const windowLength = z
  .number({ invalid_type_error: 'must be a number' })
  .int('must be an integer')
  .positive('must be a positive integer');

const rsiLevel = z
  .number({ invalid_type_error: 'must be a number' })
  .min(0, 'must be between 0 and 100')
  .max(100, 'must be between 0 and 100');

export const engineConfigSchema = z
  .object({
    wShort: windowLength,
    wLong: windowLength,
    wMomentum: windowLength,
    wExtrema: windowLength,
    wVolume: windowLength,
    rsiPolicy: z.enum(['simple', 'wilder']),
    initialCross: z.enum(['baseline', 'none']),
    rsiOverbought: rsiLevel,
    rsiOversold: rsiLevel,
  })
  .superRefine((config, ctx) => {
    if (config.wShort >= config.wLong) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['wShort'],
        message: `must be less than wLong (${config.wLong})`,
      });
    }
    if (config.rsiOversold >= config.rsiOverbought) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['rsiOversold'],
        message: `must be less than rsiOverbought (${config.rsiOverbought})`,
      });
    }
  }) satisfies z.ZodType<EngineConfig>;

function withoutUndefined(overrides: Partial<EngineConfig>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

/**
 * Validates an already merged configuration.
 *
 * @throws InvalidConfigError naming the first offending parameter
 */
export function validateEngineConfig(candidate: unknown): EngineConfig {
  const parsed = engineConfigSchema.safeParse(candidate);
  if (parsed.success) {
    return parsed.data;
  }

  const issue = parsed.error.issues[0];
  const parameter = issue?.path[0] !== undefined ? String(issue.path[0]) : 'config';
  const value: unknown =
    typeof candidate === 'object' && candidate !== null && parameter in candidate
      ? Reflect.get(candidate, parameter)
      : undefined;

  throw new InvalidConfigError(
    `Invalid engine config: ${parameter} ${issue?.message ?? 'is invalid'}, got ${String(value)}`,
    { parameter, value }
  );
}

/**
 * Merges defaults, preset and overrides (later wins) and validates the
 * result. Override keys set to undefined are ignored.
 *
 * @throws InvalidConfigError
 *
 * @example
 * ```typescript
 * resolveEngineConfig({ rsiPolicy: 'wilder' }, 'legacy-40');
 * // { wShort: 18, wLong: 40, wMomentum: 14, ..., rsiPolicy: 'wilder' }
 * ```
 */
export function resolveEngineConfig(
  overrides: Partial<EngineConfig> = {},
  preset: EnginePresetName = 'default'
): EngineConfig {
  return validateEngineConfig({
    ...DEFAULT_ENGINE_CONFIG,
    ...ENGINE_PRESETS[preset],
    ...withoutUndefined(overrides),
  });
}
