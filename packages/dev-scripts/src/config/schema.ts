/**
 * CLI configuration schema using Zod
 */

import { z } from 'zod';

const optionalWindow = z.coerce.number().int().positive().optional();

/**
 * CLI configuration schema. Every engine field is optional: unset fields
 * fall back to the engine defaults.
 */
export const cliConfigSchema = z.object({
  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'debug']).default('warn'),
    format: z.enum(['json', 'pretty']).default('pretty'),
    filePath: z.string().min(1).optional(),
  }),

  engine: z.object({
    wShort: optionalWindow,
    wLong: optionalWindow,
    wMomentum: optionalWindow,
    rsiPolicy: z.enum(['simple', 'wilder']).optional(),
  }),
});

/**
 * Inferred configuration type
 */
export type CliConfig = z.infer<typeof cliConfigSchema>;

export type CliConfigSection = keyof CliConfig;

/**
 * Environment variable mapping: variable name to [section, key]
 */
export const envMapping: Record<string, [CliConfigSection, string]> = {
  LOG_LEVEL: ['logging', 'level'],
  LOG_FORMAT: ['logging', 'format'],
  LOG_FILE: ['logging', 'filePath'],
  TRENDLINE_W_SHORT: ['engine', 'wShort'],
  TRENDLINE_W_LONG: ['engine', 'wLong'],
  TRENDLINE_W_MOMENTUM: ['engine', 'wMomentum'],
  TRENDLINE_RSI_POLICY: ['engine', 'rsiPolicy'],
};
