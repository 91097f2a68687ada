/**
 * Configuration loader
 */

import type { Logger } from '@trendline/logger';
import { InvalidConfigError } from '@trendline/contracts';
import { cliConfigSchema, envMapping, type CliConfig, type CliConfigSection } from './schema.js';

export { cliConfigSchema, envMapping, type CliConfig } from './schema.js';

/**
 * Load configuration from environment variables and defaults.
 *
 * Empty variables count as unset.
 *
 * @throws InvalidConfigError naming the variable that failed validation
 */
export function loadCliConfig(env: NodeJS.ProcessEnv = process.env, logger?: Logger): CliConfig {
  const rawConfig: Record<CliConfigSection, Record<string, string>> = { logging: {}, engine: {} };

  for (const [envKey, [section, key]] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value.trim() !== '') {
      rawConfig[section][key] = value.trim();
    }
  }

  const result = cliConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue ? issue.path.join('.') : '';
    const envKey = Object.keys(envMapping).find((key) => envMapping[key]?.join('.') === path) ?? path;
    throw new InvalidConfigError(`Invalid environment: ${envKey}: ${issue?.message ?? 'invalid value'}`, {
      parameter: envKey,
      value: env[envKey],
    });
  }

  logger?.debug('Configuration loaded', {
    log_level: result.data.logging.level,
    engine_overrides: Object.keys(rawConfig.engine),
  });

  return result.data;
}
