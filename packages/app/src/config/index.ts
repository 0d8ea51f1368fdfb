/**
 * Configuration loading and management
 */

import type { Logger } from '@tapline/logger';
import { configSchema, envMapping, type Config } from './schema.js';

type RawConfig = { [key: string]: RawConfig | string | boolean };

/**
 * Thrown when the environment does not describe a valid configuration.
 * `issues` holds one `path: message` line per problem.
 */
export class ConfigValidationError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Configuration validation failed:\n${issues.join('\n')}`);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

/**
 * Load configuration from environment and defaults
 *
 * @param env - Variables to read; `process.env` by default
 * @throws ConfigValidationError listing every invalid path
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, logger?: Logger): Config {
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, parseEnvValue(value));
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new ConfigValidationError(result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`));
  }

  if (logger) {
    logger.info('Configuration loaded', getConfigSummary(result.data));
  }

  return result.data;
}

/**
 * Set nested property in object
 */
function setNestedProperty(obj: RawConfig, path: string, value: string | boolean): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) return;

  let current = obj;
  for (const key of keys) {
    const next = current[key];
    if (typeof next === 'object') {
      current = next;
    } else {
      const created: RawConfig = {};
      current[key] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

/**
 * Booleans are recognised; everything else stays a string
 */
function parseEnvValue(value: string): string | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

/**
 * Get configuration summary for logging. Secrets are left out.
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    environment: config.app.env,
    name: config.app.name,
    services: {
      discord: config.discord.enabled ? 'enabled' : 'disabled',
      shell: config.discord.enabled ? 'disabled' : 'enabled',
    },
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? null,
    },
    timezone: config.clock.timezone,
  };
}

// Re-export types
export type { Config } from './schema.js';
export { configSchema, envMapping } from './schema.js';
