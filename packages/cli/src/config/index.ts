/**
 * Configuration loading and management
 */

import type { Logger } from '@refdata/logger';
import { configSchema, envMapping } from './schema.js';
import type { Config } from './schema.js';

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load configuration from environment and defaults.
 *
 * Values stay strings; the schema coerces the numeric ones, so an API key
 * made of digits is not turned into a number.
 *
 * @throws {Error} Listing every invalid path
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, logger?: Logger): Config {
  const rawConfig: RawConfig = { provider: {}, logging: {} };

  // Load from environment variables
  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, value);
    }
  }

  // Parse and validate
  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  if (logger) {
    logger.debug('Configuration loaded', getConfigSummary(result.data));
  }

  return result.data;
}

/**
 * Set nested property in object
 */
function setNestedProperty(obj: RawConfig, path: string, value: unknown): void {
  const keys = path.split('.');
  let current = obj;

  for (const key of keys.slice(0, -1)) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: RawConfig = {};
      current[key] = created;
      current = created;
    }
  }

  const lastKey = keys[keys.length - 1];
  if (lastKey) {
    current[lastKey] = value;
  }
}

/**
 * Get configuration summary for logging. The API key is never included.
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    provider: {
      baseUrl: config.provider.baseUrl,
      timeout: config.provider.timeout,
    },
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? null,
    },
  };
}

// Re-export types
export { configSchema, envMapping } from './schema.js';
export type { Config } from './schema.js';
