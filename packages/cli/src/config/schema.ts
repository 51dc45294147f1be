/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { EODHD_BASE_URL } from '@refdata/provider-eodhd';

/**
 * CLI configuration schema
 */
export const configSchema = z.object({
  provider: z.object({
    apiKey: z.string().min(1, 'EODHD_API_KEY must not be empty'),
    baseUrl: z.string().url().default(EODHD_BASE_URL),
    timeout: z.coerce.number().int().positive().default(30000),
  }),

  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    format: z.enum(['json', 'pretty']).default('pretty'),
    filePath: z.string().optional(),
  }),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  EODHD_API_KEY: 'provider.apiKey',
  EODHD_BASE_URL: 'provider.baseUrl',
  EODHD_TIMEOUT: 'provider.timeout',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
};
