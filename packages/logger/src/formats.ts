/**
 * @fileoverview Custom Winston formats for @refdata/logger
 * Secret redaction, standard fields and pretty-print output.
 */

import { format } from 'winston';

/**
 * Field names whose values never reach a log line.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /private[_-]?key/i,
];

/**
 * Replacement value for redacted sensitive data.
 */
export const REDACTED = '[REDACTED]';

/**
 * Matches the credential query parameter of provider URLs.
 */
const API_TOKEN_PARAM = /([?&]api_token=)[^&#\s"]*/gi;

/**
 * Masks the `api_token` query parameter in a URL or any string containing one.
 *
 * @example
 * ```typescript
 * maskApiToken('https://eodhd.com/api/eod/AAPL.US?api_token=test-secret&fmt=json');
 * // 'https://eodhd.com/api/eod/AAPL.US?api_token=***&fmt=json'
 * ```
 */
export function maskApiToken(value: string): string {
  return value.replace(API_TOKEN_PARAM, '$1***');
}

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Returns a copy of a value with sensitive fields replaced and URL
 * credentials masked, at any depth.
 */
export function redactValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return maskApiToken(value);
  }

  if (value === null || typeof value !== 'object' || value instanceof Date) {
    return value;
  }

  if (value instanceof Error) {
    return {
      ...redactFields(value),
      name: value.name,
      message: maskApiToken(value.message),
      stack: value.stack === undefined ? undefined : maskApiToken(value.stack),
    };
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item));
  }

  return redactFields(value);
}

function redactFields(value: object): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    redacted[key] = isSensitiveKey(key) ? REDACTED : redactValue(nested);
  }
  return redacted;
}

/**
 * Winston format that redacts sensitive fields from log metadata and
 * masks API tokens in the message. Must run first in the chain.
 *
 * @example
 * ```typescript
 * logger.info('Request', { url: 'https://eodhd.com/api/exchanges-list/?api_token=test-secret', apiKey: 'test-secret' });
 * // {"level":"info","message":"Request","url":"https://eodhd.com/api/exchanges-list/?api_token=***","apiKey":"[REDACTED]"}
 * ```
 */
export const redactSecrets = format((info) => {
  const coreFields = ['level', 'timestamp', 'label'];

  for (const key of Object.keys(info)) {
    if (coreFields.includes(key)) {
      continue;
    }
    info[key] = isSensitiveKey(key) ? REDACTED : redactValue(info[key]);
  }

  return info;
});

/**
 * Winston format that adds timestamp and unpacks Error objects.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

/**
 * Winston format for human-readable output.
 *
 * @example
 * ```typescript
 * // [2025-01-15T12:34:56.789Z] info: Exchanges retrieved component=database module=provider-eodhd count=74
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, module: moduleName, stack, ...rest } = info;

    const context: string[] = [];
    if (component) context.push(`component=${String(component)}`);
    if (moduleName) context.push(`module=${String(moduleName)}`);

    for (const [key, value] of Object.entries(rest)) {
      if (['splat'].includes(key)) {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    return stack ? `${baseMsg}\n${String(stack)}` : baseMsg;
  })
);
