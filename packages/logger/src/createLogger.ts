/**
 * @fileoverview Logger construction for @refdata/logger
 * Creates configured Winston logger instances with structured logging,
 * secret redaction, and console/file transports.
 */

import winston, { format } from 'winston';
import type { ChildLoggerContext, LoggerConfig, Logger } from './types.js';
import { redactSecrets, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * Format chain order matters: secrets are redacted first, then standard
 * fields are added, then the output format is applied.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Tickers retrieved', { exchange: 'LSE', count: 3120 });
 * ```
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   level: 'debug',
 *   json: false,
 *   filePath: './logs/refdata.log',
 * });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
  } = config;

  const logFormat = format.combine(redactSecrets(), standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: logFormat,
        // Keep stdout free for command output
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: json ? logFormat : format.combine(redactSecrets(), standardFields, format.json()),
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    exitOnError: false,
  });
}

/**
 * Creates a child logger whose entries all carry the given context.
 *
 * @example
 * ```typescript
 * const log = createChildLogger(logger, { component: 'cli', operation: 'tickers' });
 * log.info('Command started'); // includes component and operation
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
