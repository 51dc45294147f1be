/**
 * @fileoverview Type definitions for @refdata/logger
 * Provides strongly-typed interfaces for logger configuration and usage.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Log level determines the minimum severity of messages that will be logged.
 * - 'error': Failed requests, malformed responses
 * - 'warn': Conditions worth reviewing (no daily prices, duplicate tickers)
 * - 'info': Normal operations
 * - 'debug': Expected empty results and request details
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   filePath: './logs/refdata.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format.
   * - true: Machine-readable JSON
   * - false: Human-readable pretty-print
   * @default true in production, false in development
   */
  json?: boolean;

  /**
   * Optional file path for file transport, written in addition to console.
   */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;
}

/**
 * Context fields attached to every entry of a named logger.
 *
 * @example
 * ```typescript
 * const log = logger.child({ component: 'database', module: 'provider-eodhd' });
 * log.info('Exchanges retrieved', { count: 74 });
 * ```
 */
export interface ChildLoggerContext {
  /** Subsystem the logger belongs to (e.g., 'database', 'cli') */
  component?: string;

  /** Module inside the subsystem */
  module?: string;

  /** Exchange code being processed */
  exchange?: string;

  /** Ticker code being processed */
  ticker?: string;

  /** Operation name */
  operation?: string;

  /** Allow any additional context fields */
  [key: string]: unknown;
}

/**
 * Re-export Winston's Logger type for convenience.
 */
export type Logger = WinstonLogger;

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}
