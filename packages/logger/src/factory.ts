/**
 * @fileoverview Named logger registry.
 *
 * Modules ask for a logger by (subsystem, module) identity instead of
 * building their own. All named loggers are children of one root logger
 * that the application configures once at startup.
 */

import { createLogger } from './createLogger.js';
import { isLogLevel } from './types.js';
import type { Logger, LoggerConfig } from './types.js';

function defaultConfig(): LoggerConfig {
  const level = process.env['LOG_LEVEL'];
  return {
    level: isLogLevel(level) ? level : 'info',
  };
}

/**
 * Hands out child loggers keyed by subsystem and module.
 *
 * The root logger is created lazily, so importing a module that asks for
 * a logger has no side effects until something is logged.
 *
 * @example
 * ```typescript
 * const factory = new LoggerFactory({ level: 'debug', json: true });
 * const log = factory.getLogger('database', 'provider-eodhd');
 * log.debug('No price history', { ticker: 'AAPL', exchange: 'US' });
 * // {"component":"database","module":"provider-eodhd","ticker":"AAPL",...}
 * ```
 */
export class LoggerFactory {
  private root?: Logger;
  private config?: LoggerConfig;
  private readonly named = new Map<string, Logger>();

  constructor(config?: LoggerConfig) {
    this.config = config;
  }

  /**
   * Replaces the root logger. Loggers handed out earlier keep writing to
   * the previous root; later getLogger() calls return fresh children.
   */
  configure(config: LoggerConfig): void {
    this.config = config;
    this.root = undefined;
    this.named.clear();
  }

  get rootLogger(): Logger {
    if (!this.root) {
      this.root = createLogger(this.config ?? defaultConfig());
    }
    return this.root;
  }

  getLogger(subsystem: string, moduleName: string): Logger {
    const key = `${subsystem}:${moduleName}`;
    let logger = this.named.get(key);
    if (!logger) {
      logger = this.rootLogger.child({ component: subsystem, module: moduleName });
      this.named.set(key, logger);
    }
    return logger;
  }
}

/**
 * Process-wide factory used by getLogger() and configureLogging().
 */
export const loggerFactory = new LoggerFactory();

/**
 * Returns the named logger for a subsystem/module pair.
 *
 * @example
 * ```typescript
 * const logger = getLogger('database', 'provider-eodhd');
 * ```
 */
export function getLogger(subsystem: string, moduleName: string): Logger {
  return loggerFactory.getLogger(subsystem, moduleName);
}

export function configureLogging(config: LoggerConfig): void {
  loggerFactory.configure(config);
}
