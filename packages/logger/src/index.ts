/**
 * @fileoverview Public API exports for @refdata/logger
 * Structured logging and error handling for the reference data tools
 */

export { createLogger, createChildLogger } from './createLogger.js';

export { LoggerFactory, loggerFactory, getLogger, configureLogging } from './factory.js';

export { attachGlobalHandlers } from './errorHandler.js';

export { maskApiToken, redactValue, REDACTED } from './formats.js';

export { LOG_LEVELS, isLogLevel } from './types.js';

export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';
