/**
 * @fileoverview Public API of @refdata/cli
 *
 * @module @refdata/cli
 */

export { parseArgs, helpText, formatResult, createResult } from './cli-utils.js';
export type { ParsedArgs, CliResult, ExitCode } from './cli-utils.js';

export { runCommand, checkUsage, COMMAND_ARGUMENTS } from './commands.js';
export type { CommandDeps, CommandOutcome, RefDataProvider } from './commands.js';

export { formatCsv, formatValue } from './formatters/csv.js';

export { loadConfig, getConfigSummary, configSchema, envMapping } from './config/index.js';
export type { Config } from './config/index.js';
