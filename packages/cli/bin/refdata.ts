#!/usr/bin/env tsx

/**
 * refdata - Retrieve market reference data from EODHD
 *
 * USAGE:
 *   refdata exchanges [--csv] [--pretty]
 *   refdata tickers <EXCHANGE> [--csv] [--pretty]
 *   refdata history <EXCHANGE> <TICKER> [--to=YYYY-MM-DD] [--csv] [--pretty]
 *   refdata daily <EXCHANGE> [--csv] [--pretty]
 *
 * Configuration comes from the environment (EODHD_API_KEY, LOG_LEVEL, ...),
 * with a .env file in the working directory loaded first.
 * Results go to stdout, logs to stderr.
 *
 * EXIT CODES:
 *   0 - Data retrieved
 *   1 - The provider returned no data
 *   2 - Request or response error, bad configuration, invalid usage
 *
 * EXAMPLE OUTPUT (JSON):
 * {
 *   "success": true,
 *   "command": "tickers",
 *   "timestamp": "2024-07-01T08:00:00.000Z",
 *   "data": {
 *     "exchange": "LSE",
 *     "count": 1,
 *     "columns": ["Ticker_ID", "Code", "Name", ...],
 *     "rows": [{ "Ticker_ID": "VOD_LSE", "Code": "VOD", ... }]
 *   }
 * }
 */

import 'dotenv/config';
import { attachGlobalHandlers, configureLogging, getLogger } from '@refdata/logger';
import { EodhdProvider } from '@refdata/provider-eodhd';
import { createResult, formatResult, helpText, parseArgs } from '../src/cli-utils.js';
import { checkUsage, runCommand } from '../src/commands.js';
import { loadConfig } from '../src/config/index.js';
import type { Config } from '../src/config/index.js';

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  // Show help if requested
  if (args.help) {
    console.log(helpText());
    process.exitCode = 0;
    return;
  }

  const command = args.remaining[0] ?? '';

  const invalid = checkUsage(args);
  if (invalid !== undefined) {
    console.log(invalid.output);
    process.exitCode = invalid.exitCode;
    return;
  }

  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.log(formatResult(createResult(command, false, null, { errors: [message] }), args.pretty));
    process.exitCode = 2;
    return;
  }

  configureLogging({
    level: config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
  });

  const logger = getLogger('cli', 'refdata');
  attachGlobalHandlers(logger);

  const provider = new EodhdProvider({
    apiKey: config.provider.apiKey,
    baseUrl: config.provider.baseUrl,
    timeout: config.provider.timeout,
  });

  logger.debug('Running command', { command, arguments: args.remaining.slice(1) });

  const outcome = await runCommand(args, { provider });
  console.log(outcome.output);
  process.exitCode = outcome.exitCode;
}

// Run main function
main().catch((error) => {
  console.error('Unexpected error:', error);
  process.exit(2);
});
