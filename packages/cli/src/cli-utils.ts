/**
 * Shared CLI utilities for @refdata/cli
 *
 * - Argument parsing with flag validation
 * - Help text
 * - JSON/pretty result formatting
 * - Standard result object structure
 *
 * All output is JSON by default; --pretty is for humans and --csv prints
 * the retrieved table alone. Exit codes: 0 = success, 1 = no data,
 * 2 = error or invalid usage.
 */

/**
 * Parsed command-line arguments
 */
export interface ParsedArgs {
  help: boolean; // --help: Show help text
  pretty: boolean; // --pretty: Human-readable formatted output
  csv: boolean; // --csv: Print the table as CSV
  to?: string; // --to=YYYY-MM-DD: Last date of a history request
  unknownFlags: string[]; // Flags this CLI does not know
  remaining: string[]; // Positional arguments (non-flag args)
}

/**
 * Standard result object structure
 */
export interface CliResult {
  success: boolean; // Overall operation success status
  command: string; // Name of the command that ran
  timestamp: string; // ISO 8601 timestamp of execution
  data: unknown; // Command-specific data (table, row count, ...)
  warnings?: string[]; // Non-fatal warnings
  errors?: string[]; // Fatal errors
}

export type ExitCode = 0 | 1 | 2;

/**
 * Parse command-line arguments
 *
 * Supports flags:
 * - --help, -h: Show help text
 * - --pretty: Human-readable output
 * - --csv: CSV output
 * - --to=YYYY-MM-DD: End date for `history`
 *
 * @param argv - Typically process.argv.slice(2)
 *
 * @example
 * const args = parseArgs(['history', 'US', 'AAPL', '--to=2024-06-28', '--csv']);
 * // { help: false, pretty: false, csv: true, to: '2024-06-28',
 * //   unknownFlags: [], remaining: ['history', 'US', 'AAPL'] }
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const args: ParsedArgs = {
    help: false,
    pretty: false,
    csv: false,
    unknownFlags: [],
    remaining: [],
  };

  for (const arg of argv) {
    if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--pretty') {
      args.pretty = true;
    } else if (arg === '--csv') {
      args.csv = true;
    } else if (arg.startsWith('--to=')) {
      args.to = arg.slice('--to='.length);
    } else if (arg.startsWith('-')) {
      args.unknownFlags.push(arg);
    } else {
      args.remaining.push(arg);
    }
  }

  return args;
}

/**
 * Help text for the refdata command
 */
export function helpText(commandName: string = 'refdata'): string {
  return `
${commandName} - Retrieve market reference data from EODHD

USAGE:
  ${commandName} exchanges                                 List exchanges
  ${commandName} tickers <EXCHANGE>                        List tickers on an exchange
  ${commandName} history <EXCHANGE> <TICKER> [--to=DATE]   Full price history up to DATE (default: today)
  ${commandName} daily <EXCHANGE>                          Last day's prices for an exchange

OPTIONS:
  --help, -h        Show this help message
  --pretty          Human-readable formatted output (default: JSON)
  --csv             Print the table as CSV
  --to=YYYY-MM-DD   Last date for history

ENVIRONMENT:
  EODHD_API_KEY     API token (required)
  EODHD_BASE_URL    API root (default: https://eodhd.com/api)
  EODHD_TIMEOUT     Request timeout in ms (default: 30000)
  LOG_LEVEL         error | warn | info | debug (default: info)
  LOG_FORMAT        json | pretty (default: pretty)
  LOG_FILE          Also write JSON logs to this file

OUTPUT:
  By default, outputs machine-readable JSON to stdout. Logs go to stderr.

EXIT CODES:
  0  Success
  1  No data returned
  2  Error or invalid usage
`;
}

/**
 * Format a result for stdout
 *
 * JSON mode: Single-line JSON for machine parsing
 * Pretty mode: Multi-line formatted output
 *
 * @example
 * const result = createResult('tickers', true, { exchange: 'LSE', count: 2 });
 * console.log(formatResult(result, args.pretty));
 */
export function formatResult(result: CliResult, pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(result);
  }

  const lines = [
    '='.repeat(60),
    `Command: ${result.command}`,
    `Status: ${result.success ? 'SUCCESS' : 'FAILED'}`,
    `Timestamp: ${result.timestamp}`,
    '='.repeat(60),
    '',
    'Data:',
    JSON.stringify(result.data, null, 2),
  ];

  if (result.warnings && result.warnings.length > 0) {
    lines.push('', 'Warnings:', ...result.warnings.map((w) => `  - ${w}`));
  }

  if (result.errors && result.errors.length > 0) {
    lines.push('', 'Errors:', ...result.errors.map((e) => `  - ${e}`));
  }

  return lines.join('\n');
}

/**
 * Create a standard result object
 *
 * @example
 * const result = createResult('daily', false, null, {
 *   warnings: ['No daily price data retrieved for LSE'],
 * });
 */
export function createResult(
  command: string,
  success: boolean,
  data: unknown,
  options: {
    warnings?: string[];
    errors?: string[];
    now?: () => Date;
  } = {}
): CliResult {
  const now = options.now ?? (() => new Date());
  return {
    success,
    command,
    timestamp: now().toISOString(),
    data,
    warnings: options.warnings,
    errors: options.errors,
  };
}
