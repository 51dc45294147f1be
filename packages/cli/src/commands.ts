/**
 * refdata commands
 *
 * Maps a parsed command line to one provider retrieval and renders the
 * outcome. Nothing here writes to stdout or exits; the bin does that.
 */

import type { RetrievalResult, Table } from '@refdata/contracts';
import type { EodhdProvider } from '@refdata/provider-eodhd';
import { createResult, formatResult } from './cli-utils.js';
import type { ExitCode, ParsedArgs } from './cli-utils.js';
import { formatCsv } from './formatters/csv.js';

/**
 * The retrievals a command can run.
 */
export type RefDataProvider = Pick<
  EodhdProvider,
  'retrieveExchanges' | 'retrieveTickers' | 'retrieveHistoricalPrices' | 'retrieveDailyPrices'
>;

export interface CommandDeps {
  provider: RefDataProvider;
  /** Default end date for `history`, YYYY-MM-DD */
  today?: () => string;
  /** Clock for result timestamps */
  now?: () => Date;
}

export interface CommandOutcome {
  exitCode: ExitCode;
  output: string;
}

/**
 * Positional arguments each command takes, after the command name.
 */
export const COMMAND_ARGUMENTS: Readonly<Record<string, readonly string[]>> = {
  exchanges: [],
  tickers: ['EXCHANGE'],
  history: ['EXCHANGE', 'TICKER'],
  daily: ['EXCHANGE'],
};

function utcToday(): string {
  return new Date().toISOString().slice(0, 10);
}

function usageError(command: string, args: ParsedArgs): string | undefined {
  if (!Object.hasOwn(COMMAND_ARGUMENTS, command)) {
    return command === '' ? 'Missing command' : `Unknown command: ${command}`;
  }
  const expected = COMMAND_ARGUMENTS[command] ?? [];

  if (args.unknownFlags.length > 0) {
    return `Unknown option: ${args.unknownFlags.join(', ')}`;
  }

  const given = args.remaining.length - 1;
  if (given !== expected.length) {
    const usage = [command, ...expected.map((name) => `<${name}>`)].join(' ');
    return `Usage: refdata ${usage}`;
  }

  if (args.to !== undefined && command !== 'history') {
    return '--to only applies to history';
  }

  return undefined;
}

function usageFailure(command: string, problem: string, args: ParsedArgs, now: () => Date): CommandOutcome {
  const outcome = createResult(command, false, null, { errors: [problem], now });
  return { exitCode: 2, output: formatResult(outcome, args.pretty) };
}

/**
 * Checks the command name, arguments and options without touching a
 * provider. Returns the failed outcome, or undefined when usage is valid.
 */
export function checkUsage(args: ParsedArgs, now: () => Date = () => new Date()): CommandOutcome | undefined {
  const command = args.remaining[0] ?? '';
  const problem = usageError(command, args);
  return problem === undefined ? undefined : usageFailure(command, problem, args, now);
}

function render<R extends object>(
  command: string,
  context: Record<string, string>,
  result: RetrievalResult<Table<R>>,
  args: ParsedArgs,
  now: () => Date
): CommandOutcome {
  if (result.ok) {
    if (args.csv) {
      return { exitCode: 0, output: formatCsv(result.value) };
    }

    const data = {
      ...context,
      count: result.value.rows.length,
      columns: result.value.columns,
      rows: result.value.rows,
    };
    return { exitCode: 0, output: formatResult(createResult(command, true, data, { now }), args.pretty) };
  }

  const { error } = result;
  if (error.kind === 'empty') {
    const outcome = createResult(command, false, null, { warnings: [error.message], now });
    return { exitCode: 1, output: formatResult(outcome, args.pretty) };
  }

  const outcome = createResult(command, false, null, { errors: [`${error.code}: ${error.message}`], now });
  return { exitCode: 2, output: formatResult(outcome, args.pretty) };
}

/**
 * Runs one command.
 *
 * @example
 * const outcome = await runCommand(parseArgs(['tickers', 'LSE', '--csv']), { provider });
 * process.stdout.write(`${outcome.output}\n`);
 * process.exitCode = outcome.exitCode;
 */
export async function runCommand(args: ParsedArgs, deps: CommandDeps): Promise<CommandOutcome> {
  const now = deps.now ?? (() => new Date());
  const [command = '', first = '', second = ''] = args.remaining;

  const invalid = checkUsage(args, now);
  if (invalid !== undefined) {
    return invalid;
  }

  const { provider } = deps;

  try {
    switch (command) {
      case 'exchanges':
        return render(command, {}, await provider.retrieveExchanges(), args, now);
      case 'tickers':
        return render(command, { exchange: first }, await provider.retrieveTickers(first), args, now);
      case 'history': {
        const dateTo = args.to ?? (deps.today ?? utcToday)();
        const result = await provider.retrieveHistoricalPrices(first, second, dateTo);
        return render(command, { exchange: first, ticker: second, dateTo }, result, args, now);
      }
      case 'daily':
        return render(command, { exchange: first }, await provider.retrieveDailyPrices(first), args, now);
      default:
        return usageFailure(command, `Unknown command: ${command}`, args, now);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const outcome = createResult(command, false, null, { errors: [message], now });
    return { exitCode: 2, output: formatResult(outcome, args.pretty) };
  }
}
