/**
 * @fileoverview EODHD reference data provider.
 *
 * Four retrievals, each one request/normalize/return cycle:
 * - exchanges: `/exchanges-list/` plus the manual US rows
 * - tickers: `/exchange-symbol-list/{exchange}`
 * - historical prices: `/eod/{ticker}.{exchange}` from 1900-01-01
 * - daily prices: `/eod-bulk-last-day/{exchange}`
 *
 * Every retrieval resolves to a RetrievalResult. Expected failures are
 * logged and returned; only invalid arguments throw.
 *
 * @module @refdata/provider-eodhd/provider
 */

import { EmptyDataError, InvalidArgumentError, ShapeError, US_EXCHANGES, fail, ok } from '@refdata/contracts';
import type {
  ExchangeRecord,
  Failure,
  ManualExchangeTable,
  PriceRecord,
  RetrievalResult,
  Table,
  TickerRecord,
} from '@refdata/contracts';
import { getLogger } from '@refdata/logger';
import type { Logger } from '@refdata/logger';
import { EodhdClient } from './client.js';
import {
  dailyPricesEndpoint,
  exchangesEndpoint,
  historicalPricesEndpoint,
  providerTicker,
  tickersEndpoint,
} from './endpoints.js';
import {
  isEmptyResponse,
  normalizeDailyPrices,
  normalizeExchanges,
  normalizeHistoricalPrices,
  normalizeTickers,
  requireRows,
} from './normalize.js';
import type { EodhdProviderOptions, RetrievalOptions } from './types.js';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

type LogLevelName = 'debug' | 'info' | 'warn';

/**
 * True for a YYYY-MM-DD string naming a real calendar day.
 */
export function isCalendarDate(value: string): boolean {
  if (!ISO_DATE.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

function requireText(value: string, argument: string): void {
  if (value.trim() === '') {
    throw new InvalidArgumentError(`${argument} must be a non-empty string`, { argument });
  }
}

/**
 * EODHD reference data provider.
 *
 * @example
 * ```typescript
 * const provider = new EodhdProvider({ apiKey: process.env.EODHD_API_KEY ?? '' });
 *
 * const result = await provider.retrieveTickers('LSE');
 * if (result.ok) {
 *   console.log(result.value.rows[0]?.Ticker_ID); // 'VOD_LSE'
 * } else if (result.error.kind === 'empty') {
 *   // exchange has no listings
 * }
 * ```
 */
export class EodhdProvider {
  private readonly client: EodhdClient;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly usExchanges: ManualExchangeTable;

  /**
   * @throws {InvalidArgumentError} If the API key is empty
   */
  constructor(options: EodhdProviderOptions) {
    requireText(options.apiKey, 'apiKey');

    this.logger = options.logger ?? getLogger('database', 'provider-eodhd');
    this.client = new EodhdClient(options.apiKey, { ...options, logger: this.logger });
    this.now = options.now ?? (() => new Date());
    this.usExchanges = options.usExchanges ?? US_EXCHANGES;
  }

  /**
   * Retrieves every exchange the provider lists, followed by one
   * `Manual_Input` row per manual US exchange.
   *
   * An empty provider response is an `empty` result; manual rows are not
   * returned on their own.
   */
  async retrieveExchanges(): Promise<RetrievalResult<Table<ExchangeRecord>>> {
    const operation = 'retrieveExchanges';
    const response = await this.client.get(exchangesEndpoint());
    if (!response.ok) {
      return response;
    }

    if (isEmptyResponse(response.value)) {
      return this.empty('No exchange data retrieved', 'info', { operation });
    }

    try {
      const table = normalizeExchanges(requireRows(response.value, 'exchange'), {
        now: this.now,
        usExchanges: this.usExchanges,
      });
      this.logger.info('Exchanges retrieved', { operation, count: table.rows.length });
      return ok(table);
    } catch (error) {
      return this.shapeFailure('Failed to process exchange data', error, { operation });
    }
  }

  /**
   * Retrieves the securities listed on one exchange.
   *
   * @param exchange - Exchange code, e.g. 'LSE' or 'US'
   */
  async retrieveTickers(exchange: string): Promise<RetrievalResult<Table<TickerRecord>>> {
    requireText(exchange, 'exchange');

    const operation = 'retrieveTickers';
    const response = await this.client.get(tickersEndpoint(exchange));
    if (!response.ok) {
      return response;
    }

    if (isEmptyResponse(response.value)) {
      return this.empty(`No ticker data retrieved for ${exchange}`, 'info', { operation, exchange });
    }

    try {
      const { table, duplicates } = normalizeTickers(requireRows(response.value, 'ticker'), exchange, {
        now: this.now,
        usExchanges: this.usExchanges,
      });

      if (duplicates.length > 0) {
        this.logger.warn(`Dropped ${duplicates.length} duplicate tickers for ${exchange}`, {
          operation,
          exchange,
          duplicates,
        });
      }

      this.logger.info('Tickers retrieved', { operation, exchange, count: table.rows.length });
      return ok(table);
    } catch (error) {
      return this.shapeFailure(`Failed to process ticker data for ${exchange}`, error, { operation, exchange });
    }
  }

  /**
   * Retrieves the full price history of one ticker up to and including
   * `dateTo`. No history is an `empty` result, logged at debug level.
   *
   * @param dateTo - Last date, `YYYY-MM-DD`
   */
  async retrieveHistoricalPrices(
    exchange: string,
    ticker: string,
    dateTo: string
  ): Promise<RetrievalResult<Table<PriceRecord>>> {
    requireText(exchange, 'exchange');
    requireText(ticker, 'ticker');
    if (!isCalendarDate(dateTo)) {
      throw new InvalidArgumentError(`dateTo must be YYYY-MM-DD, received '${dateTo}'`, {
        argument: 'dateTo',
        value: dateTo,
      });
    }

    const operation = 'retrieveHistoricalPrices';
    const providerId = providerTicker(ticker, exchange);
    const response = await this.client.get(historicalPricesEndpoint(exchange, ticker, dateTo));
    if (!response.ok) {
      return response;
    }

    if (isEmptyResponse(response.value)) {
      return this.empty(`No data returned for Ticker: ${ticker} on Exchange: ${exchange}`, 'debug', {
        operation,
        exchange,
        ticker,
      });
    }

    try {
      const table = normalizeHistoricalPrices(requireRows(response.value, 'price'), providerId);
      this.logger.debug('Historical prices retrieved', { operation, exchange, ticker, count: table.rows.length });
      return ok(table);
    } catch (error) {
      return this.shapeFailure(`Failed to process historical prices for ${providerId}`, error, {
        operation,
        exchange,
        ticker,
      });
    }
  }

  /**
   * Retrieves the latest end-of-day price of every security on an
   * exchange. No data is an `empty` result, logged as a warning.
   */
  async retrieveDailyPrices(exchange: string): Promise<RetrievalResult<Table<PriceRecord>>> {
    requireText(exchange, 'exchange');

    const operation = 'retrieveDailyPrices';
    const response = await this.client.get(dailyPricesEndpoint(exchange));
    if (!response.ok) {
      return response;
    }

    if (isEmptyResponse(response.value)) {
      return this.empty(`No daily price data retrieved for ${exchange}`, 'warn', { operation, exchange });
    }

    try {
      const table = normalizeDailyPrices(requireRows(response.value, 'price'), exchange);
      this.logger.info('Daily prices retrieved', { operation, exchange, count: table.rows.length });
      return ok(table);
    } catch (error) {
      return this.shapeFailure(`Failed to process daily prices for ${exchange}`, error, { operation, exchange });
    }
  }

  private empty(message: string, level: LogLevelName, context: Record<string, unknown>): Failure {
    this.logger[level](message, context);
    return fail(new EmptyDataError(message, context));
  }

  private shapeFailure(message: string, error: unknown, context: Record<string, unknown>): Failure {
    const shapeError =
      error instanceof ShapeError
        ? error
        : new ShapeError(error instanceof Error ? error.message : String(error), context);

    this.logger.error(`${message}: ${shapeError.message}`, {
      ...context,
      ...shapeError.data,
      stack: shapeError.stack,
    });

    return fail(shapeError);
  }
}

/**
 * Retrieves all exchanges with the given API key.
 *
 * @see EodhdProvider.retrieveExchanges
 */
export async function retrieveExchanges(
  apiKey: string,
  options: RetrievalOptions = {}
): Promise<RetrievalResult<Table<ExchangeRecord>>> {
  return new EodhdProvider({ ...options, apiKey }).retrieveExchanges();
}

/**
 * @see EodhdProvider.retrieveTickers
 */
export async function retrieveTickers(
  apiKey: string,
  exchange: string,
  options: RetrievalOptions = {}
): Promise<RetrievalResult<Table<TickerRecord>>> {
  return new EodhdProvider({ ...options, apiKey }).retrieveTickers(exchange);
}

/**
 * @see EodhdProvider.retrieveHistoricalPrices
 */
export async function retrieveHistoricalPrices(
  exchange: string,
  ticker: string,
  dateTo: string,
  apiKey: string,
  options: RetrievalOptions = {}
): Promise<RetrievalResult<Table<PriceRecord>>> {
  return new EodhdProvider({ ...options, apiKey }).retrieveHistoricalPrices(exchange, ticker, dateTo);
}

/**
 * @see EodhdProvider.retrieveDailyPrices
 */
export async function retrieveDailyPrices(
  exchange: string,
  apiKey: string,
  options: RetrievalOptions = {}
): Promise<RetrievalResult<Table<PriceRecord>>> {
  return new EodhdProvider({ ...options, apiKey }).retrieveDailyPrices(exchange);
}
