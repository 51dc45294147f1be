/**
 * @fileoverview Normalization of raw EODHD responses into tables.
 *
 * Pure functions: they take a parsed response body and return a Table, or
 * throw ShapeError when the body does not fit. Timestamps come from the
 * injected clock.
 *
 * @module @refdata/provider-eodhd/normalize
 */

import type { z } from 'zod';
import {
  EXCHANGE_COLUMNS,
  PRICE_COLUMNS,
  PRICE_COLUMNS_SORTED,
  ShapeError,
  TICKER_COLUMNS,
} from '@refdata/contracts';
import type {
  ExchangeRecord,
  ExchangeSource,
  ManualExchangeTable,
  PriceRecord,
  Table,
  TickerRecord,
} from '@refdata/contracts';
import {
  dailyPriceRowSchema,
  exchangeRowSchema,
  historicalPriceRowSchema,
  tickerRowSchema,
} from './schemas.js';
import type { HistoricalPriceRow } from './schemas.js';

export const PROVIDER_SOURCE: ExchangeSource = 'EoDHD.com';

export const MANUAL_SOURCE: ExchangeSource = 'Manual_Input';

/**
 * Clock and manual exchange table shared by the normalizers.
 */
export interface NormalizeContext {
  now: () => Date;
  usExchanges: ManualExchangeTable;
}

/**
 * Result of ticker normalization. `duplicates` lists the Ticker_IDs of
 * dropped rows, in response order.
 */
export interface TickerNormalization {
  table: Table<TickerRecord>;
  duplicates: string[];
}

/**
 * True when the provider answered with nothing: no body, an empty
 * string, an empty array or an empty object.
 */
export function isEmptyResponse(body: unknown): boolean {
  if (body === null || body === undefined || body === '') {
    return true;
  }
  if (Array.isArray(body)) {
    return body.length === 0;
  }
  if (typeof body === 'object') {
    return Object.keys(body).length === 0;
  }
  return false;
}

/**
 * Narrows a response body to its rows.
 *
 * @throws {ShapeError} If the body is not an array
 */
export function requireRows(body: unknown, label: string): unknown[] {
  if (!Array.isArray(body)) {
    const received = typeof body;
    throw new ShapeError(`Expected an array of ${label} rows, received ${received}`, { received });
  }
  return body;
}

/**
 * `{code}_{exchange}`, the identifier tickers are stored under.
 */
export function tickerId(code: string, exchange: string): string {
  return `${code}_${exchange}`;
}

/**
 * Converts a provider ticker identifier (`AAPL.US`) to a Ticker_ID (`AAPL_US`).
 */
export function historicalTickerId(providerId: string): string {
  return providerId.replace(/\./g, '_');
}

/**
 * Collapses the exchanges of the manual table to 'US'.
 */
export function eodhdExchange(exchange: string, usExchanges: ManualExchangeTable): string {
  return Object.keys(usExchanges).includes(exchange) ? 'US' : exchange;
}

function describeIssues(error: z.ZodError): { problems: string[]; unknownFields: string[] } {
  const problems: string[] = [];
  const unknownFields: string[] = [];

  for (const issue of error.issues) {
    if (issue.code === 'unrecognized_keys') {
      unknownFields.push(...issue.keys);
      problems.push(`unknown fields ${issue.keys.join(', ')}`);
    } else {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(row)';
      problems.push(`${path}: ${issue.message}`);
    }
  }

  return { problems, unknownFields };
}

function parseRows<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, rows: unknown[], label: string): T[] {
  return rows.map((row, index) => {
    const result = schema.safeParse(row);
    if (result.success) {
      return result.data;
    }

    const { problems, unknownFields } = describeIssues(result.error);
    if (unknownFields.length > 0) {
      throw new ShapeError(`Unknown ${label} fields: ${unknownFields.join(', ')}`, {
        row: index,
        unknownFields,
        issues: problems,
      });
    }
    throw new ShapeError(`Invalid ${label} row ${index}: ${problems.join('; ')}`, {
      row: index,
      issues: problems,
    });
  });
}

/**
 * Builds one row per entry of the manual table, each stamped with its own
 * clock reading.
 */
export function manualExchangeRows(usExchanges: ManualExchangeTable, now: () => Date): ExchangeRecord[] {
  return Object.entries(usExchanges).map(([code, exchange]) => ({
    Code: code,
    Name: exchange.Name,
    OperatingMIC: exchange.OperatingMIC,
    Country: exchange.Country,
    Currency: exchange.Currency,
    CountryISO2: exchange.CountryISO2,
    CountryISO3: exchange.CountryISO3,
    Source: MANUAL_SOURCE,
    Date_Updated: now(),
  }));
}

/**
 * Provider rows first, then the manual rows. Manual rows are never
 * deduplicated against provider rows.
 *
 * @example
 * ```typescript
 * const table = normalizeExchanges(
 *   [{ Code: 'LSE', Name: 'London Exchange', Country: 'UK', Currency: 'GBP' }],
 *   { now: () => new Date(), usExchanges: US_EXCHANGES }
 * );
 * table.rows.length; // 3
 * ```
 */
export function normalizeExchanges(rows: unknown[], context: NormalizeContext): Table<ExchangeRecord> {
  const parsed = parseRows(exchangeRowSchema, rows, 'exchange');
  const updatedAt = context.now();

  const providerRows: ExchangeRecord[] = parsed.map((row) => ({
    Code: row.Code,
    Name: row.Name,
    OperatingMIC: row.OperatingMIC ?? null,
    Country: row.Country ?? null,
    Currency: row.Currency ?? null,
    CountryISO2: row.CountryISO2 ?? null,
    CountryISO3: row.CountryISO3 ?? null,
    Source: PROVIDER_SOURCE,
    Date_Updated: new Date(updatedAt.getTime()),
  }));

  return {
    columns: EXCHANGE_COLUMNS,
    rows: [...providerRows, ...manualExchangeRows(context.usExchanges, context.now)],
  };
}

/**
 * Tags tickers with their Ticker_ID and collapsed exchange. A row whose
 * Ticker_ID was already seen is dropped.
 */
export function normalizeTickers(rows: unknown[], exchange: string, context: NormalizeContext): TickerNormalization {
  const parsed = parseRows(tickerRowSchema, rows, 'ticker');
  const updatedAt = context.now();
  const source = `${PROVIDER_SOURCE} - Exchange ${exchange}`;

  const seen = new Set<string>();
  const duplicates: string[] = [];
  const records: TickerRecord[] = [];

  for (const row of parsed) {
    const id = tickerId(row.Code, exchange);
    if (seen.has(id)) {
      duplicates.push(id);
      continue;
    }
    seen.add(id);

    records.push({
      Ticker_ID: id,
      Code: row.Code,
      Name: row.Name ?? null,
      Country: row.Country ?? null,
      Exchange: row.Exchange,
      EoDHD_Exchange: eodhdExchange(row.Exchange, context.usExchanges),
      Currency: row.Currency ?? null,
      Type: row.Type ?? null,
      Isin: row.Isin ?? null,
      Source: source,
      Date_Updated: new Date(updatedAt.getTime()),
    });
  }

  return { table: { columns: TICKER_COLUMNS, rows: records }, duplicates };
}

function toPriceRecord(id: string, row: HistoricalPriceRow): PriceRecord {
  return {
    Ticker_ID: id,
    Date: row.date,
    Open: row.open ?? null,
    High: row.high ?? null,
    Low: row.low ?? null,
    Close: row.close ?? null,
    Adjusted_Close: row.adjusted_close ?? null,
    Volume: row.volume ?? null,
  };
}

/**
 * Same fields as toPriceRecord, keyed in bulk table order with Ticker_ID last.
 */
function toDailyPriceRecord(id: string, row: HistoricalPriceRow): PriceRecord {
  return {
    Date: row.date,
    Open: row.open ?? null,
    High: row.high ?? null,
    Low: row.low ?? null,
    Close: row.close ?? null,
    Adjusted_Close: row.adjusted_close ?? null,
    Volume: row.volume ?? null,
    Ticker_ID: id,
  };
}

/**
 * Maps history rows by field name and lays them out in storage order.
 *
 * @param providerId - Provider ticker identifier, e.g. `AAPL.US`
 */
export function normalizeHistoricalPrices(rows: unknown[], providerId: string): Table<PriceRecord> {
  const id = historicalTickerId(providerId);
  const parsed = parseRows(historicalPriceRowSchema, rows, 'price');

  return {
    columns: PRICE_COLUMNS_SORTED,
    rows: parsed.map((row) => toPriceRecord(id, row)),
  };
}

/**
 * Maps bulk last-day rows by field name. `code` becomes part of the
 * Ticker_ID and, like `exchange_short_name`, is not carried over.
 */
export function normalizeDailyPrices(rows: unknown[], exchange: string): Table<PriceRecord> {
  const parsed = parseRows(dailyPriceRowSchema, rows, 'price');

  return {
    columns: PRICE_COLUMNS,
    rows: parsed.map((row) => toDailyPriceRecord(tickerId(row.code, exchange), row)),
  };
}
