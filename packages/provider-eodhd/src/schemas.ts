/**
 * @fileoverview zod schemas for raw EODHD response rows.
 *
 * Exchange and ticker rows keep only the fields the tables use; unknown
 * fields are stripped. Price rows are strict: a field the column mapping
 * does not cover is rejected, so labels are never guessed.
 *
 * @module @refdata/provider-eodhd/schemas
 */

import { z } from 'zod';

const optionalText = z.string().nullable().optional();

const optionalNumber = z.number().nullable().optional();

export const exchangeRowSchema = z.object({
  Code: z.string().min(1),
  Name: z.string(),
  OperatingMIC: optionalText,
  Country: optionalText,
  Currency: optionalText,
  CountryISO2: optionalText,
  CountryISO3: optionalText,
});

export const tickerRowSchema = z.object({
  Code: z.string().min(1),
  Name: optionalText,
  Country: optionalText,
  Exchange: z.string(),
  Currency: optionalText,
  Type: optionalText,
  Isin: optionalText,
});

/**
 * One row of `/eod/{ticker}.{exchange}`.
 */
export const historicalPriceRowSchema = z
  .object({
    date: z.string(),
    open: optionalNumber,
    high: optionalNumber,
    low: optionalNumber,
    close: optionalNumber,
    adjusted_close: optionalNumber,
    volume: optionalNumber,
  })
  .strict();

/**
 * One row of `/eod-bulk-last-day/{exchange}`: a price row plus the
 * security code and the exchange it was requested for.
 */
export const dailyPriceRowSchema = historicalPriceRowSchema
  .extend({
    code: z.string().min(1),
    exchange_short_name: z.string().optional(),
  })
  .strict();

export type ExchangeRow = z.infer<typeof exchangeRowSchema>;
export type TickerRow = z.infer<typeof tickerRowSchema>;
export type HistoricalPriceRow = z.infer<typeof historicalPriceRowSchema>;
export type DailyPriceRow = z.infer<typeof dailyPriceRowSchema>;
