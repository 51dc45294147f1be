/**
 * @fileoverview Record types and column layouts for reference data tables.
 *
 * Column names match the database columns the tables are uploaded into,
 * so they keep their storage spelling (`Ticker_ID`, `Date_Updated`).
 * All types are pure data structures with no I/O.
 *
 * @module @refdata/contracts/records
 */

/**
 * Ordered set of columns plus rows keyed by those columns.
 *
 * @invariant every row has a value for every column
 */
export interface Table<R> {
  readonly columns: ReadonlyArray<keyof R & string>;
  readonly rows: R[];
}

/**
 * Where an exchange row came from: the provider, or the static US table.
 */
export type ExchangeSource = 'EoDHD.com' | 'Manual_Input';

/**
 * One exchange known to the provider, or injected manually.
 *
 * @example
 * ```typescript
 * const nyse: ExchangeRecord = {
 *   Code: 'NYSE',
 *   Name: 'New York Stock Exchange',
 *   OperatingMIC: 'XNYS',
 *   Country: 'US',
 *   Currency: 'USD',
 *   CountryISO2: 'US',
 *   CountryISO3: 'USA',
 *   Source: 'Manual_Input',
 *   Date_Updated: new Date(),
 * };
 * ```
 */
export interface ExchangeRecord {
  Code: string;
  Name: string;
  OperatingMIC: string | null;
  Country: string | null;
  Currency: string | null;
  CountryISO2: string | null;
  CountryISO3: string | null;
  Source: ExchangeSource;
  Date_Updated: Date;
}

export const EXCHANGE_COLUMNS = [
  'Code',
  'Name',
  'OperatingMIC',
  'Country',
  'Currency',
  'CountryISO2',
  'CountryISO3',
  'Source',
  'Date_Updated',
] as const satisfies ReadonlyArray<keyof ExchangeRecord>;

/**
 * One listed security on an exchange.
 *
 * @invariant Ticker_ID === `${Code}_${requested exchange}`
 * @invariant EoDHD_Exchange is 'US' for US exchanges, else Exchange
 */
export interface TickerRecord {
  Ticker_ID: string;
  Code: string;
  Name: string | null;
  Country: string | null;
  Exchange: string;
  EoDHD_Exchange: string;
  Currency: string | null;
  Type: string | null;
  Isin: string | null;
  Source: string;
  Date_Updated: Date;
}

export const TICKER_COLUMNS = [
  'Ticker_ID',
  'Code',
  'Name',
  'Country',
  'Exchange',
  'EoDHD_Exchange',
  'Currency',
  'Type',
  'Isin',
  'Source',
  'Date_Updated',
] as const satisfies ReadonlyArray<keyof TickerRecord>;

/**
 * One end-of-day price row. Price fields the provider omitted are null.
 *
 * @invariant Date is a YYYY-MM-DD string
 */
export interface PriceRecord {
  Ticker_ID: string;
  Date: string;
  Open: number | null;
  High: number | null;
  Low: number | null;
  Close: number | null;
  Adjusted_Close: number | null;
  Volume: number | null;
}

/**
 * Storage order for price tables.
 */
export const PRICE_COLUMNS_SORTED = [
  'Ticker_ID',
  'Date',
  'Open',
  'High',
  'Low',
  'Close',
  'Adjusted_Close',
  'Volume',
] as const satisfies ReadonlyArray<keyof PriceRecord>;

/**
 * Order of the bulk daily table: provider field order, Ticker_ID last.
 */
export const PRICE_COLUMNS = [
  'Date',
  'Open',
  'High',
  'Low',
  'Close',
  'Adjusted_Close',
  'Volume',
  'Ticker_ID',
] as const satisfies ReadonlyArray<keyof PriceRecord>;

/**
 * Static attributes of an exchange injected without the provider.
 */
export interface ManualExchange {
  Name: string;
  OperatingMIC: string;
  Country: string;
  Currency: string;
  CountryISO2: string;
  CountryISO3: string;
}

/**
 * Exchange code → static attributes.
 */
export type ManualExchangeTable = Readonly<Record<string, ManualExchange>>;

/**
 * US exchanges appended to every exchange table. Their codes are also
 * the set collapsed to 'US' in EoDHD_Exchange.
 */
export const US_EXCHANGES: ManualExchangeTable = {
  NYSE: {
    Name: 'New York Stock Exchange',
    OperatingMIC: 'XNYS',
    Country: 'US',
    Currency: 'USD',
    CountryISO2: 'US',
    CountryISO3: 'USA',
  },
  NASDAQ: {
    Name: 'NASDAQ',
    OperatingMIC: 'XNAS',
    Country: 'US',
    Currency: 'USD',
    CountryISO2: 'US',
    CountryISO3: 'USA',
  },
};
