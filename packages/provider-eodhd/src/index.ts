/**
 * @fileoverview EODHD reference data provider.
 *
 * Retrieves exchanges, tickers, historical and daily end-of-day prices
 * from https://eodhd.com/api and reshapes them into tables for upload.
 *
 * @module @refdata/provider-eodhd
 * @example
 * ```typescript
 * import { retrieveHistoricalPrices } from '@refdata/provider-eodhd';
 *
 * const result = await retrieveHistoricalPrices('US', 'AAPL', '2024-06-28', apiKey);
 * if (result.ok) {
 *   console.log(result.value.rows[0]?.Ticker_ID); // 'AAPL_US'
 * }
 * ```
 */

export {
  EodhdProvider,
  retrieveExchanges,
  retrieveTickers,
  retrieveHistoricalPrices,
  retrieveDailyPrices,
  isCalendarDate,
} from './provider.js';

export { EodhdClient, createClient } from './client.js';

export {
  EODHD_BASE_URL,
  HISTORY_START_DATE,
  providerTicker,
  exchangesEndpoint,
  tickersEndpoint,
  historicalPricesEndpoint,
  dailyPricesEndpoint,
} from './endpoints.js';

export { mapHttpError, isRetryableError, getRetryDelay } from './errors.js';

export {
  PROVIDER_SOURCE,
  MANUAL_SOURCE,
  isEmptyResponse,
  tickerId,
  historicalTickerId,
  eodhdExchange,
  manualExchangeRows,
  normalizeExchanges,
  normalizeTickers,
  normalizeHistoricalPrices,
  normalizeDailyPrices,
} from './normalize.js';

export type { NormalizeContext, TickerNormalization } from './normalize.js';

export type {
  EodhdClientOptions,
  EodhdProviderOptions,
  RetrievalOptions,
  EndpointRequest,
  QueryValue,
} from './types.js';
