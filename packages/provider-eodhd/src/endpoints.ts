/**
 * @fileoverview Endpoint builders for the EODHD API.
 *
 * @module @refdata/provider-eodhd/endpoints
 */

import type { EndpointRequest } from './types.js';

export const EODHD_BASE_URL = 'https://eodhd.com/api';

/**
 * Earliest date requested for full price history.
 */
export const HISTORY_START_DATE = '1900-01-01';

/**
 * Joins ticker and exchange the way the API addresses a security.
 *
 * @example
 * ```typescript
 * providerTicker('AAPL', 'US'); // 'AAPL.US'
 * ```
 */
export function providerTicker(ticker: string, exchange: string): string {
  return `${ticker}.${exchange}`;
}

export function exchangesEndpoint(): EndpointRequest {
  return { path: '/exchanges-list/', params: { fmt: 'json' } };
}

export function tickersEndpoint(exchange: string): EndpointRequest {
  return {
    path: `/exchange-symbol-list/${encodeURIComponent(exchange)}`,
    params: { fmt: 'json' },
  };
}

export function historicalPricesEndpoint(exchange: string, ticker: string, dateTo: string): EndpointRequest {
  return {
    path: `/eod/${encodeURIComponent(providerTicker(ticker, exchange))}`,
    params: { from: HISTORY_START_DATE, to: dateTo, fmt: 'json' },
  };
}

export function dailyPricesEndpoint(exchange: string): EndpointRequest {
  return {
    path: `/eod-bulk-last-day/${encodeURIComponent(exchange)}`,
    params: { fmt: 'json' },
  };
}
