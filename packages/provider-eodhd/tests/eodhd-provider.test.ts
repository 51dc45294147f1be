/**
 * @fileoverview Tests for the EODHD provider.
 *
 * HTTP is answered by an in-process axios adapter; no request leaves
 * the test process.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { InvalidArgumentError, isFailureOf, valueOrNull } from '@refdata/contracts';
import type { Logger } from '@refdata/logger';
import {
  EodhdProvider,
  isCalendarDate,
  retrieveDailyPrices,
  retrieveExchanges,
  retrieveHistoricalPrices,
  retrieveTickers,
} from '../src/index.js';
import { quietLogger, sequenceClock, stubHttp } from './helpers.js';
import type { StubRoute } from './helpers.js';

const API_KEY = 'test-secret';
const NOW = '2024-07-01T08:00:00.000Z';

const EXCHANGES = [
  { Name: 'USA Stocks', Code: 'US', OperatingMIC: 'XNAS, XNYS', Country: 'USA', Currency: 'USD', CountryISO2: 'US', CountryISO3: 'USA' },
  { Name: 'London Exchange', Code: 'LSE', OperatingMIC: 'XLON', Country: 'UK', Currency: 'GBP', CountryISO2: 'GB', CountryISO3: 'GBR' },
  { Name: 'XETRA Stock Exchange', Code: 'XETRA', OperatingMIC: 'XETR', Country: 'Germany', Currency: 'EUR', CountryISO2: 'DE', CountryISO3: 'DEU' },
];

const LSE_TICKERS = [
  { Code: 'VOD', Name: 'Vodafone', Country: 'UK', Exchange: 'LSE', Currency: 'GBX', Type: 'Common Stock', Isin: 'GB00BH4HKS39' },
  { Code: 'BARC', Name: 'Barclays', Country: 'UK', Exchange: 'LSE', Currency: 'GBX', Type: 'Common Stock', Isin: null },
];

const AAPL_HISTORY = [
  { date: '2024-06-27', open: 214.69, high: 215.74, low: 212.35, close: 214.1, adjusted_close: 213.25, volume: 49772700 },
  { date: '2024-06-28', open: 215.77, high: 216.07, low: 210.3, close: 210.62, adjusted_close: 209.78, volume: 82542700 },
];

const LSE_DAILY = [
  { code: 'VOD', exchange_short_name: 'LSE', date: '2024-06-28', open: 70.1, high: 70.5, low: 69.6, close: 70.02, adjusted_close: 70.02, volume: 41530000 },
];

describe('EodhdProvider', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = quietLogger();
  });

  function providerFor(routes: Record<string, StubRoute>) {
    const stub = stubHttp(routes);
    const provider = new EodhdProvider({
      apiKey: API_KEY,
      httpClient: stub.http,
      logger,
      now: sequenceClock(NOW),
    });
    return { provider, requests: stub.requests };
  }

  describe('constructor', () => {
    it('should reject an empty API key', () => {
      expect(() => new EodhdProvider({ apiKey: '  ' })).toThrow(InvalidArgumentError);
    });
  });

  describe('retrieveExchanges', () => {
    it('should request the exchange list with the API key', async () => {
      const { provider, requests } = providerFor({ '/exchanges-list/': { data: EXCHANGES } });

      await provider.retrieveExchanges();

      expect(requests).toHaveLength(1);
      expect(requests[0]?.baseURL).toBe('https://eodhd.com/api');
      expect(requests[0]?.params).toEqual({ api_token: API_KEY, fmt: 'json' });
      expect(requests[0]?.timeout).toBe(30000);
    });

    it('should return provider rows plus the two manual rows', async () => {
      const { provider } = providerFor({ '/exchanges-list/': { data: EXCHANGES } });

      const result = await provider.retrieveExchanges();

      if (!result.ok) throw result.error;
      expect(result.value.rows).toHaveLength(EXCHANGES.length + 2);
      expect(result.value.rows.slice(-2).map((row) => row.Source)).toEqual(['Manual_Input', 'Manual_Input']);
      expect(result.value.rows.slice(-2).map((row) => row.Code)).toEqual(['NYSE', 'NASDAQ']);
      expect(result.value.rows[0]?.Source).toBe('EoDHD.com');
      expect(result.value.rows[0]?.Date_Updated).toEqual(new Date(NOW));
    });

    it('should return an empty result for an empty provider response', async () => {
      const { provider } = providerFor({ '/exchanges-list/': { data: [] } });
      const info = vi.spyOn(logger, 'info');

      const result = await provider.retrieveExchanges();

      expect(isFailureOf(result, 'empty')).toBe(true);
      expect(valueOrNull(result)).toBeNull();
      expect(info).toHaveBeenCalledWith('No exchange data retrieved', { operation: 'retrieveExchanges' });
    });

    it('should use the configured manual exchange table', async () => {
      const stub = stubHttp({ '/exchanges-list/': { data: EXCHANGES } });
      const provider = new EodhdProvider({
        apiKey: API_KEY,
        httpClient: stub.http,
        logger,
        usExchanges: {
          NYSE: {
            Name: 'New York Stock Exchange',
            OperatingMIC: 'XNYS',
            Country: 'US',
            Currency: 'USD',
            CountryISO2: 'US',
            CountryISO3: 'USA',
          },
        },
      });

      const result = await provider.retrieveExchanges();

      if (!result.ok) throw result.error;
      expect(result.value.rows.map((row) => row.Code)).toEqual(['US', 'LSE', 'XETRA', 'NYSE']);
    });
  });

  describe('retrieveTickers', () => {
    it('should build Ticker_ID from code and exchange', async () => {
      const { provider, requests } = providerFor({
        '/exchange-symbol-list/LSE': { data: [{ Code: 'VOD', Name: 'Vodafone', Exchange: 'LSE' }] },
      });

      const result = await provider.retrieveTickers('LSE');

      if (!result.ok) throw result.error;
      expect(requests[0]?.params).toEqual({ api_token: API_KEY, fmt: 'json' });
      expect(result.value.rows[0]?.Ticker_ID).toBe('VOD_LSE');
      expect(result.value.rows[0]?.EoDHD_Exchange).toBe('LSE');
      expect(result.value.rows[0]?.Source).toBe('EoDHD.com - Exchange LSE');
    });

    it('should keep every listed ticker in response order', async () => {
      const { provider } = providerFor({ '/exchange-symbol-list/LSE': { data: LSE_TICKERS } });

      const result = await provider.retrieveTickers('LSE');

      if (!result.ok) throw result.error;
      expect(result.value.rows.map((row) => row.Ticker_ID)).toEqual(['VOD_LSE', 'BARC_LSE']);
      expect(result.value.rows[1]?.Isin).toBeNull();
    });

    it('should warn about dropped duplicates', async () => {
      const { provider } = providerFor({
        '/exchange-symbol-list/LSE': { data: [...LSE_TICKERS, LSE_TICKERS[0]] },
      });
      const warn = vi.spyOn(logger, 'warn');

      const result = await provider.retrieveTickers('LSE');

      if (!result.ok) throw result.error;
      expect(result.value.rows).toHaveLength(2);
      expect(warn).toHaveBeenCalledWith('Dropped 1 duplicate tickers for LSE', {
        operation: 'retrieveTickers',
        exchange: 'LSE',
        duplicates: ['VOD_LSE'],
      });
    });

    it('should fail with a shape error when the body is not a list', async () => {
      const { provider } = providerFor({
        '/exchange-symbol-list/LSE': { data: { message: 'Exchange not supported' } },
      });
      const error = vi.spyOn(logger, 'error');

      const result = await provider.retrieveTickers('LSE');

      expect(isFailureOf(result, 'shape')).toBe(true);
      expect(result.ok ? null : result.error.message).toBe('Expected an array of ticker rows, received object');
      expect(error).toHaveBeenCalledWith(
        'Failed to process ticker data for LSE: Expected an array of ticker rows, received object',
        expect.objectContaining({ operation: 'retrieveTickers', exchange: 'LSE' })
      );
    });

    it('should return an empty result for an exchange with no listings', async () => {
      const { provider } = providerFor({ '/exchange-symbol-list/XNONE': { data: [] } });
      const info = vi.spyOn(logger, 'info');

      const result = await provider.retrieveTickers('XNONE');

      expect(isFailureOf(result, 'empty')).toBe(true);
      expect(result.ok ? null : result.error.message).toBe('No ticker data retrieved for XNONE');
      expect(info).toHaveBeenCalledWith('No ticker data retrieved for XNONE', {
        operation: 'retrieveTickers',
        exchange: 'XNONE',
      });
    });

    it('should reject an empty exchange before any request', async () => {
      const { provider, requests } = providerFor({});

      await expect(provider.retrieveTickers('')).rejects.toThrow(InvalidArgumentError);
      expect(requests).toHaveLength(0);
    });
  });

  describe('retrieveHistoricalPrices', () => {
    it('should request full history up to the given date', async () => {
      const { provider, requests } = providerFor({ '/eod/AAPL.US': { data: AAPL_HISTORY } });

      await provider.retrieveHistoricalPrices('US', 'AAPL', '2024-06-28');

      expect(requests[0]?.url).toBe('/eod/AAPL.US');
      expect(requests[0]?.params).toEqual({
        api_token: API_KEY,
        from: '1900-01-01',
        to: '2024-06-28',
        fmt: 'json',
      });
    });

    it('should derive Ticker_ID from the provider identifier', async () => {
      const { provider } = providerFor({ '/eod/AAPL.US': { data: AAPL_HISTORY } });

      const result = await provider.retrieveHistoricalPrices('US', 'AAPL', '2024-06-28');

      if (!result.ok) throw result.error;
      expect(result.value.rows.map((row) => row.Ticker_ID)).toEqual(['AAPL_US', 'AAPL_US']);
      expect(result.value.columns[0]).toBe('Ticker_ID');
      expect(result.value.rows[1]?.Adjusted_Close).toBe(209.78);
    });

    it('should return an empty result for no history and log at debug level', async () => {
      const { provider } = providerFor({ '/eod/DELISTED.US': { data: [] } });
      const debug = vi.spyOn(logger, 'debug');
      const error = vi.spyOn(logger, 'error');

      const result = await provider.retrieveHistoricalPrices('US', 'DELISTED', '2024-06-28');

      expect(isFailureOf(result, 'empty')).toBe(true);
      expect(debug).toHaveBeenCalledWith('No data returned for Ticker: DELISTED on Exchange: US', {
        operation: 'retrieveHistoricalPrices',
        exchange: 'US',
        ticker: 'DELISTED',
      });
      expect(error).not.toHaveBeenCalled();
    });

    it('should fail with a shape error on unmapped fields', async () => {
      const { provider } = providerFor({
        '/eod/AAPL.US': { data: [{ ...AAPL_HISTORY[0], dividend: 0.25 }] },
      });

      const result = await provider.retrieveHistoricalPrices('US', 'AAPL', '2024-06-28');

      expect(isFailureOf(result, 'shape')).toBe(true);
      expect(result.ok ? null : result.error.message).toBe('Unknown price fields: dividend');
    });

    it('should reject a malformed end date', async () => {
      const { provider, requests } = providerFor({});

      await expect(provider.retrieveHistoricalPrices('US', 'AAPL', '28/06/2024')).rejects.toThrow(
        "dateTo must be YYYY-MM-DD, received '28/06/2024'"
      );
      expect(requests).toHaveLength(0);
    });

    it.each(['2024-13-45', '2023-02-29', '2024-04-31'])(
      'should reject the impossible end date %s before any request',
      async (dateTo) => {
        const { provider, requests } = providerFor({});

        await expect(provider.retrieveHistoricalPrices('US', 'AAPL', dateTo)).rejects.toThrow(
          `dateTo must be YYYY-MM-DD, received '${dateTo}'`
        );
        expect(requests).toHaveLength(0);
      }
    );
  });

  describe('retrieveDailyPrices', () => {
    it('should return prices keyed by Ticker_ID without provider fields', async () => {
      const { provider } = providerFor({ '/eod-bulk-last-day/LSE': { data: LSE_DAILY } });

      const result = await provider.retrieveDailyPrices('LSE');

      if (!result.ok) throw result.error;
      expect(result.value.columns).toEqual([
        'Date',
        'Open',
        'High',
        'Low',
        'Close',
        'Adjusted_Close',
        'Volume',
        'Ticker_ID',
      ]);
      expect(result.value.rows[0]?.Ticker_ID).toBe('VOD_LSE');
      expect(Object.keys(result.value.rows[0] ?? {})).not.toContain('exchange_short_name');
    });

    it('should warn and return an empty result when nothing comes back', async () => {
      const { provider } = providerFor({ '/eod-bulk-last-day/LSE': { data: {} } });
      const warn = vi.spyOn(logger, 'warn');

      const result = await provider.retrieveDailyPrices('LSE');

      expect(isFailureOf(result, 'empty')).toBe(true);
      expect(warn).toHaveBeenCalledWith('No daily price data retrieved for LSE', {
        operation: 'retrieveDailyPrices',
        exchange: 'LSE',
      });
    });

    it('should fail with a shape error on a row without a code', async () => {
      const withoutCode = { exchange_short_name: 'LSE', date: '2024-06-28', open: 70.1, close: 70.02, volume: 41530000 };
      const { provider } = providerFor({ '/eod-bulk-last-day/LSE': { data: [withoutCode] } });
      const error = vi.spyOn(logger, 'error');

      const result = await provider.retrieveDailyPrices('LSE');

      expect(isFailureOf(result, 'shape')).toBe(true);
      expect(result.ok ? null : result.error.message).toBe('Invalid price row 0: code: Required');
      expect(error).toHaveBeenCalledWith(
        'Failed to process daily prices for LSE: Invalid price row 0: code: Required',
        expect.objectContaining({ operation: 'retrieveDailyPrices', exchange: 'LSE', row: 0 })
      );
    });
  });

  describe('transport failures', () => {
    it('should return a transport error for a failed status', async () => {
      const { provider } = providerFor({ '/exchanges-list/': { status: 503, data: { message: 'Service Unavailable' } } });
      const error = vi.spyOn(logger, 'error');

      const result = await provider.retrieveExchanges();

      if (result.ok) throw new Error('expected a failure');
      expect(result.error.kind).toBe('transport');
      expect(result.error.code).toBe('SERVICE_UNAVAILABLE');
      expect(result.error.data).toMatchObject({
        statusCode: 503,
        url: 'https://eodhd.com/api/exchanges-list/?api_token=***&fmt=json',
      });
      expect(error).toHaveBeenCalledWith(
        'API request failed: EODHD service unavailable: Request failed with status code 503',
        expect.objectContaining({ statusCode: 503, code: 'SERVICE_UNAVAILABLE' })
      );
    });

    it('should return a transport error on timeout', async () => {
      const { provider } = providerFor({ '/eod-bulk-last-day/LSE': { failure: 'timeout' } });

      const result = await provider.retrieveDailyPrices('LSE');

      if (result.ok) throw new Error('expected a failure');
      expect(result.error.code).toBe('TIMEOUT');
      expect(result.error.message).toBe('Request timeout: timeout of 30000ms exceeded');
    });

    it('should return a transport error when the connection fails', async () => {
      const { provider } = providerFor({ '/exchange-symbol-list/LSE': { failure: 'network' } });
      const error = vi.spyOn(logger, 'error');

      const result = await provider.retrieveTickers('LSE');

      if (result.ok) throw new Error('expected a failure');
      expect(result.error.kind).toBe('transport');
      expect(result.error.code).toBe('NETWORK_ERROR');
      expect(result.error.message).toBe('Network error: connect ECONNREFUSED 127.0.0.1:443');
      expect(result.error.data).toMatchObject({
        url: 'https://eodhd.com/api/exchange-symbol-list/LSE?api_token=***&fmt=json',
        cause: 'network',
      });
      expect(error).toHaveBeenCalledWith(
        'API request failed: Network error: connect ECONNREFUSED 127.0.0.1:443',
        expect.objectContaining({ code: 'NETWORK_ERROR' })
      );
    });

    it('should return a transport error for unknown endpoints', async () => {
      const { provider } = providerFor({});

      const result = await provider.retrieveTickers('NOPE');

      if (result.ok) throw new Error('expected a failure');
      expect(result.error.kind).toBe('transport');
      expect(result.error.code).toBe('NOT_FOUND');
    });

    it('should apply the configured base URL and timeout', async () => {
      const stub = stubHttp({ '/exchanges-list/': { data: EXCHANGES } });
      const provider = new EodhdProvider({
        apiKey: API_KEY,
        httpClient: stub.http,
        logger,
        baseUrl: 'http://localhost:8080/api',
        timeout: 5000,
      });

      await provider.retrieveExchanges();

      expect(stub.requests[0]?.baseURL).toBe('http://localhost:8080/api');
      expect(stub.requests[0]?.timeout).toBe(5000);
    });
  });
});

describe('standalone retrievals', () => {
  it('should retrieve exchanges with an explicit key', async () => {
    const { http, requests } = stubHttp({ '/exchanges-list/': { data: EXCHANGES } });

    const result = await retrieveExchanges(API_KEY, { httpClient: http, logger: quietLogger() });

    expect(result.ok).toBe(true);
    expect(requests[0]?.params).toEqual({ api_token: API_KEY, fmt: 'json' });
  });

  it('should retrieve tickers for one exchange', async () => {
    const { http } = stubHttp({ '/exchange-symbol-list/LSE': { data: LSE_TICKERS } });

    const result = await retrieveTickers(API_KEY, 'LSE', { httpClient: http, logger: quietLogger() });

    expect(valueOrNull(result)?.rows).toHaveLength(2);
  });

  it('should retrieve historical prices with the key last', async () => {
    const { http } = stubHttp({ '/eod/AAPL.US': { data: AAPL_HISTORY } });

    const result = await retrieveHistoricalPrices('US', 'AAPL', '2024-06-28', API_KEY, {
      httpClient: http,
      logger: quietLogger(),
    });

    expect(valueOrNull(result)?.rows[0]?.Ticker_ID).toBe('AAPL_US');
  });

  it('should retrieve daily prices', async () => {
    const { http } = stubHttp({ '/eod-bulk-last-day/LSE': { data: LSE_DAILY } });

    const result = await retrieveDailyPrices('LSE', API_KEY, { httpClient: http, logger: quietLogger() });

    expect(valueOrNull(result)?.rows[0]?.Ticker_ID).toBe('VOD_LSE');
  });

  it('should reject an empty key as a rejected promise', async () => {
    await expect(retrieveTickers('', 'LSE')).rejects.toThrow(InvalidArgumentError);
  });
});

describe('isCalendarDate', () => {
  it('should accept real days only', () => {
    expect(isCalendarDate('2024-02-29')).toBe(true);
    expect(isCalendarDate('2023-02-29')).toBe(false);
    expect(isCalendarDate('2024-13-45')).toBe(false);
    expect(isCalendarDate('28/06/2024')).toBe(false);
  });
});
