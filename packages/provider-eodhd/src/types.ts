/**
 * @fileoverview Type definitions for the EODHD provider.
 *
 * @module @refdata/provider-eodhd/types
 */

import type { AxiosInstance } from 'axios';
import type { ManualExchangeTable } from '@refdata/contracts';
import type { Logger } from '@refdata/logger';

/**
 * HTTP client configuration.
 *
 * @property baseUrl - API root (default: https://eodhd.com/api)
 * @property timeout - HTTP request timeout in milliseconds (default: 30000)
 * @property httpClient - axios instance to send requests through
 * @property logger - Logger for request failures (default: database/provider-eodhd)
 */
export interface EodhdClientOptions {
  baseUrl?: string;
  timeout?: number;
  httpClient?: AxiosInstance;
  logger?: Logger;
}

/**
 * Everything a retrieval needs besides the API key.
 *
 * @property now - Clock used for Date_Updated (default: () => new Date())
 * @property usExchanges - Manual exchange rows, also the codes collapsed to 'US'
 */
export interface RetrievalOptions extends EodhdClientOptions {
  now?: () => Date;
  usExchanges?: ManualExchangeTable;
}

/**
 * Provider configuration.
 *
 * @property apiKey - EODHD API token, sent as the `api_token` query parameter
 */
export interface EodhdProviderOptions extends RetrievalOptions {
  apiKey: string;
}

/**
 * Scalar query parameter value.
 */
export type QueryValue = string | number;

/**
 * A request to one endpoint, relative to the base URL.
 *
 * The API token is not part of the request; the client appends it.
 */
export interface EndpointRequest {
  path: string;
  params: Record<string, QueryValue>;
}
