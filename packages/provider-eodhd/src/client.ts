/**
 * @fileoverview HTTP client for the EODHD API.
 *
 * Sends one GET per call through an axios instance and folds every
 * failure into a TransportError result. Nothing is retried and no
 * exception reaches the caller.
 *
 * @module @refdata/provider-eodhd/client
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { fail, ok } from '@refdata/contracts';
import type { RetrievalResult } from '@refdata/contracts';
import { getLogger, maskApiToken } from '@refdata/logger';
import type { Logger } from '@refdata/logger';
import { EODHD_BASE_URL } from './endpoints.js';
import { mapHttpError } from './errors.js';
import type { EndpointRequest, EodhdClientOptions } from './types.js';

const DEFAULT_TIMEOUT_MS = 30000;

/**
 * HTTP client for the EODHD API.
 *
 * @example
 * ```typescript
 * const client = new EodhdClient('test-secret', { timeout: 10000 });
 * const result = await client.get(exchangesEndpoint());
 * if (result.ok) {
 *   console.log(result.value); // parsed JSON body, not yet validated
 * }
 * ```
 */
export class EodhdClient {
  private readonly http: AxiosInstance;
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly logger: Logger;

  constructor(
    private readonly apiKey: string,
    options: EodhdClientOptions = {}
  ) {
    this.baseUrl = options.baseUrl ?? EODHD_BASE_URL;
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    this.http = options.httpClient ?? axios.create({ baseURL: this.baseUrl, timeout: this.timeout });
    this.logger = options.logger ?? getLogger('database', 'provider-eodhd');
  }

  /**
   * Sends a GET request and resolves to the parsed JSON body.
   *
   * The body is returned as `unknown`; callers validate it.
   */
  async get(request: EndpointRequest): Promise<RetrievalResult<unknown>> {
    const params = { api_token: this.apiKey, ...request.params };
    const url = this.http.getUri({ baseURL: this.baseUrl, url: request.path, params });

    try {
      const response = await this.http.get<unknown>(request.path, {
        baseURL: this.baseUrl,
        params,
        timeout: this.timeout,
      });

      this.logger.debug('EODHD request completed', {
        url: maskApiToken(url),
        status: response.status,
      });

      return ok(response.data);
    } catch (error) {
      const transportError = mapHttpError(error, url);

      this.logger.error(`API request failed: ${transportError.message}`, {
        url: transportError.url,
        statusCode: transportError.statusCode,
        code: transportError.code,
        stack: error instanceof Error ? error.stack : undefined,
      });

      return fail(transportError);
    }
  }
}

/**
 * Creates a new EODHD HTTP client.
 */
export function createClient(apiKey: string, options: EodhdClientOptions = {}): EodhdClient {
  return new EodhdClient(apiKey, options);
}
