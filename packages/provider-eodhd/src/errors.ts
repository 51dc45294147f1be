/**
 * @fileoverview Error mapping for the EODHD provider.
 *
 * Maps axios failures to TransportError codes from @refdata/contracts and
 * tells callers which of them are worth retrying.
 *
 * @module @refdata/provider-eodhd/errors
 */

import axios from 'axios';
import { TransportError } from '@refdata/contracts';
import { maskApiToken } from '@refdata/logger';

const RETRYABLE_STATUS_CODES = [429, 500, 502, 503, 504];

const TIMEOUT_CODES = ['ECONNABORTED', 'ETIMEDOUT'];

/**
 * Maps an error thrown by axios (or anything else thrown while sending a
 * request) to a TransportError.
 *
 * @param error - What the request threw
 * @param url - Request URL, masked before it is stored
 *
 * @example
 * ```typescript
 * try {
 *   await http.get(path, { params });
 * } catch (error) {
 *   return fail(mapHttpError(error, url));
 * }
 * ```
 */
export function mapHttpError(error: unknown, url?: string): TransportError {
  const maskedUrl = url === undefined ? undefined : maskApiToken(url);

  if (!axios.isAxiosError(error)) {
    const message = error instanceof Error ? error.message : String(error);
    return new TransportError(maskApiToken(message), { url: maskedUrl, cause: 'unknown' });
  }

  const statusCode = error.response?.status;
  const message = maskApiToken(error.message);

  if (statusCode !== undefined) {
    const data = { statusCode, url: maskedUrl, cause: 'http' };
    switch (statusCode) {
      case 401:
      case 403:
        return new TransportError(`Authentication failed: ${message}`, data, 'AUTHENTICATION_ERROR');
      case 404:
        return new TransportError(`Endpoint not found: ${message}`, data, 'NOT_FOUND');
      case 429:
        return new TransportError(`Rate limit exceeded: ${message}`, data, 'RATE_LIMIT_EXCEEDED');
      case 500:
      case 502:
      case 503:
      case 504:
        return new TransportError(`EODHD service unavailable: ${message}`, data, 'SERVICE_UNAVAILABLE');
      default:
        return new TransportError(message, data);
    }
  }

  if (error.code !== undefined && TIMEOUT_CODES.includes(error.code)) {
    return new TransportError(`Request timeout: ${message}`, { url: maskedUrl, cause: 'timeout' }, 'TIMEOUT');
  }

  return new TransportError(`Network error: ${message}`, { url: maskedUrl, cause: 'network' }, 'NETWORK_ERROR');
}

/**
 * Checks if an error is a retryable error.
 *
 * Rate limits, server errors, timeouts and network failures are retryable;
 * authentication failures, 404s and every non-transport error are not.
 *
 * @example
 * ```typescript
 * const result = await provider.retrieveDailyPrices('LSE');
 * if (!result.ok && isRetryableError(result.error)) {
 *   await sleep(getRetryDelay(result.error) ?? 5000);
 * }
 * ```
 */
export function isRetryableError(error: unknown): boolean {
  if (!(error instanceof TransportError)) {
    return false;
  }

  if (error.statusCode !== undefined) {
    return RETRYABLE_STATUS_CODES.includes(error.statusCode);
  }

  return error.code === 'TIMEOUT' || error.code === 'NETWORK_ERROR';
}

/**
 * Gets suggested retry delay in milliseconds for retryable errors.
 *
 * @returns Retry delay in milliseconds, or undefined if not retryable
 */
export function getRetryDelay(error: unknown): number | undefined {
  if (!isRetryableError(error) || !(error instanceof TransportError)) {
    return undefined;
  }

  switch (error.statusCode) {
    case 429:
      return 60000; // 60 seconds for rate limit
    case undefined:
      return 1000; // timeout or network blip
    default:
      return 5000; // 5 seconds for server errors
  }
}
