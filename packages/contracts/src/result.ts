/**
 * @fileoverview Tagged result type returned by every retrieval.
 *
 * Retrievals never throw for expected failures. They resolve to either
 * `{ ok: true, value }` or `{ ok: false, error }`, where `error.kind`
 * tells the caller which failure it was.
 *
 * @module @refdata/contracts/result
 */

import type { RetrievalError, RetrievalErrorKind } from './errors.js';

export interface Success<T> {
  ok: true;
  value: T;
}

export interface Failure {
  ok: false;
  error: RetrievalError;
}

export type RetrievalResult<T> = Success<T> | Failure;

export function ok<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function fail(error: RetrievalError): Failure {
  return { ok: false, error };
}

export function isSuccess<T>(result: RetrievalResult<T>): result is Success<T> {
  return result.ok;
}

/**
 * Checks whether a result failed with the given kind.
 *
 * @example
 * ```typescript
 * const result = await provider.retrieveHistoricalPrices('US', 'AAPL', '2024-06-30');
 * if (isFailureOf(result, 'empty')) {
 *   // no trading history, skip the ticker
 * }
 * ```
 */
export function isFailureOf<T>(result: RetrievalResult<T>, kind: RetrievalErrorKind): result is Failure {
  return !result.ok && result.error.kind === kind;
}

/**
 * Collapses a result to "value or absent", for callers that only care
 * whether data came back.
 */
export function valueOrNull<T>(result: RetrievalResult<T>): T | null {
  return result.ok ? result.value : null;
}
