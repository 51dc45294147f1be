/**
 * @fileoverview Error taxonomy for market reference data retrieval.
 *
 * Every failure a retrieval can report is one of three kinds:
 * - transport: the HTTP request itself failed (network, timeout, non-2xx)
 * - empty: the provider answered but had nothing for the request
 * - shape: the response did not match the expected layout
 *
 * All errors extend RefDataError and carry a machine-readable code,
 * structured data and an ISO timestamp.
 *
 * @module @refdata/contracts/errors
 */

/**
 * Base error class for all reference data errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new RefDataError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class RefDataError extends Error {
  /**
   * Machine-readable error code (e.g., 'TRANSPORT_ERROR').
   */
  readonly code: string;

  /**
   * Structured error data for debugging and retry logic.
   */
  readonly data?: Record<string, unknown>;

  /**
   * ISO 8601 timestamp when error was created.
   */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'RefDataError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes error to JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Discriminator shared by the errors a retrieval can resolve with.
 */
export type RetrievalErrorKind = 'transport' | 'empty' | 'shape';

/**
 * Thrown (or returned) when the HTTP request fails: network error,
 * timeout, or a non-2xx status.
 *
 * @example
 * ```typescript
 * new TransportError('Request failed with status code 503', {
 *   statusCode: 503,
 *   url: 'https://eodhd.com/api/exchanges-list/?api_token=***&fmt=json',
 * });
 * ```
 */
export class TransportError extends RefDataError {
  readonly kind = 'transport' as const;

  /**
   * HTTP status code, when the server answered.
   */
  readonly statusCode?: number;

  /**
   * Request URL with credentials masked.
   */
  readonly url?: string;

  constructor(
    message: string,
    data: {
      statusCode?: number;
      url?: string;
      cause?: string;
      [key: string]: unknown;
    } = {},
    code: string = 'TRANSPORT_ERROR'
  ) {
    super(code, message, data);
    this.name = 'TransportError';
    this.statusCode = data.statusCode;
    this.url = data.url;
  }
}

/**
 * The provider answered but returned nothing, e.g. an unlisted exchange
 * or a ticker with no trading history. Not a failure of the request.
 */
export class EmptyDataError extends RefDataError {
  readonly kind = 'empty' as const;

  constructor(message: string, data?: Record<string, unknown>) {
    super('EMPTY_DATA', message, data);
    this.name = 'EmptyDataError';
  }
}

/**
 * The response did not match the layout the normalizer expects
 * (missing field, unknown field, wrong type, not an array).
 *
 * @example
 * ```typescript
 * new ShapeError('Unknown price fields: split', {
 *   unknownFields: ['split'],
 *   operation: 'retrieveHistoricalPrices',
 * });
 * ```
 */
export class ShapeError extends RefDataError {
  readonly kind = 'shape' as const;

  constructor(message: string, data?: Record<string, unknown>) {
    super('SHAPE_ERROR', message, data);
    this.name = 'ShapeError';
  }
}

/**
 * Thrown for invalid caller-supplied arguments (empty API key, malformed
 * date). A programmer error: thrown, never folded into a result.
 */
export class InvalidArgumentError extends RefDataError {
  constructor(message: string, data: { argument: string; [key: string]: unknown }) {
    super('INVALID_ARGUMENT', message, data);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Any error a retrieval result can carry.
 */
export type RetrievalError = TransportError | EmptyDataError | ShapeError;

export function isRefDataError(error: unknown): error is RefDataError {
  return error instanceof RefDataError;
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

export function isEmptyDataError(error: unknown): error is EmptyDataError {
  return error instanceof EmptyDataError;
}

export function isShapeError(error: unknown): error is ShapeError {
  return error instanceof ShapeError;
}

/**
 * Type guard to check if an error is an InvalidArgumentError.
 *
 * @example
 * ```typescript
 * try {
 *   await provider.retrieveTickers('');
 * } catch (err) {
 *   if (isInvalidArgumentError(err)) {
 *     console.error(`Bad argument: ${err.data?.argument}`);
 *   }
 * }
 * ```
 */
export function isInvalidArgumentError(error: unknown): error is InvalidArgumentError {
  return error instanceof InvalidArgumentError;
}
