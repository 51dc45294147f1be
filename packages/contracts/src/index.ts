/**
 * @fileoverview Main entry point for @refdata/contracts package.
 *
 * Exports record types, column layouts, the error taxonomy and the
 * retrieval result type shared by providers and the CLI.
 *
 * @module @refdata/contracts
 */

// Records and layouts
export type {
  Table,
  ExchangeSource,
  ExchangeRecord,
  TickerRecord,
  PriceRecord,
  ManualExchange,
  ManualExchangeTable,
} from './records.js';

export {
  EXCHANGE_COLUMNS,
  TICKER_COLUMNS,
  PRICE_COLUMNS,
  PRICE_COLUMNS_SORTED,
  US_EXCHANGES,
} from './records.js';

// Error classes and guards
export {
  RefDataError,
  TransportError,
  EmptyDataError,
  ShapeError,
  InvalidArgumentError,
  isRefDataError,
  isTransportError,
  isEmptyDataError,
  isShapeError,
  isInvalidArgumentError,
} from './errors.js';

export type { RetrievalError, RetrievalErrorKind } from './errors.js';

// Results
export { ok, fail, isSuccess, isFailureOf, valueOrNull } from './result.js';
export type { Success, Failure, RetrievalResult } from './result.js';
