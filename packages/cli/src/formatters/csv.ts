/**
 * CSV output formatter for retrieved tables
 *
 * Header row is the table's column layout; each record becomes one row
 * in the same order. Dates are written as ISO 8601, absent values as
 * empty fields. Fields containing a comma, quote or line break are
 * quoted (RFC 4180).
 *
 * @module @refdata/cli/formatters/csv
 */

import type { Table } from '@refdata/contracts';

/**
 * Format table as CSV
 *
 * @example
 * const csv = formatCsv({
 *   columns: ['Ticker_ID', 'Date', 'Close'],
 *   rows: [{ Ticker_ID: 'AAPL_US', Date: '2024-06-28', Close: 210.62 }],
 * });
 * // Ticker_ID,Date,Close
 * // AAPL_US,2024-06-28,210.62
 */
export function formatCsv<R extends object>(table: Table<R>): string {
  const header = table.columns.map((column) => escapeField(column));
  const rows = table.rows.map((row) => table.columns.map((column) => formatValue(row[column])).join(','));

  return [header.join(','), ...rows].join('\n');
}

/**
 * Format a single value for CSV, handling null/undefined and dates
 */
export function formatValue(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return escapeField(String(value));
}

function escapeField(field: string): string {
  if (/[",\r\n]/.test(field)) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}
