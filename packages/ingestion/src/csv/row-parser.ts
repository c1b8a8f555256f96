import { InvalidRecordDataError, TransactionSchema, type Transaction } from '@tallyview/core';
import { err, ok, type Result } from 'neverthrow';

import type { CsvRow } from './csv-reader.ts';

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/**
 * Parse a `YYYY-MM-DD HH:MM:SS` timestamp as UTC.
 * Returns undefined for anything else, including out-of-range components.
 */
export function parseTimestamp(text: string): Date | undefined {
  const match = TIMESTAMP_PATTERN.exec(text.trim());
  if (!match) return undefined;

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hour === undefined ||
    minute === undefined ||
    second === undefined
  ) {
    return undefined;
  }

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Date.UTC rolls over (Feb 30 -> Mar 2); reject instead
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return undefined;
  }
  return date;
}

const COLUMN_TO_FIELD: Record<string, string> = {
  amount: 'amount',
  card_id: 'cardId',
  client_id: 'customerId',
  date: 'date',
  errors: 'errors',
  id: 'id',
  mcc: 'mcc',
  merchant_city: 'merchantCity',
  merchant_id: 'merchantId',
  merchant_state: 'merchantState',
  use_chip: 'channelType',
  zip: 'zip',
};

const FIELD_TO_COLUMN = new Map(Object.entries(COLUMN_TO_FIELD).map(([column, field]) => [field, column]));

/**
 * Convert one CSV row into a validated transaction.
 *
 * @param rowNumber 1-based data row number, used in error reports
 */
export function parseTransactionRow(row: CsvRow, rowNumber: number): Result<Transaction, InvalidRecordDataError> {
  const dateText = row['date'] ?? '';
  const date = parseTimestamp(dateText);
  if (!date) {
    return err(new InvalidRecordDataError(`Invalid date "${dateText}"`, rowNumber, 'date'));
  }

  const parsed = TransactionSchema.safeParse({
    amount: row['amount'] ?? '',
    cardId: row['card_id'] ?? '',
    channelType: row['use_chip'] ?? '',
    customerId: row['client_id'] ?? '',
    date,
    errors: row['errors'],
    id: row['id'] ?? '',
    mcc: row['mcc'] ?? '',
    merchantCity: row['merchant_city'] ?? '',
    merchantId: row['merchant_id'] ?? '',
    merchantState: row['merchant_state'] ?? '',
    zip: row['zip'] ?? '',
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.');
    const column = field ? (FIELD_TO_COLUMN.get(field) ?? field) : undefined;
    const value = column ? row[column] : undefined;
    const message = issue?.message ?? 'Invalid row';
    return err(
      new InvalidRecordDataError(
        column ? `${column}: ${message}${value === undefined ? '' : ` ("${value}")`}` : message,
        rowNumber,
        column
      )
    );
  }

  return ok(parsed.data);
}
