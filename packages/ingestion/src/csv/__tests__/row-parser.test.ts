import { describe, expect, it } from 'vitest';

import { parseTimestamp, parseTransactionRow } from '../row-parser.ts';

const baseRow = {
  amount: '$125.50',
  card_id: '4501',
  client_id: 'C001',
  date: '2023-01-15 14:30:00',
  errors: '',
  id: '7475327',
  mcc: '5411',
  merchant_city: 'Springfield',
  merchant_id: 'M59935',
  merchant_state: 'IL',
  use_chip: 'Swipe Transaction',
  zip: '62701',
};

describe('parseTimestamp', () => {
  it('reads date and time as UTC', () => {
    expect(parseTimestamp('2023-01-15 14:30:05')?.toISOString()).toBe('2023-01-15T14:30:05.000Z');
  });

  it('rejects a bare date', () => {
    expect(parseTimestamp('2023-01-15')).toBeUndefined();
  });

  it('rejects the T separator and missing seconds', () => {
    expect(parseTimestamp('2023-01-15T14:30:05')).toBeUndefined();
    expect(parseTimestamp('2023-01-15 14:30')).toBeUndefined();
    expect(parseTimestamp('2023-01-01T08:15')).toBeUndefined();
  });

  it('rejects impossible calendar dates', () => {
    expect(parseTimestamp('2023-02-30 00:00:00')).toBeUndefined();
  });

  it('rejects other formats', () => {
    expect(parseTimestamp('15/01/2023')).toBeUndefined();
    expect(parseTimestamp('')).toBeUndefined();
  });
});

describe('parseTransactionRow', () => {
  it('maps columns onto transaction fields', () => {
    const transaction = parseTransactionRow(baseRow, 1)._unsafeUnwrap();

    expect(transaction).toMatchObject({
      cardId: '4501',
      channelType: 'Swipe Transaction',
      customerId: 'C001',
      errors: undefined,
      id: '7475327',
      mcc: '5411',
      merchantCity: 'Springfield',
      merchantId: 'M59935',
      merchantState: 'IL',
      zip: '62701',
    });
    expect(transaction.amount.toString()).toBe('125.5');
    expect(transaction.date.toISOString()).toBe('2023-01-15T14:30:00.000Z');
  });

  it('keeps a non-empty error flag', () => {
    const transaction = parseTransactionRow({ ...baseRow, errors: 'Bad PIN' }, 1)._unsafeUnwrap();

    expect(transaction.errors).toBe('Bad PIN');
  });

  it('defaults missing optional columns to empty strings', () => {
    const transaction = parseTransactionRow(
      { amount: '10', client_id: 'C9', date: '2023-03-01 00:00:00', id: 'x1' },
      4
    )._unsafeUnwrap();

    expect(transaction.merchantState).toBe('');
    expect(transaction.channelType).toBe('');
    expect(transaction.errors).toBeUndefined();
  });

  it('reports a bad date with its row number', () => {
    const error = parseTransactionRow({ ...baseRow, date: 'yesterday' }, 12)._unsafeUnwrapErr();

    expect(error.rowNumber).toBe(12);
    expect(error.field).toBe('date');
    expect(error.message).toBe('Invalid date "yesterday"');
  });

  it('rejects a row whose date has no time part', () => {
    const error = parseTransactionRow({ ...baseRow, date: '2023-01-01' }, 2)._unsafeUnwrapErr();

    expect(error.field).toBe('date');
    expect(error.message).toBe('Invalid date "2023-01-01"');
  });

  it('rejects hexadecimal amounts', () => {
    const error = parseTransactionRow({ ...baseRow, amount: '$0x1F' }, 6)._unsafeUnwrapErr();

    expect(error.field).toBe('amount');
    expect(error.message).toBe('amount: Must be a valid numeric string or number ("$0x1F")');
  });

  it('reports a non-numeric amount against its column', () => {
    const error = parseTransactionRow({ ...baseRow, amount: 'abc' }, 3)._unsafeUnwrapErr();

    expect(error.field).toBe('amount');
    expect(error.message).toBe('amount: Must be a valid numeric string or number ("abc")');
  });

  it('rejects negative amounts', () => {
    const error = parseTransactionRow({ ...baseRow, amount: '$-77.00' }, 5)._unsafeUnwrapErr();

    expect(error.field).toBe('amount');
    expect(error.message).toBe('amount: Amount must not be negative ("$-77.00")');
  });
});
