import { InvalidSearchFiltersError } from '@tallyview/core';
import { describe, expect, it } from 'vitest';

import { normalizeSearchFilters } from '../search-filters.ts';

describe('normalizeSearchFilters', () => {
  it('treats missing input as no criteria', () => {
    expect(normalizeSearchFilters(undefined)._unsafeUnwrap()).toEqual({
      channelType: undefined,
      customerId: undefined,
      maxAmount: undefined,
      merchantCity: undefined,
      minAmount: undefined,
      transactionId: undefined,
    });
  });

  it('drops empty strings and the "string" placeholder', () => {
    const criteria = normalizeSearchFilters({
      channelType: 'string',
      customerId: '',
      minAmount: 'string',
      transactionId: null,
    })._unsafeUnwrap();

    expect(criteria.channelType).toBeUndefined();
    expect(criteria.customerId).toBeUndefined();
    expect(criteria.minAmount).toBeUndefined();
    expect(criteria.transactionId).toBeUndefined();
  });

  it('keeps text criteria verbatim, surrounding whitespace included', () => {
    const criteria = normalizeSearchFilters({ customerId: ' C001 ', merchantCity: '  ' })._unsafeUnwrap();

    expect(criteria.customerId).toBe(' C001 ');
    expect(criteria.merchantCity).toBe('  ');
  });

  it('keeps present values and parses amount bounds', () => {
    const criteria = normalizeSearchFilters({ customerId: 'C001', maxAmount: '$250.50', minAmount: 100 })._unsafeUnwrap();

    expect(criteria.customerId).toBe('C001');
    expect(criteria.minAmount?.toNumber()).toBe(100);
    expect(criteria.maxAmount?.toString()).toBe('250.5');
  });

  it('rejects non-finite amount bounds', () => {
    const error = normalizeSearchFilters({ minAmount: Number.POSITIVE_INFINITY })._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(InvalidSearchFiltersError);
    expect(error.message).toBe('Invalid search filters: minAmount: Amount bound must be a finite number');
    expect(error.issues).toEqual([{ message: 'Amount bound must be a finite number', path: 'minAmount' }]);
  });

  it('rejects non-numeric amount text', () => {
    expect(normalizeSearchFilters({ maxAmount: 'lots' }).isErr()).toBe(true);
  });

  it('rejects wrongly typed fields', () => {
    expect(normalizeSearchFilters({ customerId: 42 }).isErr()).toBe(true);
  });
});
