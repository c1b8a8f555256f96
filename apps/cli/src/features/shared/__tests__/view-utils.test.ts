import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import {
  formatAmount,
  formatPaginationFooter,
  formatRate,
  formatSection,
  formatTable,
  formatTimestamp,
} from '../view-utils.ts';

describe('formatAmount', () => {
  it('prints two decimals with a dollar sign', () => {
    expect(formatAmount(new Decimal('1234.5'))).toBe('$1234.50');
    expect(formatAmount(new Decimal(0))).toBe('$0.00');
  });
});

describe('formatRate', () => {
  it('prints a percentage', () => {
    expect(formatRate(1 / 3)).toBe('33.33%');
    expect(formatRate(0)).toBe('0.00%');
  });
});

describe('formatTimestamp', () => {
  it('prints UTC date and time', () => {
    expect(formatTimestamp(new Date('2023-01-15T14:30:05Z'))).toBe('2023-01-15 14:30:05');
  });
});

describe('formatTable', () => {
  it('pads columns to the widest cell', () => {
    expect(
      formatTable(
        ['ID', 'Amount'],
        [
          ['1', '$5.00'],
          ['1002', '$1200.00'],
        ]
      ).split('\n')
    ).toEqual(['ID    Amount', '----  --------', '1     $5.00', '1002  $1200.00']);
  });

  it('renders just the header for no rows', () => {
    expect(formatTable(['Type', 'Count'], [])).toBe('Type  Count\n----  -----');
  });
});

describe('formatPaginationFooter', () => {
  it('summarizes the page position', () => {
    expect(formatPaginationFooter({ hasNextPage: true, limit: 10, page: 2, totalCount: 25, totalPages: 3 })).toBe(
      'Page 2 of 3 (25 total)'
    );
  });
});

describe('formatSection', () => {
  it('underlines the title', () => {
    expect(formatSection('Fraud Summary', 'body')).toBe('\nFraud Summary\n=============\nbody');
  });
});
