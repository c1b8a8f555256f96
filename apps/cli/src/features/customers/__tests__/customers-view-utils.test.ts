import { buildPaginatedResponse } from '@tallyview/query';
import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { formatCustomerDetails, formatCustomerPage, formatTopCustomers } from '../customers-view-utils.ts';

describe('formatCustomerPage', () => {
  it('prints counts and the page footer', () => {
    expect(
      formatCustomerPage(
        buildPaginatedResponse(
          [
            { customerId: 'C001', transactionCount: 2 },
            { customerId: 'C002', transactionCount: 1 },
          ],
          1,
          2,
          3
        )
      )
    ).toBe('Customer  Transactions\n--------  ------------\nC001      2\nC002      1\n\nPage 1 of 2 (3 total)');
  });
});

describe('formatCustomerDetails', () => {
  it('prints count, total and average', () => {
    expect(
      formatCustomerDetails({
        averageAmount: new Decimal(150),
        customerId: 'C001',
        totalAmount: new Decimal(300),
        transactionCount: 2,
      })
    ).toBe('Customer:       C001\nTransactions:   2\nTotal amount:   $300.00\nAverage amount: $150.00');
  });
});

describe('formatTopCustomers', () => {
  it('numbers the ranking from 1', () => {
    expect(
      formatTopCustomers([{ customerId: 'C001', totalAmount: new Decimal(300), transactionCount: 2 }]).split('\n')[2]
    ).toBe('1     C001      2             $300.00');
  });
});
