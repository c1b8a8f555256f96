import { InvalidPaginationError } from '@tallyview/core';
import { describe, expect, it } from 'vitest';

import { makeTransaction, storeWith } from '../../__tests__/test-fixtures.ts';
import { CustomerService } from '../customer-service.ts';

function customerStore() {
  return storeWith(
    makeTransaction({ amount: 5, customerId: 'C3', id: '1' }),
    makeTransaction({ amount: 10, customerId: 'C1', id: '2' }),
    makeTransaction({ amount: 20, customerId: 'C2', id: '3' }),
    makeTransaction({ amount: 30, customerId: 'C2', id: '4' }),
    makeTransaction({ amount: 40, customerId: 'C1', id: '5' }),
    makeTransaction({ amount: 50, customerId: 'C4', id: '6' })
  );
}

describe('CustomerService', () => {
  describe('listCustomers', () => {
    it('pages through customers in id order', () => {
      const service = new CustomerService(customerStore());

      const first = service.listCustomers(1, 3)._unsafeUnwrap();
      const second = service.listCustomers(2, 3)._unsafeUnwrap();

      expect(first.data).toEqual([
        { customerId: 'C1', transactionCount: 2 },
        { customerId: 'C2', transactionCount: 2 },
        { customerId: 'C3', transactionCount: 1 },
      ]);
      expect(first.pagination).toEqual({ hasNextPage: true, limit: 3, page: 1, totalCount: 4, totalPages: 2 });
      expect(second.data).toEqual([{ customerId: 'C4', transactionCount: 1 }]);
    });

    it('rejects invalid pagination', () => {
      expect(new CustomerService(customerStore()).listCustomers(0, 10)._unsafeUnwrapErr()).toBeInstanceOf(
        InvalidPaginationError
      );
    });
  });

  describe('getCustomerDetails', () => {
    it('totals one customer', () => {
      const details = new CustomerService(customerStore()).getCustomerDetails('C2');

      expect(details.customerId).toBe('C2');
      expect(details.transactionCount).toBe(2);
      expect(details.totalAmount.toNumber()).toBe(50);
      expect(details.averageAmount.toNumber()).toBe(25);
    });

    it('echoes an unknown id with zeros', () => {
      const details = new CustomerService(customerStore()).getCustomerDetails('NOPE');

      expect(details.customerId).toBe('NOPE');
      expect(details.transactionCount).toBe(0);
      expect(details.totalAmount.isZero()).toBe(true);
      expect(details.averageAmount.isZero()).toBe(true);
    });
  });

  describe('getTopCustomers', () => {
    it('ranks by count with ties broken by id', () => {
      const top = new CustomerService(customerStore()).getTopCustomers(3)._unsafeUnwrap();

      expect(top.map((c) => [c.customerId, c.transactionCount, c.totalAmount.toNumber()])).toEqual([
        ['C1', 2, 50],
        ['C2', 2, 50],
        ['C3', 1, 5],
      ]);
    });

    it('returns at most the number of distinct customers', () => {
      expect(new CustomerService(customerStore()).getTopCustomers(100)._unsafeUnwrap()).toHaveLength(4);
    });

    it('defaults to ten', () => {
      expect(new CustomerService(customerStore()).getTopCustomers().isOk()).toBe(true);
    });

    it.each([0, 1001])('rejects n = %s', (n) => {
      const error = new CustomerService(customerStore()).getTopCustomers(n)._unsafeUnwrapErr();

      expect(error.message).toBe('N must be between 1 and 1000');
    });
  });
});
