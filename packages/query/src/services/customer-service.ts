import { averageOf, InvalidPaginationError, MAX_LIMIT, MIN_LIMIT, sumDecimals } from '@tallyview/core';
import type { StoreReader } from '@tallyview/store';
import { err, ok, type Result } from 'neverthrow';

import { paginate, validatePaginationParams, type PaginatedResponse } from '../pagination/pagination.ts';

import type { CustomerDetails, CustomerSummary, TopCustomer } from './types.ts';

export const DEFAULT_TOP_CUSTOMERS = 10;

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

export class CustomerService {
  constructor(private readonly reader: StoreReader) {}

  /** Distinct customers by id, ascending. */
  listCustomers(page?: number, limit?: number): Result<PaginatedResponse<CustomerSummary>, InvalidPaginationError> {
    return validatePaginationParams(page, limit).map((params) => {
      const customers = this.reader
        .getAttributeValues('customer')
        .sort(compareIds)
        .map((customerId) => ({
          customerId,
          transactionCount: this.reader.countByAttribute('customer', customerId),
        }));
      return paginate(customers, params);
    });
  }

  /**
   * Unknown customers yield a zero-valued result with the id echoed back.
   */
  getCustomerDetails(customerId: string): CustomerDetails {
    const transactions = this.reader.getByAttribute('customer', customerId);
    const totalAmount = sumDecimals(transactions.map((t) => t.amount));
    return {
      averageAmount: averageOf(totalAmount, transactions.length),
      customerId,
      totalAmount,
      transactionCount: transactions.length,
    };
  }

  /** Most active customers first; equal counts order by customer id. */
  getTopCustomers(n: number = DEFAULT_TOP_CUSTOMERS): Result<TopCustomer[], InvalidPaginationError> {
    if (!Number.isInteger(n) || n < MIN_LIMIT || n > MAX_LIMIT) {
      return err(new InvalidPaginationError(`N must be between ${MIN_LIMIT} and ${MAX_LIMIT}`, 1, n));
    }

    const ranked = this.reader
      .getAttributeValues('customer')
      .map((customerId) => ({
        customerId,
        transactionCount: this.reader.countByAttribute('customer', customerId),
      }))
      .sort((a, b) => b.transactionCount - a.transactionCount || compareIds(a.customerId, b.customerId))
      .slice(0, n);

    return ok(
      ranked.map(({ customerId, transactionCount }) => ({
        customerId,
        totalAmount: sumDecimals(this.reader.getByAttribute('customer', customerId).map((t) => t.amount)),
        transactionCount,
      }))
    );
  }
}
