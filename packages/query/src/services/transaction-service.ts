import {
  InvalidPaginationError,
  NotFoundError,
  type Transaction,
} from '@tallyview/core';
import { getLogger } from '@tallyview/logger';
import type { TransactionStore } from '@tallyview/store';
import { err, ok, type Result } from 'neverthrow';

import { paginate, validatePaginationParams, type PaginatedResponse } from '../pagination/pagination.ts';
import { findTransactions, sortByDateDescending } from '../search/search-engine.ts';
import type { SearchCriteria } from '../search/search-filters.ts';

import type { ChannelTypeCount } from './types.ts';

const logger = getLogger('TransactionService');

export type TransactionPage = PaginatedResponse<Transaction>;

function notFound(id: string): NotFoundError {
  return new NotFoundError(`Transaction with ID ${id} not found`, 'transaction', id);
}

export class TransactionService {
  constructor(private readonly store: TransactionStore) {}

  /** Every transaction, newest first. */
  listTransactions(page?: number, limit?: number): Result<TransactionPage, InvalidPaginationError> {
    return validatePaginationParams(page, limit).map((params) =>
      paginate(sortByDateDescending(this.store.getAll()), params)
    );
  }

  getTransaction(id: string): Result<Transaction, NotFoundError> {
    const transaction = this.store.get(id);
    if (!transaction) {
      logger.warn({ id }, 'Transaction not found');
      return err(notFound(id));
    }
    return ok(transaction);
  }

  searchTransactions(criteria: SearchCriteria, page?: number, limit?: number): Result<TransactionPage, InvalidPaginationError> {
    return validatePaginationParams(page, limit).map((params) => paginate(findTransactions(this.store, criteria), params));
  }

  deleteTransaction(id: string): Result<void, NotFoundError> {
    if (!this.store.delete(id)) {
      logger.warn({ id }, 'Transaction not found for deletion');
      return err(notFound(id));
    }
    logger.info({ id }, 'Deleted transaction');
    return ok(undefined);
  }

  /** Transaction count per payment channel, most used first. */
  getChannelTypeCounts(): ChannelTypeCount[] {
    return this.store
      .getAttributeValues('channelType')
      .map((type) => ({ count: this.store.countByAttribute('channelType', type), type }))
      .sort((a, b) => b.count - a.count);
  }

  getRecentTransactions(limit?: number): Result<TransactionPage, InvalidPaginationError> {
    return validatePaginationParams(1, limit).map((params) =>
      paginate(sortByDateDescending(this.store.getAll()), params)
    );
  }

  getCustomerTransactions(customerId: string, page?: number, limit?: number): Result<TransactionPage, InvalidPaginationError> {
    return validatePaginationParams(page, limit).map((params) =>
      paginate(sortByDateDescending(this.store.getByAttribute('customer', customerId)), params)
    );
  }

  getMerchantTransactions(merchantId: string, page?: number, limit?: number): Result<TransactionPage, InvalidPaginationError> {
    return validatePaginationParams(page, limit).map((params) =>
      paginate(sortByDateDescending(this.store.getByAttribute('merchant', merchantId)), params)
    );
  }
}
