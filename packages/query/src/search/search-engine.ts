import type { Transaction } from '@tallyview/core';
import type { StoreReader } from '@tallyview/store';

import type { SearchCriteria } from './search-filters.ts';

type Predicate = (transaction: Transaction) => boolean;

/**
 * Stable sort, newest first. Returns a new array.
 */
export function sortByDateDescending(transactions: readonly Transaction[]): Transaction[] {
  return [...transactions].sort((a, b) => b.date.getTime() - a.date.getTime());
}

/**
 * Start from the narrowest index the criteria allow.
 */
function selectCandidates(reader: StoreReader, criteria: SearchCriteria): Transaction[] {
  if (criteria.transactionId !== undefined) {
    const match = reader.get(criteria.transactionId);
    return match ? [match] : [];
  }
  if (criteria.customerId !== undefined) {
    return reader.getByAttribute('customer', criteria.customerId);
  }
  if (criteria.channelType !== undefined) {
    return reader.getByAttribute('channelType', criteria.channelType);
  }
  return reader.getAll();
}

function buildPredicate(criteria: SearchCriteria): Predicate {
  const predicates: Predicate[] = [];
  const { channelType, customerId, maxAmount, merchantCity, minAmount, transactionId } = criteria;

  if (transactionId !== undefined) predicates.push((t) => t.id === transactionId);
  if (customerId !== undefined) predicates.push((t) => t.customerId === customerId);
  if (channelType !== undefined) predicates.push((t) => t.channelType === channelType);
  if (merchantCity !== undefined) predicates.push((t) => t.merchantCity === merchantCity);
  if (minAmount !== undefined) predicates.push((t) => t.amount.gte(minAmount));
  if (maxAmount !== undefined) predicates.push((t) => t.amount.lte(maxAmount));

  return (transaction) => predicates.every((predicate) => predicate(transaction));
}

/**
 * All records matching every present criterion, newest first.
 */
export function findTransactions(reader: StoreReader, criteria: SearchCriteria): Transaction[] {
  const predicate = buildPredicate(criteria);
  return sortByDateDescending(selectCandidates(reader, criteria).filter(predicate));
}
