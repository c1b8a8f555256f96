import type { Transaction } from '@tallyview/core';
import type { ChannelTypeCount, TransactionPage } from '@tallyview/query';

import { formatAmount, formatPaginationFooter, formatTable, formatTimestamp } from '../shared/view-utils.ts';

const TRANSACTION_HEADERS = ['ID', 'Date', 'Customer', 'Amount', 'Channel', 'Merchant', 'City', 'Errors'] as const;

function transactionRow(transaction: Transaction): string[] {
  return [
    transaction.id,
    formatTimestamp(transaction.date),
    transaction.customerId,
    formatAmount(transaction.amount),
    transaction.channelType,
    transaction.merchantId,
    transaction.merchantCity,
    transaction.errors ?? '',
  ];
}

export function formatTransactionPage(page: TransactionPage): string {
  if (page.data.length === 0) {
    return `No transactions found.\n${formatPaginationFooter(page.pagination)}`;
  }
  return `${formatTable(TRANSACTION_HEADERS, page.data.map(transactionRow))}\n\n${formatPaginationFooter(page.pagination)}`;
}

/**
 * One field per line for a single transaction.
 */
export function formatTransactionDetail(transaction: Transaction): string {
  const fields: [string, string][] = [
    ['ID', transaction.id],
    ['Date', formatTimestamp(transaction.date)],
    ['Customer', transaction.customerId],
    ['Card', transaction.cardId],
    ['Amount', formatAmount(transaction.amount)],
    ['Channel', transaction.channelType],
    ['Merchant', transaction.merchantId],
    ['City', transaction.merchantCity],
    ['State', transaction.merchantState],
    ['Zip', transaction.zip],
    ['MCC', transaction.mcc],
    ['Errors', transaction.errors ?? '-'],
  ];
  const width = Math.max(...fields.map(([label]) => label.length));
  return fields.map(([label, value]) => `${`${label}:`.padEnd(width + 2)}${value}`).join('\n');
}

export function formatChannelTypeCounts(counts: ChannelTypeCount[]): string {
  if (counts.length === 0) return 'No transactions loaded.';
  return formatTable(
    ['Channel', 'Count'],
    counts.map(({ count, type }) => [type || '(none)', String(count)])
  );
}
