import type { Transaction } from '@tallyview/core';
import type {
  CategoryCodeStats,
  CustomerDetails,
  DailyStats,
  FraudSummary,
  HealthStatus,
  OverviewStats,
  PaginatedResponse,
  SystemMetadata,
  TopCustomer,
} from '@tallyview/query';

// JSON shapes: amounts as numbers, dates as ISO strings, absent flags as null

export interface TransactionDto {
  id: string;
  date: string;
  customerId: string;
  cardId: string;
  amount: number;
  channelType: string;
  merchantId: string;
  merchantCity: string;
  merchantState: string;
  zip: string;
  mcc: string;
  errors: string | null;
}

export function presentTransaction(transaction: Transaction): TransactionDto {
  return {
    amount: transaction.amount.toNumber(),
    cardId: transaction.cardId,
    channelType: transaction.channelType,
    customerId: transaction.customerId,
    date: transaction.date.toISOString(),
    errors: transaction.errors ?? null,
    id: transaction.id,
    mcc: transaction.mcc,
    merchantCity: transaction.merchantCity,
    merchantId: transaction.merchantId,
    merchantState: transaction.merchantState,
    zip: transaction.zip,
  };
}

export function presentPage<T, U>(page: PaginatedResponse<T>, present: (item: T) => U): PaginatedResponse<U> {
  return { data: page.data.map(present), pagination: page.pagination };
}

export function presentOverview(stats: OverviewStats) {
  return {
    averageAmount: stats.averageAmount.toNumber(),
    maxDate: stats.maxDate.toISOString(),
    minDate: stats.minDate.toISOString(),
    totalAmount: stats.totalAmount.toNumber(),
    totalCount: stats.totalCount,
  };
}

export function presentAmountStats<T extends CategoryCodeStats | DailyStats>(stats: T) {
  return { ...stats, averageAmount: stats.averageAmount.toNumber(), totalAmount: stats.totalAmount.toNumber() };
}

export function presentFraudSummary(summary: FraudSummary) {
  return { ...summary, totalFraudAmount: summary.totalFraudAmount.toNumber() };
}

export function presentCustomerDetails(details: CustomerDetails) {
  return {
    ...details,
    averageAmount: details.averageAmount.toNumber(),
    totalAmount: details.totalAmount.toNumber(),
  };
}

export function presentTopCustomer(customer: TopCustomer) {
  return { ...customer, totalAmount: customer.totalAmount.toNumber() };
}

export function presentHealth(health: HealthStatus) {
  return { ...health, timestamp: health.timestamp.toISOString() };
}

export function presentMetadata(metadata: SystemMetadata) {
  return {
    ...metadata,
    dataLoadDate: metadata.dataLoadDate.toISOString(),
    maxDate: metadata.maxDate.toISOString(),
    minDate: metadata.minDate.toISOString(),
  };
}
