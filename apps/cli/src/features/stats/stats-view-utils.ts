import type { AmountDistribution, CategoryCodeStats, DailyStats, OverviewStats } from '@tallyview/query';

import { formatAmount, formatTable, formatTimestamp } from '../shared/view-utils.ts';

export function formatOverview(stats: OverviewStats): string {
  return [
    `Transactions:   ${stats.totalCount}`,
    `Total amount:   ${formatAmount(stats.totalAmount)}`,
    `Average amount: ${formatAmount(stats.averageAmount)}`,
    `Date range:     ${formatTimestamp(stats.minDate)} to ${formatTimestamp(stats.maxDate)}`,
  ].join('\n');
}

export function formatAmountDistribution({ buckets }: AmountDistribution): string {
  return formatTable(
    ['Range', 'Count', 'Share'],
    buckets.map(({ count, percentage, range }) => [range, String(count), `${percentage.toFixed(2)}%`])
  );
}

export function formatCategoryStats(stats: CategoryCodeStats[]): string {
  if (stats.length === 0) return 'No transactions loaded.';
  return formatTable(
    ['MCC', 'Count', 'Total', 'Average'],
    stats.map(({ averageAmount, count, totalAmount, type }) => [
      type || '(none)',
      String(count),
      formatAmount(totalAmount),
      formatAmount(averageAmount),
    ])
  );
}

export function formatDailyStats(stats: DailyStats[]): string {
  if (stats.length === 0) return 'No transactions loaded.';
  return formatTable(
    ['Date', 'Count', 'Total', 'Average'],
    stats.map(({ averageAmount, count, date, totalAmount }) => [
      date,
      String(count),
      formatAmount(totalAmount),
      formatAmount(averageAmount),
    ])
  );
}
