import type { ChannelFraudStats, FraudPrediction, FraudSummary } from '@tallyview/query';

import { formatAmount, formatRate, formatTable } from '../shared/view-utils.ts';

export function formatFraudSummary(summary: FraudSummary): string {
  return [
    `Flagged transactions: ${summary.totalFraudCount}`,
    `Fraud rate:           ${formatRate(summary.fraudRate)}`,
    `Flagged amount:       ${formatAmount(summary.totalFraudAmount)}`,
  ].join('\n');
}

export function formatChannelFraudStats(stats: ChannelFraudStats[]): string {
  if (stats.length === 0) return 'No transactions loaded.';
  return formatTable(
    ['Channel', 'Flagged', 'Total', 'Rate'],
    stats.map(({ fraudCount, fraudRate, totalCount, type }) => [
      type || '(none)',
      String(fraudCount),
      String(totalCount),
      formatRate(fraudRate),
    ])
  );
}

export function formatFraudPrediction({ fraudScore, reasoning }: FraudPrediction): string {
  return `Fraud score: ${fraudScore.toFixed(1)}\nReasoning:   ${reasoning}`;
}
