import type { HealthStatus, SystemMetadata } from '@tallyview/query';

import { formatTimestamp } from '../shared/view-utils.ts';

export function formatHealth(health: HealthStatus): string {
  return [
    `Status:        ${health.status}`,
    `Response time: ${health.responseTimeMs.toFixed(2)} ms`,
    `Checked at:    ${formatTimestamp(health.timestamp)}`,
  ].join('\n');
}

export function formatMetadata(metadata: SystemMetadata): string {
  return [
    `Transactions: ${metadata.totalTransactionCount}`,
    `Loaded at:    ${formatTimestamp(metadata.dataLoadDate)}`,
    `API version:  ${metadata.apiVersion}`,
    `Date range:   ${formatTimestamp(metadata.minDate)} to ${formatTimestamp(metadata.maxDate)}`,
  ].join('\n');
}
