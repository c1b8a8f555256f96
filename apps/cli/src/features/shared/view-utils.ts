// Shared text formatting for query commands

import type { Decimal } from 'decimal.js';
import type { PaginationMeta } from '@tallyview/query';

export function formatAmount(amount: Decimal): string {
  return `$${amount.toFixed(2)}`;
}

/** Ratio in [0, 1] as a percentage with two decimals. */
export function formatRate(rate: number): string {
  return `${(rate * 100).toFixed(2)}%`;
}

/** UTC timestamp as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export function formatDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Render rows as a left-aligned text table with a dashed rule under the header.
 */
export function formatTable(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? '').length))
  );
  const renderRow = (cells: readonly string[]) =>
    widths
      .map((width, column) => (cells[column] ?? '').padEnd(width))
      .join('  ')
      .trimEnd();

  return [renderRow(headers), widths.map((width) => '-'.repeat(width)).join('  '), ...rows.map(renderRow)].join('\n');
}

export function formatPaginationFooter({ page, totalCount, totalPages }: PaginationMeta): string {
  return `Page ${page} of ${totalPages} (${totalCount} total)`;
}

/**
 * Titled section: heading, underline, body.
 */
export function formatSection(title: string, body: string): string {
  return ['', title, '='.repeat(title.length), body].join('\n');
}
