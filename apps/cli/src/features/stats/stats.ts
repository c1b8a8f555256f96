// Aggregate statistics commands

import type { AmountDistribution, CategoryCodeStats, DailyStats, OverviewStats } from '@tallyview/query';
import type { Command } from 'commander';
import { ok } from 'neverthrow';

import { runQueryCommand, withCommonOptions, type CommonCommandOptions } from '../shared/command-runtime.ts';

import { formatAmountDistribution, formatCategoryStats, formatDailyStats, formatOverview } from './stats-view-utils.ts';

/**
 * Register the stats command group.
 *
 * Structure:
 *   stats overview      - Count, total, average and date range
 *   stats distribution  - Counts per amount bucket
 *   stats by-type       - Totals per merchant category code
 *   stats daily         - Totals per UTC day
 */
export function registerStatsCommand(program: Command): void {
  const stats = program.command('stats').description('Aggregate statistics over loaded transactions');

  withCommonOptions(stats.command('overview').description('Show overall transaction statistics')).action(
    async (options: CommonCommandOptions) => {
      await runQueryCommand<OverviewStats>(
        { execute: ({ statistics }) => ok(statistics.getOverview()), formatText: formatOverview, name: 'stats-overview' },
        options
      );
    }
  );

  withCommonOptions(stats.command('distribution').description('Show how amounts spread across buckets')).action(
    async (options: CommonCommandOptions) => {
      await runQueryCommand<AmountDistribution>(
        {
          execute: ({ statistics }) => ok(statistics.getAmountDistribution()),
          formatText: formatAmountDistribution,
          name: 'stats-distribution',
        },
        options
      );
    }
  );

  withCommonOptions(stats.command('by-type').description('Show totals per merchant category code')).action(
    async (options: CommonCommandOptions) => {
      await runQueryCommand<CategoryCodeStats[]>(
        {
          execute: ({ statistics }) => ok(statistics.getStatsByCategoryCode()),
          formatText: formatCategoryStats,
          name: 'stats-by-type',
        },
        options
      );
    }
  );

  withCommonOptions(stats.command('daily').description('Show totals per day')).action(
    async (options: CommonCommandOptions) => {
      await runQueryCommand<DailyStats[]>(
        { execute: ({ statistics }) => ok(statistics.getDailyStats()), formatText: formatDailyStats, name: 'stats-daily' },
        options
      );
    }
  );
}
