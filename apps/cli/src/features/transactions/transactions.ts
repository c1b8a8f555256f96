// Transaction listing, lookup and search commands

import type { Transaction } from '@tallyview/core';
import { normalizeSearchFilters, type ChannelTypeCount, type TransactionPage } from '@tallyview/query';
import type { Command } from 'commander';
import { ok } from 'neverthrow';

import {
  runQueryCommand,
  withCommonOptions,
  withPageOptions,
  type CommonCommandOptions,
} from '../shared/command-runtime.ts';
import { parseIntegerOption, parsePageOptions, type PageOptions } from '../shared/option-parsers.ts';

import { formatChannelTypeCounts, formatTransactionDetail, formatTransactionPage } from './transactions-view-utils.ts';

type PagedCommandOptions = CommonCommandOptions & PageOptions;

interface SearchCommandOptions extends PagedCommandOptions {
  channelType?: string | undefined;
  customer?: string | undefined;
  maxAmount?: string | undefined;
  merchantCity?: string | undefined;
  minAmount?: string | undefined;
  transactionId?: string | undefined;
}

interface RecentCommandOptions extends CommonCommandOptions {
  limit?: string | undefined;
}

/**
 * Register the transactions command group.
 *
 * Structure:
 *   transactions list              - All transactions, newest first
 *   transactions view <id>         - One transaction
 *   transactions search            - Filter by amount, customer, city, channel
 *   transactions recent            - Most recent transactions
 *   transactions types             - Count per payment channel
 *   transactions by-customer <id>  - One customer's transactions
 *   transactions by-merchant <id>  - One merchant's transactions
 */
export function registerTransactionsCommand(program: Command): void {
  const transactions = program.command('transactions').description('Browse and search loaded transactions');

  withPageOptions(withCommonOptions(transactions.command('list').description('List transactions, newest first'))).action(
    async (options: PagedCommandOptions) => {
      await runQueryCommand<TransactionPage>(
        {
          execute: ({ transactions }) =>
            parsePageOptions(options).andThen(({ limit, page }) => transactions.listTransactions(page, limit)),
          formatText: formatTransactionPage,
          name: 'transactions-list',
        },
        options
      );
    }
  );

  withCommonOptions(transactions.command('view').description('Show a single transaction').argument('<id>', 'Transaction ID')).action(
    async (id: string, options: CommonCommandOptions) => {
      await runQueryCommand<Transaction>(
        {
          execute: ({ transactions }) => transactions.getTransaction(id),
          formatText: formatTransactionDetail,
          name: 'transactions-view',
        },
        options
      );
    }
  );

  withPageOptions(
    withCommonOptions(
      transactions
        .command('search')
        .description('Search transactions; all filters are optional and combine with AND')
        .option('--min-amount <amount>', 'Minimum amount, inclusive')
        .option('--max-amount <amount>', 'Maximum amount, inclusive')
        .option('--customer <id>', 'Customer ID')
        .option('--transaction-id <id>', 'Transaction ID')
        .option('--merchant-city <city>', 'Merchant city, exact match')
        .option('--channel-type <type>', 'Payment channel, exact match')
    )
  )
    .addHelpText(
      'after',
      `
Examples:
  $ tallyview transactions search --min-amount 100 --max-amount 500
  $ tallyview transactions search --merchant-city "New York" --channel-type "Online Transaction"
  $ tallyview transactions search --customer 1556 --json
`
    )
    .action(async (options: SearchCommandOptions) => {
      await runQueryCommand<TransactionPage>(
        {
          execute: ({ transactions }) =>
            parsePageOptions(options).andThen(({ limit, page }) =>
              normalizeSearchFilters({
                channelType: options.channelType,
                customerId: options.customer,
                maxAmount: options.maxAmount,
                merchantCity: options.merchantCity,
                minAmount: options.minAmount,
                transactionId: options.transactionId,
              }).andThen((criteria) => transactions.searchTransactions(criteria, page, limit))
            ),
          formatText: formatTransactionPage,
          name: 'transactions-search',
        },
        options
      );
    });

  withCommonOptions(
    transactions
      .command('recent')
      .description('Show the most recent transactions')
      .option('--limit <number>', 'Number of transactions, 1-1000 (default 50)')
  ).action(async (options: RecentCommandOptions) => {
    await runQueryCommand<TransactionPage>(
      {
        execute: ({ transactions }) =>
          parseIntegerOption(options.limit, 'limit').andThen((limit) => transactions.getRecentTransactions(limit)),
        formatText: formatTransactionPage,
        name: 'transactions-recent',
      },
      options
    );
  });

  withCommonOptions(transactions.command('types').description('Count transactions per payment channel')).action(
    async (options: CommonCommandOptions) => {
      await runQueryCommand<ChannelTypeCount[]>(
        {
          execute: ({ transactions }) => ok(transactions.getChannelTypeCounts()),
          formatText: formatChannelTypeCounts,
          name: 'transactions-types',
        },
        options
      );
    }
  );

  withPageOptions(
    withCommonOptions(
      transactions
        .command('by-customer')
        .description("List one customer's transactions, newest first")
        .argument('<customerId>', 'Customer ID')
    )
  ).action(async (customerId: string, options: PagedCommandOptions) => {
    await runQueryCommand<TransactionPage>(
      {
        execute: ({ transactions }) =>
          parsePageOptions(options).andThen(({ limit, page }) =>
            transactions.getCustomerTransactions(customerId, page, limit)
          ),
        formatText: formatTransactionPage,
        name: 'transactions-by-customer',
      },
      options
    );
  });

  withPageOptions(
    withCommonOptions(
      transactions
        .command('by-merchant')
        .description("List one merchant's transactions, newest first")
        .argument('<merchantId>', 'Merchant ID')
    )
  ).action(async (merchantId: string, options: PagedCommandOptions) => {
    await runQueryCommand<TransactionPage>(
      {
        execute: ({ transactions }) =>
          parsePageOptions(options).andThen(({ limit, page }) =>
            transactions.getMerchantTransactions(merchantId, page, limit)
          ),
        formatText: formatTransactionPage,
        name: 'transactions-by-merchant',
      },
      options
    );
  });
}
