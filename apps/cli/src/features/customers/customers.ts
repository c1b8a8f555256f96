// Per-customer commands

import type { CustomerDetails, CustomerSummary, PaginatedResponse, TopCustomer } from '@tallyview/query';
import type { Command } from 'commander';
import { ok } from 'neverthrow';

import {
  runQueryCommand,
  withCommonOptions,
  withPageOptions,
  type CommonCommandOptions,
} from '../shared/command-runtime.ts';
import { parseIntegerOption, parsePageOptions, type PageOptions } from '../shared/option-parsers.ts';

import { formatCustomerDetails, formatCustomerPage, formatTopCustomers } from './customers-view-utils.ts';

interface TopCommandOptions extends CommonCommandOptions {
  n?: string | undefined;
}

/**
 * Register the customers command group.
 *
 * Structure:
 *   customers list         - Customers sorted by ID, paged
 *   customers view <id>    - Count, total and average for one customer
 *   customers top          - Customers with the most transactions
 */
export function registerCustomersCommand(program: Command): void {
  const customers = program.command('customers').description('Customer summaries');

  withPageOptions(withCommonOptions(customers.command('list').description('List customers with transaction counts'))).action(
    async (options: CommonCommandOptions & PageOptions) => {
      await runQueryCommand<PaginatedResponse<CustomerSummary>>(
        {
          execute: ({ customers }) =>
            parsePageOptions(options).andThen(({ limit, page }) => customers.listCustomers(page, limit)),
          formatText: formatCustomerPage,
          name: 'customers-list',
        },
        options
      );
    }
  );

  withCommonOptions(
    customers.command('view').description("Summarize one customer's spending").argument('<customerId>', 'Customer ID')
  ).action(async (customerId: string, options: CommonCommandOptions) => {
    await runQueryCommand<CustomerDetails>(
      {
        execute: ({ customers }) => ok(customers.getCustomerDetails(customerId)),
        formatText: formatCustomerDetails,
        name: 'customers-view',
      },
      options
    );
  });

  withCommonOptions(
    customers.command('top').description('Show the customers with the most transactions').option('--n <number>', 'How many, 1-1000 (default 10)')
  ).action(async (options: TopCommandOptions) => {
    await runQueryCommand<TopCustomer[]>(
      {
        execute: ({ customers }) => parseIntegerOption(options.n, 'n').andThen((n) => customers.getTopCustomers(n)),
        formatText: formatTopCustomers,
        name: 'customers-top',
      },
      options
    );
  });
}
