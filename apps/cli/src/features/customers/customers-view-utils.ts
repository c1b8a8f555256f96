import type { PaginatedResponse, CustomerDetails, CustomerSummary, TopCustomer } from '@tallyview/query';

import { formatAmount, formatPaginationFooter, formatTable } from '../shared/view-utils.ts';

export function formatCustomerPage(page: PaginatedResponse<CustomerSummary>): string {
  if (page.data.length === 0) {
    return `No customers found.\n${formatPaginationFooter(page.pagination)}`;
  }
  const table = formatTable(
    ['Customer', 'Transactions'],
    page.data.map(({ customerId, transactionCount }) => [customerId, String(transactionCount)])
  );
  return `${table}\n\n${formatPaginationFooter(page.pagination)}`;
}

export function formatCustomerDetails(details: CustomerDetails): string {
  return [
    `Customer:       ${details.customerId}`,
    `Transactions:   ${details.transactionCount}`,
    `Total amount:   ${formatAmount(details.totalAmount)}`,
    `Average amount: ${formatAmount(details.averageAmount)}`,
  ].join('\n');
}

export function formatTopCustomers(customers: TopCustomer[]): string {
  if (customers.length === 0) return 'No customers found.';
  return formatTable(
    ['Rank', 'Customer', 'Transactions', 'Total'],
    customers.map(({ customerId, totalAmount, transactionCount }, index) => [
      String(index + 1),
      customerId,
      String(transactionCount),
      formatAmount(totalAmount),
    ])
  );
}
