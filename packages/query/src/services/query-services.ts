import type { TransactionStore } from '@tallyview/store';

import { CustomerService } from './customer-service.ts';
import { FraudService } from './fraud-service.ts';
import { HealthService } from './health-service.ts';
import { StatisticsService } from './statistics-service.ts';
import { TransactionService } from './transaction-service.ts';
import { systemClock, type Clock } from './types.ts';

export interface QueryServices {
  customers: CustomerService;
  fraud: FraudService;
  health: HealthService;
  statistics: StatisticsService;
  transactions: TransactionService;
}

export interface QueryServicesOptions {
  clock?: Clock | undefined;
}

/**
 * Build every query service over one shared store.
 */
export function createQueryServices(store: TransactionStore, options: QueryServicesOptions = {}): QueryServices {
  const clock = options.clock ?? systemClock;
  return {
    customers: new CustomerService(store),
    fraud: new FraudService(store),
    health: new HealthService(store, clock),
    statistics: new StatisticsService(store, clock),
    transactions: new TransactionService(store),
  };
}
