export {
  buildPaginatedResponse,
  paginate,
  slicePage,
  validatePaginationParams,
  type PaginatedResponse,
  type PaginationMeta,
  type PaginationParams,
} from './pagination/pagination.ts';
export { findTransactions, sortByDateDescending } from './search/search-engine.ts';
export {
  normalizeSearchFilters,
  SearchFiltersSchema,
  type SearchCriteria,
  type SearchFiltersInput,
} from './search/search-filters.ts';
export { CustomerService, DEFAULT_TOP_CUSTOMERS } from './services/customer-service.ts';
export { FraudService, NO_FRAUD_INDICATORS } from './services/fraud-service.ts';
export { HealthService, type HealthProbeTarget } from './services/health-service.ts';
export { createQueryServices, type QueryServices, type QueryServicesOptions } from './services/query-services.ts';
export { StatisticsService } from './services/statistics-service.ts';
export { TransactionService, type TransactionPage } from './services/transaction-service.ts';
export {
  systemClock,
  type AmountBucket,
  type AmountDistribution,
  type CategoryCodeStats,
  type ChannelFraudStats,
  type ChannelTypeCount,
  type Clock,
  type CustomerDetails,
  type CustomerSummary,
  type DailyStats,
  type FraudPrediction,
  type FraudSummary,
  type HealthState,
  type HealthStatus,
  type OverviewStats,
  type SystemMetadata,
  type TopCustomer,
} from './services/types.ts';
