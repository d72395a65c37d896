/**
 * Main export file for shared backend code
 * Import all repositories, services, utilities, and types from here
 */

// Types
export * from './types';

// Configuration
export { CrmConfig, CrmLogPaths, loadCrmConfig } from './config';

// Utilities
export {
  dynamoClient,
  DynamoDBError,
  DynamoDBErrorCode,
  handleDynamoDBError,
  withRetry,
  getCurrentTimestamp,
  generateId,
  scanAll,
  countAll,
  validateEnvironment,
  getTableName,
  isDynamoDBError,
} from './utils/dynamodb-client';

export {
  logger,
  Logger,
  LogLevel,
} from './utils/logger';

export {
  ValidationError,
  validateEmail,
  validatePhone,
  validateRequired,
  validatePositiveNumber,
  validateNonNegativeNumber,
  validateInteger,
  validateStringLength,
  validateNonEmptyArray,
  collectValidationErrors,
  sanitizeString,
  normalizeEmail,
  isRecord,
} from './utils/validators';

export {
  formatDateTime,
  formatDayFirstDateTime,
  formatDollars,
  fromCents,
  subtractDays,
  toCents,
} from './utils/format';

export { errorMessage } from './utils/errors';
export { toEventBridgeSchedule, validateCronExpression } from './utils/cron';

// Repositories
export { CustomerRepository } from './repositories/customer-repository';
export { ProductRepository } from './repositories/product-repository';
export { OrderRepository } from './repositories/order-repository';

// Services
export {
  CrmService,
  CrmServiceOptions,
  DEFAULT_RESTOCK_AMOUNT,
  DUPLICATE_EMAIL_MESSAGE,
  HELLO_MESSAGE,
} from './services/crm-service';
export { LOW_STOCK_THRESHOLD, filterCustomers, filterOrders, filterProducts, sortBy } from './services/filters';
export { ActivityLog } from './services/activity-log';
export {
  CrmGraphQLClient,
  CrmGraphQLClientOptions,
  CrmQueryClient,
  GraphQLFailureKind,
  GraphQLRequestError,
} from './services/graphql-client';
export {
  CRM_STATS_QUERY,
  CrmReportService,
  HEALTH_CHECK_QUERY,
  ReportResult,
  formatReportLine,
} from './services/report-service';
export { CleanupError, CleanupResult, CustomerCleanupService } from './services/customer-cleanup-service';
export { LowStockResult, LowStockService, UPDATE_LOW_STOCK_MUTATION } from './services/low-stock-service';
export { HeartbeatResult, HeartbeatService } from './services/heartbeat-service';
export {
  OrderReminderResult,
  OrderReminderService,
  RECENT_ORDERS_QUERY,
} from './services/order-reminder-service';

// GraphQL
export { CrmContext, CrmOperation, crmSchema, executeCrmOperation } from './graphql/schema';

/**
 * Usage Example:
 *
 * import {
 *   CrmService,
 *   CustomerRepository,
 *   ProductRepository,
 *   OrderRepository,
 *   executeCrmOperation,
 *   logger,
 * } from 'crm-backend-shared';
 *
 * const crm = new CrmService({
 *   customers: new CustomerRepository(),
 *   products: new ProductRepository(),
 *   orders: new OrderRepository(),
 * });
 *
 * logger.setContext({ requestId: 'req-123' });
 * const result = await executeCrmOperation({ source: '{ hello }' }, { crm });
 */
