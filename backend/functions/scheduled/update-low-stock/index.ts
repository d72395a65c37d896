import { ScheduledEvent } from 'aws-lambda';
import {
  ActivityLog,
  CrmGraphQLClient,
  CrmService,
  CustomerRepository,
  LowStockResult,
  LowStockService,
  OrderRepository,
  ProductRepository,
  loadCrmConfig,
  logger,
} from 'crm-backend-shared';

const config = loadCrmConfig();

const lowStockService = new LowStockService({
  client: new CrmGraphQLClient({
    endpoint: config.graphqlEndpoint,
    timeoutMs: config.graphqlTimeoutMs,
  }),
  restocker: new CrmService({
    customers: new CustomerRepository(),
    products: new ProductRepository(),
    orders: new OrderRepository(),
  }),
  sink: new ActivityLog(config.logPaths.lowStock),
  threshold: config.lowStockThreshold,
  restockAmount: config.restockAmount,
});

/**
 * Update Low Stock Lambda
 * Scheduled every 12 hours.
 * Restocks products below LOW_STOCK_THRESHOLD by RESTOCK_AMOUNT units.
 */
export const handler = async (event: ScheduledEvent): Promise<LowStockResult> => {
  logger.setContext({ requestId: event.id, task: 'update-low-stock' });

  const result = await lowStockService.run();

  logger.info('Low-stock update finished', { success: result.success, method: result.method });
  logger.clearContext();
  return result;
};
