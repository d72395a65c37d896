import { ScheduledEvent } from 'aws-lambda';
import {
  ActivityLog,
  CleanupResult,
  CustomerCleanupService,
  CustomerRepository,
  OrderRepository,
  loadCrmConfig,
  logger,
} from 'crm-backend-shared';

const config = loadCrmConfig();

const cleanupService = new CustomerCleanupService({
  customers: new CustomerRepository(),
  orders: new OrderRepository(),
  sink: new ActivityLog(config.logPaths.customerCleanup),
  inactiveDays: config.inactiveCustomerDays,
});

/**
 * Clean Inactive Customers Lambda
 * Scheduled every Sunday at 02:00 UTC (cron `0 2 * * 0`).
 * Deletes customers with no order in the last INACTIVE_CUSTOMER_DAYS days.
 */
export const handler = async (event: ScheduledEvent): Promise<CleanupResult> => {
  logger.setContext({ requestId: event.id, task: 'clean-inactive-customers' });

  const result = await cleanupService.run();

  if (result.success) {
    logger.info('Inactive customer cleanup finished', {
      deletedCount: result.deletedCount,
      errorCount: result.errors.length,
    });
  } else {
    logger.warn('Inactive customer cleanup did not complete', { error: result.error });
  }
  logger.clearContext();
  return result;
};
