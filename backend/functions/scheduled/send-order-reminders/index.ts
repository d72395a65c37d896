import { ScheduledEvent } from 'aws-lambda';
import {
  ActivityLog,
  CrmGraphQLClient,
  CrmService,
  CustomerRepository,
  OrderReminderResult,
  OrderReminderService,
  OrderRepository,
  ProductRepository,
  loadCrmConfig,
  logger,
} from 'crm-backend-shared';

const config = loadCrmConfig();

const reminderService = new OrderReminderService({
  client: new CrmGraphQLClient({
    endpoint: config.graphqlEndpoint,
    timeoutMs: config.graphqlTimeoutMs,
  }),
  source: new CrmService({
    customers: new CustomerRepository(),
    products: new ProductRepository(),
    orders: new OrderRepository(),
  }),
  sink: new ActivityLog(config.logPaths.orderReminders),
  reminderDays: config.orderReminderDays,
});

/**
 * Order Reminders Lambda
 * Scheduled daily at 08:00 UTC (cron `0 8 * * *`).
 * Logs a reminder line for every order placed in the last ORDER_REMINDER_DAYS days.
 */
export const handler = async (event: ScheduledEvent): Promise<OrderReminderResult> => {
  logger.setContext({ requestId: event.id, task: 'send-order-reminders' });

  const result = await reminderService.run();

  logger.info('Order reminders finished', { success: result.success, method: result.method });
  logger.clearContext();
  return result;
};
