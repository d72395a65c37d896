import { ScheduledEvent } from 'aws-lambda';
import {
  ActivityLog,
  CrmGraphQLClient,
  CrmReportService,
  CrmService,
  CustomerRepository,
  OrderRepository,
  ProductRepository,
  ReportResult,
  loadCrmConfig,
  logger,
} from 'crm-backend-shared';

const config = loadCrmConfig();

const reportService = new CrmReportService({
  client: new CrmGraphQLClient({
    endpoint: config.graphqlEndpoint,
    timeoutMs: config.graphqlTimeoutMs,
  }),
  stats: new CrmService({
    customers: new CustomerRepository(),
    products: new ProductRepository(),
    orders: new OrderRepository(),
  }),
  sink: new ActivityLog(config.logPaths.report),
});

/**
 * Weekly CRM Report Lambda
 * Scheduled every Monday at 06:00 UTC (cron `0 6 * * 1`).
 * Appends the customer count, order count and revenue to the report log.
 */
export const handler = async (event: ScheduledEvent): Promise<ReportResult> => {
  logger.setContext({ requestId: event.id, task: 'generate-crm-report' });
  logger.info('Starting weekly CRM report', { scheduledTime: event.time });

  const result = await reportService.generate();

  logger.info('Weekly CRM report finished', { success: result.success, method: result.method });
  logger.clearContext();
  return result;
};
