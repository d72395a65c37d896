import { ScheduledEvent } from 'aws-lambda';
import {
  ActivityLog,
  CrmGraphQLClient,
  HeartbeatResult,
  HeartbeatService,
  loadCrmConfig,
  logger,
} from 'crm-backend-shared';

const config = loadCrmConfig();

const heartbeatService = new HeartbeatService({
  client: new CrmGraphQLClient({
    endpoint: config.graphqlEndpoint,
    timeoutMs: config.graphqlTimeoutMs,
  }),
  sink: new ActivityLog(config.logPaths.heartbeat),
});

/**
 * CRM Heartbeat Lambda
 * Scheduled every 5 minutes.
 */
export const handler = async (event: ScheduledEvent): Promise<HeartbeatResult> => {
  logger.setContext({ requestId: event.id, task: 'log-heartbeat' });

  const result = await heartbeatService.run();

  logger.debug('Heartbeat written', { ...result });
  logger.clearContext();
  return result;
};
