import { ScheduledEvent } from 'aws-lambda';
import { toEventBridgeSchedule } from 'crm-backend-shared';

export interface ScheduledTask {
  id: string;
  cron: string;                       // five-field cron, UTC
  description: string;
  run(event: ScheduledEvent): Promise<unknown>;
}

/**
 * Every periodic CRM task. Handlers are loaded on first run so that listing
 * the schedule does not build repositories or HTTP clients.
 */
export const SCHEDULED_TASKS: ScheduledTask[] = [
  {
    id: 'generate-crm-report',
    cron: '0 6 * * 1',
    description: 'Weekly customer, order and revenue report',
    run: async (event) => (await import('./generate-crm-report')).handler(event),
  },
  {
    id: 'clean-inactive-customers',
    cron: '0 2 * * 0',
    description: 'Delete customers without an order in the last year',
    run: async (event) => (await import('./clean-inactive-customers')).handler(event),
  },
  {
    id: 'update-low-stock',
    cron: '0 */12 * * *',
    description: 'Restock products below the low-stock threshold',
    run: async (event) => (await import('./update-low-stock')).handler(event),
  },
  {
    id: 'log-heartbeat',
    cron: '*/5 * * * *',
    description: 'Record that the CRM and its GraphQL endpoint are alive',
    run: async (event) => (await import('./log-heartbeat')).handler(event),
  },
  {
    id: 'send-order-reminders',
    cron: '0 8 * * *',
    description: 'Log reminders for orders placed in the last week',
    run: async (event) => (await import('./send-order-reminders')).handler(event),
  },
];

export function findScheduledTask(id: string): ScheduledTask | undefined {
  return SCHEDULED_TASKS.find((task) => task.id === id);
}

/**
 * EventBridge rule expressions keyed by task id, for the deployment templates
 */
export function eventBridgeSchedules(): Record<string, string> {
  return Object.fromEntries(
    SCHEDULED_TASKS.map((task) => [task.id, toEventBridgeSchedule(task.cron)])
  );
}

export function buildScheduledEvent(task: ScheduledTask, now: Date = new Date()): ScheduledEvent {
  return {
    version: '0',
    id: `manual-${task.id}-${now.getTime()}`,
    'detail-type': 'Scheduled Event',
    source: 'aws.events',
    account: '000000000000',
    time: now.toISOString(),
    region: process.env.AWS_REGION || 'us-east-1',
    resources: [],
    detail: {},
  };
}
