/**
 * CRM runtime configuration, read from environment variables
 */
export interface CrmLogPaths {
  report: string;
  customerCleanup: string;
  lowStock: string;
  heartbeat: string;
  orderReminders: string;
}

export interface CrmConfig {
  graphqlEndpoint: string;
  graphqlTimeoutMs: number;
  logPaths: CrmLogPaths;
  lowStockThreshold: number;
  restockAmount: number;
  inactiveCustomerDays: number;
  orderReminderDays: number;
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isInteger(value) || value < 0) {
    throw new Error(`Environment variable ${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

export function loadCrmConfig(env: Env = process.env): CrmConfig {
  return {
    graphqlEndpoint: env.GRAPHQL_ENDPOINT || 'http://localhost:3000/graphql',
    graphqlTimeoutMs: readInt(env, 'GRAPHQL_TIMEOUT_MS', 30000),
    logPaths: {
      report: env.CRM_REPORT_LOG_PATH || '/tmp/crm_report_log.txt',
      customerCleanup: env.CUSTOMER_CLEANUP_LOG_PATH || '/tmp/customer_cleanup_log.txt',
      lowStock: env.LOW_STOCK_LOG_PATH || '/tmp/low_stock_updates_log.txt',
      heartbeat: env.HEARTBEAT_LOG_PATH || '/tmp/crm_heartbeat_log.txt',
      orderReminders: env.ORDER_REMINDERS_LOG_PATH || '/tmp/order_reminders_log.txt',
    },
    lowStockThreshold: readInt(env, 'LOW_STOCK_THRESHOLD', 10),
    restockAmount: readInt(env, 'RESTOCK_AMOUNT', 10),
    inactiveCustomerDays: readInt(env, 'INACTIVE_CUSTOMER_DAYS', 365),
    orderReminderDays: readInt(env, 'ORDER_REMINDER_DAYS', 7),
  };
}
