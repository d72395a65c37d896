import { loadCrmConfig } from '../../src/config';

describe('loadCrmConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadCrmConfig({})).toEqual({
      graphqlEndpoint: 'http://localhost:3000/graphql',
      graphqlTimeoutMs: 30000,
      logPaths: {
        report: '/tmp/crm_report_log.txt',
        customerCleanup: '/tmp/customer_cleanup_log.txt',
        lowStock: '/tmp/low_stock_updates_log.txt',
        heartbeat: '/tmp/crm_heartbeat_log.txt',
        orderReminders: '/tmp/order_reminders_log.txt',
      },
      lowStockThreshold: 10,
      restockAmount: 10,
      inactiveCustomerDays: 365,
      orderReminderDays: 7,
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadCrmConfig({
      GRAPHQL_ENDPOINT: 'https://crm.internal.test/graphql',
      LOW_STOCK_THRESHOLD: '5',
      CRM_REPORT_LOG_PATH: '/var/log/crm/report.txt',
    });

    expect(config.graphqlEndpoint).toBe('https://crm.internal.test/graphql');
    expect(config.lowStockThreshold).toBe(5);
    expect(config.logPaths.report).toBe('/var/log/crm/report.txt');
  });

  it('should reject a non-numeric setting', () => {
    expect(() => loadCrmConfig({ RESTOCK_AMOUNT: 'lots' })).toThrow(
      'Environment variable RESTOCK_AMOUNT must be a non-negative integer, got "lots"'
    );
  });

  it.each(['12abc', '7.5', '-3', '  '])('should reject %p', (raw) => {
    expect(() => loadCrmConfig({ INACTIVE_CUSTOMER_DAYS: raw })).toThrow(
      `Environment variable INACTIVE_CUSTOMER_DAYS must be a non-negative integer, got "${raw}"`
    );
  });

  it('should accept surrounding whitespace', () => {
    expect(loadCrmConfig({ ORDER_REMINDER_DAYS: ' 14 ' }).orderReminderDays).toBe(14);
  });
});
