import { Customer, LineSink, Order, OrderFilter } from '../types';
import { errorMessage } from '../utils/errors';
import { formatDateTime, formatDollars, subtractDays, toCents } from '../utils/format';
import { logger } from '../utils/logger';
import {
  CrmQueryClient,
  readArray,
  readNumber,
  readRecord,
  readString,
} from './graphql-client';

export const DEFAULT_REMINDER_DAYS = 7;

export const RECENT_ORDERS_QUERY = `
  query RecentOrders($since: String!) {
    orders(filter: { orderDateGte: $since }, orderBy: ["orderDate"]) {
      id
      totalAmount
      orderDate
      customer {
        name
        email
      }
    }
  }
`;

export interface OrderReminder {
  orderId: string;
  customerName: string;
  customerEmail: string;
  totalAmount: number;                // cents
  orderDate: string;
}

export interface OrderReminderSource {
  listOrders(filter?: OrderFilter | null, orderBy?: string[] | null): Promise<Order[]>;
  getCustomer(customerId: string): Promise<Customer | null>;
}

export type OrderReminderResult =
  | { success: true; timestamp: string; method: 'graphql' | 'database_fallback'; reminders: OrderReminder[] }
  | { success: false; timestamp: string; method: 'failed'; error: string };

export interface OrderReminderServiceDeps {
  client: CrmQueryClient;
  source: OrderReminderSource;
  sink: LineSink;
  reminderDays?: number;
  now?: () => Date;
}

const UNKNOWN_CUSTOMER = { name: 'Unknown customer', email: 'no email' };

const reminderLogger = logger.child({ task: 'send-order-reminders' });

function readReminder(value: unknown, index: number): OrderReminder {
  const path = `data.orders[${index}]`;
  const order = readRecord(value, path);
  const customer = order.customer === null || order.customer === undefined
    ? null
    : readRecord(order.customer, `${path}.customer`);

  return {
    orderId: readString(order, 'id', path),
    customerName: customer ? readString(customer, 'name', `${path}.customer`) : UNKNOWN_CUSTOMER.name,
    customerEmail: customer ? readString(customer, 'email', `${path}.customer`) : UNKNOWN_CUSTOMER.email,
    totalAmount: toCents(readNumber(order, 'totalAmount', path)),
    orderDate: readString(order, 'orderDate', path),
  };
}

/**
 * Writes one reminder line per order placed within the last reminderDays.
 */
export class OrderReminderService {
  private readonly reminderDays: number;
  private readonly now: () => Date;

  constructor(private readonly deps: OrderReminderServiceDeps) {
    this.reminderDays = deps.reminderDays ?? DEFAULT_REMINDER_DAYS;
    this.now = deps.now ?? (() => new Date());
  }

  async run(): Promise<OrderReminderResult> {
    const now = this.now();
    const timestamp = formatDateTime(now);
    const since = subtractDays(now, this.reminderDays).toISOString();
    const lines = [`[${timestamp}] Order reminders processing started`];

    try {
      let method: 'graphql' | 'database_fallback' = 'graphql';
      let reminders: OrderReminder[];

      try {
        reminders = await this.fromGraphQL(since);
      } catch (error) {
        const reason = errorMessage(error);
        lines.push(`[${timestamp}] GraphQL query failed: ${reason}`);
        lines.push(`[${timestamp}] [FALLBACK] Using direct database access`);
        reminderLogger.warn('GraphQL order query failed, using database', { reason });

        method = 'database_fallback';
        reminders = await this.fromDatabase(since);
      }

      const prefix = method === 'database_fallback' ? `[${timestamp}] [FALLBACK]` : `[${timestamp}]`;
      lines.push(
        reminders.length > 0
          ? `${prefix} Found ${reminders.length} recent orders`
          : `${prefix} No recent orders found for reminders`
      );

      for (const reminder of reminders) {
        lines.push(
          `${prefix} Order Reminder - Order ID: ${reminder.orderId}, ` +
          `Customer: ${reminder.customerName} (${reminder.customerEmail}), ` +
          `Amount: ${formatDollars(reminder.totalAmount)}, Date: ${reminder.orderDate}`
        );
      }

      lines.push(`${prefix} Order reminders processing completed`);
      reminderLogger.info('Order reminders processed', { method, count: reminders.length });

      return { success: true, timestamp, method, reminders };
    } catch (error) {
      const message = errorMessage(error);
      lines.push(`[${timestamp}] [FALLBACK] Database approach also failed: ${message}`);
      reminderLogger.error('Order reminders failed', error);

      return { success: false, timestamp, method: 'failed', error: message };
    } finally {
      await this.deps.sink.append([...lines, '']);
    }
  }

  private async fromGraphQL(since: string): Promise<OrderReminder[]> {
    const data = readRecord(await this.deps.client.execute(RECENT_ORDERS_QUERY, { since }), 'data');
    return readArray(data, 'orders', 'data').map(readReminder);
  }

  private async fromDatabase(since: string): Promise<OrderReminder[]> {
    const orders = await this.deps.source.listOrders({ orderDateGte: since }, ['orderDate']);
    const customers = new Map<string, Customer | null>();
    const reminders: OrderReminder[] = [];

    for (const order of orders) {
      if (!customers.has(order.customerId)) {
        customers.set(order.customerId, await this.deps.source.getCustomer(order.customerId));
      }
      const customer = customers.get(order.customerId);

      reminders.push({
        orderId: order.orderId,
        customerName: customer?.name ?? UNKNOWN_CUSTOMER.name,
        customerEmail: customer?.email ?? UNKNOWN_CUSTOMER.email,
        totalAmount: order.totalAmount,
        orderDate: order.orderDate,
      });
    }

    return reminders;
  }
}
