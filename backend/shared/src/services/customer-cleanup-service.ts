import { Customer, CustomerStore, LineSink, OrderStore } from '../types';
import { errorMessage } from '../utils/errors';
import { formatDateTime, subtractDays } from '../utils/format';
import { logger } from '../utils/logger';

export const DEFAULT_INACTIVE_DAYS = 365;

export interface CleanupError {
  customerId: string;
  error: string;
}

export type CleanupResult =
  | {
      success: true;
      timestamp: string;
      cutoff: string;
      deletedCount: number;
      deletedCustomerIds: string[];
      errors: CleanupError[];
    }
  | {
      success: false;
      timestamp: string;
      cutoff: string;
      error: string;
    };

export interface CustomerCleanupServiceDeps {
  customers: CustomerStore;
  orders: OrderStore;
  sink: LineSink;
  inactiveDays?: number;
  now?: () => Date;
}

const cleanupLogger = logger.child({ task: 'clean-inactive-customers' });

/**
 * Deletes every customer without an order dated on or after the cutoff
 * (now minus inactiveDays). Their older orders go with them. There is no
 * soft delete.
 *
 * A customer that fails to delete is recorded in `errors` and the batch
 * carries on. The customer row is removed before its orders.
 */
export class CustomerCleanupService {
  private readonly customers: CustomerStore;
  private readonly orders: OrderStore;
  private readonly sink: LineSink;
  private readonly inactiveDays: number;
  private readonly now: () => Date;

  constructor(deps: CustomerCleanupServiceDeps) {
    this.customers = deps.customers;
    this.orders = deps.orders;
    this.sink = deps.sink;
    this.inactiveDays = deps.inactiveDays ?? DEFAULT_INACTIVE_DAYS;
    this.now = deps.now ?? (() => new Date());
  }

  async findInactiveCustomers(cutoff: string): Promise<Customer[]> {
    const inactive: Customer[] = [];

    for (const customer of await this.customers.listAll()) {
      if (!(await this.orders.hasOrderSince(customer.customerId, cutoff))) {
        inactive.push(customer);
      }
    }

    return inactive;
  }

  async run(): Promise<CleanupResult> {
    const now = this.now();
    const timestamp = formatDateTime(now);
    const cutoff = subtractDays(now, this.inactiveDays).toISOString();

    cleanupLogger.info('Starting inactive customer cleanup', {
      cutoff,
      inactiveDays: this.inactiveDays,
    });

    try {
      const inactive = await this.findInactiveCustomers(cutoff);
      const deletedCustomerIds: string[] = [];
      const errors: CleanupError[] = [];

      for (const customer of inactive) {
        const { customerId } = customer;
        try {
          await this.customers.delete(customer);
          deletedCustomerIds.push(customerId);
          await this.deleteOrders(customerId);
        } catch (error) {
          errors.push({ customerId, error: errorMessage(error) });
          cleanupLogger.error('Failed to remove inactive customer', error, { customerId });
        }
      }

      await this.sink.append([
        `[${timestamp}] Deleted ${deletedCustomerIds.length} inactive customers`,
        ...errors.map(({ customerId, error }) => `[${timestamp}] Failed to remove customer ${customerId}: ${error}`),
      ]);
      cleanupLogger.info('Inactive customer cleanup completed', {
        deletedCount: deletedCustomerIds.length,
        errorCount: errors.length,
      });

      return {
        success: true,
        timestamp,
        cutoff,
        deletedCount: deletedCustomerIds.length,
        deletedCustomerIds,
        errors,
      };
    } catch (error) {
      const message = errorMessage(error);
      await this.sink.append([`[${timestamp}] Cleanup failed: ${message}`]);
      cleanupLogger.error('Inactive customer cleanup failed', error);

      return { success: false, timestamp, cutoff, error: message };
    }
  }

  private async deleteOrders(customerId: string): Promise<void> {
    for (const order of await this.orders.listByCustomer(customerId)) {
      await this.orders.delete(order.orderId);
    }
  }
}
