import {
  Customer,
  CustomerStore,
  CrmStores,
  NewCustomer,
  NewProduct,
  Order,
  OrderStore,
  OrderTotals,
  Product,
  ProductStore,
} from '../../src/types';
import { DynamoDBError } from '../../src/utils/dynamodb-client';
import { TEST_TIMESTAMP } from './test-data';

type Clock = () => string;

const fixedClock: Clock = () => TEST_TIMESTAMP;

/**
 * Store implementations backed by Maps, with the same conflict behaviour
 * as the DynamoDB repositories.
 */
export class InMemoryCustomerStore implements CustomerStore {
  readonly items = new Map<string, Customer>();

  constructor(private readonly clock: Clock = fixedClock) {}

  async create(customer: NewCustomer): Promise<Customer> {
    const emailTaken = [...this.items.values()].some((existing) => existing.email === customer.email);
    if (this.items.has(customer.customerId) || emailTaken) {
      throw new DynamoDBError('Conditional check failed', 'CONDITIONAL_CHECK_FAILED', 400);
    }

    const created: Customer = { ...customer, createdAt: this.clock(), updatedAt: this.clock() };
    this.items.set(created.customerId, created);
    return created;
  }

  async getById(customerId: string): Promise<Customer | null> {
    return this.items.get(customerId) ?? null;
  }

  async getByEmail(email: string): Promise<Customer | null> {
    return [...this.items.values()].find((customer) => customer.email === email) ?? null;
  }

  async listAll(): Promise<Customer[]> {
    return [...this.items.values()];
  }

  async count(): Promise<number> {
    return this.items.size;
  }

  async delete(customer: Customer): Promise<void> {
    this.items.delete(customer.customerId);
  }
}

export class InMemoryProductStore implements ProductStore {
  readonly items = new Map<string, Product>();

  constructor(private readonly clock: Clock = fixedClock) {}

  async create(product: NewProduct): Promise<Product> {
    if (this.items.has(product.productId)) {
      throw new DynamoDBError('Conditional check failed', 'CONDITIONAL_CHECK_FAILED', 400);
    }

    const created: Product = { ...product, createdAt: this.clock(), updatedAt: this.clock() };
    this.items.set(created.productId, created);
    return created;
  }

  async getById(productId: string): Promise<Product | null> {
    return this.items.get(productId) ?? null;
  }

  async getByIds(productIds: string[]): Promise<Product[]> {
    return [...new Set(productIds)]
      .map((id) => this.items.get(id))
      .filter((product): product is Product => product !== undefined);
  }

  async listAll(): Promise<Product[]> {
    return [...this.items.values()];
  }

  async listLowStock(threshold: number): Promise<Product[]> {
    return [...this.items.values()].filter((product) => product.stock < threshold);
  }

  async adjustStock(productId: string, delta: number): Promise<Product> {
    const product = this.items.get(productId);
    if (!product || product.stock + delta < 0) {
      throw new DynamoDBError('Conditional check failed', 'CONDITIONAL_CHECK_FAILED', 400);
    }

    const updated: Product = { ...product, stock: product.stock + delta, updatedAt: this.clock() };
    this.items.set(productId, updated);
    return updated;
  }
}

export class InMemoryOrderStore implements OrderStore {
  readonly items = new Map<string, Order>();

  async create(order: Order): Promise<Order> {
    if (this.items.has(order.orderId)) {
      throw new DynamoDBError('Conditional check failed', 'CONDITIONAL_CHECK_FAILED', 400);
    }
    this.items.set(order.orderId, order);
    return order;
  }

  async getById(orderId: string): Promise<Order | null> {
    return this.items.get(orderId) ?? null;
  }

  async listAll(): Promise<Order[]> {
    return [...this.items.values()];
  }

  async listSince(since: string): Promise<Order[]> {
    return [...this.items.values()].filter((order) => order.orderDate >= since);
  }

  async listByCustomer(customerId: string): Promise<Order[]> {
    return [...this.items.values()]
      .filter((order) => order.customerId === customerId)
      .sort((a, b) => a.orderDate.localeCompare(b.orderDate));
  }

  async hasOrderSince(customerId: string, since: string): Promise<boolean> {
    return [...this.items.values()].some(
      (order) => order.customerId === customerId && order.orderDate >= since
    );
  }

  async totals(): Promise<OrderTotals> {
    const orders = [...this.items.values()];
    return {
      count: orders.length,
      totalAmount: orders.reduce((sum, order) => sum + order.totalAmount, 0),
    };
  }

  async delete(orderId: string): Promise<void> {
    this.items.delete(orderId);
  }
}

export interface InMemoryCrmStores extends CrmStores {
  customers: InMemoryCustomerStore;
  products: InMemoryProductStore;
  orders: InMemoryOrderStore;
}

export function createInMemoryStores(clock: Clock = fixedClock): InMemoryCrmStores {
  return {
    customers: new InMemoryCustomerStore(clock),
    products: new InMemoryProductStore(clock),
    orders: new InMemoryOrderStore(),
  };
}

/**
 * Sequential IDs: prefix-1, prefix-2, ...
 */
export function sequentialIds(prefix = 'id'): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}
