import {
  CreateCustomerInput,
  CreateOrderInput,
  CreateProductInput,
  CrmStats,
  CrmStores,
  Customer,
  CustomerFilter,
  MutationResult,
  Order,
  OrderFilter,
  OrderItem,
  Product,
  ProductFilter,
  RestockResult,
} from '../types';
import { generateId, isDynamoDBError } from '../utils/dynamodb-client';
import { logger } from '../utils/logger';
import {
  ValidationError,
  collectValidationErrors,
  normalizeEmail,
  sanitizeString,
  validateEmail,
  validateInteger,
  validateNonEmptyArray,
  validateNonNegativeNumber,
  validatePhone,
  validatePositiveNumber,
  validateRequired,
  validateStringLength,
} from '../utils/validators';
import {
  CUSTOMER_ORDER_FIELDS,
  LOW_STOCK_THRESHOLD,
  ORDER_ORDER_FIELDS,
  PRODUCT_ORDER_FIELDS,
  filterCustomers,
  filterOrders,
  filterProducts,
  sortBy,
} from './filters';

export const HELLO_MESSAGE = 'Hello, GraphQL!';
export const DUPLICATE_EMAIL_MESSAGE = 'Email already exists';
export const DEFAULT_RESTOCK_AMOUNT = 10;

const CUSTOMER_NAME_MAX = 100;
const PRODUCT_NAME_MAX = 200;

export interface CrmServiceOptions {
  now?: () => Date;
  generateId?: () => string;
}

function failure<T>(errors: string[]): MutationResult<T> {
  return { ok: false, errors };
}

/**
 * CRM operations behind the GraphQL layer.
 * Every mutation validates first and reports problems as an error list;
 * nothing is written when validation fails.
 */
export class CrmService {
  private readonly now: () => Date;
  private readonly nextId: () => string;

  constructor(
    private readonly stores: CrmStores,
    options: CrmServiceOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.nextId = options.generateId ?? generateId;
  }

  hello(): string {
    return HELLO_MESSAGE;
  }

  async listCustomers(filter?: CustomerFilter | null, orderBy?: string[] | null): Promise<Customer[]> {
    const customers = await this.stores.customers.listAll();
    return sortBy(
      filterCustomers(customers, filter ?? {}),
      orderBy ?? ['createdAt'],
      CUSTOMER_ORDER_FIELDS
    );
  }

  getCustomer(customerId: string): Promise<Customer | null> {
    return this.stores.customers.getById(customerId);
  }

  async listProducts(filter?: ProductFilter | null, orderBy?: string[] | null): Promise<Product[]> {
    const products = await this.stores.products.listAll();
    return sortBy(
      filterProducts(products, filter ?? {}),
      orderBy ?? ['createdAt'],
      PRODUCT_ORDER_FIELDS
    );
  }

  getProduct(productId: string): Promise<Product | null> {
    return this.stores.products.getById(productId);
  }

  getProducts(productIds: string[]): Promise<Product[]> {
    return this.stores.products.getByIds(productIds);
  }

  async listOrders(filter?: OrderFilter | null, orderBy?: string[] | null): Promise<Order[]> {
    const orderFilter = filter ?? {};
    const orders = orderFilter.orderDateGte
      ? await this.stores.orders.listSince(orderFilter.orderDateGte)
      : await this.stores.orders.listAll();

    const customerNames = new Map<string, string>();
    if (orderFilter.customerName) {
      for (const customer of await this.stores.customers.listAll()) {
        customerNames.set(customer.customerId, customer.name);
      }
    }

    return sortBy(
      filterOrders(orders, orderFilter, customerNames),
      orderBy ?? ['orderDate'],
      ORDER_ORDER_FIELDS
    );
  }

  getOrder(orderId: string): Promise<Order | null> {
    return this.stores.orders.getById(orderId);
  }

  async getStats(): Promise<CrmStats> {
    const [totalCustomers, totals] = await Promise.all([
      this.stores.customers.count(),
      this.stores.orders.totals(),
    ]);

    return {
      totalCustomers,
      totalOrders: totals.count,
      totalRevenue: totals.totalAmount,
    };
  }

  async createCustomer(input: CreateCustomerInput): Promise<MutationResult<Customer>> {
    const name = sanitizeString(input.name);
    const email = normalizeEmail(input.email);
    const phone = input.phone ? sanitizeString(input.phone) : '';

    const errors = collectValidationErrors([
      () => {
        validateRequired({ name }, ['name']);
        validateStringLength(name, 'name', 1, CUSTOMER_NAME_MAX);
      },
      () => {
        validateRequired({ email }, ['email']);
        if (!validateEmail(email)) {
          throw new ValidationError('email must be a valid email address', 'email', email);
        }
      },
      () => {
        if (phone && !validatePhone(phone)) {
          throw new ValidationError(
            'phone must be in the format +1234567890 or 123-456-7890',
            'phone',
            phone
          );
        }
      },
    ]);

    if (errors.length > 0) {
      return failure(errors);
    }

    if (await this.stores.customers.getByEmail(email)) {
      return failure([DUPLICATE_EMAIL_MESSAGE]);
    }

    try {
      const customer = await this.stores.customers.create({
        customerId: this.nextId(),
        name,
        email,
        ...(phone ? { phone } : {}),
      });

      logger.info('Customer created', { customerId: customer.customerId });
      return { ok: true, value: customer };
    } catch (error) {
      // Lost a race with a concurrent insert of the same email
      if (isDynamoDBError(error) && error.code === 'CONDITIONAL_CHECK_FAILED') {
        return failure([DUPLICATE_EMAIL_MESSAGE]);
      }
      throw error;
    }
  }

  async createProduct(input: CreateProductInput): Promise<MutationResult<Product>> {
    const name = sanitizeString(input.name);
    const stock = input.stock ?? 0;

    const errors = collectValidationErrors([
      () => {
        validateRequired({ name }, ['name']);
        validateStringLength(name, 'name', 1, PRODUCT_NAME_MAX);
      },
      () => validatePositiveNumber(input.price, 'price'),
      () => {
        validateNonNegativeNumber(stock, 'stock');
        validateInteger(stock, 'stock');
      },
    ]);

    if (errors.length > 0) {
      return failure(errors);
    }

    const product = await this.stores.products.create({
      productId: this.nextId(),
      name,
      price: Math.round(input.price),
      stock,
    });

    logger.info('Product created', { productId: product.productId, price: product.price });
    return { ok: true, value: product };
  }

  /**
   * The same quantity applies to every referenced product; repeated
   * product IDs collapse to a single line.
   */
  async createOrder(input: CreateOrderInput): Promise<MutationResult<Order>> {
    const customerId = input.customerId?.trim() ?? '';
    const productIds = [...new Set((input.productIds ?? []).map((id) => id.trim()))];
    const quantity = input.quantity ?? 1;

    const errors = collectValidationErrors([
      () => validateRequired({ customerId }, ['customerId']),
      () => validateNonEmptyArray(productIds, 'productIds'),
      () => {
        if (productIds.includes('')) {
          throw new ValidationError('Product ID must not be empty', 'productIds', input.productIds);
        }
      },
      () => {
        validatePositiveNumber(quantity, 'quantity');
        validateInteger(quantity, 'quantity');
      },
    ]);

    if (errors.length > 0) {
      return failure(errors);
    }

    const [customer, products] = await Promise.all([
      this.stores.customers.getById(customerId),
      this.stores.products.getByIds(productIds),
    ]);

    const referenceErrors: string[] = [];
    if (!customer) {
      referenceErrors.push(`Invalid customer ID: ${customerId}`);
    }

    const productsById = new Map(products.map((product) => [product.productId, product]));
    const items: OrderItem[] = [];

    for (const productId of productIds) {
      const product = productsById.get(productId);
      if (!product) {
        referenceErrors.push(`Invalid product ID: ${productId}`);
        continue;
      }

      items.push({
        productId,
        productName: product.name,
        quantity,
        pricePerUnit: product.price,
        totalPrice: product.price * quantity,
      });
    }

    if (referenceErrors.length > 0) {
      return failure(referenceErrors);
    }

    const order = await this.stores.orders.create({
      orderId: this.nextId(),
      customerId,
      items,
      totalAmount: items.reduce((sum, item) => sum + item.totalPrice, 0),
      orderDate: this.now().toISOString(),
    });

    logger.info('Order created', {
      orderId: order.orderId,
      customerId,
      totalAmount: order.totalAmount,
    });
    return { ok: true, value: order };
  }

  /**
   * Add restockAmount to every product whose stock is below threshold
   */
  async restockLowStockProducts(
    threshold: number = LOW_STOCK_THRESHOLD,
    restockAmount: number = DEFAULT_RESTOCK_AMOUNT
  ): Promise<MutationResult<RestockResult>> {
    const errors = collectValidationErrors([
      () => {
        validateNonNegativeNumber(threshold, 'threshold');
        validateInteger(threshold, 'threshold');
      },
      () => {
        validatePositiveNumber(restockAmount, 'restockAmount');
        validateInteger(restockAmount, 'restockAmount');
      },
    ]);

    if (errors.length > 0) {
      return failure(errors);
    }

    const lowStock = await this.stores.products.listLowStock(threshold);
    if (lowStock.length === 0) {
      return { ok: true, value: { updated: [], message: 'No low-stock products found.' } };
    }

    const updated: RestockResult['updated'] = [];
    for (const product of sortBy(lowStock, ['name'], PRODUCT_ORDER_FIELDS)) {
      const restocked = await this.stores.products.adjustStock(product.productId, restockAmount);
      updated.push({ product: restocked, previousStock: product.stock });
    }

    logger.info('Low-stock products restocked', { count: updated.length, threshold, restockAmount });
    return {
      ok: true,
      value: {
        updated,
        message: `Successfully updated ${updated.length} low-stock products.`,
      },
    };
  }
}
