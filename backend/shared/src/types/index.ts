/**
 * Customer
 * CRM contact record
 */
export interface Customer {
  customerId: string;                 // Unique customer ID
  name: string;                       // Display name
  email: string;                      // Unique, lowercased email
  phone?: string;                     // Optional phone number
  createdAt: string;                  // ISO timestamp
  updatedAt: string;                  // ISO timestamp
}

/**
 * Product
 * Catalog entity
 */
export interface Product {
  productId: string;                  // Unique product ID
  name: string;                       // Product name
  price: number;                      // Price in cents
  stock: number;                      // Units on hand
  createdAt: string;                  // ISO timestamp
  updatedAt: string;                  // ISO timestamp
}

/**
 * Order Item
 * One referenced product, priced at order time
 */
export interface OrderItem {
  productId: string;
  productName: string;
  quantity: number;
  pricePerUnit: number;
  totalPrice: number;
}

/**
 * Order
 * totalAmount is fixed when the order is created and is not recomputed
 * when product prices change later.
 */
export interface Order {
  orderId: string;                    // Unique order ID
  customerId: string;                 // Customer reference
  items: OrderItem[];                 // Products in the order
  totalAmount: number;                // Total in cents
  orderDate: string;                  // ISO timestamp
}

export type NewCustomer = Omit<Customer, 'createdAt' | 'updatedAt'>;
export type NewProduct = Omit<Product, 'createdAt' | 'updatedAt'>;

/**
 * DynamoDB Item Mapper
 */
export interface DynamoDBCustomerItem extends Customer {
  PK: string;                         // customerId
}

export interface DynamoDBCustomerEmailItem {
  PK: string;                         // normalized email
  customerId: string;
}

export interface DynamoDBProductItem extends Product {
  PK: string;                         // productId
}

export interface DynamoDBOrderItem extends Order {
  PK: string;                         // orderId
}

/**
 * Aggregates
 */
export interface CrmStats {
  totalCustomers: number;
  totalOrders: number;
  totalRevenue: number;               // cents
}

export interface OrderTotals {
  count: number;
  totalAmount: number;                // cents
}

export interface RestockedProduct {
  product: Product;
  previousStock: number;
}

export interface RestockResult {
  updated: RestockedProduct[];
  message: string;
}

/**
 * Store contracts
 * Implemented by the DynamoDB repositories and by in-memory stores in tests
 */
export interface CustomerStore {
  create(customer: NewCustomer): Promise<Customer>;
  getById(customerId: string): Promise<Customer | null>;
  getByEmail(email: string): Promise<Customer | null>;
  listAll(): Promise<Customer[]>;
  count(): Promise<number>;
  delete(customer: Customer): Promise<void>;
}

export interface ProductStore {
  create(product: NewProduct): Promise<Product>;
  getById(productId: string): Promise<Product | null>;
  getByIds(productIds: string[]): Promise<Product[]>;
  listAll(): Promise<Product[]>;
  listLowStock(threshold: number): Promise<Product[]>;
  adjustStock(productId: string, delta: number): Promise<Product>;
}

export interface OrderStore {
  create(order: Order): Promise<Order>;
  getById(orderId: string): Promise<Order | null>;
  listAll(): Promise<Order[]>;
  listSince(since: string): Promise<Order[]>;
  listByCustomer(customerId: string): Promise<Order[]>;
  hasOrderSince(customerId: string, since: string): Promise<boolean>;
  totals(): Promise<OrderTotals>;
  delete(orderId: string): Promise<void>;
}

export interface CrmStores {
  customers: CustomerStore;
  products: ProductStore;
  orders: OrderStore;
}

/**
 * Mutation inputs
 */
export interface CreateCustomerInput {
  name: string;
  email: string;
  phone?: string | null;
}

export interface CreateProductInput {
  name: string;
  price: number;                      // cents
  stock?: number | null;
}

export interface CreateOrderInput {
  customerId: string;
  productIds: string[];
  quantity?: number | null;
}

/**
 * Mutation result
 * Validation failures are returned, not thrown
 */
export type MutationResult<T> =
  | { ok: true; value: T }
  | { ok: false; errors: string[] };

/**
 * Query filters
 * Money bounds are in cents, dates are ISO timestamps
 */
export interface CustomerFilter {
  nameIcontains?: string | null;
  emailIcontains?: string | null;
  phoneStartsWith?: string | null;
  createdAtGte?: string | null;
  createdAtLte?: string | null;
}

export interface ProductFilter {
  nameIcontains?: string | null;
  priceGte?: number | null;
  priceLte?: number | null;
  stockGte?: number | null;
  stockLte?: number | null;
  lowStock?: boolean | null;
}

export interface OrderFilter {
  customerName?: string | null;
  productName?: string | null;
  productId?: string | null;
  totalAmountGte?: number | null;
  totalAmountLte?: number | null;
  orderDateGte?: string | null;
  orderDateLte?: string | null;
}

/**
 * Activity log sink
 * Receives human-readable lines for the scheduled task log files
 */
export interface LineSink {
  append(lines: string[]): Promise<void>;
}
