import {
  Customer,
  CustomerFilter,
  Order,
  OrderFilter,
  Product,
  ProductFilter,
} from '../types';
import { ValidationError } from '../utils/validators';

export const LOW_STOCK_THRESHOLD = 10;

type Comparable = string | number;
type Accessors<T> = Record<string, (item: T) => Comparable | undefined>;

function icontains(haystack: string | undefined, needle: string): boolean {
  return (haystack ?? '').toLowerCase().includes(needle.toLowerCase());
}

function present<T>(value: T | null | undefined): value is T {
  return value !== null && value !== undefined;
}

export function filterCustomers(customers: Customer[], filter: CustomerFilter = {}): Customer[] {
  const { nameIcontains, emailIcontains, phoneStartsWith, createdAtGte, createdAtLte } = filter;

  return customers.filter((customer) =>
    (!present(nameIcontains) || icontains(customer.name, nameIcontains)) &&
    (!present(emailIcontains) || icontains(customer.email, emailIcontains)) &&
    (!present(phoneStartsWith) || (customer.phone ?? '').startsWith(phoneStartsWith)) &&
    (!present(createdAtGte) || customer.createdAt >= createdAtGte) &&
    (!present(createdAtLte) || customer.createdAt <= createdAtLte)
  );
}

export function filterProducts(products: Product[], filter: ProductFilter = {}): Product[] {
  const { nameIcontains, priceGte, priceLte, stockGte, stockLte, lowStock } = filter;

  return products.filter((product) =>
    (!present(nameIcontains) || icontains(product.name, nameIcontains)) &&
    (!present(priceGte) || product.price >= priceGte) &&
    (!present(priceLte) || product.price <= priceLte) &&
    (!present(stockGte) || product.stock >= stockGte) &&
    (!present(stockLte) || product.stock <= stockLte) &&
    (!present(lowStock) || (product.stock < LOW_STOCK_THRESHOLD) === lowStock)
  );
}

/**
 * customerNames maps customerId to name; only consulted for the customerName filter
 */
export function filterOrders(
  orders: Order[],
  filter: OrderFilter = {},
  customerNames: Map<string, string> = new Map()
): Order[] {
  const {
    customerName,
    productName,
    productId,
    totalAmountGte,
    totalAmountLte,
    orderDateGte,
    orderDateLte,
  } = filter;

  return orders.filter((order) =>
    (!present(customerName) || icontains(customerNames.get(order.customerId), customerName)) &&
    (!present(productName) || order.items.some((item) => icontains(item.productName, productName))) &&
    (!present(productId) || order.items.some((item) => item.productId === productId)) &&
    (!present(totalAmountGte) || order.totalAmount >= totalAmountGte) &&
    (!present(totalAmountLte) || order.totalAmount <= totalAmountLte) &&
    (!present(orderDateGte) || order.orderDate >= orderDateGte) &&
    (!present(orderDateLte) || order.orderDate <= orderDateLte)
  );
}

export const CUSTOMER_ORDER_FIELDS: Accessors<Customer> = {
  id: (c) => c.customerId,
  name: (c) => c.name.toLowerCase(),
  email: (c) => c.email,
  createdAt: (c) => c.createdAt,
};

export const PRODUCT_ORDER_FIELDS: Accessors<Product> = {
  id: (p) => p.productId,
  name: (p) => p.name.toLowerCase(),
  price: (p) => p.price,
  stock: (p) => p.stock,
  createdAt: (p) => p.createdAt,
};

export const ORDER_ORDER_FIELDS: Accessors<Order> = {
  id: (o) => o.orderId,
  totalAmount: (o) => o.totalAmount,
  orderDate: (o) => o.orderDate,
};

function compare(a: Comparable | undefined, b: Comparable | undefined): number {
  if (a === b) return 0;
  if (a === undefined) return -1;
  if (b === undefined) return 1;
  return a < b ? -1 : 1;
}

/**
 * Stable sort by a list of field names; "-name" sorts descending.
 * Unknown fields raise a ValidationError.
 */
export function sortBy<T>(items: T[], orderBy: string[] | null | undefined, accessors: Accessors<T>): T[] {
  if (!orderBy || orderBy.length === 0) {
    return items;
  }

  const keys = orderBy.map((field) => {
    const descending = field.startsWith('-');
    const name = descending ? field.slice(1) : field;
    const accessor = accessors[name];
    if (!accessor) {
      throw new ValidationError(
        `Cannot order by "${name}"; expected one of: ${Object.keys(accessors).join(', ')}`,
        'orderBy',
        field
      );
    }
    return { accessor, direction: descending ? -1 : 1 };
  });

  return [...items].sort((a, b) => {
    for (const { accessor, direction } of keys) {
      const result = compare(accessor(a), accessor(b));
      if (result !== 0) {
        return result * direction;
      }
    }
    return 0;
  });
}
