import {
  PRODUCT_ORDER_FIELDS,
  filterOrders,
  filterProducts,
  sortBy,
} from '../../src/services/filters';
import { ValidationError } from '../../src/utils/validators';
import { makeOrder, makeProduct } from '../fixtures/test-data';

describe('filters', () => {
  const products = [
    makeProduct({ productId: 'p1', name: 'Laptop Pro', price: 150000, stock: 4 }),
    makeProduct({ productId: 'p2', name: 'laptop bag', price: 4000, stock: 10 }),
    makeProduct({ productId: 'p3', name: 'Mouse', price: 2500, stock: 0 }),
  ];

  describe('filterProducts', () => {
    it('should match names case-insensitively', () => {
      expect(filterProducts(products, { nameIcontains: 'LAPTOP' }).map((p) => p.productId)).toEqual(['p1', 'p2']);
    });

    it('should apply inclusive price bounds', () => {
      expect(filterProducts(products, { priceGte: 2500, priceLte: 4000 }).map((p) => p.productId)).toEqual([
        'p2',
        'p3',
      ]);
    });

    it('should treat stock below ten as low stock', () => {
      expect(filterProducts(products, { lowStock: true }).map((p) => p.productId)).toEqual(['p1', 'p3']);
      expect(filterProducts(products, { lowStock: false }).map((p) => p.productId)).toEqual(['p2']);
    });

    it('should ignore null bounds', () => {
      expect(filterProducts(products, { priceGte: null, stockLte: null })).toHaveLength(3);
    });
  });

  describe('filterOrders', () => {
    const orders = [
      makeOrder({
        orderId: 'o1',
        customerId: 'c1',
        totalAmount: 1000,
        orderDate: '2024-03-01T00:00:00.000Z',
        items: [{ productId: 'p3', productName: 'Mouse', quantity: 1, pricePerUnit: 1000, totalPrice: 1000 }],
      }),
      makeOrder({
        orderId: 'o2',
        customerId: 'c2',
        totalAmount: 150000,
        orderDate: '2024-04-01T00:00:00.000Z',
        items: [{ productId: 'p1', productName: 'Laptop Pro', quantity: 1, pricePerUnit: 150000, totalPrice: 150000 }],
      }),
    ];

    it('should match on any item product name', () => {
      expect(filterOrders(orders, { productName: 'laptop' }).map((o) => o.orderId)).toEqual(['o2']);
    });

    it('should match on product ID', () => {
      expect(filterOrders(orders, { productId: 'p3' }).map((o) => o.orderId)).toEqual(['o1']);
    });

    it('should look customer names up in the given map', () => {
      const names = new Map([
        ['c1', 'Dana Smith'],
        ['c2', 'Eve Jones'],
      ]);

      expect(filterOrders(orders, { customerName: 'smith' }, names).map((o) => o.orderId)).toEqual(['o1']);
    });

    it('should apply date and amount bounds together', () => {
      expect(
        filterOrders(orders, {
          orderDateGte: '2024-03-15T00:00:00.000Z',
          totalAmountLte: 150000,
        }).map((o) => o.orderId)
      ).toEqual(['o2']);
    });
  });

  describe('sortBy', () => {
    it('should sort descending with a leading dash', () => {
      expect(sortBy(products, ['-price'], PRODUCT_ORDER_FIELDS).map((p) => p.productId)).toEqual(['p1', 'p2', 'p3']);
    });

    it('should break ties with later fields', () => {
      const tied = [
        makeProduct({ productId: 'a', name: 'B', stock: 1 }),
        makeProduct({ productId: 'b', name: 'A', stock: 1 }),
        makeProduct({ productId: 'c', name: 'C', stock: 0 }),
      ];

      expect(sortBy(tied, ['stock', 'name'], PRODUCT_ORDER_FIELDS).map((p) => p.productId)).toEqual(['c', 'b', 'a']);
    });

    it('should leave the input untouched without ordering', () => {
      expect(sortBy(products, [], PRODUCT_ORDER_FIELDS)).toBe(products);
    });

    it('should reject unknown fields', () => {
      expect(() => sortBy(products, ['-colour'], PRODUCT_ORDER_FIELDS)).toThrow(
        new ValidationError('Cannot order by "colour"; expected one of: id, name, price, stock, createdAt')
      );
    });
  });
});
