jest.mock('@aws-sdk/lib-dynamodb', () => {
  const actual = jest.requireActual('@aws-sdk/lib-dynamodb');
  const send = jest.fn();
  return {
    ...actual,
    DynamoDBDocumentClient: { from: jest.fn(() => ({ send })) },
  };
});

import { OrderRepository } from '../../src/repositories/order-repository';
import { dynamoClient } from '../../src/utils/dynamodb-client';
import { makeOrder, mockOrder } from '../fixtures/test-data';

const TABLE = 'crm-orders-test';

describe('OrderRepository', () => {
  const send = dynamoClient.send as jest.Mock;
  let repository: OrderRepository;

  beforeEach(() => {
    send.mockReset();
    repository = new OrderRepository();
  });

  describe('create', () => {
    it('should store the order keyed by its ID', async () => {
      send.mockResolvedValue({});

      const result = await repository.create(mockOrder);

      expect(result).toEqual(mockOrder);
      expect(send.mock.calls[0][0].input).toEqual({
        TableName: TABLE,
        Item: { PK: mockOrder.orderId, ...mockOrder },
        ConditionExpression: 'attribute_not_exists(PK)',
      });
    });

    it('should throw error if order already exists', async () => {
      const error = new Error('ConditionalCheckFailed');
      error.name = 'ConditionalCheckFailedException';
      send.mockRejectedValue(error);

      await expect(repository.create(mockOrder)).rejects.toMatchObject({
        code: 'CONDITIONAL_CHECK_FAILED',
      });
    });
  });

  describe('getById', () => {
    it('should return order when found', async () => {
      send.mockResolvedValue({ Item: { PK: mockOrder.orderId, ...mockOrder } });

      expect(await repository.getById(mockOrder.orderId)).toEqual(mockOrder);
    });

    it('should return null when order not found', async () => {
      send.mockResolvedValue({});

      expect(await repository.getById('non-existent')).toBeNull();
    });
  });

  describe('listSince', () => {
    it('should scan for orders dated on or after the timestamp', async () => {
      send.mockResolvedValue({ Items: [{ PK: mockOrder.orderId, ...mockOrder }] });

      const result = await repository.listSince('2023-12-25T00:00:00.000Z');

      expect(result).toEqual([mockOrder]);
      expect(send.mock.calls[0][0].input).toMatchObject({
        FilterExpression: 'orderDate >= :since',
        ExpressionAttributeValues: { ':since': '2023-12-25T00:00:00.000Z' },
      });
    });
  });

  describe('listByCustomer', () => {
    it('should query the customer index across pages', async () => {
      send
        .mockResolvedValueOnce({
          Items: [{ PK: 'order-1', ...makeOrder({ orderId: 'order-1' }) }],
          LastEvaluatedKey: { PK: 'order-1' },
        })
        .mockResolvedValueOnce({
          Items: [{ PK: 'order-2', ...makeOrder({ orderId: 'order-2' }) }],
        });

      const result = await repository.listByCustomer('customer-test-1');

      expect(result.map((order) => order.orderId)).toEqual(['order-1', 'order-2']);
      expect(send.mock.calls[0][0].input).toMatchObject({
        IndexName: 'customerId-orderDate-index',
        KeyConditionExpression: 'customerId = :customerId',
        ExpressionAttributeValues: { ':customerId': 'customer-test-1' },
      });
      expect(send.mock.calls[1][0].input.ExclusiveStartKey).toEqual({ PK: 'order-1' });
    });
  });

  describe('hasOrderSince', () => {
    it('should be true when the index returns a match', async () => {
      send.mockResolvedValue({ Count: 1 });

      expect(await repository.hasOrderSince('customer-test-1', '2023-01-01T00:00:00.000Z')).toBe(true);
      expect(send.mock.calls[0][0].input).toMatchObject({
        KeyConditionExpression: 'customerId = :customerId AND orderDate >= :since',
        Select: 'COUNT',
        Limit: 1,
      });
    });

    it('should be false when nothing matches', async () => {
      send.mockResolvedValue({ Count: 0 });

      expect(await repository.hasOrderSince('customer-test-1', '2023-01-01T00:00:00.000Z')).toBe(false);
    });
  });

  describe('totals', () => {
    it('should count orders and sum their amounts', async () => {
      send
        .mockResolvedValueOnce({ Items: [{ totalAmount: 1500 }, { totalAmount: 2500 }], LastEvaluatedKey: { PK: 'x' } })
        .mockResolvedValueOnce({ Items: [{ totalAmount: 1000 }] });

      expect(await repository.totals()).toEqual({ count: 3, totalAmount: 5000 });
      expect(send.mock.calls[0][0].input.ProjectionExpression).toBe('totalAmount');
    });

    it('should be zero for an empty table', async () => {
      send.mockResolvedValue({ Items: [] });

      expect(await repository.totals()).toEqual({ count: 0, totalAmount: 0 });
    });
  });

  describe('delete', () => {
    it('should delete by order ID', async () => {
      send.mockResolvedValue({});

      await repository.delete('order-1');

      expect(send.mock.calls[0][0].input).toEqual({ TableName: TABLE, Key: { PK: 'order-1' } });
    });
  });
});
