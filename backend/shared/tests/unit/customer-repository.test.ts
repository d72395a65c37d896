jest.mock('@aws-sdk/lib-dynamodb', () => {
  const actual = jest.requireActual('@aws-sdk/lib-dynamodb');
  const send = jest.fn();
  return {
    ...actual,
    DynamoDBDocumentClient: { from: jest.fn(() => ({ send })) },
  };
});

import { CustomerRepository } from '../../src/repositories/customer-repository';
import { DynamoDBError, dynamoClient } from '../../src/utils/dynamodb-client';
import { mockCustomer } from '../fixtures/test-data';

describe('CustomerRepository', () => {
  const send = dynamoClient.send as jest.Mock;
  let repository: CustomerRepository;

  beforeEach(() => {
    send.mockReset();
    repository = new CustomerRepository();
  });

  describe('create', () => {
    it('should write the customer and the email claim in one transaction', async () => {
      send.mockResolvedValue({});

      const result = await repository.create({
        customerId: 'customer-1',
        name: 'Alice',
        email: 'alice@example.com',
      });

      expect(result).toMatchObject({ customerId: 'customer-1', name: 'Alice', email: 'alice@example.com' });
      expect(result.createdAt).toBe(result.updatedAt);
      expect(send).toHaveBeenCalledTimes(1);

      const { TransactItems } = send.mock.calls[0][0].input;
      expect(TransactItems).toHaveLength(2);
      expect(TransactItems[0].Put).toMatchObject({
        TableName: 'crm-customers-test',
        Item: { PK: 'customer-1', email: 'alice@example.com' },
        ConditionExpression: 'attribute_not_exists(PK)',
      });
      expect(TransactItems[1].Put).toEqual({
        TableName: 'crm-customer-emails-test',
        Item: { PK: 'alice@example.com', customerId: 'customer-1' },
        ConditionExpression: 'attribute_not_exists(PK)',
      });
    });

    it('should report a cancelled transaction as a conditional check failure', async () => {
      const error = new Error('Transaction cancelled');
      error.name = 'TransactionCanceledException';
      send.mockRejectedValue(error);

      await expect(
        repository.create({ customerId: 'customer-1', name: 'Alice', email: 'alice@example.com' })
      ).rejects.toMatchObject({ code: 'CONDITIONAL_CHECK_FAILED', statusCode: 400 });
    });
  });

  describe('getById', () => {
    it('should strip the key attribute from the stored item', async () => {
      send.mockResolvedValue({ Item: { PK: mockCustomer.customerId, ...mockCustomer } });

      const result = await repository.getById(mockCustomer.customerId);

      expect(result).toEqual(mockCustomer);
    });

    it('should return null when the customer does not exist', async () => {
      send.mockResolvedValue({});

      expect(await repository.getById('missing')).toBeNull();
    });
  });

  describe('getByEmail', () => {
    it('should follow the email claim to the customer', async () => {
      send
        .mockResolvedValueOnce({ Item: { PK: 'alice@example.com', customerId: mockCustomer.customerId } })
        .mockResolvedValueOnce({ Item: { PK: mockCustomer.customerId, ...mockCustomer } });

      const result = await repository.getByEmail('alice@example.com');

      expect(result).toEqual(mockCustomer);
      expect(send.mock.calls[0][0].input).toEqual({
        TableName: 'crm-customer-emails-test',
        Key: { PK: 'alice@example.com' },
      });
      expect(send.mock.calls[1][0].input).toEqual({
        TableName: 'crm-customers-test',
        Key: { PK: mockCustomer.customerId },
      });
    });

    it('should return null when the email is unclaimed', async () => {
      send.mockResolvedValue({});

      expect(await repository.getByEmail('nobody@example.com')).toBeNull();
      expect(send).toHaveBeenCalledTimes(1);
    });
  });

  describe('listAll', () => {
    it('should follow pagination to the end of the table', async () => {
      send
        .mockResolvedValueOnce({
          Items: [{ PK: 'customer-1', ...mockCustomer, customerId: 'customer-1' }],
          LastEvaluatedKey: { PK: 'customer-1' },
        })
        .mockResolvedValueOnce({
          Items: [{ PK: 'customer-2', ...mockCustomer, customerId: 'customer-2' }],
        });

      const result = await repository.listAll();

      expect(result.map((customer) => customer.customerId)).toEqual(['customer-1', 'customer-2']);
      expect(send.mock.calls[1][0].input.ExclusiveStartKey).toEqual({ PK: 'customer-1' });
    });
  });

  describe('count', () => {
    it('should add up the count of every page', async () => {
      send
        .mockResolvedValueOnce({ Count: 3, LastEvaluatedKey: { PK: 'customer-3' } })
        .mockResolvedValueOnce({ Count: 2 });

      expect(await repository.count()).toBe(5);
      expect(send.mock.calls[0][0].input.Select).toBe('COUNT');
    });
  });

  describe('delete', () => {
    it('should delete the customer and release its email', async () => {
      send.mockResolvedValue({});

      await repository.delete(mockCustomer);

      expect(send.mock.calls[0][0].input.TransactItems).toEqual([
        { Delete: { TableName: 'crm-customers-test', Key: { PK: mockCustomer.customerId } } },
        { Delete: { TableName: 'crm-customer-emails-test', Key: { PK: mockCustomer.email } } },
      ]);
    });

    it('should wrap unknown failures in DynamoDBError', async () => {
      send.mockRejectedValue(new Error('socket hang up'));

      const failure = repository.delete(mockCustomer);

      await expect(failure).rejects.toBeInstanceOf(DynamoDBError);
      await expect(failure).rejects.toMatchObject({ code: 'UNKNOWN_ERROR', message: 'socket hang up' });
    });
  });
});
