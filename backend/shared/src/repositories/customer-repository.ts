import { GetCommand, TransactWriteCommand } from '@aws-sdk/lib-dynamodb';
import {
  dynamoClient,
  handleDynamoDBError,
  withRetry,
  getCurrentTimestamp,
  getTableName,
  scanAll,
  countAll,
} from '../utils/dynamodb-client';
import {
  Customer,
  CustomerStore,
  NewCustomer,
  DynamoDBCustomerItem,
  DynamoDBCustomerEmailItem,
} from '../types';

function toCustomer(item: DynamoDBCustomerItem): Customer {
  const { PK, ...customer } = item;
  return customer;
}

/**
 * Customers live in one table; a second table holds one claim item per
 * email so that uniqueness is enforced by a conditional transaction.
 */
export class CustomerRepository implements CustomerStore {
  private tableName: string;
  private emailTableName: string;

  constructor() {
    this.tableName = getTableName('CUSTOMERS_TABLE_NAME');
    this.emailTableName = getTableName('CUSTOMER_EMAILS_TABLE_NAME');
  }

  /**
   * Create a customer and claim its email in one transaction.
   * Fails with CONDITIONAL_CHECK_FAILED when the email is already claimed.
   */
  async create(customer: NewCustomer): Promise<Customer> {
    const now = getCurrentTimestamp();
    const newCustomer: Customer = {
      ...customer,
      createdAt: now,
      updatedAt: now,
    };

    const item: DynamoDBCustomerItem = {
      PK: newCustomer.customerId,
      ...newCustomer,
    };

    const emailItem: DynamoDBCustomerEmailItem = {
      PK: newCustomer.email,
      customerId: newCustomer.customerId,
    };

    try {
      await withRetry(() =>
        dynamoClient.send(
          new TransactWriteCommand({
            TransactItems: [
              {
                Put: {
                  TableName: this.tableName,
                  Item: item,
                  ConditionExpression: 'attribute_not_exists(PK)',
                },
              },
              {
                Put: {
                  TableName: this.emailTableName,
                  Item: emailItem,
                  ConditionExpression: 'attribute_not_exists(PK)',
                },
              },
            ],
          })
        )
      );

      return newCustomer;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  async getById(customerId: string): Promise<Customer | null> {
    try {
      const response = await dynamoClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { PK: customerId },
        })
      );

      if (!response.Item) {
        return null;
      }

      return toCustomer(response.Item as DynamoDBCustomerItem);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Look up a customer through its email claim
   */
  async getByEmail(email: string): Promise<Customer | null> {
    try {
      const response = await dynamoClient.send(
        new GetCommand({
          TableName: this.emailTableName,
          Key: { PK: email },
        })
      );

      if (!response.Item) {
        return null;
      }

      const claim = response.Item as DynamoDBCustomerEmailItem;
      return this.getById(claim.customerId);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  async listAll(): Promise<Customer[]> {
    try {
      const items = await scanAll<DynamoDBCustomerItem>({ TableName: this.tableName });
      return items.map(toCustomer);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  async count(): Promise<number> {
    try {
      return await countAll({ TableName: this.tableName });
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Delete the customer and release its email claim
   */
  async delete(customer: Customer): Promise<void> {
    try {
      await withRetry(() =>
        dynamoClient.send(
          new TransactWriteCommand({
            TransactItems: [
              {
                Delete: {
                  TableName: this.tableName,
                  Key: { PK: customer.customerId },
                },
              },
              {
                Delete: {
                  TableName: this.emailTableName,
                  Key: { PK: customer.email },
                },
              },
            ],
          })
        )
      );
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }
}
