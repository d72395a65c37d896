import {
  GetCommand,
  PutCommand,
  DeleteCommand,
  QueryCommand,
  QueryCommandInput,
} from '@aws-sdk/lib-dynamodb';
import {
  dynamoClient,
  handleDynamoDBError,
  withRetry,
  getTableName,
  scanAll,
} from '../utils/dynamodb-client';
import {
  Order,
  OrderStore,
  OrderTotals,
  DynamoDBOrderItem,
} from '../types';

const CUSTOMER_ORDER_DATE_INDEX = 'customerId-orderDate-index';

function toOrder(item: DynamoDBOrderItem): Order {
  const { PK, ...order } = item;
  return order;
}

export class OrderRepository implements OrderStore {
  private tableName: string;

  constructor() {
    this.tableName = getTableName('ORDERS_TABLE_NAME');
  }

  /**
   * Create a new order
   */
  async create(order: Order): Promise<Order> {
    const item: DynamoDBOrderItem = {
      PK: order.orderId,
      ...order,
    };

    try {
      await withRetry(() =>
        dynamoClient.send(
          new PutCommand({
            TableName: this.tableName,
            Item: item,
            ConditionExpression: 'attribute_not_exists(PK)',
          })
        )
      );

      return order;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Get order by ID
   */
  async getById(orderId: string): Promise<Order | null> {
    try {
      const response = await dynamoClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { PK: orderId },
        })
      );

      if (!response.Item) {
        return null;
      }

      return toOrder(response.Item as DynamoDBOrderItem);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  async listAll(): Promise<Order[]> {
    try {
      const items = await scanAll<DynamoDBOrderItem>({ TableName: this.tableName });
      return items.map(toOrder);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Orders placed on or after the given ISO timestamp
   */
  async listSince(since: string): Promise<Order[]> {
    try {
      const items = await scanAll<DynamoDBOrderItem>({
        TableName: this.tableName,
        FilterExpression: 'orderDate >= :since',
        ExpressionAttributeValues: {
          ':since': since,
        },
      });
      return items.map(toOrder);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Get orders by customer ID, oldest first
   */
  async listByCustomer(customerId: string): Promise<Order[]> {
    try {
      const orders: Order[] = [];
      let exclusiveStartKey: QueryCommandInput['ExclusiveStartKey'];

      do {
        const response = await dynamoClient.send(
          new QueryCommand({
            TableName: this.tableName,
            IndexName: CUSTOMER_ORDER_DATE_INDEX,
            KeyConditionExpression: 'customerId = :customerId',
            ExpressionAttributeValues: {
              ':customerId': customerId,
            },
            ExclusiveStartKey: exclusiveStartKey,
          })
        );

        orders.push(...(response.Items || []).map((item) => toOrder(item as DynamoDBOrderItem)));
        exclusiveStartKey = response.LastEvaluatedKey;
      } while (exclusiveStartKey);

      return orders;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Whether the customer has at least one order dated on or after `since`
   */
  async hasOrderSince(customerId: string, since: string): Promise<boolean> {
    try {
      const response = await dynamoClient.send(
        new QueryCommand({
          TableName: this.tableName,
          IndexName: CUSTOMER_ORDER_DATE_INDEX,
          KeyConditionExpression: 'customerId = :customerId AND orderDate >= :since',
          ExpressionAttributeValues: {
            ':customerId': customerId,
            ':since': since,
          },
          Select: 'COUNT',
          Limit: 1,
        })
      );

      return (response.Count ?? 0) > 0;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Order count and revenue across the whole table
   */
  async totals(): Promise<OrderTotals> {
    try {
      const items = await scanAll<Pick<DynamoDBOrderItem, 'totalAmount'>>({
        TableName: this.tableName,
        ProjectionExpression: 'totalAmount',
      });

      return {
        count: items.length,
        totalAmount: items.reduce((sum, item) => sum + (item.totalAmount || 0), 0),
      };
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  async delete(orderId: string): Promise<void> {
    try {
      await withRetry(() =>
        dynamoClient.send(
          new DeleteCommand({
            TableName: this.tableName,
            Key: { PK: orderId },
          })
        )
      );
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }
}
