import {
  GetCommand,
  PutCommand,
  UpdateCommand,
  BatchGetCommand,
} from '@aws-sdk/lib-dynamodb';
import {
  dynamoClient,
  handleDynamoDBError,
  withRetry,
  getCurrentTimestamp,
  getTableName,
  scanAll,
} from '../utils/dynamodb-client';
import {
  Product,
  ProductStore,
  NewProduct,
  DynamoDBProductItem,
} from '../types';

// DynamoDB BatchGetItem limit
const BATCH_GET_LIMIT = 100;

function toProduct(item: DynamoDBProductItem): Product {
  const { PK, ...product } = item;
  return product;
}

export class ProductRepository implements ProductStore {
  private tableName: string;

  constructor() {
    this.tableName = getTableName('PRODUCTS_TABLE_NAME');
  }

  /**
   * Create a new product
   */
  async create(product: NewProduct): Promise<Product> {
    const now = getCurrentTimestamp();
    const newProduct: Product = {
      ...product,
      createdAt: now,
      updatedAt: now,
    };

    const item: DynamoDBProductItem = {
      PK: newProduct.productId,
      ...newProduct,
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

      return newProduct;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Get product by ID
   */
  async getById(productId: string): Promise<Product | null> {
    try {
      const response = await dynamoClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { PK: productId },
        })
      );

      if (!response.Item) {
        return null;
      }

      return toProduct(response.Item as DynamoDBProductItem);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Get multiple products by IDs; missing IDs are left out of the result
   */
  async getByIds(productIds: string[]): Promise<Product[]> {
    const uniqueIds = [...new Set(productIds)];
    if (uniqueIds.length === 0) {
      return [];
    }

    try {
      const products: Product[] = [];

      for (let start = 0; start < uniqueIds.length; start += BATCH_GET_LIMIT) {
        let pendingKeys: Array<{ PK: string }> = uniqueIds
          .slice(start, start + BATCH_GET_LIMIT)
          .map((id) => ({ PK: id }));

        while (pendingKeys.length > 0) {
          const keys = pendingKeys;
          const response = await withRetry(() =>
            dynamoClient.send(
              new BatchGetCommand({
                RequestItems: {
                  [this.tableName]: { Keys: keys },
                },
              })
            )
          );

          const items = response.Responses?.[this.tableName] || [];
          products.push(...items.map((item) => toProduct(item as DynamoDBProductItem)));
          pendingKeys = (response.UnprocessedKeys?.[this.tableName]?.Keys || []).map((key) => ({
            PK: String(key.PK),
          }));
        }
      }

      return products;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  async listAll(): Promise<Product[]> {
    try {
      const items = await scanAll<DynamoDBProductItem>({ TableName: this.tableName });
      return items.map(toProduct);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Products whose stock is strictly below the threshold
   */
  async listLowStock(threshold: number): Promise<Product[]> {
    try {
      const items = await scanAll<DynamoDBProductItem>({
        TableName: this.tableName,
        FilterExpression: 'stock < :threshold',
        ExpressionAttributeValues: {
          ':threshold': threshold,
        },
      });
      return items.map(toProduct);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Atomically add delta to stock (negative values remove stock)
   */
  async adjustStock(productId: string, delta: number): Promise<Product> {
    try {
      const response = await withRetry(() =>
        dynamoClient.send(
          new UpdateCommand({
            TableName: this.tableName,
            Key: { PK: productId },
            UpdateExpression: 'SET stock = stock + :delta, updatedAt = :updatedAt',
            ConditionExpression: 'attribute_exists(PK) AND stock >= :minStock',
            ExpressionAttributeValues: {
              ':delta': delta,
              ':updatedAt': getCurrentTimestamp(),
              ':minStock': Math.max(0, -delta),
            },
            ReturnValues: 'ALL_NEW',
          })
        )
      );

      return toProduct(response.Attributes as DynamoDBProductItem);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }
}
