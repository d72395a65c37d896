import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  ScanCommand,
  ScanCommandInput,
} from '@aws-sdk/lib-dynamodb';
import { logger } from './logger';

/**
 * DynamoDB Client Configuration
 * Singleton pattern for reusing connections across Lambda invocations
 */
class DynamoDBClientManager {
  private static instance: DynamoDBDocumentClient;

  static getClient(): DynamoDBDocumentClient {
    if (!this.instance) {
      const client = new DynamoDBClient({
        region: process.env.AWS_REGION || 'us-east-2',
      });

      this.instance = DynamoDBDocumentClient.from(client, {
        marshallOptions: {
          removeUndefinedValues: true,
          convertEmptyValues: false,
        },
        unmarshallOptions: {
          wrapNumbers: false,
        },
      });
    }

    return this.instance;
  }
}

export const dynamoClient = DynamoDBClientManager.getClient();

export type DynamoDBErrorCode =
  | 'CONDITIONAL_CHECK_FAILED'
  | 'RESOURCE_NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'THROTTLED'
  | 'UNKNOWN_ERROR';

/**
 * DynamoDB Error Handler
 */
export class DynamoDBError extends Error {
  constructor(
    message: string,
    public code: DynamoDBErrorCode,
    public statusCode: number
  ) {
    super(message);
    this.name = 'DynamoDBError';
  }
}

function errorName(error: unknown): string | undefined {
  return error instanceof Error ? error.name : undefined;
}

/**
 * Handle DynamoDB exceptions with better error messages
 */
export function handleDynamoDBError(error: unknown): never {
  if (error instanceof DynamoDBError) {
    throw error;
  }

  logger.error('DynamoDB Error', error);

  switch (errorName(error)) {
    case 'ConditionalCheckFailedException':
    case 'TransactionCanceledException':
      throw new DynamoDBError(
        'Conditional check failed - item may already exist or have been modified',
        'CONDITIONAL_CHECK_FAILED',
        400
      );
    case 'ResourceNotFoundException':
      throw new DynamoDBError('Resource not found', 'RESOURCE_NOT_FOUND', 404);
    case 'ValidationException':
      throw new DynamoDBError('Invalid request parameters', 'VALIDATION_ERROR', 400);
    case 'ProvisionedThroughputExceededException':
      throw new DynamoDBError('Request rate too high - throttled', 'THROTTLED', 429);
    default:
      throw new DynamoDBError(
        error instanceof Error && error.message ? error.message : 'Unknown DynamoDB error',
        'UNKNOWN_ERROR',
        500
      );
  }
}

/**
 * Retry logic for throttled requests
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  maxRetries: number = 3,
  baseDelay: number = 100
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;

      // Only retry on throttling errors
      if (
        errorName(error) === 'ProvisionedThroughputExceededException' &&
        attempt < maxRetries
      ) {
        const delay = baseDelay * Math.pow(2, attempt); // Exponential backoff
        await new Promise((resolve) => setTimeout(resolve, delay));
        continue;
      }

      throw error;
    }
  }

  throw lastError;
}

/**
 * Generate timestamps
 */
export function getCurrentTimestamp(): string {
  return new Date().toISOString();
}

/**
 * Generate unique ID
 */
export function generateId(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
}

/**
 * Scan a table to the end, following LastEvaluatedKey
 */
export async function scanAll<T>(input: ScanCommandInput): Promise<T[]> {
  const items: T[] = [];
  let exclusiveStartKey: ScanCommandInput['ExclusiveStartKey'];

  do {
    const response = await withRetry(() =>
      dynamoClient.send(
        new ScanCommand({
          ...input,
          ExclusiveStartKey: exclusiveStartKey,
        })
      )
    );

    items.push(...((response.Items || []) as T[]));
    exclusiveStartKey = response.LastEvaluatedKey;
  } while (exclusiveStartKey);

  return items;
}

/**
 * Count items in a table, following LastEvaluatedKey
 */
export async function countAll(input: ScanCommandInput): Promise<number> {
  let count = 0;
  let exclusiveStartKey: ScanCommandInput['ExclusiveStartKey'];

  do {
    const response = await withRetry(() =>
      dynamoClient.send(
        new ScanCommand({
          ...input,
          Select: 'COUNT',
          ExclusiveStartKey: exclusiveStartKey,
        })
      )
    );

    count += response.Count ?? 0;
    exclusiveStartKey = response.LastEvaluatedKey;
  } while (exclusiveStartKey);

  return count;
}

/**
 * Validate required environment variables
 */
export function validateEnvironment(requiredVars: string[]): void {
  const missing = requiredVars.filter((varName) => !process.env[varName]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missing.join(', ')}`
    );
  }
}

/**
 * Get table name from environment
 */
export function getTableName(tableEnvVar: string): string {
  const tableName = process.env[tableEnvVar];
  if (!tableName) {
    throw new Error(`Environment variable ${tableEnvVar} is not set`);
  }
  return tableName;
}

/**
 * Type guard for checking if error is DynamoDB error
 */
export function isDynamoDBError(error: unknown): error is DynamoDBError {
  return error instanceof DynamoDBError;
}
