import { LineSink, MutationResult, RestockResult } from '../types';
import { errorMessage } from '../utils/errors';
import { formatDayFirstDateTime } from '../utils/format';
import { logger } from '../utils/logger';
import {
  CrmQueryClient,
  GraphQLFailureKind,
  GraphQLRequestError,
  readArray,
  readNumber,
  readRecord,
  readString,
} from './graphql-client';

export const UPDATE_LOW_STOCK_MUTATION = `
  mutation UpdateLowStockProducts($threshold: Int, $restockAmount: Int) {
    updateLowStockProducts(threshold: $threshold, restockAmount: $restockAmount) {
      updatedProducts {
        id
        name
        stock
      }
      successMessage
      errors
    }
  }
`;

export interface Restocker {
  restockLowStockProducts(threshold: number, restockAmount: number): Promise<MutationResult<RestockResult>>;
}

interface RestockedLine {
  id: string;
  name: string;
  stock: number;
  previousStock?: number;
}

type RestockOutcome =
  | { source: 'graphql'; message: string; products: RestockedLine[] }
  | { source: 'database'; message: string; products: RestockedLine[] }
  | { source: 'skipped'; reason: string };

// Failures where the mutation is known not to have run
const DIRECT_RESTOCK_KINDS: ReadonlySet<GraphQLFailureKind> = new Set<GraphQLFailureKind>([
  'unreachable',
  'http',
  'rejected',
]);

function mutationNotApplied(error: unknown): boolean {
  return error instanceof GraphQLRequestError && DIRECT_RESTOCK_KINDS.has(error.kind);
}

export type LowStockResult =
  | { success: true; timestamp: string; method: 'graphql' | 'database_fallback'; updatedCount: number }
  | { success: false; timestamp: string; method: 'failed'; error: string };

export interface LowStockServiceDeps {
  client: CrmQueryClient;
  restocker: Restocker;
  sink: LineSink;
  threshold: number;
  restockAmount: number;
  now?: () => Date;
}

const lowStockLogger = logger.child({ task: 'update-low-stock' });

function readUpdatedProduct(value: unknown, index: number): RestockedLine {
  const path = `data.updateLowStockProducts.updatedProducts[${index}]`;
  const product = readRecord(value, path);
  return {
    id: readString(product, 'id', path),
    name: readString(product, 'name', path),
    stock: readNumber(product, 'stock', path),
  };
}

/**
 * Restocks low-stock products through the updateLowStockProducts mutation,
 * falling back to the stores when the mutation is known not to have run.
 * After a timeout or an unreadable response the stores are left alone.
 */
export class LowStockService {
  constructor(private readonly deps: LowStockServiceDeps) {}

  async run(): Promise<LowStockResult> {
    const timestamp = formatDayFirstDateTime(this.deps.now ? this.deps.now() : new Date());
    const lines: string[] = [];

    try {
      const outcome = await this.restock(timestamp, lines);

      if (outcome.source === 'skipped') {
        lines.push(`${timestamp} Skipped direct restock: the mutation may already have been applied`);
        return { success: false, timestamp, method: 'failed', error: outcome.reason };
      }

      lines.push(...this.describe(timestamp, outcome));

      lowStockLogger.info('Low-stock update completed', {
        source: outcome.source,
        updatedCount: outcome.products.length,
      });

      return {
        success: true,
        timestamp,
        method: outcome.source === 'graphql' ? 'graphql' : 'database_fallback',
        updatedCount: outcome.products.length,
      };
    } catch (error) {
      const message = errorMessage(error);
      lines.push(`${timestamp} [FALLBACK] Failed: ${message}`);
      lowStockLogger.error('Low-stock update failed', error);

      return { success: false, timestamp, method: 'failed', error: message };
    } finally {
      await this.deps.sink.append([...lines, '']);
    }
  }

  private async restock(timestamp: string, lines: string[]): Promise<RestockOutcome> {
    const { threshold, restockAmount } = this.deps;

    try {
      const data = readRecord(
        await this.deps.client.execute(UPDATE_LOW_STOCK_MUTATION, { threshold, restockAmount }),
        'data'
      );
      const payload = readRecord(data.updateLowStockProducts, 'data.updateLowStockProducts');

      const errors = readArray(payload, 'errors', 'data.updateLowStockProducts');
      if (errors.length > 0) {
        throw new GraphQLRequestError(`Mutation errors: ${errors.map(String).join('; ')}`, 'rejected');
      }

      return {
        source: 'graphql',
        message: readString(payload, 'successMessage', 'data.updateLowStockProducts'),
        products: readArray(payload, 'updatedProducts', 'data.updateLowStockProducts').map(readUpdatedProduct),
      };
    } catch (error) {
      const reason = errorMessage(error);
      lines.push(`${timestamp} GraphQL restock failed: ${reason}`);

      if (!mutationNotApplied(error)) {
        lowStockLogger.error('GraphQL restock outcome unknown, not using database', error);
        return { source: 'skipped', reason };
      }
      lowStockLogger.warn('GraphQL restock failed, using database', { reason });
    }

    const result = await this.deps.restocker.restockLowStockProducts(threshold, restockAmount);
    if (!result.ok) {
      throw new Error(result.errors.join('; '));
    }

    return {
      source: 'database',
      message: result.value.message,
      products: result.value.updated.map(({ product, previousStock }) => ({
        id: product.productId,
        name: product.name,
        stock: product.stock,
        previousStock,
      })),
    };
  }

  private describe(timestamp: string, outcome: Exclude<RestockOutcome, { source: 'skipped' }>): string[] {
    const prefix = outcome.source === 'database' ? `${timestamp} [FALLBACK]` : timestamp;
    const lines = [`${prefix} ${outcome.message}`];

    if (outcome.products.length > 0) {
      lines.push(`${prefix} Updated products:`);
      for (const product of outcome.products) {
        lines.push(
          product.previousStock === undefined
            ? `${timestamp}   - ${product.name} (ID: ${product.id}) - New stock: ${product.stock}`
            : `${timestamp}   - ${product.name} (ID: ${product.id}) - Stock: ${product.previousStock} -> ${product.stock}`
        );
      }
    }

    return lines;
  }
}
