import axios from 'axios';
import { isRecord } from '../utils/validators';

/**
 * unreachable: no response came back. timeout: the request may have reached
 * the server. http: a non-2xx status. response: the body carried GraphQL
 * errors or had the wrong shape. rejected: a payload `errors` list.
 */
export type GraphQLFailureKind = 'unreachable' | 'timeout' | 'http' | 'response' | 'rejected';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export class GraphQLRequestError extends Error {
  constructor(
    message: string,
    public readonly kind: GraphQLFailureKind = 'response',
    public statusCode?: number
  ) {
    super(message);
    this.name = 'GraphQLRequestError';
  }
}

/**
 * Anything that can run a GraphQL operation and hand back its `data`
 */
export interface CrmQueryClient {
  execute(query: string, variables?: Record<string, unknown>): Promise<unknown>;
}

interface GraphQLResponseBody {
  data?: unknown;
  errors?: Array<{ message?: string }>;
}

export interface CrmGraphQLClientOptions {
  endpoint: string;
  timeoutMs?: number;
}

/**
 * HTTP client for the CRM GraphQL endpoint.
 * Transport failures, non-2xx statuses and GraphQL error arrays all
 * surface as GraphQLRequestError.
 */
export class CrmGraphQLClient implements CrmQueryClient {
  private readonly endpoint: string;
  private readonly timeoutMs: number;

  constructor(options: CrmGraphQLClientOptions) {
    this.endpoint = options.endpoint;
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  async execute(query: string, variables?: Record<string, unknown>): Promise<unknown> {
    let body: GraphQLResponseBody;

    try {
      const response = await axios.post<GraphQLResponseBody>(
        this.endpoint,
        { query, variables },
        {
          headers: { 'Content-Type': 'application/json' },
          timeout: this.timeoutMs,
        }
      );
      body = response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        if (error.response) {
          throw new GraphQLRequestError(
            `GraphQL endpoint returned HTTP ${error.response.status}`,
            'http',
            error.response.status
          );
        }
        if (error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
          throw new GraphQLRequestError(`GraphQL request timed out: ${error.message}`, 'timeout');
        }
        throw new GraphQLRequestError(`GraphQL endpoint unreachable: ${error.message}`, 'unreachable');
      }
      throw error;
    }

    if (!isRecord(body)) {
      throw new GraphQLRequestError('GraphQL endpoint returned a non-JSON body');
    }

    if (Array.isArray(body.errors) && body.errors.length > 0) {
      const messages = body.errors.map((error) => error.message ?? 'Unknown error');
      throw new GraphQLRequestError(`GraphQL errors: ${messages.join('; ')}`);
    }

    if (!isRecord(body.data)) {
      throw new GraphQLRequestError('GraphQL response has no data');
    }

    return body.data;
  }
}

/**
 * Readers for GraphQL `data` payloads. A value of the wrong shape raises
 * GraphQLRequestError naming the offending path.
 */
function malformed(path: string, expected: string): GraphQLRequestError {
  return new GraphQLRequestError(`Malformed GraphQL response: expected ${expected} at ${path}`);
}

export function readRecord(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw malformed(path, 'an object');
  }
  return value;
}

export function readNumber(record: Record<string, unknown>, key: string, path: string): number {
  const value = record[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw malformed(`${path}.${key}`, 'a number');
  }
  return value;
}

export function readString(record: Record<string, unknown>, key: string, path: string): string {
  const value = record[key];
  if (typeof value !== 'string') {
    throw malformed(`${path}.${key}`, 'a string');
  }
  return value;
}

export function readArray(record: Record<string, unknown>, key: string, path: string): unknown[] {
  const value = record[key];
  if (!Array.isArray(value)) {
    throw malformed(`${path}.${key}`, 'a list');
  }
  return value;
}
