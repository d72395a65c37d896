import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  CrmService,
  CustomerRepository,
  OrderRepository,
  ProductRepository,
  executeCrmOperation,
  getCurrentTimestamp,
  isRecord,
  logger,
} from 'crm-backend-shared';

const crm = new CrmService({
  customers: new CustomerRepository(),
  products: new ProductRepository(),
  orders: new OrderRepository(),
});

const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type',
  'Access-Control-Allow-Methods': 'GET,POST,OPTIONS',
};

interface GraphQLRequest {
  query: string;
  variables?: Record<string, unknown> | null;
  operationName?: string | null;
}

class BadRequestError extends Error {}

/**
 * GraphQL Lambda Handler
 * POST /graphql  body: { query, variables?, operationName? }
 * GET  /graphql  ?query=...&variables=<json>&operationName=...
 *
 * GraphQL-level errors (validation, resolver failures) come back with
 * status 200 and an `errors` array, as GraphQL clients expect.
 */
export const handler = async (
  event: APIGatewayProxyEvent
): Promise<APIGatewayProxyResult> => {
  const requestId = event.requestContext.requestId;
  logger.setContext({ requestId });

  try {
    if (event.httpMethod === 'OPTIONS') {
      return { statusCode: 204, headers: CORS_HEADERS, body: '' };
    }

    if (event.httpMethod !== 'POST' && event.httpMethod !== 'GET') {
      return errorResponse(405, `Method ${event.httpMethod} not allowed`);
    }

    const request = event.httpMethod === 'POST' ? parseBody(event.body) : parseQueryString(event);

    logger.info('GraphQL request received', {
      operationName: request.operationName ?? undefined,
      method: event.httpMethod,
    });

    const result = await executeCrmOperation(
      {
        source: request.query,
        variableValues: request.variables,
        operationName: request.operationName,
      },
      { crm }
    );

    if (result.errors && result.errors.length > 0) {
      logger.warn('GraphQL operation returned errors', {
        errors: result.errors.map((error) => error.message),
      });
    }

    return successResponse(200, result);
  } catch (error) {
    if (error instanceof BadRequestError) {
      logger.warn('Rejected GraphQL request', { reason: error.message });
      return errorResponse(400, error.message);
    }

    logger.error('Failed to execute GraphQL request', error);
    return errorResponse(500, 'Internal server error');
  } finally {
    logger.clearContext();
  }
};

function parseBody(body: string | null): GraphQLRequest {
  if (!body) {
    throw new BadRequestError('Request body is required');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    throw new BadRequestError('Invalid JSON in request body');
  }

  if (!isRecord(parsed)) {
    throw new BadRequestError('Request body must be a JSON object');
  }

  return toRequest(parsed.query, parsed.variables, parsed.operationName);
}

function parseQueryString(event: APIGatewayProxyEvent): GraphQLRequest {
  const params = event.queryStringParameters || {};

  let variables: unknown;
  if (params.variables) {
    try {
      variables = JSON.parse(params.variables);
    } catch {
      throw new BadRequestError('variables must be valid JSON');
    }
  }

  return toRequest(params.query, variables, params.operationName);
}

function toRequest(query: unknown, variables: unknown, operationName: unknown): GraphQLRequest {
  if (typeof query !== 'string' || query.trim() === '') {
    throw new BadRequestError('Missing GraphQL query');
  }

  const request: GraphQLRequest = { query, variables: null, operationName: null };

  if (variables !== undefined && variables !== null) {
    if (!isRecord(variables)) {
      throw new BadRequestError('variables must be a JSON object');
    }
    request.variables = variables;
  }

  if (operationName !== undefined && operationName !== null) {
    if (typeof operationName !== 'string') {
      throw new BadRequestError('operationName must be a string');
    }
    request.operationName = operationName;
  }

  return request;
}

function successResponse(statusCode: number, data: unknown): APIGatewayProxyResult {
  return {
    statusCode,
    headers: {
      'Content-Type': 'application/json',
      ...CORS_HEADERS,
    },
    body: JSON.stringify(data),
  };
}

function errorResponse(statusCode: number, message: string): APIGatewayProxyResult {
  return {
    statusCode,
    headers: {
      'Content-Type': 'application/json',
      ...CORS_HEADERS,
    },
    body: JSON.stringify({
      error: message,
      timestamp: getCurrentTimestamp(),
    }),
  };
}
