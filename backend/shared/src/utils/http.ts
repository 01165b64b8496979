import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { Principal, UserRole } from '../types';
import { AppError, UnauthorizedError } from './errors';
import { DynamoDBError, getCurrentTimestamp } from './dynamodb-client';
import { ValidationError } from './validators';
import { logger } from './logger';

const CORS_HEADERS = {
  'Content-Type': 'application/json',
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type,Authorization',
  'Access-Control-Allow-Methods': 'OPTIONS,GET,POST,PUT,DELETE',
};

/**
 * Helper: Success response
 */
export function successResponse(statusCode: number, data: unknown): APIGatewayProxyResult {
  return {
    statusCode,
    headers: CORS_HEADERS,
    body: statusCode === 204 ? '' : JSON.stringify(data),
  };
}

export function noContentResponse(): APIGatewayProxyResult {
  return successResponse(204, undefined);
}

/**
 * Helper: Error response
 */
export function errorResponse(
  statusCode: number,
  message: string,
  code: string,
  details: Record<string, unknown> = {}
): APIGatewayProxyResult {
  return {
    statusCode,
    headers: CORS_HEADERS,
    body: JSON.stringify({
      error: message,
      code,
      timestamp: getCurrentTimestamp(),
      ...details,
    }),
  };
}

/**
 * Map a thrown error to a response. Typed application errors keep their
 * status; everything else is logged and reported as a 500.
 */
export function handleError(error: unknown, context: string): APIGatewayProxyResult {
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      logger.error(context, error);
    } else {
      logger.warn(context, { code: error.code, reason: error.message });
    }
    return errorResponse(error.statusCode, error.message, error.code, error.details());
  }

  if (error instanceof DynamoDBError && error.statusCode === 429) {
    logger.warn(context, { code: error.code, reason: error.message });
    return errorResponse(429, 'Too many requests, please retry', error.code ?? 'THROTTLED');
  }

  logger.error(context, error);
  return errorResponse(500, 'Internal server error', 'INTERNAL_ERROR');
}

/**
 * Principal placed in the request context by the token authorizer
 */
export function principalFromEvent(event: APIGatewayProxyEvent): Principal {
  const authorizer = event.requestContext.authorizer;
  const id = Number(authorizer?.userId);
  const role: unknown = authorizer?.role;

  if (!Number.isInteger(id) || id <= 0) {
    throw new UnauthorizedError();
  }

  return { id, role: parseRole(role) };
}

function parseRole(role: unknown): UserRole {
  switch (role) {
    case UserRole.ADMIN:
      return UserRole.ADMIN;
    case UserRole.TESTER:
      return UserRole.TESTER;
    case UserRole.VIEWER:
      return UserRole.VIEWER;
    default:
      throw new UnauthorizedError();
  }
}

/**
 * Parse a JSON request body; an absent body is an error
 */
export function parseJsonBody(event: APIGatewayProxyEvent): unknown {
  if (!event.body) {
    throw new ValidationError('Request body is required');
  }

  try {
    const parsed: unknown = JSON.parse(event.body);
    return parsed;
  } catch {
    throw new ValidationError('Invalid JSON in request body');
  }
}

/**
 * Positive integer path parameter
 */
export function pathId(event: APIGatewayProxyEvent, name: string = 'id'): number {
  const raw = event.pathParameters?.[name];
  const id = raw !== undefined && /^\d+$/.test(raw) ? Number(raw) : NaN;

  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new ValidationError(`${name} must be a positive integer`, name, raw);
  }
  return id;
}

/**
 * Set request-scoped logging context
 */
export function setRequestContext(event: APIGatewayProxyEvent): void {
  logger.clearContext();
  logger.setContext({ requestId: event.requestContext.requestId });
}
