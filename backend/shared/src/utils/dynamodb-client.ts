import { DynamoDBClient, CancellationReason } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  ScanCommand,
  ScanCommandInput,
  QueryCommand,
  QueryCommandInput,
  BatchWriteCommand,
  TransactWriteCommand,
  TransactWriteCommandInput,
} from '@aws-sdk/lib-dynamodb';
import { PageOptions, PageResult } from '../types';
import { getTableName } from './config';
import { ConflictError } from './errors';

/**
 * DynamoDB Client Configuration
 * Singleton pattern for reusing connections across Lambda invocations
 */
class DynamoDBClientManager {
  private static instance: DynamoDBDocumentClient | undefined;

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

export type TransactItem = NonNullable<TransactWriteCommandInput['TransactItems']>[number];

/**
 * DynamoDB Error Handler
 */
export class DynamoDBError extends Error {
  constructor(
    message: string,
    public code?: string,
    public statusCode?: number
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
  const name = errorName(error);

  if (name === 'ConditionalCheckFailedException') {
    throw new DynamoDBError(
      'Conditional check failed - item may have been modified',
      'CONDITIONAL_CHECK_FAILED',
      400
    );
  }

  if (name === 'ResourceNotFoundException') {
    throw new DynamoDBError('Resource not found', 'RESOURCE_NOT_FOUND', 404);
  }

  if (name === 'ValidationException') {
    throw new DynamoDBError('Invalid request parameters', 'VALIDATION_ERROR', 400);
  }

  if (name === 'ProvisionedThroughputExceededException') {
    throw new DynamoDBError('Request rate too high - throttled', 'THROTTLED', 429);
  }

  throw new DynamoDBError(
    error instanceof Error && error.message ? error.message : 'Unknown DynamoDB error',
    'UNKNOWN_ERROR',
    500
  );
}

/**
 * Retry logic for throttled requests
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  maxRetries: number = 3,
  baseDelay: number = 100
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      // Only retry on throttling errors
      if (errorName(error) === 'ProvisionedThroughputExceededException' && attempt < maxRetries) {
        const delay = baseDelay * Math.pow(2, attempt); // Exponential backoff
        await new Promise((resolve) => setTimeout(resolve, delay));
        continue;
      }

      throw error;
    }
  }
}

/**
 * Cancellation reasons of a failed TransactWriteCommand, one per item in
 * request order, or null when the error is not a cancelled transaction
 */
export function getCancellationReasons(error: unknown): CancellationReason[] | null {
  if (!(error instanceof Error) || error.name !== 'TransactionCanceledException') {
    return null;
  }
  if (!('CancellationReasons' in error) || !Array.isArray(error.CancellationReasons)) {
    return [];
  }
  return error.CancellationReasons;
}

export function failedAt(reasons: CancellationReason[], index: number): boolean {
  return reasons[index]?.Code === 'ConditionalCheckFailed';
}

/**
 * Read a numeric attribute from a raw cancellation-reason item
 */
export function numberAttribute(reason: CancellationReason | undefined, attribute: string): number | undefined {
  const raw = reason?.Item?.[attribute]?.N;
  return raw === undefined ? undefined : Number(raw);
}

/**
 * Run a TransactWriteCommand. When DynamoDB cancels it, mapCancellation turns
 * the per-item reasons into a domain error; unmapped cancellations caused by a
 * competing transaction surface as ConflictError
 */
export async function transactWrite(
  items: TransactItem[],
  mapCancellation: (reasons: CancellationReason[]) => Error | undefined = () => undefined
): Promise<void> {
  try {
    await withRetry(() =>
      dynamoClient.send(
        new TransactWriteCommand({
          TransactItems: items,
        })
      )
    );
  } catch (error) {
    const reasons = getCancellationReasons(error);
    if (reasons) {
      const mapped = mapCancellation(reasons);
      if (mapped) {
        throw mapped;
      }
      if (reasons.some((reason) => reason.Code === 'TransactionConflict')) {
        throw new ConflictError('Concurrent modification detected, please retry');
      }
    }
    return handleDynamoDBError(error);
  }
}

/**
 * Generate timestamps
 */
export function getCurrentTimestamp(): string {
  return new Date().toISOString();
}

/**
 * Build update expression from object
 * Undefined and null values are removed from the item
 */
export function buildUpdateExpression(updates: Record<string, unknown>): {
  UpdateExpression: string;
  ExpressionAttributeNames: Record<string, string>;
  ExpressionAttributeValues: Record<string, unknown> | undefined;
} {
  const attributeNames: Record<string, string> = {};
  const attributeValues: Record<string, unknown> = {};
  const setParts: string[] = [];
  const removeParts: string[] = [];

  Object.entries(updates).forEach(([key, value], index) => {
    const nameKey = `#attr${index}`;
    attributeNames[nameKey] = key;

    if (value === undefined || value === null) {
      removeParts.push(nameKey);
      return;
    }

    const valueKey = `:val${index}`;
    attributeValues[valueKey] = value;
    setParts.push(`${nameKey} = ${valueKey}`);
  });

  const clauses: string[] = [];
  if (setParts.length > 0) clauses.push(`SET ${setParts.join(', ')}`);
  if (removeParts.length > 0) clauses.push(`REMOVE ${removeParts.join(', ')}`);

  return {
    UpdateExpression: clauses.join(' '),
    ExpressionAttributeNames: attributeNames,
    ExpressionAttributeValues: setParts.length > 0 ? attributeValues : undefined,
  };
}

export const DEFAULT_PAGE_LIMIT = 20;
export const MAX_PAGE_LIMIT = 100;

/**
 * Pagination helper: slice a fully filtered and sorted list
 */
export function buildPage<T>(items: T[], options: PageOptions = {}): PageResult<T> {
  const skip = options.skip ?? 0;
  const limit = Math.min(options.limit ?? DEFAULT_PAGE_LIMIT, MAX_PAGE_LIMIT);

  return {
    items: items.slice(skip, skip + limit),
    total: items.length,
    skip,
    limit,
    hasMore: skip + limit < items.length,
  };
}

/**
 * Scan every page of a table
 */
export async function scanAll(input: ScanCommandInput): Promise<Record<string, unknown>[]> {
  const items: Record<string, unknown>[] = [];
  let exclusiveStartKey: ScanCommandInput['ExclusiveStartKey'];

  do {
    const response = await withRetry(() =>
      dynamoClient.send(new ScanCommand({ ...input, ExclusiveStartKey: exclusiveStartKey }))
    );
    items.push(...(response.Items || []));
    exclusiveStartKey = response.LastEvaluatedKey;
  } while (exclusiveStartKey);

  return items;
}

/**
 * Query every page of a key condition
 */
export async function queryAll(input: QueryCommandInput): Promise<Record<string, unknown>[]> {
  const items: Record<string, unknown>[] = [];
  let exclusiveStartKey: QueryCommandInput['ExclusiveStartKey'];

  do {
    const response = await withRetry(() =>
      dynamoClient.send(new QueryCommand({ ...input, ExclusiveStartKey: exclusiveStartKey }))
    );
    items.push(...(response.Items || []));
    exclusiveStartKey = response.LastEvaluatedKey;
  } while (exclusiveStartKey);

  return items;
}

/**
 * Count items in a table
 */
export async function countItems(tableName: string): Promise<number> {
  let total = 0;
  let exclusiveStartKey: ScanCommandInput['ExclusiveStartKey'];

  do {
    const response = await dynamoClient.send(
      new ScanCommand({ TableName: tableName, Select: 'COUNT', ExclusiveStartKey: exclusiveStartKey })
    );
    total += response.Count ?? 0;
    exclusiveStartKey = response.LastEvaluatedKey;
  } while (exclusiveStartKey);

  return total;
}

/**
 * Delete every item of a table, 25 keys per batch
 */
export async function clearTable(tableName: string, keyAttributes: string[]): Promise<number> {
  const items = await scanAll({
    TableName: tableName,
    ProjectionExpression: keyAttributes.map((_, index) => `#k${index}`).join(', '),
    ExpressionAttributeNames: Object.fromEntries(keyAttributes.map((attr, index) => [`#k${index}`, attr])),
  });

  for (let start = 0; start < items.length; start += 25) {
    const batch = items.slice(start, start + 25);
    await withRetry(() =>
      dynamoClient.send(
        new BatchWriteCommand({
          RequestItems: {
            [tableName]: batch.map((key) => ({ DeleteRequest: { Key: key } })),
          },
        })
      )
    );
  }

  return items.length;
}

/**
 * Unique-value guards
 * A guard item's existence reserves a value (sku, email, ...) for one owner
 */
export function uniqueKey(scope: string, value: string): string {
  return `${scope}#${value.trim().toLowerCase()}`;
}

export function putUniqueGuard(scope: string, value: string, ownerId: number): TransactItem {
  return {
    Put: {
      TableName: getTableName('uniqueKeys'),
      Item: { PK: uniqueKey(scope, value), ownerId, createdAt: getCurrentTimestamp() },
      ConditionExpression: 'attribute_not_exists(PK)',
    },
  };
}

export function deleteUniqueGuard(scope: string, value: string): TransactItem {
  return {
    Delete: {
      TableName: getTableName('uniqueKeys'),
      Key: { PK: uniqueKey(scope, value) },
    },
  };
}
