import { UpdateCommand } from '@aws-sdk/lib-dynamodb';
import {
  dynamoClient,
  handleDynamoDBError,
  withRetry,
  getCurrentTimestamp,
} from '../utils/dynamodb-client';
import { getTableName } from '../utils/config';

export type CounterName = 'users' | 'categories' | 'products' | 'orders';

/**
 * Atomic id sequences, one item per entity
 */
export class CounterRepository {
  private tableName: string;

  constructor() {
    this.tableName = getTableName('counters');
  }

  async next(counter: CounterName): Promise<number> {
    try {
      const response = await withRetry(() =>
        dynamoClient.send(
          new UpdateCommand({
            TableName: this.tableName,
            Key: { PK: counter },
            UpdateExpression: 'ADD currentValue :one SET updatedAt = :now',
            ExpressionAttributeValues: {
              ':one': 1,
              ':now': getCurrentTimestamp(),
            },
            ReturnValues: 'UPDATED_NEW',
          })
        )
      );

      const value = response.Attributes?.currentValue;
      if (typeof value !== 'number') {
        throw new Error(`Counter ${counter} returned no value`);
      }
      return value;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }
}
