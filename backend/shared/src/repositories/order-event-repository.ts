import { randomUUID } from 'crypto';
import { QueryCommand, QueryCommandInput } from '@aws-sdk/lib-dynamodb';
import {
  dynamoClient,
  handleDynamoDBError,
  getCurrentTimestamp,
  TransactItem,
} from '../utils/dynamodb-client';
import { getTableName } from '../utils/config';
import { OrderEvent, OrderEventType, OrderEventStore, DynamoDBOrderEventItem } from '../types';

function toOrderEvent(item: object): OrderEvent {
  const { PK, SK, ...event } = item as DynamoDBOrderEventItem;
  return event;
}

/**
 * Build the transaction item that appends an event to an order's log.
 * Events are written in the same transaction as the order change they record
 * and are never modified afterwards.
 */
export function buildEventItem(
  orderId: number,
  eventType: OrderEventType,
  payload: Record<string, unknown>,
  userId?: number
): TransactItem {
  const timestamp = getCurrentTimestamp();
  const eventId = randomUUID();

  const item: DynamoDBOrderEventItem = {
    PK: orderId,
    SK: `${timestamp}#${eventId}`, // Composite sort key for time-ordered retrieval
    eventId,
    orderId,
    eventType,
    timestamp,
    payload,
    userId,
  };

  return {
    Put: {
      TableName: getTableName('orderEvents'),
      Item: item,
    },
  };
}

export class OrderEventRepository implements OrderEventStore {
  private tableName: string;

  constructor() {
    this.tableName = getTableName('orderEvents');
  }

  /**
   * Get all events for an order (chronological order)
   */
  async getByOrderId(orderId: number): Promise<OrderEvent[]> {
    const events: OrderEvent[] = [];
    let exclusiveStartKey: QueryCommandInput['ExclusiveStartKey'];

    try {
      do {
        const response = await dynamoClient.send(
          new QueryCommand({
            TableName: this.tableName,
            KeyConditionExpression: 'PK = :orderId',
            ExpressionAttributeValues: {
              ':orderId': orderId,
            },
            ScanIndexForward: true,
            ExclusiveStartKey: exclusiveStartKey,
          })
        );

        events.push(...(response.Items || []).map(toOrderEvent));
        exclusiveStartKey = response.LastEvaluatedKey;
      } while (exclusiveStartKey);

      return events;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }
}
