import { GetCommand } from '@aws-sdk/lib-dynamodb';
import {
  dynamoClient,
  handleDynamoDBError,
  getCurrentTimestamp,
  buildUpdateExpression,
  scanAll,
  queryAll,
  countItems,
  transactWrite,
  failedAt,
  numberAttribute,
  putUniqueGuard,
  deleteUniqueGuard,
  TransactItem,
} from '../utils/dynamodb-client';
import { getTableName } from '../utils/config';
import { ConflictError, InsufficientStockError, NotFoundError } from '../utils/errors';
import {
  Order,
  OrderDetails,
  OrderEventType,
  OrderFilter,
  OrderStatus,
  OrderStore,
  StockChange,
  DynamoDBOrderItem,
} from '../types';
import { eventTypeFor } from '../policy/order-lifecycle';
import { CounterRepository } from './counter-repository';
import { buildEventItem } from './order-event-repository';

const ORDER_NUMBER_SCOPE = 'order-number';
const USER_INDEX = 'userId-createdAt-index';

function toOrder(item: object): Order {
  const { PK, ...order } = item as DynamoDBOrderItem;
  return order;
}

/**
 * Extra SET assignments for detail fields written alongside a status change
 */
function detailAssignments(details: OrderDetails): {
  clauses: string[];
  names: Record<string, string>;
  values: Record<string, unknown>;
} {
  const clauses: string[] = [];
  const names: Record<string, string> = {};
  const values: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(details)) {
    if (value === undefined) continue;
    clauses.push(`#${key} = :${key}`);
    names[`#${key}`] = key;
    values[`:${key}`] = value;
  }
  return { clauses, names, values };
}

function withDetails(payload: Record<string, unknown>, details: OrderDetails): Record<string, unknown> {
  return Object.keys(details).length > 0 ? { ...payload, details } : payload;
}

/**
 * Newest first, id as tie-breaker
 */
function byNewest(a: Order, b: Order): number {
  return b.createdAt.localeCompare(a.createdAt) || b.id - a.id;
}

export class OrderRepository implements OrderStore {
  private tableName: string;
  private productsTable: string;

  constructor(private counters: CounterRepository = new CounterRepository()) {
    this.tableName = getTableName('orders');
    this.productsTable = getTableName('products');
  }

  async nextId(): Promise<number> {
    return this.counters.next('orders');
  }

  private stockDecrement(change: StockChange, now: string): TransactItem {
    return {
      Update: {
        TableName: this.productsTable,
        Key: { PK: change.productId },
        UpdateExpression: 'SET #stock = #stock - :qty, updatedAt = :now',
        ConditionExpression:
          'attribute_exists(PK) AND #stock >= :qty AND #price = :price AND isActive = :true',
        ExpressionAttributeNames: { '#stock': 'stock', '#price': 'price' },
        ExpressionAttributeValues: {
          ':qty': change.quantity,
          ':price': change.expectedPrice,
          ':true': true,
          ':now': now,
        },
        ReturnValuesOnConditionCheckFailure: 'ALL_OLD',
      },
    };
  }

  private stockIncrement(change: StockChange, now: string): TransactItem {
    return {
      Update: {
        TableName: this.productsTable,
        Key: { PK: change.productId },
        UpdateExpression: 'SET #stock = #stock + :qty, updatedAt = :now',
        ConditionExpression: 'attribute_exists(PK)',
        ExpressionAttributeNames: { '#stock': 'stock' },
        ExpressionAttributeValues: {
          ':qty': change.quantity,
          ':now': now,
        },
      },
    };
  }

  /**
   * Create an order and take its stock in one transaction.
   *
   * Each decrement is conditioned on enough stock, an unchanged price and an
   * active product. A failed stock condition becomes InsufficientStockError;
   * any other failed condition is a ConflictError the caller may retry.
   */
  async createWithStock(
    order: Omit<Order, 'createdAt' | 'updatedAt'>,
    decrements: StockChange[],
    actorId: number
  ): Promise<Order> {
    const now = getCurrentTimestamp();
    const newOrder: Order = {
      ...order,
      createdAt: now,
      updatedAt: now,
    };

    const item: DynamoDBOrderItem = { PK: newOrder.id, ...newOrder };

    await transactWrite(
      [
        ...decrements.map((change) => this.stockDecrement(change, now)),
        {
          Put: {
            TableName: this.tableName,
            Item: item,
            ConditionExpression: 'attribute_not_exists(PK)',
          },
        },
        putUniqueGuard(ORDER_NUMBER_SCOPE, newOrder.orderNumber, newOrder.id),
        buildEventItem(
          newOrder.id,
          OrderEventType.ORDER_CREATED,
          { orderNumber: newOrder.orderNumber, totalAmount: newOrder.totalAmount, items: newOrder.items },
          actorId
        ),
      ],
      (reasons) => {
        for (const [index, change] of decrements.entries()) {
          if (!failedAt(reasons, index)) continue;

          // A deleted product has no old item and surfaces as a conflict
          const available = numberAttribute(reasons[index], 'stock');
          if (available !== undefined && available < change.quantity) {
            return new InsufficientStockError(change.productId, change.quantity, available);
          }
          return new ConflictError(`Product ${change.productId} changed while the order was placed`);
        }
        if (failedAt(reasons, decrements.length) || failedAt(reasons, decrements.length + 1)) {
          return new ConflictError('Order number already in use');
        }
        return undefined;
      }
    );

    return newOrder;
  }

  /**
   * Get order by ID
   */
  async getById(id: number): Promise<Order | null> {
    try {
      const response = await dynamoClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { PK: id },
          ConsistentRead: true,
        })
      );

      return response.Item ? toOrder(response.Item) : null;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * List orders, newest first. A user filter reads the user GSI instead of
   * scanning the table.
   */
  async list(filter: OrderFilter = {}): Promise<Order[]> {
    const statusFilter =
      filter.status !== undefined
        ? {
            FilterExpression: '#status = :status',
            ExpressionAttributeNames: { '#status': 'status' },
          }
        : {};

    try {
      const items =
        filter.userId !== undefined
          ? await queryAll({
              TableName: this.tableName,
              IndexName: USER_INDEX,
              KeyConditionExpression: 'userId = :userId',
              ExpressionAttributeValues: {
                ':userId': filter.userId,
                ...(filter.status !== undefined && { ':status': filter.status }),
              },
              ScanIndexForward: false,
              ...statusFilter,
            })
          : await scanAll({
              TableName: this.tableName,
              ConsistentRead: true,
              ...statusFilter,
              ...(filter.status !== undefined && {
                ExpressionAttributeValues: { ':status': filter.status },
              }),
            });

      return items.map(toOrder).sort(byNewest);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Move an order to a new status, conditioned on the status it was read with.
   * Detail fields given with the change land in the same write.
   */
  async updateStatus(order: Order, to: OrderStatus, actorId: number, details: OrderDetails = {}): Promise<Order> {
    const updatedAt = getCurrentTimestamp();
    const extra = detailAssignments(details);

    await transactWrite(
      [
        {
          Update: {
            TableName: this.tableName,
            Key: { PK: order.id },
            UpdateExpression: `SET ${['#status = :to', 'updatedAt = :now', ...extra.clauses].join(', ')}`,
            ConditionExpression: '#status = :from',
            ExpressionAttributeNames: { '#status': 'status', ...extra.names },
            ExpressionAttributeValues: {
              ':to': to,
              ':from': order.status,
              ':now': updatedAt,
              ...extra.values,
            },
          },
        },
        buildEventItem(order.id, eventTypeFor(to), withDetails({ from: order.status, to }, details), actorId),
      ],
      (reasons) =>
        failedAt(reasons, 0)
          ? new ConflictError(`Order ${order.id} was modified concurrently, please retry`)
          : undefined
    );

    return { ...order, ...details, status: to, updatedAt };
  }

  /**
   * Cancel an order and put its stock back in one transaction
   */
  async cancelWithStock(
    order: Order,
    restorations: StockChange[],
    actorId: number,
    details: OrderDetails = {}
  ): Promise<Order> {
    const updatedAt = getCurrentTimestamp();
    const extra = detailAssignments(details);

    await transactWrite(
      [
        {
          Update: {
            TableName: this.tableName,
            Key: { PK: order.id },
            UpdateExpression: `SET ${['#status = :cancelled', 'updatedAt = :now', ...extra.clauses].join(', ')}`,
            ConditionExpression: '#status = :pending',
            ExpressionAttributeNames: { '#status': 'status', ...extra.names },
            ExpressionAttributeValues: {
              ':cancelled': OrderStatus.CANCELLED,
              ':pending': OrderStatus.PENDING,
              ':now': updatedAt,
              ...extra.values,
            },
          },
        },
        ...restorations.map((change) => this.stockIncrement(change, updatedAt)),
        buildEventItem(
          order.id,
          OrderEventType.ORDER_CANCELLED,
          withDetails({ from: order.status, to: OrderStatus.CANCELLED, restored: restorations }, details),
          actorId
        ),
      ],
      (reasons) => {
        if (failedAt(reasons, 0)) {
          return new ConflictError(`Order ${order.id} was modified concurrently, please retry`);
        }
        const missing = restorations.find((_, index) => failedAt(reasons, index + 1));
        return missing
          ? new ConflictError(`Product ${missing.productId} was removed while the order was cancelled`)
          : undefined;
      }
    );

    return { ...order, ...details, status: OrderStatus.CANCELLED, updatedAt };
  }

  /**
   * Update shipping address and notes
   */
  async updateDetails(
    order: Order,
    updates: OrderDetails,
    actorId: number
  ): Promise<Order> {
    const updatedAt = getCurrentTimestamp();
    const { UpdateExpression, ExpressionAttributeNames, ExpressionAttributeValues } =
      buildUpdateExpression({ ...updates, updatedAt });

    await transactWrite(
      [
        {
          Update: {
            TableName: this.tableName,
            Key: { PK: order.id },
            UpdateExpression,
            ExpressionAttributeNames,
            ExpressionAttributeValues,
            ConditionExpression: 'attribute_exists(PK)',
          },
        },
        buildEventItem(order.id, OrderEventType.ORDER_UPDATED, { ...updates }, actorId),
      ],
      (reasons) => (failedAt(reasons, 0) ? new NotFoundError('Order', order.id) : undefined)
    );

    return { ...order, ...updates, updatedAt };
  }

  /**
   * Delete an order and release its order number. Stock is not restored and
   * the event log is kept.
   */
  async delete(order: Order): Promise<void> {
    await transactWrite(
      [
        {
          Delete: {
            TableName: this.tableName,
            Key: { PK: order.id },
            ConditionExpression: 'attribute_exists(PK)',
          },
        },
        deleteUniqueGuard(ORDER_NUMBER_SCOPE, order.orderNumber),
      ],
      (reasons) => (failedAt(reasons, 0) ? new NotFoundError('Order', order.id) : undefined)
    );
  }

  async count(): Promise<number> {
    try {
      return await countItems(this.tableName);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }
}
