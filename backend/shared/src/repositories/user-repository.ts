import { GetCommand } from '@aws-sdk/lib-dynamodb';
import {
  dynamoClient,
  handleDynamoDBError,
  getCurrentTimestamp,
  buildUpdateExpression,
  scanAll,
  countItems,
  transactWrite,
  failedAt,
  putUniqueGuard,
  deleteUniqueGuard,
  uniqueKey,
  TransactItem,
} from '../utils/dynamodb-client';
import { getTableName } from '../utils/config';
import { ConflictError, NotFoundError } from '../utils/errors';
import { User, UserFilter, UserStore, DynamoDBUserItem } from '../types';
import { CounterRepository } from './counter-repository';

const USERNAME_SCOPE = 'username';
const EMAIL_SCOPE = 'email';

function toUser(item: object): User {
  const { PK, ...user } = item as DynamoDBUserItem;
  return user;
}

export class UserRepository implements UserStore {
  private tableName: string;
  private uniqueKeysTable: string;

  constructor(private counters: CounterRepository = new CounterRepository()) {
    this.tableName = getTableName('users');
    this.uniqueKeysTable = getTableName('uniqueKeys');
  }

  async nextId(): Promise<number> {
    return this.counters.next('users');
  }

  /**
   * Create a user and reserve its username and email
   */
  async create(user: Omit<User, 'createdAt' | 'updatedAt'>): Promise<User> {
    const now = getCurrentTimestamp();
    const newUser: User = {
      ...user,
      createdAt: now,
      updatedAt: now,
    };

    const item: DynamoDBUserItem = { PK: newUser.id, ...newUser };

    await transactWrite(
      [
        {
          Put: {
            TableName: this.tableName,
            Item: item,
            ConditionExpression: 'attribute_not_exists(PK)',
          },
        },
        putUniqueGuard(USERNAME_SCOPE, newUser.username, newUser.id),
        putUniqueGuard(EMAIL_SCOPE, newUser.email, newUser.id),
      ],
      (reasons) => {
        if (failedAt(reasons, 1)) return new ConflictError('Username already taken');
        if (failedAt(reasons, 2)) return new ConflictError('Email already registered');
        return undefined;
      }
    );

    return newUser;
  }

  async getById(id: number): Promise<User | null> {
    try {
      const response = await dynamoClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { PK: id },
          ConsistentRead: true,
        })
      );

      if (!response.Item) {
        return null;
      }

      return toUser(response.Item);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Resolve a username through its guard item
   */
  async getByUsername(username: string): Promise<User | null> {
    try {
      const response = await dynamoClient.send(
        new GetCommand({
          TableName: this.uniqueKeysTable,
          Key: { PK: uniqueKey(USERNAME_SCOPE, username) },
        })
      );

      const ownerId = response.Item?.ownerId;
      if (typeof ownerId !== 'number') {
        return null;
      }

      return this.getById(ownerId);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  async list(filter: UserFilter = {}): Promise<User[]> {
    const conditions: string[] = [];
    const names: Record<string, string> = {};
    const values: Record<string, unknown> = {};

    if (filter.role !== undefined) {
      conditions.push('#role = :role');
      names['#role'] = 'role';
      values[':role'] = filter.role;
    }
    if (filter.isActive !== undefined) {
      conditions.push('isActive = :isActive');
      values[':isActive'] = filter.isActive;
    }

    try {
      const items = await scanAll({
        TableName: this.tableName,
        ...(conditions.length > 0 && {
          FilterExpression: conditions.join(' AND '),
          ExpressionAttributeValues: values,
        }),
        ...(Object.keys(names).length > 0 && { ExpressionAttributeNames: names }),
      });

      return items.map(toUser).sort((a, b) => a.id - b.id);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Update a user; changing username or email moves its guard item
   */
  async update(
    current: User,
    updates: Partial<Omit<User, 'id' | 'createdAt'>>
  ): Promise<User> {
    const { UpdateExpression, ExpressionAttributeNames, ExpressionAttributeValues } =
      buildUpdateExpression({ ...updates, updatedAt: getCurrentTimestamp() });

    // Conflict message per guard item, undefined for releases
    const guardItems: TransactItem[] = [];
    const guardMessages: (string | undefined)[] = [];

    if (updates.username !== undefined && uniqueKey(USERNAME_SCOPE, updates.username) !== uniqueKey(USERNAME_SCOPE, current.username)) {
      guardItems.push(deleteUniqueGuard(USERNAME_SCOPE, current.username), putUniqueGuard(USERNAME_SCOPE, updates.username, current.id));
      guardMessages.push(undefined, 'Username already in use');
    }
    if (updates.email !== undefined && uniqueKey(EMAIL_SCOPE, updates.email) !== uniqueKey(EMAIL_SCOPE, current.email)) {
      guardItems.push(deleteUniqueGuard(EMAIL_SCOPE, current.email), putUniqueGuard(EMAIL_SCOPE, updates.email, current.id));
      guardMessages.push(undefined, 'Email already in use');
    }

    await transactWrite(
      [
        {
          Update: {
            TableName: this.tableName,
            Key: { PK: current.id },
            UpdateExpression,
            ExpressionAttributeNames,
            ExpressionAttributeValues,
            ConditionExpression: 'attribute_exists(PK)',
          },
        },
        ...guardItems,
      ],
      (reasons) => {
        if (failedAt(reasons, 0)) return new NotFoundError('User', current.id);
        const message = guardMessages.find((candidate, index) => candidate !== undefined && failedAt(reasons, index + 1));
        return message ? new ConflictError(message) : undefined;
      }
    );

    const updated = await this.getById(current.id);
    if (!updated) {
      throw new NotFoundError('User', current.id);
    }
    return updated;
  }

  /**
   * Delete a user and release its guard items
   */
  async delete(user: User): Promise<void> {
    await transactWrite(
      [
        {
          Delete: {
            TableName: this.tableName,
            Key: { PK: user.id },
            ConditionExpression: 'attribute_exists(PK)',
          },
        },
        deleteUniqueGuard(USERNAME_SCOPE, user.username),
        deleteUniqueGuard(EMAIL_SCOPE, user.email),
      ],
      (reasons) => (failedAt(reasons, 0) ? new NotFoundError('User', user.id) : undefined)
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
