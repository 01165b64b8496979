import { GetCommand, BatchGetCommand } from '@aws-sdk/lib-dynamodb';
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
import { Category, CategoryFilter, CategoryStore, DynamoDBCategoryItem } from '../types';
import { CounterRepository } from './counter-repository';

const NAME_SCOPE = 'category-name';

function toCategory(item: object): Category {
  const { PK, ...category } = item as DynamoDBCategoryItem;
  return category;
}

export class CategoryRepository implements CategoryStore {
  private tableName: string;

  constructor(private counters: CounterRepository = new CounterRepository()) {
    this.tableName = getTableName('categories');
  }

  async nextId(): Promise<number> {
    return this.counters.next('categories');
  }

  async create(category: Omit<Category, 'createdAt'>): Promise<Category> {
    const newCategory: Category = {
      ...category,
      createdAt: getCurrentTimestamp(),
    };

    const item: DynamoDBCategoryItem = { PK: newCategory.id, ...newCategory };

    await transactWrite(
      [
        {
          Put: {
            TableName: this.tableName,
            Item: item,
            ConditionExpression: 'attribute_not_exists(PK)',
          },
        },
        putUniqueGuard(NAME_SCOPE, newCategory.name, newCategory.id),
      ],
      (reasons) => (failedAt(reasons, 1) ? new ConflictError('Category name already exists') : undefined)
    );

    return newCategory;
  }

  async getById(id: number): Promise<Category | null> {
    try {
      const response = await dynamoClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { PK: id },
          ConsistentRead: true,
        })
      );

      return response.Item ? toCategory(response.Item) : null;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  async getByIds(ids: number[]): Promise<Category[]> {
    const uniqueIds = [...new Set(ids)];
    if (uniqueIds.length === 0) {
      return [];
    }

    try {
      const response = await dynamoClient.send(
        new BatchGetCommand({
          RequestItems: {
            [this.tableName]: {
              Keys: uniqueIds.map((id) => ({ PK: id })),
            },
          },
        })
      );

      const items = response.Responses?.[this.tableName] || [];
      return items.map(toCategory);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  async list(filter: CategoryFilter = {}): Promise<Category[]> {
    const conditions: string[] = [];
    const values: Record<string, unknown> = {};

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
      });

      // contains() is case-sensitive, so search runs here
      const search = filter.search?.toLowerCase();
      return items
        .map(toCategory)
        .filter((category) => !search || category.name.toLowerCase().includes(search))
        .sort((a, b) => a.id - b.id);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  async update(
    current: Category,
    updates: Partial<Omit<Category, 'id' | 'createdAt'>>
  ): Promise<Category> {
    const { UpdateExpression, ExpressionAttributeNames, ExpressionAttributeValues } =
      buildUpdateExpression(updates);

    const guardItems: TransactItem[] = [];
    if (updates.name !== undefined && uniqueKey(NAME_SCOPE, updates.name) !== uniqueKey(NAME_SCOPE, current.name)) {
      guardItems.push(deleteUniqueGuard(NAME_SCOPE, current.name), putUniqueGuard(NAME_SCOPE, updates.name, current.id));
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
        if (failedAt(reasons, 0)) return new NotFoundError('Category', current.id);
        if (failedAt(reasons, 2)) return new ConflictError('Category name already exists');
        return undefined;
      }
    );

    return { ...current, ...updates };
  }

  /**
   * Delete a category; its products keep their categoryId
   */
  async delete(category: Category): Promise<void> {
    await transactWrite(
      [
        {
          Delete: {
            TableName: this.tableName,
            Key: { PK: category.id },
            ConditionExpression: 'attribute_exists(PK)',
          },
        },
        deleteUniqueGuard(NAME_SCOPE, category.name),
      ],
      (reasons) => (failedAt(reasons, 0) ? new NotFoundError('Category', category.id) : undefined)
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
