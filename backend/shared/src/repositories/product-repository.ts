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
import {
  Product,
  ProductFilter,
  ProductSortField,
  ProductStore,
  DynamoDBProductItem,
} from '../types';
import { CounterRepository } from './counter-repository';

const SKU_SCOPE = 'sku';
const BATCH_GET_LIMIT = 100;

function toProduct(item: object): Product {
  const { PK, ...product } = item as DynamoDBProductItem;
  return product;
}

function compareBy(field: ProductSortField): (a: Product, b: Product) => number {
  switch (field) {
    case 'name':
      return (a, b) => a.name.localeCompare(b.name);
    case 'createdAt':
      return (a, b) => a.createdAt.localeCompare(b.createdAt);
    case 'price':
      return (a, b) => a.price - b.price;
    case 'stock':
      return (a, b) => a.stock - b.stock;
  }
}

export class ProductRepository implements ProductStore {
  private tableName: string;

  constructor(private counters: CounterRepository = new CounterRepository()) {
    this.tableName = getTableName('products');
  }

  async nextId(): Promise<number> {
    return this.counters.next('products');
  }

  /**
   * Create a new product and reserve its SKU
   */
  async create(product: Omit<Product, 'createdAt' | 'updatedAt'>): Promise<Product> {
    const now = getCurrentTimestamp();
    const newProduct: Product = {
      ...product,
      createdAt: now,
      updatedAt: now,
    };

    const item: DynamoDBProductItem = { PK: newProduct.id, ...newProduct };

    await transactWrite(
      [
        {
          Put: {
            TableName: this.tableName,
            Item: item,
            ConditionExpression: 'attribute_not_exists(PK)',
          },
        },
        putUniqueGuard(SKU_SCOPE, newProduct.sku, newProduct.id),
      ],
      (reasons) => (failedAt(reasons, 1) ? new ConflictError('SKU already exists') : undefined)
    );

    return newProduct;
  }

  /**
   * Get product by ID
   */
  async getById(id: number): Promise<Product | null> {
    try {
      const response = await dynamoClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { PK: id },
          ConsistentRead: true,
        })
      );

      return response.Item ? toProduct(response.Item) : null;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Get multiple products by IDs (consistent snapshot of price and stock)
   */
  async getByIds(ids: number[]): Promise<Product[]> {
    const uniqueIds = [...new Set(ids)];
    const products: Product[] = [];

    try {
      for (let start = 0; start < uniqueIds.length; start += BATCH_GET_LIMIT) {
        const chunk = uniqueIds.slice(start, start + BATCH_GET_LIMIT);
        const response = await dynamoClient.send(
          new BatchGetCommand({
            RequestItems: {
              [this.tableName]: {
                Keys: chunk.map((id) => ({ PK: id })),
                ConsistentRead: true,
              },
            },
          })
        );

        const items = response.Responses?.[this.tableName] || [];
        products.push(...items.map(toProduct));
      }

      return products;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * List products; range and flag filters run in DynamoDB, text search and
   * sorting run on the scanned result
   */
  async list(filter: ProductFilter = {}): Promise<Product[]> {
    const conditions: string[] = [];
    const values: Record<string, unknown> = {};

    if (filter.isActive !== undefined) {
      conditions.push('isActive = :isActive');
      values[':isActive'] = filter.isActive;
    }
    if (filter.categoryId !== undefined) {
      conditions.push('categoryId = :categoryId');
      values[':categoryId'] = filter.categoryId;
    }
    if (filter.minPrice !== undefined) {
      conditions.push('price >= :minPrice');
      values[':minPrice'] = filter.minPrice;
    }
    if (filter.maxPrice !== undefined) {
      conditions.push('price <= :maxPrice');
      values[':maxPrice'] = filter.maxPrice;
    }
    if (filter.inStock !== undefined) {
      conditions.push(filter.inStock ? 'stock > :zero' : 'stock = :zero');
      values[':zero'] = 0;
    }

    try {
      const items = await scanAll({
        TableName: this.tableName,
        ...(conditions.length > 0 && {
          FilterExpression: conditions.join(' AND '),
          ExpressionAttributeValues: values,
        }),
      });

      const search = filter.search?.toLowerCase();
      const products = items
        .map(toProduct)
        .filter(
          (product) =>
            !search ||
            product.name.toLowerCase().includes(search) ||
            product.sku.toLowerCase().includes(search)
        );

      const compare = compareBy(filter.sortBy ?? 'createdAt');
      const direction = filter.sortOrder === 'desc' ? -1 : 1;
      const byId = (a: Product, b: Product) => a.id - b.id;

      return products.sort((a, b) =>
        filter.sortBy ? direction * compare(a, b) || byId(a, b) : byId(a, b)
      );
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Update product; changing the SKU moves its guard item
   */
  async update(
    current: Product,
    updates: Partial<Omit<Product, 'id' | 'createdAt'>>
  ): Promise<Product> {
    const updatedAt = getCurrentTimestamp();
    const { UpdateExpression, ExpressionAttributeNames, ExpressionAttributeValues } =
      buildUpdateExpression({ ...updates, updatedAt });

    const guardItems: TransactItem[] = [];
    if (updates.sku !== undefined && uniqueKey(SKU_SCOPE, updates.sku) !== uniqueKey(SKU_SCOPE, current.sku)) {
      guardItems.push(deleteUniqueGuard(SKU_SCOPE, current.sku), putUniqueGuard(SKU_SCOPE, updates.sku, current.id));
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
        if (failedAt(reasons, 0)) return new NotFoundError('Product', current.id);
        if (failedAt(reasons, 2)) return new ConflictError('SKU already exists');
        return undefined;
      }
    );

    const updated = await this.getById(current.id);
    if (!updated) {
      throw new NotFoundError('Product', current.id);
    }
    return updated;
  }

  /**
   * Delete product and release its SKU; existing orders keep their snapshot
   */
  async delete(product: Product): Promise<void> {
    await transactWrite(
      [
        {
          Delete: {
            TableName: this.tableName,
            Key: { PK: product.id },
            ConditionExpression: 'attribute_exists(PK)',
          },
        },
        deleteUniqueGuard(SKU_SCOPE, product.sku),
      ],
      (reasons) => (failedAt(reasons, 0) ? new NotFoundError('Product', product.id) : undefined)
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
