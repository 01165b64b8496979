import seedData from '../data/seed-data.json';
import {
  CategoryStore,
  Order,
  OrderItem,
  OrderStore,
  OrderStatus,
  Product,
  ProductStore,
  User,
  UserRole,
  UserStore,
} from '../types';
import { UserRepository } from '../repositories/user-repository';
import { CategoryRepository } from '../repositories/category-repository';
import { ProductRepository } from '../repositories/product-repository';
import { OrderRepository } from '../repositories/order-repository';
import { clearTable } from '../utils/dynamodb-client';
import { getTableName, TABLE_ENV_VARS, TableKey } from '../utils/config';
import { validateEnum } from '../utils/validators';
import { logger } from '../utils/logger';
import { hashPassword } from './auth-service';
import { generateOrderNumber } from './order-service';

export interface SeedResult {
  usersCreated: number;
  categoriesCreated: number;
  productsCreated: number;
  ordersCreated: number;
}

/**
 * Empty every table, guard items, counters and event log included
 */
export async function clearAllTables(): Promise<void> {
  const tables = Object.keys(TABLE_ENV_VARS).filter((key): key is TableKey => key in TABLE_ENV_VARS);

  for (const table of tables) {
    const removed = await clearTable(getTableName(table), table === 'orderEvents' ? ['PK', 'SK'] : ['PK']);
    logger.debug('Table cleared', { table, removed });
  }
}

/**
 * Seed Service
 * Loads the fixed sandbox dataset from data/seed-data.json
 */
export class SeedService {
  constructor(
    private users: UserStore = new UserRepository(),
    private categories: CategoryStore = new CategoryRepository(),
    private products: ProductStore = new ProductRepository(),
    private orders: OrderStore = new OrderRepository(),
    private clearAll: () => Promise<void> = clearAllTables
  ) {}

  async reset(): Promise<SeedResult> {
    await this.clearAll();
    return this.seed();
  }

  /**
   * Seed only when no users exist; returns null when data is already present
   */
  async seedIfEmpty(): Promise<SeedResult | null> {
    if ((await this.users.count()) > 0) {
      return null;
    }
    return this.seed();
  }

  async seed(): Promise<SeedResult> {
    const users = new Map<string, User>();
    for (const entry of seedData.users) {
      const role: unknown = entry.role;
      validateEnum(role, UserRole, 'role');

      const user = await this.users.create({
        id: await this.users.nextId(),
        email: entry.email,
        username: entry.username,
        fullName: entry.fullName,
        passwordHash: await hashPassword(entry.password),
        role,
        isActive: true,
      });
      users.set(user.username, user);
    }

    const categoryIds = new Map<string, number>();
    for (const entry of seedData.categories) {
      const category = await this.categories.create({
        id: await this.categories.nextId(),
        name: entry.name,
        description: entry.description,
        isActive: true,
      });
      categoryIds.set(category.name, category.id);
    }

    const products = new Map<string, Product>();
    for (const [index, entry] of seedData.products.entries()) {
      const product = await this.products.create({
        id: await this.products.nextId(),
        sku: `SKU-${String(index + 1).padStart(4, '0')}`,
        name: entry.name,
        description: entry.description,
        price: entry.price,
        stock: entry.stock,
        categoryId: categoryIds.get(entry.category),
        isActive: true,
      });
      products.set(product.sku, product);
    }

    let ordersCreated = 0;
    for (const entry of seedData.orders) {
      const status: unknown = entry.status;
      validateEnum(status, OrderStatus, 'status');

      const owner = users.get(entry.user);
      if (!owner) {
        throw new Error(`Seed order references unknown user ${entry.user}`);
      }

      const items: OrderItem[] = entry.items.map((item) => {
        const product = products.get(item.sku);
        if (!product) {
          throw new Error(`Seed order references unknown product ${item.sku}`);
        }
        return {
          productId: product.id,
          productName: product.name,
          sku: product.sku,
          quantity: item.quantity,
          unitPrice: product.price,
          lineTotal: product.price * item.quantity,
        };
      });

      const order: Omit<Order, 'createdAt' | 'updatedAt'> = {
        id: await this.orders.nextId(),
        orderNumber: generateOrderNumber(),
        userId: owner.id,
        status,
        totalAmount: items.reduce((sum, item) => sum + item.lineTotal, 0),
        items,
        shippingAddress: entry.shippingAddress,
        notes: 'notes' in entry ? entry.notes : undefined,
      };

      // Seeded stock levels already account for these orders
      await this.orders.createWithStock(order, [], owner.id);
      ordersCreated++;
    }

    const result: SeedResult = {
      usersCreated: users.size,
      categoriesCreated: categoryIds.size,
      productsCreated: products.size,
      ordersCreated,
    };
    logger.info('Database seeded', { ...result });
    return result;
  }
}
