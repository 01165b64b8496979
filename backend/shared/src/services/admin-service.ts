import { Action, CategoryStore, OrderStore, Principal, ProductStore, ResourceType, UserStore } from '../types';
import { UserRepository } from '../repositories/user-repository';
import { CategoryRepository } from '../repositories/category-repository';
import { ProductRepository } from '../repositories/product-repository';
import { OrderRepository } from '../repositories/order-repository';
import { assertAuthorized } from '../policy/policy-engine';
import { logger } from '../utils/logger';
import { SeedResult, SeedService } from './seed-service';

export interface ResetResult extends SeedResult {
  message: string;
}

export interface Stats {
  users: number;
  categories: number;
  products: number;
  orders: number;
}

/**
 * Admin Service
 * Bulk reset and table statistics, both gated on the admin action
 */
export class AdminService {
  constructor(
    private users: UserStore = new UserRepository(),
    private categories: CategoryStore = new CategoryRepository(),
    private products: ProductStore = new ProductRepository(),
    private orders: OrderStore = new OrderRepository(),
    private seeder: SeedService = new SeedService(users, categories, products, orders)
  ) {}

  async reset(principal: Principal): Promise<ResetResult> {
    assertAuthorized(principal, Action.ADMIN, ResourceType.ADMIN_OPS);

    logger.warn('Resetting database', { requestedBy: principal.id });
    const result = await this.seeder.reset();

    return { message: 'Database reset successfully', ...result };
  }

  async stats(principal: Principal): Promise<Stats> {
    assertAuthorized(principal, Action.ADMIN, ResourceType.ADMIN_OPS);

    const [users, categories, products, orders] = await Promise.all([
      this.users.count(),
      this.categories.count(),
      this.products.count(),
      this.orders.count(),
    ]);

    return { users, categories, products, orders };
  }
}
