import {
  Action,
  Category,
  CategoryFilter,
  CategoryStore,
  PageOptions,
  PageResult,
  Principal,
  ResourceType,
} from '../types';
import { CategoryRepository } from '../repositories/category-repository';
import { assertAuthorized } from '../policy/policy-engine';
import { buildPage } from '../utils/dynamodb-client';
import { NotFoundError } from '../utils/errors';
import { CategoryInput, CategoryUpdateInput } from '../utils/validators';
import { logger } from '../utils/logger';

export class CategoryService {
  constructor(private categories: CategoryStore = new CategoryRepository()) {}

  async list(principal: Principal, filter: CategoryFilter = {}, page: PageOptions = {}): Promise<PageResult<Category>> {
    assertAuthorized(principal, Action.READ, ResourceType.CATEGORY);
    return buildPage(await this.categories.list(filter), page);
  }

  async get(principal: Principal, id: number): Promise<Category> {
    assertAuthorized(principal, Action.READ, ResourceType.CATEGORY);
    return this.require(id);
  }

  async create(principal: Principal, input: CategoryInput): Promise<Category> {
    assertAuthorized(principal, Action.CREATE, ResourceType.CATEGORY);

    const category = await this.categories.create({
      id: await this.categories.nextId(),
      name: input.name,
      description: input.description,
      isActive: true,
    });

    logger.info('Category created', { categoryId: category.id, name: category.name });
    return category;
  }

  async update(principal: Principal, id: number, input: CategoryUpdateInput): Promise<Category> {
    assertAuthorized(principal, Action.UPDATE, ResourceType.CATEGORY);
    const current = await this.require(id);

    if (Object.keys(input).length === 0) {
      return current;
    }

    const updated = await this.categories.update(current, input);
    logger.info('Category updated', { categoryId: id, fields: Object.keys(input) });
    return updated;
  }

  /**
   * Products in the category keep their categoryId
   */
  async delete(principal: Principal, id: number): Promise<void> {
    assertAuthorized(principal, Action.DELETE, ResourceType.CATEGORY);
    const category = await this.require(id);
    await this.categories.delete(category);
    logger.info('Category deleted', { categoryId: id });
  }

  private async require(id: number): Promise<Category> {
    const category = await this.categories.getById(id);
    if (!category) {
      throw new NotFoundError('Category', id);
    }
    return category;
  }
}
