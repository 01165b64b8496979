import {
  Action,
  Category,
  CategoryStore,
  PageOptions,
  PageResult,
  Principal,
  Product,
  ProductFilter,
  ProductStore,
  ProductView,
  ResourceType,
} from '../types';
import { ProductRepository } from '../repositories/product-repository';
import { CategoryRepository } from '../repositories/category-repository';
import { assertAuthorized } from '../policy/policy-engine';
import { buildPage } from '../utils/dynamodb-client';
import { NotFoundError } from '../utils/errors';
import { ProductInput, ProductUpdateInput, ValidationError } from '../utils/validators';
import { logger } from '../utils/logger';

export class ProductService {
  constructor(
    private products: ProductStore = new ProductRepository(),
    private categories: CategoryStore = new CategoryRepository()
  ) {}

  async list(principal: Principal, filter: ProductFilter = {}, page: PageOptions = {}): Promise<PageResult<ProductView>> {
    assertAuthorized(principal, Action.READ, ResourceType.PRODUCT);
    const result = buildPage(await this.products.list(filter), page);
    return { ...result, items: await this.toViews(result.items) };
  }

  async get(principal: Principal, id: number): Promise<ProductView> {
    assertAuthorized(principal, Action.READ, ResourceType.PRODUCT);
    const [view] = await this.toViews([await this.require(id)]);
    return view;
  }

  async create(principal: Principal, input: ProductInput): Promise<ProductView> {
    assertAuthorized(principal, Action.CREATE, ResourceType.PRODUCT);

    const category = input.categoryId !== undefined ? await this.requireCategory(input.categoryId) : null;

    const product = await this.products.create({
      id: await this.products.nextId(),
      sku: input.sku,
      name: input.name,
      description: input.description,
      price: input.price,
      stock: input.stock,
      categoryId: input.categoryId,
      isActive: true,
    });

    logger.info('Product created', { productId: product.id, sku: product.sku });
    return { ...product, category };
  }

  async update(principal: Principal, id: number, input: ProductUpdateInput): Promise<ProductView> {
    assertAuthorized(principal, Action.UPDATE, ResourceType.PRODUCT);
    const current = await this.require(id);

    if (Object.keys(input).length === 0) {
      const [view] = await this.toViews([current]);
      return view;
    }

    const { categoryId, ...fields } = input;
    let updates: Partial<Omit<Product, 'id' | 'createdAt'>> = fields;
    if (categoryId === null) {
      // Present-but-undefined removes the attribute
      updates = { ...fields, categoryId: undefined };
    } else if (categoryId !== undefined) {
      await this.requireCategory(categoryId);
      updates = { ...fields, categoryId };
    }

    const updated = await this.products.update(current, updates);
    logger.info('Product updated', { productId: id, fields: Object.keys(input) });

    const [view] = await this.toViews([updated]);
    return view;
  }

  /**
   * Orders keep their item snapshot of the deleted product
   */
  async delete(principal: Principal, id: number): Promise<void> {
    assertAuthorized(principal, Action.DELETE, ResourceType.PRODUCT);
    const product = await this.require(id);
    await this.products.delete(product);
    logger.info('Product deleted', { productId: id, sku: product.sku });
  }

  private async require(id: number): Promise<Product> {
    const product = await this.products.getById(id);
    if (!product) {
      throw new NotFoundError('Product', id);
    }
    return product;
  }

  private async requireCategory(categoryId: number): Promise<Category> {
    const category = await this.categories.getById(categoryId);
    if (!category) {
      throw new ValidationError('Category not found', 'categoryId', categoryId);
    }
    return category;
  }

  /**
   * Resolve categories; a dangling categoryId resolves to null
   */
  private async toViews(products: Product[]): Promise<ProductView[]> {
    const categoryIds = products.flatMap((product) =>
      product.categoryId !== undefined ? [product.categoryId] : []
    );
    const categories = new Map(
      (await this.categories.getByIds(categoryIds)).map((category) => [category.id, category])
    );

    return products.map((product) => ({
      ...product,
      category: product.categoryId !== undefined ? categories.get(product.categoryId) ?? null : null,
    }));
  }
}
