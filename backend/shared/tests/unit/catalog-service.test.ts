import { CategoryService } from '../../src/services/category-service';
import { ProductService } from '../../src/services/product-service';
import { ConflictError, DeniedError, NotFoundError } from '../../src/utils/errors';
import { ValidationError } from '../../src/utils/validators';
import { InMemoryCategoryStore, InMemoryProductStore } from '../fixtures/in-memory-stores';
import { ADMIN, TESTER, VIEWER } from '../fixtures/test-data';

describe('CategoryService', () => {
  let categories: InMemoryCategoryStore;
  let service: CategoryService;

  beforeEach(() => {
    categories = new InMemoryCategoryStore();
    service = new CategoryService(categories);
  });

  it('should create active categories with sequential ids', async () => {
    const first = await service.create(TESTER, { name: 'Books' });
    const second = await service.create(ADMIN, { name: 'Garden', description: 'Outdoor' });

    expect(first).toMatchObject({ id: 1, name: 'Books', isActive: true });
    expect(second).toMatchObject({ id: 2, description: 'Outdoor' });
  });

  it('should reject a duplicate name regardless of case', async () => {
    await service.create(TESTER, { name: 'Books' });
    await expect(service.create(TESTER, { name: 'books' })).rejects.toThrow(
      new ConflictError('Category name already exists')
    );
  });

  it('should filter by active flag and search', async () => {
    await service.create(TESTER, { name: 'Books' });
    const toys = await service.create(TESTER, { name: 'Toys' });
    await service.create(TESTER, { name: 'Board Games' });
    await service.update(TESTER, toys.id, { isActive: false });

    expect((await service.list(VIEWER, { isActive: false })).items.map((category) => category.name)).toEqual(['Toys']);
    expect((await service.list(VIEWER, { search: 'bo' })).items.map((category) => category.name)).toEqual([
      'Books',
      'Board Games',
    ]);
  });

  it('should deny viewers writes', async () => {
    await expect(service.create(VIEWER, { name: 'Books' })).rejects.toThrow(DeniedError);
  });

  it('should report a missing category', async () => {
    await expect(service.get(VIEWER, 5)).rejects.toThrow(new NotFoundError('Category', 5));
    await expect(service.delete(ADMIN, 5)).rejects.toThrow(NotFoundError);
  });

  it('should delete a category', async () => {
    const category = await service.create(TESTER, { name: 'Books' });
    await service.delete(TESTER, category.id);
    expect(await categories.count()).toBe(0);
  });
});

describe('ProductService', () => {
  let categories: InMemoryCategoryStore;
  let products: InMemoryProductStore;
  let service: ProductService;

  beforeEach(async () => {
    categories = new InMemoryCategoryStore();
    products = new InMemoryProductStore();
    service = new ProductService(products, categories);
    await categories.create({ id: 1, name: 'Electronics', isActive: true });
  });

  it('should create a product with its category resolved', async () => {
    const product = await service.create(TESTER, {
      name: 'Keyboard',
      price: 4999,
      stock: 5,
      sku: 'KB-1',
      categoryId: 1,
    });

    expect(product).toMatchObject({ id: 1, sku: 'KB-1', isActive: true, categoryId: 1 });
    expect(product.category?.name).toBe('Electronics');
  });

  it('should reject an unknown category', async () => {
    await expect(
      service.create(TESTER, { name: 'Keyboard', price: 4999, stock: 5, sku: 'KB-1', categoryId: 9 })
    ).rejects.toThrow(new ValidationError('Category not found'));
    expect(await products.count()).toBe(0);
  });

  it('should reject a duplicate sku', async () => {
    await service.create(TESTER, { name: 'Keyboard', price: 4999, stock: 5, sku: 'KB-1' });
    await expect(service.create(TESTER, { name: 'Other', price: 100, stock: 1, sku: 'kb-1' })).rejects.toThrow(
      'SKU already exists'
    );
  });

  it('should detach the category when categoryId is null', async () => {
    const product = await service.create(TESTER, { name: 'Keyboard', price: 4999, stock: 5, sku: 'KB-1', categoryId: 1 });

    const updated = await service.update(TESTER, product.id, { categoryId: null, price: 3999 });

    expect(updated.categoryId).toBeUndefined();
    expect(updated.category).toBeNull();
    expect(updated.price).toBe(3999);
  });

  it('should show a null category once the category is deleted', async () => {
    const product = await service.create(TESTER, { name: 'Keyboard', price: 4999, stock: 5, sku: 'KB-1', categoryId: 1 });
    const category = await categories.getById(1);
    if (category) await categories.delete(category);

    const view = await service.get(VIEWER, product.id);

    expect(view.categoryId).toBe(1);
    expect(view.category).toBeNull();
  });

  it('should list a page of views', async () => {
    for (const sku of ['A-1', 'A-2', 'A-3']) {
      await service.create(TESTER, { name: sku, price: 100, stock: 1, sku, categoryId: 1 });
    }

    const page = await service.list(VIEWER, {}, { skip: 2, limit: 5 });

    expect(page).toMatchObject({ total: 3, skip: 2, limit: 5, hasMore: false });
    expect(page.items.map((product) => [product.sku, product.category?.id])).toEqual([['A-3', 1]]);
  });

  it('should deny viewers writes', async () => {
    await expect(service.delete(VIEWER, 1)).rejects.toThrow('Permission denied: Viewers have read-only access to products');
  });
});
