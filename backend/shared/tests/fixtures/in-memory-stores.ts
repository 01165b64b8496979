import {
  Category,
  CategoryFilter,
  CategoryStore,
  Order,
  OrderDetails,
  OrderEvent,
  OrderEventStore,
  OrderEventType,
  OrderFilter,
  OrderStatus,
  OrderStore,
  Product,
  ProductFilter,
  ProductStore,
  StockChange,
  User,
  UserFilter,
  UserStore,
} from '../../src/types';
import { ConflictError, InsufficientStockError, NotFoundError } from '../../src/utils/errors';
import { eventTypeFor } from '../../src/policy/order-lifecycle';

/**
 * In-memory stand-ins for the DynamoDB repositories.
 * Each write checks its conditions and applies its changes without yielding,
 * which gives the same all-or-nothing behaviour as a DynamoDB transaction.
 */

function key(value: string): string {
  return value.trim().toLowerCase();
}

function now(): string {
  return new Date().toISOString();
}

class Sequence {
  private value = 0;

  next(): number {
    this.value += 1;
    return this.value;
  }
}

export class InMemoryUserStore implements UserStore {
  readonly items = new Map<number, User>();
  private ids = new Sequence();

  async nextId(): Promise<number> {
    return this.ids.next();
  }

  async create(user: Omit<User, 'createdAt' | 'updatedAt'>): Promise<User> {
    this.assertUnique(user.username, user.email, user.id);
    const created: User = { ...user, createdAt: now(), updatedAt: now() };
    this.items.set(created.id, created);
    return { ...created };
  }

  async getById(id: number): Promise<User | null> {
    const user = this.items.get(id);
    return user ? { ...user } : null;
  }

  async getByUsername(username: string): Promise<User | null> {
    const user = [...this.items.values()].find((candidate) => key(candidate.username) === key(username));
    return user ? { ...user } : null;
  }

  async list(filter: UserFilter = {}): Promise<User[]> {
    return [...this.items.values()]
      .filter((user) => filter.role === undefined || user.role === filter.role)
      .filter((user) => filter.isActive === undefined || user.isActive === filter.isActive)
      .sort((a, b) => a.id - b.id)
      .map((user) => ({ ...user }));
  }

  async update(current: User, updates: Partial<Omit<User, 'id' | 'createdAt'>>): Promise<User> {
    const existing = this.items.get(current.id);
    if (!existing) {
      throw new NotFoundError('User', current.id);
    }
    this.assertUnique(updates.username, updates.email, current.id);
    const updated: User = { ...existing, ...updates, updatedAt: now() };
    this.items.set(updated.id, updated);
    return { ...updated };
  }

  async delete(user: User): Promise<void> {
    if (!this.items.delete(user.id)) {
      throw new NotFoundError('User', user.id);
    }
  }

  async count(): Promise<number> {
    return this.items.size;
  }

  private assertUnique(username: string | undefined, email: string | undefined, ownerId: number): void {
    for (const other of this.items.values()) {
      if (other.id === ownerId) continue;
      if (username !== undefined && key(other.username) === key(username)) {
        throw new ConflictError('Username already taken');
      }
      if (email !== undefined && key(other.email) === key(email)) {
        throw new ConflictError('Email already registered');
      }
    }
  }
}

export class InMemoryCategoryStore implements CategoryStore {
  readonly items = new Map<number, Category>();
  private ids = new Sequence();

  async nextId(): Promise<number> {
    return this.ids.next();
  }

  async create(category: Omit<Category, 'createdAt'>): Promise<Category> {
    this.assertUnique(category.name, category.id);
    const created: Category = { ...category, createdAt: now() };
    this.items.set(created.id, created);
    return { ...created };
  }

  async getById(id: number): Promise<Category | null> {
    const category = this.items.get(id);
    return category ? { ...category } : null;
  }

  async getByIds(ids: number[]): Promise<Category[]> {
    return [...new Set(ids)].flatMap((id) => {
      const category = this.items.get(id);
      return category ? [{ ...category }] : [];
    });
  }

  async list(filter: CategoryFilter = {}): Promise<Category[]> {
    const search = filter.search?.toLowerCase();
    return [...this.items.values()]
      .filter((category) => filter.isActive === undefined || category.isActive === filter.isActive)
      .filter((category) => !search || category.name.toLowerCase().includes(search))
      .sort((a, b) => a.id - b.id)
      .map((category) => ({ ...category }));
  }

  async update(current: Category, updates: Partial<Omit<Category, 'id' | 'createdAt'>>): Promise<Category> {
    const existing = this.items.get(current.id);
    if (!existing) {
      throw new NotFoundError('Category', current.id);
    }
    if (updates.name !== undefined) {
      this.assertUnique(updates.name, current.id);
    }
    const updated: Category = { ...existing, ...updates };
    this.items.set(updated.id, updated);
    return { ...updated };
  }

  async delete(category: Category): Promise<void> {
    if (!this.items.delete(category.id)) {
      throw new NotFoundError('Category', category.id);
    }
  }

  async count(): Promise<number> {
    return this.items.size;
  }

  private assertUnique(name: string, ownerId: number): void {
    for (const other of this.items.values()) {
      if (other.id !== ownerId && key(other.name) === key(name)) {
        throw new ConflictError('Category name already exists');
      }
    }
  }
}

export class InMemoryProductStore implements ProductStore {
  readonly items = new Map<number, Product>();
  private ids = new Sequence();

  async nextId(): Promise<number> {
    return this.ids.next();
  }

  async create(product: Omit<Product, 'createdAt' | 'updatedAt'>): Promise<Product> {
    this.assertUnique(product.sku, product.id);
    const created: Product = { ...product, createdAt: now(), updatedAt: now() };
    this.items.set(created.id, created);
    return { ...created };
  }

  async getById(id: number): Promise<Product | null> {
    const product = this.items.get(id);
    return product ? { ...product } : null;
  }

  async getByIds(ids: number[]): Promise<Product[]> {
    return [...new Set(ids)].flatMap((id) => {
      const product = this.items.get(id);
      return product ? [{ ...product }] : [];
    });
  }

  async list(filter: ProductFilter = {}): Promise<Product[]> {
    const search = filter.search?.toLowerCase();
    return [...this.items.values()]
      .filter((product) => filter.isActive === undefined || product.isActive === filter.isActive)
      .filter((product) => filter.categoryId === undefined || product.categoryId === filter.categoryId)
      .filter((product) => filter.minPrice === undefined || product.price >= filter.minPrice)
      .filter((product) => filter.maxPrice === undefined || product.price <= filter.maxPrice)
      .filter((product) => filter.inStock === undefined || (product.stock > 0) === filter.inStock)
      .filter(
        (product) =>
          !search || product.name.toLowerCase().includes(search) || product.sku.toLowerCase().includes(search)
      )
      .sort((a, b) => a.id - b.id)
      .map((product) => ({ ...product }));
  }

  async update(current: Product, updates: Partial<Omit<Product, 'id' | 'createdAt'>>): Promise<Product> {
    const existing = this.items.get(current.id);
    if (!existing) {
      throw new NotFoundError('Product', current.id);
    }
    if (updates.sku !== undefined) {
      this.assertUnique(updates.sku, current.id);
    }
    const updated: Product = { ...existing, ...updates, updatedAt: now() };
    if (updated.categoryId === undefined) {
      delete updated.categoryId;
    }
    this.items.set(updated.id, updated);
    return { ...updated };
  }

  async delete(product: Product): Promise<void> {
    if (!this.items.delete(product.id)) {
      throw new NotFoundError('Product', product.id);
    }
  }

  async count(): Promise<number> {
    return this.items.size;
  }

  private assertUnique(sku: string, ownerId: number): void {
    for (const other of this.items.values()) {
      if (other.id !== ownerId && key(other.sku) === key(sku)) {
        throw new ConflictError('SKU already exists');
      }
    }
  }
}

export class InMemoryOrderEventStore implements OrderEventStore {
  readonly events: OrderEvent[] = [];
  private ids = new Sequence();

  append(orderId: number, eventType: OrderEventType, payload: Record<string, unknown>, userId?: number): void {
    this.events.push({
      eventId: `event-${this.ids.next()}`,
      orderId,
      eventType,
      timestamp: now(),
      payload,
      userId,
    });
  }

  async getByOrderId(orderId: number): Promise<OrderEvent[]> {
    return this.events.filter((event) => event.orderId === orderId);
  }
}

export class InMemoryOrderStore implements OrderStore {
  readonly items = new Map<number, Order>();
  private ids = new Sequence();

  constructor(
    private products: InMemoryProductStore,
    private events: InMemoryOrderEventStore = new InMemoryOrderEventStore()
  ) {}

  async nextId(): Promise<number> {
    return this.ids.next();
  }

  async createWithStock(
    order: Omit<Order, 'createdAt' | 'updatedAt'>,
    decrements: StockChange[],
    actorId: number
  ): Promise<Order> {
    for (const change of decrements) {
      const product = this.products.items.get(change.productId);
      if (product && product.stock < change.quantity) {
        throw new InsufficientStockError(change.productId, change.quantity, product.stock);
      }
      if (!product || !product.isActive || product.price !== change.expectedPrice) {
        throw new ConflictError(`Product ${change.productId} changed while the order was placed`);
      }
    }
    for (const other of this.items.values()) {
      if (other.id === order.id || other.orderNumber === order.orderNumber) {
        throw new ConflictError('Order number already in use');
      }
    }

    const timestamp = now();
    for (const change of decrements) {
      const product = this.products.items.get(change.productId);
      if (product) {
        this.products.items.set(product.id, { ...product, stock: product.stock - change.quantity, updatedAt: timestamp });
      }
    }

    const created: Order = { ...order, items: order.items.map((item) => ({ ...item })), createdAt: timestamp, updatedAt: timestamp };
    this.items.set(created.id, created);
    this.events.append(created.id, OrderEventType.ORDER_CREATED, { orderNumber: created.orderNumber }, actorId);
    return { ...created };
  }

  async getById(id: number): Promise<Order | null> {
    const order = this.items.get(id);
    return order ? { ...order } : null;
  }

  async list(filter: OrderFilter = {}): Promise<Order[]> {
    return [...this.items.values()]
      .filter((order) => filter.userId === undefined || order.userId === filter.userId)
      .filter((order) => filter.status === undefined || order.status === filter.status)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt) || b.id - a.id)
      .map((order) => ({ ...order }));
  }

  async updateStatus(order: Order, to: OrderStatus, actorId: number, details: OrderDetails = {}): Promise<Order> {
    const existing = this.requireStatus(order);
    const updated: Order = { ...existing, ...details, status: to, updatedAt: now() };
    this.items.set(updated.id, updated);
    this.events.append(order.id, eventTypeFor(to), { from: order.status, to, ...details }, actorId);
    return { ...updated };
  }

  async cancelWithStock(
    order: Order,
    restorations: StockChange[],
    actorId: number,
    details: OrderDetails = {}
  ): Promise<Order> {
    const existing = this.requireStatus(order);
    if (existing.status !== OrderStatus.PENDING) {
      throw new ConflictError(`Order ${order.id} was modified concurrently, please retry`);
    }
    for (const change of restorations) {
      if (!this.products.items.has(change.productId)) {
        throw new ConflictError(`Product ${change.productId} was removed while the order was cancelled`);
      }
    }

    const timestamp = now();
    for (const change of restorations) {
      const product = this.products.items.get(change.productId);
      if (product) {
        this.products.items.set(product.id, { ...product, stock: product.stock + change.quantity, updatedAt: timestamp });
      }
    }

    const updated: Order = { ...existing, ...details, status: OrderStatus.CANCELLED, updatedAt: timestamp };
    this.items.set(updated.id, updated);
    this.events.append(order.id, OrderEventType.ORDER_CANCELLED, { restored: restorations, ...details }, actorId);
    return { ...updated };
  }

  async updateDetails(
    order: Order,
    updates: OrderDetails,
    actorId: number
  ): Promise<Order> {
    const existing = this.items.get(order.id);
    if (!existing) {
      throw new NotFoundError('Order', order.id);
    }
    const updated: Order = { ...existing, ...updates, updatedAt: now() };
    this.items.set(updated.id, updated);
    this.events.append(order.id, OrderEventType.ORDER_UPDATED, { ...updates }, actorId);
    return { ...updated };
  }

  async delete(order: Order): Promise<void> {
    if (!this.items.delete(order.id)) {
      throw new NotFoundError('Order', order.id);
    }
  }

  async count(): Promise<number> {
    return this.items.size;
  }

  private requireStatus(order: Order): Order {
    const existing = this.items.get(order.id);
    if (!existing || existing.status !== order.status) {
      throw new ConflictError(`Order ${order.id} was modified concurrently, please retry`);
    }
    return existing;
  }
}

/**
 * One set of stores wired together the way the services expect
 */
export function createStores() {
  const users = new InMemoryUserStore();
  const categories = new InMemoryCategoryStore();
  const products = new InMemoryProductStore();
  const events = new InMemoryOrderEventStore();
  const orders = new InMemoryOrderStore(products, events);
  return { users, categories, products, events, orders };
}
