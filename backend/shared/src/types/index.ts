/**
 * User Role Enum
 * Roles granted to authenticated principals
 */
export enum UserRole {
  ADMIN = 'admin',       // Full access, including reset and stats
  TESTER = 'tester',     // CRUD on catalog and orders
  VIEWER = 'viewer',     // Read-only, plus own orders
}

/**
 * Order Status Enum
 * pending -> confirmed -> shipped, or pending -> cancelled
 */
export enum OrderStatus {
  PENDING = 'pending',       // Created, stock held
  CONFIRMED = 'confirmed',   // Accepted for fulfilment
  SHIPPED = 'shipped',       // Terminal
  CANCELLED = 'cancelled',   // Terminal, stock restored
}

/**
 * Order Event Types
 * Append-only history of order changes
 */
export enum OrderEventType {
  ORDER_CREATED = 'ORDER_CREATED',
  ORDER_CONFIRMED = 'ORDER_CONFIRMED',
  ORDER_SHIPPED = 'ORDER_SHIPPED',
  ORDER_CANCELLED = 'ORDER_CANCELLED',
  ORDER_UPDATED = 'ORDER_UPDATED',
}

/**
 * Actions a principal may attempt
 */
export enum Action {
  READ = 'read',
  CREATE = 'create',
  UPDATE = 'update',
  DELETE = 'delete',
  CANCEL = 'cancel',
  ADMIN = 'admin',
}

/**
 * Resource types covered by the policy table
 */
export enum ResourceType {
  USER = 'user',
  CATEGORY = 'category',
  PRODUCT = 'product',
  ORDER = 'order',
  ADMIN_OPS = 'admin-ops',
}

/**
 * Principal
 * Authenticated identity, passed explicitly into every service call
 */
export interface Principal {
  readonly id: number;
  readonly role: UserRole;
}

/**
 * User
 */
export interface User {
  id: number;
  email: string;
  username: string;
  fullName?: string;
  passwordHash: string;
  role: UserRole;
  isActive: boolean;
  createdAt: string;                  // ISO timestamp
  updatedAt: string;                  // ISO timestamp
}

/**
 * User as returned over the API
 */
export type PublicUser = Omit<User, 'passwordHash'>;

/**
 * Category
 */
export interface Category {
  id: number;
  name: string;
  description?: string;
  isActive: boolean;
  createdAt: string;
}

/**
 * Product
 */
export interface Product {
  id: number;
  sku: string;                        // Unique stock keeping unit
  name: string;
  description?: string;
  price: number;                      // Price in cents, > 0
  stock: number;                      // Units on hand, >= 0
  categoryId?: number;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

/**
 * Product with its category resolved for display
 */
export interface ProductView extends Product {
  category: Category | null;
}

/**
 * Order Item
 * Price snapshot frozen at creation time
 */
export interface OrderItem {
  productId: number;
  productName: string;
  sku: string;
  quantity: number;
  unitPrice: number;                  // Cents
  lineTotal: number;                  // unitPrice * quantity
}

/**
 * Order
 */
export interface Order {
  id: number;
  orderNumber: string;                // Unique, immutable (ORD-XXXXXXXX)
  userId: number;                     // Owner
  status: OrderStatus;
  totalAmount: number;                // Sum of lineTotal, cents
  items: OrderItem[];
  shippingAddress?: string;
  notes?: string;
  createdAt: string;
  updatedAt: string;
}

/**
 * Order Event
 */
export interface OrderEvent {
  eventId: string;
  orderId: number;
  eventType: OrderEventType;
  timestamp: string;
  payload: Record<string, unknown>;
  userId?: number;                    // Principal that triggered the change
}

/**
 * Stock movement applied atomically with an order write
 */
export interface StockChange {
  productId: number;
  quantity: number;
  expectedPrice?: number;             // Only checked when decrementing
}

/**
 * DynamoDB Item Mappers
 */
export interface DynamoDBUserItem extends User {
  PK: number;
}

export interface DynamoDBCategoryItem extends Category {
  PK: number;
}

export interface DynamoDBProductItem extends Product {
  PK: number;
}

export interface DynamoDBOrderItem extends Order {
  PK: number;
}

export interface DynamoDBOrderEventItem extends OrderEvent {
  PK: number;                         // orderId
  SK: string;                         // timestamp#eventId
}

/**
 * Paged list result (skip/limit)
 */
export interface PageResult<T> {
  items: T[];
  total: number;
  skip: number;
  limit: number;
  hasMore: boolean;
}

export interface PageOptions {
  skip?: number;
  limit?: number;
}

/**
 * Filters accepted by list operations
 */
export interface UserFilter {
  role?: UserRole;
  isActive?: boolean;
}

export interface CategoryFilter {
  isActive?: boolean;
  search?: string;
}

export type ProductSortField = 'price' | 'name' | 'createdAt' | 'stock';

export interface ProductFilter {
  isActive?: boolean;
  categoryId?: number;
  minPrice?: number;
  maxPrice?: number;
  inStock?: boolean;
  search?: string;                    // Matches name or sku, case-insensitive
  sortBy?: ProductSortField;
  sortOrder?: 'asc' | 'desc';
}

export interface OrderFilter {
  status?: OrderStatus;
  userId?: number;
}

/**
 * Repository contracts
 * Services depend on these; the DynamoDB repositories implement them
 */
export interface UserStore {
  nextId(): Promise<number>;
  create(user: Omit<User, 'createdAt' | 'updatedAt'>): Promise<User>;
  getById(id: number): Promise<User | null>;
  getByUsername(username: string): Promise<User | null>;
  list(filter: UserFilter): Promise<User[]>;
  update(current: User, updates: Partial<Omit<User, 'id' | 'createdAt'>>): Promise<User>;
  delete(user: User): Promise<void>;
  count(): Promise<number>;
}

export interface CategoryStore {
  nextId(): Promise<number>;
  create(category: Omit<Category, 'createdAt'>): Promise<Category>;
  getById(id: number): Promise<Category | null>;
  getByIds(ids: number[]): Promise<Category[]>;
  list(filter: CategoryFilter): Promise<Category[]>;
  update(current: Category, updates: Partial<Omit<Category, 'id' | 'createdAt'>>): Promise<Category>;
  delete(category: Category): Promise<void>;
  count(): Promise<number>;
}

export interface ProductStore {
  nextId(): Promise<number>;
  create(product: Omit<Product, 'createdAt' | 'updatedAt'>): Promise<Product>;
  getById(id: number): Promise<Product | null>;
  getByIds(ids: number[]): Promise<Product[]>;
  list(filter: ProductFilter): Promise<Product[]>;
  update(current: Product, updates: Partial<Omit<Product, 'id' | 'createdAt'>>): Promise<Product>;
  delete(product: Product): Promise<void>;
  count(): Promise<number>;
}

// Order fields a caller may change outside the lifecycle
export type OrderDetails = Pick<Partial<Order>, 'shippingAddress' | 'notes'>;

export interface OrderStore {
  nextId(): Promise<number>;
  createWithStock(order: Omit<Order, 'createdAt' | 'updatedAt'>, decrements: StockChange[], actorId: number): Promise<Order>;
  getById(id: number): Promise<Order | null>;
  list(filter: OrderFilter): Promise<Order[]>;
  updateStatus(order: Order, to: OrderStatus, actorId: number, details?: OrderDetails): Promise<Order>;
  cancelWithStock(order: Order, restorations: StockChange[], actorId: number, details?: OrderDetails): Promise<Order>;
  updateDetails(order: Order, updates: OrderDetails, actorId: number): Promise<Order>;
  delete(order: Order): Promise<void>;
  count(): Promise<number>;
}

export interface OrderEventStore {
  getByOrderId(orderId: number): Promise<OrderEvent[]>;
}
