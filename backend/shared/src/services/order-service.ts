import { randomUUID } from 'crypto';
import {
  Action,
  Order,
  OrderDetails,
  OrderEvent,
  OrderEventStore,
  OrderFilter,
  OrderItem,
  OrderStatus,
  OrderStore,
  PageOptions,
  PageResult,
  Principal,
  Product,
  ProductStore,
  ResourceType,
  StockChange,
  UserRole,
} from '../types';
import { OrderRepository } from '../repositories/order-repository';
import { ProductRepository } from '../repositories/product-repository';
import { OrderEventRepository } from '../repositories/order-event-repository';
import { assertAuthorized } from '../policy/policy-engine';
import { filterVisible, requireVisible } from '../policy/visibility-filter';
import { INITIAL_ORDER_STATUS, transition } from '../policy/order-lifecycle';
import { buildPage } from '../utils/dynamodb-client';
import { ConflictError, InsufficientStockError } from '../utils/errors';
import { OrderCreateInput, OrderItemInput, OrderUpdateInput, ValidationError } from '../utils/validators';
import { logger } from '../utils/logger';

// Attempts at placing an order when prices or availability change underneath it
export const MAX_CREATE_ATTEMPTS = 3;

export interface OrderWithEvents extends Order {
  events?: OrderEvent[];
}

export function generateOrderNumber(): string {
  return `ORD-${randomUUID().replace(/-/g, '').slice(0, 8).toUpperCase()}`;
}

/**
 * Sum quantities of repeated products, keeping first-seen order
 */
export function mergeOrderItems(items: OrderItemInput[]): OrderItemInput[] {
  const quantities = new Map<number, number>();
  for (const item of items) {
    quantities.set(item.productId, (quantities.get(item.productId) ?? 0) + item.quantity);
  }
  return [...quantities].map(([productId, quantity]) => ({ productId, quantity }));
}

/**
 * Order Service
 * Applies the policy engine, visibility filter and lifecycle to every order
 * operation. Hidden orders are reported as not found on every by-id path.
 */
export class OrderService {
  constructor(
    private orders: OrderStore = new OrderRepository(),
    private products: ProductStore = new ProductRepository(),
    private events: OrderEventStore = new OrderEventRepository()
  ) {}

  async list(principal: Principal, filter: OrderFilter = {}, page: PageOptions = {}): Promise<PageResult<Order>> {
    assertAuthorized(principal, Action.READ, ResourceType.ORDER);

    // Viewers only ever list their own orders, whatever userId they ask for
    const scoped: OrderFilter =
      principal.role === UserRole.VIEWER ? { ...filter, userId: principal.id } : filter;

    const orders = await this.orders.list(scoped);
    return buildPage(filterVisible(principal, orders), page);
  }

  async get(principal: Principal, id: number, options: { includeEvents?: boolean } = {}): Promise<OrderWithEvents> {
    const order = await this.requireVisible(principal, id);
    assertAuthorized(principal, Action.READ, ResourceType.ORDER, order.userId);

    if (!options.includeEvents) {
      return order;
    }
    return { ...order, events: await this.events.getByOrderId(id) };
  }

  /**
   * Place an order for the principal. Prices are frozen into the item
   * snapshot and stock is taken atomically with the order write.
   */
  async create(principal: Principal, input: OrderCreateInput): Promise<Order> {
    assertAuthorized(principal, Action.CREATE, ResourceType.ORDER);
    const items = mergeOrderItems(input.items);

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.placeOrder(principal, items, input);
      } catch (error) {
        if (error instanceof ConflictError && attempt < MAX_CREATE_ATTEMPTS) {
          logger.warn('Order placement conflicted, retrying', { attempt, reason: error.message });
          continue;
        }
        throw error;
      }
    }
  }

  private async placeOrder(
    principal: Principal,
    items: OrderItemInput[],
    input: OrderCreateInput
  ): Promise<Order> {
    const products = new Map(
      (await this.products.getByIds(items.map((item) => item.productId))).map((product) => [product.id, product])
    );

    const snapshot: OrderItem[] = items.map((item) => {
      const product = this.requireOrderable(products.get(item.productId), item);
      return {
        productId: product.id,
        productName: product.name,
        sku: product.sku,
        quantity: item.quantity,
        unitPrice: product.price,
        lineTotal: product.price * item.quantity,
      };
    });

    const decrements: StockChange[] = snapshot.map((item) => ({
      productId: item.productId,
      quantity: item.quantity,
      expectedPrice: item.unitPrice,
    }));

    const order = await this.orders.createWithStock(
      {
        id: await this.orders.nextId(),
        orderNumber: generateOrderNumber(),
        userId: principal.id,
        status: INITIAL_ORDER_STATUS,
        totalAmount: snapshot.reduce((sum, item) => sum + item.lineTotal, 0),
        items: snapshot,
        shippingAddress: input.shippingAddress,
        notes: input.notes,
      },
      decrements,
      principal.id
    );

    logger.info('Order created', {
      orderId: order.id,
      orderNumber: order.orderNumber,
      totalAmount: order.totalAmount,
      itemCount: order.items.length,
    });
    return order;
  }

  private requireOrderable(product: Product | undefined, item: OrderItemInput): Product {
    if (!product) {
      throw new ValidationError(`Product ${item.productId} not found`, 'items', item.productId);
    }
    if (!product.isActive) {
      throw new ValidationError(`Product ${item.productId} is inactive`, 'items', item.productId);
    }
    if (product.stock < item.quantity) {
      throw new InsufficientStockError(product.id, item.quantity, product.stock);
    }
    return product;
  }

  /**
   * Update status and/or details in one write. Setting the current status
   * again is a no-op; setting `cancelled` runs the cancel flow.
   */
  async update(principal: Principal, id: number, input: OrderUpdateInput): Promise<Order> {
    const order = await this.requireVisible(principal, id);
    assertAuthorized(principal, Action.UPDATE, ResourceType.ORDER, order.userId);

    const statusChange = input.status !== undefined && input.status !== order.status ? input.status : undefined;
    if (statusChange !== undefined) {
      transition(order.status, statusChange);
    }

    const details: OrderDetails = {};
    if (input.shippingAddress !== undefined) details.shippingAddress = input.shippingAddress;
    if (input.notes !== undefined) details.notes = input.notes;
    const fields = Object.keys(details);

    if (statusChange === OrderStatus.CANCELLED) {
      return this.applyCancel(principal, order, details);
    }
    if (statusChange !== undefined) {
      const updated = await this.orders.updateStatus(order, statusChange, principal.id, details);
      logger.info('Order status changed', { orderId: id, status: statusChange, fields });
      return updated;
    }
    if (fields.length > 0) {
      const updated = await this.orders.updateDetails(order, details, principal.id);
      logger.info('Order details updated', { orderId: id, fields });
      return updated;
    }
    return order;
  }

  async cancel(principal: Principal, id: number): Promise<Order> {
    const order = await this.requireVisible(principal, id);
    assertAuthorized(principal, Action.CANCEL, ResourceType.ORDER, order.userId);
    transition(order.status, OrderStatus.CANCELLED);
    return this.applyCancel(principal, order);
  }

  /**
   * Products deleted since the order was placed get no stock back
   */
  private async applyCancel(principal: Principal, order: Order, details: OrderDetails = {}): Promise<Order> {
    const existing = new Set(
      (await this.products.getByIds(order.items.map((item) => item.productId))).map((product) => product.id)
    );

    const restorations: StockChange[] = mergeOrderItems(order.items)
      .filter((item) => existing.has(item.productId))
      .map((item) => ({ productId: item.productId, quantity: item.quantity }));

    const cancelled = await this.orders.cancelWithStock(order, restorations, principal.id, details);
    logger.info('Order cancelled', {
      orderId: order.id,
      restoredItems: restorations.length,
      fields: Object.keys(details),
    });
    return cancelled;
  }

  /**
   * Stock taken by the order is not restored
   */
  async delete(principal: Principal, id: number): Promise<void> {
    const order = await this.requireVisible(principal, id);
    assertAuthorized(principal, Action.DELETE, ResourceType.ORDER, order.userId);
    await this.orders.delete(order);
    logger.info('Order deleted', { orderId: id });
  }

  private async requireVisible(principal: Principal, id: number): Promise<Order> {
    return requireVisible(principal, await this.orders.getById(id), id);
  }
}
