import { Order, Principal, UserRole } from '../types';
import { NotFoundError } from '../utils/errors';
import { assertNever } from './policy-engine';

/**
 * Whether a principal may see an order at all
 */
export function isVisible(principal: Principal, order: Pick<Order, 'userId'>): boolean {
  switch (principal.role) {
    case UserRole.ADMIN:
    case UserRole.TESTER:
      return true;
    case UserRole.VIEWER:
      return order.userId === principal.id;
    default:
      return assertNever(principal.role, 'role');
  }
}

/**
 * Narrow a result set to the orders the principal may see
 */
export function filterVisible<T extends Pick<Order, 'userId'>>(principal: Principal, orders: T[]): T[] {
  return orders.filter((order) => isVisible(principal, order));
}

/**
 * Direct-fetch counterpart of filterVisible: a hidden order is reported
 * exactly like an absent one
 */
export function requireVisible<T extends Pick<Order, 'id' | 'userId'>>(
  principal: Principal,
  order: T | null,
  id: number
): T {
  if (!order || !isVisible(principal, order)) {
    throw new NotFoundError('Order', id);
  }
  return order;
}
