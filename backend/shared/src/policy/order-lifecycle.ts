import { OrderEventType, OrderStatus } from '../types';
import { InvalidTransitionError } from '../utils/errors';
import { assertNever } from './policy-engine';

export const INITIAL_ORDER_STATUS = OrderStatus.PENDING;

/**
 * Allowed next statuses per status
 */
export const ORDER_TRANSITIONS: Readonly<Record<OrderStatus, readonly OrderStatus[]>> = {
  [OrderStatus.PENDING]: [OrderStatus.CONFIRMED, OrderStatus.CANCELLED],
  [OrderStatus.CONFIRMED]: [OrderStatus.SHIPPED],
  [OrderStatus.SHIPPED]: [],
  [OrderStatus.CANCELLED]: [],
};

export function nextStatuses(from: OrderStatus): readonly OrderStatus[] {
  return ORDER_TRANSITIONS[from];
}

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return ORDER_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: OrderStatus): boolean {
  return ORDER_TRANSITIONS[status].length === 0;
}

/**
 * Validate a status change and return the new status.
 * Throws InvalidTransitionError for anything outside ORDER_TRANSITIONS,
 * including re-entering the current status.
 */
export function transition(from: OrderStatus, to: OrderStatus): OrderStatus {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
  return to;
}

/**
 * Event recorded when an order enters a status
 */
export function eventTypeFor(status: OrderStatus): OrderEventType {
  switch (status) {
    case OrderStatus.PENDING:
      return OrderEventType.ORDER_CREATED;
    case OrderStatus.CONFIRMED:
      return OrderEventType.ORDER_CONFIRMED;
    case OrderStatus.SHIPPED:
      return OrderEventType.ORDER_SHIPPED;
    case OrderStatus.CANCELLED:
      return OrderEventType.ORDER_CANCELLED;
    default:
      return assertNever(status, 'order status');
  }
}
