import { OrderStatus } from '../types';

/**
 * Base class for errors that map to a client-facing status code
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = 'AppError';
  }

  /**
   * Extra fields included in the HTTP error body
   */
  details(): Record<string, unknown> {
    return {};
  }
}

/**
 * Policy check failed
 */
export class DeniedError extends AppError {
  constructor(public readonly reason: string) {
    super(`Permission denied: ${reason}`, 'DENIED', 403);
    this.name = 'DeniedError';
  }
}

/**
 * Resource is absent, or hidden from the current principal
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id?: number | string) {
    super(id === undefined ? `${resource} not found` : `${resource} ${id} not found`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

export class InvalidTransitionError extends AppError {
  constructor(
    public readonly from: OrderStatus,
    public readonly to: OrderStatus
  ) {
    super(`Cannot change order status from ${from} to ${to}`, 'INVALID_TRANSITION', 400);
    this.name = 'InvalidTransitionError';
  }

  details(): Record<string, unknown> {
    return { from: this.from, to: this.to };
  }
}

export class InsufficientStockError extends AppError {
  constructor(
    public readonly productId: number,
    public readonly requested: number,
    public readonly available: number
  ) {
    super(
      `Insufficient stock for product ${productId}: requested ${requested}, available ${available}`,
      'INSUFFICIENT_STOCK',
      400
    );
    this.name = 'InsufficientStockError';
  }

  details(): Record<string, unknown> {
    return { productId: this.productId, requested: this.requested, available: this.available };
  }
}

/**
 * Duplicate unique value, or a write lost to a concurrent modification
 */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 'CONFLICT', 400);
    this.name = 'ConflictError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Not authenticated') {
    super(message, 'UNAUTHORIZED', 401);
    this.name = 'UnauthorizedError';
  }
}
