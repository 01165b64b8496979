/**
 * Main export file for shared backend code
 * Import all repositories, services, utilities, and types from here
 */

// Types
export * from './types';

// Policy
export {
  authorize,
  assertAuthorized,
  assertNever,
  Decision,
} from './policy/policy-engine';
export { isVisible, filterVisible, requireVisible } from './policy/visibility-filter';
export {
  ORDER_TRANSITIONS,
  INITIAL_ORDER_STATUS,
  canTransition,
  transition,
  isTerminal,
  nextStatuses,
  eventTypeFor,
} from './policy/order-lifecycle';

// Utilities
export {
  dynamoClient,
  DynamoDBError,
  handleDynamoDBError,
  withRetry,
  transactWrite,
  getCurrentTimestamp,
  buildUpdateExpression,
  buildPage,
  scanAll,
  queryAll,
  countItems,
  clearTable,
  DEFAULT_PAGE_LIMIT,
  MAX_PAGE_LIMIT,
} from './utils/dynamodb-client';

export { loadConfig, getTableName, AppConfig, TableKey } from './utils/config';

export {
  logger,
  Logger,
  LogLevel,
} from './utils/logger';

export {
  AppError,
  DeniedError,
  NotFoundError,
  InvalidTransitionError,
  InsufficientStockError,
  ConflictError,
  UnauthorizedError,
} from './utils/errors';

export {
  ValidationError,
  validateEmail,
  validateRequired,
  validatePositiveNumber,
  validateStringLength,
  validateEnum,
  validateOrderItems,
  validatePrice,
  sanitizeString,
  parseLoginInput,
  parseRegisterInput,
  parseUserUpdateInput,
  parseCategoryInput,
  parseCategoryUpdateInput,
  parseProductInput,
  parseProductUpdateInput,
  parseOrderCreateInput,
  parseOrderUpdateInput,
  parseIntParam,
  parseNumberParam,
  parseBooleanParam,
  parseEnumParam,
  parseSortField,
  parseSortOrder,
  parsePageParams,
  LoginInput,
  RegisterInput,
  UserUpdateInput,
  CategoryInput,
  CategoryUpdateInput,
  ProductInput,
  ProductUpdateInput,
  OrderCreateInput,
  OrderUpdateInput,
} from './utils/validators';

export {
  successResponse,
  noContentResponse,
  errorResponse,
  handleError,
  principalFromEvent,
  parseJsonBody,
  pathId,
  setRequestContext,
} from './utils/http';

// Repositories
export { CounterRepository } from './repositories/counter-repository';
export { UserRepository } from './repositories/user-repository';
export { CategoryRepository } from './repositories/category-repository';
export { ProductRepository } from './repositories/product-repository';
export { OrderRepository } from './repositories/order-repository';
export { OrderEventRepository } from './repositories/order-event-repository';

// Services
export { TokenService, AccessToken, resetSigningKeyCache } from './services/token-service';
export { AuthService, hashPassword, verifyPassword, toPublicUser } from './services/auth-service';
export { UserService } from './services/user-service';
export { CategoryService } from './services/category-service';
export { ProductService } from './services/product-service';
export { OrderService, OrderWithEvents, mergeOrderItems, generateOrderNumber } from './services/order-service';
export { AdminService, ResetResult, Stats } from './services/admin-service';
export { SeedService, SeedResult, clearAllTables } from './services/seed-service';

/**
 * Usage Example:
 *
 * import {
 *   OrderService,
 *   principalFromEvent,
 *   handleError,
 *   logger,
 * } from 'qa-sandbox-shared';
 *
 * const orders = new OrderService();
 *
 * const principal = principalFromEvent(event);
 * logger.setContext({ requestId: event.requestContext.requestId, userId: principal.id });
 *
 * const order = await orders.get(principal, 42, { includeEvents: true });
 * logger.info('Order retrieved', { orderId: order.id });
 */
