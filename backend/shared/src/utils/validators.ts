/**
 * Input Validation Utilities
 * Validates request bodies before they reach the services
 */

import { AppError } from './errors';
import { OrderStatus, UserRole, ProductSortField, PageOptions } from '../types';

export class ValidationError extends AppError {
  constructor(
    message: string,
    public field?: string,
    public value?: unknown
  ) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
  }

  details(): Record<string, unknown> {
    return this.field ? { field: this.field } : {};
  }
}

/**
 * Validate email format
 */
export function validateEmail(email: string): boolean {
  const emailRegex = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
  return emailRegex.test(email);
}

/**
 * Validate required fields
 */
export function validateRequired(
  data: Record<string, unknown>,
  requiredFields: string[]
): void {
  for (const field of requiredFields) {
    if (data[field] === undefined || data[field] === null || data[field] === '') {
      throw new ValidationError(`Missing required field: ${field}`, field);
    }
  }
}

/**
 * Validate positive number
 */
export function validatePositiveNumber(value: unknown, fieldName: string): asserts value is number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`${fieldName} must be a positive number`, fieldName, value);
  }
}

/**
 * Validate non-negative integer
 */
export function validateNonNegativeInteger(value: unknown, fieldName: string): asserts value is number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${fieldName} must be a non-negative integer`, fieldName, value);
  }
}

/**
 * Validate positive integer
 */
export function validatePositiveInteger(value: unknown, fieldName: string): asserts value is number {
  validatePositiveNumber(value, fieldName);
  if (!Number.isInteger(value)) {
    throw new ValidationError(`${fieldName} must be an integer`, fieldName, value);
  }
}

/**
 * Validate string length
 */
export function validateStringLength(
  value: unknown,
  fieldName: string,
  min?: number,
  max?: number
): asserts value is string {
  if (typeof value !== 'string') {
    throw new ValidationError(`${fieldName} must be a string`, fieldName, value);
  }

  if (min !== undefined && value.length < min) {
    throw new ValidationError(`${fieldName} must be at least ${min} characters`, fieldName, value);
  }

  if (max !== undefined && value.length > max) {
    throw new ValidationError(`${fieldName} must be at most ${max} characters`, fieldName, value);
  }
}

/**
 * Validate enum value
 */
export function validateEnum<T extends Record<string, string>>(
  value: unknown,
  enumType: T,
  fieldName: string
): asserts value is T[keyof T] {
  const validValues: unknown[] = Object.values(enumType);
  if (!validValues.includes(value)) {
    throw new ValidationError(
      `${fieldName} must be one of: ${Object.values(enumType).join(', ')}`,
      fieldName,
      value
    );
  }
}

/**
 * Validate price (in cents)
 */
export function validatePrice(price: unknown, fieldName: string): asserts price is number {
  validatePositiveNumber(price, fieldName);

  if (!Number.isInteger(price)) {
    throw new ValidationError(`${fieldName} must be an integer (cents)`, fieldName, price);
  }
}

/**
 * Sanitize string input
 */
export function sanitizeString(input: string): string {
  return input
    .replace(/[\x00-\x1F\x7F]/g, '')
    .trim()
    .replace(/\s+/g, ' ');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Require a JSON object body
 */
export function asObject(body: unknown): Record<string, unknown> {
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return body;
}

function optionalString(
  data: Record<string, unknown>,
  field: string,
  min: number,
  max: number
): string | undefined {
  const value = data[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  validateStringLength(value, field, min, max);
  return sanitizeString(value);
}

function optionalBoolean(data: Record<string, unknown>, field: string): boolean | undefined {
  const value = data[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new ValidationError(`${field} must be a boolean`, field, value);
  }
  return value;
}

// Auth

export interface LoginInput {
  username: string;
  password: string;
}

export function parseLoginInput(body: unknown): LoginInput {
  const data = asObject(body);
  validateRequired(data, ['username', 'password']);
  validateStringLength(data.username, 'username', 1, 100);
  validateStringLength(data.password, 'password', 1, 200);
  return { username: data.username, password: data.password };
}

function normalizeEmail(value: unknown): string {
  validateStringLength(value, 'email', 3, 255);
  const email = value.trim().toLowerCase();
  if (!validateEmail(email)) {
    throw new ValidationError('email must be a valid email address', 'email', value);
  }
  return email;
}

export interface RegisterInput {
  email: string;
  username: string;
  password: string;
  fullName?: string;
  role?: UserRole;
}

export function parseRegisterInput(body: unknown): RegisterInput {
  const data = asObject(body);
  validateRequired(data, ['email', 'username', 'password']);
  const email = normalizeEmail(data.email);
  validateStringLength(data.username, 'username', 3, 100);
  validateStringLength(data.password, 'password', 6, 200);

  let role: UserRole | undefined;
  if (data.role !== undefined && data.role !== null) {
    validateEnum(data.role, UserRole, 'role');
    role = data.role;
  }

  return {
    email,
    username: sanitizeString(data.username),
    password: data.password,
    fullName: optionalString(data, 'fullName', 0, 255),
    role,
  };
}

// Users

export interface UserUpdateInput {
  email?: string;
  username?: string;
  fullName?: string;
  role?: UserRole;
  isActive?: boolean;
}

export function parseUserUpdateInput(body: unknown): UserUpdateInput {
  const data = asObject(body);
  const input: UserUpdateInput = {};

  if (data.email !== undefined && data.email !== null) {
    input.email = normalizeEmail(data.email);
  }

  const username = optionalString(data, 'username', 3, 100);
  if (username !== undefined) input.username = username;

  const fullName = optionalString(data, 'fullName', 0, 255);
  if (fullName !== undefined) input.fullName = fullName;

  if (data.role !== undefined && data.role !== null) {
    validateEnum(data.role, UserRole, 'role');
    input.role = data.role;
  }

  const isActive = optionalBoolean(data, 'isActive');
  if (isActive !== undefined) input.isActive = isActive;

  return input;
}

// Categories

export interface CategoryInput {
  name: string;
  description?: string;
}

export interface CategoryUpdateInput {
  name?: string;
  description?: string;
  isActive?: boolean;
}

export function parseCategoryInput(body: unknown): CategoryInput {
  const data = asObject(body);
  validateRequired(data, ['name']);
  validateStringLength(data.name, 'name', 1, 100);
  return {
    name: sanitizeString(data.name),
    description: optionalString(data, 'description', 0, 2000),
  };
}

export function parseCategoryUpdateInput(body: unknown): CategoryUpdateInput {
  const data = asObject(body);
  const input: CategoryUpdateInput = {};

  const name = optionalString(data, 'name', 1, 100);
  if (name !== undefined) input.name = name;

  const description = optionalString(data, 'description', 0, 2000);
  if (description !== undefined) input.description = description;

  const isActive = optionalBoolean(data, 'isActive');
  if (isActive !== undefined) input.isActive = isActive;

  return input;
}

// Products

export interface ProductInput {
  name: string;
  description?: string;
  price: number;
  stock: number;
  sku: string;
  categoryId?: number;
}

export interface ProductUpdateInput {
  name?: string;
  description?: string;
  price?: number;
  stock?: number;
  sku?: string;
  categoryId?: number | null;         // null detaches the product from its category
  isActive?: boolean;
}

export function parseProductInput(body: unknown): ProductInput {
  const data = asObject(body);
  validateRequired(data, ['name', 'price', 'sku']);
  validateStringLength(data.name, 'name', 1, 200);
  validatePrice(data.price, 'price');
  validateStringLength(data.sku, 'sku', 1, 50);

  const stock = data.stock ?? 0;
  validateNonNegativeInteger(stock, 'stock');

  let categoryId: number | undefined;
  if (data.categoryId !== undefined && data.categoryId !== null) {
    validatePositiveInteger(data.categoryId, 'categoryId');
    categoryId = data.categoryId;
  }

  return {
    name: sanitizeString(data.name),
    description: optionalString(data, 'description', 0, 2000),
    price: data.price,
    stock,
    sku: sanitizeString(data.sku),
    categoryId,
  };
}

export function parseProductUpdateInput(body: unknown): ProductUpdateInput {
  const data = asObject(body);
  const input: ProductUpdateInput = {};

  const name = optionalString(data, 'name', 1, 200);
  if (name !== undefined) input.name = name;

  const description = optionalString(data, 'description', 0, 2000);
  if (description !== undefined) input.description = description;

  if (data.price !== undefined && data.price !== null) {
    validatePrice(data.price, 'price');
    input.price = data.price;
  }

  if (data.stock !== undefined && data.stock !== null) {
    validateNonNegativeInteger(data.stock, 'stock');
    input.stock = data.stock;
  }

  const sku = optionalString(data, 'sku', 1, 50);
  if (sku !== undefined) input.sku = sku;

  if (data.categoryId === null) {
    input.categoryId = null;
  } else if (data.categoryId !== undefined) {
    validatePositiveInteger(data.categoryId, 'categoryId');
    input.categoryId = data.categoryId;
  }

  const isActive = optionalBoolean(data, 'isActive');
  if (isActive !== undefined) input.isActive = isActive;

  return input;
}

// Orders

export interface OrderItemInput {
  productId: number;
  quantity: number;
}

export interface OrderCreateInput {
  items: OrderItemInput[];
  shippingAddress?: string;
  notes?: string;
}

export interface OrderUpdateInput {
  status?: OrderStatus;
  shippingAddress?: string;
  notes?: string;
}

// Each line becomes one item of the order transaction
export const MAX_ORDER_ITEMS = 50;

/**
 * Validate order items
 */
export function validateOrderItems(items: unknown): asserts items is OrderItemInput[] {
  if (!Array.isArray(items) || items.length === 0) {
    throw new ValidationError('items must be a non-empty array', 'items', items);
  }
  if (items.length > MAX_ORDER_ITEMS) {
    throw new ValidationError(`items must contain at most ${MAX_ORDER_ITEMS} entries`, 'items', items.length);
  }

  items.forEach((item: unknown, index) => {
    const fieldPrefix = `items[${index}]`;
    if (!isRecord(item)) {
      throw new ValidationError(`${fieldPrefix} must be an object`, fieldPrefix, item);
    }
    validateRequired(item, ['productId', 'quantity']);
    validatePositiveInteger(item.productId, `${fieldPrefix}.productId`);
    validatePositiveInteger(item.quantity, `${fieldPrefix}.quantity`);
  });
}

export function parseOrderCreateInput(body: unknown): OrderCreateInput {
  const data = asObject(body);
  validateOrderItems(data.items);
  return {
    items: data.items.map((item) => ({ productId: item.productId, quantity: item.quantity })),
    shippingAddress: optionalString(data, 'shippingAddress', 0, 500),
    notes: optionalString(data, 'notes', 0, 1000),
  };
}

export function parseOrderUpdateInput(body: unknown): OrderUpdateInput {
  const data = asObject(body);
  const input: OrderUpdateInput = {};

  if (data.status !== undefined && data.status !== null) {
    validateEnum(data.status, OrderStatus, 'status');
    input.status = data.status;
  }

  const shippingAddress = optionalString(data, 'shippingAddress', 0, 500);
  if (shippingAddress !== undefined) input.shippingAddress = shippingAddress;

  const notes = optionalString(data, 'notes', 0, 1000);
  if (notes !== undefined) input.notes = notes;

  return input;
}

// Query strings

export type QueryParams = Record<string, string | undefined> | null;

export function parseIntParam(
  params: QueryParams,
  name: string,
  options: { min?: number; max?: number } = {}
): number | undefined {
  const raw = params?.[name];
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ValidationError(`${name} must be an integer`, name, raw);
  }
  if (options.min !== undefined && value < options.min) {
    throw new ValidationError(`${name} must be >= ${options.min}`, name, raw);
  }
  if (options.max !== undefined && value > options.max) {
    throw new ValidationError(`${name} must be <= ${options.max}`, name, raw);
  }
  return value;
}

export function parseNumberParam(params: QueryParams, name: string): number | undefined {
  const raw = params?.[name];
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`${name} must be a non-negative number`, name, raw);
  }
  return value;
}

export function parseBooleanParam(params: QueryParams, name: string): boolean | undefined {
  const raw = params?.[name];
  if (raw === undefined || raw === '') {
    return undefined;
  }
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  throw new ValidationError(`${name} must be true or false`, name, raw);
}

export function parseEnumParam<T extends Record<string, string>>(
  params: QueryParams,
  name: string,
  enumType: T
): T[keyof T] | undefined {
  const raw = params?.[name];
  if (raw === undefined || raw === '') {
    return undefined;
  }
  validateEnum(raw, enumType, name);
  return raw;
}

/**
 * skip/limit paging parameters
 */
export function parsePageParams(params: QueryParams): PageOptions {
  return {
    skip: parseIntParam(params, 'skip', { min: 0 }) ?? 0,
    limit: parseIntParam(params, 'limit', { min: 1, max: 100 }) ?? 20,
  };
}

const SORT_FIELDS: readonly ProductSortField[] = ['price', 'name', 'createdAt', 'stock'];

export function parseSortField(params: QueryParams): ProductSortField | undefined {
  const raw = params?.sortBy;
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const field = SORT_FIELDS.find((candidate) => candidate === raw);
  if (!field) {
    throw new ValidationError(`sortBy must be one of: ${SORT_FIELDS.join(', ')}`, 'sortBy', raw);
  }
  return field;
}

export function parseSortOrder(params: QueryParams): 'asc' | 'desc' {
  const raw = params?.sortOrder;
  if (raw === undefined || raw === '' || raw === 'asc') return 'asc';
  if (raw === 'desc') return 'desc';
  throw new ValidationError('sortOrder must be asc or desc', 'sortOrder', raw);
}

/**
 * Usage Examples:
 *
 * // Parse a create-order body
 * const input = parseOrderCreateInput(JSON.parse(event.body));
 *
 * // Validate enum
 * validateEnum(body.status, OrderStatus, 'status');
 *
 * // Query parameters
 * const limit = parseIntParam(event.queryStringParameters, 'limit', { min: 1, max: 100 });
 */
