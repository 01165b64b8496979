import { Action, Principal, ResourceType, UserRole } from '../types';
import { DeniedError } from '../utils/errors';

/**
 * Outcome of an authorization check
 */
export type Decision = { allowed: true } | { allowed: false; reason: string };

const ALLOW: Decision = { allowed: true };

function deny(reason: string): Decision {
  return { allowed: false, reason };
}

/**
 * Exhaustiveness guard for switch statements over closed unions.
 * Reaching it at runtime means a value outside the enum was constructed.
 */
export function assertNever(value: never, kind: string): never {
  throw new Error(`Unknown ${kind}: ${String(value)}`);
}

const RESOURCE_LABELS: Record<ResourceType, string> = {
  [ResourceType.USER]: 'users',
  [ResourceType.CATEGORY]: 'categories',
  [ResourceType.PRODUCT]: 'products',
  [ResourceType.ORDER]: 'orders',
  [ResourceType.ADMIN_OPS]: 'admin operations',
};

function checkAction(action: Action): void {
  switch (action) {
    case Action.READ:
    case Action.CREATE:
    case Action.UPDATE:
    case Action.DELETE:
    case Action.CANCEL:
    case Action.ADMIN:
      return;
    default:
      return assertNever(action, 'action');
  }
}

function adminRules(action: Action, resourceType: ResourceType): Decision {
  switch (resourceType) {
    case ResourceType.USER:
      return action === Action.READ || action === Action.UPDATE || action === Action.DELETE
        ? ALLOW
        : deny(`Admins cannot ${action} users`);
    case ResourceType.CATEGORY:
    case ResourceType.PRODUCT:
      return crudOnly(action, resourceType);
    case ResourceType.ORDER:
      return orderAction(action) ? ALLOW : deny(`Action ${action} does not apply to orders`);
    case ResourceType.ADMIN_OPS:
      return action === Action.ADMIN ? ALLOW : deny(`Action ${action} does not apply to admin operations`);
    default:
      return assertNever(resourceType, 'resource type');
  }
}

function testerRules(action: Action, resourceType: ResourceType): Decision {
  switch (resourceType) {
    case ResourceType.USER:
      return action === Action.READ ? ALLOW : deny('Testers have read-only access to users');
    case ResourceType.CATEGORY:
    case ResourceType.PRODUCT:
      return crudOnly(action, resourceType);
    case ResourceType.ORDER:
      return orderAction(action) ? ALLOW : deny(`Action ${action} does not apply to orders`);
    case ResourceType.ADMIN_OPS:
      return deny('Admin role required');
    default:
      return assertNever(resourceType, 'resource type');
  }
}

function viewerRules(
  principal: Principal,
  action: Action,
  resourceType: ResourceType,
  resourceOwner?: number
): Decision {
  switch (resourceType) {
    case ResourceType.USER:
    case ResourceType.CATEGORY:
    case ResourceType.PRODUCT:
      return action === Action.READ ? ALLOW : deny(`Viewers have read-only access to ${RESOURCE_LABELS[resourceType]}`);
    case ResourceType.ORDER:
      switch (action) {
        case Action.READ:
          // Collection reads pass; the visibility filter narrows them
          return resourceOwner === undefined || resourceOwner === principal.id
            ? ALLOW
            : deny("Cannot access other users' orders");
        case Action.CREATE:
          return ALLOW;
        case Action.CANCEL:
          return resourceOwner !== undefined && resourceOwner === principal.id
            ? ALLOW
            : deny("Cannot cancel other users' orders");
        case Action.UPDATE:
        case Action.DELETE:
          return deny(`Viewers cannot ${action} orders`);
        case Action.ADMIN:
          return deny(`Action ${action} does not apply to orders`);
        default:
          return assertNever(action, 'action');
      }
    case ResourceType.ADMIN_OPS:
      return deny('Admin role required');
    default:
      return assertNever(resourceType, 'resource type');
  }
}

function crudOnly(action: Action, resourceType: ResourceType): Decision {
  switch (action) {
    case Action.READ:
    case Action.CREATE:
    case Action.UPDATE:
    case Action.DELETE:
      return ALLOW;
    case Action.CANCEL:
    case Action.ADMIN:
      return deny(`Action ${action} does not apply to ${RESOURCE_LABELS[resourceType]}`);
    default:
      return assertNever(action, 'action');
  }
}

function orderAction(action: Action): boolean {
  return action !== Action.ADMIN;
}

/**
 * Decide whether a principal may perform an action on a resource type.
 *
 * Pure and total over (role, resource type, action). `resourceOwner` is the
 * owning user id for owned resources (orders); omit it for collection reads.
 * Unknown roles, actions and resource types throw instead of denying.
 */
export function authorize(
  principal: Principal,
  action: Action,
  resourceType: ResourceType,
  resourceOwner?: number
): Decision {
  checkAction(action);

  switch (principal.role) {
    case UserRole.ADMIN:
      return adminRules(action, resourceType);
    case UserRole.TESTER:
      return testerRules(action, resourceType);
    case UserRole.VIEWER:
      return viewerRules(principal, action, resourceType, resourceOwner);
    default:
      return assertNever(principal.role, 'role');
  }
}

/**
 * authorize() that throws DeniedError on a deny
 */
export function assertAuthorized(
  principal: Principal,
  action: Action,
  resourceType: ResourceType,
  resourceOwner?: number
): void {
  const decision = authorize(principal, action, resourceType, resourceOwner);
  if (!decision.allowed) {
    throw new DeniedError(decision.reason);
  }
}
