import { assertAuthorized, authorize } from '../../src/policy/policy-engine';
import { Action, Principal, ResourceType, UserRole } from '../../src/types';
import { DeniedError } from '../../src/utils/errors';
import { ADMIN, OTHER_VIEWER, TESTER, VIEWER } from '../fixtures/test-data';

const CRUD = [Action.READ, Action.CREATE, Action.UPDATE, Action.DELETE];

describe('authorize', () => {
  describe('categories and products', () => {
    const resources = [ResourceType.CATEGORY, ResourceType.PRODUCT];
    const principals: Record<UserRole, Principal> = {
      [UserRole.ADMIN]: ADMIN,
      [UserRole.TESTER]: TESTER,
      [UserRole.VIEWER]: VIEWER,
    };
    const table: [UserRole, Action, ResourceType, boolean][] = [
      [UserRole.ADMIN, Action.READ, ResourceType.CATEGORY, true],
      [UserRole.ADMIN, Action.CREATE, ResourceType.CATEGORY, true],
      [UserRole.ADMIN, Action.UPDATE, ResourceType.CATEGORY, true],
      [UserRole.ADMIN, Action.DELETE, ResourceType.CATEGORY, true],
      [UserRole.ADMIN, Action.CANCEL, ResourceType.CATEGORY, false],
      [UserRole.ADMIN, Action.ADMIN, ResourceType.CATEGORY, false],
      [UserRole.TESTER, Action.READ, ResourceType.CATEGORY, true],
      [UserRole.TESTER, Action.CREATE, ResourceType.CATEGORY, true],
      [UserRole.TESTER, Action.UPDATE, ResourceType.CATEGORY, true],
      [UserRole.TESTER, Action.DELETE, ResourceType.CATEGORY, true],
      [UserRole.TESTER, Action.CANCEL, ResourceType.CATEGORY, false],
      [UserRole.TESTER, Action.ADMIN, ResourceType.CATEGORY, false],
      [UserRole.VIEWER, Action.READ, ResourceType.CATEGORY, true],
      [UserRole.VIEWER, Action.CREATE, ResourceType.CATEGORY, false],
      [UserRole.VIEWER, Action.UPDATE, ResourceType.CATEGORY, false],
      [UserRole.VIEWER, Action.DELETE, ResourceType.CATEGORY, false],
      [UserRole.VIEWER, Action.CANCEL, ResourceType.CATEGORY, false],
      [UserRole.VIEWER, Action.ADMIN, ResourceType.CATEGORY, false],
      [UserRole.ADMIN, Action.READ, ResourceType.PRODUCT, true],
      [UserRole.ADMIN, Action.CREATE, ResourceType.PRODUCT, true],
      [UserRole.ADMIN, Action.UPDATE, ResourceType.PRODUCT, true],
      [UserRole.ADMIN, Action.DELETE, ResourceType.PRODUCT, true],
      [UserRole.ADMIN, Action.CANCEL, ResourceType.PRODUCT, false],
      [UserRole.ADMIN, Action.ADMIN, ResourceType.PRODUCT, false],
      [UserRole.TESTER, Action.READ, ResourceType.PRODUCT, true],
      [UserRole.TESTER, Action.CREATE, ResourceType.PRODUCT, true],
      [UserRole.TESTER, Action.UPDATE, ResourceType.PRODUCT, true],
      [UserRole.TESTER, Action.DELETE, ResourceType.PRODUCT, true],
      [UserRole.TESTER, Action.CANCEL, ResourceType.PRODUCT, false],
      [UserRole.TESTER, Action.ADMIN, ResourceType.PRODUCT, false],
      [UserRole.VIEWER, Action.READ, ResourceType.PRODUCT, true],
      [UserRole.VIEWER, Action.CREATE, ResourceType.PRODUCT, false],
      [UserRole.VIEWER, Action.UPDATE, ResourceType.PRODUCT, false],
      [UserRole.VIEWER, Action.DELETE, ResourceType.PRODUCT, false],
      [UserRole.VIEWER, Action.CANCEL, ResourceType.PRODUCT, false],
      [UserRole.VIEWER, Action.ADMIN, ResourceType.PRODUCT, false],
    ];

    it('should cover every role, action and resource once', () => {
      expect(table).toHaveLength(36);
      expect(new Set(table.map(([role, action, resourceType]) => `${role}:${action}:${resourceType}`)).size).toBe(36);
      expect(table.filter(([, , , allowed]) => allowed)).toHaveLength(18);
    });

    it.each(table)('%s %s on %s is allowed: %s', (role, action, resourceType, allowed) => {
      expect(authorize(principals[role], action, resourceType).allowed).toBe(allowed);
    });

    it.each(resources)('should allow admins and testers every CRUD action on %s', (resourceType) => {
      for (const principal of [ADMIN, TESTER]) {
        for (const action of CRUD) {
          expect(authorize(principal, action, resourceType)).toEqual({ allowed: true });
        }
      }
    });

    it.each(resources)('should allow viewers to read %s only', (resourceType) => {
      expect(authorize(VIEWER, Action.READ, resourceType)).toEqual({ allowed: true });
      for (const action of [Action.CREATE, Action.UPDATE, Action.DELETE]) {
        expect(authorize(VIEWER, action, resourceType).allowed).toBe(false);
      }
    });

    it('should explain viewer denials per resource', () => {
      expect(authorize(VIEWER, Action.DELETE, ResourceType.CATEGORY)).toEqual({
        allowed: false,
        reason: 'Viewers have read-only access to categories',
      });
      expect(authorize(VIEWER, Action.CREATE, ResourceType.PRODUCT)).toEqual({
        allowed: false,
        reason: 'Viewers have read-only access to products',
      });
    });

    it('should deny actions that do not apply', () => {
      expect(authorize(ADMIN, Action.CANCEL, ResourceType.PRODUCT)).toEqual({
        allowed: false,
        reason: 'Action cancel does not apply to products',
      });
      expect(authorize(TESTER, Action.ADMIN, ResourceType.CATEGORY).allowed).toBe(false);
    });
  });

  describe('users', () => {
    it('should allow admins to read, update and delete users', () => {
      for (const action of [Action.READ, Action.UPDATE, Action.DELETE]) {
        expect(authorize(ADMIN, action, ResourceType.USER).allowed).toBe(true);
      }
      expect(authorize(ADMIN, Action.CREATE, ResourceType.USER)).toEqual({
        allowed: false,
        reason: 'Admins cannot create users',
      });
    });

    it('should give testers and viewers read-only access', () => {
      expect(authorize(TESTER, Action.READ, ResourceType.USER).allowed).toBe(true);
      expect(authorize(VIEWER, Action.READ, ResourceType.USER).allowed).toBe(true);
      expect(authorize(TESTER, Action.UPDATE, ResourceType.USER)).toEqual({
        allowed: false,
        reason: 'Testers have read-only access to users',
      });
      expect(authorize(VIEWER, Action.DELETE, ResourceType.USER)).toEqual({
        allowed: false,
        reason: 'Viewers have read-only access to users',
      });
    });
  });

  describe('orders', () => {
    it('should allow admins and testers every order action regardless of owner', () => {
      for (const principal of [ADMIN, TESTER]) {
        for (const action of [...CRUD, Action.CANCEL]) {
          expect(authorize(principal, action, ResourceType.ORDER, VIEWER.id).allowed).toBe(true);
        }
      }
    });

    it('should let viewers read their own orders and collections', () => {
      expect(authorize(VIEWER, Action.READ, ResourceType.ORDER, VIEWER.id).allowed).toBe(true);
      expect(authorize(VIEWER, Action.READ, ResourceType.ORDER).allowed).toBe(true);
    });

    it("should deny viewers other users' orders", () => {
      expect(authorize(VIEWER, Action.READ, ResourceType.ORDER, OTHER_VIEWER.id)).toEqual({
        allowed: false,
        reason: "Cannot access other users' orders",
      });
      expect(authorize(VIEWER, Action.CANCEL, ResourceType.ORDER, OTHER_VIEWER.id)).toEqual({
        allowed: false,
        reason: "Cannot cancel other users' orders",
      });
    });

    it('should let viewers create orders and cancel their own', () => {
      expect(authorize(VIEWER, Action.CREATE, ResourceType.ORDER).allowed).toBe(true);
      expect(authorize(VIEWER, Action.CANCEL, ResourceType.ORDER, VIEWER.id).allowed).toBe(true);
      expect(authorize(VIEWER, Action.CANCEL, ResourceType.ORDER).allowed).toBe(false);
    });

    it('should deny viewers updating or deleting even their own orders', () => {
      expect(authorize(VIEWER, Action.UPDATE, ResourceType.ORDER, VIEWER.id)).toEqual({
        allowed: false,
        reason: 'Viewers cannot update orders',
      });
      expect(authorize(VIEWER, Action.DELETE, ResourceType.ORDER, VIEWER.id)).toEqual({
        allowed: false,
        reason: 'Viewers cannot delete orders',
      });
    });
  });

  describe('admin operations', () => {
    it('should allow only admins', () => {
      expect(authorize(ADMIN, Action.ADMIN, ResourceType.ADMIN_OPS)).toEqual({ allowed: true });
      expect(authorize(TESTER, Action.ADMIN, ResourceType.ADMIN_OPS)).toEqual({
        allowed: false,
        reason: 'Admin role required',
      });
      expect(authorize(VIEWER, Action.ADMIN, ResourceType.ADMIN_OPS)).toEqual({
        allowed: false,
        reason: 'Admin role required',
      });
    });
  });

  it('should throw on an unknown role', () => {
    const forged: Principal = JSON.parse('{"id":1,"role":"superuser"}');
    expect(() => authorize(forged, Action.READ, ResourceType.PRODUCT)).toThrow('Unknown role: superuser');
  });

  it('should throw on an unknown action', () => {
    const action: Action = JSON.parse('"archive"');
    expect(() => authorize(ADMIN, action, ResourceType.PRODUCT)).toThrow('Unknown action: archive');
  });

  it('should be deterministic', () => {
    const principal: Principal = { id: 3, role: UserRole.VIEWER };
    const first = authorize(principal, Action.READ, ResourceType.ORDER, 4);
    expect(authorize(principal, Action.READ, ResourceType.ORDER, 4)).toEqual(first);
  });
});

describe('assertAuthorized', () => {
  it('should return quietly on allow', () => {
    expect(() => assertAuthorized(TESTER, Action.CREATE, ResourceType.PRODUCT)).not.toThrow();
  });

  it('should throw DeniedError with the deny reason', () => {
    expect(() => assertAuthorized(VIEWER, Action.CREATE, ResourceType.PRODUCT)).toThrow(DeniedError);
    expect(() => assertAuthorized(VIEWER, Action.CREATE, ResourceType.PRODUCT)).toThrow(
      'Permission denied: Viewers have read-only access to products'
    );
  });
});
