import { AuthService, hashPassword, toPublicUser, verifyPassword } from '../../src/services/auth-service';
import { TokenService, resetSigningKeyCache } from '../../src/services/token-service';
import { UserRole } from '../../src/types';
import { ConflictError, DeniedError, UnauthorizedError } from '../../src/utils/errors';
import { ValidationError } from '../../src/utils/validators';
import { InMemoryUserStore } from '../fixtures/in-memory-stores';
import { buildUser } from '../fixtures/test-data';

describe('AuthService', () => {
  let users: InMemoryUserStore;
  let tokens: TokenService;
  let service: AuthService;

  beforeEach(() => {
    resetSigningKeyCache();
    users = new InMemoryUserStore();
    tokens = new TokenService({ secret: 'test-secret', algorithm: 'HS256', expireMinutes: 60 });
    service = new AuthService(users, tokens);
  });

  describe('register', () => {
    it('should create an active tester by default and hide the hash', async () => {
      const user = await service.register({ email: 'qa@example.com', username: 'qa-user', password: 'password1' });

      expect(user).toMatchObject({ id: 1, username: 'qa-user', role: UserRole.TESTER, isActive: true });
      expect(user).not.toHaveProperty('passwordHash');

      const stored = await users.getById(1);
      expect(stored?.passwordHash).not.toBe('password1');
      expect(await verifyPassword('password1', stored?.passwordHash ?? '')).toBe(true);
    });

    it('should allow registering as a viewer', async () => {
      const user = await service.register({
        email: 'view@example.com',
        username: 'viewer-user',
        password: 'password1',
        role: UserRole.VIEWER,
      });
      expect(user.role).toBe(UserRole.VIEWER);
    });

    it('should not let anyone register as admin', async () => {
      await expect(
        service.register({ email: 'root@example.com', username: 'root', password: 'password1', role: UserRole.ADMIN })
      ).rejects.toThrow(new ValidationError('role must be one of: tester, viewer'));
      expect(await users.count()).toBe(0);
    });

    it('should reject a taken username', async () => {
      await service.register({ email: 'a@example.com', username: 'dup', password: 'password1' });

      await expect(
        service.register({ email: 'b@example.com', username: 'DUP', password: 'password1' })
      ).rejects.toThrow(ConflictError);
    });
  });

  describe('login', () => {
    beforeEach(async () => {
      await users.create(
        buildUser({ id: 4, username: 'tester', passwordHash: await hashPassword('tester123'), role: UserRole.TESTER })
      );
    });

    it('should return a token for valid credentials', async () => {
      const token = await service.login({ username: 'tester', password: 'tester123' });

      expect(token.tokenType).toBe('bearer');
      expect(await tokens.verify(token.accessToken)).toEqual({ id: 4, role: UserRole.TESTER });
    });

    it('should reject a wrong password and an unknown user alike', async () => {
      const expected = new UnauthorizedError('Invalid username or password');
      await expect(service.login({ username: 'tester', password: 'wrong' })).rejects.toThrow(expected);
      await expect(service.login({ username: 'nobody', password: 'tester123' })).rejects.toThrow(expected);
    });

    it('should refuse a deactivated account', async () => {
      const user = await users.getById(4);
      if (user) await users.update(user, { isActive: false });

      await expect(service.login({ username: 'tester', password: 'tester123' })).rejects.toThrow(DeniedError);
    });
  });

  describe('authenticate', () => {
    it('should resolve the stored role rather than the token claim', async () => {
      const user = await users.create(buildUser({ id: 5, role: UserRole.ADMIN }));
      const token = await tokens.issue(user);
      await users.update(user, { role: UserRole.VIEWER });

      expect(await service.authenticate(token.accessToken)).toEqual({ id: 5, role: UserRole.VIEWER });
    });

    it('should reject tokens of deleted or inactive users', async () => {
      const user = await users.create(buildUser({ id: 6 }));
      const token = await tokens.issue(user);

      await users.update(user, { isActive: false });
      await expect(service.authenticate(token.accessToken)).rejects.toThrow(UnauthorizedError);

      await users.delete(user);
      await expect(service.authenticate(token.accessToken)).rejects.toThrow('Could not validate credentials');
    });
  });

  it('should return the current user without the hash', async () => {
    await users.create(buildUser({ id: 2 }));

    const me = await service.me({ id: 2, role: UserRole.TESTER });

    expect(me).toEqual(toPublicUser(buildUser({ id: 2, createdAt: me.createdAt, updatedAt: me.updatedAt })));
  });
});
