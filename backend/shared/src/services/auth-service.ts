import * as bcrypt from 'bcryptjs';
import { PublicUser, Principal, User, UserRole, UserStore } from '../types';
import { UserRepository } from '../repositories/user-repository';
import { LoginInput, RegisterInput, ValidationError } from '../utils/validators';
import { DeniedError, NotFoundError, UnauthorizedError } from '../utils/errors';
import { logger } from '../utils/logger';
import { AccessToken, TokenService } from './token-service';

const BCRYPT_ROUNDS = 10;

// Roles open to self-registration
const REGISTRABLE_ROLES: readonly UserRole[] = [UserRole.TESTER, UserRole.VIEWER];

export async function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, BCRYPT_ROUNDS);
}

export async function verifyPassword(password: string, passwordHash: string): Promise<boolean> {
  return bcrypt.compare(password, passwordHash);
}

export function toPublicUser(user: User): PublicUser {
  const { passwordHash, ...publicUser } = user;
  return publicUser;
}

/**
 * Auth Service
 * Login, self-registration and principal resolution
 */
export class AuthService {
  constructor(
    private users: UserStore = new UserRepository(),
    private tokens: TokenService = new TokenService()
  ) {}

  async login(input: LoginInput): Promise<AccessToken> {
    const user = await this.users.getByUsername(input.username);

    if (!user || !(await verifyPassword(input.password, user.passwordHash))) {
      logger.warn('Invalid login attempt', { username: input.username });
      throw new UnauthorizedError('Invalid username or password');
    }

    if (!user.isActive) {
      throw new DeniedError('User account is deactivated');
    }

    logger.info('User logged in', { userId: user.id, role: user.role });
    return this.tokens.issue(user);
  }

  async register(input: RegisterInput): Promise<PublicUser> {
    const role = input.role ?? UserRole.TESTER;
    if (!REGISTRABLE_ROLES.includes(role)) {
      throw new ValidationError(`role must be one of: ${REGISTRABLE_ROLES.join(', ')}`, 'role', role);
    }

    const user = await this.users.create({
      id: await this.users.nextId(),
      email: input.email,
      username: input.username,
      fullName: input.fullName,
      passwordHash: await hashPassword(input.password),
      role,
      isActive: true,
    });

    logger.info('User registered', { userId: user.id, role });
    return toPublicUser(user);
  }

  /**
   * Resolve a bearer token to an active principal
   */
  async authenticate(token: string): Promise<Principal> {
    const claims = await this.tokens.verify(token);
    const user = await this.users.getById(claims.id);

    if (!user || !user.isActive) {
      throw new UnauthorizedError('Could not validate credentials');
    }

    // Role is read from the stored user so demotions apply immediately
    return { id: user.id, role: user.role };
  }

  async me(principal: Principal): Promise<PublicUser> {
    const user = await this.users.getById(principal.id);
    if (!user) {
      throw new NotFoundError('User', principal.id);
    }
    return toPublicUser(user);
  }
}
