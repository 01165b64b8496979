import {
  Action,
  PageOptions,
  PageResult,
  Principal,
  PublicUser,
  ResourceType,
  User,
  UserFilter,
  UserStore,
} from '../types';
import { UserRepository } from '../repositories/user-repository';
import { assertAuthorized } from '../policy/policy-engine';
import { buildPage } from '../utils/dynamodb-client';
import { NotFoundError } from '../utils/errors';
import { UserUpdateInput, ValidationError } from '../utils/validators';
import { logger } from '../utils/logger';
import { toPublicUser } from './auth-service';

export class UserService {
  constructor(private users: UserStore = new UserRepository()) {}

  async list(principal: Principal, filter: UserFilter = {}, page: PageOptions = {}): Promise<PageResult<PublicUser>> {
    assertAuthorized(principal, Action.READ, ResourceType.USER);
    const users = await this.users.list(filter);
    return buildPage(users.map(toPublicUser), page);
  }

  async get(principal: Principal, id: number): Promise<PublicUser> {
    assertAuthorized(principal, Action.READ, ResourceType.USER);
    return toPublicUser(await this.require(id));
  }

  async update(principal: Principal, id: number, input: UserUpdateInput): Promise<PublicUser> {
    assertAuthorized(principal, Action.UPDATE, ResourceType.USER);
    const current = await this.require(id);

    if (Object.keys(input).length === 0) {
      return toPublicUser(current);
    }

    const updated = await this.users.update(current, input);
    logger.info('User updated', { userId: id, fields: Object.keys(input) });
    return toPublicUser(updated);
  }

  async delete(principal: Principal, id: number): Promise<void> {
    assertAuthorized(principal, Action.DELETE, ResourceType.USER);
    if (id === principal.id) {
      throw new ValidationError('Cannot delete yourself', 'id', id);
    }

    const user = await this.require(id);
    await this.users.delete(user);
    logger.info('User deleted', { userId: id });
  }

  private async require(id: number): Promise<User> {
    const user = await this.users.getById(id);
    if (!user) {
      throw new NotFoundError('User', id);
    }
    return user;
  }
}
