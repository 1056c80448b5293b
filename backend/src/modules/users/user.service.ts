/**
 * backend/src/modules/users/user.service.ts
 *
 * WHY:
 * - Application layer for the Users module: one method per use case.
 * - Depends on UserRepositoryPort only; which adapter sits behind it is the
 *   composition root's decision.
 *
 * RULES:
 * - Exactly one port call per use case.
 * - Results and UserDomainErrors are forwarded unchanged.
 * - No HTTP, no SQL here.
 */

import type { Logger } from '../../shared/logger/logger';
import type { UserRepositoryPort } from './ports/user.repository.port';
import type { CreateUser, UpdateUser, User, UserId } from './user.types';

export class UserService {
  constructor(
    private readonly deps: {
      userRepo: UserRepositoryPort;
      logger: Logger;
    },
  ) {}

  async createUser(input: CreateUser): Promise<User> {
    const user = await this.deps.userRepo.createUser(input);

    this.deps.logger.info({
      msg: 'users.create.success',
      flow: 'users.create',
      userId: user.id,
    });

    return user;
  }

  async getUser(id: UserId): Promise<User> {
    return this.deps.userRepo.getUser(id);
  }

  async updateUser(input: UpdateUser): Promise<User> {
    const user = await this.deps.userRepo.updateUser(input);

    this.deps.logger.info({
      msg: 'users.update.success',
      flow: 'users.update',
      userId: user.id,
      fields: Object.keys(input).filter((k) => k !== 'id'),
    });

    return user;
  }

  async deleteUser(id: UserId): Promise<void> {
    await this.deps.userRepo.deleteUser(id);

    this.deps.logger.info({
      msg: 'users.delete.success',
      flow: 'users.delete',
      userId: id,
    });
  }
}
