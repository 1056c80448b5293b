/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring: port -> service -> controller -> routes.
 * - The repository adapter arrives as a UserRepositoryPort; this module never
 *   knows whether it is Postgres or in-memory.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';

import type { UserRepositoryPort } from './ports/user.repository.port';
import { UserController } from './user.controller';
import { UserService } from './user.service';
import { registerUserRoutes } from './user.routes';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: { userRepo: UserRepositoryPort; logger: Logger }) {
  const userService = new UserService({
    userRepo: deps.userRepo,
    logger: deps.logger,
  });

  const controller = new UserController(userService);

  return {
    userRepo: deps.userRepo,
    userService,
    registerRoutes(app: FastifyInstance) {
      registerUserRoutes(app, controller);
    },
  };
}
