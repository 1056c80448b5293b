/**
 * backend/src/modules/users/user.routes.ts
 *
 * WHY:
 * - Declares Users module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { UserController } from './user.controller';

export function registerUserRoutes(app: FastifyInstance, controller: UserController) {
  app.post('/users', controller.createUser.bind(controller));
  app.get('/users/:id', controller.getUser.bind(controller));
  app.put('/users/:id', controller.updateUser.bind(controller));
  app.delete('/users/:id', controller.deleteUser.bind(controller));
}
