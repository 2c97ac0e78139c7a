/**
 * src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring: store -> service -> controller -> router.
 *
 * RULES:
 * - No infra creation here (DI passes the store in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';

import type { UserStore } from './dal/user-store';
import { UserService } from './user.service';
import { UserController } from './user.controller';
import { UserRouter } from './user.router';
import { registerUserRoutes } from './user.routes';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: {
  store: UserStore;
  logger: Logger;
  conditionalWrites: boolean;
}) {
  const userService = new UserService({
    store: deps.store,
    logger: deps.logger,
    conditionalWrites: deps.conditionalWrites,
  });

  const controller = new UserController(userService);
  const router = new UserRouter(controller, deps.logger);

  return {
    userService,
    router,
    registerRoutes(app: FastifyInstance) {
      registerUserRoutes(app, router);
    },
  };
}
