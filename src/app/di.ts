/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates the store client ONCE and injects it; no module reaches for a global client.
 * - Keeps modules testable (tests pass an InMemUserStore via `overrides`).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (which store, conditional writes) belong HERE.
 */

import type { AppConfig, StoreConfig } from './config';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import {
  createUserModule,
  DynamoUserStore,
  InMemUserStore,
  RedisUserStore,
  type UserModule,
  type UserStore,
} from '../modules/users';

export type AppDeps = {
  logger: Logger;
  userStore: UserStore;

  // modules
  users: UserModule;

  // lifecycle
  close: () => Promise<void>;
};

export type DepsOverrides = {
  userStore?: UserStore;
};

export async function createUserStore(config: StoreConfig): Promise<UserStore> {
  switch (config.driver) {
    case 'dynamodb':
      return DynamoUserStore.create({
        region: config.region,
        tableName: config.tableName,
        endpoint: config.endpoint,
      });
    case 'redis':
      return RedisUserStore.connect(config.redisUrl, config.tableName);
    case 'memory':
      return new InMemUserStore();
  }
}

export async function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): Promise<AppDeps> {
  const userStore = overrides.userStore ?? (await createUserStore(config.store));

  logger.info('store.ready', {
    flow: 'di',
    driver: overrides.userStore ? 'override' : config.store.driver,
    tableName: config.store.tableName,
    conditionalWrites: config.conditionalWrites,
  });

  // modules (no HTTP / no business logic here)
  const users = createUserModule({
    store: userStore,
    logger,
    conditionalWrites: config.conditionalWrites,
  });

  return {
    logger,
    userStore,
    users,
    close: async () => {
      await userStore.close();
    },
  };
}
