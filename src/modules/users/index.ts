/**
 * src/modules/users/index.ts
 *
 * WHY:
 * - Public surface of the users module for the composition root.
 * - Prevents deep imports into /dal from outside the module.
 */

export { createUserModule } from './user.module';
export type { UserModule } from './user.module';
export type { User } from './user.types';
export type { UserStore } from './dal/user-store';
export { DynamoUserStore } from './dal/dynamo-user-store';
export { RedisUserStore } from './dal/redis-user-store';
export { InMemUserStore } from './dal/inmem-user-store';
