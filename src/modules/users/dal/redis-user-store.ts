/**
 * src/modules/users/dal/redis-user-store.ts
 *
 * WHY:
 * - Redis implementation of UserStore for deployments that already run Redis.
 * - Each user is one JSON string under `<namespace>:<email>`; the namespace is the table name.
 *
 * IMPORTANT:
 * - As with the cache, we derive the client type from createClient() to avoid
 *   @redis/client type conflicts.
 * - Conditional puts map to SET NX (absent) / SET XX (present), which are atomic in Redis.
 *
 * LOGGING:
 * - Connection errors fire outside any request; we use the global logger directly.
 */

import { createClient } from 'redis';

import { logger } from '../../../shared/logger/logger';
import type { User } from '../user.types';
import { marshalUser, unmarshalUser } from './user-item';
import { UserStoreError, type PutOptions, type UserStore } from './user-store';

export type RedisClient = ReturnType<typeof createClient>;

const SCAN_COUNT = 100;

function escapeGlob(value: string): string {
  return value.replace(/[*?[\]\\]/g, '\\$&');
}

function decodeItem(raw: string): User {
  let item: unknown;
  try {
    item = JSON.parse(raw);
  } catch (err) {
    throw new UserStoreError('decode', 'stored value is not JSON', { cause: err });
  }
  return unmarshalUser(item);
}

export class RedisUserStore implements UserStore {
  constructor(
    private readonly client: RedisClient,
    private readonly namespace: string,
  ) {}

  static async connect(redisUrl: string, namespace: string): Promise<RedisUserStore> {
    const client = createClient({ url: redisUrl });

    client.on('error', (err: Error) => {
      logger.error('redis.client_error', {
        flow: 'redis',
        message: err.message,
        stack: err.stack,
      });
    });

    await client.connect();
    return new RedisUserStore(client, namespace);
  }

  keyFor(email: string): string {
    return `${this.namespace}:${email}`;
  }

  async get(email: string): Promise<User | undefined> {
    let raw: string | null;
    try {
      raw = await this.client.get(this.keyFor(email));
    } catch (err) {
      throw new UserStoreError('fetch', 'GET failed', { cause: err });
    }

    return raw === null ? undefined : decodeItem(raw);
  }

  async scan(): Promise<User[]> {
    let values: Array<string | null>;
    try {
      const keys: string[] = [];
      for await (const key of this.client.scanIterator({
        MATCH: `${escapeGlob(this.namespace)}:*`,
        COUNT: SCAN_COUNT,
      })) {
        keys.push(key);
      }
      values = keys.length > 0 ? await this.client.mGet(keys) : [];
    } catch (err) {
      throw new UserStoreError('fetch', 'SCAN failed', { cause: err });
    }

    const users: User[] = [];
    for (const raw of values) {
      // key removed between SCAN and MGET
      if (raw !== null) users.push(decodeItem(raw));
    }
    return users;
  }

  async put(user: User, opts: PutOptions = {}): Promise<void> {
    const item = marshalUser(user);
    const condition = opts.condition ?? 'none';
    const key = this.keyFor(item.email);
    const value = JSON.stringify(item);

    let reply: string | null;
    try {
      if (condition === 'absent') {
        reply = await this.client.set(key, value, { NX: true });
      } else if (condition === 'present') {
        reply = await this.client.set(key, value, { XX: true });
      } else {
        reply = await this.client.set(key, value);
      }
    } catch (err) {
      throw new UserStoreError('put', 'SET failed', { cause: err });
    }

    if (reply === null) {
      throw new UserStoreError('condition', `SET condition failed (${condition})`);
    }
  }

  async delete(email: string): Promise<void> {
    try {
      await this.client.del(this.keyFor(email));
    } catch (err) {
      throw new UserStoreError('delete', 'DEL failed', { cause: err });
    }
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
