/**
 * src/modules/users/dal/inmem-user-store.ts
 *
 * WHY:
 * - Lets tests (and local dev without AWS/Redis) run the full pipeline in-process.
 * - Items go through the same marshal/unmarshal path as the real stores.
 *
 * HOW TO USE:
 * - const store = new InMemUserStore()
 */

import type { User } from '../user.types';
import { marshalUser, unmarshalUser, type UserItem } from './user-item';
import { UserStoreError, type PutOptions, type UserStore } from './user-store';

export class InMemUserStore implements UserStore {
  private readonly items = new Map<string, UserItem>();

  async get(email: string): Promise<User | undefined> {
    const item = this.items.get(email);
    return item ? unmarshalUser(item) : undefined;
  }

  async scan(): Promise<User[]> {
    return Array.from(this.items.values(), (item) => unmarshalUser(item));
  }

  async put(user: User, opts: PutOptions = {}): Promise<void> {
    const item = marshalUser(user);
    const condition = opts.condition ?? 'none';
    const exists = this.items.has(item.email);

    if (condition === 'absent' && exists) {
      throw new UserStoreError('condition', 'item already exists');
    }
    if (condition === 'present' && !exists) {
      throw new UserStoreError('condition', 'item does not exist');
    }

    this.items.set(item.email, item);
  }

  async delete(email: string): Promise<void> {
    this.items.delete(email);
  }

  async close(): Promise<void> {
    this.items.clear();
  }
}
