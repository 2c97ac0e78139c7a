/**
 * src/modules/users/dal/user-store.ts
 *
 * WHY:
 * - The service depends on this abstraction, never on a concrete client,
 *   so DI picks DynamoDB, Redis or memory and tests can inject a fake.
 *
 * RULES:
 * - No AppError here (service maps UserStoreError -> UserErrors).
 * - Absence is explicit: get() resolves undefined for a missing key.
 * - delete() of a missing key is not an error.
 */

import type { User } from '../user.types';

/**
 * - none:    unconditional upsert
 * - absent:  fail with kind 'condition' if the key already exists
 * - present: fail with kind 'condition' if the key does not exist
 */
export type PutCondition = 'none' | 'absent' | 'present';

export type PutOptions = {
  condition?: PutCondition;
};

export interface UserStore {
  get(email: string): Promise<User | undefined>;
  scan(): Promise<User[]>;
  put(user: User, opts?: PutOptions): Promise<void>;
  delete(email: string): Promise<void>;
  close(): Promise<void>;
}

export type UserStoreErrorKind = 'fetch' | 'decode' | 'marshal' | 'put' | 'condition' | 'delete';

export class UserStoreError extends Error {
  readonly kind: UserStoreErrorKind;

  constructor(kind: UserStoreErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UserStoreError';
    this.kind = kind;
  }
}
