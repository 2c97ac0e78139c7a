/**
 * src/modules/users/dal/user-item.ts
 *
 * WHY:
 * - Single mapping between the domain User and the stored item
 *   (`email`, `firstname`, `lastname`), shared by every store.
 *
 * RULES:
 * - Marshal failures throw UserStoreError('marshal'); unmarshal failures throw 'decode'.
 * - Missing name attributes decode to ''; a missing or non-string email never decodes.
 */

import { z } from 'zod';
import type { User } from '../user.types';
import { UserStoreError } from './user-store';

export const userItemSchema = z.object({
  email: z.string(),
  firstname: z.string().optional().default(''),
  lastname: z.string().optional().default(''),
});

export type UserItem = {
  email: string;
  firstname: string;
  lastname: string;
};

export function marshalUser(user: User): UserItem {
  const parsed = userItemSchema.safeParse({
    email: user.email,
    firstname: user.firstName,
    lastname: user.lastName,
  });

  if (!parsed.success) {
    throw new UserStoreError('marshal', 'user cannot be marshalled to a store item', {
      cause: parsed.error,
    });
  }

  return parsed.data;
}

export function unmarshalUser(item: unknown): User {
  const parsed = userItemSchema.safeParse(item);

  if (!parsed.success) {
    throw new UserStoreError('decode', 'store item is not a valid user', {
      cause: parsed.error,
    });
  }

  return {
    email: parsed.data.email,
    firstName: parsed.data.firstname,
    lastName: parsed.data.lastname,
  };
}
