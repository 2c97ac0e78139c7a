/**
 * src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - One email = one user; email is the primary key in every store.
 *
 * RULES:
 * - Avoid leaking wire/store naming (firstname/lastname) outside schemas and DAL.
 */

export type User = {
  email: string;
  firstName: string;
  lastName: string;
};

/**
 * What a keyed lookup returns on the wire when nothing is stored under the key.
 * Callers cannot tell "not found" apart from a stored record with empty fields.
 */
export const EMPTY_USER: Readonly<User> = Object.freeze({
  email: '',
  firstName: '',
  lastName: '',
});
