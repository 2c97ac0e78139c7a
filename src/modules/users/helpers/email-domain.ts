/**
 * src/modules/users/helpers/email-domain.ts
 *
 * WHY:
 * - UserService logs `emailDomain` on every success and store failure;
 *   the full address (the record key) stays out of the logs.
 *
 * RULES:
 * - Pure function, never throws.
 * - Returns '' when there is no '@' (update/delete accept unvalidated keys).
 */

export function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1) : '';
}
