/**
 * src/shared/validation/is-valid-email.ts
 *
 * RULES:
 * - Pure function.
 * - Never throws.
 * - Shape only: no DNS lookups, no internationalized domains.
 */

export const EMAIL_MIN_LENGTH = 3;
export const EMAIL_MAX_LENGTH = 254;

// local part (1-64 chars) @ dot-separated labels, each 1-63 alphanumerics/hyphens,
// never starting or ending with a hyphen.
const EMAIL_PATTERN =
  /^[a-zA-Z0-9.!#$%&'*+/=?^_`{|}~-]{1,64}@[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*$/;

export function isEmailValid(email: string): boolean {
  if (email.length < EMAIL_MIN_LENGTH || email.length > EMAIL_MAX_LENGTH) return false;
  return EMAIL_PATTERN.test(email);
}
