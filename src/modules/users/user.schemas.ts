/**
 * src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Centralizes request/response shapes for the Users API.
 * - Wire keys are lowercase (`firstname`, `lastname`); the domain type is camelCase.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Missing or null string fields decode to '' (the record is a full replace, never a patch).
 * - Body keys match wire keys exactly first, then case-insensitively (`firstName` fills `firstname`).
 * - A JSON `null` body decodes to the empty user.
 * - Email format is NOT checked here; the service decides when it matters.
 */

import { z } from 'zod';
import type { User } from './user.types';

const wireString = z
  .string()
  .nullish()
  .transform((v) => v ?? '');

export const userBodySchema = z.object({
  email: wireString,
  firstname: wireString,
  lastname: wireString,
});

const WIRE_KEYS = ['email', 'firstname', 'lastname'] as const;
type WireKey = (typeof WIRE_KEYS)[number];

function isWireKey(key: string): key is WireKey {
  return WIRE_KEYS.some((k) => k === key);
}

function toWireKey(key: string): WireKey | undefined {
  if (isWireKey(key)) return key;
  const folded = key.toLowerCase();
  return WIRE_KEYS.find((k) => k === folded);
}

/**
 * Renames body keys onto the wire keys and drops the rest.
 * Later keys overwrite earlier ones that land on the same wire key.
 * Non-objects pass through for the schema to reject.
 */
function foldWireKeys(json: unknown): unknown {
  if (json === null) return {};
  if (typeof json !== 'object' || Array.isArray(json)) return json;

  const folded: Partial<Record<WireKey, unknown>> = {};
  for (const [key, value] of Object.entries(json)) {
    const wireKey = toWireKey(key);
    if (wireKey) folded[wireKey] = value;
  }
  return folded;
}

export type UserResponse = {
  email: string;
  firstname: string;
  lastname: string;
};

export type DecodeUserResult = { ok: true; user: User } | { ok: false; reason: string };

/**
 * Parses a raw request body into a User.
 * Fails for empty bodies, malformed JSON, non-object JSON and fields that are neither string nor null.
 */
export function decodeUserBody(raw: string | null): DecodeUserResult {
  if (raw === null || raw.trim() === '') {
    return { ok: false, reason: 'empty body' };
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : 'malformed JSON' };
  }

  const parsed = userBodySchema.safeParse(foldWireKeys(json));
  if (!parsed.success) {
    return { ok: false, reason: parsed.error.issues.map((i) => i.message).join('; ') };
  }

  return {
    ok: true,
    user: {
      email: parsed.data.email,
      firstName: parsed.data.firstname,
      lastName: parsed.data.lastname,
    },
  };
}

export function toUserResponse(user: User): UserResponse {
  return {
    email: user.email,
    firstname: user.firstName,
    lastname: user.lastName,
  };
}
