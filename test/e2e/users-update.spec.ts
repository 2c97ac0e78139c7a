import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import {
  createUserViaApi,
  readJson,
  type ErrorResponseBody,
  type UserResponseBody,
} from '../helpers/users-api';

const alice: UserResponseBody = { email: 'alice@example.com', firstname: 'Alice', lastname: 'Smith' };

describe('PUT /users', () => {
  it('replaces an existing user → 200 with the new record', async () => {
    const { app, close } = await buildTestApp();

    try {
      await createUserViaApi(app, alice);

      const updated = { email: alice.email, firstname: 'Alicia', lastname: 'Stone' };
      const res = await app.inject({ method: 'PUT', url: '/users', payload: updated });

      expect(res.statusCode).toBe(200);
      expect(readJson<UserResponseBody>(res)).toEqual(updated);

      const after = await app.inject({ method: 'GET', url: '/users', query: { email: alice.email } });
      expect(readJson<UserResponseBody>(after)).toEqual(updated);
    } finally {
      await close();
    }
  });

  it('is a full replace: omitted fields become empty', async () => {
    const { app, close } = await buildTestApp();

    try {
      await createUserViaApi(app, alice);

      const res = await app.inject({
        method: 'PUT',
        url: '/users',
        payload: { email: alice.email, firstname: 'Alicia' },
      });

      expect(res.statusCode).toBe(200);
      expect(readJson<UserResponseBody>(res)).toEqual({
        email: alice.email,
        firstname: 'Alicia',
        lastname: '',
      });
    } finally {
      await close();
    }
  });

  it('rejects an unknown user → 400 "user doesn\'t exist"', async () => {
    const { app, userStore, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'PUT', url: '/users', payload: alice });

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(res)).toEqual({ error: "user doesn't exist" });
      await expect(userStore.scan()).resolves.toEqual([]);
    } finally {
      await close();
    }
  });

  it('reports a malformed body as "invalid email"', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'PUT',
        url: '/users',
        headers: { 'content-type': 'application/json' },
        payload: '[not json',
      });

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(res)).toEqual({ error: 'invalid email' });
    } finally {
      await close();
    }
  });
});
