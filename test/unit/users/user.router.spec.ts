import { describe, it, expect } from 'vitest';
import { createUserModule } from '../../../src/modules/users/user.module';
import { InMemUserStore } from '../../../src/modules/users/dal/inmem-user-store';
import type { UserStore } from '../../../src/modules/users/dal/user-store';
import type { ApiRequest } from '../../../src/shared/http/api-response';
import { logger } from '../../../src/shared/logger/logger';

function makeRouter(store: UserStore = new InMemUserStore()) {
  return createUserModule({ store, logger, conditionalWrites: false }).router;
}

function request(
  method: string,
  opts: { query?: Record<string, string>; body?: string } = {},
): ApiRequest {
  return {
    method,
    query: opts.query ?? {},
    body: opts.body ?? null,
    requestId: 'req-router',
  };
}

const JSON_HEADERS = { 'Content-Type': 'application/json' };

describe('UserRouter.dispatch', () => {
  it('answers unsupported methods with 405 "method not allowed"', async () => {
    const router = makeRouter();

    for (const method of ['PATCH', 'HEAD', 'OPTIONS', 'get']) {
      await expect(router.dispatch(request(method))).resolves.toEqual({
        statusCode: 405,
        headers: JSON_HEADERS,
        body: '"method not allowed"',
      });
    }
  });

  it('POST creates and echoes the submitted fields with 201', async () => {
    const router = makeRouter();
    const body = '{"email":"alice@example.com","firstname":"Alice","lastname":"Smith"}';

    await expect(router.dispatch(request('POST', { body }))).resolves.toEqual({
      statusCode: 201,
      headers: JSON_HEADERS,
      body,
    });
  });

  it('POST with an undecodable body is 400 "invalid user data"', async () => {
    const res = await makeRouter().dispatch(request('POST', { body: 'not json' }));

    expect(res.statusCode).toBe(400);
    expect(res.body).toBe('{"error":"invalid user data"}');
  });

  it('PUT with an undecodable body is 400 "invalid email"', async () => {
    const res = await makeRouter().dispatch(request('PUT', { body: '{' }));

    expect(res.statusCode).toBe(400);
    expect(res.body).toBe('{"error":"invalid email"}');
  });

  it('GET without email lists, GET with email fetches one', async () => {
    const store = new InMemUserStore();
    await store.put({ email: 'a@example.com', firstName: 'A', lastName: 'One' });
    const router = makeRouter(store);

    const list = await router.dispatch(request('GET'));
    expect(list.statusCode).toBe(200);
    expect(list.body).toBe('[{"email":"a@example.com","firstname":"A","lastname":"One"}]');

    const one = await router.dispatch(request('GET', { query: { email: 'a@example.com' } }));
    expect(one.statusCode).toBe(200);
    expect(one.body).toBe('{"email":"a@example.com","firstname":"A","lastname":"One"}');
  });

  it('GET with an empty email parameter lists', async () => {
    const res = await makeRouter().dispatch(request('GET', { query: { email: '' } }));

    expect(res.statusCode).toBe(200);
    expect(res.body).toBe('[]');
  });

  it('DELETE returns the fixed success message even without an email', async () => {
    const res = await makeRouter().dispatch(request('DELETE'));

    expect(res).toEqual({
      statusCode: 200,
      headers: JSON_HEADERS,
      body: '"User deleted successfully"',
    });
  });

  it('rethrows errors that are not AppErrors', async () => {
    const broken: UserStore = {
      get: async () => undefined,
      scan: async () => {
        throw new TypeError('boom');
      },
      put: async () => undefined,
      delete: async () => undefined,
      close: async () => undefined,
    };

    await expect(makeRouter(broken).dispatch(request('GET'))).rejects.toThrowError('boom');
  });
});
