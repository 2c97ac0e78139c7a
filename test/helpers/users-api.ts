import type { FastifyInstance } from 'fastify';

export type UserResponseBody = {
  email: string;
  firstname: string;
  lastname: string;
};

export type ErrorResponseBody = {
  error?: string;
};

export function readJson<T>(res: { json: () => unknown }): T {
  return res.json() as T;
}

export async function createUserViaApi(app: FastifyInstance, body: UserResponseBody) {
  return app.inject({ method: 'POST', url: '/users', payload: body });
}
