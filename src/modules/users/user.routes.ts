/**
 * src/modules/users/user.routes.ts
 *
 * WHY:
 * - Declares the Users endpoint on Fastify.
 * - Every method reaches the router so unsupported ones get the 405 envelope
 *   instead of Fastify's own 404.
 *
 * RULES:
 * - No business logic here.
 * - Bodies arrive as raw text (see app/server.ts); decoding belongs to the controller.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { ApiRequest } from '../../shared/http/api-response';
import type { UserRouter } from './user.router';

export const USERS_PATH = '/users';

function readQuery(raw: unknown): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  if (!raw || typeof raw !== 'object') return out;

  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string') {
      out[key] = value;
    } else if (Array.isArray(value) && typeof value[0] === 'string') {
      // repeated param (?email=a&email=b): first one wins
      out[key] = value[0];
    }
  }
  return out;
}

export function toApiRequest(req: FastifyRequest): ApiRequest {
  return {
    method: req.method,
    query: readQuery(req.query),
    body: typeof req.body === 'string' ? req.body : null,
    requestId: req.requestContext.requestId,
  };
}

export function registerUserRoutes(app: FastifyInstance, router: UserRouter) {
  app.all(USERS_PATH, async (req, reply) => {
    const res = await router.dispatch(toApiRequest(req));
    return reply.status(res.statusCode).headers(res.headers).send(res.body);
  });
}
