/**
 * src/shared/http/request-context.ts
 *
 * WHY:
 * - We want a stable requestId for logs, debugging and tracing.
 * - Upstream proxies (API Gateway, load balancers) may already assign one; reuse it.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export type RequestContext = {
  requestId: string;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

const MAX_REQUEST_ID_LENGTH = 128;

export function resolveRequestId(rawHeader: unknown): string {
  if (typeof rawHeader !== 'string') return randomUUID();

  const trimmed = rawHeader.trim();
  if (!trimmed || trimmed.length > MAX_REQUEST_ID_LENGTH) return randomUUID();

  return trimmed;
}

export function registerRequestContext(app: FastifyInstance) {
  app.decorateRequest('requestContext', null);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.requestContext = {
      requestId: resolveRequestId(req.headers['x-request-id']),
    };

    done();
  });
}
