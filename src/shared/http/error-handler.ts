/**
 * src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError or our envelope.
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError -> its status + `{ error: message }`.
 * - Fastify client errors (oversized body, bad content length...) -> their 4xx + message.
 * - Anything else -> 500 with a generic message.
 * - Log every error with request context.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from './errors';
import { errorResponse, internalErrorResponse, type ApiResponse } from './api-response';
import { withRequestContext } from '../logger/with-context';

function isClientError(err: FastifyError): err is FastifyError & { statusCode: number } {
  return typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500;
}

function send(reply: FastifyReply, res: ApiResponse) {
  return reply.status(res.statusCode).headers(res.headers).send(res.body);
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
      });

      return send(reply, errorResponse(err));
    }

    // 2) Framework-level client errors
    if (isClientError(err)) {
      log.warn('client_error', {
        flow: 'http.error',
        code: err.code,
        status: err.statusCode,
        message: err.message,
      });

      return send(
        reply,
        errorResponse(
          new AppError({
            code: 'VALIDATION_ERROR',
            status: err.statusCode,
            message: err.message,
          }),
        ),
      );
    }

    // 3) Unexpected errors — never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return send(reply, internalErrorResponse());
  });
}
