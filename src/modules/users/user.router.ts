/**
 * src/modules/users/user.router.ts
 *
 * WHY:
 * - Entry router: one method token -> one controller operation.
 * - Converts AppError into the error envelope so every entrypoint answers the same way.
 *
 * RULES:
 * - Exactly GET, POST, PUT, DELETE. Anything else is 405 "method not allowed".
 * - Unknown (non-AppError) errors are rethrown; the entrypoint maps them to 500.
 */

import type { Logger } from '../../shared/logger/logger';
import { AppError } from '../../shared/http/errors';
import {
  apiResponse,
  errorResponse,
  type ApiRequest,
  type ApiResponse,
} from '../../shared/http/api-response';
import type { UserController } from './user.controller';

export const METHOD_NOT_ALLOWED_MESSAGE = 'method not allowed';

export function unhandledMethod(): ApiResponse {
  return apiResponse(405, METHOD_NOT_ALLOWED_MESSAGE);
}

export class UserRouter {
  constructor(
    private readonly controller: UserController,
    private readonly logger: Logger,
  ) {}

  async dispatch(req: ApiRequest): Promise<ApiResponse> {
    try {
      return await this.route(req);
    } catch (err) {
      if (!(err instanceof AppError)) throw err;

      this.logger.warn('users.request_failed', {
        flow: 'users.router',
        requestId: req.requestId,
        method: req.method,
        code: err.code,
        status: err.status,
        message: err.message,
        meta: err.meta,
      });

      return errorResponse(err);
    }
  }

  private route(req: ApiRequest): Promise<ApiResponse> {
    switch (req.method) {
      case 'GET':
        return this.controller.getUser(req);
      case 'POST':
        return this.controller.createUser(req);
      case 'PUT':
        return this.controller.updateUser(req);
      case 'DELETE':
        return this.controller.deleteUser(req);
      default:
        return Promise.resolve(unhandledMethod());
    }
  }
}
