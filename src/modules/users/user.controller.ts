/**
 * src/modules/users/user.controller.ts
 *
 * WHY:
 * - Maps an ApiRequest -> service call -> ApiResponse, one method per operation.
 * - Transport-agnostic: the Fastify route and the Lambda handler share it.
 *
 * RULES:
 * - No store access here.
 * - Decode bodies with the Zod schema and throw AppError (UserErrors).
 */

import { apiResponse, type ApiRequest, type ApiResponse } from '../../shared/http/api-response';
import { UserErrors } from './user.errors';
import { decodeUserBody, toUserResponse } from './user.schemas';
import type { UserService } from './user.service';

export const USER_DELETED_MESSAGE = 'User deleted successfully';

export class UserController {
  constructor(private readonly userService: UserService) {}

  async getUser(req: ApiRequest): Promise<ApiResponse> {
    const email = req.query.email;
    const params = { requestId: req.requestId };

    if (email) {
      const user = await this.userService.getUser(email, params);
      return apiResponse(200, toUserResponse(user));
    }

    const users = await this.userService.listUsers(params);
    return apiResponse(200, users.map(toUserResponse));
  }

  async createUser(req: ApiRequest): Promise<ApiResponse> {
    const decoded = decodeUserBody(req.body);
    if (!decoded.ok) {
      throw UserErrors.invalidUserData({ flow: 'users.create', reason: decoded.reason });
    }

    const created = await this.userService.createUser(decoded.user, { requestId: req.requestId });
    return apiResponse(201, toUserResponse(created));
  }

  async updateUser(req: ApiRequest): Promise<ApiResponse> {
    const decoded = decodeUserBody(req.body);
    if (!decoded.ok) {
      // Existing clients match on this message for update decode failures.
      throw UserErrors.invalidEmail({ flow: 'users.update', reason: decoded.reason });
    }

    const updated = await this.userService.updateUser(decoded.user, { requestId: req.requestId });
    return apiResponse(200, toUserResponse(updated));
  }

  async deleteUser(req: ApiRequest): Promise<ApiResponse> {
    await this.userService.deleteUser(req.query.email ?? '', { requestId: req.requestId });
    return apiResponse(200, USER_DELETED_MESSAGE);
  }
}
