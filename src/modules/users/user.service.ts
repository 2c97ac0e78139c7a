/**
 * src/modules/users/user.service.ts
 *
 * WHY:
 * - Persistence pipeline for the User entity: validate, check existence, write.
 * - Only place that talks to the UserStore.
 *
 * RULES:
 * - No HTTP here (controller owns request decoding and the response envelope).
 * - Every store failure is translated to a UserErrors AppError.
 * - At most one read and one write per operation. No retries.
 *
 * CONCURRENCY:
 * - With conditionalWrites off, create/update are check-then-write and NOT atomic:
 *   two concurrent creates for the same email can both succeed (last write wins).
 * - With conditionalWrites on, the write itself carries the existence condition and
 *   a lost race surfaces as "user already exists" / "user doesn't exist".
 */

import type { Logger } from '../../shared/logger/logger';
import type { AppError } from '../../shared/http/errors';
import { isEmailValid } from '../../shared/validation/is-valid-email';

import { EMPTY_USER, type User } from './user.types';
import { UserErrors } from './user.errors';
import { emailDomain } from './helpers/email-domain';
import { UserStoreError, type PutCondition, type UserStore } from './dal/user-store';

export type UserServiceDeps = {
  store: UserStore;
  logger: Logger;
  conditionalWrites: boolean;
};

export type UserOpParams = {
  requestId: string;
};

function isStoreError(err: unknown): err is UserStoreError {
  return err instanceof UserStoreError;
}

function readError(err: UserStoreError): AppError {
  return err.kind === 'decode'
    ? UserErrors.failedToDecodeRecord({ kind: err.kind })
    : UserErrors.failedToFetchRecord({ kind: err.kind });
}

export class UserService {
  constructor(private readonly deps: UserServiceDeps) {}

  /**
   * Keyed lookup. A missing key yields EMPTY_USER, not an error.
   */
  async getUser(email: string, params: UserOpParams): Promise<User> {
    const found = await this.read(email, 'users.get', params);
    return found ?? { ...EMPTY_USER };
  }

  /**
   * Full table scan. Unbounded: every stored record is loaded into memory.
   */
  async listUsers(params: UserOpParams): Promise<User[]> {
    try {
      return await this.deps.store.scan();
    } catch (err) {
      if (!isStoreError(err)) throw err;
      this.logFailure('users.list', err, params);
      throw readError(err);
    }
  }

  async createUser(user: User, params: UserOpParams): Promise<User> {
    const flow = 'users.create';

    if (!isEmailValid(user.email)) {
      throw UserErrors.invalidEmail({ flow });
    }

    const existing = await this.read(user.email, flow, params);
    if (existing && existing.email.length > 0) {
      throw UserErrors.userAlreadyExists({ flow, emailDomain: emailDomain(user.email) });
    }

    await this.write(user, this.deps.conditionalWrites ? 'absent' : 'none', flow, params);

    this.deps.logger.info(`${flow}.success`, {
      flow,
      requestId: params.requestId,
      emailDomain: emailDomain(user.email),
    });

    return user;
  }

  /**
   * Full replace. Existence means "the stored record has a non-empty email".
   */
  async updateUser(user: User, params: UserOpParams): Promise<User> {
    const flow = 'users.update';

    const existing = await this.read(user.email, flow, params);
    if (!existing || existing.email.length === 0) {
      throw UserErrors.userDoesNotExist({ flow, emailDomain: emailDomain(user.email) });
    }

    await this.write(user, this.deps.conditionalWrites ? 'present' : 'none', flow, params);

    this.deps.logger.info(`${flow}.success`, {
      flow,
      requestId: params.requestId,
      emailDomain: emailDomain(user.email),
    });

    return user;
  }

  /**
   * Deleting a key that is not stored succeeds.
   */
  async deleteUser(email: string, params: UserOpParams): Promise<void> {
    const flow = 'users.delete';

    try {
      await this.deps.store.delete(email);
    } catch (err) {
      if (!isStoreError(err)) throw err;
      this.logFailure(flow, err, params);
      throw UserErrors.couldNotDeleteItem({ flow, kind: err.kind });
    }

    this.deps.logger.info(`${flow}.success`, {
      flow,
      requestId: params.requestId,
      emailDomain: emailDomain(email),
    });
  }

  private async read(email: string, flow: string, params: UserOpParams): Promise<User | undefined> {
    try {
      return await this.deps.store.get(email);
    } catch (err) {
      if (!isStoreError(err)) throw err;
      this.logFailure(flow, err, params);
      throw readError(err);
    }
  }

  private async write(
    user: User,
    condition: PutCondition,
    flow: string,
    params: UserOpParams,
  ): Promise<void> {
    try {
      await this.deps.store.put(user, { condition });
    } catch (err) {
      if (!isStoreError(err)) throw err;
      this.logFailure(flow, err, params);

      if (err.kind === 'marshal') throw UserErrors.couldNotMarshalItem({ flow });
      if (err.kind === 'condition') {
        throw condition === 'absent'
          ? UserErrors.userAlreadyExists({ flow, emailDomain: emailDomain(user.email) })
          : UserErrors.userDoesNotExist({ flow, emailDomain: emailDomain(user.email) });
      }
      throw UserErrors.couldNotPutItem({ flow, kind: err.kind });
    }
  }

  private logFailure(flow: string, err: UserStoreError, params: UserOpParams): void {
    this.deps.logger.warn(`${flow}.store_failed`, {
      flow,
      requestId: params.requestId,
      kind: err.kind,
      message: err.message,
      cause: err.cause instanceof Error ? err.cause.message : undefined,
    });
  }
}
