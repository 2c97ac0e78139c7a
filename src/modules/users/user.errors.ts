/**
 * src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its error messages; they are part of the public API contract.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Every failure is 400 on the wire. The code is for logs only, so clients still
 *   see a single status whether the input was bad or the store was unavailable.
 * - Messages are matched verbatim by existing clients; do not reword them.
 */

import { AppError, type AppErrorCode, type AppErrorMeta } from '../../shared/http/errors';

export const USER_ERROR_STATUS = 400;

export const UserErrorMessages = {
  failedToFetchRecord: 'failed to fetch record from store',
  failedToDecodeRecord: 'failed to decode record',
  invalidUserData: 'invalid user data',
  invalidEmail: 'invalid email',
  couldNotMarshalItem: "couldn't marshal the item",
  couldNotDeleteItem: "couldn't delete the item",
  couldNotPutItem: 'could not store put item',
  userAlreadyExists: 'user already exists',
  userDoesNotExist: "user doesn't exist",
} as const;

function userError(code: AppErrorCode, message: string, meta?: AppErrorMeta) {
  return new AppError({ code, status: USER_ERROR_STATUS, message, meta });
}

export const UserErrors = {
  failedToFetchRecord(meta?: AppErrorMeta) {
    return userError('STORE_ERROR', UserErrorMessages.failedToFetchRecord, meta);
  },

  failedToDecodeRecord(meta?: AppErrorMeta) {
    return userError('STORE_ERROR', UserErrorMessages.failedToDecodeRecord, meta);
  },

  invalidUserData(meta?: AppErrorMeta) {
    return userError('VALIDATION_ERROR', UserErrorMessages.invalidUserData, meta);
  },

  invalidEmail(meta?: AppErrorMeta) {
    return userError('VALIDATION_ERROR', UserErrorMessages.invalidEmail, meta);
  },

  couldNotMarshalItem(meta?: AppErrorMeta) {
    return userError('STORE_ERROR', UserErrorMessages.couldNotMarshalItem, meta);
  },

  couldNotDeleteItem(meta?: AppErrorMeta) {
    return userError('STORE_ERROR', UserErrorMessages.couldNotDeleteItem, meta);
  },

  couldNotPutItem(meta?: AppErrorMeta) {
    return userError('STORE_ERROR', UserErrorMessages.couldNotPutItem, meta);
  },

  userAlreadyExists(meta?: AppErrorMeta) {
    return userError('CONFLICT', UserErrorMessages.userAlreadyExists, meta);
  },

  userDoesNotExist(meta?: AppErrorMeta) {
    return userError('NOT_FOUND', UserErrorMessages.userDoesNotExist, meta);
  },
} as const;
