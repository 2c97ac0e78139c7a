/**
 * src/shared/http/api-response.ts
 *
 * WHY:
 * - One response envelope for every operation, whichever entrypoint carries it
 *   (Fastify route or Lambda proxy integration).
 * - Operations stay transport-agnostic: they take an ApiRequest and return an ApiResponse.
 *
 * RULES:
 * - Body is always JSON text, header is always application/json.
 * - Error bodies are `{ error: string }`; nothing else (codes, meta, stacks) goes on the wire.
 */

import { AppError } from './errors';

export type ApiRequest = {
  method: string;
  query: Readonly<Record<string, string | undefined>>;
  body: string | null;
  requestId: string;
};

export type ApiResponse = {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
};

export type ErrorBody = {
  error?: string;
};

export const JSON_HEADERS = { 'Content-Type': 'application/json' } as const;

export function apiResponse(statusCode: number, body: unknown): ApiResponse {
  return {
    statusCode,
    headers: { ...JSON_HEADERS },
    body: JSON.stringify(body) ?? 'null',
  };
}

export function errorResponse(err: AppError): ApiResponse {
  const body: ErrorBody = { error: err.message || undefined };
  return apiResponse(err.status, body);
}

export const INTERNAL_ERROR_MESSAGE = 'internal server error';

export function internalErrorResponse(): ApiResponse {
  return errorResponse(AppError.internal(INTERNAL_ERROR_MESSAGE));
}
