/**
 * src/lambda.ts
 *
 * WHY:
 * - AWS Lambda entrypoint behind an API Gateway proxy integration.
 * - Same router as the HTTP server; the event is mapped to an ApiRequest and the
 *   envelope goes back unchanged.
 *
 * HOW IT WORKS:
 * - Deps (config + store client) are built once per container, on the first invocation,
 *   and reused by every later invocation. Nothing else is shared between invocations.
 * - createLambdaHandler() takes the deps explicitly so tests can pass an in-memory store.
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { randomUUID } from 'node:crypto';

import { buildConfig } from './app/config';
import { buildDeps, type AppDeps } from './app/di';
import { internalErrorResponse, type ApiRequest } from './shared/http/api-response';
import { logger } from './shared/logger/logger';

type QueryParams = APIGatewayProxyEvent['queryStringParameters'];

function readQuery(params: QueryParams): Record<string, string | undefined> {
  return params ? { ...params } : {};
}

function readBody(event: APIGatewayProxyEvent): string | null {
  if (event.body === null) return null;
  return event.isBase64Encoded ? Buffer.from(event.body, 'base64').toString('utf8') : event.body;
}

export function toApiRequest(event: APIGatewayProxyEvent, context?: Context): ApiRequest {
  return {
    method: event.httpMethod,
    query: readQuery(event.queryStringParameters),
    body: readBody(event),
    requestId: event.requestContext?.requestId ?? context?.awsRequestId ?? randomUUID(),
  };
}

export function createLambdaHandler(getDeps: () => Promise<AppDeps>) {
  return async (event: APIGatewayProxyEvent, context?: Context): Promise<APIGatewayProxyResult> => {
    const req = toApiRequest(event, context);

    try {
      const deps = await getDeps();
      return await deps.users.router.dispatch(req);
    } catch (err) {
      logger.error('lambda.unhandled_error', {
        flow: 'lambda',
        requestId: req.requestId,
        message: err instanceof Error ? err.message : String(err),
        stack: err instanceof Error ? err.stack : undefined,
      });
      return internalErrorResponse();
    }
  };
}

let depsPromise: Promise<AppDeps> | undefined;

function containerDeps(): Promise<AppDeps> {
  if (!depsPromise) {
    depsPromise = buildDeps(buildConfig()).catch((err: unknown) => {
      // let the next invocation retry the cold start
      depsPromise = undefined;
      throw err;
    });
  }
  return depsPromise;
}

export const handler = createLambdaHandler(containerDeps);
