/**
 * src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - We need consistent error responses across all endpoints.
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status and .code to structured HTTP response.
 * - Fastify schema validation errors → 400.
 * - Other Fastify client errors (bad JSON, payload too large, ...) → their 4xx status.
 * - Unexpected errors → 500 with generic message, full stack logged.
 * - Unknown routes → 404 via the not-found handler.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - Always log through withRequestContext(logger, req).
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from './errors';
import type { AppErrorCode } from './errors';
import { withRequestContext } from '../logger/with-context';
import { errorFields } from '../logger/logger';
import type { Logger } from '../logger/logger';

export type ErrorResponseBody = {
  error: {
    code: AppErrorCode;
    message: string;
  };
};

function buildResponse(code: AppErrorCode, message: string): ErrorResponseBody {
  return { error: { code, message } };
}

function isClientError(status: number | undefined): status is number {
  return status !== undefined && status >= 400 && status < 500;
}

export function registerErrorHandler(app: FastifyInstance, logger: Logger): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(logger, req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        error: err.message,
        meta: err.meta,
      });

      return reply.status(err.status).send(buildResponse(err.code, err.message));
    }

    // 2) Schema validation (route-level JSON schema)
    if (err.validation) {
      const appErr = AppError.validationError(err.message);
      log.warn('validation_error', { flow: 'http.error', error: err.message });

      return reply.status(appErr.status).send(buildResponse(appErr.code, appErr.message));
    }

    // 3) Framework-level client errors keep their status
    if (isClientError(err.statusCode)) {
      log.warn('client_error', {
        flow: 'http.error',
        status: err.statusCode,
        fastifyCode: err.code,
        error: err.message,
      });

      return reply.status(err.statusCode).send(buildResponse('BAD_REQUEST', err.message));
    }

    // 4) Unexpected errors: never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      ...errorFields(err),
    });

    return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
  });

  app.setNotFoundHandler((req: FastifyRequest, reply: FastifyReply) => {
    const notFound = AppError.notFound(`Route ${req.method} ${req.url} not found`);
    return reply.status(notFound.status).send(buildResponse(notFound.code, notFound.message));
  });
}
