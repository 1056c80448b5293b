/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - We need consistent error responses across all endpoints.
 * - Internal details (meta, causes, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status and .code to structured HTTP response.
 * - Zod errors → 400 (safety net if a controller misses one).
 * - Fastify body-parse errors (malformed JSON, empty JSON body) → 400.
 * - Other Fastify client errors keep their status (413 too large, 415 media type).
 * - Unexpected errors → 500 with generic message.
 * - Log all errors with request context.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { AppError, type AppErrorCode } from './errors';
import { withRequestContext } from '../logger/with-context';
import { serializeError } from '../logger/serialize-error';

export type ErrorResponseBody = {
  error: {
    code: AppErrorCode;
    message: string;
  };
};

const SENSITIVE_META_KEYS = new Set(['password', 'token', 'secret', 'databaseUrl']);

export function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

export function buildErrorResponse(code: AppErrorCode, message: string): ErrorResponseBody {
  return { error: { code, message } };
}

const BODY_PARSE_ERROR_CODES = new Set([
  'FST_ERR_CTP_INVALID_JSON_BODY',
  'FST_ERR_CTP_EMPTY_JSON_BODY',
]);

const CLIENT_ERROR_MESSAGES: Partial<Record<number, string>> = {
  413: 'Request body too large',
  415: 'Unsupported media type',
};

function clientErrorStatus(err: FastifyError): number | undefined {
  const status = err.statusCode;
  if (typeof status !== 'number' || status < 400 || status >= 500) return undefined;
  return BODY_PARSE_ERROR_CODES.has(err.code) ? 400 : status;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      const meta = redactMeta(err.meta);

      if (err.status >= 500) {
        log.error('app_error', {
          flow: 'http.error',
          code: err.code,
          status: err.status,
          message: err.message,
          meta,
          cause: err.cause === undefined ? undefined : serializeError(err.cause),
        });
      } else {
        log.warn('app_error', {
          flow: 'http.error',
          code: err.code,
          status: err.status,
          message: err.message,
          meta,
        });
      }

      return reply.status(err.status).send(buildErrorResponse(err.code, err.message));
    }

    // 2) Zod errors that escaped a controller
    if (err instanceof ZodError) {
      log.warn('validation_error', { flow: 'http.error', issues: err.issues });

      return reply.status(400).send(buildErrorResponse('VALIDATION_ERROR', 'Invalid request'));
    }

    // 3) Fastify's own request errors (body parser, content type, body limit)
    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== undefined) {
      log.warn('request_error', {
        flow: 'http.error',
        fastifyCode: err.code,
        status: clientStatus,
        message: err.message,
      });

      const message =
        clientStatus === 400
          ? 'Malformed request body'
          : (CLIENT_ERROR_MESSAGES[clientStatus] ?? 'Bad request');

      return reply.status(clientStatus).send(buildErrorResponse('VALIDATION_ERROR', message));
    }

    // 4) Unexpected errors — never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildErrorResponse('INTERNAL', 'Internal server error'));
  });

  app.setNotFoundHandler((req, reply) => {
    withRequestContext(req).warn('route_not_found', { flow: 'http.error' });

    return reply.status(404).send(buildErrorResponse('NOT_FOUND', 'Route not found'));
  });
}
