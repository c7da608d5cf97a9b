/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - We need consistent error responses across all endpoints.
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status and .code to structured HTTP response.
 * - RateLimitError → 429 response with Retry-After.
 * - Fastify validation / body parser errors (4xx statusCode) → passed through as 400-range.
 * - Unexpected errors → 500 with generic message.
 * - Log all errors with request context for debugging.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - Log full error details (including REDACTED meta) for observability.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { AppError, type AppErrorCode, type AppErrorMeta } from './errors';
import { RateLimitError } from '../security/rate-limit';
import { requestLogger } from '../logger/with-context';

type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
  };
};

const SENSITIVE_META_KEYS = new Set([
  'token',
  'apiToken',
  'authorization',
  'password',
  'secret',
  'csrfToken',
]);

export function redactMeta(meta: AppErrorMeta | undefined): AppErrorMeta | undefined {
  if (!meta) return meta;

  const out: AppErrorMeta = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function buildResponse(code: AppErrorCode, message: string): ErrorResponseBody {
  return { error: { code, message } };
}

function isClientError(err: FastifyError): boolean {
  return typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = requestLogger(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return reply.status(err.status).send(buildResponse(err.code, err.message));
    }

    // 2) Rate limit errors
    if (err instanceof RateLimitError) {
      log.warn('rate_limit', {
        flow: 'http.error',
        key: err.key,
        limit: err.limit,
        retryAfterSeconds: err.retryAfterSeconds,
      });

      return reply
        .status(429)
        .header('retry-after', String(err.retryAfterSeconds))
        .send(buildResponse('RATE_LIMITED', 'Too many requests. Try again later.'));
    }

    // 3) Framework-level client errors (unsupported media type, malformed body...)
    if (isClientError(err)) {
      log.warn('client_error', {
        flow: 'http.error',
        status: err.statusCode,
        code: err.code,
        message: err.message,
      });

      return reply
        .status(err.statusCode ?? 400)
        .send(buildResponse('VALIDATION_ERROR', 'Invalid request'));
    }

    // 4) Unexpected errors (never leak internals)
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
  });
}
