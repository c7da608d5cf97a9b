/**
 * backend/src/shared/logger/with-context.ts
 *
 * WHY:
 * - Every line logged while serving a request should carry its requestId, so the
 *   access line, any warning and the audit row can be joined.
 *
 * HOW TO USE:
 * - `requestLogger(req).warn('app_error', { flow: 'http.error', ... })`
 * - Only valid after registerRequestContext() has run its onRequest hook.
 */

import type { FastifyRequest } from 'fastify';
import { logger, type Logger } from './logger';

export function requestLogger(req: FastifyRequest): Logger {
  return logger.child({
    requestId: req.requestContext.requestId,
    host: req.requestContext.host,
    ip: req.ip,
  });
}
