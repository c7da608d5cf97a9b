/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/build-app.ts; routes are registered afterwards via app/routes.ts.
 * - Global request context (requestId + host) is attached here.
 */

import Fastify from 'fastify';
import formbody from '@fastify/formbody';

import { requestLogger } from '../shared/logger/with-context';
import { registerRequestContext } from '../shared/http/request-context';
import { registerErrorHandler } from '../shared/http/error-handler';

export async function buildServer() {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  // The link widget posts urlencoded forms.
  await app.register(formbody);

  registerRequestContext(app);
  registerErrorHandler(app);

  // Registered after the request context hook, so the id is already set.
  app.addHook('onRequest', async (req) => {
    requestLogger(req).info('request', { method: req.method, url: req.url });
  });

  return app;
}
