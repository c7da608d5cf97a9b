/**
 * backend/src/modules/spond/spond.routes.ts
 *
 * WHY:
 * - Declares the search-and-link endpoints.
 *
 * RULES:
 * - No business logic here.
 * - Trailing slashes are part of the paths the widget calls.
 */

import type { FastifyInstance } from 'fastify';
import type { SpondController } from './spond.controller';

export function registerSpondRoutes(app: FastifyInstance, controller: SpondController) {
  app.get('/spond/search/', controller.search.bind(controller));
  app.post('/spond/link/:playerId/', controller.link.bind(controller));
  app.post('/spond/unlink/:playerId/:linkId/', controller.unlink.bind(controller));
}
