/**
 * backend/src/modules/spond/spond.module.ts
 *
 * WHY:
 * - Encapsulates Spond module wiring.
 * - DI creates infra (including the API client); module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';

import type { Logger } from '../../shared/logger/logger';
import type { RecordStore } from '../../shared/db/record-store';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { RateLimiter } from '../../shared/security/rate-limit';

import type { SpondApi } from './client/spond-api';
import { SpondRepo } from './dal/spond.repo';
import { SpondController } from './spond.controller';
import { registerSpondRoutes } from './spond.routes';
import { SpondService } from './spond.service';

export type SpondModule = ReturnType<typeof createSpondModule>;

export function createSpondModule(deps: {
  store: RecordStore;
  logger: Logger;
  auditRepo: AuditRepo;
  rateLimiter: RateLimiter;
  spondApi: SpondApi | null;
  config: { eventsLookbackDays: number; eventsLookaheadDays: number; searchRateLimitPerMinute: number };
  now?: () => Date;
}) {
  const spondRepo = new SpondRepo(deps.store);

  const spondService = new SpondService({ ...deps, spondRepo });

  const controller = new SpondController(spondService);

  return {
    spondService,
    registerRoutes(app: FastifyInstance) {
      registerSpondRoutes(app, controller);
    },
  };
}
