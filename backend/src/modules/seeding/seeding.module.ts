/**
 * backend/src/modules/seeding/seeding.module.ts
 *
 * WHY:
 * - Encapsulates Seeding module wiring (CLI only; no HTTP routes).
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { Logger } from '../../shared/logger/logger';
import type { RecordStore } from '../../shared/db/record-store';
import type { AuditRepo } from '../../shared/audit/audit.repo';

import { SeedingService } from './seeding.service';

export type SeedingModule = ReturnType<typeof createSeedingModule>;

export function createSeedingModule(deps: {
  store: RecordStore;
  logger: Logger;
  auditRepo: AuditRepo;
  now?: () => Date;
}) {
  const seedingService = new SeedingService(deps);

  return { seedingService };
}
