/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes
 * - Makes E2E tests simple (build once, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 * - The start-up seed is an idempotent memberships import and never runs in production.
 */

import type { AppConfig } from './config';
import { buildDeps, type InfraOverrides } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { logger } from '../shared/logger/logger';

export async function buildApp(config: AppConfig, overrides: InfraOverrides = {}) {
  const deps = await buildDeps(config, overrides);
  const app = await buildServer();

  registerRoutes(app, { config, deps });

  if (config.seed.enabled) {
    const flow = 'seed.on_start';

    if (config.nodeEnv === 'production') {
      logger.warn('seed.skipped_in_production', { flow });
    } else {
      logger.info('seed.start', { flow, path: config.seed.membershipsPath });

      const result = await deps.seeding.seedingService.importMembershipsSeed({
        path: config.seed.membershipsPath,
        dryRun: false,
        purge: false,
      });

      logger.info('seed.done', { flow, counts: result.counts });
    }
  }

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
