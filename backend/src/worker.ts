/**
 * backend/src/worker.ts
 *
 * WHY:
 * - Entrypoint for the background worker: runs the periodic task scheduler until
 *   SIGINT / SIGTERM, then waits for the tick in progress.
 */

import { buildConfig } from './app/config';
import { buildDeps } from './app/di';
import { logger } from './shared/logger/logger';

async function main(): Promise<void> {
  const config = buildConfig();
  const deps = await buildDeps(config);

  const scheduler = deps.scheduler.createScheduler();
  scheduler.start();

  logger.info('worker.started', {
    env: config.nodeEnv,
    service: config.serviceName,
    jobs: deps.scheduler.registry.names(),
  });

  const shutdown = async (signal: string) => {
    logger.info('worker.shutdown', { signal });
    await scheduler.stop();
    await deps.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

void main().catch((err: unknown) => {
  logger.error('worker.fatal_startup_error', { err });
  process.exit(1);
});
