/**
 * backend/src/index.ts
 *
 * WHY:
 * - Entrypoint for the HTTP server (search-and-link endpoints + /health).
 * - The scheduler runs in its own process (src/worker.ts); commands in src/manage.ts.
 *
 * RULES:
 * - Shutdown closes the server and infra and lets the process exit on its own.
 */

import { buildConfig } from './app/config';
import { buildApp } from './app/build-app';
import { logger } from './shared/logger/logger';

async function main(): Promise<void> {
  const config = buildConfig();
  const { app, close } = await buildApp(config);

  await app.listen({ port: config.port, host: '0.0.0.0' });
  logger.info('server.listening', { port: config.port, site: config.site.name });

  let closing = false;
  const shutdown = (signal: string) => {
    if (closing) return;
    closing = true;

    logger.info('server.shutdown', { signal });
    close().catch((err: unknown) => {
      logger.error('server.shutdown_failed', { err });
      process.exitCode = 1;
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  logger.error('server.fatal_startup_error', { err });
  process.exitCode = 1;
});
