/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably in dev and at deploy time.
 * - TS migrations live in: src/shared/db/migrations
 * - We run this file with `tsx`, so dynamic imports of `.ts` migrations work.
 *
 * HOW TO USE:
 * - npm run db:migrate -w backend
 */

import 'dotenv/config';

import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { readdir } from 'node:fs/promises';

import { Migrator, type Migration, type MigrationProvider } from 'kysely';
import { createDb } from './db';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

function isMigration(mod: unknown): mod is Migration {
  return typeof mod === 'object' && mod !== null && typeof Reflect.get(mod, 'up') === 'function';
}

// Provider that loads TS migrations from the SOURCE folder (no dist/path confusion).
class SourceMigrationProvider implements MigrationProvider {
  constructor(private readonly dir: string) {}

  async getMigrations(): Promise<Record<string, Migration>> {
    const files = (await readdir(this.dir)).filter((f) => f.endsWith('.ts')).sort();

    logger.info('Found migration files', { count: files.length, files });

    const migrations: Record<string, Migration> = {};

    for (const file of files) {
      const mod: unknown = await import(pathToFileURL(path.join(this.dir, file)).href);
      if (!isMigration(mod)) {
        throw new Error(`Migration ${file} does not export an up() function`);
      }
      migrations[file.replace(/\.ts$/, '')] = mod;
    }

    return migrations;
  }
}

async function runMigrations() {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  const migrator = new Migrator({
    db,
    provider: new SourceMigrationProvider(path.join(process.cwd(), 'src/shared/db/migrations')),
  });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migration success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('migration error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('Migration failed', { error });
    process.exit(1);
  }

  logger.info('Migrations up to date');
}

void runMigrations().catch((err: unknown) => {
  logger.error('Migration runner crashed', { err });
  process.exit(1);
});
