/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - Table types come from ./schema (kept in step with the migrations).
 *
 * HOW TO USE:
 * - const db = createDb(config.databaseUrl)
 * - Modules never take `Db` directly; they go through KyselyRecordStore.
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { Tables } from './schema';

// `date` columns stay as 'YYYY-MM-DD' strings instead of local-midnight Date objects.
const PG_DATE_OID = 1082;
pg.types.setTypeParser(PG_DATE_OID, (value: string) => value);

export type Db = Kysely<Tables>;

/**
 * DbExecutor is the only DB "capability" the store accepts.
 * Works for both the main DB and a transaction (`trx`).
 */
export type DbExecutor = Kysely<Tables>;

export function createDb(databaseUrl: string): Db {
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  return new Kysely<Tables>({
    dialect: new PostgresDialect({ pool }),
  });
}
