/**
 * src/shared/db/migrations/0005_periodic_tasks.ts
 *
 * WHY:
 * - The scheduler's persisted configuration. Rows are written by `sync_schedule`
 *   at deploy time, toggled by `periodic_tasks enable|disable`, and read on every tick.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable('periodic_tasks')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('name', 'text', (col) => col.notNull().unique())
    .addColumn('task', 'text', (col) => col.notNull()) // job registry key
    .addColumn('schedule_type', 'text', (col) => col.notNull())
    .addColumn('interval_every', 'integer')
    .addColumn('interval_period', 'text')
    .addColumn('crontab', 'text')
    .addColumn('clocked_at', 'timestamptz')
    .addColumn('one_off', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('kwargs', 'jsonb', (col) => col.notNull().defaultTo(sql`'{}'::jsonb`))
    .addColumn('enabled', 'boolean', (col) => col.notNull().defaultTo(true))
    .addColumn('last_run_at', 'timestamptz')
    .addColumn('total_run_count', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  // Exactly one schedule source per row.
  await sql`
    ALTER TABLE periodic_tasks
      ADD CONSTRAINT periodic_tasks_schedule_check
      CHECK (
        (schedule_type = 'interval' AND interval_every IS NOT NULL AND interval_period IS NOT NULL)
        OR (schedule_type = 'crontab' AND crontab IS NOT NULL)
        OR (schedule_type = 'clocked' AND clocked_at IS NOT NULL)
      );
  `.execute(db);

  await sql`
    ALTER TABLE periodic_tasks
      ADD CONSTRAINT periodic_tasks_interval_period_check
      CHECK (interval_period IS NULL OR interval_period IN ('seconds','minutes','hours','days'));
  `.execute(db);
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable('periodic_tasks').ifExists().execute();
}
