/**
 * src/shared/db/migrations/0004_spond.ts
 *
 * WHY:
 * - Local mirror of Spond groups, members, events and transactions,
 *   plus the links staff make between players and Spond members.
 *
 * RULES:
 * - `data` keeps the raw payload so fields we do not map yet are not lost.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable('spond_groups')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('spond_group_id', 'text', (col) => col.notNull().unique())
    .addColumn('name', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('parent_id', 'uuid', (col) => col.references('spond_groups.id').onDelete('set null'))
    .addColumn('data', 'jsonb', (col) => col.notNull().defaultTo(sql`'{}'::jsonb`))
    .execute();

  await db.schema
    .createTable('spond_members')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('spond_member_id', 'text', (col) => col.notNull().unique())
    .addColumn('full_name', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('email', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('data', 'jsonb', (col) => col.notNull().defaultTo(sql`'{}'::jsonb`))
    .addColumn('last_synced_at', 'timestamptz')
    .execute();

  await sql`CREATE INDEX spond_members_full_name_idx ON spond_members(full_name);`.execute(db);

  await db.schema
    .createTable('spond_member_groups')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('member_id', 'uuid', (col) =>
      col.notNull().references('spond_members.id').onDelete('cascade'),
    )
    .addColumn('group_id', 'uuid', (col) =>
      col.notNull().references('spond_groups.id').onDelete('cascade'),
    )
    .addUniqueConstraint('spond_member_groups_pair_unique', ['member_id', 'group_id'])
    .execute();

  await db.schema
    .createTable('player_spond_links')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('player_id', 'uuid', (col) =>
      col.notNull().references('players.id').onDelete('cascade'),
    )
    .addColumn('spond_member_id', 'uuid', (col) =>
      col.notNull().references('spond_members.id').onDelete('cascade'),
    )
    .addColumn('linked_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('active', 'boolean', (col) => col.notNull().defaultTo(true))
    .addUniqueConstraint('player_spond_links_pair_unique', ['player_id', 'spond_member_id'])
    .execute();

  await db.schema
    .createTable('spond_events')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('spond_event_id', 'text', (col) => col.notNull().unique())
    .addColumn('title', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('group_id', 'uuid', (col) => col.references('spond_groups.id').onDelete('set null'))
    .addColumn('start_at', 'timestamptz')
    .addColumn('end_at', 'timestamptz')
    .addColumn('data', 'jsonb', (col) => col.notNull().defaultTo(sql`'{}'::jsonb`))
    .addColumn('last_synced_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createTable('spond_transactions')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('spond_transaction_id', 'text', (col) => col.notNull().unique())
    .addColumn('member_id', 'uuid', (col) =>
      col.references('spond_members.id').onDelete('set null'),
    )
    .addColumn('amount', 'numeric(10, 2)')
    .addColumn('currency', 'text', (col) => col.notNull().defaultTo('GBP'))
    .addColumn('status', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('created_at_remote', 'timestamptz')
    .addColumn('data', 'jsonb', (col) => col.notNull().defaultTo(sql`'{}'::jsonb`))
    .execute();

  await sql`
    CREATE INDEX spond_transactions_created_at_remote_idx
    ON spond_transactions(created_at_remote);
  `.execute(db);
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable('spond_transactions').ifExists().execute();
  await db.schema.dropTable('spond_events').ifExists().execute();
  await db.schema.dropTable('player_spond_links').ifExists().execute();
  await db.schema.dropTable('spond_member_groups').ifExists().execute();
  await db.schema.dropTable('spond_members').ifExists().execute();
  await db.schema.dropTable('spond_groups').ifExists().execute();
}
