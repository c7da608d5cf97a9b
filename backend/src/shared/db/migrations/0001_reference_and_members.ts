/**
 * src/shared/db/migrations/0001_reference_and_members.ts
 *
 * WHY:
 * - Club reference data (seasons, player types, positions, questions, teams)
 *   and the player records that hang off it.
 *
 * HOW TO USE:
 * - Run all migrations:
 *     npm run db:migrate -w backend
 * - Keep src/shared/db/schema.ts in step with every column added here.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  // Ensure pgcrypto exists (gen_random_uuid)
  await sql`CREATE EXTENSION IF NOT EXISTS "pgcrypto";`.execute(db);

  // ---- seasons ----
  await db.schema
    .createTable('seasons')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('name', 'text', (col) => col.notNull().unique())
    .addColumn('start_date', 'date', (col) => col.notNull())
    .addColumn('end_date', 'date', (col) => col.notNull())
    .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(false))
    .execute();

  await db.schema
    .createTable('player_types')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('name', 'text', (col) => col.notNull().unique())
    .execute();

  await db.schema
    .createTable('positions')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('name', 'text', (col) => col.notNull().unique())
    .execute();

  // ---- registration questions ----
  await db.schema
    .createTable('question_categories')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('name', 'text', (col) => col.notNull().unique())
    .addColumn('display_order', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('description', 'text', (col) => col.notNull().defaultTo(''))
    .execute();

  await db.schema
    .createTable('dynamic_questions')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('code', 'text', (col) => col.notNull().unique())
    .addColumn('label', 'text', (col) => col.notNull())
    .addColumn('help_text', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('description', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('question_type', 'text', (col) => col.notNull()) // text|boolean|number|choice...
    .addColumn('required', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('requires_detail_if_yes', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('category_id', 'uuid', (col) =>
      col.references('question_categories.id').onDelete('set null'),
    )
    .addColumn('display_order', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('active', 'boolean', (col) => col.notNull().defaultTo(true))
    .addColumn('choices_text', 'text', (col) => col.notNull().defaultTo(''))
    .execute();

  await db.schema
    .createTable('dynamic_question_player_types')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('question_id', 'uuid', (col) =>
      col.notNull().references('dynamic_questions.id').onDelete('cascade'),
    )
    .addColumn('player_type_id', 'uuid', (col) =>
      col.notNull().references('player_types.id').onDelete('cascade'),
    )
    .addUniqueConstraint('dynamic_question_player_types_pair_unique', ['question_id', 'player_type_id'])
    .execute();

  // ---- teams ----
  await db.schema
    .createTable('teams')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('name', 'text', (col) => col.notNull().unique())
    .addColumn('description', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('active', 'boolean', (col) => col.notNull().defaultTo(true))
    .execute();

  // ---- players ----
  await db.schema
    .createTable('players')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    // stable, portable identity used by the players seed
    .addColumn('public_id', 'text', (col) => col.notNull().unique())
    .addColumn('membership_number', 'text', (col) => col.unique())
    .addColumn('first_name', 'text', (col) => col.notNull())
    .addColumn('last_name', 'text', (col) => col.notNull())
    .addColumn('date_of_birth', 'date')
    .addColumn('gender', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('relation', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('player_type_id', 'uuid', (col) =>
      col.notNull().references('player_types.id').onDelete('restrict'),
    )
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createTable('team_memberships')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('team_id', 'uuid', (col) => col.notNull().references('teams.id').onDelete('cascade'))
    .addColumn('player_id', 'uuid', (col) =>
      col.notNull().references('players.id').onDelete('cascade'),
    )
    .addColumn('assigned_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addUniqueConstraint('team_memberships_team_player_unique', ['team_id', 'player_id'])
    .execute();

  await db.schema
    .createTable('team_membership_positions')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('team_membership_id', 'uuid', (col) =>
      col.notNull().references('team_memberships.id').onDelete('cascade'),
    )
    .addColumn('position_id', 'uuid', (col) =>
      col.notNull().references('positions.id').onDelete('cascade'),
    )
    .addUniqueConstraint('team_membership_positions_pair_unique', ['team_membership_id', 'position_id'])
    .execute();

  await db.schema
    .createTable('player_answers')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('player_id', 'uuid', (col) =>
      col.notNull().references('players.id').onDelete('cascade'),
    )
    .addColumn('question_id', 'uuid', (col) =>
      col.notNull().references('dynamic_questions.id').onDelete('cascade'),
    )
    .addColumn('text_answer', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('boolean_answer', 'boolean')
    .addColumn('detail_text', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('numeric_answer', 'numeric(12, 2)')
    .addUniqueConstraint('player_answers_player_question_unique', ['player_id', 'question_id'])
    .execute();
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable('player_answers').ifExists().execute();
  await db.schema.dropTable('team_membership_positions').ifExists().execute();
  await db.schema.dropTable('team_memberships').ifExists().execute();
  await db.schema.dropTable('players').ifExists().execute();
  await db.schema.dropTable('teams').ifExists().execute();
  await db.schema.dropTable('dynamic_question_player_types').ifExists().execute();
  await db.schema.dropTable('dynamic_questions').ifExists().execute();
  await db.schema.dropTable('question_categories').ifExists().execute();
  await db.schema.dropTable('positions').ifExists().execute();
  await db.schema.dropTable('player_types').ifExists().execute();
  await db.schema.dropTable('seasons').ifExists().execute();
}
