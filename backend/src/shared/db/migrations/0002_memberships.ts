/**
 * src/shared/db/migrations/0002_memberships.ts
 *
 * WHY:
 * - Season-scoped membership catalogue: products with payment plans, add-on fees
 *   and match fee tariffs, plus the subscriptions players take out.
 *
 * RULES:
 * - Money is numeric(8,2). The app reads it back as a two-decimal string.
 * - (season_id, sku) is the product's natural key; import and clone upsert on it.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable('membership_categories')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('code', 'text', (col) => col.notNull().unique())
    .addColumn('label', 'text', (col) => col.notNull())
    .addColumn('description', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('is_selectable', 'boolean', (col) => col.notNull().defaultTo(true))
    .execute();

  await db.schema
    .createTable('membership_category_player_types')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('category_id', 'uuid', (col) =>
      col.notNull().references('membership_categories.id').onDelete('cascade'),
    )
    .addColumn('player_type_id', 'uuid', (col) =>
      col.notNull().references('player_types.id').onDelete('cascade'),
    )
    .addUniqueConstraint('membership_category_player_types_pair_unique', [
      'category_id',
      'player_type_id',
    ])
    .execute();

  // ---- products ----
  await db.schema
    .createTable('membership_products')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('season_id', 'uuid', (col) =>
      col.notNull().references('seasons.id').onDelete('restrict'),
    )
    .addColumn('category_id', 'uuid', (col) =>
      col.notNull().references('membership_categories.id').onDelete('restrict'),
    )
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('sku', 'text', (col) => col.notNull())
    .addColumn('list_price_gbp', 'numeric(8, 2)', (col) => col.notNull())
    .addColumn('active', 'boolean', (col) => col.notNull().defaultTo(true))
    .addColumn('notes', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('requires_plan', 'boolean', (col) => col.notNull().defaultTo(true))
    .addColumn('pay_per_match', 'boolean', (col) => col.notNull().defaultTo(false))
    .addUniqueConstraint('membership_products_season_sku_unique', ['season_id', 'sku'])
    .execute();

  await db.schema
    .createTable('payment_plans')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('product_id', 'uuid', (col) =>
      col.notNull().references('membership_products.id').onDelete('cascade'),
    )
    .addColumn('label', 'text', (col) => col.notNull())
    .addColumn('instalment_amount_gbp', 'numeric(8, 2)', (col) => col.notNull())
    .addColumn('instalment_count', 'integer', (col) => col.notNull().defaultTo(1))
    .addColumn('frequency', 'text', (col) => col.notNull().defaultTo('monthly'))
    .addColumn('includes_match_fees', 'boolean', (col) => col.notNull().defaultTo(true))
    .addColumn('active', 'boolean', (col) => col.notNull().defaultTo(true))
    .addColumn('display_order', 'integer', (col) => col.notNull().defaultTo(0))
    .addUniqueConstraint('payment_plans_product_label_unique', ['product_id', 'label'])
    .execute();

  await sql`
    ALTER TABLE payment_plans
      ADD CONSTRAINT payment_plans_frequency_check
      CHECK (frequency IN ('once','weekly','monthly'));
  `.execute(db);

  // ---- fees ----
  await db.schema
    .createTable('add_on_fees')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('season_id', 'uuid', (col) =>
      col.notNull().references('seasons.id').onDelete('restrict'),
    )
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('amount_gbp', 'numeric(8, 2)', (col) => col.notNull())
    .addColumn('active', 'boolean', (col) => col.notNull().defaultTo(true))
    .addUniqueConstraint('add_on_fees_season_name_unique', ['season_id', 'name'])
    .execute();

  await db.schema
    .createTable('match_fee_tariffs')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('season_id', 'uuid', (col) =>
      col.notNull().references('seasons.id').onDelete('restrict'),
    )
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('amount_gbp', 'numeric(8, 2)', (col) => col.notNull())
    .addColumn('category_id', 'uuid', (col) =>
      col.references('membership_categories.id').onDelete('set null'),
    )
    .addColumn('product_id', 'uuid', (col) =>
      col.references('membership_products.id').onDelete('set null'),
    )
    .addColumn('is_default', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('active', 'boolean', (col) => col.notNull().defaultTo(true))
    .execute();

  // NULL scopes must compare equal for the natural key, so the index coalesces them.
  await sql`
    CREATE UNIQUE INDEX match_fee_tariffs_natural_key_unique
    ON match_fee_tariffs(
      season_id,
      name,
      coalesce(category_id, '00000000-0000-0000-0000-000000000000'::uuid),
      coalesce(product_id, '00000000-0000-0000-0000-000000000000'::uuid)
    );
  `.execute(db);

  // ---- subscriptions (never exported by the memberships seed) ----
  await db.schema
    .createTable('subscriptions')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('player_id', 'uuid', (col) =>
      col.notNull().references('players.id').onDelete('cascade'),
    )
    .addColumn('product_id', 'uuid', (col) =>
      col.notNull().references('membership_products.id').onDelete('restrict'),
    )
    .addColumn('plan_id', 'uuid', (col) => col.references('payment_plans.id').onDelete('set null'))
    .addColumn('season_id', 'uuid', (col) =>
      col.notNull().references('seasons.id').onDelete('restrict'),
    )
    .addColumn('status', 'text', (col) => col.notNull().defaultTo('pending'))
    .addColumn('started_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('external_ref', 'text')
    .execute();

  await sql`CREATE INDEX subscriptions_player_id_idx ON subscriptions(player_id);`.execute(db);
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable('subscriptions').ifExists().execute();
  await db.schema.dropTable('match_fee_tariffs').ifExists().execute();
  await db.schema.dropTable('add_on_fees').ifExists().execute();
  await db.schema.dropTable('payment_plans').ifExists().execute();
  await db.schema.dropTable('membership_products').ifExists().execute();
  await db.schema.dropTable('membership_category_player_types').ifExists().execute();
  await db.schema.dropTable('membership_categories').ifExists().execute();
}
