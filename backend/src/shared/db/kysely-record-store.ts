/**
 * backend/src/shared/db/kysely-record-store.ts
 *
 * WHY:
 * - Production RecordStore over Postgres.
 * - Statements are built with Kysely's `sql` template so table and column names
 *   go through sql.table / sql.ref and every value is a bound parameter.
 *
 * RULES:
 * - No business rules, no AppError.
 * - Nested transactions run inline on the outer transaction; a nested rollback
 *   request is a programming error.
 */

import { randomUUID } from 'node:crypto';
import { sql, type RawBuilder } from 'kysely';

import type { DbExecutor } from './db';
import type { TableName } from './schema';
import {
  definedEntries,
  RecordNotFoundError,
  type ListOptions,
  type NewRow,
  type RecordStore,
  type Row,
  type RowFilter,
  type TransactionOptions,
} from './record-store';

class RollbackSignal extends Error {
  constructor() {
    super('rollback');
  }
}

function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

function conditions<O extends {}>(where: O | undefined): RawBuilder<unknown>[] {
  return definedEntries(where ?? {}).map(([column, value]) =>
    value === null ? sql`${sql.ref(column)} is null` : sql`${sql.ref(column)} = ${value}`,
  );
}

function whereSql(parts: RawBuilder<unknown>[]): RawBuilder<unknown> {
  return parts.length ? sql` where ${sql.join(parts, sql` and `)}` : sql``;
}

export class KyselyRecordStore implements RecordStore {
  constructor(private readonly db: DbExecutor) {}

  async list<T extends TableName>(table: T, opts: ListOptions<T> = {}): Promise<Row<T>[]> {
    const parts = conditions(opts.where);

    const term = opts.search?.term.trim();
    if (opts.search && term) {
      const pattern = `%${escapeLike(term)}%`;
      const ors = opts.search.columns.map((column) => sql`${sql.ref(column)} ilike ${pattern}`);
      parts.push(sql`(${sql.join(ors, sql` or `)})`);
    }

    const order = opts.orderBy?.length
      ? sql` order by ${sql.join(
          opts.orderBy.map(
            (o) => sql`${sql.ref(o.column)} ${sql.raw(o.direction === 'desc' ? 'desc' : 'asc')} nulls last`,
          ),
        )}`
      : sql``;

    const limit = opts.limit !== undefined ? sql` limit ${opts.limit}` : sql``;

    const result = await sql<Row<T>>`select * from ${sql.table(table)}${whereSql(parts)}${order}${limit}`.execute(
      this.db,
    );
    return result.rows;
  }

  async findOne<T extends TableName>(table: T, where: RowFilter<T>): Promise<Row<T> | null> {
    const rows = await this.list(table, { where, limit: 1 });
    return rows[0] ?? null;
  }

  async insert<T extends TableName>(table: T, values: NewRow<T>): Promise<Row<T>> {
    const entries: [string, unknown][] = [['id', randomUUID()], ...definedEntries(values)];

    const result = await sql<Row<T>>`insert into ${sql.table(table)} (${sql.join(
      entries.map(([column]) => sql.ref(column)),
    )}) values (${sql.join(entries.map(([, value]) => value))}) returning *`.execute(this.db);

    const row = result.rows[0];
    if (!row) throw new Error(`Insert into ${table} returned no row`);
    return row;
  }

  async update<T extends TableName>(table: T, id: string, patch: Partial<NewRow<T>>): Promise<Row<T>> {
    const sets = definedEntries(patch).map(([column, value]) => sql`${sql.ref(column)} = ${value}`);

    const result = sets.length
      ? await sql<Row<T>>`update ${sql.table(table)} set ${sql.join(sets)} where id = ${id} returning *`.execute(
          this.db,
        )
      : await sql<Row<T>>`select * from ${sql.table(table)} where id = ${id}`.execute(this.db);

    const row = result.rows[0];
    if (!row) throw new RecordNotFoundError(table, id);
    return row;
  }

  async delete<T extends TableName>(table: T, where?: RowFilter<T>): Promise<number> {
    const result = await sql<{ id: string }>`delete from ${sql.table(table)}${whereSql(
      conditions(where),
    )} returning id`.execute(this.db);
    return result.rows.length;
  }

  async count<T extends TableName>(table: T, where?: RowFilter<T>): Promise<number> {
    const result = await sql<{ count: number }>`select count(*)::int as count from ${sql.table(table)}${whereSql(
      conditions(where),
    )}`.execute(this.db);
    return result.rows[0]?.count ?? 0;
  }

  async transaction<R>(
    work: (store: RecordStore) => Promise<R>,
    opts: TransactionOptions = {},
  ): Promise<R> {
    if (this.db.isTransaction) {
      if (opts.rollback) throw new Error('Cannot roll back a nested transaction');
      return work(this);
    }

    if (!opts.rollback) {
      return this.db.transaction().execute((trx) => work(new KyselyRecordStore(trx)));
    }

    const outcome: { settled?: { value: R } } = {};
    try {
      await this.db.transaction().execute(async (trx) => {
        outcome.settled = { value: await work(new KyselyRecordStore(trx)) };
        throw new RollbackSignal();
      });
    } catch (err) {
      if (!(err instanceof RollbackSignal)) throw err;
    }

    if (!outcome.settled) throw new Error('Rolled-back transaction produced no result');
    return outcome.settled.value;
  }
}
