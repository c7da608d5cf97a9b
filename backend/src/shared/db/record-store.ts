/**
 * backend/src/shared/db/record-store.ts
 *
 * WHY:
 * - The seed, clone, scheduler and sync code is a long series of small
 *   "find by natural key, insert or update" steps over many tables.
 * - A narrow table-generic port keeps that code independent of the SQL layer,
 *   and lets tests run against InMemRecordStore with no database.
 *
 * HOW TO USE:
 * - const season = await store.findOne('seasons', { name: '2025/26' })
 * - await store.transaction(async (tx) => { ... }, { rollback: dryRun })
 *   Inside the callback use `tx`, never the outer store.
 *
 * RULES:
 * - Filters are equality only; `null` means IS NULL, `undefined` keys are ignored.
 * - Ids are generated by the store (uuid) so both implementations agree.
 * - Ordering puts nulls last in both directions.
 */

import type { TableName, Tables } from './schema';

export type NewRow<T extends TableName> = Omit<Tables[T], 'id'>;
export type Row<T extends TableName> = NewRow<T> & { id: string };

export type Column<T extends TableName> = keyof Row<T> & string;
export type RowFilter<T extends TableName> = Partial<Row<T>>;

export type OrderBy<T extends TableName> = {
  column: Column<T>;
  direction?: 'asc' | 'desc';
};

export type ListOptions<T extends TableName> = {
  where?: RowFilter<T>;
  orderBy?: OrderBy<T>[];
  limit?: number;
  /** Case-insensitive substring match over any of `columns`. Blank terms are ignored. */
  search?: { columns: Column<T>[]; term: string };
};

export type TransactionOptions = {
  /** Run the work, then discard every write it made (dry-run mode). */
  rollback?: boolean;
};

export class RecordNotFoundError extends Error {
  constructor(
    public readonly table: string,
    public readonly id: string,
  ) {
    super(`No ${table} row with id ${id}`);
    this.name = 'RecordNotFoundError';
  }
}

export interface RecordStore {
  list<T extends TableName>(table: T, opts?: ListOptions<T>): Promise<Row<T>[]>;
  findOne<T extends TableName>(table: T, where: RowFilter<T>): Promise<Row<T> | null>;
  insert<T extends TableName>(table: T, values: NewRow<T>): Promise<Row<T>>;
  /** Throws RecordNotFoundError when no row has `id`. */
  update<T extends TableName>(table: T, id: string, patch: Partial<NewRow<T>>): Promise<Row<T>>;
  /** Deletes matching rows (every row when `where` is omitted) and returns how many. */
  delete<T extends TableName>(table: T, where?: RowFilter<T>): Promise<number>;
  count<T extends TableName>(table: T, where?: RowFilter<T>): Promise<number>;
  transaction<R>(work: (store: RecordStore) => Promise<R>, opts?: TransactionOptions): Promise<R>;
}

/** Own enumerable entries whose value is not undefined. */
export function definedEntries<O extends {}>(record: O): [string, unknown][] {
  const out: [string, unknown][] = [];
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined) out.push([key, value]);
  }
  return out;
}
