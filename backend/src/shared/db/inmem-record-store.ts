/**
 * backend/src/shared/db/inmem-record-store.ts
 *
 * WHY:
 * - Lets flow, command and HTTP tests run in-process without Postgres.
 * - Enforces the same unique keys as the migrations so duplicate-row bugs
 *   surface in tests the way they would against the database.
 *
 * HOW TO USE:
 * - const store = new InMemRecordStore()
 * - Rows handed in and out are copies; mutating them never changes stored state.
 *
 * RULES:
 * - Transactions snapshot all tables and restore the snapshot on error or rollback.
 * - Foreign keys are not enforced.
 */

import { randomUUID } from 'node:crypto';

import type { TableName } from './schema';
import {
  definedEntries,
  RecordNotFoundError,
  type ListOptions,
  type NewRow,
  type OrderBy,
  type RecordStore,
  type Row,
  type RowFilter,
  type TransactionOptions,
} from './record-store';
import { sameValue } from './upsert';

type TableData = { [K in TableName]: Row<K>[] };

function emptyTables(): TableData {
  return {
    seasons: [],
    player_types: [],
    membership_categories: [],
    membership_category_player_types: [],
    membership_products: [],
    payment_plans: [],
    add_on_fees: [],
    match_fee_tariffs: [],
    positions: [],
    question_categories: [],
    dynamic_questions: [],
    dynamic_question_player_types: [],
    teams: [],
    players: [],
    team_memberships: [],
    team_membership_positions: [],
    player_answers: [],
    subscriptions: [],
    staff_users: [],
    tasks: [],
    spond_groups: [],
    spond_members: [],
    spond_member_groups: [],
    player_spond_links: [],
    spond_events: [],
    spond_transactions: [],
    periodic_tasks: [],
    audit_events: [],
  };
}

// Mirrors the unique constraints in the migrations. Postgres treats NULLs as distinct;
// so does this check.
const UNIQUE_KEYS: Partial<Record<TableName, string[][]>> = {
  seasons: [['name']],
  player_types: [['name']],
  membership_categories: [['code']],
  membership_category_player_types: [['category_id', 'player_type_id']],
  membership_products: [['season_id', 'sku']],
  payment_plans: [['product_id', 'label']],
  add_on_fees: [['season_id', 'name']],
  positions: [['name']],
  question_categories: [['name']],
  dynamic_questions: [['code']],
  dynamic_question_player_types: [['question_id', 'player_type_id']],
  teams: [['name']],
  players: [['public_id'], ['membership_number']],
  team_memberships: [['team_id', 'player_id']],
  team_membership_positions: [['team_membership_id', 'position_id']],
  player_answers: [['player_id', 'question_id']],
  staff_users: [['email']],
  spond_groups: [['spond_group_id']],
  spond_members: [['spond_member_id']],
  spond_member_groups: [['member_id', 'group_id']],
  player_spond_links: [['player_id', 'spond_member_id']],
  spond_events: [['spond_event_id']],
  spond_transactions: [['spond_transaction_id']],
  periodic_tasks: [['name']],
};

function field(row: object, column: string): unknown {
  return Reflect.get(row, column);
}

function matches<O extends {}>(row: object, where: O | undefined): boolean {
  return definedEntries(where ?? {}).every(([column, value]) => sameValue(field(row, column), value));
}

function compareValues(a: unknown, b: unknown): number {
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

function compareRows<T extends TableName>(orderBy: OrderBy<T>[]) {
  return (a: Row<T>, b: Row<T>): number => {
    for (const { column, direction } of orderBy) {
      const left = field(a, column);
      const right = field(b, column);
      const leftNull = left === null || left === undefined;
      const rightNull = right === null || right === undefined;
      if (leftNull || rightNull) {
        if (leftNull && rightNull) continue;
        return leftNull ? 1 : -1;
      }
      const cmp = compareValues(left, right);
      if (cmp !== 0) return direction === 'desc' ? -cmp : cmp;
    }
    return 0;
  };
}

export class InMemRecordStore implements RecordStore {
  private data: TableData = emptyTables();

  private rows<T extends TableName>(table: T): Row<T>[] {
    return this.data[table];
  }

  private uniqueViolation<T extends TableName>(table: T, candidate: Row<T>): Error | null {
    for (const key of UNIQUE_KEYS[table] ?? []) {
      const values = key.map((column) => field(candidate, column));
      if (values.some((value) => value === null || value === undefined)) continue;

      const clash = this.rows(table).some(
        (row) =>
          row.id !== candidate.id && key.every((column, i) => sameValue(field(row, column), values[i])),
      );
      if (clash) {
        return new Error(`duplicate key value violates unique constraint on ${table} (${key.join(', ')})`);
      }
    }
    return null;
  }

  list<T extends TableName>(table: T, opts: ListOptions<T> = {}): Promise<Row<T>[]> {
    let result = this.rows(table).filter((row) => matches(row, opts.where));

    const term = opts.search?.term.trim().toLowerCase();
    if (opts.search && term) {
      const { columns } = opts.search;
      result = result.filter((row) =>
        columns.some((column) => {
          const value = field(row, column);
          return typeof value === 'string' && value.toLowerCase().includes(term);
        }),
      );
    }

    if (opts.orderBy?.length) result = [...result].sort(compareRows(opts.orderBy));
    if (opts.limit !== undefined) result = result.slice(0, opts.limit);

    return Promise.resolve(result.map((row) => structuredClone(row)));
  }

  async findOne<T extends TableName>(table: T, where: RowFilter<T>): Promise<Row<T> | null> {
    const rows = await this.list(table, { where, limit: 1 });
    return rows[0] ?? null;
  }

  insert<T extends TableName>(table: T, values: NewRow<T>): Promise<Row<T>> {
    const row: Row<T> = { ...structuredClone(values), id: randomUUID() };
    const violation = this.uniqueViolation(table, row);
    if (violation) return Promise.reject(violation);

    this.rows(table).push(row);
    return Promise.resolve(structuredClone(row));
  }

  update<T extends TableName>(table: T, id: string, patch: Partial<NewRow<T>>): Promise<Row<T>> {
    const rows = this.rows(table);
    const index = rows.findIndex((row) => row.id === id);
    const current = rows[index];
    if (!current) return Promise.reject(new RecordNotFoundError(table, id));

    const next = structuredClone(current);
    for (const [column, value] of definedEntries(patch)) {
      Reflect.set(next, column, structuredClone(value));
    }

    const violation = this.uniqueViolation(table, next);
    if (violation) return Promise.reject(violation);

    rows[index] = next;
    return Promise.resolve(structuredClone(next));
  }

  delete<T extends TableName>(table: T, where?: RowFilter<T>): Promise<number> {
    const rows = this.rows(table);
    let removed = 0;
    for (let i = rows.length - 1; i >= 0; i--) {
      const row = rows[i];
      if (row && matches(row, where)) {
        rows.splice(i, 1);
        removed++;
      }
    }
    return Promise.resolve(removed);
  }

  count<T extends TableName>(table: T, where?: RowFilter<T>): Promise<number> {
    return Promise.resolve(this.rows(table).filter((row) => matches(row, where)).length);
  }

  async transaction<R>(
    work: (store: RecordStore) => Promise<R>,
    opts: TransactionOptions = {},
  ): Promise<R> {
    const snapshot = structuredClone(this.data);
    try {
      const result = await work(this);
      if (opts.rollback) this.data = snapshot;
      return result;
    } catch (err) {
      this.data = snapshot;
      throw err;
    }
  }
}
