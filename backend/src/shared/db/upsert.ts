/**
 * backend/src/shared/db/upsert.ts
 *
 * WHY:
 * - Import, clone and sync all do "find by key, then insert or update when different".
 * - Reporting needs to know which of the three happened.
 *
 * HOW TO USE:
 * - const { row, outcome } = await upsertRow(store, 'seasons', {
 *     match: { name }, values: { name, start_date, end_date, is_active },
 *   })
 * - mode 'create-only' never touches an existing row (clone without --overwrite).
 */

import { isDeepStrictEqual } from 'node:util';

import type { TableName } from './schema';
import { definedEntries, type NewRow, type RecordStore, type Row, type RowFilter } from './record-store';

export type UpsertOutcome = 'created' | 'updated' | 'unchanged';
export type UpsertMode = 'sync' | 'create-only';

export type UpsertResult<T extends TableName> = {
  row: Row<T>;
  outcome: UpsertOutcome;
};

/** jsonb comes back from Postgres with its own key order, so objects compare by content. */
export function sameValue(a: unknown, b: unknown): boolean {
  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date && a.getTime() === b.getTime();
  }
  if (typeof a === 'object' && a !== null && typeof b === 'object' && b !== null) {
    return isDeepStrictEqual(a, b);
  }
  return a === b;
}

/** True when every defined field of `values` already equals the row's value. */
export function rowMatches<O extends {}>(row: object, values: O): boolean {
  return definedEntries(values).every(([column, value]) => sameValue(Reflect.get(row, column), value));
}

export async function upsertRow<T extends TableName>(
  store: RecordStore,
  table: T,
  input: { match: RowFilter<T>; values: NewRow<T>; mode?: UpsertMode },
): Promise<UpsertResult<T>> {
  const existing = await store.findOne(table, input.match);

  if (!existing) {
    return { row: await store.insert(table, input.values), outcome: 'created' };
  }

  if (input.mode === 'create-only' || rowMatches(existing, input.values)) {
    return { row: existing, outcome: 'unchanged' };
  }

  return { row: await store.update(table, existing.id, input.values), outcome: 'updated' };
}

/**
 * Makes a link table hold exactly `wanted` targets for one owner.
 * `current` is the owner's existing links; returns true when anything changed.
 */
export async function syncLinkSet(
  current: { id: string; target: string }[],
  wanted: string[],
  ops: { add: (target: string) => Promise<void>; remove: (linkId: string) => Promise<void> },
): Promise<boolean> {
  const want = new Set(wanted);
  const have = new Set(current.map((link) => link.target));
  let changed = false;

  for (const link of current) {
    if (!want.has(link.target)) {
      await ops.remove(link.id);
      changed = true;
    }
  }

  for (const target of want) {
    if (!have.has(target)) {
      await ops.add(target);
      changed = true;
    }
  }

  return changed;
}
