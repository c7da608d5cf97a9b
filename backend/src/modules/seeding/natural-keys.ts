/**
 * backend/src/modules/seeding/natural-keys.ts
 *
 * WHY:
 * - Seed documents identify rows by natural key, never by surrogate id.
 * - Hand-edited or older documents sometimes carry `slug` or `code` where we
 *   now expect `name`. Each entity lists the document fields to try, in order.
 *
 * HOW TO USE:
 * - const sku = requireNaturalKey('MembershipProduct', record)
 * - The value is then matched against NATURAL_KEYS[entity].column within `scope`.
 *
 * RULES:
 * - Evaluation is deterministic: the first present, non-blank field wins.
 * - Player is special: each candidate field is also the column it is matched on.
 */

import { SeedErrors } from './seed.errors';

export type NaturalKeySpec = {
  column: string;
  fields: readonly string[];
  scope: readonly string[];
};

export const NATURAL_KEYS = {
  Season: { column: 'name', fields: ['name', 'slug'], scope: [] },
  PlayerType: { column: 'name', fields: ['name', 'key', 'code', 'slug', 'label'], scope: [] },
  MembershipCategory: { column: 'code', fields: ['code', 'slug', 'name'], scope: [] },
  MembershipProduct: { column: 'sku', fields: ['sku', 'code', 'slug'], scope: ['season'] },
  PaymentPlan: { column: 'label', fields: ['label', 'name'], scope: ['product'] },
  AddOnFee: { column: 'name', fields: ['name', 'code'], scope: ['season'] },
  MatchFeeTariff: {
    column: 'name',
    fields: ['name', 'label'],
    scope: ['season', 'category', 'product'],
  },
  Position: { column: 'name', fields: ['name', 'code', 'slug', 'label'], scope: [] },
  QuestionCategory: { column: 'name', fields: ['name', 'code', 'slug', 'label'], scope: [] },
  DynamicQuestion: { column: 'code', fields: ['code', 'slug', 'name'], scope: [] },
  Team: { column: 'name', fields: ['name', 'code', 'slug'], scope: [] },
  Player: { column: 'public_id', fields: ['public_id', 'membership_number'], scope: [] },
} as const satisfies Record<string, NaturalKeySpec>;

export type SeedEntity = keyof typeof NATURAL_KEYS;

export type ResolvedKey = { field: string; value: string };

function keyText(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

export function resolveNaturalKey(entity: SeedEntity, record: object): ResolvedKey | null {
  for (const field of NATURAL_KEYS[entity].fields) {
    const value = keyText(Reflect.get(record, field));
    if (value !== null) return { field, value };
  }
  return null;
}

/** Like resolveNaturalKey, but a record with no usable key fails the import. */
export function requireNaturalKey(entity: SeedEntity, record: object, index?: number): string {
  const resolved = resolveNaturalKey(entity, record);
  if (!resolved) {
    throw SeedErrors.missingNaturalKey(entity, NATURAL_KEYS[entity].fields, { index });
  }
  return resolved.value;
}
