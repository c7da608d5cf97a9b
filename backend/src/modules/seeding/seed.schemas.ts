/**
 * backend/src/modules/seeding/seed.schemas.ts
 *
 * WHY:
 * - Seed documents are hand-edited and travel between environments, so every
 *   record is validated before the first write.
 * - Optional fields get the same defaults the importer has always applied.
 *
 * RULES:
 * - Natural-key fields are all optional here; natural-keys.ts decides which one wins.
 * - Money accepts a number or a decimal string and is normalized to two decimals;
 *   anything numeric(8,2) cannot hold is rejected.
 * - Older field names are accepted through withAliases (the canonical name wins
 *   when both are present).
 */

import { z } from 'zod';

const keyField = z.string().nullish();

const DECIMAL_PATTERN = /^(-?)(\d+)(?:\.(\d+))?$/;
/** numeric(8,2) holds at most 999999.99. */
const MAX_CENTS = 99_999_999n;

/** Rounds a decimal string half away from zero to two places without going through floats. */
function toTwoDecimals(text: string): string | null {
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) return null;

  const [, sign = '', whole = '0', fraction = ''] = match;
  const digits = fraction.padEnd(3, '0');
  let cents = BigInt(whole) * 100n + BigInt(digits.slice(0, 2));
  if (digits.charAt(2) >= '5') cents += 1n;
  if (cents > MAX_CENTS) return null;

  const units = cents / 100n;
  const rest = String(cents % 100n).padStart(2, '0');
  return `${sign && cents > 0n ? '-' : ''}${units}.${rest}`;
}

const decimal2 = z.union([z.number(), z.string().trim()]).transform((v, ctx) => {
  const amount = toTwoDecimals(String(v));
  if (amount === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a decimal amount up to 999999.99' });
    return z.NEVER;
  }
  return amount;
});

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

/** Copies `alias` into its canonical field when the canonical one is missing or null. */
function withAliases<S extends z.ZodTypeAny>(aliases: Record<string, string>, schema: S) {
  return z.preprocess((raw) => {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return raw;

    const out: Record<string, unknown> = { ...raw };
    for (const [alias, canonical] of Object.entries(aliases)) {
      const current = out[canonical];
      if ((current === undefined || current === null) && out[alias] !== undefined) {
        out[canonical] = out[alias];
      }
    }
    return out;
  }, schema);
}

// ── memberships side ─────────────────────────────────────────

export const seasonSeedSchema = withAliases(
  { start_date: 'start', end_date: 'end' },
  z.object({
    name: keyField,
    slug: keyField,
    start: isoDate,
    end: isoDate,
    is_active: z.boolean().default(false),
  }),
);

export const playerTypeSeedSchema = z.object({
  name: keyField,
  key: keyField,
  code: keyField,
  slug: keyField,
  label: keyField,
});

export const categorySeedSchema = z.object({
  code: keyField,
  slug: keyField,
  name: keyField,
  label: z.string().nullish(),
  description: z.string().default(''),
  is_selectable: z.boolean().default(true),
  applies_to: z.array(z.string()).default([]),
});

export const planSeedSchema = withAliases(
  { sort_order: 'display_order' },
  z.object({
    label: keyField,
    name: keyField,
    instalment_amount_gbp: decimal2.default(0),
    instalment_count: z.number().int().min(1).default(1),
    frequency: z.enum(['once', 'weekly', 'monthly']).default('monthly'),
    includes_match_fees: z.boolean().default(true),
    active: z.boolean().default(true),
    display_order: z.number().int().default(0),
  }),
);

export const productSeedSchema = withAliases(
  { price: 'list_price_gbp' },
  z.object({
    season: z.string().min(1),
    category: z.string().min(1),
    sku: keyField,
    code: keyField,
    slug: keyField,
    name: z.string().nullish(),
    list_price_gbp: decimal2.default(0),
    active: z.boolean().default(true),
    notes: z.string().default(''),
    requires_plan: z.boolean().default(true),
    pay_per_match: z.boolean().default(false),
    plans: z.array(planSeedSchema).default([]),
  }),
);

export const addOnSeedSchema = z.object({
  season: z.string().min(1),
  name: keyField,
  code: keyField,
  amount_gbp: decimal2.default(0),
  active: z.boolean().default(true),
});

export const matchFeeSeedSchema = z.object({
  season: z.string().min(1),
  name: keyField,
  label: keyField,
  amount_gbp: decimal2.default(0),
  category: z.string().nullish(),
  product: z.string().nullish(),
  is_default: z.boolean().default(false),
  active: z.boolean().default(true),
});

// ── members side ─────────────────────────────────────────────

export const positionSeedSchema = z.object({
  name: keyField,
  code: keyField,
  slug: keyField,
  label: keyField,
});

export const questionCategorySeedSchema = withAliases(
  { sort_order: 'display_order' },
  z.object({
    name: keyField,
    code: keyField,
    slug: keyField,
    label: keyField,
    description: z.string().default(''),
    display_order: z.number().int().default(0),
  }),
);

export const dynamicQuestionSeedSchema = withAliases(
  { text: 'label', field_type: 'question_type', sort_order: 'display_order', choices: 'choices_text' },
  z.object({
    code: keyField,
    slug: keyField,
    name: keyField,
    label: z.string().nullish(),
    help_text: z.string().default(''),
    description: z.string().default(''),
    question_type: z.string().min(1).default('text'),
    required: z.boolean().default(false),
    requires_detail_if_yes: z.boolean().default(false),
    category: z.string().nullish(),
    display_order: z.number().int().default(0),
    active: z.boolean().default(true),
    choices_text: z
      .union([z.string(), z.array(z.string())])
      .default('')
      .transform((v) => (Array.isArray(v) ? v.join('\n') : v)),
    applies_to: z.array(z.string()).default([]),
  }),
);

export const teamSeedSchema = withAliases(
  { is_active: 'active' },
  z.object({
    name: keyField,
    code: keyField,
    slug: keyField,
    description: z.string().default(''),
    active: z.boolean().default(true),
  }),
);

export const teamMembershipSeedSchema = z.object({
  team: z.string().min(1),
  player_public_id: z.string().min(1),
  positions: z.array(z.string()).default([]),
});

const metaSchema = z.object({ version: z.number().optional() }).passthrough();

export const membershipsSeedDocumentSchema = z.object({
  _meta: metaSchema.optional(),
  memberships: z
    .object({
      seasons: z.array(seasonSeedSchema).default([]),
      categories: z.array(categorySeedSchema).default([]),
      products: z.array(productSeedSchema).default([]),
      addons: z.array(addOnSeedSchema).default([]),
      match_fees: z.array(matchFeeSeedSchema).default([]),
    })
    .default({}),
  members: z
    .object({
      player_types: z.array(playerTypeSeedSchema).default([]),
      positions: z.array(positionSeedSchema).default([]),
      question_categories: z.array(questionCategorySeedSchema).default([]),
      dynamic_questions: z.array(dynamicQuestionSeedSchema).default([]),
      teams: z.array(teamSeedSchema).default([]),
      team_memberships: z.array(teamMembershipSeedSchema).default([]),
    })
    .default({}),
});

// ── players seed ─────────────────────────────────────────────

const nullableText = z
  .string()
  .nullish()
  .transform((v) => (v && v.trim() ? v.trim() : null));

export const playerSeedSchema = z.object({
  public_id: nullableText,
  membership_number: z
    .union([z.string(), z.number().int()])
    .nullish()
    .transform((v) => (v === null || v === undefined || String(v).trim() === '' ? null : String(v).trim())),
  first_name: z.string().default(''),
  last_name: z.string().default(''),
  date_of_birth: isoDate.nullish().transform((v) => v ?? null),
  gender: z.string().default(''),
  relation: z.string().default(''),
  player_type: z.string().min(1),
});

/** `value` is the loose single-field form: its JSON type picks the answer column. */
function mapAnswerValue(raw: unknown): unknown {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return raw;

  const out: Record<string, unknown> = { ...raw };
  const value = out.value;
  if (typeof value === 'string' && out.text_answer == null) out.text_answer = value;
  if (typeof value === 'boolean' && out.boolean_answer == null) out.boolean_answer = value;
  if (typeof value === 'number' && out.numeric_answer == null) out.numeric_answer = value;
  return out;
}

export const playerAnswerSeedSchema = z.preprocess(
  mapAnswerValue,
  z.object({
    player_public_id: z.string().min(1),
    question: z.string().min(1),
    text_answer: z.string().nullish().transform((v) => v ?? ''),
    boolean_answer: z.boolean().nullish().transform((v) => v ?? null),
    detail_text: z.string().nullish().transform((v) => v ?? ''),
    numeric_answer: decimal2.nullish().transform((v) => v ?? null),
  }),
);

export const playersSeedDocumentSchema = z.object({
  _meta: metaSchema.optional(),
  players: z.array(playerSeedSchema).default([]),
  answers: z.array(playerAnswerSeedSchema).optional(),
});
