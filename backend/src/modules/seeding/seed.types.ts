/**
 * backend/src/modules/seeding/seed.types.ts
 *
 * WHY:
 * - Shapes of the two portable documents (memberships v3, players v2) as we
 *   write them, and of the parsed input after defaults are applied.
 *
 * RULES:
 * - Cross-references are natural keys, never surrogate ids.
 * - Money is a two-decimal string; dates are YYYY-MM-DD.
 */

import type { z } from 'zod';

import type { PlanFrequency } from '../../shared/db/schema';
import type {
  membershipsSeedDocumentSchema,
  playerAnswerSeedSchema,
  playerSeedSchema,
  playersSeedDocumentSchema,
} from './seed.schemas';

// ── parsed input ─────────────────────────────────────────────

export type MembershipsSeedInput = z.infer<typeof membershipsSeedDocumentSchema>;
export type PlayersSeedInput = z.infer<typeof playersSeedDocumentSchema>;
export type PlayerSeedInput = z.infer<typeof playerSeedSchema>;
export type PlayerAnswerSeedInput = z.infer<typeof playerAnswerSeedSchema>;

// ── memberships document (v3) ────────────────────────────────

export const MEMBERSHIPS_SEED_VERSION = 3;
export const PLAYERS_SEED_VERSION = 2;

export type SeasonSeed = { name: string; start: string; end: string; is_active: boolean };

export type CategorySeed = {
  code: string;
  label: string;
  description: string;
  is_selectable: boolean;
  applies_to: string[];
};

export type PlanSeed = {
  label: string;
  instalment_amount_gbp: string;
  instalment_count: number;
  frequency: PlanFrequency;
  includes_match_fees: boolean;
  active: boolean;
  display_order: number;
};

export type ProductSeed = {
  season: string;
  category: string;
  name: string;
  sku: string;
  list_price_gbp: string;
  active: boolean;
  notes: string;
  requires_plan: boolean;
  pay_per_match: boolean;
  plans: PlanSeed[];
};

export type AddOnSeed = { season: string; name: string; amount_gbp: string; active: boolean };

export type MatchFeeSeed = {
  season: string;
  name: string;
  amount_gbp: string;
  category: string | null;
  product: string | null;
  is_default: boolean;
  active: boolean;
};

export type QuestionCategorySeed = { name: string; description: string; display_order: number };

export type DynamicQuestionSeed = {
  code: string;
  label: string;
  help_text: string;
  description: string;
  question_type: string;
  required: boolean;
  requires_detail_if_yes: boolean;
  category: string | null;
  display_order: number;
  active: boolean;
  choices_text: string;
  applies_to: string[];
};

export type TeamSeed = { name: string; description: string; active: boolean };

export type TeamMembershipSeed = { team: string; player_public_id: string; positions: string[] };

export type MembershipsSeedDocument = {
  _meta: { version: typeof MEMBERSHIPS_SEED_VERSION; notes: string };
  memberships: {
    seasons: SeasonSeed[];
    categories: CategorySeed[];
    products: ProductSeed[];
    addons: AddOnSeed[];
    match_fees: MatchFeeSeed[];
  };
  members: {
    player_types: { name: string }[];
    positions: { name: string }[];
    question_categories: QuestionCategorySeed[];
    dynamic_questions: DynamicQuestionSeed[];
    teams: TeamSeed[];
    team_memberships: TeamMembershipSeed[];
  };
};

// ── players document (v2) ────────────────────────────────────

export type PlayerSeed = {
  public_id: string;
  membership_number: string | null;
  first_name: string;
  last_name: string;
  date_of_birth: string | null;
  gender: string;
  relation: string;
  player_type: string;
};

export type PlayerAnswerSeed = {
  player_public_id: string;
  question: string;
  text_answer: string;
  boolean_answer: boolean | null;
  detail_text: string;
  numeric_answer: string | null;
};

export type PlayersSeedDocument = {
  _meta: { version: typeof PLAYERS_SEED_VERSION; note: string };
  players: PlayerSeed[];
  answers?: PlayerAnswerSeed[];
};

// ── results ──────────────────────────────────────────────────

export type EntityCounts = { created: number; updated: number; unchanged: number };

export type ImportResult = {
  dryRun: boolean;
  lines: string[];
  counts: Record<string, EntityCounts>;
};
