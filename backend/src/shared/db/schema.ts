/**
 * backend/src/shared/db/schema.ts
 *
 * WHY:
 * - Row shapes for every table, as the application sees them after pg parsing.
 * - Both RecordStore implementations are typed against this one interface.
 *
 * RULES:
 * - Keep in step with src/shared/db/migrations (column names are snake_case, as in SQL).
 * - `date` columns are `YYYY-MM-DD` strings (see the type parser in db.ts).
 * - `numeric(8,2)` money columns are two-decimal strings ("12.50").
 * - `timestamptz` columns are Date.
 * - `jsonb` columns hold JSON objects only.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type PlanFrequency = 'once' | 'weekly' | 'monthly';
export type TaskStatus = 'open' | 'done' | 'cancelled';
export type ScheduleType = 'interval' | 'crontab' | 'clocked';
export type IntervalPeriod = 'seconds' | 'minutes' | 'hours' | 'days';

export interface SeasonsTable {
  id: string;
  name: string;
  start_date: string;
  end_date: string;
  is_active: boolean;
}

export interface PlayerTypesTable {
  id: string;
  name: string;
}

export interface MembershipCategoriesTable {
  id: string;
  code: string;
  label: string;
  description: string;
  is_selectable: boolean;
}

export interface MembershipCategoryPlayerTypesTable {
  id: string;
  category_id: string;
  player_type_id: string;
}

export interface MembershipProductsTable {
  id: string;
  season_id: string;
  category_id: string;
  name: string;
  sku: string;
  list_price_gbp: string;
  active: boolean;
  notes: string;
  requires_plan: boolean;
  pay_per_match: boolean;
}

export interface PaymentPlansTable {
  id: string;
  product_id: string;
  label: string;
  instalment_amount_gbp: string;
  instalment_count: number;
  frequency: PlanFrequency;
  includes_match_fees: boolean;
  active: boolean;
  display_order: number;
}

export interface AddOnFeesTable {
  id: string;
  season_id: string;
  name: string;
  amount_gbp: string;
  active: boolean;
}

export interface MatchFeeTariffsTable {
  id: string;
  season_id: string;
  name: string;
  amount_gbp: string;
  category_id: string | null;
  product_id: string | null;
  is_default: boolean;
  active: boolean;
}

export interface PositionsTable {
  id: string;
  name: string;
}

export interface QuestionCategoriesTable {
  id: string;
  name: string;
  display_order: number;
  description: string;
}

export interface DynamicQuestionsTable {
  id: string;
  code: string;
  label: string;
  help_text: string;
  description: string;
  question_type: string;
  required: boolean;
  requires_detail_if_yes: boolean;
  category_id: string | null;
  display_order: number;
  active: boolean;
  choices_text: string;
}

export interface DynamicQuestionPlayerTypesTable {
  id: string;
  question_id: string;
  player_type_id: string;
}

export interface TeamsTable {
  id: string;
  name: string;
  description: string;
  active: boolean;
}

export interface PlayersTable {
  id: string;
  public_id: string;
  membership_number: string | null;
  first_name: string;
  last_name: string;
  date_of_birth: string | null;
  gender: string;
  relation: string;
  player_type_id: string;
  created_at: Date;
  updated_at: Date;
}

export interface TeamMembershipsTable {
  id: string;
  team_id: string;
  player_id: string;
  assigned_at: Date;
}

export interface TeamMembershipPositionsTable {
  id: string;
  team_membership_id: string;
  position_id: string;
}

export interface PlayerAnswersTable {
  id: string;
  player_id: string;
  question_id: string;
  text_answer: string;
  boolean_answer: boolean | null;
  detail_text: string;
  numeric_answer: string | null;
}

export interface SubscriptionsTable {
  id: string;
  player_id: string;
  product_id: string;
  plan_id: string | null;
  season_id: string;
  status: string;
  started_at: Date;
  external_ref: string | null;
}

export interface StaffUsersTable {
  id: string;
  email: string;
  full_name: string;
  is_active: boolean;
}

export interface TasksTable {
  id: string;
  title: string;
  description: string;
  status: TaskStatus;
  assigned_to_id: string | null;
  due_at: Date | null;
  created_at: Date;
}

export interface SpondGroupsTable {
  id: string;
  spond_group_id: string;
  name: string;
  parent_id: string | null;
  data: JsonObject;
}

export interface SpondMembersTable {
  id: string;
  spond_member_id: string;
  full_name: string;
  email: string;
  data: JsonObject;
  last_synced_at: Date | null;
}

export interface SpondMemberGroupsTable {
  id: string;
  member_id: string;
  group_id: string;
}

export interface PlayerSpondLinksTable {
  id: string;
  player_id: string;
  spond_member_id: string;
  linked_at: Date;
  active: boolean;
}

export interface SpondEventsTable {
  id: string;
  spond_event_id: string;
  title: string;
  group_id: string | null;
  start_at: Date | null;
  end_at: Date | null;
  data: JsonObject;
  last_synced_at: Date;
}

export interface SpondTransactionsTable {
  id: string;
  spond_transaction_id: string;
  member_id: string | null;
  amount: string | null;
  currency: string;
  status: string;
  created_at_remote: Date | null;
  data: JsonObject;
}

export interface PeriodicTasksTable {
  id: string;
  name: string;
  task: string;
  schedule_type: ScheduleType;
  interval_every: number | null;
  interval_period: IntervalPeriod | null;
  /** Five-field expression: "minute hour day-of-month month day-of-week". */
  crontab: string | null;
  clocked_at: Date | null;
  one_off: boolean;
  kwargs: JsonObject;
  enabled: boolean;
  last_run_at: Date | null;
  total_run_count: number;
  updated_at: Date;
}

export interface AuditEventsTable {
  id: string;
  action: string;
  request_id: string | null;
  metadata: JsonObject;
  created_at: Date;
}

export interface Tables {
  seasons: SeasonsTable;
  player_types: PlayerTypesTable;
  membership_categories: MembershipCategoriesTable;
  membership_category_player_types: MembershipCategoryPlayerTypesTable;
  membership_products: MembershipProductsTable;
  payment_plans: PaymentPlansTable;
  add_on_fees: AddOnFeesTable;
  match_fee_tariffs: MatchFeeTariffsTable;
  positions: PositionsTable;
  question_categories: QuestionCategoriesTable;
  dynamic_questions: DynamicQuestionsTable;
  dynamic_question_player_types: DynamicQuestionPlayerTypesTable;
  teams: TeamsTable;
  players: PlayersTable;
  team_memberships: TeamMembershipsTable;
  team_membership_positions: TeamMembershipPositionsTable;
  player_answers: PlayerAnswersTable;
  subscriptions: SubscriptionsTable;
  staff_users: StaffUsersTable;
  tasks: TasksTable;
  spond_groups: SpondGroupsTable;
  spond_members: SpondMembersTable;
  spond_member_groups: SpondMemberGroupsTable;
  player_spond_links: PlayerSpondLinksTable;
  spond_events: SpondEventsTable;
  spond_transactions: SpondTransactionsTable;
  periodic_tasks: PeriodicTasksTable;
  audit_events: AuditEventsTable;
}

export type TableName = keyof Tables;
