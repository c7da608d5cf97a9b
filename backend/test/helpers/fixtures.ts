import type { RecordStore, Row } from '../../src/shared/db/record-store';
import type { TaskStatus } from '../../src/shared/db/schema';

/**
 * Row builders for tests. Every builder fills the columns a test does not care
 * about with plain defaults and returns the stored row.
 */

export async function addSeason(
  store: RecordStore,
  name: string,
  opts: { start?: string; end?: string; isActive?: boolean } = {},
): Promise<Row<'seasons'>> {
  return store.insert('seasons', {
    name,
    start_date: opts.start ?? '2024-09-01',
    end_date: opts.end ?? '2025-08-31',
    is_active: opts.isActive ?? true,
  });
}

export async function addPlayerType(store: RecordStore, name: string): Promise<Row<'player_types'>> {
  return store.insert('player_types', { name });
}

export async function addCategory(store: RecordStore, code: string): Promise<Row<'membership_categories'>> {
  return store.insert('membership_categories', { code, label: code, description: '', is_selectable: true });
}

export async function addProduct(
  store: RecordStore,
  opts: { seasonId: string; categoryId: string; sku: string; price?: string; active?: boolean },
): Promise<Row<'membership_products'>> {
  return store.insert('membership_products', {
    season_id: opts.seasonId,
    category_id: opts.categoryId,
    name: opts.sku,
    sku: opts.sku,
    list_price_gbp: opts.price ?? '100.00',
    active: opts.active ?? true,
    notes: '',
    requires_plan: true,
    pay_per_match: false,
  });
}

export async function addPlan(
  store: RecordStore,
  opts: { productId: string; label: string; amount?: string; displayOrder?: number },
): Promise<Row<'payment_plans'>> {
  return store.insert('payment_plans', {
    product_id: opts.productId,
    label: opts.label,
    instalment_amount_gbp: opts.amount ?? '10.00',
    instalment_count: 10,
    frequency: 'monthly',
    includes_match_fees: true,
    active: true,
    display_order: opts.displayOrder ?? 0,
  });
}

export async function addAddOn(
  store: RecordStore,
  opts: { seasonId: string; name: string; amount?: string },
): Promise<Row<'add_on_fees'>> {
  return store.insert('add_on_fees', {
    season_id: opts.seasonId,
    name: opts.name,
    amount_gbp: opts.amount ?? '5.00',
    active: true,
  });
}

export async function addMatchFee(
  store: RecordStore,
  opts: { seasonId: string; name: string; amount?: string; categoryId?: string | null; productId?: string | null },
): Promise<Row<'match_fee_tariffs'>> {
  return store.insert('match_fee_tariffs', {
    season_id: opts.seasonId,
    name: opts.name,
    amount_gbp: opts.amount ?? '8.00',
    category_id: opts.categoryId ?? null,
    product_id: opts.productId ?? null,
    is_default: false,
    active: true,
  });
}

export async function addPlayer(
  store: RecordStore,
  opts: {
    publicId: string;
    playerTypeId: string;
    membershipNumber?: string | null;
    firstName?: string;
    lastName?: string;
    createdAt?: Date;
  },
): Promise<Row<'players'>> {
  const createdAt = opts.createdAt ?? new Date('2024-01-01T00:00:00.000Z');
  return store.insert('players', {
    public_id: opts.publicId,
    membership_number: opts.membershipNumber ?? null,
    first_name: opts.firstName ?? 'Test',
    last_name: opts.lastName ?? 'Player',
    date_of_birth: null,
    gender: '',
    relation: '',
    player_type_id: opts.playerTypeId,
    created_at: createdAt,
    updated_at: createdAt,
  });
}

export async function addStaffUser(
  store: RecordStore,
  opts: { email: string; fullName?: string },
): Promise<Row<'staff_users'>> {
  return store.insert('staff_users', { email: opts.email, full_name: opts.fullName ?? '', is_active: true });
}

export async function addTask(
  store: RecordStore,
  opts: { title: string; assignedToId: string | null; dueAt?: Date | null; status?: TaskStatus; createdAt?: Date },
): Promise<Row<'tasks'>> {
  return store.insert('tasks', {
    title: opts.title,
    description: '',
    status: opts.status ?? 'open',
    assigned_to_id: opts.assignedToId,
    due_at: opts.dueAt ?? null,
    created_at: opts.createdAt ?? new Date('2025-06-01T00:00:00.000Z'),
  });
}

export async function addSpondMember(
  store: RecordStore,
  opts: { spondMemberId: string; fullName: string; email?: string },
): Promise<Row<'spond_members'>> {
  return store.insert('spond_members', {
    spond_member_id: opts.spondMemberId,
    full_name: opts.fullName,
    email: opts.email ?? '',
    data: {},
    last_synced_at: null,
  });
}
