/**
 * backend/src/modules/spond/dal/spond.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for the local Spond mirror and player links.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 */

import type { RecordStore, Row } from '../../../shared/db/record-store';
import type { PlayerSpondLink, SpondMember } from '../spond.types';

/** Case-insensitive substring match on name or e-mail, ordered by name. Blank term lists everyone. */
export async function searchSpondMembers(
  store: RecordStore,
  params: { term: string; limit: number },
): Promise<SpondMember[]> {
  return store.list('spond_members', {
    search: { columns: ['full_name', 'email'], term: params.term },
    orderBy: [{ column: 'full_name' }],
    limit: params.limit,
  });
}

export async function getSpondMemberById(store: RecordStore, id: string): Promise<SpondMember | null> {
  return store.findOne('spond_members', { id });
}

export async function getSpondMemberBySpondId(store: RecordStore, spondMemberId: string): Promise<SpondMember | null> {
  return store.findOne('spond_members', { spond_member_id: spondMemberId });
}

export async function getSpondGroupBySpondId(
  store: RecordStore,
  spondGroupId: string,
): Promise<Row<'spond_groups'> | null> {
  return store.findOne('spond_groups', { spond_group_id: spondGroupId });
}

export async function getPlayerById(store: RecordStore, id: string): Promise<Row<'players'> | null> {
  return store.findOne('players', { id });
}

export async function getPlayerLink(
  store: RecordStore,
  params: { playerId: string; linkId: string },
): Promise<PlayerSpondLink | null> {
  return store.findOne('player_spond_links', { id: params.linkId, player_id: params.playerId });
}

export async function getNewestTransactionTime(store: RecordStore): Promise<Date | null> {
  const [newest] = await store.list('spond_transactions', {
    orderBy: [{ column: 'created_at_remote', direction: 'desc' }],
    limit: 1,
  });
  return newest?.created_at_remote ?? null;
}
