/**
 * backend/src/modules/spond/flows/sync-members-flow.ts
 *
 * WHY:
 * - Mirrors Spond groups and members locally so staff can search and link them
 *   without calling Spond.
 *
 * RULES:
 * - `deps.store` is the sync transaction (SpondService fetches first, then opens it).
 * - Groups first (name falls back to the Spond id), then parents, then members.
 * - A member's group set is replaced by its `subGroups`; unknown group ids are ignored.
 * - Members without an id are skipped.
 */

import type { Logger } from '../../../shared/logger/logger';
import type { RecordStore } from '../../../shared/db/record-store';
import type { JsonObject } from '../../../shared/db/schema';

import type { SpondRepo } from '../dal/spond.repo';
import { getSpondGroupBySpondId } from '../dal/spond.query-sql';
import { buildGroupIndex, collectMembers } from '../helpers/spond-payload';
import type { SyncMembersResult } from '../spond.types';

export async function syncMembersFlow(
  deps: { store: RecordStore; logger: Logger; spondRepo: SpondRepo },
  params: { groups: JsonObject[]; now: Date },
): Promise<SyncMembersResult> {
  const flow = 'spond.sync_members';
  deps.logger.info({ msg: `${flow}.start`, flow, groups: params.groups.length });

  const repo = deps.spondRepo.withStore(deps.store);
  const index = buildGroupIndex(params.groups);
  const members = collectMembers(params.groups);

  const localIds = new Map<string, string>();
  for (const [spondGroupId, group] of index) {
    const row = await repo.upsertGroup({ spondGroupId, name: group.name || spondGroupId, data: group.raw });
    localIds.set(spondGroupId, row.id);
  }

  for (const [spondGroupId, group] of index) {
    if (!group.parentId) continue;
    const id = localIds.get(spondGroupId);
    const parentId = localIds.get(group.parentId);
    if (id && parentId) await repo.setGroupParent(id, parentId);
  }

  let synced = 0;
  for (const member of members) {
    const row = await repo.upsertMember(member, params.now);

    const groupIds: string[] = [];
    for (const spondGroupId of member.subGroupIds) {
      const groupId = localIds.get(spondGroupId) ?? (await getSpondGroupBySpondId(deps.store, spondGroupId))?.id;
      if (groupId) groupIds.push(groupId);
    }
    await repo.setMemberGroups(row.id, groupIds);
    synced += 1;
  }

  const message = `Synced ${synced} members; groups indexed: ${index.size}`;
  deps.logger.info({ msg: `${flow}.success`, flow, members: synced, groups: index.size });

  return { members: synced, groups: index.size, message };
}
