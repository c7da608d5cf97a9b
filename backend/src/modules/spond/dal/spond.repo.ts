/**
 * backend/src/modules/spond/dal/spond.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for the Spond mirror and player links.
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - Supports withStore() for transaction binding.
 * - Sync timestamps are not content: a row whose payload did not change reports
 *   'unchanged' even though last_synced_at moves.
 */

import type { RecordStore, Row } from '../../../shared/db/record-store';
import type { JsonObject } from '../../../shared/db/schema';
import { rowMatches, syncLinkSet, upsertRow, type UpsertOutcome } from '../../../shared/db/upsert';

import type { NormalizedEvent, NormalizedMember, NormalizedTransaction } from '../helpers/spond-payload';
import type { PlayerSpondLink } from '../spond.types';

export class SpondRepo {
  constructor(private readonly store: RecordStore) {}

  withStore(store: RecordStore): SpondRepo {
    return new SpondRepo(store);
  }

  /** Name and payload only; parents are set in a second pass. */
  async upsertGroup(params: { spondGroupId: string; name: string; data: JsonObject }): Promise<Row<'spond_groups'>> {
    const existing = await this.store.findOne('spond_groups', { spond_group_id: params.spondGroupId });
    const content = { name: params.name, data: params.data };

    if (!existing) {
      return this.store.insert('spond_groups', { spond_group_id: params.spondGroupId, parent_id: null, ...content });
    }
    if (rowMatches(existing, content)) return existing;
    return this.store.update('spond_groups', existing.id, content);
  }

  async setGroupParent(groupId: string, parentId: string): Promise<void> {
    await this.store.update('spond_groups', groupId, { parent_id: parentId });
  }

  async upsertMember(member: NormalizedMember, now: Date): Promise<Row<'spond_members'>> {
    const existing = await this.store.findOne('spond_members', { spond_member_id: member.spondMemberId });
    const values = { full_name: member.fullName, email: member.email, data: member.raw, last_synced_at: now };

    if (!existing) {
      return this.store.insert('spond_members', { spond_member_id: member.spondMemberId, ...values });
    }
    return this.store.update('spond_members', existing.id, values);
  }

  /** Makes the member belong to exactly `groupIds`. */
  async setMemberGroups(memberId: string, groupIds: string[]): Promise<boolean> {
    const current = await this.store.list('spond_member_groups', { where: { member_id: memberId } });
    return syncLinkSet(
      current.map((link) => ({ id: link.id, target: link.group_id })),
      groupIds,
      {
        add: async (groupId) => {
          await this.store.insert('spond_member_groups', { member_id: memberId, group_id: groupId });
        },
        remove: async (linkId) => {
          await this.store.delete('spond_member_groups', { id: linkId });
        },
      },
    );
  }

  async upsertEvent(event: NormalizedEvent, groupId: string | null, now: Date): Promise<UpsertOutcome> {
    const existing = await this.store.findOne('spond_events', { spond_event_id: event.spondEventId });
    const content = {
      title: event.title,
      group_id: groupId,
      start_at: event.startAt,
      end_at: event.endAt,
      data: event.raw,
    };

    if (!existing) {
      await this.store.insert('spond_events', { spond_event_id: event.spondEventId, ...content, last_synced_at: now });
      return 'created';
    }

    const outcome: UpsertOutcome = rowMatches(existing, content) ? 'unchanged' : 'updated';
    await this.store.update('spond_events', existing.id, { ...content, last_synced_at: now });
    return outcome;
  }

  async upsertTransaction(txn: NormalizedTransaction, memberId: string | null): Promise<UpsertOutcome> {
    const values = {
      spond_transaction_id: txn.spondTransactionId,
      member_id: memberId,
      amount: txn.amount,
      currency: txn.currency,
      status: txn.status,
      created_at_remote: txn.createdAt,
      data: txn.raw,
    };
    const { outcome } = await upsertRow(this.store, 'spond_transactions', {
      match: { spond_transaction_id: txn.spondTransactionId },
      values,
    });
    return outcome;
  }

  /** Creates the link, or re-activates the existing one for the same pair. */
  async activateLink(params: { playerId: string; spondMemberId: string; now: Date }): Promise<PlayerSpondLink> {
    const existing = await this.store.findOne('player_spond_links', {
      player_id: params.playerId,
      spond_member_id: params.spondMemberId,
    });

    if (!existing) {
      return this.store.insert('player_spond_links', {
        player_id: params.playerId,
        spond_member_id: params.spondMemberId,
        linked_at: params.now,
        active: true,
      });
    }
    if (existing.active) return existing;
    return this.store.update('player_spond_links', existing.id, { active: true });
  }

  async deactivateLink(linkId: string): Promise<PlayerSpondLink> {
    return this.store.update('player_spond_links', linkId, { active: false });
  }
}
