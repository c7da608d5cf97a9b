/**
 * backend/src/modules/spond/flows/link-player-flow.ts
 *
 * WHY:
 * - Staff tie a club player to the Spond member it corresponds to.
 *
 * RULES:
 * - `deps.store` is the request transaction.
 * - Linking an existing pair re-activates it; it never creates a duplicate.
 * - Audited.
 */

import type { Logger } from '../../../shared/logger/logger';
import type { RecordStore } from '../../../shared/db/record-store';
import type { AuditRepo } from '../../../shared/audit/audit.repo';
import { AuditWriter } from '../../../shared/audit/audit.writer';

import { getPlayerById, getPlayerLink, getSpondMemberById } from '../dal/spond.query-sql';
import type { SpondRepo } from '../dal/spond.repo';
import { SpondErrors } from '../spond.errors';
import type { LinkPlayerParams, UnlinkPlayerParams } from '../spond.types';

type LinkDeps = { store: RecordStore; logger: Logger; auditRepo: AuditRepo; spondRepo: SpondRepo };

export async function linkPlayerFlow(
  deps: LinkDeps,
  params: LinkPlayerParams & { now: Date },
): Promise<{ ok: true; link_id: string }> {
  const flow = 'spond.link';
  deps.logger.info({ msg: `${flow}.start`, flow, requestId: params.requestId, playerId: params.playerId });

  const player = await getPlayerById(deps.store, params.playerId);
  if (!player) throw SpondErrors.invalidPlayer({ playerId: params.playerId });

  const member = await getSpondMemberById(deps.store, params.spondMemberPk);
  if (!member) throw SpondErrors.invalidMember({ spondMemberPk: params.spondMemberPk });

  const link = await deps.spondRepo
    .withStore(deps.store)
    .activateLink({ playerId: player.id, spondMemberId: member.id, now: params.now });

  const audit = new AuditWriter(deps.auditRepo.withStore(deps.store), { requestId: params.requestId });
  await audit.append('spond.link.created', {
    playerId: player.id,
    spondMemberId: member.spond_member_id,
    linkId: link.id,
  });

  deps.logger.info({ msg: `${flow}.success`, flow, requestId: params.requestId, linkId: link.id });
  return { ok: true, link_id: link.id };
}

export async function unlinkPlayerFlow(deps: LinkDeps, params: UnlinkPlayerParams): Promise<{ ok: true }> {
  const flow = 'spond.unlink';
  deps.logger.info({ msg: `${flow}.start`, flow, requestId: params.requestId, linkId: params.linkId });

  const link = await getPlayerLink(deps.store, { playerId: params.playerId, linkId: params.linkId });
  if (!link) throw SpondErrors.invalidLink({ playerId: params.playerId, linkId: params.linkId });

  await deps.spondRepo.withStore(deps.store).deactivateLink(link.id);

  const audit = new AuditWriter(deps.auditRepo.withStore(deps.store), { requestId: params.requestId });
  await audit.append('spond.link.deactivated', { playerId: link.player_id, linkId: link.id });

  deps.logger.info({ msg: `${flow}.success`, flow, requestId: params.requestId, linkId: link.id });
  return { ok: true };
}
