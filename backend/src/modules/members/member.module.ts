/**
 * backend/src/modules/members/member.module.ts
 *
 * WHY:
 * - Encapsulates Members module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { Logger } from '../../shared/logger/logger';
import type { RecordStore } from '../../shared/db/record-store';

import { PlayerRepo } from './dal/player.repo';
import { MemberService } from './member.service';

export type MemberModule = ReturnType<typeof createMemberModule>;

export function createMemberModule(deps: { store: RecordStore; logger: Logger; now?: () => Date }) {
  const playerRepo = new PlayerRepo(deps.store);

  const memberService = new MemberService({
    store: deps.store,
    logger: deps.logger,
    playerRepo,
    now: deps.now,
  });

  return { memberService, playerRepo };
}
