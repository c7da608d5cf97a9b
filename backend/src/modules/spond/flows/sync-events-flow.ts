/**
 * backend/src/modules/spond/flows/sync-events-flow.ts
 *
 * WHY:
 * - Keeps a local copy of Spond events inside a rolling window around today.
 *
 * RULES:
 * - `deps.store` is the sync transaction.
 * - Events outside the window are dropped even when the API returns them.
 * - The event's group is resolved against already-synced groups; unknown -> null.
 */

import type { Logger } from '../../../shared/logger/logger';
import type { RecordStore } from '../../../shared/db/record-store';
import type { JsonObject } from '../../../shared/db/schema';

import { getSpondGroupBySpondId } from '../dal/spond.query-sql';
import type { SpondRepo } from '../dal/spond.repo';
import { eventInRange, normalizeEvent } from '../helpers/spond-payload';
import type { SyncEventsResult } from '../spond.types';

export async function syncEventsFlow(
  deps: { store: RecordStore; logger: Logger; spondRepo: SpondRepo },
  params: { events: JsonObject[]; start: Date; end: Date; now: Date },
): Promise<SyncEventsResult> {
  const flow = 'spond.sync_events';
  deps.logger.info({
    msg: `${flow}.start`,
    flow,
    fetched: params.events.length,
    start: params.start.toISOString(),
    end: params.end.toISOString(),
  });

  const repo = deps.spondRepo.withStore(deps.store);
  const counts = { created: 0, updated: 0, unchanged: 0 };

  for (const raw of params.events) {
    const event = normalizeEvent(raw);
    if (!event || !eventInRange(event, params.start, params.end)) continue;

    const group = event.spondGroupId ? await getSpondGroupBySpondId(deps.store, event.spondGroupId) : null;
    const outcome = await repo.upsertEvent(event, group?.id ?? null, params.now);
    counts[outcome] += 1;
  }

  const message = `Synced events: +${counts.created}, updated ${counts.updated}, unchanged ${counts.unchanged}`;
  deps.logger.info({ msg: `${flow}.success`, flow, ...counts });

  return { ...counts, fetched: params.events.length, message };
}
