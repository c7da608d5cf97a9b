/**
 * backend/src/modules/scheduler/flows/sync-schedule-flow.ts
 *
 * WHY:
 * - Deploy-time sync of the schedule file into periodic_tasks, so the file is
 *   the source of truth for every task it names.
 *
 * RULES:
 * - Rows are named `<prefix><entry name>`; rows carrying the prefix that the
 *   file no longer names are deleted. Rows without the prefix are never touched.
 * - Crontab expressions are validated here, so the tick only sees valid ones.
 * - `enabled` is part of the file: a sync re-enables a task an admin disabled.
 */

import type { Logger } from '../../../shared/logger/logger';
import type { RecordStore } from '../../../shared/db/record-store';
import { rowMatches } from '../../../shared/db/upsert';

import { listPeriodicTasks } from '../dal/periodic-task.query-sql';
import type { PeriodicTaskRepo } from '../dal/periodic-task.repo';
import { formatCrontab, parseCrontab } from '../helpers/crontab';
import type { ScheduleEntry, ScheduleFile } from '../schedule-file.schema';
import { SchedulerErrors } from '../scheduler.errors';
import type { DesiredPeriodicTask, SyncScheduleResult } from '../scheduler.types';

export function desiredTaskFromEntry(name: string, entry: ScheduleEntry, source: string): DesiredPeriodicTask {
  const base = {
    name,
    task: entry.task,
    kwargs: entry.kwargs,
    enabled: entry.enabled,
    interval_every: null,
    interval_period: null,
    crontab: null,
    clocked_at: null,
    one_off: entry.one_off,
  };

  switch (entry.type) {
    case 'interval':
      return { ...base, schedule_type: 'interval', interval_every: entry.every, interval_period: entry.period };
    case 'crontab': {
      const crontab = formatCrontab(entry);
      parseCrontab(crontab);
      return { ...base, schedule_type: 'crontab', crontab };
    }
    case 'clocked':
      if (!entry.clocked_at) throw SchedulerErrors.invalidScheduleFile(source, `${name}: clocked_at is required`);
      return { ...base, schedule_type: 'clocked', clocked_at: new Date(entry.clocked_at), one_off: true };
  }
}

export async function syncScheduleFlow(
  deps: { store: RecordStore; logger: Logger; periodicTaskRepo: PeriodicTaskRepo },
  params: { schedule: ScheduleFile; source: string; prefix: string; now: Date },
): Promise<SyncScheduleResult> {
  const flow = 'scheduler.sync_schedule';
  deps.logger.info({ msg: `${flow}.start`, flow, source: params.source, prefix: params.prefix });

  const repo = deps.periodicTaskRepo.withStore(deps.store);
  const result: SyncScheduleResult = { created: 0, updated: 0, unchanged: 0, deleted: 0, lines: [] };

  const existing = new Map((await listPeriodicTasks(deps.store)).map((row) => [row.name, row]));
  const seen = new Set<string>();

  for (const [entryName, entry] of Object.entries(params.schedule)) {
    const name = `${params.prefix}${entryName}`;
    const desired = desiredTaskFromEntry(name, entry, params.source);
    seen.add(name);

    const row = existing.get(name);
    if (!row) {
      await repo.create(desired, params.now);
      result.created += 1;
      result.lines.push(`Created: ${name}`);
    } else if (rowMatches(row, desired)) {
      result.unchanged += 1;
      result.lines.push(`No change: ${name}`);
    } else {
      await repo.updateSchedule(row.id, desired, params.now);
      result.updated += 1;
      result.lines.push(`Updated: ${name}`);
    }
  }

  for (const row of existing.values()) {
    if (row.name.startsWith(params.prefix) && !seen.has(row.name)) {
      await repo.deleteById(row.id);
      result.deleted += 1;
    }
  }
  if (result.deleted > 0) result.lines.push(`Deleted ${result.deleted} stale task(s).`);

  result.lines.push('Schedule sync complete.');

  deps.logger.info({
    msg: `${flow}.success`,
    flow,
    created: result.created,
    updated: result.updated,
    unchanged: result.unchanged,
    deleted: result.deleted,
  });

  return result;
}
