/**
 * backend/src/modules/tasks/flows/send-task-digest-flow.ts
 *
 * WHY:
 * - Daily reminder of open tasks, one e-mail per assignee.
 * - Runs from the scheduler (tasks.send_daily_task_digest) and from the
 *   send_task_digest command.
 *
 * RULES:
 * - Messages go through the Queue; this flow never talks to a mail transport.
 * - Assignees without an e-mail address are skipped.
 * - Dry-run builds every digest and reports it, but enqueues nothing.
 */

import type { Logger } from '../../../shared/logger/logger';
import type { RecordStore } from '../../../shared/db/record-store';
import type { Queue } from '../../../shared/messaging/queue';

import { getStaffUserById, listOpenTasks } from '../dal/task.query-sql';
import { digestListUrl, digestSubject, displayName, renderDigestText } from '../helpers/render-digest';
import { bucketDigestTasks } from '../policies/digest-buckets.policy';
import type { SendTaskDigestParams, SendTaskDigestResult } from '../task.types';

export type TaskDigestConfig = {
  enabled: boolean;
  lookaheadDays: number;
  siteName: string;
  siteUrl: string;
};

export async function sendTaskDigestFlow(
  deps: { store: RecordStore; logger: Logger; queue: Queue; config: TaskDigestConfig },
  params: SendTaskDigestParams & { now: Date },
): Promise<SendTaskDigestResult> {
  const flow = 'tasks.send_digest';

  if (!deps.config.enabled) {
    deps.logger.info({ msg: `${flow}.disabled`, flow });
    return {
      dryRun: params.dryRun,
      sent: 0,
      users: 0,
      skipped: 'disabled',
      lines: ['Task digest is disabled; skipping.'],
    };
  }

  deps.logger.info({ msg: `${flow}.start`, flow, dryRun: params.dryRun });

  const byUser = bucketDigestTasks(await listOpenTasks(deps.store), {
    now: params.now,
    lookaheadDays: deps.config.lookaheadDays,
  });

  if (byUser.size === 0) {
    return { dryRun: params.dryRun, sent: 0, users: 0, lines: ['No users with open tasks. Nothing to send.'] };
  }

  const listUrl = digestListUrl(deps.config.siteUrl);
  const lines: string[] = [];
  let sent = 0;

  for (const [userId, tasks] of byUser) {
    const user = await getStaffUserById(deps.store, userId);
    if (!user) continue;

    if (params.dryRun) {
      lines.push(`[DRY] Would send ${tasks.length} task(s) to ${displayName(user)} <${user.email}>`);
      continue;
    }

    if (!user.email) {
      deps.logger.warn({ msg: `${flow}.no_email`, flow, userId });
      continue;
    }

    await deps.queue.enqueue({
      type: 'tasks.digest-email',
      userId: user.id,
      to: user.email,
      subject: digestSubject(deps.config.siteName, tasks.length),
      text: renderDigestText({ user, tasks, siteName: deps.config.siteName, listUrl, now: params.now }),
      taskCount: tasks.length,
    });
    sent += 1;
  }

  lines.push(
    params.dryRun
      ? `[DRY] Built digests for ${byUser.size} user(s).`
      : `Sent ${sent} email(s) to ${byUser.size} user(s).`,
  );

  deps.logger.info({ msg: `${flow}.success`, flow, dryRun: params.dryRun, sent, users: byUser.size });

  return { dryRun: params.dryRun, sent, users: byUser.size, lines };
}
