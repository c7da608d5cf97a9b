import { buildTestDeps, testConfig } from '../helpers/build-test-app';
import { addStaffUser, addTask } from '../helpers/fixtures';

async function setup(config = testConfig()) {
  const built = await buildTestDeps({ config });
  const { store } = built;

  const coach = await addStaffUser(store, { email: 'coach@example.test', fullName: 'Pat Coach' });
  const noMail = await addStaffUser(store, { email: '', fullName: 'No Mail' });

  await addTask(store, {
    title: 'Renew pitch booking',
    assignedToId: coach.id,
    dueAt: new Date('2025-06-10T09:30:00Z'),
  });
  await addTask(store, { title: 'Order kit', assignedToId: coach.id });
  await addTask(store, {
    title: 'Book referee',
    assignedToId: noMail.id,
    dueAt: new Date('2025-06-18T14:00:00Z'),
  });

  return { ...built, coach, noMail };
}

describe('task digest', () => {
  it('enqueues one e-mail per assignee with an address', async () => {
    const { deps, queue, coach } = await setup();

    const result = await deps.tasks.taskService.sendDigest({ dryRun: false });

    expect(result).toEqual({ dryRun: false, sent: 1, users: 2, lines: ['Sent 1 email(s) to 2 user(s).'] });

    const [message, ...rest] = queue.drain();
    expect(rest).toEqual([]);
    expect(message).toMatchObject({
      type: 'tasks.digest-email',
      userId: coach.id,
      to: 'coach@example.test',
      subject: '[Test Club] You have 2 open task(s)',
      taskCount: 2,
    });
    expect(message?.text.split('\n')).toEqual([
      'Hi Pat Coach,',
      '',
      'You have 2 open task(s) on Test Club:',
      '',
      '- [OVERDUE] Renew pitch booking (due 2025-06-10 09:30 UTC)',
      '- Order kit',
      '',
      'View your tasks: https://club.example.test/tasks/mine/',
      '',
    ]);
  });

  it('reports what it would send on a dry run and enqueues nothing', async () => {
    const { deps, queue } = await setup();

    const result = await deps.tasks.taskService.sendDigest({ dryRun: true });

    expect(result.lines).toEqual([
      '[DRY] Would send 2 task(s) to Pat Coach <coach@example.test>',
      '[DRY] Would send 1 task(s) to No Mail <>',
      '[DRY] Built digests for 2 user(s).',
    ]);
    expect(result.sent).toBe(0);
    expect(queue.size).toBe(0);
  });

  it('skips everything when the digest is disabled', async () => {
    const { deps, queue } = await setup(testConfig({ tasks: { digestEnabled: false, digestLookaheadDays: 7 } }));

    const result = await deps.tasks.taskService.sendDigest({ dryRun: false });

    expect(result).toEqual({
      dryRun: false,
      sent: 0,
      users: 0,
      skipped: 'disabled',
      lines: ['Task digest is disabled; skipping.'],
    });
    expect(queue.size).toBe(0);
  });

  it('says so when nobody has open tasks', async () => {
    const { deps } = await buildTestDeps();

    const result = await deps.tasks.taskService.sendDigest({ dryRun: false });

    expect(result.lines).toEqual(['No users with open tasks. Nothing to send.']);
  });
});
