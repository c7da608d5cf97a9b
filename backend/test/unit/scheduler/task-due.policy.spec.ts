import { intervalMs, isTaskDue, runSlotKey } from '../../../src/modules/scheduler/policies/task-due.policy';
import type { PeriodicTask } from '../../../src/modules/scheduler/scheduler.types';

function task(overrides: Partial<PeriodicTask> = {}): PeriodicTask {
  return {
    id: 'pt-1',
    name: 'digest',
    task: 'tasks.send_digest',
    schedule_type: 'interval',
    interval_every: 10,
    interval_period: 'minutes',
    crontab: null,
    clocked_at: null,
    one_off: false,
    kwargs: {},
    enabled: true,
    last_run_at: null,
    total_run_count: 0,
    updated_at: new Date('2025-01-01T00:00:00Z'),
    ...overrides,
  };
}

const NOW = new Date('2025-06-16T07:00:30Z');

describe('isTaskDue', () => {
  it('never runs a disabled task', () => {
    expect(isTaskDue(task({ enabled: false }), NOW)).toBe(false);
  });

  describe('interval', () => {
    it('runs when it has never run', () => {
      expect(isTaskDue(task(), NOW)).toBe(true);
    });

    it('runs once a full interval has passed', () => {
      expect(isTaskDue(task({ last_run_at: new Date('2025-06-16T06:50:30Z') }), NOW)).toBe(true);
      expect(isTaskDue(task({ last_run_at: new Date('2025-06-16T06:50:31Z') }), NOW)).toBe(false);
    });

    it('does not run without an interval', () => {
      expect(isTaskDue(task({ interval_every: null }), NOW)).toBe(false);
    });
  });

  describe('crontab', () => {
    const cron = task({ schedule_type: 'crontab', interval_every: null, interval_period: null, crontab: '0 7 * * 1' });

    it('runs when the minute matches and it has not run in that minute', () => {
      expect(isTaskDue(cron, NOW)).toBe(true);
      expect(isTaskDue({ ...cron, last_run_at: new Date('2025-06-09T07:00:05Z') }, NOW)).toBe(true);
    });

    it('does not run twice in the same minute', () => {
      expect(isTaskDue({ ...cron, last_run_at: new Date('2025-06-16T07:00:05Z') }, NOW)).toBe(false);
    });

    it('does not run outside the expression', () => {
      expect(isTaskDue(cron, new Date('2025-06-16T07:01:00Z'))).toBe(false);
    });
  });

  describe('clocked', () => {
    const clocked = task({
      schedule_type: 'clocked',
      interval_every: null,
      interval_period: null,
      clocked_at: new Date('2025-06-16T07:00:00Z'),
      one_off: true,
    });

    it('runs once the clock time has passed', () => {
      expect(isTaskDue(clocked, NOW)).toBe(true);
      expect(isTaskDue(clocked, new Date('2025-06-16T06:59:59Z'))).toBe(false);
    });

    it('never runs a second time', () => {
      expect(isTaskDue({ ...clocked, last_run_at: NOW }, NOW)).toBe(false);
    });
  });
});

describe('intervalMs / runSlotKey', () => {
  it('converts the interval to milliseconds', () => {
    expect(intervalMs(task({ interval_every: 2, interval_period: 'hours' }))).toBe(7_200_000);
  });

  it('shares a slot key between ticks inside one interval', () => {
    const t = task();
    const a = runSlotKey(t, new Date('2025-06-16T07:00:30Z'));
    const b = runSlotKey(t, new Date('2025-06-16T07:09:59Z'));
    const c = runSlotKey(t, new Date('2025-06-16T07:10:00Z'));
    expect(a).toBe(b);
    expect(c).not.toBe(a);
  });

  it('keys clocked tasks by their clock time', () => {
    const t = task({ schedule_type: 'clocked', clocked_at: new Date(1_000) });
    expect(runSlotKey(t, NOW)).toBe('scheduler:slot:digest:clocked:1000');
  });
});
