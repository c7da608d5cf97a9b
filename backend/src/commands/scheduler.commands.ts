/**
 * backend/src/commands/scheduler.commands.ts
 *
 * WHY:
 * - Deploy-time schedule sync, the admin enable/disable toggle and the scheduler loop.
 *
 * HOW TO USE:
 * - sync_schedule [--file PATH]
 * - periodic_tasks list | enable NAME | disable NAME
 * - run_scheduler [--once]
 */

import { parseArgs } from 'node:util';

import type { PeriodicTask } from '../modules/scheduler/scheduler.types';
import { CommandErrors } from './command.errors';
import type { Command } from './command.types';
import { parseCommandArgs } from './parse-args';

export function describeSchedule(task: PeriodicTask): string {
  switch (task.schedule_type) {
    case 'interval':
      return `every ${task.interval_every ?? '?'} ${task.interval_period ?? 'seconds'}`;
    case 'crontab':
      return `crontab ${task.crontab ?? '?'}`;
    case 'clocked':
      return `clocked ${task.clocked_at ? task.clocked_at.toISOString() : '?'}`;
  }
}

export function formatTaskLine(task: PeriodicTask): string {
  const state = task.enabled ? 'on ' : 'off';
  const lastRun = task.last_run_at ? task.last_run_at.toISOString() : 'never';
  return `[${state}] ${task.name} -> ${task.task} (${describeSchedule(task)}); last run ${lastRun}, runs ${task.total_run_count}`;
}

export const syncScheduleCommand: Command = {
  name: 'sync_schedule',
  usage: 'sync_schedule [--file PATH]',
  description: 'Create, update and prune periodic tasks from the schedule file.',
  async run(ctx, argv) {
    const { values } = parseCommandArgs(this.name, () =>
      parseArgs({ args: argv, options: { file: { type: 'string' } } }),
    );

    const result = await ctx.deps.scheduler.schedulerService.syncSchedule({ file: values.file });
    for (const line of result.lines) ctx.out.info(line);
  },
};

export const periodicTasksCommand: Command = {
  name: 'periodic_tasks',
  usage: 'periodic_tasks list | enable NAME | disable NAME',
  description: 'List periodic tasks or switch one on or off.',
  async run(ctx, argv) {
    const { positionals } = parseCommandArgs(this.name, () =>
      parseArgs({ args: argv, allowPositionals: true, options: {} }),
    );
    const [action = 'list', name] = positionals;
    const { schedulerService } = ctx.deps.scheduler;

    if (action === 'list') {
      const tasks = await schedulerService.listTasks();
      if (!tasks.length) ctx.out.info('No periodic tasks.');
      for (const task of tasks) ctx.out.info(formatTaskLine(task));
      return;
    }

    if (action !== 'enable' && action !== 'disable') {
      throw CommandErrors.invalidArguments(this.name, `unknown action '${action}'`);
    }
    if (!name) throw CommandErrors.missingArgument(this.name, 'NAME');

    const task = await schedulerService.setEnabled(name, action === 'enable');
    ctx.out.info(`${task.enabled ? 'Enabled' : 'Disabled'}: ${task.name}`);
  },
};

export const runSchedulerCommand: Command = {
  name: 'run_scheduler',
  usage: 'run_scheduler [--once]',
  description: 'Run due periodic tasks every tick until stopped (or a single tick with --once).',
  async run(ctx, argv) {
    const { values } = parseCommandArgs(this.name, () =>
      parseArgs({ args: argv, options: { once: { type: 'boolean', default: false } } }),
    );
    const { schedulerService, createScheduler } = ctx.deps.scheduler;

    if (values.once) {
      const result = await schedulerService.runDueTasks();
      for (const name of result.ran) ctx.out.info(`Ran: ${name}`);
      for (const name of result.failed) ctx.out.info(`Failed: ${name}`);
      ctx.out.info(
        `Tick complete: ${result.ran.length} ran, ${result.failed.length} failed, ${result.skipped.length} skipped.`,
      );
      return;
    }

    const scheduler = createScheduler();
    scheduler.start();
    await ctx.untilShutdown();
    await scheduler.stop();
  },
};
