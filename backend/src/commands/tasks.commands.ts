/**
 * backend/src/commands/tasks.commands.ts
 *
 * send_task_digest [--dry-run]
 */

import { parseArgs } from 'node:util';

import type { Command } from './command.types';
import { parseCommandArgs } from './parse-args';

export const sendTaskDigestCommand: Command = {
  name: 'send_task_digest',
  usage: 'send_task_digest [--dry-run]',
  description: 'E-mail every assignee a digest of their open tasks.',
  async run(ctx, argv) {
    const { values } = parseCommandArgs(this.name, () =>
      parseArgs({ args: argv, options: { 'dry-run': { type: 'boolean', default: false } } }),
    );

    const result = await ctx.deps.tasks.taskService.sendDigest({ dryRun: values['dry-run'] });
    for (const line of result.lines) ctx.out.info(line);
  },
};
