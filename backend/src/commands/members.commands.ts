/**
 * backend/src/commands/members.commands.ts
 *
 * backfill_membership_numbers [--digits N] [--force] [--dry-run]
 */

import { parseArgs } from 'node:util';

import type { Command } from './command.types';
import { parseCommandArgs, parsePositiveInt } from './parse-args';

export const backfillMembershipNumbersCommand: Command = {
  name: 'backfill_membership_numbers',
  usage: 'backfill_membership_numbers [--digits N] [--force] [--dry-run]',
  description: 'Assign zero-padded membership numbers in registration order.',
  async run(ctx, argv) {
    const { values } = parseCommandArgs(this.name, () =>
      parseArgs({
        args: argv,
        options: {
          digits: { type: 'string', default: '5' },
          force: { type: 'boolean', default: false },
          'dry-run': { type: 'boolean', default: false },
        },
      }),
    );

    const result = await ctx.deps.members.memberService.backfillMembershipNumbers({
      digits: parsePositiveInt(this.name, 'digits', values.digits),
      force: values.force,
      dryRun: values['dry-run'],
    });
    for (const line of result.lines) ctx.out.info(line);
  },
};
