/**
 * backend/src/commands/clone-season.command.ts
 *
 * clone_season --from SEASON --to SEASON [--create-target] [--dry-run] [--overwrite] [--include-inactive]
 */

import { parseArgs } from 'node:util';

import { CommandErrors } from './command.errors';
import type { Command } from './command.types';
import { parseCommandArgs } from './parse-args';

export const cloneSeasonCommand: Command = {
  name: 'clone_season',
  usage: 'clone_season --from SEASON --to SEASON [--create-target] [--dry-run] [--overwrite] [--include-inactive]',
  description: "Copy one season's products, plans, add-ons and match fees into another season.",
  async run(ctx, argv) {
    const { values } = parseCommandArgs(this.name, () =>
      parseArgs({
        args: argv,
        options: {
          from: { type: 'string' },
          to: { type: 'string' },
          'create-target': { type: 'boolean', default: false },
          'dry-run': { type: 'boolean', default: false },
          overwrite: { type: 'boolean', default: false },
          'include-inactive': { type: 'boolean', default: false },
        },
      }),
    );
    if (!values.from) throw CommandErrors.missingArgument(this.name, '--from');
    if (!values.to) throw CommandErrors.missingArgument(this.name, '--to');

    const result = await ctx.deps.memberships.membershipService.cloneSeason({
      from: values.from,
      to: values.to,
      createTarget: values['create-target'],
      dryRun: values['dry-run'],
      overwrite: values.overwrite,
      includeInactive: values['include-inactive'],
    });
    for (const line of result.lines) ctx.out.info(line);
  },
};
