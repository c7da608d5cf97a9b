/**
 * backend/src/commands/spond.commands.ts
 *
 * WHY:
 * - Runs one Spond sync on demand (the scheduler runs the same jobs on its own).
 *
 * HOW TO USE:
 * - spond_sync members|events|transactions
 */

import { parseArgs } from 'node:util';

import { CommandErrors } from './command.errors';
import type { Command } from './command.types';
import { parseCommandArgs, requirePositional } from './parse-args';

export const spondSyncCommand: Command = {
  name: 'spond_sync',
  usage: 'spond_sync members|events|transactions',
  description: 'Pull members, events or transactions from Spond.',
  async run(ctx, argv) {
    const { positionals } = parseCommandArgs(this.name, () =>
      parseArgs({ args: argv, allowPositionals: true, options: {} }),
    );
    const what = requirePositional(this.name, positionals, 'members|events|transactions');
    const { spondService } = ctx.deps.spond;

    let result: { message: string };
    switch (what) {
      case 'members':
        result = await spondService.syncMembers();
        break;
      case 'events':
        result = await spondService.syncEvents();
        break;
      case 'transactions':
        result = await spondService.syncTransactions();
        break;
      default:
        throw CommandErrors.invalidArguments(this.name, `unknown sync '${what}'`);
    }
    ctx.out.info(result.message);
  },
};
