/**
 * backend/src/commands/seed.commands.ts
 *
 * WHY:
 * - Moves membership configuration and player records between environments as JSON.
 *
 * HOW TO USE:
 * - dump_memberships_seed [--pretty] [-o PATH]
 * - seed_memberships PATH [--dry-run] [--purge]
 * - dump_players_seed [--pretty] [-o PATH] [--only-players] [--limit N]
 * - seed_players PATH [--only-players] [--dry-run] [--purge]
 *
 * RULES:
 * - `-o -` writes the document to stdout and prints nothing else.
 */

import { parseArgs } from 'node:util';

import { serializeSeed, writeSeedFile } from '../modules/seeding/helpers/seed-file';
import type { Command, CommandOutput } from './command.types';
import { parseCommandArgs, parsePositiveInt, requirePositional } from './parse-args';

async function emit(out: CommandOutput, output: string, text: string): Promise<string | null> {
  if (output === '-') {
    out.write(text);
    return null;
  }
  return writeSeedFile(output, text);
}

export const dumpMembershipsSeedCommand: Command = {
  name: 'dump_memberships_seed',
  usage: 'dump_memberships_seed [--pretty] [-o PATH]',
  description: 'Export membership configuration to a seed JSON file.',
  async run(ctx, argv) {
    const { values } = parseCommandArgs(this.name, () =>
      parseArgs({
        args: argv,
        options: {
          pretty: { type: 'boolean', default: false },
          output: { type: 'string', short: 'o', default: 'seed_memberships.json' },
        },
      }),
    );

    const document = await ctx.deps.seeding.seedingService.exportMembershipsSeed();
    const written = await emit(ctx.out, values.output, serializeSeed(document, values.pretty));
    if (written) ctx.out.info(`Wrote seed to ${written}`);
  },
};

export const dumpPlayersSeedCommand: Command = {
  name: 'dump_players_seed',
  usage: 'dump_players_seed [--pretty] [-o PATH] [--only-players] [--limit N]',
  description: 'Export players (and their answers) to a seed JSON file.',
  async run(ctx, argv) {
    const { values } = parseCommandArgs(this.name, () =>
      parseArgs({
        args: argv,
        options: {
          pretty: { type: 'boolean', default: false },
          output: { type: 'string', short: 'o', default: 'seed_players.json' },
          'only-players': { type: 'boolean', default: false },
          limit: { type: 'string' },
        },
      }),
    );
    const limit = values.limit === undefined ? undefined : parsePositiveInt(this.name, 'limit', values.limit);

    const document = await ctx.deps.seeding.seedingService.exportPlayersSeed({
      onlyPlayers: values['only-players'],
      limit,
    });
    const written = await emit(ctx.out, values.output, serializeSeed(document, values.pretty));
    if (!written) return;

    const answers = document.answers ? ` and ${document.answers.length} answers` : '';
    ctx.out.info(`Wrote ${document.players.length} players${answers} -> ${written}`);
  },
};

export const seedMembershipsCommand: Command = {
  name: 'seed_memberships',
  usage: 'seed_memberships PATH [--dry-run] [--purge]',
  description: 'Idempotently import a memberships seed file.',
  async run(ctx, argv) {
    const { values, positionals } = parseCommandArgs(this.name, () =>
      parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
          'dry-run': { type: 'boolean', default: false },
          purge: { type: 'boolean', default: false },
        },
      }),
    );
    const path = requirePositional(this.name, positionals, 'PATH');

    const result = await ctx.deps.seeding.seedingService.importMembershipsSeed({
      path,
      dryRun: values['dry-run'],
      purge: values.purge,
    });
    for (const line of result.lines) ctx.out.info(line);
  },
};

export const seedPlayersCommand: Command = {
  name: 'seed_players',
  usage: 'seed_players PATH [--only-players] [--dry-run] [--purge]',
  description: 'Idempotently import a players seed file.',
  async run(ctx, argv) {
    const { values, positionals } = parseCommandArgs(this.name, () =>
      parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
          'only-players': { type: 'boolean', default: false },
          'dry-run': { type: 'boolean', default: false },
          purge: { type: 'boolean', default: false },
        },
      }),
    );
    const path = requirePositional(this.name, positionals, 'PATH');

    const result = await ctx.deps.seeding.seedingService.importPlayersSeed({
      path,
      onlyPlayers: values['only-players'],
      dryRun: values['dry-run'],
      purge: values.purge,
    });
    for (const line of result.lines) ctx.out.info(line);
  },
};
