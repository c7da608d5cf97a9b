/**
 * backend/src/commands/index.ts
 *
 * Registry of CLI commands, in the order `manage` lists them.
 */

import { cloneSeasonCommand } from './clone-season.command';
import type { Command } from './command.types';
import { backfillMembershipNumbersCommand } from './members.commands';
import { periodicTasksCommand, runSchedulerCommand, syncScheduleCommand } from './scheduler.commands';
import {
  dumpMembershipsSeedCommand,
  dumpPlayersSeedCommand,
  seedMembershipsCommand,
  seedPlayersCommand,
} from './seed.commands';
import { spondSyncCommand } from './spond.commands';
import { sendTaskDigestCommand } from './tasks.commands';

export const COMMANDS: readonly Command[] = [
  dumpMembershipsSeedCommand,
  seedMembershipsCommand,
  dumpPlayersSeedCommand,
  seedPlayersCommand,
  cloneSeasonCommand,
  backfillMembershipNumbersCommand,
  sendTaskDigestCommand,
  spondSyncCommand,
  syncScheduleCommand,
  periodicTasksCommand,
  runSchedulerCommand,
];

export function findCommand(name: string): Command | null {
  return COMMANDS.find((command) => command.name === name) ?? null;
}
