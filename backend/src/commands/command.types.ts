/**
 * backend/src/commands/command.types.ts
 *
 * WHY:
 * - Commands are plain objects so manage.ts can list and dispatch them and tests can
 *   run them without a process.
 *
 * RULES:
 * - Commands never touch process.stdout / process.exit: they print through `out`.
 * - A failed command throws (AppError for expected failures); manage.ts sets the exit code.
 */

import type { AppConfig } from '../app/config';
import type { AppDeps } from '../app/di';

export type CommandOutput = {
  /** One line of human-readable output (stdout). */
  info(line: string): void;
  /** Raw text (stdout), e.g. a seed document written to `-o -`. */
  write(text: string): void;
};

export type CommandContext = {
  config: AppConfig;
  deps: AppDeps;
  out: CommandOutput;
  /** Resolves when the process is asked to stop (SIGINT / SIGTERM). */
  untilShutdown: () => Promise<void>;
};

export type Command = {
  name: string;
  usage: string;
  description: string;
  run(ctx: CommandContext, argv: string[]): Promise<void>;
};
