/**
 * backend/src/commands/parse-args.ts
 *
 * Thin helpers around node:util parseArgs so argument errors surface as AppErrors
 * (exit code 1 with a one-line message) instead of stack traces.
 */

import { z } from 'zod';

import { CommandErrors } from './command.errors';

export function parseCommandArgs<T>(command: string, parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    throw CommandErrors.invalidArguments(command, err instanceof Error ? err.message : String(err));
  }
}

const positiveIntSchema = z.coerce.number().int().positive();

export function parsePositiveInt(command: string, option: string, raw: string): number {
  const parsed = positiveIntSchema.safeParse(raw);
  if (!parsed.success) throw CommandErrors.invalidArguments(command, `--${option} must be a positive integer`);
  return parsed.data;
}

export function requirePositional(command: string, positionals: string[], argument: string): string {
  const value = positionals[0];
  if (!value) throw CommandErrors.missingArgument(command, argument);
  if (positionals.length > 1) {
    throw CommandErrors.invalidArguments(command, `unexpected argument '${positionals[1]}'`);
  }
  return value;
}
