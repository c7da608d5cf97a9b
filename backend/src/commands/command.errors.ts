/**
 * backend/src/commands/command.errors.ts
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Messages are printed as-is by manage.ts, so they read as CLI errors.
 */

import { AppError } from '../shared/http/errors';

export const CommandErrors = {
  unknownCommand(name: string) {
    return AppError.validationError(`Unknown command '${name}'. Run with no arguments to list commands.`, { name });
  },

  invalidArguments(command: string, reason: string) {
    return AppError.validationError(`${command}: ${reason}`, { command });
  },

  missingArgument(command: string, argument: string) {
    return AppError.validationError(`${command}: ${argument} is required`, { command, argument });
  },
} as const;
