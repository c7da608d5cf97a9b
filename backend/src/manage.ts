/**
 * backend/src/manage.ts
 *
 * WHY:
 * - One CLI entrypoint for every operational command: `npm run manage -- <command> [args]`.
 *
 * RULES:
 * - AppError -> "Error: <message>" on stderr, exit code 1.
 * - Anything else is logged with its stack, exit code 1.
 * - Deps are always closed, so the process exits on its own.
 */

import { buildConfig } from './app/config';
import { buildDeps } from './app/di';
import { COMMANDS, findCommand } from './commands';
import { CommandErrors } from './commands/command.errors';
import type { CommandOutput } from './commands/command.types';
import { AppError } from './shared/http/errors';
import { logger } from './shared/logger/logger';

const stdout: CommandOutput = {
  info: (line) => {
    process.stdout.write(`${line}\n`);
  },
  write: (text) => {
    process.stdout.write(text);
  },
};

function printUsage(): void {
  stdout.info('Usage: manage <command> [options]');
  stdout.info('');
  for (const command of COMMANDS) {
    stdout.info(`  ${command.usage}`);
    stdout.info(`      ${command.description}`);
  }
}

function untilShutdown(): Promise<void> {
  return new Promise((resolve) => {
    const stop = (signal: string) => {
      logger.info('manage.shutdown', { signal });
      resolve();
    };
    process.once('SIGINT', () => stop('SIGINT'));
    process.once('SIGTERM', () => stop('SIGTERM'));
  });
}

async function main(argv: string[]): Promise<number> {
  const [name, ...args] = argv;
  if (!name || name === 'help' || name === '--help') {
    printUsage();
    return 0;
  }

  const command = findCommand(name);
  if (!command) throw CommandErrors.unknownCommand(name);

  const config = buildConfig();
  const deps = await buildDeps(config);

  try {
    await command.run({ config, deps, out: stdout, untilShutdown }, args);
    return 0;
  } finally {
    await deps.close();
  }
}

void main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof AppError) {
      process.stderr.write(`Error: ${err.message}\n`);
    } else {
      logger.error('manage.failed', { err });
    }
    process.exitCode = 1;
  });
