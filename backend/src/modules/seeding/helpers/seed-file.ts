/**
 * backend/src/modules/seeding/helpers/seed-file.ts
 *
 * WHY:
 * - A missing or malformed file must fail before the import opens a transaction.
 *
 * RULES:
 * - Paths are resolved against the working directory, like the CLI's other arguments.
 * - Output ends with a newline; `pretty` indents by 2 spaces.
 */

import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { z } from 'zod';

import { SeedErrors } from '../seed.errors';

function errorCode(err: unknown): string | null {
  if (typeof err !== 'object' || err === null) return null;
  const code = Reflect.get(err, 'code');
  return typeof code === 'string' ? code : null;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function readSeedFile<S extends z.ZodTypeAny>(file: string, schema: S): Promise<z.infer<S>> {
  const absolute = path.resolve(file);

  let text: string;
  try {
    text = await readFile(absolute, 'utf8');
  } catch (err) {
    if (errorCode(err) === 'ENOENT') throw SeedErrors.fileNotFound(absolute);
    throw SeedErrors.invalidJson(absolute, errorMessage(err));
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw SeedErrors.invalidJson(absolute, errorMessage(err));
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) throw SeedErrors.invalidDocument(absolute, parsed.error.issues);
  return parsed.data;
}

export function serializeSeed(document: unknown, pretty: boolean): string {
  return `${JSON.stringify(document, null, pretty ? 2 : undefined)}\n`;
}

/** Writes the serialized document and returns the absolute path written. */
export async function writeSeedFile(file: string, text: string): Promise<string> {
  const absolute = path.resolve(file);
  try {
    await writeFile(absolute, text, 'utf8');
  } catch (err) {
    throw SeedErrors.writeFailed(absolute, errorMessage(err));
  }
  return absolute;
}
