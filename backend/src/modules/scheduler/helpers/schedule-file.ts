/**
 * backend/src/modules/scheduler/helpers/schedule-file.ts
 *
 * Reads and validates the JSON schedule file. Paths are resolved against the
 * working directory.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { SchedulerErrors } from '../scheduler.errors';
import { scheduleFileSchema, type ScheduleFile } from '../schedule-file.schema';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export async function readScheduleFile(file: string): Promise<ScheduleFile> {
  const absolute = path.resolve(file);

  let text: string;
  try {
    text = await readFile(absolute, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) throw SchedulerErrors.scheduleFileNotFound(absolute);
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw SchedulerErrors.invalidScheduleFile(absolute, err instanceof Error ? err.message : String(err));
  }

  const parsed = scheduleFileSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const reason = first ? `${first.path.join('.')}: ${first.message}` : 'invalid document';
    throw SchedulerErrors.invalidScheduleFile(absolute, reason);
  }

  return parsed.data;
}
