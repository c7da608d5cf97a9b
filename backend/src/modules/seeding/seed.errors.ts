/**
 * backend/src/modules/seeding/seed.errors.ts
 *
 * WHY:
 * - Seed import/export failures are user-facing (printed by the CLI), so the
 *   messages name the file, entity and key the operator has to fix.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Everything raised before the first write is a validation error; the import
 *   transaction guarantees nothing is written when one is raised mid-run.
 */

import type { ZodIssue } from 'zod';

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

const MAX_REPORTED_ISSUES = 5;

function formatIssues(issues: ZodIssue[]): string {
  const shown = issues
    .slice(0, MAX_REPORTED_ISSUES)
    .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`);
  const rest = issues.length - shown.length;
  return rest > 0 ? `${shown.join('; ')} (and ${rest} more)` : shown.join('; ');
}

export const SeedErrors = {
  fileNotFound(path: string) {
    return AppError.validationError(`Seed file not found: ${path}`, { path });
  },

  invalidJson(path: string, reason: string) {
    return AppError.validationError(`Failed to parse JSON at ${path}: ${reason}`, { path });
  },

  invalidDocument(path: string, issues: ZodIssue[]) {
    return AppError.validationError(`Invalid seed document ${path}: ${formatIssues(issues)}`, {
      path,
      issueCount: issues.length,
    });
  },

  missingNaturalKey(entity: string, candidates: readonly string[], meta?: AppErrorMeta) {
    return AppError.validationError(
      `${entity} record has none of the key fields: ${candidates.join(', ')}`,
      { entity, ...meta },
    );
  },

  unknownReference(ref: string, key: string, entity: string, entityKey: string) {
    return AppError.validationError(`Unknown ${ref} '${key}' for ${entity} ${entityKey}`, {
      ref,
      key,
      entity,
      entityKey,
    });
  },

  membershipNumberTaken(membershipNumber: string, playerKey: string, ownerKey: string) {
    return AppError.validationError(
      `Membership number ${membershipNumber} for Player ${playerKey} already belongs to Player ${ownerKey}`,
      { membershipNumber, playerKey, ownerKey },
    );
  },

  invalidSeasonDates(season: string, start: string, end: string) {
    return AppError.validationError(`Season ${season} ends (${end}) before it starts (${start})`, {
      season,
    });
  },

  purgeBlocked(counts: Record<string, number>) {
    const blocking = Object.entries(counts)
      .filter(([, n]) => n > 0)
      .map(([table, n]) => `${table}=${n}`)
      .join(', ');
    return AppError.conflict(`Refusing to purge while dependent rows exist (${blocking})`, { counts });
  },

  writeFailed(path: string, reason: string) {
    return AppError.internal(`Failed to write ${path}: ${reason}`, { path });
  },
} as const;
