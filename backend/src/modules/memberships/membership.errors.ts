/**
 * backend/src/modules/memberships/membership.errors.ts
 *
 * WHY:
 * - Memberships module owns its domain semantics.
 * - Prevents shared/http/errors.ts from becoming a giant god-file.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const MembershipErrors = {
  sourceSeasonNotFound(name: string, meta?: AppErrorMeta) {
    return AppError.notFound(`Source season '${name}' not found.`, { season: name, ...meta });
  },

  targetSeasonNotFound(name: string, meta?: AppErrorMeta) {
    return AppError.notFound(`Target season '${name}' not found. Create it first or pass --create-target.`, {
      season: name,
      ...meta,
    });
  },

  sameSeason(name: string) {
    return AppError.validationError(`Source and target season are both '${name}'.`, { season: name });
  },
} as const;
