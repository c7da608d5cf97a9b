/**
 * backend/src/modules/spond/spond.errors.ts
 *
 * WHY:
 * - Spond module owns its domain semantics.
 * - Messages are what the link widget and staff see; keep them short.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const SpondErrors = {
  invalidPlayer(meta?: AppErrorMeta) {
    return AppError.validationError('Invalid player', meta);
  },

  invalidMember(meta?: AppErrorMeta) {
    return AppError.validationError('Invalid Spond member', meta);
  },

  invalidLink(meta?: AppErrorMeta) {
    return AppError.validationError('Invalid link', meta);
  },
} as const;
