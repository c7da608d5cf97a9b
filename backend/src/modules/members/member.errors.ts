/**
 * backend/src/modules/members/member.errors.ts
 *
 * RULES:
 * - Use AppError as the transport primitive.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const MemberErrors = {
  invalidDigits(digits: number, meta?: AppErrorMeta) {
    return AppError.validationError(`--digits must be a whole number between 1 and 12 (got ${digits})`, {
      digits,
      ...meta,
    });
  },
} as const;
