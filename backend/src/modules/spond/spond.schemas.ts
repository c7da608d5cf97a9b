/**
 * backend/src/modules/spond/spond.schemas.ts
 *
 * WHY:
 * - Request validation for the search-and-link endpoints.
 *
 * RULES:
 * - Ids are uuids; anything else is rejected before a query runs.
 */

import { z } from 'zod';

export const searchQuerySchema = z.object({
  q: z.string().optional().default(''),
});

export const playerParamsSchema = z.object({
  playerId: z.string().uuid(),
});

export const unlinkParamsSchema = playerParamsSchema.extend({
  linkId: z.string().uuid(),
});

export const linkBodySchema = z.object({
  spond_member_pk: z.string().trim().uuid(),
});
