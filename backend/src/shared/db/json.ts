/**
 * backend/src/shared/db/json.ts
 *
 * zod schemas for values stored in jsonb columns and read from third-party APIs.
 */

import { z } from 'zod';

import type { JsonObject, JsonValue } from './schema';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

/** Plain-object copy with functions/undefined dropped and Dates as ISO strings. */
export function toJsonObject(input: unknown): JsonObject {
  const parsed = jsonObjectSchema.safeParse(JSON.parse(JSON.stringify(input ?? {})));
  return parsed.success ? parsed.data : {};
}
