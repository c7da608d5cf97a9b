/**
 * backend/src/modules/scheduler/schedule-file.schema.ts
 *
 * WHY:
 * - Validates config/schedule.json before sync_schedule touches the database.
 *
 * FORMAT:
 * - { "<name>": { task, type, every, period, minute, hour, day_of_month,
 *   month_of_year, day_of_week, clocked_at, one_off, kwargs, enabled } }
 * - `type` defaults to interval (every 60 seconds). Crontab fields default to `*`.
 * - Clocked entries always run once.
 */

import { z } from 'zod';

import type { JsonValue } from '../../shared/db/schema';

const cronPart = z.union([z.string().trim().min(1), z.number().int().nonnegative()]).transform(String).default('*');

const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValue), z.record(jsonValue)]),
);

export const scheduleEntrySchema = z.object({
  task: z.string().trim().min(1),
  type: z.enum(['interval', 'crontab', 'clocked']).default('interval'),
  every: z.number().int().positive().default(60),
  period: z.enum(['seconds', 'minutes', 'hours', 'days']).default('seconds'),
  minute: cronPart,
  hour: cronPart,
  day_of_month: cronPart,
  month_of_year: cronPart,
  day_of_week: cronPart,
  clocked_at: z.string().datetime({ offset: true }).optional(),
  one_off: z.boolean().default(false),
  kwargs: z.record(jsonValue).default({}),
  enabled: z.boolean().default(true),
});

export const scheduleFileSchema = z.record(z.string().trim().min(1), scheduleEntrySchema);

export type ScheduleEntry = z.infer<typeof scheduleEntrySchema>;
export type ScheduleFile = z.infer<typeof scheduleFileSchema>;
