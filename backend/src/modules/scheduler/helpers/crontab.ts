/**
 * backend/src/modules/scheduler/helpers/crontab.ts
 *
 * Five-field crontab expressions ("minute hour day-of-month month day-of-week"),
 * evaluated in UTC.
 *
 * Supported per field: `*`, a step over `*` (every n), `a`, `a-b`, `a-b/n`, `a/n`
 * and comma lists.
 * Day-of-week takes 0-7; 0 and 7 are both Sunday.
 * When day-of-month and day-of-week are both restricted, a date matching either
 * one matches (classic cron rule).
 */

import { SchedulerErrors } from '../scheduler.errors';

export type CronField = {
  /** The field text started with `*`. */
  wildcard: boolean;
  values: ReadonlySet<number>;
};

export type CronExpression = {
  source: string;
  minute: CronField;
  hour: CronField;
  dayOfMonth: CronField;
  month: CronField;
  dayOfWeek: CronField;
};

type FieldRange = { name: string; min: number; max: number };

const FIELDS: readonly FieldRange[] = [
  { name: 'minute', min: 0, max: 59 },
  { name: 'hour', min: 0, max: 23 },
  { name: 'day-of-month', min: 1, max: 31 },
  { name: 'month', min: 1, max: 12 },
  { name: 'day-of-week', min: 0, max: 7 },
];

function parseNumber(text: string, range: FieldRange, source: string): number {
  if (!/^\d+$/.test(text)) {
    throw SchedulerErrors.invalidCrontab(source, `'${text}' is not a number in ${range.name}`);
  }
  const value = Number(text);
  if (value < range.min || value > range.max) {
    throw SchedulerErrors.invalidCrontab(
      source,
      `${value} is outside ${range.min}-${range.max} in ${range.name}`,
    );
  }
  return value;
}

function parseField(text: string, range: FieldRange, source: string): CronField {
  const values = new Set<number>();

  for (const part of text.split(',')) {
    const [base = '', stepText, extra] = part.split('/');
    if (extra !== undefined || base === '') {
      throw SchedulerErrors.invalidCrontab(source, `'${part}' is malformed in ${range.name}`);
    }

    const step = stepText === undefined ? 1 : parseNumber(stepText, { ...range, min: 1 }, source);

    let start: number;
    let end: number;
    if (base === '*') {
      start = range.min;
      end = range.max;
    } else if (base.includes('-')) {
      const [lo = '', hi = ''] = base.split('-');
      start = parseNumber(lo, range, source);
      end = parseNumber(hi, range, source);
      if (end < start) throw SchedulerErrors.invalidCrontab(source, `'${base}' is a backwards range in ${range.name}`);
    } else {
      start = parseNumber(base, range, source);
      // `a/n` runs from a to the end of the range.
      end = stepText === undefined ? start : range.max;
    }

    for (let v = start; v <= end; v += step) values.add(v);
  }

  return { wildcard: text.startsWith('*'), values };
}

export function parseCrontab(source: string): CronExpression {
  const parts = source.trim().split(/\s+/);
  if (parts.length !== FIELDS.length) {
    throw SchedulerErrors.invalidCrontab(source, `expected ${FIELDS.length} fields, got ${parts.length}`);
  }

  const [minute, hour, dayOfMonth, month, dayOfWeek] = FIELDS.map((range, i) =>
    parseField(parts[i] ?? '', range, source),
  );
  if (!minute || !hour || !dayOfMonth || !month || !dayOfWeek) {
    throw SchedulerErrors.invalidCrontab(source, 'missing field');
  }

  if (dayOfWeek.values.has(7)) {
    const normalized = new Set(dayOfWeek.values);
    normalized.delete(7);
    normalized.add(0);
    return { source, minute, hour, dayOfMonth, month, dayOfWeek: { ...dayOfWeek, values: normalized } };
  }

  return { source, minute, hour, dayOfMonth, month, dayOfWeek };
}

export function matchesCrontab(expr: CronExpression, at: Date): boolean {
  if (!expr.minute.values.has(at.getUTCMinutes())) return false;
  if (!expr.hour.values.has(at.getUTCHours())) return false;
  if (!expr.month.values.has(at.getUTCMonth() + 1)) return false;

  const domMatch = expr.dayOfMonth.values.has(at.getUTCDate());
  const dowMatch = expr.dayOfWeek.values.has(at.getUTCDay());

  if (!expr.dayOfMonth.wildcard && !expr.dayOfWeek.wildcard) return domMatch || dowMatch;
  return domMatch && dowMatch;
}

/** Joins the schedule-file fields into the stored five-field expression. */
export function formatCrontab(fields: {
  minute: string;
  hour: string;
  day_of_month: string;
  month_of_year: string;
  day_of_week: string;
}): string {
  return [fields.minute, fields.hour, fields.day_of_month, fields.month_of_year, fields.day_of_week].join(' ');
}
