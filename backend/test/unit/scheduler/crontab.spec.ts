import { formatCrontab, matchesCrontab, parseCrontab } from '../../../src/modules/scheduler/helpers/crontab';

// 2025-06-15 is a Sunday; 2025-06-16 a Monday.
const at = (iso: string) => new Date(iso);

describe('parseCrontab', () => {
  it('expands ranges, steps and lists', () => {
    const expr = parseCrontab('5/20 9-17/4 1,15 * *');
    expect([...expr.minute.values]).toEqual([5, 25, 45]);
    expect([...expr.hour.values]).toEqual([9, 13, 17]);
    expect([...expr.dayOfMonth.values]).toEqual([1, 15]);
    expect(expr.month.wildcard).toBe(true);
  });

  it('treats day-of-week 7 as Sunday', () => {
    const expr = parseCrontab('0 0 * * 7');
    expect([...expr.dayOfWeek.values]).toEqual([0]);
    expect(matchesCrontab(expr, at('2025-06-15T00:00:00Z'))).toBe(true);
  });

  it.each([
    ['* * *', "Invalid crontab '* * *': expected 5 fields, got 3"],
    ['60 * * * *', "Invalid crontab '60 * * * *': 60 is outside 0-59 in minute"],
    ['5-1 * * * *', "Invalid crontab '5-1 * * * *': '5-1' is a backwards range in minute"],
    ['*/0 * * * *', "Invalid crontab '*/0 * * * *': 0 is outside 1-59 in minute"],
    ['x * * * *', "Invalid crontab 'x * * * *': 'x' is not a number in minute"],
  ])('rejects %s', (source, message) => {
    expect(() => parseCrontab(source)).toThrow(message);
  });
});

describe('matchesCrontab', () => {
  const weekdayQuarterHours = parseCrontab('*/15 9-17 * * 1-5');

  it('matches minute, hour and weekday in UTC', () => {
    expect(matchesCrontab(weekdayQuarterHours, at('2025-06-16T09:30:00Z'))).toBe(true);
    expect(matchesCrontab(weekdayQuarterHours, at('2025-06-16T09:31:00Z'))).toBe(false);
    expect(matchesCrontab(weekdayQuarterHours, at('2025-06-16T18:00:00Z'))).toBe(false);
    expect(matchesCrontab(weekdayQuarterHours, at('2025-06-15T09:30:00Z'))).toBe(false);
  });

  it('matches either day field when both are restricted', () => {
    const expr = parseCrontab('0 0 1 * 1');
    expect(matchesCrontab(expr, at('2025-06-16T00:00:00Z'))).toBe(true);
    expect(matchesCrontab(expr, at('2025-06-01T00:00:00Z'))).toBe(true);
    expect(matchesCrontab(expr, at('2025-06-17T00:00:00Z'))).toBe(false);
  });
});

describe('formatCrontab', () => {
  it('joins schedule-file fields in cron order', () => {
    expect(
      formatCrontab({ minute: '0', hour: '7', day_of_month: '*', month_of_year: '*', day_of_week: '1' }),
    ).toBe('0 7 * * 1');
  });
});
