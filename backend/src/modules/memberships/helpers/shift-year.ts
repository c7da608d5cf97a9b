/**
 * backend/src/modules/memberships/helpers/shift-year.ts
 *
 * Moves a YYYY-MM-DD date one year forward. 29 February becomes 28 February when
 * the next year is not a leap year.
 */

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function shiftYear(date: string): string {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(date);
  if (!match) throw new Error(`Expected a YYYY-MM-DD date, got '${date}'`);

  const [, y, m, d] = match;
  const year = Number(y) + 1;
  const day = m === '02' && d === '29' && !isLeapYear(year) ? '28' : d;

  return `${String(year).padStart(4, '0')}-${m}-${day}`;
}
