/**
 * Month-key and calendar-date utilities.
 * Month keys are "YYYY-MM"; dates are "YYYY-MM-DD". All arithmetic is done on UTC midnight
 * so results never depend on the host timezone.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

/** "YYYY-MM". Lexicographic order is chronological order. */
export type MonthKey = string;

/** "YYYY-MM-DD". */
export type IsoDate = string;

/** Date-only "YYYY-MM-DD" for a date (UTC calendar). */
export function toIsoDate(date: Date): IsoDate {
  return date.toISOString().slice(0, 10);
}

export function monthKeyFromParts(year: number, month: number): MonthKey {
  return `${year}-${String(month).padStart(2, '0')}`;
}

export function monthKeyParts(monthKey: MonthKey): { year: number; month: number } {
  const [y, m] = monthKey.trim().split('-').map(Number);
  return { year: y, month: m };
}

export function compareMonthKeys(a: MonthKey, b: MonthKey): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function getDaysInMonth(monthKey: MonthKey): number {
  const { year, month } = monthKeyParts(monthKey);
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/** First calendar day of the month as YYYY-MM-DD. */
export function getMonthStartDate(monthKey: MonthKey): IsoDate {
  return `${monthKey.trim()}-01`;
}

/** Last calendar day of the month as YYYY-MM-DD. This is the snapshot date of a month. */
export function getMonthEndDate(monthKey: MonthKey): IsoDate {
  const days = String(getDaysInMonth(monthKey)).padStart(2, '0');
  return `${monthKey.trim()}-${days}`;
}

export function isDateInMonth(date: IsoDate, monthKey: MonthKey): boolean {
  return date.slice(0, 7) === monthKey.trim();
}

/** Whole days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  const a = Date.parse(from + 'T00:00:00Z');
  const b = Date.parse(to + 'T00:00:00Z');
  return Math.round((b - a) / DAY_MS);
}

/**
 * Count of working days in the month. workWeekDays uses getUTCDay numbering (0=Sun .. 6=Sat).
 */
export function getBusinessDaysInMonth(monthKey: MonthKey, workWeekDays: readonly number[]): number {
  const { year, month } = monthKeyParts(monthKey);
  const days = getDaysInMonth(monthKey);
  let count = 0;
  for (let day = 1; day <= days; day++) {
    if (workWeekDays.includes(new Date(Date.UTC(year, month - 1, day)).getUTCDay())) count++;
  }
  return count;
}
