import { eachDayOfInterval, format, getDaysInMonth, isExists } from 'date-fns';
import type { CalendarDay } from '../types/calendar';
import { InvalidDateError } from '../types/errors';

// The calendar archive starts in 2007; anything past 2100 is treated as garbage input.
export const MIN_SUPPORTED_YEAR = 2007;
export const MAX_SUPPORTED_YEAR = 2100;

const MONTH_ABBR = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

/**
 * Parse "yyyy-MM-dd" into a CalendarDay.
 * Throws InvalidDateError for malformed, impossible or out-of-range dates.
 */
export function parseCalendarDay(input: string): CalendarDay {
  const match = input.trim().match(/^(\d{4})-(\d{1,2})-(\d{1,2})$/);
  if (!match) {
    throw new InvalidDateError(`Invalid date "${input}", expected yyyy-MM-dd`);
  }
  const day: CalendarDay = {
    year: parseInt(match[1], 10),
    month: parseInt(match[2], 10),
    day: parseInt(match[3], 10),
  };
  assertSupportedDay(day);
  return day;
}

export function assertSupportedDay(day: CalendarDay): void {
  if (!isExists(day.year, day.month - 1, day.day)) {
    throw new InvalidDateError(`Date ${dayKey(day)} does not exist`);
  }
  if (day.year < MIN_SUPPORTED_YEAR || day.year > MAX_SUPPORTED_YEAR) {
    throw new InvalidDateError(
      `Date ${dayKey(day)} is outside the supported range ${MIN_SUPPORTED_YEAR}-${MAX_SUPPORTED_YEAR}`
    );
  }
}

export function dayKey(day: CalendarDay): string {
  return `${String(day.year).padStart(4, '0')}-${String(day.month).padStart(2, '0')}-${String(day.day).padStart(2, '0')}`;
}

export function compareDays(a: CalendarDay, b: CalendarDay): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

export function monthAbbr(month: number): string {
  const abbr = MONTH_ABBR[month - 1];
  if (!abbr) {
    throw new InvalidDateError(`Invalid month ${month}`);
  }
  return abbr;
}

/** Month number (1-12) for an English month name or abbreviation, or undefined. */
export function monthFromName(name: string): number | undefined {
  const index = MONTH_ABBR.indexOf(name.slice(0, 3).toLowerCase());
  return index === -1 ? undefined : index + 1;
}

export function lastDayOfMonth(year: number, month: number): number {
  return getDaysInMonth(new Date(year, month - 1, 1));
}

// Local-time Date at noon so DST transitions never move the calendar day.
function toLocalDate(day: CalendarDay): Date {
  return new Date(day.year, day.month - 1, day.day, 12);
}

function fromLocalDate(date: Date): CalendarDay {
  return { year: date.getFullYear(), month: date.getMonth() + 1, day: date.getDate() };
}

/** Every day in [start, end], inclusive and in order. */
export function eachDay(start: CalendarDay, end: CalendarDay): CalendarDay[] {
  if (compareDays(start, end) > 0) return [];
  return eachDayOfInterval({ start: toLocalDate(start), end: toLocalDate(end) }).map(fromLocalDate);
}

export function formatDayLabel(day: CalendarDay): string {
  return format(toLocalDate(day), 'EEE MMM d, yyyy');
}
