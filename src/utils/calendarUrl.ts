/**
 * Builds ForexFactory calendar addresses and plans which pages cover a date range.
 * Pure functions: the same input always yields the same address.
 */
import type { CalendarDay, PageRequest, PageUnit } from '../types/calendar';
import { InvalidDateError } from '../types/errors';
import {
  assertSupportedDay,
  compareDays,
  dayKey,
  eachDay,
  lastDayOfMonth,
  monthAbbr,
} from './calendarDay';

export const CALENDAR_BASE_URL = 'https://www.forexfactory.com/calendar';

/** jan5.2025 */
export function formatCalendarDate(day: CalendarDay): string {
  assertSupportedDay(day);
  return `${monthAbbr(day.month)}${day.day}.${day.year}`;
}

export function buildDayUrl(day: CalendarDay): string {
  return `${CALENDAR_BASE_URL}?day=${formatCalendarDate(day)}`;
}

export function buildMonthUrl(year: number, month: number): string {
  assertSupportedDay({ year, month, day: 1 });
  return `${CALENDAR_BASE_URL}?month=${monthAbbr(month)}.${year}`;
}

/** ?range=dec20.2024-dec30.2024 */
export function buildRangeUrl(start: CalendarDay, end: CalendarDay): string {
  if (compareDays(start, end) > 0) {
    throw new InvalidDateError(`Range start ${dayKey(start)} is after end ${dayKey(end)}`);
  }
  return `${CALENDAR_BASE_URL}?range=${formatCalendarDate(start)}-${formatCalendarDate(end)}`;
}

/**
 * Pages covering [start, end] inclusive, in range order, each address once.
 * 'day' visits one page per date; 'month' visits whole months via ?month= and
 * the partial months at either end via ?range=.
 */
export function planPages(start: CalendarDay, end: CalendarDay, unit: PageUnit): PageRequest[] {
  assertSupportedDay(start);
  assertSupportedDay(end);
  if (compareDays(start, end) > 0) {
    throw new InvalidDateError(`Range start ${dayKey(start)} is after end ${dayKey(end)}`);
  }

  if (unit === 'day') {
    return eachDay(start, end).map((day) => ({
      url: buildDayUrl(day),
      unit: 'day',
      start: day,
      end: day,
      dates: [dayKey(day)],
    }));
  }

  const pages: PageRequest[] = [];
  let year = start.year;
  let month = start.month;
  while (year < end.year || (year === end.year && month <= end.month)) {
    const monthLast = lastDayOfMonth(year, month);
    const first: CalendarDay = { year, month, day: 1 };
    const last: CalendarDay = { year, month, day: monthLast };
    const pageStart = compareDays(start, first) > 0 ? start : first;
    const pageEnd = compareDays(end, last) < 0 ? end : last;
    const fullMonth = pageStart.day === 1 && pageEnd.day === monthLast;

    pages.push({
      url: fullMonth ? buildMonthUrl(year, month) : buildRangeUrl(pageStart, pageEnd),
      unit: fullMonth ? 'month' : 'range',
      start: pageStart,
      end: pageEnd,
      dates: eachDay(pageStart, pageEnd).map(dayKey),
    });

    month++;
    if (month > 12) {
      month = 1;
      year++;
    }
  }
  return pages;
}
