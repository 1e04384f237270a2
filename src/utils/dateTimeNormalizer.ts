/**
 * Turns a row's date header and time text into an absolute timestamp.
 *
 * The calendar shows a day header once and leaves it blank on following rows of
 * the same day; the time cell is likewise shown once per group of simultaneous
 * events. Both are carried forward through an immutable PageContext that the
 * caller threads from row to row. Wall-clock values are read in the source
 * timezone (the zone the calendar session renders in) and formatted in the
 * target timezone with its exact offset.
 */
import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import customParseFormat from 'dayjs/plugin/customParseFormat';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';
import { isExists } from 'date-fns';
import type { CalendarDay, RawRow, TimeOfDay } from '../types/calendar';
import type { DataIssue } from '../types/DataQuality';
import { InvalidTimezoneError } from '../types/errors';
import { dayKey, monthFromName } from './calendarDay';

dayjs.extend(utc);
dayjs.extend(customParseFormat);

/** "All Day" and "Day N" events are pinned to the last second of the day. */
export const ALL_DAY_TIME: TimeOfDay = { hour: 23, minute: 59, second: 59 };
export const TENTATIVE_TIME: TimeOfDay = { hour: 0, minute: 0, second: 0 };
/** "No Data" rows. */
export const NO_DATA_TIME: TimeOfDay = { hour: 0, minute: 0, second: 1 };
/** Used when the time is unreadable or there is nothing to carry forward. */
export const DEFAULT_TIME: TimeOfDay = { hour: 0, minute: 0, second: 0 };

export const OUTPUT_FORMAT = "yyyy-MM-dd'T'HH:mm:ssxxx";
const WALL_CLOCK_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";

const CLOCK_FORMATS = ['h:mma', 'hh:mma', 'H:mm', 'HH:mm'];

const HEADER_PATTERN =
  /(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*\.?\s*(\d{1,2})(?!\d)(?:,?\s+(\d{4}))?/i;

export interface PageContext {
  /** Year and month the page was requested for; drives year inference. */
  readonly anchor: { readonly year: number; readonly month: number };
  readonly activeDate?: CalendarDay;
  readonly lastTime?: TimeOfDay;
}

export interface NormalizeOptions {
  sourceTimezone: string;
  targetTimezone: string;
}

export type TimeReading =
  | { kind: 'clock'; time: TimeOfDay }
  | { kind: 'allDay' }
  | { kind: 'tentative' }
  | { kind: 'noData' }
  | { kind: 'blank' }
  | { kind: 'unknown'; raw: string };

export type NormalizeResult =
  | {
      ok: true;
      context: PageContext;
      day: CalendarDay;
      instant: Date;
      datetime: string;
      issue?: DataIssue;
    }
  | { ok: false; context: PageContext; issue: DataIssue };

export function createPageContext(anchor: CalendarDay): PageContext {
  return { anchor: { year: anchor.year, month: anchor.month } };
}

export function isValidTimezone(timezone: string): boolean {
  if (!timezone.trim()) return false;
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

export function assertTimezone(timezone: string): void {
  if (!isValidTimezone(timezone)) {
    throw new InvalidTimezoneError(timezone);
  }
}

/**
 * Parse a day header such as "SunJan 5", "Sun Jan 5" or "Jan 5, 2025".
 * Without a year, the year closest to the anchor month is used, so a January
 * header on a December page lands in the following year.
 */
export function parseDateHeader(text: string, anchor: PageContext['anchor']): CalendarDay | undefined {
  const match = text.replace(/\s+/g, ' ').trim().match(HEADER_PATTERN);
  if (!match) return undefined;

  const month = monthFromName(match[1]);
  if (month === undefined) return undefined;
  const day = parseInt(match[2], 10);

  let year: number;
  if (match[3]) {
    year = parseInt(match[3], 10);
  } else {
    const diff = month - anchor.month;
    year = diff < -6 ? anchor.year + 1 : diff > 6 ? anchor.year - 1 : anchor.year;
  }

  if (!isExists(year, month - 1, day)) return undefined;
  return { year, month, day };
}

export function parseTimeText(text: string): TimeReading {
  const t = text.trim().toLowerCase();
  if (!t) return { kind: 'blank' };
  if (t === 'all day' || /^day \d+$/.test(t)) return { kind: 'allDay' };
  if (t === 'tentative') return { kind: 'tentative' };
  if (t.includes('data')) return { kind: 'noData' };

  const compact = t.replace(/\s+/g, '');
  for (const fmt of CLOCK_FORMATS) {
    // Strict parse in UTC so the process timezone's DST gaps cannot move the hour.
    const parsed = dayjs.utc(compact, fmt, true);
    if (parsed.isValid()) {
      return { kind: 'clock', time: { hour: parsed.hour(), minute: parsed.minute(), second: 0 } };
    }
  }
  return { kind: 'unknown', raw: text.trim() };
}

export function wallClock(day: CalendarDay, time: TimeOfDay): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${dayKey(day)}T${pad(time.hour)}:${pad(time.minute)}:${pad(time.second)}`;
}

/** Instant for a wall-clock "yyyy-MM-ddTHH:mm:ss" read in the given zone. */
export function fromZonedWallClock(wall: string, timezone: string): Date {
  return fromZonedTime(wall, timezone);
}

/** Wall-clock "yyyy-MM-ddTHH:mm:ss" of an instant in the given zone. */
export function toZonedWallClock(instant: Date, timezone: string): string {
  return formatInTimeZone(instant, timezone, WALL_CLOCK_FORMAT);
}

export function formatInTarget(instant: Date, timezone: string): string {
  return formatInTimeZone(instant, timezone, OUTPUT_FORMAT);
}

/**
 * Resolve one row against the page context. Never mutates `context`; the
 * returned context is what the next row must see.
 */
export function normalizeRow(row: RawRow, context: PageContext, options: NormalizeOptions): NormalizeResult {
  let next: PageContext = context;
  let day: CalendarDay;

  if (row.dateHeader.trim()) {
    const parsed = parseDateHeader(row.dateHeader, context.anchor);
    if (!parsed) {
      return {
        ok: false,
        context,
        issue: {
          type: 'PARSE_WARNING',
          message: `Unreadable date header "${row.dateHeader.trim()}" for "${row.event}"`,
          details: { dateHeader: row.dateHeader },
        },
      };
    }
    day = parsed;
    next = { anchor: context.anchor, activeDate: parsed };
  } else if (context.activeDate) {
    day = context.activeDate;
  } else {
    return {
      ok: false,
      context,
      issue: {
        type: 'PARSE_WARNING',
        message: `No date header before "${row.event}"`,
      },
    };
  }

  let time: TimeOfDay = DEFAULT_TIME;
  let issue: DataIssue | undefined;
  const reading = parseTimeText(row.time);

  switch (reading.kind) {
    case 'clock':
      time = reading.time;
      next = { ...next, lastTime: time };
      break;
    case 'allDay':
      time = ALL_DAY_TIME;
      next = { ...next, lastTime: time };
      break;
    case 'tentative':
      time = TENTATIVE_TIME;
      next = { ...next, lastTime: time };
      break;
    case 'noData':
      time = NO_DATA_TIME;
      next = { ...next, lastTime: time };
      break;
    case 'blank':
      if (next.lastTime) {
        time = next.lastTime;
      } else {
        issue = {
          type: 'TIME_PARSE_FALLBACK',
          message: `No time to carry forward for "${row.event}" on ${dayKey(day)}`,
        };
      }
      break;
    case 'unknown':
      issue = {
        type: 'TIME_PARSE_FALLBACK',
        message: `Unrecognized time "${reading.raw}" for "${row.event}" on ${dayKey(day)}`,
        details: { time: reading.raw },
      };
      // Rows below an unreadable time share it; they must not inherit an older one.
      next = { ...next, lastTime: undefined };
      break;
  }

  const instant = fromZonedWallClock(wallClock(day, time), options.sourceTimezone);
  return {
    ok: true,
    context: next,
    day,
    instant,
    datetime: formatInTarget(instant, options.targetTimezone),
    issue,
  };
}

/** Offset of the zone at midday of the given day, as "+hh:mm". */
export function zoneOffset(timezone: string, day: CalendarDay): string {
  const instant = fromZonedWallClock(wallClock(day, { hour: 12, minute: 0, second: 0 }), timezone);
  return formatInTimeZone(instant, timezone, 'xxx');
}

function offsetMinutes(offset: string): number {
  const match = offset.match(/^([+-])(\d{2}):(\d{2})$/);
  if (!match) return NaN;
  const minutes = parseInt(match[2], 10) * 60 + parseInt(match[3], 10);
  return match[1] === '-' ? -minutes : minutes;
}

/** Non-DST offset of the zone in that year: the smaller of its January and July offsets. */
export function standardOffset(timezone: string, year: number): string {
  const january = zoneOffset(timezone, { year, month: 1, day: 1 });
  const july = zoneOffset(timezone, { year, month: 7, day: 1 });
  return offsetMinutes(january) <= offsetMinutes(july) ? january : july;
}

/**
 * Compare the offset a calendar session displays with the configured source
 * timezone on a given day. The calendar's timezone page lists a zone's base
 * offset, so either the day's offset or the standard offset is accepted.
 * Returns a mismatch message, or undefined when they agree.
 */
export function checkSessionOffset(sessionOffset: string, sourceTimezone: string, day: CalendarDay): string | undefined {
  const expected = zoneOffset(sourceTimezone, day);
  if (sessionOffset === expected || sessionOffset === standardOffset(sourceTimezone, day.year)) {
    return undefined;
  }
  return `Calendar session shows GMT${sessionOffset} but ${sourceTimezone} is GMT${expected} on ${dayKey(day)}`;
}
