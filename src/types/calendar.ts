/**
 * Shared calendar types used by the row parser, normalizer, range service and CSV export.
 */
import type { PageNode } from '../utils/pageTree';

export type Impact = 'High' | 'Medium' | 'Low' | 'Holiday' | 'Unknown';

export type PageUnit = 'day' | 'month';

/** Plain calendar day, no time and no zone. month is 1-12. */
export interface CalendarDay {
  year: number;
  month: number;
  day: number;
}

export interface TimeOfDay {
  hour: number;
  minute: number;
  second: number;
}

export type DetailRef =
  | { state: 'collapsed'; eventId: string }
  | { state: 'expanded'; eventId: string; panel: PageNode };

/** One event row as it appears on the page, before date/time resolution. */
export interface RawRow {
  dateHeader: string;
  time: string;
  currency: string;
  impact: Impact;
  event: string;
  actual: string;
  forecast: string;
  previous: string;
  detail?: DetailRef;
}

export interface EventRecord {
  readonly datetime: string;
  readonly instant: Date;
  readonly currency: string;
  readonly impact: Impact;
  readonly event: string;
  readonly actual: string;
  readonly forecast: string;
  readonly previous: string;
  readonly detail: string;
}

export interface PageRequest {
  url: string;
  unit: 'day' | 'month' | 'range';
  start: CalendarDay;
  end: CalendarDay;
  /** Every day the page covers, as yyyy-MM-dd. */
  dates: string[];
}
