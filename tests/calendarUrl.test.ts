/**
 * Tests for calendar address building and page planning
 * Run with: npx ts-node tests/calendarUrl.test.ts
 */

import { TestRunner, expect, expectThrows } from './helpers/testRunner';
import {
  buildDayUrl,
  buildMonthUrl,
  buildRangeUrl,
  formatCalendarDate,
  planPages,
} from '../src/utils/calendarUrl';
import { dayKey, eachDay, parseCalendarDay } from '../src/utils/calendarDay';
import { InvalidDateError } from '../src/types/errors';

const runner = new TestRunner('Calendar URL');

runner.test('formats a day as month abbreviation, day and year', () => {
  expect(formatCalendarDate({ year: 2025, month: 1, day: 5 })).toBe('jan5.2025');
  expect(formatCalendarDate({ year: 2024, month: 12, day: 31 })).toBe('dec31.2024');
});

runner.test('builds day, month and range addresses', () => {
  expect(buildDayUrl({ year: 2025, month: 1, day: 5 })).toBe('https://www.forexfactory.com/calendar?day=jan5.2025');
  expect(buildMonthUrl(2025, 2)).toBe('https://www.forexfactory.com/calendar?month=feb.2025');
  expect(buildRangeUrl({ year: 2024, month: 12, day: 20 }, { year: 2024, month: 12, day: 30 })).toBe(
    'https://www.forexfactory.com/calendar?range=dec20.2024-dec30.2024'
  );
});

runner.test('rejects a reversed range', () => {
  expectThrows(
    () => buildRangeUrl({ year: 2025, month: 1, day: 6 }, { year: 2025, month: 1, day: 5 }),
    InvalidDateError
  );
});

runner.test('rejects dates that do not exist or are out of range', () => {
  expectThrows(() => formatCalendarDate({ year: 2025, month: 2, day: 30 }), InvalidDateError);
  expectThrows(() => formatCalendarDate({ year: 2006, month: 12, day: 31 }), InvalidDateError);
  expectThrows(() => buildMonthUrl(2025, 13), InvalidDateError);
});

runner.test('day unit plans one page per day across a year boundary', () => {
  const pages = planPages({ year: 2024, month: 12, day: 31 }, { year: 2025, month: 1, day: 2 }, 'day');
  expect(pages.map((p) => p.url)).toEqual([
    'https://www.forexfactory.com/calendar?day=dec31.2024',
    'https://www.forexfactory.com/calendar?day=jan1.2025',
    'https://www.forexfactory.com/calendar?day=jan2.2025',
  ]);
  expect(pages.map((p) => p.dates)).toEqual([['2024-12-31'], ['2025-01-01'], ['2025-01-02']]);
});

runner.test('single-day range plans exactly one page', () => {
  const day = { year: 2025, month: 1, day: 5 };
  const pages = planPages(day, day, 'day');
  expect(pages).toHaveLength(1);
  expect(pages[0].unit).toBe('day');
});

runner.test('month unit uses range pages for partial months and month pages for full ones', () => {
  const pages = planPages({ year: 2025, month: 1, day: 15 }, { year: 2025, month: 3, day: 10 }, 'month');
  expect(pages.map((p) => p.url)).toEqual([
    'https://www.forexfactory.com/calendar?range=jan15.2025-jan31.2025',
    'https://www.forexfactory.com/calendar?month=feb.2025',
    'https://www.forexfactory.com/calendar?range=mar1.2025-mar10.2025',
  ]);
  expect(pages.map((p) => p.unit)).toEqual(['range', 'month', 'range']);
  expect(pages.map((p) => p.dates.length)).toEqual([17, 28, 10]);
  expect(pages[2].dates[9]).toBe('2025-03-10');
});

runner.test('month unit covers a leap February in full', () => {
  const pages = planPages({ year: 2024, month: 2, day: 1 }, { year: 2024, month: 2, day: 29 }, 'month');
  expect(pages).toHaveLength(1);
  expect(pages[0].url).toBe('https://www.forexfactory.com/calendar?month=feb.2024');
  expect(pages[0].dates).toHaveLength(29);
});

runner.test('planning rejects start after end', () => {
  expectThrows(
    () => planPages({ year: 2025, month: 1, day: 10 }, { year: 2025, month: 1, day: 9 }, 'day'),
    InvalidDateError
  );
});

runner.test('parses yyyy-MM-dd and rejects other shapes', () => {
  expect(parseCalendarDay('2025-01-05')).toEqual({ year: 2025, month: 1, day: 5 });
  expectThrows(() => parseCalendarDay('2025/01/05'), InvalidDateError);
  expectThrows(() => parseCalendarDay('2025-02-30'), InvalidDateError);
  expectThrows(() => parseCalendarDay('2101-01-01'), InvalidDateError);
});

runner.test('day arithmetic is not moved by DST changes', () => {
  const days = eachDay({ year: 2025, month: 3, day: 8 }, { year: 2025, month: 3, day: 10 });
  expect(days.map(dayKey)).toEqual(['2025-03-08', '2025-03-09', '2025-03-10']);
  expect(eachDay({ year: 2024, month: 2, day: 28 }, { year: 2024, month: 3, day: 1 }).map(dayKey)).toEqual([
    '2024-02-28',
    '2024-02-29',
    '2024-03-01',
  ]);
});

runner.run().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
