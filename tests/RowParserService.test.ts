/**
 * Tests for RowParserService
 * Run with: npx ts-node tests/RowParserService.test.ts
 */

import { TestRunner, expect } from './helpers/testRunner';
import { calendarPage, dayBreaker, eventRow, loadFixture, specsTable } from './helpers/fakeProvider';
import { RowParserService, readImpact } from '../src/services/RowParserService';
import { byClass, findFirst, parsePageTree } from '../src/utils/pageTree';

const runner = new TestRunner('RowParserService');
const parser = new RowParserService();
const FIXTURE_URL = 'https://www.forexfactory.com/calendar?range=dec30.2024-jan2.2025';

runner.test('extracts event rows from a rendered week in document order', () => {
  const { valid } = parser.parseHtml(loadFixture('calendar-week-dec2024.html'), FIXTURE_URL);
  expect(valid.map((r) => r.event)).toEqual([
    'Bank Holiday',
    'Chicago PMI',
    'Pending Home Sales m/m',
    'Early Market Close',
    'Home Price Index y/y',
    'Bank Holiday',
    'Unemployment Claims',
  ]);
});

runner.test('attaches the day header to the first row of each day only', () => {
  const { valid } = parser.parseHtml(loadFixture('calendar-week-dec2024.html'), FIXTURE_URL);
  expect(valid.map((r) => r.dateHeader)).toEqual(['MonDec 30', '', '', 'TueDec 31', '', 'WedJan 1', 'ThuJan 2']);
});

runner.test('reads cell values with whitespace collapsed', () => {
  const { valid } = parser.parseHtml(loadFixture('calendar-week-dec2024.html'), FIXTURE_URL);
  const pmi = valid[1];
  expect([pmi.time, pmi.currency, pmi.actual, pmi.forecast, pmi.previous]).toEqual([
    '9:45am',
    'USD',
    '36.9',
    '42.7',
    '40.2',
  ]);
  expect(valid[2].time).toBe('');
  expect(valid[3].currency).toBe('');
});

runner.test('maps impact icons to levels', () => {
  const { valid } = parser.parseHtml(loadFixture('calendar-week-dec2024.html'), FIXTURE_URL);
  expect(valid.map((r) => r.impact)).toEqual(['Holiday', 'Medium', 'Low', 'Holiday', 'High', 'Holiday', 'High']);
});

runner.test('reports malformed rows and rows without an event name', () => {
  const { issues } = parser.parseHtml(loadFixture('calendar-week-dec2024.html'), FIXTURE_URL);
  expect(issues.map((i) => i.type)).toEqual(['PARSE_WARNING', 'ROW_WITHOUT_EVENT']);
  expect(issues[0].message).toBe(
    'Row is missing cells: calendar__currency, calendar__impact, calendar__actual, calendar__forecast, calendar__previous'
  );
  expect(issues[0].url).toBe(FIXTURE_URL);
});

runner.test('marks rows with a detail link as collapsed details', () => {
  const { valid } = parser.parseHtml(loadFixture('calendar-week-dec2024.html'), FIXTURE_URL);
  expect(valid[0].detail).toEqual({ state: 'collapsed', eventId: '141001' });
  expect(valid[1].detail).toEqual({ state: 'collapsed', eventId: '141002' });
  expect(valid[2].detail).toBeUndefined();
});

runner.test('an open detail panel row upgrades the preceding event', () => {
  const html = calendarPage(
    dayBreaker('<span>Sun</span>Jan 5') +
      eventRow({ id: '5001', time: '8:30am', currency: 'USD', event: 'Retail Sales m/m', detail: true }) +
      `<tr class="calendar__details--detail"><td colspan="9">${specsTable([['Source', 'Census Bureau']])}</td></tr>` +
      eventRow({ id: '5002', currency: 'USD', event: 'Core Retail Sales m/m', detail: true })
  );
  const { valid, issues } = parser.parseHtml(html);
  expect(valid).toHaveLength(2);
  expect(valid[0].detail?.state).toBe('expanded');
  expect(valid[0].detail?.eventId).toBe('5001');
  expect(valid[1].detail).toEqual({ state: 'collapsed', eventId: '5002' });
  expect(issues).toHaveLength(0);
});

runner.test('a detail panel with no event before it is reported', () => {
  const html = calendarPage(
    `<tr class="calendar__details--detail"><td>${specsTable([['Source', 'Census Bureau']])}</td></tr>`
  );
  const { valid, issues } = parser.parseHtml(html, 'https://example.test/calendar');
  expect(valid).toHaveLength(0);
  expect(issues.map((i) => i.message)).toEqual(['Detail panel without a preceding event row']);
});

runner.test('a header on a skipped row still applies to the next row', () => {
  const html = calendarPage(
    eventRow({ date: '<span>Sun</span>Jan 5', time: '8:30am', currency: 'USD', event: '' }) +
      eventRow({ currency: 'USD', event: 'CPI m/m' })
  );
  const { valid, issues } = parser.parseHtml(html);
  expect(valid).toHaveLength(1);
  expect(valid[0].dateHeader).toBe('SunJan 5');
  expect(issues.map((i) => i.type)).toEqual(['ROW_WITHOUT_EVENT']);
});

runner.test('a row header wins over a pending day breaker', () => {
  const html = calendarPage(
    dayBreaker('<span>Sat</span>Jan 4') + eventRow({ date: '<span>Sun</span>Jan 5', currency: 'USD', event: 'CPI m/m' })
  );
  expect(parser.parseHtml(html).valid[0].dateHeader).toBe('SunJan 5');
});

runner.test('impact falls back to the cell text', () => {
  const cellOf = (inner: string) => {
    const root = parsePageTree(`<table><tr><td class="calendar__impact">${inner}</td></tr></table>`);
    const cell = findFirst(root, byClass('calendar__impact'));
    if (!cell) throw new Error('impact cell not found');
    return cell;
  };
  expect(readImpact(cellOf('Low'))).toBe('Low');
  expect(readImpact(cellOf('<span class="icon icon--ff-impact-red"></span>'))).toBe('High');
  expect(readImpact(cellOf(''))).toBe('Unknown');
});

runner.test('a page without a calendar table yields nothing', () => {
  const { valid, issues } = parser.parseHtml('<html><body><p>Please enable JavaScript</p></body></html>');
  expect(valid).toHaveLength(0);
  expect(issues).toHaveLength(0);
});

runner.run().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
