/**
 * Tests for DetailResolverService
 * Run with: npx ts-node tests/DetailResolverService.test.ts
 */

import { TestRunner, expect } from './helpers/testRunner';
import { specsTable } from './helpers/fakeProvider';
import { DetailResolverService, flattenDetailPanel, needsExpansion } from '../src/services/DetailResolverService';
import { parsePageTree } from '../src/utils/pageTree';

const runner = new TestRunner('DetailResolverService');
const resolver = new DetailResolverService();

function fakeSource(panels: Record<string, string>) {
  const expanded: string[] = [];
  return {
    expanded,
    url: 'https://www.forexfactory.com/calendar?day=jan5.2025',
    async expandDetail(eventId: string): Promise<string> {
      expanded.push(eventId);
      const panel = panels[eventId];
      if (panel === undefined) throw new Error('panel did not open');
      return panel;
    },
  };
}

runner.test('flattens label/value pairs in row order', () => {
  const panel = parsePageTree(
    specsTable([
      ['Source', 'BLS'],
      ['Usual Effect', 'Higher than forecast is good for currency'],
    ])
  );
  expect(flattenDetailPanel(panel)).toBe('Source: BLS | Usual Effect: Higher than forecast is good for currency');
});

runner.test('collapses whitespace inside labels and values', () => {
  const panel = parsePageTree(specsTable([['  Frequency ', 'Released\n   monthly']]));
  expect(flattenDetailPanel(panel)).toBe('Frequency: Released monthly');
});

runner.test('a repeated label keeps its first position and last value', () => {
  const panel = parsePageTree(
    specsTable([
      ['Source', 'First'],
      ['Measures', 'Change in prices'],
      ['Source', 'Second'],
    ])
  );
  expect(flattenDetailPanel(panel)).toBe('Source: Second | Measures: Change in prices');
});

runner.test('uses the last specs table and skips single-cell rows', () => {
  const html =
    specsTable([['Old', 'value']]) +
    '<table class="calendarspecs"><tr><td colspan="2">History</td></tr><tr><td>Next Release</td><td>Feb 7, 2025</td></tr></table>';
  expect(flattenDetailPanel(parsePageTree(html))).toBe('Next Release: Feb 7, 2025');
});

runner.test('a panel without a specs table returns its raw text', () => {
  expect(flattenDetailPanel(parsePageTree('<div>  Speech notes only  </div>'))).toBe('  Speech notes only  ');
  expect(flattenDetailPanel(parsePageTree('<div>   </div>'))).toBe('');
});

runner.test('no reference resolves to an empty detail', async () => {
  const source = fakeSource({});
  const result = await resolver.resolve(undefined, source);
  expect(result.detail).toBe('');
  expect(result.issue).toBeUndefined();
  expect(source.expanded).toHaveLength(0);
});

runner.test('an expanded panel is read without touching the page', async () => {
  const source = fakeSource({});
  const panel = parsePageTree(specsTable([['Speaker', 'Fed Chair']]));
  const result = await resolver.resolve({ state: 'expanded', eventId: '9001', panel }, source);
  expect(result.detail).toBe('Speaker: Fed Chair');
  expect(source.expanded).toHaveLength(0);
});

runner.test('a collapsed panel is expanded through the page source', async () => {
  const source = fakeSource({ '9001': specsTable([['Speaker', 'Fed Chair']]) });
  const result = await resolver.resolve({ state: 'collapsed', eventId: '9001' }, source);
  expect(result.detail).toBe('Speaker: Fed Chair');
  expect(source.expanded).toEqual(['9001']);
});

runner.test('a panel that fails to open yields an empty detail and an issue', async () => {
  const source = fakeSource({});
  const result = await resolver.resolve({ state: 'collapsed', eventId: '9002' }, source);
  expect(result.detail).toBe('');
  expect(result.issue?.type).toBe('DETAIL_PARSE_WARNING');
  expect(result.issue?.url).toBe(source.url);
  expect(result.issue?.details).toEqual({ eventId: '9002' });
});

runner.test('only collapsed references need expansion', () => {
  expect(needsExpansion(undefined)).toBe(false);
  expect(needsExpansion({ state: 'collapsed', eventId: '1' })).toBe(true);
  expect(needsExpansion({ state: 'expanded', eventId: '1', panel: parsePageTree('<div></div>') })).toBe(false);
});

runner.run().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
