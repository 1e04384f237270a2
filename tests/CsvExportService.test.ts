/**
 * Tests for CsvExportService
 * Run with: npx ts-node tests/CsvExportService.test.ts
 */

import { existsSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { TestRunner, expect, expectRejects } from './helpers/testRunner';
import { CsvExportService } from '../src/services/CsvExportService';
import type { EventRecord } from '../src/types/calendar';
import { ExportError } from '../src/types/errors';

const runner = new TestRunner('CsvExportService');
const csv = new CsvExportService();
const HEADER = 'DateTime,Currency,Impact,Event,Actual,Forecast,Previous,Detail';

function record(partial: Partial<EventRecord>): EventRecord {
  return {
    datetime: '2025-01-05T12:30:00+03:30',
    instant: new Date('2025-01-05T09:00:00Z'),
    currency: 'USD',
    impact: 'High',
    event: 'Nonfarm Payroll',
    actual: '150K',
    forecast: '170K',
    previous: '140K',
    detail: '',
    ...partial,
  };
}

function withTempDir(fn: (dir: string) => Promise<void>): () => Promise<void> {
  return async () => {
    const dir = mkdtempSync(path.join(os.tmpdir(), 'csv-export-test-'));
    try {
      await fn(dir);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  };
}

runner.test('writes the header and one line per record', () => {
  const text = csv.toCsv([record({ detail: 'Speaker: Fed Chair' })]);
  expect(text).toBe(
    `${HEADER}\n2025-01-05T12:30:00+03:30,USD,High,Nonfarm Payroll,150K,170K,140K,Speaker: Fed Chair\n`
  );
});

runner.test('an empty export is just the header', () => {
  expect(csv.toCsv([])).toBe(`${HEADER}\n`);
});

runner.test('quotes fields with commas and doubles embedded quotes', () => {
  const text = csv.toCsv([record({ detail: 'Speaker: Fed Chair | Notes: "Detailed", specs' })]);
  const line = text.split('\n')[1];
  expect(line).toBe(
    '2025-01-05T12:30:00+03:30,USD,High,Nonfarm Payroll,150K,170K,140K,"Speaker: Fed Chair | Notes: ""Detailed"", specs"'
  );
});

runner.test('reads back the same field values', () => {
  const records = [
    record({ event: 'German Prelim CPI m/m', currency: 'EUR', detail: 'Source: Destatis | Notes: "flash", revised' }),
    record({ event: 'Bank Holiday', impact: 'Holiday', currency: '', actual: '', forecast: '', previous: '', detail: 'Line one\nLine two' }),
  ];
  const rows = csv.parseCsv(csv.toCsv(records));
  expect(rows).toHaveLength(2);
  expect(rows[0].Event).toBe('German Prelim CPI m/m');
  expect(rows[0].Detail).toBe('Source: Destatis | Notes: "flash", revised');
  expect(rows[1].Currency).toBe('');
  expect(rows[1].Impact).toBe('Holiday');
  expect(rows[1].Detail).toBe('Line one\nLine two');
});

runner.test(
  'replaces an existing file and leaves no temp file behind',
  withTempDir(async (dir) => {
    const target = path.join(dir, 'events.csv');
    writeFileSync(target, 'stale content', 'utf8');

    await csv.writeCsv(target, [record({ detail: 'Speaker: Fed Chair' })]);

    expect(readFileSync(target, 'utf8')).toBe(
      `${HEADER}\n2025-01-05T12:30:00+03:30,USD,High,Nonfarm Payroll,150K,170K,140K,Speaker: Fed Chair\n`
    );
    expect(readdirSync(dir)).toEqual(['events.csv']);
  })
);

runner.test(
  'an unwritable path raises ExportError and creates nothing',
  withTempDir(async (dir) => {
    const target = path.join(dir, 'missing-dir', 'events.csv');
    await expectRejects(() => csv.writeCsv(target, [record({})]), ExportError);
    expect(existsSync(target)).toBe(false);
    expect(readdirSync(dir)).toHaveLength(0);
  })
);

runner.run().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
