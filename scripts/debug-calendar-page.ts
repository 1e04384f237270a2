/**
 * Debug: parse a saved calendar page and print what each row resolves to.
 *
 * Run: npx ts-node scripts/debug-calendar-page.ts page.html 2025-01-05 [sourceTz] [targetTz]
 * The date anchors year inference and should be the day or first day the page was requested for.
 */
import { readFileSync } from 'fs';
import { RowParserService } from '../src/services/RowParserService';
import { flattenDetailPanel } from '../src/services/DetailResolverService';
import { parseCalendarDay } from '../src/utils/calendarDay';
import { createPageContext, normalizeRow, type PageContext } from '../src/utils/dateTimeNormalizer';

function main() {
  const [file, anchorDate, sourceTimezone = 'UTC', targetTimezone = sourceTimezone] = process.argv.slice(2);
  if (!file || !anchorDate) {
    console.error('Usage: npx ts-node scripts/debug-calendar-page.ts <page.html> <yyyy-MM-dd> [sourceTz] [targetTz]');
    process.exitCode = 1;
    return;
  }

  const { valid: rows, issues } = new RowParserService().parseHtml(readFileSync(file, 'utf8'), file);
  console.log(`Rows: ${rows.length}, parser issues: ${issues.length}`);

  let context: PageContext = createPageContext(parseCalendarDay(anchorDate));
  rows.forEach((row, i) => {
    const result = normalizeRow(row, context, { sourceTimezone, targetTimezone });
    context = result.context;

    console.log(`\n--- Row ${i} ---`);
    console.log('  header/time:', JSON.stringify(row.dateHeader), JSON.stringify(row.time));
    console.log('  event:', `${row.currency} [${row.impact}] ${row.event}`);
    console.log('  values:', JSON.stringify([row.actual, row.forecast, row.previous]));
    console.log('  datetime:', result.ok ? result.datetime : '(skipped)');
    if (row.detail) {
      const detail = row.detail.state === 'expanded' ? flattenDetailPanel(row.detail.panel) : '(collapsed)';
      console.log(`  detail ${row.detail.eventId}:`, detail.slice(0, 200));
    }
    if (result.issue) console.log(`  ⚠️ ${result.issue.type}: ${result.issue.message}`);
  });

  for (const issue of issues) {
    console.log(`⚠️ ${issue.type}: ${issue.message}`);
  }
}

try {
  main();
} catch (error) {
  console.error(error);
  process.exitCode = 1;
}
