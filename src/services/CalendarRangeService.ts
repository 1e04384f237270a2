/**
 * CalendarRangeService - walks a date range page by page and collects event records.
 *
 * Each page moves through Pending -> PageFetched -> RowsExtracted -> Advance/Done.
 * Pages are processed one at a time with their own PageContext; records of a
 * page are appended only once the whole page succeeded. A failing page is
 * recorded in the failure manifest and the walk continues.
 */
import type { CalendarDay, EventRecord, PageRequest, PageUnit, RawRow } from '../types/calendar';
import { countIssues, type DataIssue, type IssueCounts, type PageFailure } from '../types/DataQuality';
import type { PageSource, PageSourceProvider } from '../types/provider';
import { errorMessage } from '../types/errors';
import { dayKey, formatDayLabel, parseCalendarDay } from '../utils/calendarDay';
import { planPages } from '../utils/calendarUrl';
import { assertTimezone, createPageContext, normalizeRow, type PageContext } from '../utils/dateTimeNormalizer';
import { DetailResolverService } from './DetailResolverService';
import { RowParserService } from './RowParserService';

export interface ScrapeRangeOptions {
  start: string | CalendarDay;
  end: string | CalendarDay;
  targetTimezone: string;
  /** Timezone the calendar session renders times in. */
  sourceTimezone: string;
  pageUnit?: PageUnit;
  /** Checked between pages only; a page in progress always completes. */
  signal?: AbortSignal;
}

export type RangeState =
  | { state: 'Pending'; page: PageRequest }
  | { state: 'PageFetched'; page: PageRequest }
  | { state: 'RowsExtracted'; page: PageRequest; rows: number }
  | { state: 'Advance'; page: PageRequest }
  | { state: 'Done'; pagesVisited: number };

export interface RangeResult {
  records: EventRecord[];
  failures: PageFailure[];
  issues: DataIssue[];
  issueCounts: IssueCounts;
  pagesPlanned: number;
  pagesVisited: number;
  interrupted: boolean;
}

export interface CalendarRangeServiceOptions {
  rowParser?: RowParserService;
  detailResolver?: DetailResolverService;
  onStateChange?: (state: RangeState) => void;
}

type PageOutcome =
  | { ok: true; records: EventRecord[]; issues: DataIssue[] }
  | { ok: false; failure: PageFailure };

function toDay(value: string | CalendarDay): CalendarDay {
  return typeof value === 'string' ? parseCalendarDay(value) : value;
}

function buildRecord(row: RawRow, instant: Date, datetime: string, detail: string): EventRecord {
  return Object.freeze({
    datetime,
    instant,
    currency: row.currency,
    impact: row.impact,
    event: row.event,
    actual: row.actual,
    forecast: row.forecast,
    previous: row.previous,
    detail,
  });
}

export class CalendarRangeService {
  private readonly provider: PageSourceProvider;
  private readonly rowParser: RowParserService;
  private readonly detailResolver: DetailResolverService;
  private readonly onStateChange?: (state: RangeState) => void;

  constructor(provider: PageSourceProvider, options: CalendarRangeServiceOptions = {}) {
    this.provider = provider;
    this.rowParser = options.rowParser ?? new RowParserService();
    this.detailResolver = options.detailResolver ?? new DetailResolverService();
    this.onStateChange = options.onStateChange;
  }

  async scrapeRange(options: ScrapeRangeOptions): Promise<RangeResult> {
    const start = toDay(options.start);
    const end = toDay(options.end);
    assertTimezone(options.targetTimezone);
    assertTimezone(options.sourceTimezone);

    const pages = planPages(start, end, options.pageUnit ?? 'day');
    console.log(
      `[CalendarRange] ${formatDayLabel(start)} -> ${formatDayLabel(end)}: ${pages.length} page(s), ` +
        `source ${options.sourceTimezone}, target ${options.targetTimezone}`
    );

    const records: EventRecord[] = [];
    const failures: PageFailure[] = [];
    const issues: DataIssue[] = [];
    let pagesVisited = 0;
    let interrupted = false;

    for (const [index, page] of pages.entries()) {
      if (options.signal?.aborted) {
        console.warn(`[CalendarRange] Interrupted before ${page.url}, ${pages.length - index} page(s) left`);
        interrupted = true;
        break;
      }

      this.transition({ state: 'Pending', page });
      const outcome = await this.processPage(page, options);
      pagesVisited++;

      if (outcome.ok) {
        records.push(...outcome.records);
        issues.push(...outcome.issues);
      } else {
        failures.push(outcome.failure);
      }

      if (index < pages.length - 1) {
        this.transition({ state: 'Advance', page });
      }
    }

    this.transition({ state: 'Done', pagesVisited });

    const issueCounts = countIssues(issues);
    console.log(`[CalendarRange] Done:`);
    console.log(`  - Pages visited: ${pagesVisited}/${pages.length}`);
    console.log(`  - Events: ${records.length}`);
    console.log(`  - Failed pages: ${failures.length}`);
    console.log(
      `  - Issues: ${Object.entries(issueCounts)
        .map(([type, count]) => `${type}=${count}`)
        .join(', ')}`
    );

    return {
      records,
      failures,
      issues,
      issueCounts,
      pagesPlanned: pages.length,
      pagesVisited,
      interrupted,
    };
  }

  private transition(state: RangeState): void {
    this.onStateChange?.(state);
  }

  private async processPage(page: PageRequest, options: ScrapeRangeOptions): Promise<PageOutcome> {
    let source: PageSource;
    try {
      source = await this.provider.fetchPage(page.url, { day: page.start });
    } catch (error) {
      console.error(`[CalendarRange] Failed to fetch ${page.url}: ${errorMessage(error)}`);
      return { ok: false, failure: { url: page.url, dates: page.dates, message: errorMessage(error) } };
    }
    this.transition({ state: 'PageFetched', page });

    try {
      const { valid: rows, issues } = this.rowParser.parseHtml(source.html, page.url);
      this.transition({ state: 'RowsExtracted', page, rows: rows.length });

      const pageRecords: EventRecord[] = [];
      const pageIssues: DataIssue[] = [...issues];
      let context: PageContext = createPageContext(page.start);
      let outsideRange = 0;

      for (const row of rows) {
        const result = normalizeRow(row, context, options);
        context = result.context;
        if (result.issue) pageIssues.push({ ...result.issue, url: page.url });
        if (!result.ok) continue;

        if (!page.dates.includes(dayKey(result.day))) {
          outsideRange++;
          continue;
        }

        const { detail, issue } = await this.detailResolver.resolve(row.detail, source);
        if (issue) pageIssues.push(issue);
        pageRecords.push(buildRecord(row, result.instant, result.datetime, detail));
      }

      console.log(
        `[CalendarRange] ${page.url}: ${rows.length} rows, ${pageRecords.length} events, ` +
          `${outsideRange} outside range, ${pageIssues.length} issue(s)`
      );
      return { ok: true, records: pageRecords, issues: pageIssues };
    } catch (error) {
      console.error(`[CalendarRange] Failed to process ${page.url}: ${errorMessage(error)}`);
      return { ok: false, failure: { url: page.url, dates: page.dates, message: errorMessage(error) } };
    } finally {
      await source.close().catch((error: unknown) => {
        console.warn(`[CalendarRange] Could not close page ${page.url}: ${errorMessage(error)}`);
      });
    }
  }
}
