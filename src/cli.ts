#!/usr/bin/env node
/**
 * Command-line entry: scrape a date range and write it to CSV.
 *
 * Exit codes: 0 success, 2 partial (failed pages or interrupted), 1 hard failure.
 */
import { Command, CommanderError } from 'commander';
import { resolveConfig, parsePageUnit, type ScrapeConfig } from './config/env';
import { openRunLog } from './db/database';
import { CalendarRangeService } from './services/CalendarRangeService';
import { CsvExportService } from './services/CsvExportService';
import { PlaywrightPageProvider } from './services/PlaywrightPageProvider';
import type { PageSourceProvider } from './types/provider';
import { CalendarScrapeError, errorMessage } from './types/errors';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_PARTIAL = 2;

interface CliOptions {
  start?: string;
  end?: string;
  tz?: string;
  sourceTz?: string;
  output?: string;
  unit?: string;
  diagnosticsDb?: string;
  headless?: boolean;
  chromium?: string;
}

export interface CliDeps {
  createProvider?: (config: ScrapeConfig) => PageSourceProvider;
  env?: Record<string, string | undefined>;
}

function buildProgram(): Command {
  return new Command()
    .name('calendar-export')
    .description('Export economic calendar events for a date range to CSV')
    .option('-s, --start <date>', 'first day, yyyy-MM-dd (env START_DATE)')
    .option('-e, --end <date>', 'last day, yyyy-MM-dd (env END_DATE)')
    .option('-t, --tz <zone>', 'target IANA timezone for output (env TARGET_TIMEZONE)')
    .option('--source-tz <zone>', 'timezone the calendar displays times in (env SOURCE_TIMEZONE)')
    .option('-o, --output <path>', 'CSV output path (env OUTPUT_PATH)')
    .option('-u, --unit <unit>', 'page unit: day or month (env PAGE_UNIT)')
    .option('--diagnostics-db <path>', 'SQLite file to log runs and issues (env DIAGNOSTICS_DB)')
    .option('--no-headless', 'show the browser window')
    .option('--chromium <path>', 'Chromium executable (env CHROMIUM_PATH)')
    .exitOverride();
}

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const program = buildProgram();
  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_OK : EXIT_FAILURE;
    }
    throw error;
  }
  const opts = program.opts<CliOptions>();

  let config: ScrapeConfig;
  try {
    config = resolveConfig(
      {
        startDate: opts.start,
        endDate: opts.end,
        targetTimezone: opts.tz,
        sourceTimezone: opts.sourceTz,
        outputPath: opts.output,
        pageUnit: opts.unit ? parsePageUnit(opts.unit) : undefined,
        diagnosticsDb: opts.diagnosticsDb,
        // commander sets headless=true unless --no-headless is given; only the flag overrides env.
        headless: opts.headless === false ? false : undefined,
        chromiumPath: opts.chromium,
      },
      deps.env
    );
  } catch (error) {
    console.error(`[CLI] ${errorMessage(error)}`);
    return EXIT_FAILURE;
  }

  const provider =
    deps.createProvider?.(config) ??
    new PlaywrightPageProvider({
      headless: config.headless,
      executablePath: config.chromiumPath,
      sourceTimezone: config.sourceTimezone,
    });
  const controller = new AbortController();
  const onSigint = () => {
    console.warn('[CLI] Interrupt received, stopping after the current page...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const service = new CalendarRangeService(provider);
    const result = await service.scrapeRange({
      start: config.startDate,
      end: config.endDate,
      targetTimezone: config.targetTimezone,
      sourceTimezone: config.sourceTimezone,
      pageUnit: config.pageUnit,
      signal: controller.signal,
    });

    await new CsvExportService().writeCsv(config.outputPath, result.records);

    if (config.diagnosticsDb) {
      const runLog = openRunLog(config.diagnosticsDb);
      try {
        const runId = runLog.recordRun({
          startDate: config.startDate,
          endDate: config.endDate,
          targetTimezone: config.targetTimezone,
          sourceTimezone: config.sourceTimezone,
          outputPath: config.outputPath,
          events: result.records.length,
          pagesPlanned: result.pagesPlanned,
          pagesVisited: result.pagesVisited,
          interrupted: result.interrupted,
          issues: result.issues,
          failures: result.failures,
        });
        console.log(`[CLI] Run ${runId} logged to ${runLog.getDbPath()}`);
      } finally {
        runLog.close();
      }
    }

    if (result.failures.length > 0) {
      console.warn(`[CLI] ${result.failures.length} page(s) failed:`);
      for (const failure of result.failures) {
        console.warn(`  - ${failure.dates.join(', ')} (${failure.url}): ${failure.message}`);
      }
    }
    if (result.failures.length > 0 || result.interrupted) {
      return EXIT_PARTIAL;
    }
    return EXIT_OK;
  } catch (error) {
    const prefix = error instanceof CalendarScrapeError ? `${error.code}: ` : '';
    console.error(`[CLI] ${prefix}${errorMessage(error)}`);
    return EXIT_FAILURE;
  } finally {
    process.removeListener('SIGINT', onSigint);
    await provider.close().catch((error: unknown) => {
      console.warn(`[CLI] Could not close page provider: ${errorMessage(error)}`);
    });
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = EXIT_FAILURE;
    });
}
