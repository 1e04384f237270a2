/**
 * CSV export of event records.
 * Columns: DateTime, Currency, Impact, Event, Actual, Forecast, Previous, Detail.
 * Quoting follows papaparse: fields with a comma, quote or line break are
 * quoted and embedded quotes doubled. Files are written to a temp file and
 * renamed, so a failed export never leaves a half-written file.
 */
import { promises as fs } from 'fs';
import path from 'path';
import Papa from 'papaparse';
import type { EventRecord } from '../types/calendar';
import { ExportError, errorMessage } from '../types/errors';

export const CSV_HEADER = ['DateTime', 'Currency', 'Impact', 'Event', 'Actual', 'Forecast', 'Previous', 'Detail'] as const;

export type CsvRow = Record<(typeof CSV_HEADER)[number], string>;

function toFields(record: EventRecord): string[] {
  return [
    record.datetime,
    record.currency,
    record.impact,
    record.event,
    record.actual,
    record.forecast,
    record.previous,
    record.detail,
  ];
}

export class CsvExportService {
  toCsv(records: readonly EventRecord[]): string {
    // Header as the first row so an empty export is still a valid file.
    const body = Papa.unparse([[...CSV_HEADER], ...records.map(toFields)], { newline: '\n', quotes: false });
    return `${body}\n`;
  }

  parseCsv(text: string): CsvRow[] {
    const parsed = Papa.parse<CsvRow>(text, { header: true, skipEmptyLines: true });
    if (parsed.errors.length > 0) {
      console.warn(`[CsvExport] ${parsed.errors.length} CSV parse error(s), first: ${parsed.errors[0].message}`);
    }
    return parsed.data;
  }

  /** Write all records to `outputPath`, replacing any existing file. */
  async writeCsv(outputPath: string, records: readonly EventRecord[]): Promise<void> {
    const target = path.resolve(outputPath);
    const tempPath = path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.${Date.now()}.tmp`);
    const content = this.toCsv(records);

    try {
      await fs.writeFile(tempPath, content, 'utf8');
      await fs.rename(tempPath, target);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        console.warn(`[CsvExport] Could not remove temp file ${tempPath}: ${errorMessage(cleanupError)}`);
      });
      throw new ExportError(target, `Could not write ${target}: ${errorMessage(error)}`, { cause: error });
    }

    console.log(`[CsvExport] Wrote ${records.length} event(s) to ${target}`);
  }
}
