export type CalendarErrorCode =
  | 'INVALID_DATE'
  | 'INVALID_TIMEZONE'
  | 'FETCH_ERROR'
  | 'EXPORT_ERROR';

export class CalendarScrapeError extends Error {
  readonly code: CalendarErrorCode;

  constructor(code: CalendarErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed or out-of-range input date. Fatal to the whole run. */
export class InvalidDateError extends CalendarScrapeError {
  constructor(message: string) {
    super('INVALID_DATE', message);
  }
}

export class InvalidTimezoneError extends CalendarScrapeError {
  readonly timezone: string;

  constructor(timezone: string) {
    super('INVALID_TIMEZONE', `Unknown timezone: "${timezone}"`);
    this.timezone = timezone;
  }
}

/** A single page failed to load. Recorded in the failure manifest, never fatal. */
export class FetchError extends CalendarScrapeError {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super('FETCH_ERROR', message, options);
    this.url = url;
  }
}

/** Output could not be written. No partial file is left behind. */
export class ExportError extends CalendarScrapeError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('EXPORT_ERROR', message, options);
    this.path = path;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
