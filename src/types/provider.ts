import type { CalendarDay } from './calendar';

/**
 * Page-source provider contract. The browser/session layer lives behind it;
 * the scraping core only asks for pages and for detail panels to be expanded.
 */

export interface PageSource {
  url: string;
  /** Rendered page markup, before any detail panel is expanded. */
  html: string;
  /** Expand the detail panel of the row with this data-event-id and return the panel markup. */
  expandDetail(eventId: string): Promise<string>;
  close(): Promise<void>;
}

export interface FetchPageOptions {
  /** First day the page covers; the session timezone is checked against it. */
  day?: CalendarDay;
}

export interface PageSourceProvider {
  /** Rejects with FetchError when the page cannot be loaded. */
  fetchPage(url: string, options?: FetchPageOptions): Promise<PageSource>;
  close(): Promise<void>;
}
