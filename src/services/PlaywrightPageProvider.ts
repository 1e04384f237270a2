import { chromium, Browser, Page } from 'playwright-core';
import type { FetchPageOptions, PageSource, PageSourceProvider } from '../types/provider';
import { FetchError, errorMessage } from '../types/errors';
import { checkSessionOffset } from '../utils/dateTimeNormalizer';

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36';

const DETAIL_TABLE_SELECTOR = 'tr.calendar__details--detail table.calendarspecs';
const TIMEZONE_URL = 'https://www.forexfactory.com/timezone';

/**
 * Offset from the calendar's timezone settings text, e.g.
 * "(GMT-05:00) Eastern Time" -> "-05:00". A bare "(GMT)" is "+00:00".
 */
export function parseSessionOffset(text: string): string | undefined {
  const match = text.match(/\(GMT(?:([+-]\d{2}:\d{2}))?\)/);
  if (!match) return undefined;
  return match[1] ?? '+00:00';
}

/** Selector for an event row; event ids are numeric. */
export function detailRowSelector(eventId: string): string {
  if (!/^\d+$/.test(eventId)) {
    throw new Error(`Invalid event id "${eventId}"`);
  }
  return `tr[data-event-id="${eventId}"]`;
}

export interface PlaywrightProviderOptions {
  headless?: boolean;
  /** Chromium binary; playwright-core does not download one. */
  executablePath?: string;
  navigationTimeoutMs?: number;
  /** Pause after navigation, for Cloudflare checks to settle. */
  settleDelayMs?: number;
  /** Timezone the calendar session is expected to display; checked once per session. */
  sourceTimezone?: string;
}

/**
 * Page source backed by a single Chromium session.
 * ForexFactory renders times in the session's configured timezone, so every
 * page of one run goes through the same browser.
 */
export class PlaywrightPageProvider implements PageSourceProvider {
  private browser: Browser | null = null;
  private browserLock: Promise<Browser> | null = null;
  private sessionOffset: Promise<string | undefined> | null = null;
  private readonly options: Required<Omit<PlaywrightProviderOptions, 'executablePath' | 'sourceTimezone'>> &
    Pick<PlaywrightProviderOptions, 'executablePath' | 'sourceTimezone'>;

  constructor(options: PlaywrightProviderOptions = {}) {
    this.options = {
      headless: options.headless ?? true,
      executablePath: options.executablePath,
      navigationTimeoutMs: options.navigationTimeoutMs ?? 30000,
      settleDelayMs: options.settleDelayMs ?? 2000,
      sourceTimezone: options.sourceTimezone,
    };
  }

  private async getBrowser(): Promise<Browser> {
    if (this.browserLock) {
      return this.browserLock;
    }

    if (this.browser && this.browser.isConnected()) {
      return this.browser;
    }

    console.log('[PlaywrightProvider] Launching Chromium browser...');
    this.browserLock = chromium.launch({
      headless: this.options.headless,
      executablePath: this.options.executablePath,
      args: ['--disable-blink-features=AutomationControlled', '--disable-dev-shm-usage', '--no-sandbox'],
    });

    try {
      const browser = await this.browserLock;
      this.browser = browser;
      console.log('[PlaywrightProvider] Browser launched successfully');
      return browser;
    } finally {
      this.browserLock = null;
    }
  }

  /**
   * Offset shown on the calendar's timezone page, read once per browser session.
   * Undefined when the page has no readable offset.
   */
  private getSessionOffset(): Promise<string | undefined> {
    if (!this.sessionOffset) {
      this.sessionOffset = this.readSessionOffset().catch((error: unknown) => {
        this.sessionOffset = null;
        throw error;
      });
    }
    return this.sessionOffset;
  }

  private async readSessionOffset(): Promise<string | undefined> {
    console.log('[PlaywrightProvider] Reading calendar session timezone...');
    const browser = await this.getBrowser();
    const page = await browser.newPage({ userAgent: USER_AGENT, locale: 'en-US' });
    try {
      await page.goto(TIMEZONE_URL, { waitUntil: 'domcontentloaded', timeout: this.options.navigationTimeoutMs });
      await page.waitForTimeout(this.options.settleDelayMs);
      const offset = parseSessionOffset(await page.locator('body').innerText());
      if (offset) {
        console.log(`[PlaywrightProvider] Calendar session timezone: GMT${offset}`);
      } else {
        console.warn('[PlaywrightProvider] Could not read the session timezone, using the configured source timezone');
      }
      return offset;
    } finally {
      await page.close();
    }
  }

  private async verifySessionTimezone(url: string, options: FetchPageOptions | undefined): Promise<void> {
    const sourceTimezone = this.options.sourceTimezone;
    if (!sourceTimezone || !options?.day) return;
    const offset = await this.getSessionOffset();
    if (!offset) return;
    const mismatch = checkSessionOffset(offset, sourceTimezone, options.day);
    if (mismatch) {
      throw new FetchError(url, mismatch);
    }
  }

  async fetchPage(url: string, options?: FetchPageOptions): Promise<PageSource> {
    let page: Page | undefined;
    try {
      await this.verifySessionTimezone(url, options);
      const browser = await this.getBrowser();
      page = await browser.newPage({
        userAgent: USER_AGENT,
        viewport: { width: 1400, height: 1000 },
        locale: 'en-US',
      });

      console.log(`[PlaywrightProvider] Navigating to ${url}...`);
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.options.navigationTimeoutMs });
      await page.waitForTimeout(this.options.settleDelayMs);
      await page.waitForSelector('table.calendar__table', { timeout: this.options.navigationTimeoutMs });

      const html = await page.content();
      return this.wrapPage(url, page, html);
    } catch (error) {
      if (page) {
        await page.close().catch((closeError: unknown) => {
          console.warn(`[PlaywrightProvider] Could not close page: ${errorMessage(closeError)}`);
        });
      }
      throw new FetchError(url, `Could not load ${url}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private wrapPage(url: string, page: Page, html: string): PageSource {
    return {
      url,
      html,
      expandDetail: (eventId) => this.expandDetail(page, eventId),
      close: () => page.close(),
    };
  }

  private async expandDetail(page: Page, eventId: string): Promise<string> {
    const row = page.locator(detailRowSelector(eventId));
    const openLink = row.locator('td.calendar__detail a').first();
    await openLink.scrollIntoViewIfNeeded();
    await openLink.click({ timeout: 10000 });

    const table = page.locator(DETAIL_TABLE_SELECTOR).last();
    await table.waitFor({ state: 'visible', timeout: 10000 });
    const html = `<table class="calendarspecs">${await table.innerHTML()}</table>`;

    // Close the panel so the next row's panel is the last specs table on the page.
    const closeLink = page.locator('a[title="Close Detail"]').first();
    try {
      await closeLink.click({ timeout: 5000 });
      await page.locator(DETAIL_TABLE_SELECTOR).first().waitFor({ state: 'hidden', timeout: 5000 });
    } catch (error) {
      console.warn(`[PlaywrightProvider] Close link not usable for event ${eventId}: ${errorMessage(error)}`);
    }
    return html;
  }

  async close(): Promise<void> {
    if (this.browser) {
      console.log('[PlaywrightProvider] Closing browser...');
      await this.browser.close();
      this.browser = null;
      this.sessionOffset = null;
    }
  }
}
