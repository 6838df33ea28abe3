/**
 * browserManager.ts — Owner of the Chromium process behind the portal driver.
 *
 * One browser per pipeline; each session gets its own browser *context*
 * (separate cookie jar, one page), so two credentials never share a login.
 * The browser is launched lazily on the first context and relaunched if it
 * crashed.
 *
 * puppeteer-core does not download a browser.  Point PORTAL_CHROME_PATH at
 * an installed Chrome/Chromium, or leave it unset to use the stable Chrome
 * channel found on the machine.
 */

import { addExtra } from 'puppeteer-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import puppeteerCore from 'puppeteer-core';
import type { Browser, BrowserContext, Page } from 'puppeteer-core';
import type { Locale } from './types';
import { Logger } from './logger';

const logger = new Logger('BrowserManager');

// Plugins must be registered before the first launch().
const puppeteer = addExtra(puppeteerCore);
puppeteer.use(StealthPlugin());

const ACCEPT_LANGUAGE: Record<Locale, string> = {
  ru: 'ru-RU,ru;q=0.9,kk;q=0.8',
  kk: 'kk-KZ,kk;q=0.9,ru;q=0.8',
};

export interface BrowserOptions {
  chromePath?: string;
  headless: boolean;
  locale: Locale;
}

export interface BrowserPage {
  page: Page;
  context: BrowserContext;
}

export class BrowserManager {
  private browser: Browser | null = null;
  private launching: Promise<Browser> | null = null;

  constructor(private readonly options: BrowserOptions) {}

  // ── Core API ───────────────────────────────────────────

  /**
   * Open an isolated context with one page.  The caller owns both and must
   * close the context.
   */
  async openPage(): Promise<BrowserPage> {
    const browser = await this.ensureBrowser();
    const context = await browser.createBrowserContext();
    const page = await context.newPage();

    try {
      await page.setViewport({ width: 1366, height: 900 });
      await page.setExtraHTTPHeaders({
        'accept-language': ACCEPT_LANGUAGE[this.options.locale],
      });
    } catch (err) {
      await context.close();
      throw err;
    }

    return { page, context };
  }

  /** Close the browser.  Safe to call more than once. */
  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    if (!browser) return;

    try {
      await browser.close();
      logger.info('Browser closed');
    } catch (err) {
      logger.warn(`Browser did not close cleanly: ${describe(err)}`);
    }
  }

  // ── Internals ──────────────────────────────────────────

  private async ensureBrowser(): Promise<Browser> {
    if (this.browser?.connected) return this.browser;

    // Concurrent callers share one launch.
    if (!this.launching) {
      this.launching = this.launch().finally(() => {
        this.launching = null;
      });
    }
    this.browser = await this.launching;
    return this.browser;
  }

  private async launch(): Promise<Browser> {
    const { chromePath, headless, locale } = this.options;
    logger.info(
      `Launching ${headless ? 'headless ' : ''}browser` +
        (chromePath ? ` from ${chromePath}` : ' (stable Chrome channel)'),
    );

    const browser: Browser = await puppeteer.launch({
      headless,
      ...(chromePath ? { executablePath: chromePath } : { channel: 'chrome' }),
      args: [
        '--no-sandbox',
        '--disable-setuid-sandbox',
        '--disable-dev-shm-usage',
        `--lang=${locale === 'kk' ? 'kk-KZ' : 'ru-RU'}`,
      ],
    });

    browser.on('disconnected', () => {
      if (this.browser === browser) {
        logger.warn('Browser disconnected; the next session will relaunch it');
        this.browser = null;
      }
    });

    return browser;
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
