/**
 * puppeteerPortal.ts — PortalDriver backed by a real browser.
 *
 * Flow on the portal:
 *   1. /?school=logout&language=… → expand the sign-in panel, type the login
 *      and password, submit.
 *   2. Accounts with several roles or schools get a chooser; pick the
 *      teacher role (and the credential's school, if given).
 *   3. The profile block in the navigation bar proves we are signed in.
 *   4. /office/?action=semester lists class/subject rows; each links to a
 *      criteria page with one tab per period.
 *
 * Every wait is bounded by the step timeout.  A timeout that lands on the
 * sign-in form is reported as SessionExpired, any other as NavigationTimeout.
 */

import { TimeoutError } from 'puppeteer-core';
import type { ElementHandle, Page } from 'puppeteer-core';
import { BrowserManager } from '../core/browserManager';
import type { BrowserPage } from '../core/browserManager';
import {
  AuthError,
  LayoutChanged,
  NavigationTimeout,
  SessionExpired,
} from '../core/errors';
import type { DiagnosticSnapshot } from '../core/errors';
import { Logger, maskLogin } from '../core/logger';
import type { Credential, Locale, RawTable } from '../core/types';
import { HostRateLimiter } from '../middleware/rateLimiter';
import type { OpenedClass, PortalContext, PortalDriver, PortalProfile } from './portalDriver';
import {
  EVALUATION_WARNING,
  SELECTORS,
  findClassRow,
  hasEvaluationWarning,
  looksLikeLoginPage,
  parseGradesList,
  parsePeriodTabs,
  parsePortalTable,
  parseProfile,
  pickPeriodTab,
} from './portalMarkup';

const logger = new Logger('PuppeteerPortal');

const LANGUAGE_QUERY: Record<Locale, string> = {
  ru: 'language=rus',
  kk: 'language=kaz',
};

const TEACHER_ROLE = /учитель|мұғалім/i;
const SNAPSHOT_CHARS = 8_000;
const TYPING_DELAY_MS = 20;

export interface PuppeteerPortalOptions {
  baseUrl: string;
  stepTimeoutMs: number;
  rateLimitMs: number;
  chromePath?: string;
  headless: boolean;
  locale: Locale;
}

export class PuppeteerPortalDriver implements PortalDriver {
  private readonly browser: BrowserManager;
  private readonly limiter: HostRateLimiter;

  constructor(private readonly options: PuppeteerPortalOptions) {
    this.browser = new BrowserManager({
      chromePath: options.chromePath,
      headless: options.headless,
      locale: options.locale,
    });
    this.limiter = new HostRateLimiter({ minTimeMs: options.rateLimitMs });
  }

  async newContext(credentialRef: string): Promise<PortalContext> {
    const opened = await this.browser.openPage();
    logger.debug(`Opened browsing context for credential "${credentialRef}"`);
    return new PuppeteerPortalContext(opened, this.limiter, this.options);
  }

  async close(): Promise<void> {
    await this.limiter.stop();
    await this.browser.close();
  }
}

class PuppeteerPortalContext implements PortalContext {
  private readonly page: Page;
  private activeTab: string | null = null;
  private notice: string | undefined;

  constructor(
    private readonly opened: BrowserPage,
    private readonly limiter: HostRateLimiter,
    private readonly options: PuppeteerPortalOptions,
  ) {
    this.page = opened.page;
  }

  // ── Authenticating ─────────────────────────────────────

  async login(credential: Credential, locale: Locale): Promise<PortalProfile> {
    const who = maskLogin(credential.username);
    await this.navigate(`${this.options.baseUrl}/?school=logout&${LANGUAGE_QUERY[locale]}`, 'Authenticating');

    await (await this.waitFor(SELECTORS.loginToggle, 'Authenticating')).click();
    await this.waitFor(SELECTORS.loginPanel, 'Authenticating');

    const loginInput = await this.waitFor(`#collapseThree ${SELECTORS.loginInput}`, 'Authenticating');
    await loginInput.click({ clickCount: 3 });
    await loginInput.type(credential.username, { delay: TYPING_DELAY_MS });

    const passwordInput = await this.waitFor(`#collapseThree ${SELECTORS.passwordInput}`, 'Authenticating');
    await passwordInput.click({ clickCount: 3 });
    await passwordInput.type(credential.secret, { delay: TYPING_DELAY_MS });

    logger.info(`Submitting sign-in form for ${who}`);
    await this.clickAndWait(SELECTORS.loginSubmit, 'Authenticating');
    await this.chooseTeacherAccount(credential);

    const profile = await this.page
      .waitForSelector(SELECTORS.profileName, { timeout: this.options.stepTimeoutMs })
      .then((el) => el !== null)
      .catch((err: unknown) => {
        if (err instanceof TimeoutError) return false;
        throw err;
      });
    if (!profile) {
      throw new AuthError(`Sign-in for ${who} was not accepted: profile block missing after submit`);
    }

    const parsed = parseProfile(await this.page.content());
    if (!parsed) {
      throw new AuthError(`Sign-in for ${who} was not accepted: profile block empty`);
    }
    logger.info(`Signed in as ${who} (${parsed.schoolName || 'school unknown'})`);
    return parsed;
  }

  /** Throws SessionExpired when the office page bounces to the sign-in form. */
  async setLanguage(locale: Locale): Promise<void> {
    await this.navigate(`${this.options.baseUrl}/office/?${LANGUAGE_QUERY[locale]}`, 'SwitchingLanguage');
    await this.waitFor(SELECTORS.profileName, 'SwitchingLanguage');
  }

  // ── Navigating ─────────────────────────────────────────

  async openClass(classId: string): Promise<OpenedClass> {
    this.activeTab = null;
    this.notice = undefined;

    await this.navigate(`${this.options.baseUrl}/office/?action=semester`, 'Navigating');
    await this.waitFor(SELECTORS.gradesList, 'Navigating');

    const rows = parseGradesList(await this.page.content());
    if (rows.length === 0) {
      throw new LayoutChanged('Grades list has no rows linking to a criteria page', await this.snapshot('Navigating'));
    }

    const row = findClassRow(rows, classId);
    if (!row) {
      throw new LayoutChanged(
        `Class "${classId}" is not on the grades list (${rows.length} row(s) offered)`,
        await this.snapshot('Navigating'),
      );
    }

    logger.info(`Opening ${row.className} / ${row.subject}`);
    await this.navigate(new URL(row.href, this.page.url()).toString(), 'Navigating');
    await this.waitFor(`${SELECTORS.periodTabs}, ${SELECTORS.warning}`, 'Navigating');
    return { className: row.className, subject: row.subject };
  }

  // ── SelectingPeriod ────────────────────────────────────

  async selectPeriod(period: string): Promise<string> {
    const html = await this.page.content();
    if (hasEvaluationWarning(html)) {
      logger.warn('Criteria page asks for evaluation data to be configured; nothing to extract');
      this.notice = EVALUATION_WARNING;
      return '';
    }

    const tabs = parsePeriodTabs(html);
    const href = pickPeriodTab(period, tabs);
    if (!href) {
      throw new LayoutChanged('Criteria page has no period tabs', await this.snapshot('SelectingPeriod'));
    }

    const tab = await this.waitFor(`ul#pills-tab a[data-toggle="pill"][href="${href}"]`, 'SelectingPeriod');
    await tab.click();
    await this.waitFor(`${SELECTORS.tabContent} div.tab-pane${href}`, 'SelectingPeriod', true);

    this.activeTab = href;
    const label = tabs.find((t) => t.href === href)?.text ?? href;
    logger.debug(`Period ${period} → tab ${href} ("${label}")`);
    return label;
  }

  // ── ExtractingTable ────────────────────────────────────

  async readTable(): Promise<RawTable> {
    if (this.notice) return { headers: [], rows: [], notice: this.notice };
    if (!this.activeTab) {
      throw new LayoutChanged('No period tab is active', await this.snapshot('ExtractingTable'));
    }

    const table = await this.waitFor(
      `${SELECTORS.tabContent} div.tab-pane${this.activeTab} table`,
      'ExtractingTable',
    );
    const html = await table.evaluate((el) => el.outerHTML);
    return parsePortalTable(html);
  }

  // ── Diagnostics & cleanup ──────────────────────────────

  async snapshot(step: string): Promise<DiagnosticSnapshot> {
    return {
      step,
      url: this.page.url(),
      htmlExcerpt: (await this.page.content()).slice(0, SNAPSHOT_CHARS),
      capturedAt: new Date().toISOString(),
    };
  }

  async close(): Promise<void> {
    await this.opened.context.close();
  }

  // ── Internals ──────────────────────────────────────────

  private async navigate(url: string, step: string): Promise<void> {
    try {
      await this.limiter.schedule(url, () =>
        this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.options.stepTimeoutMs }),
      );
    } catch (err) {
      if (err instanceof TimeoutError) {
        throw new NavigationTimeout(`${step}: ${url} did not load within ${this.options.stepTimeoutMs} ms`, {
          cause: err,
        });
      }
      throw err;
    }
    if (step !== 'Authenticating') await this.assertSignedIn(step);
  }

  private async waitFor(selector: string, step: string, visible = false): Promise<ElementHandle<Element>> {
    let handle: ElementHandle<Element> | null;
    try {
      handle = await this.page.waitForSelector(selector, {
        timeout: this.options.stepTimeoutMs,
        visible,
      });
    } catch (err) {
      if (!(err instanceof TimeoutError)) throw err;
      if (step !== 'Authenticating') await this.assertSignedIn(step);
      throw new NavigationTimeout(
        `${step}: "${selector}" did not appear within ${this.options.stepTimeoutMs} ms`,
        { cause: err },
      );
    }
    if (!handle) {
      throw new NavigationTimeout(`${step}: "${selector}" detached before it could be used`);
    }
    return handle;
  }

  private async clickAndWait(selector: string, step: string): Promise<void> {
    const button = await this.waitFor(selector, step);
    try {
      await Promise.all([
        this.page.waitForNavigation({ waitUntil: 'domcontentloaded', timeout: this.options.stepTimeoutMs }),
        button.click(),
      ]);
    } catch (err) {
      if (err instanceof TimeoutError) {
        throw new NavigationTimeout(`${step}: no page load after clicking "${selector}"`, { cause: err });
      }
      throw err;
    }
  }

  private async chooseTeacherAccount(credential: Credential): Promise<void> {
    const buttons = await this.page.$$(SELECTORS.accountChoice);
    const teacher: Array<{ button: (typeof buttons)[number]; school: string }> = [];

    for (const button of buttons) {
      const text = await button.evaluate((el) => el.textContent ?? '');
      if (!TEACHER_ROLE.test(text)) continue;
      const school = await button.evaluate(
        (el) => el.closest('form')?.querySelector('small')?.textContent ?? '',
      );
      teacher.push({ button, school: school.replace(/\s+/g, ' ').trim() });
    }

    if (teacher.length === 0) return;

    const wanted = credential.school?.toLowerCase();
    const choice =
      (wanted ? teacher.find((t) => t.school.toLowerCase().includes(wanted)) : undefined) ?? teacher[0];
    if (teacher.length > 1) {
      logger.info(`Account has ${teacher.length} teacher roles; choosing "${choice.school || 'first'}"`);
    }

    try {
      await Promise.all([
        this.page.waitForNavigation({ waitUntil: 'domcontentloaded', timeout: this.options.stepTimeoutMs }),
        choice.button.click(),
      ]);
    } catch (err) {
      if (err instanceof TimeoutError) {
        throw new NavigationTimeout('Authenticating: no page load after choosing the teacher role', { cause: err });
      }
      throw err;
    }
  }

  /** Throw SessionExpired when the current page is the sign-in form. */
  private async assertSignedIn(step: string): Promise<void> {
    const url = this.page.url();
    if (url.includes('school=logout') || looksLikeLoginPage(await this.page.content())) {
      throw new SessionExpired(`${step}: portal redirected to the sign-in page (${url})`);
    }
  }
}
