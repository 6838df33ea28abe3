/**
 * portalMarkup.ts — Cheerio readers for the portal's pages.
 *
 * The browser driver only clicks and waits; everything that reads markup
 * lives here as pure functions over an HTML string, so the selectors can be
 * exercised without a browser.
 */

import * as cheerio from 'cheerio';
import tokens from '../core/portalTokens.json';
import type { RawTable, SectionMax, SectionPoint } from '../core/types';

const PERIOD_LABELS: Record<string, string> = tokens.periodLabels.ru;
/** Stems of "half-year" in both interface languages. */
const HALF_YEAR_TOKENS: string[] = tokens.halfYearTokens;

export const EVALUATION_WARNING = 'Для начала работы необходимо установить данные оценивания!';

export const SELECTORS = {
  loginToggle: 'button[aria-controls="collapseThree"]',
  loginPanel: '#collapseThree.show',
  loginInput: 'input[name="usr_login"]',
  passwordInput: 'input[name="usr_password"]',
  profileName: 'nav .profile p',
  orgName: '.topline .orgname strong',
  gradesList: 'table.table.table-hover',
  classLink: 'a[href*="action=semester2"]',
  periodTabs: "ul#pills-tab a[data-toggle='pill']",
  tabContent: 'div#pills-tabContent',
  warning: 'div.alert.alert-warning',
  accountChoice: 'button[name="account_choice"][value="true"]',
  loginSubmit: "#collapseThree form button[type='submit'], #collapseThree form input[type='submit']",
} as const;

// ── Signed-in chrome ───────────────────────────────────────

/** Teacher and school names from the page header, or `null` when not signed in. */
export function parseProfile(html: string): { teacherName: string; schoolName: string } | null {
  const $ = cheerio.load(html);
  const profile = $(SELECTORS.profileName).first();
  if (profile.length === 0) return null;

  // "<p>Иванова<br>Анна</p>"
  profile.find('br').replaceWith(' ');
  return {
    teacherName: collapse(profile.text()),
    schoolName: collapse($(SELECTORS.orgName).first().text()),
  };
}

// ── Grades list ────────────────────────────────────────────

/** One openable row of the "Оценки" (grades) list. */
export interface ClassRow {
  /** 1-based position in the list. */
  index: number;
  className: string;
  subject: string;
  href: string;
}

/** Rows of the grades list that link to a criteria page. */
export function parseGradesList(html: string): ClassRow[] {
  const $ = cheerio.load(html);
  const rows: ClassRow[] = [];

  $(SELECTORS.gradesList).first().find('tbody tr').each((i, tr) => {
    const href = $(tr).find(SELECTORS.classLink).first().attr('href')?.trim();
    if (!href) return;

    const cells = $(tr).find('td');
    const classCell = collapse(cells.eq(0).text());
    const subjectCell = cells.eq(1);

    // The subject cell carries extra muted text ("Обновленное содержание").
    let subject = collapse(subjectCell.find('strong').first().text());
    if (!subject) {
      const muted = collapse(subjectCell.find('div.text-muted').first().text());
      subject = collapse(subjectCell.text());
      if (muted) subject = collapse(subject.replace(muted, ''));
    }

    rows.push({ index: i + 1, className: parseClassLabel(classCell), subject, href });
  });

  return rows;
}

/**
 * Find the row a job asked for.  `classId` is matched against the query
 * parameter values of the row's link first, then against its 1-based index.
 */
export function findClassRow(rows: ClassRow[], classId: string): ClassRow | undefined {
  const byParam = rows.find((row) => queryValues(row.href).includes(classId));
  if (byParam) return byParam;

  if (/^\d+$/.test(classId)) {
    const index = parseInt(classId, 10);
    return rows.find((row) => row.index === index);
  }
  return undefined;
}

/** "5 «В»" → "5В", "10 А" → "10А". */
export function parseClassLabel(text: string): string {
  const cleaned = text.replace(/[«»"]/g, ' ').trim();
  const match = cleaned.match(/(\d+)\s*([A-Za-zА-ЯЁӘҒҚҢӨҰҮҺа-яёәғқңөұүһ])?/u);
  if (!match) return collapse(text);
  return `${match[1]}${(match[2] ?? '').toUpperCase()}`;
}

// ── Criteria page ──────────────────────────────────────────

export interface PeriodTab {
  href: string;
  text: string;
}

export function parsePeriodTabs(html: string): PeriodTab[] {
  const $ = cheerio.load(html);
  return $(SELECTORS.periodTabs)
    .toArray()
    .map((a) => ({
      href: ($(a).attr('href') ?? '').trim(),
      text: collapse($(a).text()),
    }))
    .filter((tab) => tab.href.startsWith('#'));
}

/**
 * Map a period code to one of the tabs the page offers.
 *
 * Order: the quarter tab itself; for period 2 the first half-year tab, for
 * period 4 the second half-year tab; a tab mentioning the quarter number;
 * finally the first tab.  Returns `null` only when there are no tabs.
 */
export function pickPeriodTab(period: string, tabs: PeriodTab[]): string | null {
  const hrefs = new Set(tabs.map((t) => t.href));

  if (['1', '2', '3', '4'].includes(period)) {
    const direct = `#chetvert_${period}`;
    if (hrefs.has(direct)) return direct;
  }

  const halfYear = period === '2' ? '1' : period === '4' ? '2' : null;
  if (halfYear) {
    const half = tabs.find((t) => {
      const text = t.text.toLowerCase();
      return HALF_YEAR_TOKENS.some((token) => text.includes(`${halfYear} ${token}`));
    });
    if (half) return half.href;
  }

  const desiredNum = (PERIOD_LABELS[period] ?? '').split(' ')[0];
  if (desiredNum) {
    const numbered = tabs.find((t) => t.text.includes(desiredNum));
    if (numbered) return numbered.href;
  }

  return tabs.length > 0 ? tabs[0].href : null;
}

export function hasEvaluationWarning(html: string): boolean {
  const $ = cheerio.load(html);
  return $(SELECTORS.warning)
    .toArray()
    .some((el) => $(el).text().includes(EVALUATION_WARNING));
}

/** The sign-in form is on the page: the portal dropped the session. */
export function looksLikeLoginPage(html: string): boolean {
  const $ = cheerio.load(html);
  return $(SELECTORS.passwordInput).length > 0 && $(SELECTORS.profileName).length === 0;
}

/** `chetvert_<q>_razdel_<k>_max` in the header, `chetvert_<q>_razdel_<k>_<row>` in the body. */
const SECTION_INPUT = /^chetvert_\d+_razdel_(\d+)_(max|\d+)$/;

/**
 * Read a tab pane's first table verbatim: header cells of the last header
 * row, then every body row with at least one `td`.  A cell holding only an
 * input reads as the input's value.  Section point inputs are collected
 * separately, with the section maxima from the header.
 */
export function parsePortalTable(html: string): RawTable {
  const $ = cheerio.load(html);
  const table = $('table').first();
  if (table.length === 0) return { headers: [], rows: [] };

  const sectionMax: SectionMax[] = [];
  table.find('input').each((_, input) => {
    const match = ($(input).attr('id') ?? '').match(SECTION_INPUT);
    if (!match || match[2] !== 'max') return;
    const max = parseFloat(($(input).attr('value') ?? '').replace(',', '.'));
    if (!Number.isNaN(max)) sectionMax.push({ section: parseInt(match[1], 10), max });
  });

  const headerRows = table.find('thead tr');
  const headerRow = headerRows.length > 0 ? headerRows.last() : table.find('tr').has('th').first();
  const headers = headerRow
    .find('th, td')
    .toArray()
    .map((cell) => collapse($(cell).text()));

  const bodyRows = table.find('tbody tr').length > 0 ? table.find('tbody tr') : table.find('tr');
  const rows: string[][] = [];
  const points: SectionPoint[][] = [];
  bodyRows.each((_, tr) => {
    const cells = $(tr).find('td');
    if (cells.length === 0) return;
    rows.push(
      cells.toArray().map((cell) => {
        const text = collapse($(cell).text());
        return text || collapse($(cell).find('input').first().attr('value') ?? '');
      }),
    );

    const rowPoints: SectionPoint[] = [];
    $(tr).find('input').each((_, input) => {
      const match = ($(input).attr('id') ?? '').match(SECTION_INPUT);
      if (!match || match[2] === 'max') return;
      rowPoints.push({ section: parseInt(match[1], 10), value: collapse($(input).attr('value') ?? '') });
    });
    points.push(rowPoints);
  });

  const result: RawTable = { headers, rows };
  if (sectionMax.length > 0) result.sectionMax = sectionMax.sort((a, b) => a.section - b.section);
  if (points.some((p) => p.length > 0)) result.points = points;
  return result;
}

// ── Internals ──────────────────────────────────────────────

function queryValues(href: string): string[] {
  const query = href.split('?')[1] ?? '';
  return query
    .split('&')
    .map((pair) => decodeURIComponent(pair.split('=')[1] ?? ''))
    .filter(Boolean);
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
