/**
 * dateNormalizer.ts — Turn the portal's column headers into calendar dates.
 *
 * Daily-mark columns on the portal carry the day without a year, in whichever
 * interface language the session is using:
 *
 *   "12.09"        — day.month
 *   "12.09.2025"   — day.month.year
 *   "12 сент"      — Russian month abbreviation
 *   "3 қаз"        — Kazakh month abbreviation
 *
 * Years are resolved against the academic year: September–December belong to
 * the year the school year started, January–August to the following one.
 */

import { DateTime } from 'luxon';
import tokens from './portalTokens.json';

const MONTH_PREFIXES: Record<string, number> = tokens.monthPrefixes;

// ── Public API ─────────────────────────────────────────────

/**
 * Calendar year in which the school year containing `refDate` started.
 *
 * @example academicYearStart(DateTime.fromISO('2026-02-10')) === 2025
 */
export function academicYearStart(refDate: DateTime): number {
  return refDate.month >= 9 ? refDate.year : refDate.year - 1;
}

/**
 * Parse a header cell into an ISO date (yyyy-MM-dd), or `null` when the cell
 * is not a date.
 *
 * @param startYear - First calendar year of the academic year being scraped.
 */
export function parseColumnDate(raw: string, startYear: number): string | null {
  const text = raw.replace(/\s+/g, ' ').trim().toLowerCase();
  if (!text) return null;

  const numeric = text.match(/^(\d{1,2})\.(\d{1,2})(?:\.(\d{2}|\d{4}))?$/);
  if (numeric) {
    const day = parseInt(numeric[1], 10);
    const month = parseInt(numeric[2], 10);
    const year = numeric[3] ? expandYear(numeric[3]) : yearForMonth(month, startYear);
    return toIsoDate(year, month, day);
  }

  const worded = text.match(/^(\d{1,2})\s+([^\s\d.]+)\.?$/u);
  if (worded) {
    const month = monthFromWord(worded[2]);
    if (month === null) return null;
    const day = parseInt(worded[1], 10);
    return toIsoDate(yearForMonth(month, startYear), month, day);
  }

  return null;
}

/** Resolve a Russian or Kazakh month word ("сентября", "қыркүйек") to 1–12. */
export function monthFromWord(word: string): number | null {
  const prefix = word.trim().toLowerCase().slice(0, 3);
  return MONTH_PREFIXES[prefix] ?? null;
}

// ── Internals ──────────────────────────────────────────────

function yearForMonth(month: number, startYear: number): number {
  return month >= 9 ? startYear : startYear + 1;
}

function expandYear(raw: string): number {
  const year = parseInt(raw, 10);
  return raw.length === 2 ? 2000 + year : year;
}

function toIsoDate(year: number, month: number, day: number): string | null {
  const date = DateTime.fromObject({ year, month, day }, { zone: 'utc' });
  return date.isValid ? date.toISODate() : null;
}
