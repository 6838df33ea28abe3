/**
 * gradeStatistics.ts — Class summary figures printed on the reports.
 *
 * Each student falls into one grade band on the 2–5 scale: their period
 * grade when it is valid, otherwise the band of their total percentage
 * (85 / 65 / 40 thresholds).  Students with neither are counted as unrated.
 *
 *   quality  = (5s + 4s) / students × 100
 *   success  = (5s + 4s + 3s) / students × 100
 *
 * Unrated students stay in the denominator.
 */

import type { RosterEntry } from '../core/types';

export type GradeBand = 5 | 4 | 3 | 2;
export type Level = 'high' | 'medium' | 'low';

export interface GradeStatistics {
  students: number;
  counts: Record<GradeBand, number>;
  unrated: number;
  qualityPercent: number;
  successPercent: number;
}

const PERCENT_BANDS: ReadonlyArray<{ min: number; band: GradeBand }> = [
  { min: 85, band: 5 },
  { min: 65, band: 4 },
  { min: 40, band: 3 },
];

export function gradeBand(entry: RosterEntry): GradeBand | undefined {
  const value = entry.periodGrade?.value;
  if (value && value.kind !== 'invalid') return toBand(value.score);

  const percent = parsePercent(entry.totalPercent);
  if (percent === undefined) return undefined;
  return PERCENT_BANDS.find((b) => percent >= b.min)?.band ?? 2;
}

/** 5 is high, 4 and 3 are medium, 2 is low. */
export function levelOf(band: GradeBand | undefined): Level | undefined {
  if (band === undefined) return undefined;
  if (band === 5) return 'high';
  return band === 2 ? 'low' : 'medium';
}

export function computeGradeStatistics(roster: readonly RosterEntry[]): GradeStatistics {
  const counts: Record<GradeBand, number> = { 5: 0, 4: 0, 3: 0, 2: 0 };
  let unrated = 0;

  for (const entry of roster) {
    const band = gradeBand(entry);
    if (band === undefined) unrated++;
    else counts[band]++;
  }

  const students = roster.length;
  const share = (n: number) => (students > 0 ? (n / students) * 100 : 0);
  return {
    students,
    counts,
    unrated,
    qualityPercent: share(counts[5] + counts[4]),
    successPercent: share(counts[5] + counts[4] + counts[3]),
  };
}

/** Two decimals at most: 66.666… → "66.67", 100 → "100". */
export function formatPercent(value: number): string {
  return String(Math.round(value * 100) / 100);
}

/** "92%", "92,5 %" → 92 / 92.5; anything else → undefined. */
export function parsePercent(text: string | undefined): number | undefined {
  const match = text?.match(/^(\d+(?:[.,]\d+)?)\s*%?$/);
  return match ? parseFloat(match[1].replace(',', '.')) : undefined;
}

function toBand(score: number): GradeBand {
  if (score >= 5) return 5;
  if (score === 4) return 4;
  return score === 3 ? 3 : 2;
}
