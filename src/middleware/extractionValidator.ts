/**
 * extractionValidator.ts — Structural check of a raw portal table.
 *
 * Runs in the state machine's Parsing step.  It never types cell values
 * (that is the normalizer's job); it only answers two questions:
 *
 *   1. Do the headers look like a grade journal?  A student column plus at
 *      least one dated or period-grade column is required.  Anything else
 *      means the portal markup changed and the job fails with LayoutChanged.
 *   2. Are the rows consistent with the header?  Rows shorter than the
 *      header are kept and flagged `incomplete`; they are never dropped here.
 */

import tokens from '../core/portalTokens.json';
import { parseColumnDate } from '../core/dateNormalizer';
import { LayoutChanged } from '../core/errors';
import type { DiagnosticSnapshot } from '../core/errors';
import { Logger } from '../core/logger';
import type {
  ClassContext,
  ColumnKind,
  DetectedColumn,
  ExtractedRow,
  ExtractionResult,
  RawTable,
} from '../core/types';

const logger = new Logger('ExtractionValidator');

const NUMBER_TOKENS = new Set<string>(tokens.headerTokens.number);
const STUDENT_TOKENS: string[] = tokens.headerTokens.student;
const GRADE_TOKENS: string[] = tokens.headerTokens.periodGrade;
const PERCENT_TOKENS: string[] = tokens.headerTokens.percent;

export interface ValidateOptions {
  /** First calendar year of the academic year, for dated headers. */
  startYear: number;
  /** Page state to attach if the table is rejected. */
  snapshot?: DiagnosticSnapshot;
}

/**
 * Turn a verbatim table into an `ExtractionResult`, or throw `LayoutChanged`.
 *
 * A table carrying a portal notice and no headers (the "evaluation data not
 * configured" page) is a valid, empty extraction.
 */
export function validateExtraction(
  table: RawTable,
  context: ClassContext,
  options: ValidateOptions,
): ExtractionResult {
  if (table.notice && table.headers.length === 0) {
    logger.warn(`Portal notice instead of a table: "${table.notice}"`);
    return { columns: [], rows: [], context, notice: table.notice };
  }

  const columns = detectColumns(table.headers, options.startYear);

  // ── Check 1: Header recognition ──────────────────────────
  const headerProblem = checkHeaders(columns);
  if (headerProblem) {
    logger.error(`Header check failed: ${headerProblem}`);
    throw new LayoutChanged(
      `Unrecognised grade table (${headerProblem}); headers: ${JSON.stringify(table.headers)}`,
      options.snapshot,
    );
  }

  // ── Check 2: Row length consistency ──────────────────────
  const width = table.headers.length;
  const rows: ExtractedRow[] = table.rows.map((cells, position) => {
    const row: ExtractedRow = {
      position,
      cells: cells.map((c) => c.replace(/\s+/g, ' ').trim()),
      incomplete: cells.length < width,
    };
    const points = table.points?.[position];
    if (points && points.length > 0) row.points = points;
    return row;
  });

  const short = rows.filter((r) => r.incomplete).length;
  if (short > 0) {
    logger.warn(`${short} of ${rows.length} row(s) are shorter than the ${width}-column header`);
  }

  const dated = columns.filter((c) => c.kind === 'date').length;
  logger.info(
    `Table accepted: ${rows.length} row(s), ${dated} dated column(s)` +
      (columns.some((c) => c.kind === 'periodGrade') ? ', period grade present' : ''),
  );

  const result: ExtractionResult = { columns, rows, context, notice: table.notice };
  if (table.sectionMax && table.sectionMax.length > 0) result.sectionMax = table.sectionMax;
  return result;
}

/** Classify every header cell. */
export function detectColumns(headers: string[], startYear: number): DetectedColumn[] {
  return headers.map((raw, index) => {
    const header = raw.replace(/\s+/g, ' ').trim();
    const date = parseColumnDate(header, startYear);
    if (date) return { index, header, kind: 'date', date };
    return { index, header, kind: classifyHeader(header) };
  });
}

// ─── Individual checks ─────────────────────────────────────

function classifyHeader(header: string): ColumnKind {
  const text = header.toLowerCase();
  if (!text) return 'other';
  if (NUMBER_TOKENS.has(text)) return 'number';
  if (text.includes('%') || PERCENT_TOKENS.some((t) => text === t)) return 'percent';
  if (STUDENT_TOKENS.some((t) => text.includes(t))) return 'student';
  if (GRADE_TOKENS.some((t) => text === t || text.startsWith(`${t} `))) return 'periodGrade';
  return 'other';
}

/** Returns a description of what is missing, or `null` when the header is usable. */
function checkHeaders(columns: DetectedColumn[]): string | null {
  if (columns.length === 0) return 'no header row';

  const students = columns.filter((c) => c.kind === 'student').length;
  if (students === 0) return 'no student column';
  if (students > 1) return `${students} student columns`;

  const gradeLike = columns.some((c) => c.kind === 'date' || c.kind === 'periodGrade');
  if (!gradeLike) return 'no dated or period-grade column';

  return null;
}
