/**
 * recordNormalizer.ts — Convert extracted table rows into typed grade and
 * attendance records.
 *
 * This is the last place untyped cell text exists.  Everything downstream
 * (the synthesizer, the result store) sees only `GradeRecord`,
 * `AttendanceRecord` and `RosterEntry` values.
 *
 * Rules:
 *   • Numeric grades must sit on the 2–5 scale; anything else is kept as an
 *     `invalid` value and the record is marked incomplete.
 *   • Letter grades and word forms (Russian and Kazakh) map onto the same scale.
 *   • Absence markers become attendance records.
 *   • A student is their roster number plus name.  A row repeating both
 *     keeps the first roster position; the later row's values win for the
 *     same column.  Namesakes with different numbers stay separate.
 *   • Rows with no resolvable student are dropped and reported to the caller.
 */

import tokens from './portalTokens.json';
import { Logger } from './logger';
import type {
  AttendanceRecord,
  AttendanceStatus,
  DetectedColumn,
  ExtractionResult,
  GradeRecord,
  GradeValue,
  NormalizedSheet,
  RosterEntry,
  SectionPoint,
  StudentRecord,
} from './types';

const logger = new Logger('Normalizer');

const GRADE_WORDS: Record<string, number> = tokens.gradeWords;
const GRADE_LETTERS: Record<string, number> = tokens.gradeLetters;
const ABSENCE_MARKERS: Record<string, string> = tokens.absenceMarkers;
const ROSTER_NOISE = new Set<string>(tokens.rosterNoise);
const TOTAL_PERCENT_TOKENS: string[] = tokens.headerTokens.totalPercent;

export const GRADE_SCALE = { min: 2, max: 5 } as const;

export interface NormalizeOptions {
  /** Period code the job asked for ("1".."4"). */
  period: string;
  /** Called once per dropped row with a human-readable reason. */
  onDroppedRow?: (position: number, reason: string) => void;
}

// ── Public API ─────────────────────────────────────────────

export function normalizeExtraction(
  extraction: ExtractionResult,
  options: NormalizeOptions,
): NormalizedSheet {
  const { context } = extraction;
  const studentColumn = extraction.columns.find((c) => c.kind === 'student');
  const numberColumn = extraction.columns.find((c) => c.kind === 'number');
  const gradeColumn = extraction.columns.find((c) => c.kind === 'periodGrade');
  const percentColumn = pickTotalPercent(extraction.columns);
  const dateColumns = extraction.columns.filter((c) => c.kind === 'date');

  const students = new Map<string, StudentAccumulator>();
  let droppedRows = 0;

  for (const row of extraction.rows) {
    const rawName = studentColumn ? cell(row.cells, studentColumn) : '';
    const studentName = collapse(rawName);
    const studentId = resolveStudentId(studentName, numberColumn ? cell(row.cells, numberColumn) : '');

    if (!studentId) {
      droppedRows++;
      const reason = studentName
        ? `"${studentName}" is not a student row`
        : 'no student name';
      logger.warn(`Dropping row ${row.position + 1}: ${reason}`);
      options.onDroppedRow?.(row.position, reason);
      continue;
    }

    let acc = students.get(studentId);
    if (!acc) {
      acc = {
        position: students.size,
        studentId,
        studentName,
        periodGrade: undefined,
        daily: new Map(),
        attendance: new Map(),
        totalPercent: undefined,
        points: new Map(),
        rowIncomplete: false,
      };
      students.set(studentId, acc);
    } else {
      logger.debug(`Row ${row.position + 1} repeats student "${studentName}", later values win`);
      acc.studentName = studentName;
    }

    // Rows with missing cells stay flagged even if a later duplicate is complete.
    acc.rowIncomplete = acc.rowIncomplete || row.incomplete;

    const base = {
      studentId,
      studentName,
      subject: context.subject,
      period: options.period,
    };

    if (gradeColumn) {
      const raw = collapse(cell(row.cells, gradeColumn));
      if (raw || row.incomplete) {
        acc.periodGrade = buildGrade(base, raw, undefined, row.cells.length <= gradeColumn.index);
      }
    }

    if (percentColumn) {
      const raw = collapse(cell(row.cells, percentColumn));
      if (raw) acc.totalPercent = raw;
    }

    for (const point of row.points ?? []) {
      if (point.value) acc.points.set(point.section, point);
    }

    for (const column of dateColumns) {
      if (!column.date) continue;
      const raw = collapse(cell(row.cells, column));
      if (!raw) {
        acc.daily.delete(column.date);
        acc.attendance.delete(column.date);
        continue;
      }

      const status = attendanceStatus(raw);
      if (status) {
        acc.daily.delete(column.date);
        acc.attendance.set(column.date, freeze<AttendanceRecord>({
          kind: 'attendance',
          ...base,
          date: column.date,
          status,
          marker: raw,
          incomplete: false,
        }));
      } else {
        acc.attendance.delete(column.date);
        acc.daily.set(column.date, buildGrade(base, raw, column.date, false));
      }
    }
  }

  const roster: RosterEntry[] = [];
  const records: StudentRecord[] = [];
  let incompleteCount = 0;

  for (const acc of students.values()) {
    const dailyGrades = [...acc.daily.values()].map((g) => withName(g, acc.studentName));
    const attendance = [...acc.attendance.values()].map((a) => withName(a, acc.studentName));
    const periodGrade = acc.periodGrade ? withName(acc.periodGrade, acc.studentName) : undefined;

    const incomplete =
      acc.rowIncomplete ||
      periodGrade?.incomplete === true ||
      dailyGrades.some((g) => g.incomplete);
    if (incomplete) incompleteCount++;

    roster.push(freeze<RosterEntry>({
      position: acc.position,
      studentId: acc.studentId,
      studentName: acc.studentName,
      periodGrade,
      dailyGrades: Object.freeze(dailyGrades),
      attendance: Object.freeze(attendance),
      totalPercent: acc.totalPercent,
      sectionPoints: Object.freeze([...acc.points.values()].sort((a, b) => a.section - b.section)),
      incomplete,
    }));

    if (periodGrade) records.push(periodGrade);
    records.push(...dailyGrades, ...attendance);
  }

  if (incompleteCount > 0) {
    logger.warn(
      `${incompleteCount} of ${roster.length} student(s) in ${context.className} ` +
        `(${context.subject}) have incomplete data`,
    );
  }

  return freeze<NormalizedSheet>({
    context,
    roster: Object.freeze(roster),
    records: Object.freeze(records),
    droppedRows,
    incompleteCount,
    sectionMax: Object.freeze([...(extraction.sectionMax ?? [])]),
  });
}

/**
 * Map a grade cell to a `GradeValue`.
 *
 * @example parseGradeToken('5')       // { kind: 'numeric', score: 5, raw: '5' }
 * @example parseGradeToken('хор')     // { kind: 'letter', letter: 'хор', score: 4, raw: 'хор' }
 * @example parseGradeToken('7')       // { kind: 'invalid', raw: '7' }
 */
export function parseGradeToken(raw: string): GradeValue {
  const text = collapse(raw);

  const numeric = text.match(/^(\d+)(?:[.,]0+)?$/);
  if (numeric) {
    const score = parseInt(numeric[1], 10);
    return score >= GRADE_SCALE.min && score <= GRADE_SCALE.max
      ? { kind: 'numeric', score, raw: text }
      : { kind: 'invalid', raw: text };
  }

  const letter = GRADE_LETTERS[text.toUpperCase()];
  if (letter !== undefined) {
    return { kind: 'letter', letter: text.toUpperCase(), score: letter, raw: text };
  }

  const word = GRADE_WORDS[text.toLowerCase().replace(/\.$/, '')];
  if (word !== undefined) {
    return { kind: 'letter', letter: text, score: word, raw: text };
  }

  return { kind: 'invalid', raw: text };
}

/** Absence marker → attendance status, or `undefined` for anything else. */
export function attendanceStatus(raw: string): AttendanceStatus | undefined {
  const status = ABSENCE_MARKERS[collapse(raw).toLowerCase()];
  return isAttendanceStatus(status) ? status : undefined;
}

/** Display form of a grade value inside a report cell. */
export function formatGrade(value: GradeValue): string {
  switch (value.kind) {
    case 'numeric':
      return String(value.score);
    case 'letter':
      return `${value.score} (${value.letter})`;
    case 'invalid':
      return value.raw;
  }
}

// ── Internals ──────────────────────────────────────────────

interface StudentAccumulator {
  position: number;
  studentId: string;
  studentName: string;
  periodGrade: GradeRecord | undefined;
  daily: Map<string, GradeRecord>;
  attendance: Map<string, AttendanceRecord>;
  totalPercent: string | undefined;
  points: Map<number, SectionPoint>;
  rowIncomplete: boolean;
}

interface RecordBase {
  studentId: string;
  studentName: string;
  subject: string;
  period: string;
}

function buildGrade(
  base: RecordBase,
  raw: string,
  date: string | undefined,
  cellMissing: boolean,
): GradeRecord {
  if (cellMissing || !raw) {
    return freeze<GradeRecord>({
      kind: 'grade',
      ...base,
      date,
      value: { kind: 'invalid', raw },
      incomplete: true,
      issue: 'missing grade cell',
    });
  }

  const value = parseGradeToken(raw);
  const incomplete = value.kind === 'invalid';
  return freeze<GradeRecord>({
    kind: 'grade',
    ...base,
    date,
    value,
    incomplete,
    issue: incomplete ? `"${raw}" is not a grade on the ${GRADE_SCALE.min}–${GRADE_SCALE.max} scale` : undefined,
  });
}

function resolveStudentId(name: string, numberCell: string): string | null {
  if (!name) return null;
  const key = name.toLowerCase();
  if (ROSTER_NOISE.has(key) || ROSTER_NOISE.has(key.replace(/:$/, ''))) return null;
  // Header rows repeated inside the body carry no roster number.
  const number = collapse(numberCell);
  if (number && !/^\d+\.?$/.test(number)) return null;
  const nameKey = key.replace(/ё/g, 'е');
  return number ? `${parseInt(number, 10)}:${nameKey}` : nameKey;
}

/** The term total among the percentage columns (ФО/СОР/СОЧ/Итог), else the last one. */
function pickTotalPercent(columns: readonly DetectedColumn[]): DetectedColumn | undefined {
  const percent = columns.filter((c) => c.kind === 'percent');
  const total = percent.find((c) => {
    const header = c.header.toLowerCase();
    return TOTAL_PERCENT_TOKENS.some((t) => header.includes(t));
  });
  return total ?? percent[percent.length - 1];
}

function withName<T extends StudentRecord>(record: T, studentName: string): T {
  return record.studentName === studentName ? record : freeze<T>({ ...record, studentName });
}

function isAttendanceStatus(value: string | undefined): value is AttendanceStatus {
  return value === 'absent' || value === 'sick' || value === 'excused';
}

function cell(cells: string[], column: DetectedColumn): string {
  return cells[column.index] ?? '';
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function freeze<T>(value: T): T {
  return Object.freeze(value);
}
