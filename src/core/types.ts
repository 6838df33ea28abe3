/**
 * types.ts — Shared type definitions for the scrape-and-report pipeline.
 *
 * Every layer (session manager, state machine, normalizer, synthesizer,
 * orchestrator, result store) agrees on the shapes declared here.
 */

import type { DiagnosticSnapshot, ErrorKind } from './errors';

// ─── Credentials ───────────────────────────────────────────

/** A portal login.  Owned by the caller; the pipeline never mutates it. */
export interface Credential {
  /** Stable reference used in fingerprints and history queries. */
  ref: string;
  username: string;
  secret: string;
  /** School to pick when the account works at several (matched against the school label). */
  school?: string;
}

/** Resolves a credential reference to the login itself. */
export interface CredentialProvider {
  resolve(ref: string): Promise<Credential | undefined>;
}

// ─── Jobs ──────────────────────────────────────────────────

export type Locale = 'ru' | 'kk';

export const LOCALES: readonly Locale[] = ['ru', 'kk'];

export function isLocale(value: string): value is Locale {
  return value === 'ru' || value === 'kk';
}

/** What the web layer submits. */
export interface JobSpec {
  schoolId: string;
  /** Portal identifier of the class/subject row on the grades list. */
  classId: string;
  /** Reporting period code: "1".."4" (quarters; 2 and 4 double as half-years). */
  period: string;
  credentialRef: string;
  /** Report language.  Defaults to the configured locale. */
  locale?: string;
  /** Templates to render.  Defaults to the configured list. */
  templates?: string[];
}

export type JobStatus =
  | 'Queued'
  | 'Running'
  | 'Retrying'
  | 'Completed'
  | 'Failed'
  | 'Cancelled';

export const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>([
  'Completed',
  'Failed',
  'Cancelled',
]);

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/** What a caller sees about a failure — never raw internal state. */
export interface JobErrorInfo {
  kind: ErrorKind;
  message: string;
  diagnosticRef?: string;
}

export interface ScrapeJob {
  id: string;
  fingerprint: string;
  spec: JobSpec;
  status: JobStatus;
  attempt: number;
  createdAt: string;
  updatedAt: string;
  cancelRequested: boolean;
  error?: JobErrorInfo;
}

// ─── Extraction ────────────────────────────────────────────

/** Header cells and body rows exactly as the portal rendered them. */
export interface RawTable {
  headers: string[];
  rows: string[][];
  /** Set when the portal showed a notice instead of data. */
  notice?: string;
  /** Maximum points per assessment section, from the header inputs. */
  sectionMax?: SectionMax[];
  /** Section points per body row, aligned with `rows`. */
  points?: SectionPoint[][];
}

/**
 * Assessment sections of a term: 1..n are the summative assessments for a
 * unit (СОР / БЖБ), 0 is the summative assessment for the term (СОЧ / ТЖБ).
 */
export interface SectionMax {
  section: number;
  max: number;
}

export interface SectionPoint {
  section: number;
  /** Cell text as entered, e.g. "8" or "". */
  value: string;
}

/** What the grades list tells us about the class we opened. */
export interface ClassContext {
  className: string;
  subject: string;
  schoolName: string;
  teacherName: string;
  /** Label of the period tab actually selected. */
  periodLabel: string;
}

export type ColumnKind =
  | 'number'
  | 'student'
  | 'date'
  | 'periodGrade'
  | 'percent'
  | 'other';

export interface DetectedColumn {
  index: number;
  header: string;
  kind: ColumnKind;
  /** ISO date for `date` columns. */
  date?: string;
}

export interface ExtractedRow {
  /** 0-based position in the portal table. */
  position: number;
  cells: string[];
  /** Row had fewer cells than the header. */
  incomplete: boolean;
  points?: SectionPoint[];
}

export interface ExtractionResult {
  columns: DetectedColumn[];
  rows: ExtractedRow[];
  context: ClassContext;
  notice?: string;
  sectionMax?: SectionMax[];
}

// ─── Normalised records ────────────────────────────────────

export type GradeValue =
  | { kind: 'numeric'; score: number; raw: string }
  | { kind: 'letter'; letter: string; score: number; raw: string }
  | { kind: 'invalid'; raw: string };

export type AttendanceStatus = 'absent' | 'sick' | 'excused';

export interface GradeRecord {
  readonly kind: 'grade';
  readonly studentId: string;
  readonly studentName: string;
  readonly subject: string;
  readonly period: string;
  /** ISO date for daily marks; absent for the period grade. */
  readonly date?: string;
  readonly value: GradeValue;
  readonly incomplete: boolean;
  readonly issue?: string;
}

export interface AttendanceRecord {
  readonly kind: 'attendance';
  readonly studentId: string;
  readonly studentName: string;
  readonly subject: string;
  readonly period: string;
  readonly date: string;
  readonly status: AttendanceStatus;
  readonly marker: string;
  readonly incomplete: boolean;
}

export type StudentRecord = GradeRecord | AttendanceRecord;

/** One student in roster order with their records. */
export interface RosterEntry {
  readonly position: number;
  readonly studentId: string;
  readonly studentName: string;
  readonly periodGrade?: GradeRecord;
  readonly dailyGrades: readonly GradeRecord[];
  readonly attendance: readonly AttendanceRecord[];
  /** Raw text of the "total %" column, if present. */
  readonly totalPercent?: string;
  /** Filled-in section points, ordered by section. */
  readonly sectionPoints: readonly SectionPoint[];
  readonly incomplete: boolean;
}

export interface NormalizedSheet {
  readonly context: ClassContext;
  readonly roster: readonly RosterEntry[];
  readonly records: readonly StudentRecord[];
  readonly droppedRows: number;
  readonly incompleteCount: number;
  readonly sectionMax: readonly SectionMax[];
}

// ─── Reports ───────────────────────────────────────────────

export type ReportFormat = 'xlsx' | 'docx';

export interface RenderedLine {
  label: string;
  value: string;
}

export interface RenderedRow {
  cells: string[];
  flagged: boolean;
}

/** Format-independent content of a report. */
export interface RenderedDocument {
  title: string;
  header: RenderedLine[];
  columns: string[];
  rows: RenderedRow[];
  footer: RenderedLine[];
  /** The only time-dependent value in the document. */
  generatedAt: string;
}

export interface ReportArtifact {
  readonly id: string;
  readonly jobId: string;
  readonly locale: Locale;
  readonly templateId: string;
  readonly templateVersion: number;
  readonly format: ReportFormat;
  readonly fileName: string;
  readonly generatedAt: string;
  readonly document: RenderedDocument;
  readonly content: Buffer;
}

/** What the result store keeps about a written artifact. */
export interface ArtifactRef {
  id: string;
  jobId: string;
  locale: Locale;
  templateId: string;
  format: ReportFormat;
  path: string;
}

// ─── Job log ───────────────────────────────────────────────

export type JobEvent =
  | { type: 'submitted'; at: string; jobId: string; fingerprint: string; spec: JobSpec }
  | { type: 'status'; at: string; status: JobStatus; attempt: number }
  | { type: 'state'; at: string; from: string; to: string; attempt: number }
  | { type: 'retry-scheduled'; at: string; attempt: number; delayMs: number; error: JobErrorInfo }
  | { type: 'error'; at: string; attempt: number; error: JobErrorInfo }
  | { type: 'recovered'; at: string; attempt: number; error: JobErrorInfo }
  | { type: 'artifact'; at: string; artifact: ArtifactRef }
  | { type: 'cancel-requested'; at: string }
  | { type: 'note'; at: string; level: 'info' | 'warn'; message: string };

export interface JobView {
  job: ScrapeJob;
  artifacts: ArtifactRef[];
  log: JobEvent[];
}

export interface JobQuery {
  schoolId?: string;
  credentialRef?: string;
  /** Inclusive ISO lower bound on createdAt. */
  from?: string;
  /** Exclusive ISO upper bound on createdAt. */
  to?: string;
}

export type { DiagnosticSnapshot };
