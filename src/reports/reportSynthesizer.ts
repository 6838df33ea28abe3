/**
 * reportSynthesizer.ts — NormalizedSheet + template → ReportArtifact.
 *
 * Rendering is a pure function of (sheet, template, locale, generatedAt):
 * scalar placeholders are filled once, the row region is expanded once per
 * roster entry in roster order, and the only time-dependent value is the
 * `{{generatedAt}}` line the template places.
 */

import tokens from '../core/portalTokens.json';
import { formatGrade } from '../core/recordNormalizer';
import type {
  Locale,
  NormalizedSheet,
  RenderedDocument,
  ReportArtifact,
  RosterEntry,
  SectionMax,
} from '../core/types';
import { writeDocument } from './documentWriters';
import { computeGradeStatistics, formatPercent, gradeBand, levelOf } from './gradeStatistics';
import type { Level } from './gradeStatistics';
import { fillPlaceholders } from './templateRegistry';
import type {
  ReportTemplate,
  RowPlaceholder,
  ScalarPlaceholder,
  TemplateRegistry,
} from './templateRegistry';

const PERIOD_LABELS: Record<Locale, Record<string, string>> = tokens.periodLabels;

interface ReportLabels {
  levels: Record<Level, string>;
  /** Unit summative, numbered: "СОР 1". */
  unitSection: string;
  /** Term summative, section 0. */
  termSection: string;
}

const REPORT_LABELS: Record<Locale, ReportLabels> = tokens.reportLabels;

export interface SynthesisContext {
  jobId: string;
  /** Period code the job asked for; labelled in the template's language. */
  period: string;
  /** ISO timestamp written into the document's generation field. */
  generatedAt: string;
}

export class ReportSynthesizer {
  constructor(private readonly templates: TemplateRegistry) {}

  /** Resolve the template (TemplateError if absent) and produce the artifact. */
  async synthesize(
    sheet: NormalizedSheet,
    templateId: string,
    locale: Locale,
    context: SynthesisContext,
  ): Promise<ReportArtifact> {
    const template = this.templates.resolve(templateId, locale);
    const document = renderDocument(sheet, template, context);
    const content = await writeDocument(document, template.format);

    return Object.freeze({
      id: `${context.jobId}:${template.id}:${locale}`,
      jobId: context.jobId,
      locale,
      templateId: template.id,
      templateVersion: template.version,
      format: template.format,
      fileName: artifactFileName(context.jobId, template.id, locale, template.format),
      generatedAt: context.generatedAt,
      document,
      content,
    });
  }
}

/** `<jobId>-<templateId>-<locale>.<ext>` */
export function artifactFileName(
  jobId: string,
  templateId: string,
  locale: Locale,
  extension: string,
): string {
  return `${jobId}-${templateId}-${locale}.${extension}`;
}

export function renderDocument(
  sheet: NormalizedSheet,
  template: ReportTemplate,
  context: SynthesisContext,
): RenderedDocument {
  const labels = REPORT_LABELS[template.locale];
  const scalars = scalarValues(sheet, template.locale, context);
  const line = ([label, value]: [string, string]) => ({
    label: fillPlaceholders(label, scalars),
    value: fillPlaceholders(value, scalars),
  });

  const columns = template.rowRegion.columns;
  return {
    title: fillPlaceholders(template.title, scalars),
    header: template.header.map(line),
    columns: columns.map((c) => c.label),
    rows: sheet.roster.map((entry) => {
      const values = rowValues(entry, sheet.sectionMax, labels, template.incompleteMarker);
      return {
        cells: columns.map((c) => fillPlaceholders(c.value, values)),
        flagged: entry.incomplete,
      };
    }),
    footer: template.footer.map(line),
    generatedAt: context.generatedAt,
  };
}

// ── Internals ──────────────────────────────────────────────

function scalarValues(
  sheet: NormalizedSheet,
  locale: Locale,
  context: SynthesisContext,
): Record<ScalarPlaceholder, string> {
  const { context: classContext } = sheet;
  const stats = computeGradeStatistics(sheet.roster);
  const labels = REPORT_LABELS[locale];
  return {
    school: classContext.schoolName,
    className: classContext.className,
    subject: classContext.subject,
    period: PERIOD_LABELS[locale][context.period] ?? classContext.periodLabel,
    teacher: classContext.teacherName,
    studentCount: String(sheet.roster.length),
    generatedAt: context.generatedAt,
    count5: String(stats.counts[5]),
    count4: String(stats.counts[4]),
    count3: String(stats.counts[3]),
    count2: String(stats.counts[2]),
    qualityPercent: formatPercent(stats.qualityPercent),
    successPercent: formatPercent(stats.successPercent),
    sectionMax: bySection(sheet.sectionMax)
      .map((s) => `${sectionLabel(s.section, labels)}: ${s.max}`)
      .join('; '),
  };
}

function rowValues(
  entry: RosterEntry,
  sectionMax: readonly SectionMax[],
  labels: ReportLabels,
  incompleteMarker: string,
): Record<RowPlaceholder, string> {
  const grade = entry.periodGrade?.value;
  const level = levelOf(gradeBand(entry));
  const maxOf = new Map(sectionMax.map((s) => [s.section, s.max]));

  return {
    position: String(entry.position + 1),
    studentName: entry.studentName,
    grade: grade ? formatGrade(grade) : '',
    gradeScore: grade && grade.kind !== 'invalid' ? String(grade.score) : '',
    absences: String(entry.attendance.length),
    totalPercent: entry.totalPercent ?? '',
    level: level ? labels.levels[level] : '',
    sectionPoints: bySection(entry.sectionPoints)
      .map((p) => {
        const max = maxOf.get(p.section);
        return `${sectionLabel(p.section, labels)}: ${p.value}${max === undefined ? '' : `/${max}`}`;
      })
      .join('; '),
    flag: entry.incomplete ? incompleteMarker : '',
  };
}

/** Unit sections in number order, the term section last. */
function bySection<T extends { section: number }>(items: readonly T[]): T[] {
  const rank = (section: number) => (section === 0 ? Number.MAX_SAFE_INTEGER : section);
  return [...items].sort((a, b) => rank(a.section) - rank(b.section));
}

function sectionLabel(section: number, labels: ReportLabels): string {
  return section === 0 ? labels.termSection : `${labels.unitSection} ${section}`;
}
