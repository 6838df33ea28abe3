/**
 * templateRegistry.ts — Locale-specific report templates, validated on load.
 *
 * A template is a JSON file named `<templateId>.<locale>.json`:
 *
 *   {
 *     "id": "grades-sheet", "version": 1, "schema": 2,
 *     "locale": "ru", "format": "xlsx",
 *     "title": "Успеваемость: {{subject}}",
 *     "placeholders": ["school", "className", …],
 *     "header": [["Школа", "{{school}}"], …],
 *     "rowRegion": { "columns": [{ "label": "№", "value": "{{position}}" }, …] },
 *     "footer": [["Сформировано", "{{generatedAt}}"]],
 *     "incompleteMarker": "неполные данные"
 *   }
 *
 * Scalar placeholders are fixed per schema version (`schema` 1 or 2).  A template that does not
 * declare all of them, or uses one it did not declare, is rejected.  A broken
 * file does not stop the registry from loading; asking for it does.
 */

import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { TemplateError } from '../core/errors';
import { Logger } from '../core/logger';
import { isLocale, LOCALES } from '../core/types';
import type { Locale } from '../core/types';

const logger = new Logger('TemplateRegistry');

export const SCALAR_PLACEHOLDERS_V1 = [
  'school',
  'className',
  'subject',
  'period',
  'teacher',
  'studentCount',
  'generatedAt',
] as const;

/** v2 adds the class summary: grade counts, quality and success rates, section maxima. */
export const SCALAR_PLACEHOLDERS_V2 = [
  ...SCALAR_PLACEHOLDERS_V1,
  'count5',
  'count4',
  'count3',
  'count2',
  'qualityPercent',
  'successPercent',
  'sectionMax',
] as const;

export const ROW_PLACEHOLDERS = [
  'position',
  'studentName',
  'grade',
  'gradeScore',
  'absences',
  'totalPercent',
  'level',
  'sectionPoints',
  'flag',
] as const;

export type ScalarPlaceholder = (typeof SCALAR_PLACEHOLDERS_V2)[number];
export type RowPlaceholder = (typeof ROW_PLACEHOLDERS)[number];

const SCALARS_BY_SCHEMA: Record<1 | 2, readonly ScalarPlaceholder[]> = {
  1: SCALAR_PLACEHOLDERS_V1,
  2: SCALAR_PLACEHOLDERS_V2,
};

/** The scalar that carries the generation time; allowed exactly once. */
export const TIMESTAMP_PLACEHOLDER: ScalarPlaceholder = 'generatedAt';

const PLACEHOLDER_PATTERN = /\{\{\s*([A-Za-z][A-Za-z0-9_]*)\s*\}\}/g;

// ── Schema ─────────────────────────────────────────────────

const lineSchema = z.tuple([z.string(), z.string()]);

const templateSchema = z
  .object({
    id: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'lowercase letters, digits and dashes'),
    version: z.number().int().positive(),
    schema: z.union([z.literal(1), z.literal(2)]),
    locale: z.enum(['ru', 'kk']),
    format: z.enum(['xlsx', 'docx']),
    title: z.string().min(1),
    placeholders: z.array(z.string()),
    header: z.array(lineSchema),
    rowRegion: z
      .object({
        columns: z
          .array(z.object({ label: z.string(), value: z.string() }).strict())
          .min(1),
      })
      .strict(),
    footer: z.array(lineSchema),
    incompleteMarker: z.string().min(1),
  })
  .strict();

export type ReportTemplate = z.infer<typeof templateSchema>;

// ── Registry ───────────────────────────────────────────────

export class TemplateRegistry {
  private readonly entries = new Map<string, ReportTemplate | TemplateError>();

  /**
   * @param definitions - Parsed template JSON, in any order.  Each is
   *   validated here; failures are kept and reported on `resolve`.
   */
  constructor(definitions: unknown[] = []) {
    for (const definition of definitions) {
      this.add(definition);
    }
  }

  /** Load every `<id>.<locale>.json` file in `dir`. */
  static async fromDirectory(dir: string): Promise<TemplateRegistry> {
    const registry = new TemplateRegistry();
    const files = (await readdir(dir)).filter((f) => f.endsWith('.json')).sort();

    for (const file of files) {
      const match = file.match(/^([a-z0-9-]+)\.([a-z]{2})\.json$/);
      if (!match) {
        logger.warn(`Skipping ${file}: expected <templateId>.<locale>.json`);
        continue;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(await readFile(join(dir, file), 'utf-8'));
      } catch (err) {
        registry.entries.set(
          keyOf(match[1], match[2]),
          new TemplateError(`${file} is not valid JSON: ${describe(err)}`, { cause: err }),
        );
        continue;
      }
      registry.add(parsed, { id: match[1], locale: match[2], source: file });
    }

    logger.info(`Loaded ${registry.entries.size} template file(s) from ${dir}`);
    return registry;
  }

  /** The template for (id, locale).  Throws TemplateError; there is no fallback locale. */
  resolve(templateId: string, locale: Locale): ReportTemplate {
    const entry = this.entries.get(keyOf(templateId, locale));
    if (entry instanceof TemplateError) throw entry;
    if (entry) return entry;

    const offered = LOCALES.filter((l) => this.entries.has(keyOf(templateId, l)));
    throw new TemplateError(
      offered.length > 0
        ? `Template "${templateId}" has no "${locale}" variant (available: ${offered.join(', ')})`
        : `Unknown template "${templateId}"`,
    );
  }

  has(templateId: string, locale: Locale): boolean {
    const entry = this.entries.get(keyOf(templateId, locale));
    return entry !== undefined && !(entry instanceof TemplateError);
  }

  /** `<id>.<locale>` keys of every usable template. */
  list(): string[] {
    return [...this.entries.entries()]
      .filter(([, entry]) => !(entry instanceof TemplateError))
      .map(([key]) => key)
      .sort();
  }

  // ── Internals ──────────────────────────────────────────

  private add(
    definition: unknown,
    expected?: { id: string; locale: string; source: string },
  ): void {
    const parsed = templateSchema.safeParse(definition);
    const source = expected?.source ?? 'template';

    if (!parsed.success) {
      const key = expected ? keyOf(expected.id, expected.locale) : keyOfUnknown(definition);
      const issues = parsed.error.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ');
      const error = new TemplateError(`${source} is malformed: ${issues}`);
      logger.warn(error.message);
      if (key) this.entries.set(key, error);
      return;
    }

    const template = parsed.data;
    const key = keyOf(template.id, template.locale);

    if (expected && (expected.id !== template.id || expected.locale !== template.locale)) {
      this.entries.set(
        keyOf(expected.id, expected.locale),
        new TemplateError(`${source} declares ${key}, which does not match its file name`),
      );
      return;
    }

    const problem = checkPlaceholders(template);
    if (problem) {
      const error = new TemplateError(`${key} (${source}): ${problem}`);
      logger.warn(error.message);
      this.entries.set(key, error);
      return;
    }

    this.entries.set(key, template);
  }
}

/** Every `{{name}}` in a string, in order of appearance. */
export function placeholdersIn(text: string): string[] {
  return [...text.matchAll(PLACEHOLDER_PATTERN)].map((m) => m[1]);
}

/** Replace `{{name}}` with `values[name]`.  Unknown names are left as written. */
export function fillPlaceholders(text: string, values: Readonly<Record<string, string>>): string {
  return text.replace(PLACEHOLDER_PATTERN, (whole: string, name: string) => values[name] ?? whole);
}

function checkPlaceholders(template: ReportTemplate): string | null {
  const required = SCALARS_BY_SCHEMA[template.schema];
  const scalars = new Set<string>(required);
  const rowNames = new Set<string>(ROW_PLACEHOLDERS);

  const declared = new Set(template.placeholders);
  const missing = required.filter((p) => !declared.has(p));
  if (missing.length > 0) return `missing scalar placeholder(s): ${missing.join(', ')}`;

  const unknown = template.placeholders.filter((p) => !scalars.has(p));
  if (unknown.length > 0) {
    return `declares placeholder(s) outside schema v${template.schema}: ${unknown.join(', ')}`;
  }

  const scalarTexts = [
    template.title,
    ...template.header.flat(),
    ...template.footer.flat(),
  ];
  const scalarUses = scalarTexts.flatMap(placeholdersIn);
  const undeclared = scalarUses.filter((p) => !declared.has(p));
  if (undeclared.length > 0) return `references undeclared placeholder(s): ${unique(undeclared).join(', ')}`;

  const stamps = scalarUses.filter((p) => p === TIMESTAMP_PLACEHOLDER).length;
  if (stamps !== 1) return `{{${TIMESTAMP_PLACEHOLDER}}} must appear exactly once, found ${stamps}`;

  const rowUses = template.rowRegion.columns.flatMap((c) => [
    ...placeholdersIn(c.label),
    ...placeholdersIn(c.value),
  ]);
  const badRow = rowUses.filter((p) => !rowNames.has(p));
  if (badRow.length > 0) return `row region references non-row placeholder(s): ${unique(badRow).join(', ')}`;
  if (!rowUses.includes('flag')) return 'row region has no {{flag}} column for incomplete rows';

  return null;
}

function keyOf(templateId: string, locale: string): string {
  return `${templateId}.${locale}`;
}

function keyOfUnknown(definition: unknown): string | null {
  if (typeof definition !== 'object' || definition === null) return null;
  const id = 'id' in definition ? definition.id : undefined;
  const locale = 'locale' in definition ? definition.locale : undefined;
  if (typeof id !== 'string' || typeof locale !== 'string' || !isLocale(locale)) return null;
  return keyOf(id, locale);
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
