import JSZip from 'jszip';
import * as XLSX from 'xlsx';
import { TemplateError } from '../../core/errors';
import { normalizeExtraction } from '../../core/recordNormalizer';
import type { NormalizedSheet, RawTable } from '../../core/types';
import { validateExtraction } from '../../middleware/extractionValidator';
import { documentXml, escapeXml } from '../../reports/documentWriters';
import { ReportSynthesizer, artifactFileName, renderDocument } from '../../reports/reportSynthesizer';
import { TemplateRegistry } from '../../reports/templateRegistry';
import { SAMPLE_PROFILE, SAMPLE_TABLE, TEMPLATES_DIR } from '../../test/fakes';

const GENERATED_AT = '2026-02-10T09:00:00.000Z';

function sheetFrom(table: RawTable): NormalizedSheet {
  const extraction = validateExtraction(
    table,
    { className: '5В', subject: 'Математика', periodLabel: '2 четверть', ...SAMPLE_PROFILE },
    { startYear: 2025 },
  );
  return normalizeExtraction(extraction, { period: '2' });
}

describe('ReportSynthesizer', () => {
  let registry: TemplateRegistry;
  let synthesizer: ReportSynthesizer;

  beforeAll(async () => {
    registry = await TemplateRegistry.fromDirectory(TEMPLATES_DIR);
    synthesizer = new ReportSynthesizer(registry);
  });

  it('renders header, one row per student and the footer', () => {
    const doc = renderDocument(sheetFrom(SAMPLE_TABLE), registry.resolve('grades-sheet', 'ru'), {
      jobId: 'job-1',
      period: '2',
      generatedAt: GENERATED_AT,
    });

    expect(doc.title).toBe('Ведомость успеваемости: Математика, 5В');
    expect(doc.header).toEqual([
      { label: 'Школа', value: 'Школа-лицей №7' },
      { label: 'Класс', value: '5В' },
      { label: 'Предмет', value: 'Математика' },
      { label: 'Период', value: '2 четверть (1 полугодие)' },
      { label: 'Учитель', value: 'Сериков Арман' },
      { label: 'Учащихся', value: '3' },
    ]);
    expect(doc.columns).toEqual([
      '№',
      'ФИО',
      'Оценка',
      'Балл',
      'Пропуски',
      'Итог %',
      'Уровень',
      'Баллы СОР/СОЧ',
      'Примечание',
    ]);
    expect(doc.rows).toEqual([
      { cells: ['1', 'Абенова Айгерим', '5', '5', '1', '92%', 'Высокий', '', ''], flagged: false },
      { cells: ['2', 'Борисов Иван', '4', '4', '0', '78%', 'Средний', '', ''], flagged: false },
      { cells: ['3', 'Жумабаев Нурлан', '3', '3', '1', '61%', 'Средний', '', ''], flagged: false },
    ]);
    expect(doc.footer).toEqual([
      { label: 'Оценок «5»', value: '1' },
      { label: 'Оценок «4»', value: '1' },
      { label: 'Оценок «3»', value: '1' },
      { label: 'Оценок «2»', value: '0' },
      { label: 'Качество знаний, %', value: '66.67' },
      { label: 'Успеваемость, %', value: '100' },
      { label: 'Максимальные баллы', value: '' },
      { label: 'Сформировано', value: GENERATED_AT },
    ]);
  });

  it('prints section points against their maxima and the class summary', () => {
    const table: RawTable = {
      headers: ['№', 'ФИО', 'Итог %', 'Баға'],
      rows: [
        ['1', 'Абенова Айгерим', '90%', ''],
        ['2', 'Борисов Иван', '35%', ''],
      ],
      sectionMax: [
        { section: 0, max: 20 },
        { section: 1, max: 10 },
      ],
      points: [
        [
          { section: 1, value: '9' },
          { section: 0, value: '18' },
        ],
        [{ section: 1, value: '3' }],
      ],
    };
    const doc = renderDocument(sheetFrom(table), registry.resolve('grades-sheet', 'kk'), {
      jobId: 'job-8',
      period: '2',
      generatedAt: GENERATED_AT,
    });

    expect(doc.rows.map((r) => r.cells.slice(6, 8))).toEqual([
      ['Жоғары', 'БЖБ 1: 9/10; ТЖБ: 18/20'],
      ['Төмен', 'БЖБ 1: 3/10'],
    ]);
    expect(doc.footer.map((l) => l.value)).toEqual(['1', '0', '0', '1', '50', '50', 'БЖБ 1: 10; ТЖБ: 20', GENERATED_AT]);
  });

  it('labels the period in the template language', () => {
    const doc = renderDocument(sheetFrom(SAMPLE_TABLE), registry.resolve('grades-sheet', 'kk'), {
      jobId: 'job-1',
      period: '4',
      generatedAt: GENERATED_AT,
    });
    expect(doc.header[3]).toEqual({ label: 'Кезең', value: '4 тоқсан (2 жартыжылдық)' });
  });

  it('marks incomplete rows with the template marker', () => {
    const table: RawTable = {
      headers: ['№', 'ФИО', 'Оценка'],
      rows: [
        ['1', 'Абенова Айгерим', '5'],
        ['2', 'Борисов Иван', '7'],
      ],
    };
    const doc = renderDocument(sheetFrom(table), registry.resolve('grades-brief', 'ru'), {
      jobId: 'job-2',
      period: '2',
      generatedAt: GENERATED_AT,
    });
    expect(doc.rows[1]).toEqual({ cells: ['2', 'Борисов Иван', '7', 'требует проверки'], flagged: true });
  });

  it('renders the same document for the same inputs', async () => {
    const sheet = sheetFrom(SAMPLE_TABLE);
    const context = { jobId: 'job-3', period: '2', generatedAt: GENERATED_AT };

    const a = await synthesizer.synthesize(sheet, 'grades-brief', 'ru', context);
    const b = await synthesizer.synthesize(sheet, 'grades-brief', 'ru', context);

    expect(a.document).toEqual(b.document);
    expect(a.content.equals(b.content)).toBe(true);

    const c = await synthesizer.synthesize(sheet, 'grades-sheet', 'ru', context);
    const d = await synthesizer.synthesize(sheet, 'grades-sheet', 'ru', context);
    expect(c.content.equals(d.content)).toBe(true);
  });

  it('describes the artifact and names the file', async () => {
    const artifact = await synthesizer.synthesize(sheetFrom(SAMPLE_TABLE), 'grades-sheet', 'kk', {
      jobId: 'job-4',
      period: '1',
      generatedAt: GENERATED_AT,
    });

    expect(artifact).toMatchObject({
      id: 'job-4:grades-sheet:kk',
      jobId: 'job-4',
      locale: 'kk',
      templateId: 'grades-sheet',
      templateVersion: 2,
      format: 'xlsx',
      fileName: 'job-4-grades-sheet-kk.xlsx',
      generatedAt: GENERATED_AT,
    });
    expect(Object.isFrozen(artifact)).toBe(true);
  });

  it('writes a workbook SheetJS can read back', async () => {
    const artifact = await synthesizer.synthesize(sheetFrom(SAMPLE_TABLE), 'grades-sheet', 'ru', {
      jobId: 'job-5',
      period: '2',
      generatedAt: GENERATED_AT,
    });

    const book = XLSX.read(artifact.content, { type: 'buffer' });
    const sheet = book.Sheets[book.SheetNames[0]];
    // title, blank, 6 header lines, blank, column row, then students
    expect(sheet['A1'].v).toBe('Ведомость успеваемости: Математика, 5В');
    expect(sheet['A10'].v).toBe('№');
    expect(sheet['B11'].v).toBe('Абенова Айгерим');
    expect(sheet['F13'].v).toBe('61%');
  });

  it('writes a docx package whose body is the rendered XML', async () => {
    const artifact = await synthesizer.synthesize(sheetFrom(SAMPLE_TABLE), 'grades-brief', 'kk', {
      jobId: 'job-6',
      period: '2',
      generatedAt: GENERATED_AT,
    });

    const zip = await JSZip.loadAsync(artifact.content);
    expect(Object.keys(zip.files).sort()).toEqual(['[Content_Types].xml', '_rels/.rels', 'word/document.xml']);
    const body = await zip.file('word/document.xml')?.async('string');
    expect(body).toBe(documentXml(artifact.document));
  });

  it('throws TemplateError for a missing variant', async () => {
    const narrow = new ReportSynthesizer(new TemplateRegistry([]));
    await expect(
      narrow.synthesize(sheetFrom(SAMPLE_TABLE), 'grades-sheet', 'kk', {
        jobId: 'job-7',
        period: '2',
        generatedAt: GENERATED_AT,
      }),
    ).rejects.toBeInstanceOf(TemplateError);
  });
});

describe('writers', () => {
  it('escapes XML text', () => {
    expect(escapeXml(`"A" & <B> 'C'`)).toBe('&quot;A&quot; &amp; &lt;B&gt; &apos;C&apos;');
  });

  it('builds file names from job, template and locale', () => {
    expect(artifactFileName('j1', 'grades-sheet', 'ru', 'xlsx')).toBe('j1-grades-sheet-ru.xlsx');
  });
});
