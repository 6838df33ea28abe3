/**
 * documentWriters.ts — Serialise a RenderedDocument to file bytes.
 *
 *   xlsx  one worksheet via SheetJS: title, header lines, table, footer.
 *   docx  a minimal WordprocessingML package assembled with JSZip.
 *
 * Neither writer adds a clock reading of its own: zip entries carry a fixed
 * date and workbook properties use the document's `generatedAt`.
 */

import JSZip from 'jszip';
import * as XLSX from 'xlsx';
import type { RenderedDocument, ReportFormat } from '../core/types';

/** Date stamped on every zip entry. */
const ZIP_ENTRY_DATE = new Date(Date.UTC(2000, 0, 1));

const SHEET_NAME_LIMIT = 31;

export async function writeDocument(doc: RenderedDocument, format: ReportFormat): Promise<Buffer> {
  switch (format) {
    case 'xlsx':
      return writeXlsx(doc);
    case 'docx':
      return writeDocx(doc);
  }
}

// ── xlsx ───────────────────────────────────────────────────

export function writeXlsx(doc: RenderedDocument): Buffer {
  const aoa: string[][] = [
    [doc.title],
    [],
    ...doc.header.map((line) => [line.label, line.value]),
    [],
    doc.columns,
    ...doc.rows.map((row) => row.cells),
    [],
    ...doc.footer.map((line) => [line.label, line.value]),
  ];

  const sheet = XLSX.utils.aoa_to_sheet(aoa);
  sheet['!cols'] = doc.columns.map((label, i) => ({
    wch: Math.max(label.length, ...doc.rows.map((r) => (r.cells[i] ?? '').length), 4) + 2,
  }));

  const book = XLSX.utils.book_new();
  book.Props = { Title: doc.title, CreatedDate: new Date(doc.generatedAt) };
  XLSX.utils.book_append_sheet(book, sheet, sheetName(doc.title));

  const out: unknown = XLSX.write(book, { type: 'buffer', bookType: 'xlsx', compression: true });
  if (!Buffer.isBuffer(out)) {
    throw new Error('SheetJS did not return a Buffer for bookType xlsx');
  }
  return out;
}

function sheetName(title: string): string {
  const cleaned = title.replace(/[\\/?*[\]:]/g, ' ').replace(/\s+/g, ' ').trim();
  return (cleaned || 'Report').slice(0, SHEET_NAME_LIMIT);
}

// ── docx ───────────────────────────────────────────────────

const CONTENT_TYPES = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">
<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>
<Default Extension="xml" ContentType="application/xml"/>
<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>
</Types>`;

const ROOT_RELS = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">
<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/>
</Relationships>`;

export async function writeDocx(doc: RenderedDocument): Promise<Buffer> {
  const zip = new JSZip();
  const options = { date: ZIP_ENTRY_DATE, createFolders: false };

  zip.file('[Content_Types].xml', CONTENT_TYPES, options);
  zip.file('_rels/.rels', ROOT_RELS, options);
  zip.file('word/document.xml', documentXml(doc), options);

  return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}

/** `word/document.xml` for a rendered document. */
export function documentXml(doc: RenderedDocument): string {
  const body = [
    paragraph(doc.title, { bold: true, size: 28 }),
    ...doc.header.map((line) => paragraph(`${line.label}: ${line.value}`)),
    table(doc),
    ...doc.footer.map((line) => paragraph(`${line.label}: ${line.value}`)),
  ].join('');

  return (
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
    '<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main">' +
    `<w:body>${body}<w:sectPr/></w:body></w:document>`
  );
}

interface RunStyle {
  bold?: boolean;
  /** Half-points. */
  size?: number;
  color?: string;
}

function paragraph(text: string, style: RunStyle = {}): string {
  return `<w:p>${run(text, style)}</w:p>`;
}

function run(text: string, style: RunStyle): string {
  const props = [
    style.bold ? '<w:b/>' : '',
    style.color ? `<w:color w:val="${style.color}"/>` : '',
    style.size ? `<w:sz w:val="${style.size}"/>` : '',
  ].join('');
  return `<w:r>${props ? `<w:rPr>${props}</w:rPr>` : ''}<w:t xml:space="preserve">${escapeXml(text)}</w:t></w:r>`;
}

function table(doc: RenderedDocument): string {
  const border = ['top', 'left', 'bottom', 'right', 'insideH', 'insideV']
    .map((side) => `<w:${side} w:val="single" w:sz="4" w:space="0" w:color="auto"/>`)
    .join('');
  const headerRow = row(doc.columns, { bold: true });
  const bodyRows = doc.rows.map((r) => row(r.cells, r.flagged ? { color: 'C00000' } : {}));

  return `<w:tbl><w:tblPr><w:tblBorders>${border}</w:tblBorders></w:tblPr>${headerRow}${bodyRows.join('')}</w:tbl>`;
}

function row(cells: string[], style: RunStyle): string {
  const tcs = cells.map((cell) => `<w:tc><w:p>${run(cell, style)}</w:p></w:tc>`).join('');
  return `<w:tr>${tcs}</w:tr>`;
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}
