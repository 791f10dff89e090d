/*
  Workbook I/O for the fix loop.
  - Validation master: rule sheet (6 positional columns) + state master sheet
  - Input dataset: xlsx/xls via SheetJS, csv/tsv via csv-parse
  - Export: single-sheet xlsx (or csv) of the session's current snapshot
*/

import * as XLSX from 'xlsx';
import { parse as csvParse } from 'csv-parse/sync';
import { settleDate, toStr } from './cells';
import { SchemaError } from './errors';
import { assertRuleTableShape } from './rule-compiler';
import { StateMaster } from './state-master';
import type { CellValue, Dataset, DataRow, ExportTable, RuleTable } from './types';

export type FileType = 'csv' | 'tsv' | 'xlsx';

export function inferType(filename: string, contentType?: string): FileType {
  const ext = filename.split('.').pop()?.toLowerCase();
  if (ext === 'xlsx' || ext === 'xls') return 'xlsx';
  if (ext === 'tsv') return 'tsv';
  if (ext === 'csv') return 'csv';
  if (contentType?.includes('spreadsheetml') || contentType?.includes('ms-excel')) return 'xlsx';
  if (contentType?.includes('tab-separated')) return 'tsv';
  return 'csv';
}

// ----- Reading -----

export type WorkbookSource = Buffer | XLSX.WorkBook;

export function openWorkbook(buf: Buffer): XLSX.WorkBook {
  return XLSX.read(buf, { type: 'buffer', cellDates: true });
}

const bookOf = (src: WorkbookSource) => (Buffer.isBuffer(src) ? openWorkbook(src) : src);

function sheetRows(wb: XLSX.WorkBook, sheet: string): CellValue[][] {
  const ws = wb.Sheets[sheet];
  if (!ws) throw new SchemaError(`Sheet '${sheet}' not found (available: ${wb.SheetNames.join(', ')}).`);
  const rows = XLSX.utils.sheet_to_json<CellValue[]>(ws, { header: 1, raw: true, defval: null, blankrows: false });
  return rows.map((r) => r.map((c) => (c instanceof Date ? settleDate(c) : c)));
}

function trimTrailingBlanks(row: CellValue[]): CellValue[] {
  let end = row.length;
  while (end > 0 && toStr(row[end - 1]).trim() === '') end--;
  return row.slice(0, end);
}

export function listSheets(src: WorkbookSource): string[] {
  return bookOf(src).SheetNames;
}

/** Rule sheet below its header row. Rejects anything that is not six columns wide. */
export function readRuleTable(src: WorkbookSource, sheet: string): RuleTable {
  const rows = sheetRows(bookOf(src), sheet);
  if (rows.length === 0) throw new SchemaError(`Rule sheet '${sheet}' is empty.`);
  const table: RuleTable = {
    columns: trimTrailingBlanks(rows[0]).map((c) => toStr(c).trim()),
    rows: rows.slice(1),
  };
  assertRuleTableShape(table);
  return table;
}

/** Column 0 of the state sheet, below its header. */
export function readStateMaster(src: WorkbookSource, sheet: string): StateMaster {
  const rows = sheetRows(bookOf(src), sheet);
  return new StateMaster(rows.slice(1).map((r) => r[0] ?? null));
}

function toDataset(rows: CellValue[][]): Dataset {
  if (rows.length === 0) throw new SchemaError('Dataset has no header row.');
  const columns = trimTrailingBlanks(rows[0]).map((c) => toStr(c));
  const seen = new Set<string>();
  columns.forEach((name, i) => {
    if (name.trim() === '') throw new SchemaError(`Dataset column ${i + 1} has no header.`);
    // rows are plain objects keyed by header
    if (name === '__proto__') throw new SchemaError(`Dataset column ${i + 1} has a reserved header '__proto__'.`);
    if (seen.has(name)) throw new SchemaError(`Dataset column '${name}' appears more than once.`);
    seen.add(name);
  });
  const body = rows.slice(1).map((src) => {
    const row: DataRow = {};
    columns.forEach((name, i) => {
      row[name] = src[i] ?? null;
    });
    return row;
  });
  return { columns, rows: body };
}

function parseDelimited(buf: Buffer, delimiter: string): CellValue[][] {
  const records: unknown = csvParse(buf, { delimiter, bom: true, relax_column_count: true, skip_empty_lines: true });
  if (!Array.isArray(records)) return [];
  return records.map((r: unknown) =>
    Array.isArray(r) ? r.map((c: unknown) => (typeof c === 'string' ? c : null)) : []
  );
}

/** Input dataset, header names kept exactly as in the source. */
export function readDataset(buf: Buffer, filename: string, sheet?: string, contentType?: string): Dataset {
  const fileType = inferType(filename, contentType);
  if (fileType === 'csv' || fileType === 'tsv') {
    return toDataset(parseDelimited(buf, fileType === 'tsv' ? '\t' : ','));
  }
  const wb = openWorkbook(buf);
  const name = sheet ?? wb.SheetNames[0];
  if (!name) throw new SchemaError('Workbook has no sheets.');
  return toDataset(sheetRows(wb, name));
}

// ----- Writing -----

export function writeWorkbook(table: ExportTable): Buffer {
  const ws = XLSX.utils.aoa_to_sheet<CellValue>([table.columns, ...table.rows], { cellDates: true });
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, ws, table.sheetName);
  const out: unknown = XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' });
  if (!Buffer.isBuffer(out)) throw new Error('Workbook writer did not return a buffer');
  return out;
}

export function writeCsv(table: ExportTable): string {
  const ws = XLSX.utils.aoa_to_sheet<string>([table.columns, ...table.rows.map((r) => r.map((c) => toStr(c)))]);
  return XLSX.utils.sheet_to_csv(ws);
}
