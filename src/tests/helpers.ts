import * as XLSX from 'xlsx';
import { compileRules } from '../lib/rule-compiler';
import type { CellValue, Dataset, DataRow, RuleTable, ValidationSpec } from '../lib/types';

export const RULE_HEADER = ['Code', 'Field', 'Type', 'Validation', 'Mandatory', 'Description'];

export function ruleTable(...rows: CellValue[][]): RuleTable {
  return { columns: [...RULE_HEADER], rows };
}

export function specOf(...rows: CellValue[][]): ValidationSpec {
  return compileRules(ruleTable(...rows));
}

export function dataset(columns: string[], ...values: CellValue[][]): Dataset {
  const rows = values.map((vals) => {
    const row: DataRow = {};
    columns.forEach((c, i) => {
      row[c] = vals[i] ?? null;
    });
    return row;
  });
  return { columns, rows };
}

export function workbookBuffer(sheets: Record<string, CellValue[][]>): Buffer {
  const wb = XLSX.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet<CellValue>(rows), name);
  }
  const out: unknown = XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' });
  if (!Buffer.isBuffer(out)) throw new Error('expected a buffer');
  return out;
}
