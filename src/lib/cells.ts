import dayjs from 'dayjs';
import type { CellValue, Dataset } from './types';

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

export const isEmpty = (v: CellValue | undefined) =>
  v === undefined || v === null || (typeof v === 'string' && v.trim() === '');

/** Nearest whole second. Workbook date cells can land a millisecond short of midnight. */
export function settleDate(d: Date): Date {
  return new Date(Math.round(d.getTime() / 1000) * 1000);
}

export function toStr(v: CellValue | undefined): string {
  if (v === undefined || v === null) return '';
  if (v instanceof Date) {
    if (Number.isNaN(v.getTime())) return '';
    const d = dayjs(settleDate(v));
    return d.format(d.hour() || d.minute() || d.second() ? 'YYYY-MM-DD HH:mm:ss' : 'YYYY-MM-DD');
  }
  return String(v);
}

/** Numeric value of a cell, or null when it does not read as a finite decimal number. */
export function parseNumber(v: CellValue): number | null {
  if (typeof v === 'number') return Number.isFinite(v) ? v : null;
  if (typeof v !== 'string') return null;
  const t = v.trim();
  if (!DECIMAL.test(t)) return null;
  const n = Number(t);
  return Number.isFinite(n) ? n : null;
}

export function columnValues(dataset: Dataset, field: string): CellValue[] {
  return dataset.rows.map((r) => r[field] ?? null);
}
