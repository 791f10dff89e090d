/*
  Date/time format handling.
  - Header-driven format inference (column name -> expected format)
  - Operator notation (dd, mm, yyyy, hh, ss) -> dayjs tokens
  - Strict parsing (exact format) and best-effort parsing (common layouts)
*/

import dayjs, { type Dayjs } from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat';
import { settleDate } from './cells';
import type { CellValue } from './types';

dayjs.extend(customParseFormat);

export const DATE_FORMAT = 'dd-mm-yyyy';
export const DATETIME_FORMAT = 'dd-mm-yyyy hh:mm';

// Day-first, ISO and month-name layouts tried, each strictly, by the best-effort parser.
const LOOSE_FORMATS = [
  'YYYY-MM-DD',
  'YYYY-MM-DD HH:mm',
  'YYYY-MM-DD HH:mm:ss',
  'YYYY-MM-DD HH:mm:ss.SSS',
  'YYYY-MM-DDTHH:mm:ss',
  'YYYY-MM-DDTHH:mm:ss.SSS',
  'YYYY/MM/DD',
  'YYYYMMDD',
  'DD-MM-YYYY',
  'DD-MM-YYYY HH:mm',
  'DD-MM-YYYY HH:mm:ss',
  'DD/MM/YYYY',
  'DD/MM/YYYY HH:mm',
  'DD/MM/YYYY HH:mm:ss',
  'DD.MM.YYYY',
  'D-M-YYYY',
  'D/M/YYYY',
  'DD-MM-YY',
  'DD/MM/YY',
  'DD-MMM-YYYY',
  'D-MMM-YYYY',
  'DD MMM YYYY',
  'D MMM YYYY',
  'MMM D, YYYY',
  'MMM DD, YYYY',
  'D MMMM YYYY',
  'MMMM D, YYYY',
];
const ISO_INSTANT = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/;
const TOKEN_RE = /yyyy|yy|dd|mm|hh|ss|[a-z]|[^a-z]+/gi;

/** Expected format derived from a column name alone. "time" wins over "date". */
export function inferHeaderFormat(columnName: string): string | undefined {
  const name = columnName.toLowerCase();
  if (name.includes('time')) return DATETIME_FORMAT;
  if (name.includes('date')) return DATE_FORMAT;
  return undefined;
}

/**
 * Translate operator notation to a dayjs format string.
 * `mm` is minutes right after an hour token or right before a seconds token, month otherwise.
 * `hh` is always 24-hour.
 */
export function toDayjsFormat(format: string): string {
  const tokens = format.match(TOKEN_RE) ?? [];
  const lower = tokens.map((t) => t.toLowerCase());
  let prev = '';
  let out = '';
  lower.forEach((t, i) => {
    const next = lower.slice(i + 1).find((n) => /^[a-z]+$/.test(n)) ?? '';
    switch (t) {
      case 'yyyy': out += 'YYYY'; break;
      case 'yy': out += 'YY'; break;
      case 'dd': out += 'DD'; break;
      case 'hh': out += 'HH'; break;
      case 'ss': out += 'ss'; break;
      case 'mm': out += prev === 'hh' || next === 'ss' ? 'mm' : 'MM'; break;
      default: out += /[a-z]/i.test(t) ? `[${tokens[i]}]` : tokens[i];
    }
    if (/^[a-z]+$/.test(t)) prev = t;
  });
  return out;
}

/** Whether the operator notation contains at least one date/time token. */
export function isUsableFormat(format: string): boolean {
  return /yyyy|yy|dd|mm|hh|ss/i.test(format);
}

/** Exact-format parse. Date cells are accepted as already parsed. */
export function parseStrict(value: CellValue, format: string): Dayjs | null {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : dayjs(settleDate(value));
  if (typeof value !== 'string') return null;
  const d = dayjs(value.trim(), toDayjsFormat(format), true);
  return d.isValid() ? d : null;
}

/** Best-effort parse over common layouts; impossible calendar dates are rejected. */
export function parseLoose(value: CellValue): Dayjs | null {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : dayjs(settleDate(value));
  if (typeof value !== 'string') return null;
  const v = value.trim();
  if (!v) return null;
  if (ISO_INSTANT.test(v)) {
    const d = dayjs(v);
    return d.isValid() ? d : null;
  }
  const d = dayjs(v, LOOSE_FORMATS, true);
  return d.isValid() ? d : null;
}

export function formatDate(d: Dayjs, format: string): string {
  return d.format(toDayjsFormat(format));
}
