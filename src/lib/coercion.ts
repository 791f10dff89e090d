import { columnValues, isEmpty, parseNumber, toStr } from './cells';
import { config } from './config';
import { formatDate, inferHeaderFormat, isUsableFormat, parseLoose, parseStrict } from './date-formats';
import { CoercionError } from './errors';
import { TARGET_TYPES, type CellValue, type CoercionRequest, type CoercionResult, type Dataset, type TargetType } from './types';

export interface CoercionOptions {
  genericDateFormat?: string;
}

function isTargetType(v: unknown): v is TargetType {
  return typeof v === 'string' && (TARGET_TYPES as readonly string[]).includes(v);
}

/** Build a request from loosely typed operator input; unknown target types are rejected. */
export function toCoercionRequest(field: unknown, targetType: unknown, format?: unknown): CoercionRequest {
  if (typeof field !== 'string' || !field) throw new CoercionError(String(field ?? ''), 'field is required');
  const type = typeof targetType === 'string' ? targetType.trim().toLowerCase() : targetType;
  if (!isTargetType(type)) {
    throw new CoercionError(field, `unknown target type '${String(targetType)}' (expected ${TARGET_TYPES.join(', ')})`);
  }
  if (format !== undefined && format !== null && typeof format !== 'string') {
    throw new CoercionError(field, 'format must be a string');
  }
  const fmt = typeof format === 'string' && format.trim() ? format.trim() : undefined;
  return { field, targetType: type, format: fmt };
}

/** Format offered for a date fix: header-driven when the name hints at one, generic otherwise. */
export function defaultDateFormat(field: string, genericDateFormat = config.genericDateFormat): string {
  return inferHeaderFormat(field) ?? genericDateFormat;
}

const converters: Record<TargetType, (v: CellValue, format: string) => CellValue> = {
  string: (v) => toStr(v),
  number: (v) => parseNumber(v),
  date: (v, format) => {
    const d = parseStrict(v, format) ?? parseLoose(v);
    return d ? formatDate(d, format) : null;
  },
};

/**
 * Compute the coerced values of one column. Cells that cannot be converted become
 * null (missing); only an unusable request raises CoercionError. The dataset is not touched.
 */
export function coerceColumn(dataset: Dataset, request: CoercionRequest, options: CoercionOptions = {}): CoercionResult {
  const { field, targetType } = request;
  if (!dataset.columns.includes(field)) throw new CoercionError(field, 'column not found in dataset');
  if (!isTargetType(targetType)) throw new CoercionError(field, `unknown target type '${String(targetType)}'`);

  let format: string | undefined;
  if (targetType === 'date') {
    format = request.format?.trim() || defaultDateFormat(field, options.genericDateFormat);
    if (!isUsableFormat(format)) throw new CoercionError(field, `unusable date format '${format}'`);
  }

  const convert = converters[targetType];
  let missingCount = 0;
  const values = columnValues(dataset, field).map((v) => {
    if (targetType !== 'string' && isEmpty(v)) return null;
    const out = convert(v, format ?? '');
    if (out === null) missingCount++;
    return out;
  });

  return { field, targetType, format, values, missingCount };
}
