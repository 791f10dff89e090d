import { SchemaError } from './errors';
import type { CellValue, DataType, FieldSpec, RuleTable, ValidationSpec } from './types';

export const RULE_TABLE_WIDTH = 6;

// Positions inside a rule row (0-based): code, name, type, validation, mandatory, description.
const COL_CODE = 0;
const COL_NAME = 1;
const COL_TYPE = 2;
const COL_VALIDATION = 3;
const COL_MANDATORY = 4;
const COL_DESCRIPTION = 5;

const REGEX_PREFIX = /^regex:/i;

const DATA_TYPE_ALIASES: Record<string, DataType> = {
  number: 'number', numeric: 'number', integer: 'number', int: 'number', decimal: 'number', float: 'number',
  date: 'date', datetime: 'date', timestamp: 'date',
  string: 'string', text: 'string', varchar: 'string', char: 'string',
  other: 'other',
};

const cellText = (v: CellValue) => (v === null || v === undefined ? '' : String(v).trim());

function isBlankRow(row: CellValue[]) {
  return row.every((c) => cellText(c) === '');
}

function parseDataType(raw: CellValue, rowNo: number): DataType {
  const key = cellText(raw).toLowerCase();
  if (!key) return 'other';
  const type = DATA_TYPE_ALIASES[key];
  if (!type) throw new SchemaError(`Rule row ${rowNo}: unknown data type '${cellText(raw)}'.`, rowNo);
  return type;
}

function parseValidation(raw: CellValue, rowNo: number): FieldSpec['validation'] {
  if (typeof raw !== 'string' || !REGEX_PREFIX.test(raw)) return undefined;
  const pattern = raw.replace(REGEX_PREFIX, '').trim();
  try {
    new RegExp(pattern);
  } catch {
    throw new SchemaError(`Rule row ${rowNo}: invalid regular expression '${pattern}'.`, rowNo);
  }
  return { pattern };
}

/** Enforce the fixed six-column layout of a rule table. */
export function assertRuleTableShape(table: RuleTable): void {
  if (table.columns.length !== RULE_TABLE_WIDTH) {
    throw new SchemaError(
      `Rule table must have exactly ${RULE_TABLE_WIDTH} columns, found ${table.columns.length}.`
    );
  }
  table.rows.forEach((row, i) => {
    const extra = row.slice(RULE_TABLE_WIDTH);
    if (extra.some((c) => cellText(c) !== '')) {
      throw new SchemaError(`Rule row ${i + 1} has more than ${RULE_TABLE_WIDTH} cells.`, i + 1);
    }
  });
}

/**
 * Compile a rule table into a ValidationSpec. Column positions are authoritative,
 * header names are ignored. Blank rows are skipped; duplicate field names are rejected.
 */
export function compileRules(table: RuleTable): ValidationSpec {
  assertRuleTableShape(table);

  const fields = new Map<string, FieldSpec>();
  const firstSeen = new Map<string, number>();

  table.rows.forEach((row, i) => {
    const rowNo = i + 1;
    if (isBlankRow(row)) return;

    const fieldName = cellText(row[COL_NAME]);
    if (!fieldName) throw new SchemaError(`Rule row ${rowNo} has no field name.`, rowNo);
    const seenAt = firstSeen.get(fieldName);
    if (seenAt !== undefined) {
      throw new SchemaError(`Field '${fieldName}' is defined twice (rule rows ${seenAt} and ${rowNo}).`, rowNo);
    }
    firstSeen.set(fieldName, rowNo);

    fields.set(fieldName, {
      fieldCode: cellText(row[COL_CODE]),
      fieldName,
      dataType: parseDataType(row[COL_TYPE] ?? null, rowNo),
      mandatory: cellText(row[COL_MANDATORY]).toUpperCase() === 'M',
      validation: parseValidation(row[COL_VALIDATION] ?? null, rowNo),
      description: cellText(row[COL_DESCRIPTION]),
    });
  });

  return { fields, fieldOrder: Array.from(fields.keys()) };
}
