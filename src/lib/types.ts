export type CellValue = string | number | boolean | Date | null;

export type DataType = 'number' | 'date' | 'string' | 'other';
export type TargetType = 'string' | 'number' | 'date';
export type FindingKind =
  | 'missing_column'
  | 'mandatory_violation'
  | 'type_violation'
  | 'pattern_violation'
  | 'format_violation';

export const TARGET_TYPES: readonly TargetType[] = ['string', 'number', 'date'];

/** Raw rule table as read from the validation master: header plus positional rows. */
export interface RuleTable {
  columns: string[];
  rows: CellValue[][];
}

export interface FieldSpec {
  fieldCode: string;
  fieldName: string;
  dataType: DataType;
  mandatory: boolean;
  validation?: { pattern: string };
  description: string;
}

export interface ValidationSpec {
  fields: ReadonlyMap<string, FieldSpec>;
  fieldOrder: readonly string[];
}

export type DataRow = Record<string, CellValue>;

export interface Dataset {
  columns: string[];
  rows: DataRow[];
}

export interface Finding {
  field: string;
  kind: FindingKind;
  message: string;
  fixable: boolean;
  suggestion?: { targetType: TargetType; format?: string };
}

/** Everything the fix prompt needs for one field. */
export interface FixPrompt {
  field: string;
  kind: FindingKind;
  message: string;
  defaultTargetType: TargetType;
  defaultFormat?: string;
  choices: readonly TargetType[];
}

export interface ValidationReport {
  findings: Finding[];
  nonFixable: string[];
  fixable: Record<string, FixPrompt>;
  valid: boolean;
}

export interface CoercionRequest {
  field: string;
  targetType: TargetType;
  format?: string;
}

export interface CoercionResult {
  field: string;
  targetType: TargetType;
  format?: string;
  values: CellValue[];
  missingCount: number;
}

export interface FixPreview {
  field: string;
  before: CellValue[];
  after: CellValue[];
  missingCount: number;
}

export interface ExportTable {
  sheetName: string;
  columns: string[];
  rows: CellValue[][];
}
