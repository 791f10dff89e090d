/*
  Column-level validation engine.
  -------------------------------------
  - Field validators (mandatory, data type, pattern, header-driven date/time format)
  - Missing-column check against the compiled rules
  - ValidationEngine: runs everything over a dataset and partitions the findings
    into a non-fixable list and a fixable map keyed by field

  Findings are field-level: one finding per field and check, never per row.
  The engine never mutates the dataset and never throws on bad data.

  Usage:
    const engine = new ValidationEngine(compileRules(ruleTable));
    const report = engine.validate(session.snapshot());
*/

import { columnValues, isEmpty, parseNumber, toStr } from './cells';
import { config } from './config';
import { inferHeaderFormat, parseLoose, parseStrict, DATETIME_FORMAT } from './date-formats';
import {
  TARGET_TYPES,
  type CellValue,
  type Dataset,
  type FieldSpec,
  type Finding,
  type FixPrompt,
  type ValidationReport,
  type ValidationSpec,
} from './types';

export interface EngineOptions {
  genericDateFormat?: string; // date fix default when the column name has no date/time hint
}

export interface ColumnContext {
  field: string;
  values: CellValue[];
  spec?: FieldSpec;
  options: Required<EngineOptions>;
}

const nonEmpty = (values: CellValue[]) => values.filter((v) => !isEmpty(v));
const plural = (n: number, word: string) => `${n} ${word}${n === 1 ? '' : 's'}`;

// --------------------------
// Field validators
// --------------------------
export const validators = {
  mandatory({ field, values, spec }: ColumnContext): Finding | null {
    if (!spec?.mandatory) return null;
    const empty = values.filter((v) => isEmpty(v)).length;
    if (empty === 0) return null;
    return {
      field,
      kind: 'mandatory_violation',
      message: `Field '${field}' is mandatory but has ${plural(empty, 'empty value')}.`,
      fixable: false,
    };
  },

  dataType({ field, values, spec, options }: ColumnContext): Finding | null {
    if (spec?.dataType === 'number') {
      const bad = nonEmpty(values).filter((v) => parseNumber(v) === null).length;
      if (bad === 0) return null;
      return {
        field,
        kind: 'type_violation',
        message: `Field '${field}' should be a number (${plural(bad, 'non-numeric value')}).`,
        fixable: false,
      };
    }
    if (spec?.dataType === 'date') {
      const bad = nonEmpty(values).filter((v) => parseLoose(v) === null).length;
      if (bad === 0) return null;
      return {
        field,
        kind: 'type_violation',
        message: `Field '${field}' should be a date (${plural(bad, 'unparseable value')}).`,
        fixable: true,
        suggestion: { targetType: 'date', format: inferHeaderFormat(field) ?? options.genericDateFormat },
      };
    }
    return null;
  },

  pattern({ field, values, spec }: ColumnContext): Finding | null {
    const pattern = spec?.validation?.pattern;
    if (!pattern) return null;
    const re = new RegExp(`^(?:${pattern})$`);
    const bad = nonEmpty(values).filter((v) => !re.test(toStr(v))).length;
    if (bad === 0) return null;
    return {
      field,
      kind: 'pattern_violation',
      message: `Field '${field}' does not match pattern ${pattern} (${plural(bad, 'value')}).`,
      fixable: false,
    };
  },

  headerFormat({ field, values }: ColumnContext): Finding | null {
    const format = inferHeaderFormat(field);
    if (!format) return null;
    const bad = nonEmpty(values).filter((v) => parseStrict(v, format) === null).length;
    if (bad === 0) return null;
    const what = format === DATETIME_FORMAT ? 'a datetime' : 'a date';
    return {
      field,
      kind: 'format_violation',
      message: `Field '${field}' should be ${what} in format ${format} (${plural(bad, 'value')}).`,
      fixable: true,
      suggestion: { targetType: 'date', format },
    };
  },
};

export type ValidatorKey = keyof typeof validators;

// Checks driven by the rule spec, in reporting order.
const MASTER_CHECKS: ValidatorKey[] = ['mandatory', 'dataType', 'pattern'];

export function checkMissingColumns(spec: ValidationSpec, dataset: Dataset): Finding | null {
  const present = new Set(dataset.columns);
  const missing = spec.fieldOrder.filter((f) => !present.has(f));
  if (missing.length === 0) return null;
  return {
    field: missing.join(', '),
    kind: 'missing_column',
    message: `Missing columns in input: ${missing.join(', ')}.`,
    fixable: false,
  };
}

function toPrompt(f: Finding): FixPrompt {
  return {
    field: f.field,
    kind: f.kind,
    message: f.message,
    defaultTargetType: f.suggestion?.targetType ?? 'string',
    defaultFormat: f.suggestion?.format,
    choices: TARGET_TYPES,
  };
}

/**
 * Split findings into the non-fixable message list (input order) and one fix prompt
 * per field. A header-format finding takes over the prompt of a field that also
 * failed its master date check, since it carries the more specific format.
 */
export function partitionFindings(findings: Finding[]): ValidationReport {
  const nonFixable: string[] = [];
  const fixable: Record<string, FixPrompt> = {};
  for (const f of findings) {
    if (!f.fixable) {
      nonFixable.push(f.message);
      continue;
    }
    const current = fixable[f.field];
    if (!current || (f.kind === 'format_violation' && current.kind !== 'format_violation')) {
      fixable[f.field] = toPrompt(f);
    }
  }
  return { findings, nonFixable, fixable, valid: findings.length === 0 };
}

// --------------------------
// ValidationEngine
// --------------------------
export class ValidationEngine {
  private readonly spec: ValidationSpec;
  private readonly options: Required<EngineOptions>;

  constructor(spec: ValidationSpec, options: EngineOptions = {}) {
    this.spec = spec;
    this.options = { genericDateFormat: options.genericDateFormat ?? config.genericDateFormat };
  }

  public validate(dataset: Dataset): ValidationReport {
    const findings: Finding[] = [];

    const missing = checkMissingColumns(this.spec, dataset);
    if (missing) findings.push(missing);

    const present = new Set(dataset.columns);
    for (const field of this.spec.fieldOrder) {
      if (!present.has(field)) continue;
      const ctx: ColumnContext = {
        field,
        values: columnValues(dataset, field),
        spec: this.spec.fields.get(field),
        options: this.options,
      };
      for (const key of MASTER_CHECKS) {
        const found = validators[key](ctx);
        if (found) findings.push(found);
      }
    }

    // Header-driven formats apply to every column, with or without a rule.
    for (const field of dataset.columns) {
      const found = validators.headerFormat({ field, values: columnValues(dataset, field), options: this.options });
      if (found) findings.push(found);
    }

    return partitionFindings(findings);
  }
}

export function validateDataset(spec: ValidationSpec, dataset: Dataset, options?: EngineOptions): ValidationReport {
  return new ValidationEngine(spec, options).validate(dataset);
}
