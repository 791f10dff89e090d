import * as logger from 'firebase-functions/logger';
import { columnValues } from './cells';
import { coerceColumn, type CoercionOptions } from './coercion';
import { config } from './config';
import type { ValidationEngine } from './rules-engine';
import type { CellValue, CoercionRequest, Dataset, ExportTable, FixPreview, ValidationReport } from './types';

export interface SessionOptions extends CoercionOptions {
  previewRows?: number;
}

function copyDataset(ds: Dataset): Dataset {
  return { columns: [...ds.columns], rows: ds.rows.map((r) => ({ ...r })) };
}

/**
 * Single-writer working copy of one dataset across the fix loop.
 * Each coercion replaces a whole column; the values it replaced are kept
 * until the fix is confirmed or reverted.
 */
export class DatasetSession {
  private readonly original: Dataset;
  private working: Dataset;
  private pending: { field: string; before: CellValue[] } | null = null;
  private readonly options: SessionOptions;

  constructor(dataset: Dataset, options: SessionOptions = {}) {
    this.original = copyDataset(dataset);
    this.working = copyDataset(dataset);
    this.options = options;
  }

  get rowCount() {
    return this.working.rows.length;
  }

  get columns(): string[] {
    return [...this.working.columns];
  }

  /** Field whose previous values are still held for before/after display. */
  get pendingField(): string | null {
    return this.pending?.field ?? null;
  }

  snapshot(): Dataset {
    return copyDataset(this.working);
  }

  private get previewRows() {
    return this.options.previewRows ?? config.previewRows;
  }

  /** Coerced head of the column, without touching the working copy. */
  preview(request: CoercionRequest): FixPreview {
    const result = coerceColumn(this.working, request, this.options);
    return {
      field: request.field,
      before: columnValues(this.working, request.field).slice(0, this.previewRows),
      after: result.values.slice(0, this.previewRows),
      missingCount: result.missingCount,
    };
  }

  /**
   * Replace the column with its coerced values. Throws CoercionError before any
   * write when the request cannot be applied. Applying a new fix confirms the
   * previous pending one.
   */
  applyCoercion(request: CoercionRequest): FixPreview {
    const result = coerceColumn(this.working, request, this.options);
    const before = columnValues(this.working, request.field);

    this.working.rows.forEach((row, i) => {
      row[request.field] = result.values[i];
    });
    this.pending = { field: request.field, before };

    logger.info('Coercion applied', {
      field: request.field,
      targetType: result.targetType,
      format: result.format ?? null,
      missingCount: result.missingCount,
    });

    return {
      field: request.field,
      before: before.slice(0, this.previewRows),
      after: result.values.slice(0, this.previewRows),
      missingCount: result.missingCount,
    };
  }

  confirm(): void {
    this.pending = null;
  }

  /** Put back the values replaced by the last unconfirmed fix. Returns the restored field. */
  revert(): string | null {
    if (!this.pending) return null;
    const { field, before } = this.pending;
    this.working.rows.forEach((row, i) => {
      row[field] = before[i];
    });
    this.pending = null;
    logger.info('Coercion reverted', { field });
    return field;
  }

  /** Discard every applied fix. */
  reset(): void {
    this.working = copyDataset(this.original);
    this.pending = null;
  }

  validate(engine: ValidationEngine): ValidationReport {
    return engine.validate(this.working);
  }

  export(sheetName = config.exportSheetName): ExportTable {
    const { columns, rows } = this.working;
    return {
      sheetName,
      columns: [...columns],
      rows: rows.map((r) => columns.map((c) => r[c] ?? null)),
    };
  }
}
