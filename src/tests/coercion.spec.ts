import { describe, it, expect } from 'vitest';
import { coerceColumn, defaultDateFormat, toCoercionRequest } from '../lib/coercion';
import { CoercionError } from '../lib/errors';
import { dataset } from './helpers';

describe('coerceColumn', () => {
  it('parses numbers and marks unparseable cells missing', () => {
    const ds = dataset(['Amount'], ['12'], ['x'], ['7']);
    const result = coerceColumn(ds, { field: 'Amount', targetType: 'number' });
    expect(result.values).toEqual([12, null, 7]);
    expect(result.missingCount).toBe(1);
  });

  it('stringifies every cell in row order', () => {
    const ds = dataset(['Mixed'], ['a'], [3], [null], [true]);
    const result = coerceColumn(ds, { field: 'Mixed', targetType: 'string' });
    expect(result.values).toEqual(['a', '3', '', 'true']);
    expect(result.missingCount).toBe(0);
  });

  it('re-formats dates with the header-driven default format', () => {
    const ds = dataset(['EventDate'], ['2024-01-05'], ['5/1/2024'], ['31-02-2024'], ['']);
    const result = coerceColumn(ds, { field: 'EventDate', targetType: 'date' });
    expect(result.format).toBe('dd-mm-yyyy');
    expect(result.values).toEqual(['05-01-2024', '05-01-2024', null, null]);
    expect(result.missingCount).toBe(1);
  });

  it('re-formats month-name, compact and two-digit-year dates instead of dropping them', () => {
    const ds = dataset(['Posted'], ['05-Jan-2024'], ['5 Jan 2024'], ['Jan 5, 2024'], ['2024-01-05 09:30:00.000'], ['20240105'], ['05/01/24']);
    const result = coerceColumn(ds, { field: 'Posted', targetType: 'date', format: 'dd-mm-yyyy' });
    expect(result.values).toEqual(Array(6).fill('05-01-2024'));
    expect(result.missingCount).toBe(0);
  });

  it('only reads decimal numbers', () => {
    const ds = dataset(['Amount'], ['0x1A'], ['0b101'], ['0o7'], [' -1.5e2 '], ['.5'], ['Infinity']);
    const result = coerceColumn(ds, { field: 'Amount', targetType: 'number' });
    expect(result.values).toEqual([null, null, null, -150, 0.5, null]);
    expect(result.missingCount).toBe(4);
  });

  it('uses an explicit format when given', () => {
    const ds = dataset(['Posted'], ['05-01-2024 09:30']);
    const result = coerceColumn(ds, { field: 'Posted', targetType: 'date', format: 'yyyy/mm/dd hh:mm' });
    expect(result.values).toEqual(['2024/01/05 09:30']);
  });

  it('does not touch the dataset', () => {
    const ds = dataset(['Amount', 'Note'], ['x', 'keep']);
    coerceColumn(ds, { field: 'Amount', targetType: 'number' });
    expect(ds.rows).toEqual([{ Amount: 'x', Note: 'keep' }]);
  });

  it('fails for unknown columns and unusable formats', () => {
    const ds = dataset(['Amount'], ['1']);
    expect(() => coerceColumn(ds, { field: 'Total', targetType: 'number' })).toThrow(
      "Cannot coerce 'Total': column not found in dataset"
    );
    expect(() => coerceColumn(ds, { field: 'Amount', targetType: 'date', format: 'abc' })).toThrow(CoercionError);
  });
});

describe('toCoercionRequest', () => {
  it('normalises the target type and drops blank formats', () => {
    expect(toCoercionRequest('Amount', ' NUMBER ', '')).toEqual({ field: 'Amount', targetType: 'number', format: undefined });
    expect(toCoercionRequest('EventDate', 'date', ' dd-mm-yyyy ')).toEqual({
      field: 'EventDate',
      targetType: 'date',
      format: 'dd-mm-yyyy',
    });
  });

  it('rejects unknown target types', () => {
    expect(() => toCoercionRequest('Amount', 'boolean')).toThrow(
      "Cannot coerce 'Amount': unknown target type 'boolean' (expected string, number, date)"
    );
    let caught: unknown;
    try {
      toCoercionRequest('Amount', 7);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(CoercionError);
    expect(caught).toMatchObject({ field: 'Amount', reason: "unknown target type '7' (expected string, number, date)" });
  });
});

describe('defaultDateFormat', () => {
  it('prefers the header hint over the generic format', () => {
    expect(defaultDateFormat('CreatedTime', 'yyyy-mm-dd')).toBe('dd-mm-yyyy hh:mm');
    expect(defaultDateFormat('Posted', 'yyyy-mm-dd')).toBe('yyyy-mm-dd');
  });
});
