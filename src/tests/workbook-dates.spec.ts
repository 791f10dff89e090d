import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { coerceColumn } from '../lib/coercion';
import { DatasetSession } from '../lib/dataset-session';
import { readDataset } from '../lib/workbook';
import { workbookBuffer } from './helpers';

// SheetJS hands back date cells a millisecond short of local midnight east of UTC.
const savedTz = process.env.TZ;

beforeAll(() => {
  process.env.TZ = 'Asia/Kolkata';
});

afterAll(() => {
  if (savedTz === undefined) delete process.env.TZ;
  else process.env.TZ = savedTz;
});

describe('workbook date cells east of UTC', () => {
  const input = () => readDataset(workbookBuffer({ Data: [['EventDate'], [new Date(2024, 0, 5)], ['2024-01-06']] }), 'input.xlsx');

  it('reads the cell back as local midnight', () => {
    expect(input().rows[0].EventDate).toEqual(new Date(2024, 0, 5));
  });

  it('keeps the calendar day through a date fix', () => {
    const session = new DatasetSession(input());
    session.applyCoercion({ field: 'EventDate', targetType: 'date' });
    expect(session.snapshot().rows.map((r) => r.EventDate)).toEqual(['05-01-2024', '06-01-2024']);
  });

  it('keeps the calendar day through a string fix', () => {
    expect(coerceColumn(input(), { field: 'EventDate', targetType: 'string' }).values).toEqual(['2024-01-05', '2024-01-06']);
  });
});
