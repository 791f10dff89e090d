import { describe, it, expect } from 'vitest';
import { inferHeaderFormat, isUsableFormat, parseLoose, parseStrict, toDayjsFormat } from '../lib/date-formats';

describe('inferHeaderFormat', () => {
  it('expects a datetime when the name contains "time"', () => {
    expect(inferHeaderFormat('StartTime')).toBe('dd-mm-yyyy hh:mm');
    expect(inferHeaderFormat('DateTime')).toBe('dd-mm-yyyy hh:mm');
  });

  it('expects a date when the name contains "date" only', () => {
    expect(inferHeaderFormat('EventDate')).toBe('dd-mm-yyyy');
    expect(inferHeaderFormat('LAST_UPDATED')).toBe('dd-mm-yyyy');
  });

  it('infers nothing for other names', () => {
    expect(inferHeaderFormat('Region')).toBeUndefined();
  });
});

describe('toDayjsFormat', () => {
  it('reads mm as month in a date and minutes after hh', () => {
    expect(toDayjsFormat('dd-mm-yyyy hh:mm')).toBe('DD-MM-YYYY HH:mm');
    expect(toDayjsFormat('yyyy/mm/dd')).toBe('YYYY/MM/DD');
    expect(toDayjsFormat('mm:ss')).toBe('mm:ss');
  });

  it('escapes stray letters', () => {
    expect(toDayjsFormat('yyyy-mm-ddThh:mm')).toBe('YYYY-MM-DD[T]HH:mm');
  });

  it('knows when a format has no date tokens', () => {
    expect(isUsableFormat('dd.mm.yy')).toBe(true);
    expect(isUsableFormat('abc')).toBe(false);
  });
});

describe('date parsing', () => {
  it('strict parse accepts only the exact format', () => {
    expect(parseStrict('05-01-2024', 'dd-mm-yyyy')?.format('YYYY-MM-DD')).toBe('2024-01-05');
    expect(parseStrict('5-1-2024', 'dd-mm-yyyy')).toBeNull();
    expect(parseStrict('05-01-2024 09:30', 'dd-mm-yyyy hh:mm')?.format('HH:mm')).toBe('09:30');
    expect(parseStrict('05-01-2024', 'dd-mm-yyyy hh:mm')).toBeNull();
  });

  it('rejects impossible calendar dates', () => {
    expect(parseStrict('31-02-2024', 'dd-mm-yyyy')).toBeNull();
    expect(parseLoose('31-02-2024')).toBeNull();
  });

  it('accepts Date cells as already parsed', () => {
    expect(parseStrict(new Date(2024, 0, 5), 'dd-mm-yyyy')?.format('DD-MM-YYYY')).toBe('05-01-2024');
  });

  it('best-effort parse covers ISO and day-first layouts', () => {
    expect(parseLoose('2024-01-05')?.format('DD-MM-YYYY')).toBe('05-01-2024');
    expect(parseLoose('5/1/2024')?.format('DD-MM-YYYY')).toBe('05-01-2024');
    expect(parseLoose('05.01.2024')?.format('DD-MM-YYYY')).toBe('05-01-2024');
    expect(parseLoose('hello')).toBeNull();
    expect(parseLoose(12)).toBeNull();
  });

  it('best-effort parse covers month names, milliseconds, compact and two-digit years', () => {
    const days = ['05-Jan-2024', '5 Jan 2024', 'Jan 5, 2024', '2024-01-05 09:30:00.000', '20240105', '05/01/24', '05-01-24'];
    expect(days.map((d) => parseLoose(d)?.format('YYYY-MM-DD'))).toEqual(Array(days.length).fill('2024-01-05'));
    expect(parseLoose('2024-01-05 09:30:00.000')?.format('HH:mm')).toBe('09:30');
  });

  it('settles Date cells a millisecond short of midnight onto the next day', () => {
    const almost = new Date(new Date(2024, 0, 5).getTime() - 1);
    expect(parseLoose(almost)?.format('DD-MM-YYYY HH:mm:ss')).toBe('05-01-2024 00:00:00');
    expect(parseStrict(almost, 'dd-mm-yyyy')?.format('DD-MM-YYYY')).toBe('05-01-2024');
  });
});
