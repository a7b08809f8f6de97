/**
 * CSV reader Unit Tests
 */

import { parseCsvRows, parseCsvTable } from '../../../utils/csv';

describe('parseCsvRows', () => {
  it('reads quoted fields and doubled quotes', () => {
    expect(parseCsvRows('"a","b"\n"1","x""y"\n')).toEqual([
      ['a', 'b'],
      ['1', 'x"y'],
    ]);
  });

  it('keeps newlines inside quotes and accepts CRLF', () => {
    expect(parseCsvRows('"multi\nline",2\r\n3,4')).toEqual([
      ['multi\nline', '2'],
      ['3', '4'],
    ]);
  });

  it('keeps empty fields', () => {
    expect(parseCsvRows('a,,c\n"",""\n')).toEqual([
      ['a', '', 'c'],
      ['', ''],
    ]);
  });

  it('skips blank lines', () => {
    expect(parseCsvRows('a\n\nb')).toEqual([['a'], ['b']]);
  });

  it('returns no rows for empty input', () => {
    expect(parseCsvRows('')).toEqual([]);
  });
});

describe('parseCsvTable', () => {
  it('splits the header from data rows', () => {
    expect(parseCsvTable('"_col0"\n"100"\n')).toEqual({ columns: ['_col0'], rows: [['100']] });
  });

  it('returns an empty table for an empty artifact', () => {
    expect(parseCsvTable('')).toEqual({ columns: [], rows: [] });
  });
});
