/**
 * Typed numeric column view tests
 */

import { describe, it, expect } from 'vitest';
import {
  cellText,
  integerOrNull,
  integerOrZero,
  numericColumn,
  toNumericCell,
} from '../../../tabular/numeric-column.js';

describe('toNumericCell', () => {
  it('treats null and blank text as empty', () => {
    expect(toNumericCell(null)).toEqual({ kind: 'empty' });
    expect(toNumericCell('   ')).toEqual({ kind: 'empty' });
  });

  it('parses integer, decimal, signed and exponent literals', () => {
    expect(toNumericCell('12')).toEqual({ kind: 'number', value: 12 });
    expect(toNumericCell('1.5')).toEqual({ kind: 'number', value: 1.5 });
    expect(toNumericCell('-3')).toEqual({ kind: 'number', value: -3 });
    expect(toNumericCell('1e3')).toEqual({ kind: 'number', value: 1000 });
    expect(toNumericCell(7)).toEqual({ kind: 'number', value: 7 });
  });

  it('marks anything else invalid and keeps the raw text', () => {
    expect(toNumericCell('abc')).toEqual({ kind: 'invalid', raw: 'abc' });
    expect(toNumericCell('12 cases')).toEqual({ kind: 'invalid', raw: '12 cases' });
    expect(toNumericCell(Number.NaN)).toEqual({ kind: 'invalid', raw: 'NaN' });
  });
});

describe('numericColumn', () => {
  it('builds one cell per row, treating absent keys as empty', () => {
    const cells = numericColumn([{ cases: '4' }, { other: '1' }, { cases: 'x' }], 'cases');

    expect(cells).toEqual([
      { kind: 'number', value: 4 },
      { kind: 'empty' },
      { kind: 'invalid', raw: 'x' },
    ]);
  });
});

describe('integer helpers', () => {
  it('truncates decimals', () => {
    expect(integerOrNull({ kind: 'number', value: 2.9 })).toBe(2);
  });

  it('maps unparseable cells to null or zero', () => {
    expect(integerOrNull({ kind: 'invalid', raw: 'x' })).toBeNull();
    expect(integerOrZero({ kind: 'invalid', raw: 'x' })).toBe(0);
    expect(integerOrZero({ kind: 'empty' })).toBe(0);
  });
});

describe('cellText', () => {
  it('trims text and maps blanks to null', () => {
    expect(cellText('  L20 ')).toBe('L20');
    expect(cellText('')).toBeNull();
    expect(cellText(undefined)).toBeNull();
    expect(cellText(5)).toBe('5');
  });
});
