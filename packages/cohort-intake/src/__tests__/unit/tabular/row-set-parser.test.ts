/**
 * Delimited-file parsing tests
 */

import { describe, it, expect } from 'vitest';
import { gzipSync } from 'node:zlib';
import { FileParseError } from '../../../core/errors.js';
import { delimiterForFileName, isGzip, parseRowSet } from '../../../tabular/row-set-parser.js';
import { bytes } from '../../utils/fixtures.js';

describe('delimiterForFileName', () => {
  it('uses tabs for .tsv and .txt, with or without .gz', () => {
    expect(delimiterForFileName('cases.tsv')).toBe('\t');
    expect(delimiterForFileName('cases.TXT.gz')).toBe('\t');
  });

  it('falls back to commas', () => {
    expect(delimiterForFileName('cases.csv')).toBe(',');
    expect(delimiterForFileName('cases.csv.gz')).toBe(',');
    expect(delimiterForFileName('cases')).toBe(',');
  });
});

describe('parseRowSet', () => {
  it('keeps codes as strings and maps empty cells to null', () => {
    const rowSet = parseRowSet(bytes('phenotype,cases\n007,<5\nL20,\n'), 'cases.csv');

    expect(rowSet.columns).toEqual(['phenotype', 'cases']);
    expect(rowSet.rows).toEqual([
      { phenotype: '007', cases: '<5' },
      { phenotype: 'L20', cases: null },
    ]);
  });

  it('inflates gzip content', () => {
    const content = gzipSync(Buffer.from('a\tb\n1\t2\n'));

    expect(isGzip(content)).toBe(true);
    expect(parseRowSet(content, 'pairs.tsv.gz').rows).toEqual([{ a: '1', b: '2' }]);
  });

  it('pads short records and trims headers', () => {
    const rowSet = parseRowSet(bytes(' a , b \n1\n'), 'short.csv');

    expect(rowSet.columns).toEqual(['a', 'b']);
    expect(rowSet.rows).toEqual([{ a: '1', b: null }]);
  });

  it('strips a byte order mark and skips blank lines', () => {
    const rowSet = parseRowSet(bytes('\uFEFFphenotype,cases\n\nL20,3\n\n'), 'bom.csv');

    expect(rowSet.columns).toEqual(['phenotype', 'cases']);
    expect(rowSet.rows).toEqual([{ phenotype: 'L20', cases: '3' }]);
  });

  it('returns an empty table for empty content', () => {
    expect(parseRowSet(bytes(''), 'empty.csv')).toEqual({ columns: [], rows: [] });
  });

  it('wraps unreadable content in FileParseError', () => {
    const corrupt = new Uint8Array([0x1f, 0x8b, 0x00, 0x01, 0x02]);

    expect(() => parseRowSet(corrupt, 'broken.csv.gz')).toThrow(FileParseError);
  });
});
