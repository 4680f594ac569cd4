/**
 * TSV serialization tests
 */

import { describe, it, expect } from 'vitest';
import { parseDelimitedText } from '../../../tabular/row-set-parser.js';
import { toTsv } from '../../../tabular/row-set-writer.js';

describe('toTsv', () => {
  const rowSet = {
    columns: ['phenotype', 'cases', 'controls', 'breakdown'],
    rows: [
      { phenotype: 'L20', cases: 15, controls: 35, breakdown: 'A:6;B:4' },
      { phenotype: 'L40', cases: 0, controls: 7, breakdown: null },
    ],
  };

  it('writes a header line and one tab-separated line per row', () => {
    expect(toTsv(rowSet)).toBe(
      'phenotype\tcases\tcontrols\tbreakdown\nL20\t15\t35\tA:6;B:4\nL40\t0\t7\t\n'
    );
  });

  it('quotes fields containing tabs or quotes', () => {
    const tsv = toTsv({ columns: ['phenotype', 'note'], rows: [{ phenotype: 'L20', note: 'a\tb "c"' }] });

    expect(tsv).toBe('phenotype\tnote\nL20\t"a\tb ""c"""\n');
  });

  it('reads back with the tab parser', () => {
    const parsed = parseDelimitedText(toTsv(rowSet), '\t');

    expect(parsed.columns).toEqual(rowSet.columns);
    expect(parsed.rows[1]).toEqual({ phenotype: 'L40', cases: '0', controls: '7', breakdown: null });
  });
});
