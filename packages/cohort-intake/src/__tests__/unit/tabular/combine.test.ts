/**
 * Male + female merge tests
 */

import { describe, it, expect } from 'vitest';
import { combineRowSets, positionalMapping } from '../../../tabular/combine.js';
import { table } from '../../utils/fixtures.js';

describe('combineRowSets - cases/controls', () => {
  it('sums cases and controls per phenotype, male codes first', () => {
    const male = table('phenotype,cases,controls', 'L20,10,20', 'L40,<5,7');
    const female = table('phenotype,cases,controls', 'L20,5,15', 'L70,3,4');

    const combined = combineRowSets(
      'cases_controls',
      { rowSet: male, mapping: null },
      { rowSet: female, mapping: null }
    );

    expect(combined.columns).toEqual(['phenotype', 'cases', 'controls']);
    expect(combined.rows).toEqual([
      { phenotype: 'L20', cases: 15, controls: 35 },
      { phenotype: 'L40', cases: 0, controls: 7 },
      { phenotype: 'L70', cases: 3, controls: 4 },
    ]);
  });

  it('applies each side its own column mapping', () => {
    const male = table('phenotype,cases,controls', 'L20,10,20');
    const female = table('code,n_cases,n_controls', 'L20,5,15');

    const combined = combineRowSets(
      'cases_controls',
      { rowSet: male, mapping: null },
      { rowSet: female, mapping: { phenotype: 'code', cases: 'n_cases', controls: 'n_controls' } }
    );

    expect(combined.rows).toEqual([{ phenotype: 'L20', cases: 15, controls: 35 }]);
  });

  it('carries breakdowns when either side has them', () => {
    const male = table('phenotype,cases,controls,breakdown', 'L20,10,20,A:6;B:4');
    const female = table('phenotype,cases,controls', 'L20,5,15', 'L40,1,2');

    const combined = combineRowSets(
      'cases_controls',
      {
        rowSet: male,
        mapping: { phenotype: 'phenotype', cases: 'cases', controls: 'controls', breakdown: 'breakdown' },
      },
      { rowSet: female, mapping: null }
    );

    expect(combined.columns).toEqual(['phenotype', 'cases', 'controls', 'breakdown']);
    expect(combined.rows).toEqual([
      { phenotype: 'L20', cases: 15, controls: 35, breakdown: 'A:6;B:4' },
      { phenotype: 'L40', cases: 1, controls: 2, breakdown: null },
    ]);
  });

  it('drops rows without a phenotype', () => {
    const male = table('phenotype,cases,controls', ',4,4', 'L20,1,1');
    const female = table('phenotype,cases,controls', 'L20,1,1');

    const combined = combineRowSets(
      'cases_controls',
      { rowSet: male, mapping: null },
      { rowSet: female, mapping: null }
    );

    expect(combined.rows).toEqual([{ phenotype: 'L20', cases: 2, controls: 2 }]);
  });

  it('rejects an input that lacks a mapped column', () => {
    const male = table('phenotype,cases', 'L20,10');
    const female = table('phenotype,cases,controls', 'L20,5,15');

    expect(() =>
      combineRowSets('cases_controls', { rowSet: male, mapping: null }, { rowSet: female, mapping: null })
    ).toThrow("Missing required columns: ['controls']");
  });
});

describe('combineRowSets - co-occurrence', () => {
  it('treats pairs as unordered and writes them sorted', () => {
    const male = table('phenotype1,phenotype2,cooccurrence_count', 'L40,L20,3');
    const female = table('phenotype1,phenotype2,cooccurrence_count', 'L20,L40,2', 'L20,L70,<5');

    const combined = combineRowSets(
      'cooccurrence',
      { rowSet: male, mapping: null },
      { rowSet: female, mapping: null }
    );

    expect(combined.columns).toEqual(['phenotype1', 'phenotype2', 'cooccurrence_count']);
    expect(combined.rows).toEqual([
      { phenotype1: 'L20', phenotype2: 'L40', cooccurrence_count: 5 },
      { phenotype1: 'L20', phenotype2: 'L70', cooccurrence_count: 0 },
    ]);
  });
});

describe('positionalMapping', () => {
  it('maps the leading columns of a combined table', () => {
    expect(positionalMapping('cases_controls', ['phenotype', 'cases', 'controls'])).toEqual({
      phenotype: 'phenotype',
      cases: 'cases',
      controls: 'controls',
    });
    expect(positionalMapping('cases_controls', ['p', 'c', 'k', 'b'])).toEqual({
      phenotype: 'p',
      cases: 'c',
      controls: 'k',
      breakdown: 'b',
    });
    expect(positionalMapping('cooccurrence', ['a', 'b', 'n'])).toEqual({
      phenotype1: 'a',
      phenotype2: 'b',
      cooccurrence_count: 'n',
    });
  });
});
