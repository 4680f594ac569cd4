/**
 * Cases/Controls validator tests
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_CASES_CONTROLS_MAPPING } from '../../../core/types/column-mapping.js';
import { validateCasesControls } from '../../../validators/cases-controls.js';
import { TEST_CODES, table } from '../../utils/fixtures.js';

const mapping = DEFAULT_CASES_CONTROLS_MAPPING;

describe('validateCasesControls', () => {
  it('accepts a clean file and normalizes suppressed counts in place', () => {
    const rowSet = table('phenotype,cases,controls', 'L20,10,90', 'L40,<5,50');

    expect(validateCasesControls(rowSet, mapping, TEST_CODES)).toEqual({ error: null, warning: null });
    expect(rowSet.rows[1]?.cases).toBe(0);
  });

  it('stops at missing columns and reports nothing else', () => {
    const rowSet = table('phenotype,cases', 'ZZZ,1', 'ZZZ,x');

    expect(validateCasesControls(rowSet, mapping, TEST_CODES)).toEqual({
      error: "Missing required columns: ['controls']",
      warning: null,
    });
  });

  it('collects every content error in order', () => {
    const rowSet = table('phenotype,cases,controls', 'L20,10,90', 'L20,5,x', 'ZZZ,1.5,3', ',2,2');

    const result = validateCasesControls(rowSet, mapping, TEST_CODES);

    expect(result.error).toBe(
      [
        "Column 'phenotype' contains empty values",
        "Invalid phenotype codes: ['ZZZ']",
        "Duplicate phenotypes found: ['L20']",
        "Column 'cases' must contain integers, not decimals",
        "Column 'controls' contains non-numeric values",
      ].join('; ')
    );
    expect(result.warning).toBeNull();
  });

  it('reports negative and empty counts', () => {
    expect(validateCasesControls(table('phenotype,cases,controls', 'L20,-1,5'), mapping, TEST_CODES).error).toBe(
      "Column 'cases' must contain only non-negative integers"
    );
    expect(validateCasesControls(table('phenotype,cases,controls', 'L20,3,'), mapping, TEST_CODES).error).toBe(
      "Column 'controls' contains empty values"
    );
  });

  it('quotes at most five duplicates', () => {
    const codes = ['A', 'B', 'C', 'D', 'E', 'F', 'G'];
    const rows = [...codes, ...codes].map((code) => `${code},1,1`);

    const result = validateCasesControls(table('phenotype,cases,controls', ...rows), mapping, new Set(codes));

    expect(result.error).toBe("Duplicate phenotypes found: ['A', 'B', 'C', 'D', 'E'] (and 2 more)");
  });

  it('names mapped columns in messages', () => {
    const rowSet = table('code,n_case,n_ctrl', 'L20,,3');

    const result = validateCasesControls(
      rowSet,
      { phenotype: 'code', cases: 'n_case', controls: 'n_ctrl' },
      TEST_CODES
    );

    expect(result.error).toBe("Column 'n_case' contains empty values");
  });

  describe('breakdown', () => {
    it('warns when categories account for fewer than all cases', () => {
      const rowSet = table('phenotype,cases,controls,breakdown', 'L20,10,90,A:3;B:2');

      expect(validateCasesControls(rowSet, mapping, TEST_CODES)).toEqual({
        error: null,
        warning: "Phenotype 'L20': breakdown total (5) is less than cases (10)",
      });
    });

    it('rejects a category larger than the case count', () => {
      const rowSet = table('phenotype,cases,controls,breakdown', 'L40,4,10,A:5');

      expect(validateCasesControls(rowSet, mapping, TEST_CODES)).toEqual({
        error: "Phenotype 'L40': breakdown count for 'A' (5) exceeds total cases (4)",
        warning: null,
      });
    });

    it('reports malformed entries and reads suppressed counts as zero', () => {
      const rowSet = table('phenotype,cases,controls,breakdown', 'L20,10,90,A3;B:x;C:<5');

      expect(validateCasesControls(rowSet, mapping, TEST_CODES)).toEqual({
        error: [
          "Phenotype 'L20': malformed breakdown entry 'A3' (expected CODE:COUNT)",
          "Phenotype 'L20': breakdown count for 'B' is not an integer ('x')",
        ].join('; '),
        warning: null,
      });
    });

    it('skips bound checks when the case count is unreadable', () => {
      const rowSet = table('phenotype,cases,controls,breakdown', 'L20,x,5,A:100');

      expect(validateCasesControls(rowSet, mapping, TEST_CODES)).toEqual({
        error: "Column 'cases' contains non-numeric values",
        warning: null,
      });
    });

    it('ignores an unmapped breakdown column', () => {
      const rowSet = table('phenotype,cases,controls,breakdown', 'L40,4,10,A:5');

      const result = validateCasesControls(
        rowSet,
        { phenotype: 'phenotype', cases: 'cases', controls: 'controls' },
        TEST_CODES
      );

      expect(result).toEqual({ error: null, warning: null });
    });
  });
});
