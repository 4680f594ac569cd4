/**
 * Breakdown cell tests
 */

import { describe, it, expect } from 'vitest';
import { checkBreakdown } from '../../../validators/breakdown.js';

const label = "Phenotype 'L20'";

describe('checkBreakdown', () => {
  it('parses entries, ignoring blank segments', () => {
    const check = checkBreakdown(label, ' A:3 ; ; B:<5 ', 10);

    expect(check.entries).toEqual([
      { code: 'A', count: 3 },
      { code: 'B', count: 0 },
    ]);
    expect(check.errors).toEqual([]);
    expect(check.warnings).toEqual(["Phenotype 'L20': breakdown total (3) is less than cases (10)"]);
  });

  it('rejects entries that are not CODE:COUNT', () => {
    expect(checkBreakdown(label, 'A:1:2;:4', 10).errors).toEqual([
      "Phenotype 'L20': malformed breakdown entry 'A:1:2' (expected CODE:COUNT)",
      "Phenotype 'L20': malformed breakdown entry ':4' (expected CODE:COUNT)",
    ]);
  });

  it('rejects fractional and negative counts', () => {
    expect(checkBreakdown(label, 'A:2.5;B:-2', 10).errors).toEqual([
      "Phenotype 'L20': breakdown count for 'A' is not an integer ('2.5')",
      "Phenotype 'L20': breakdown count for 'B' must be non-negative (-2)",
    ]);
  });

  it('does not warn when the breakdown is all zeros or complete', () => {
    expect(checkBreakdown(label, 'A:<5', 10).warnings).toEqual([]);
    expect(checkBreakdown(label, 'A:6;B:4', 10).warnings).toEqual([]);
  });

  it('skips case bounds when cases are unknown', () => {
    expect(checkBreakdown(label, 'A:50', null)).toEqual({
      entries: [{ code: 'A', count: 50 }],
      errors: [],
      warnings: [],
    });
  });
});
