/**
 * Family dispatch tests
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CASES_CONTROLS_MAPPING,
  DEFAULT_COOCCURRENCE_MAPPING,
} from '../../../core/types/column-mapping.js';
import { validateFile } from '../../../validators/index.js';
import { TEST_CODES, table } from '../../utils/fixtures.js';

describe('validateFile', () => {
  it('wraps co-occurrence errors in a result without warning', () => {
    const rowSet = table('phenotype1,phenotype2,cooccurrence_count', 'L20,L40,x');

    expect(validateFile('cooccurrence', rowSet, DEFAULT_COOCCURRENCE_MAPPING, TEST_CODES)).toEqual({
      error: "Column 'cooccurrence_count' contains non-numeric values",
      warning: null,
    });
  });

  it('rejects a mapping of the other family', () => {
    const rowSet = table('phenotype,cases,controls', 'L20,1,1');

    expect(validateFile('cooccurrence', rowSet, DEFAULT_CASES_CONTROLS_MAPPING, TEST_CODES)).toEqual({
      error: 'Column mapping does not describe a co-occurrence file',
      warning: null,
    });
    expect(validateFile('cases_controls', rowSet, DEFAULT_COOCCURRENCE_MAPPING, TEST_CODES)).toEqual({
      error: 'Column mapping does not describe a cases/controls file',
      warning: null,
    });
  });
});
