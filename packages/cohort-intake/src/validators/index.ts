/**
 * File validation entry point
 *
 * @module validators
 */

import {
  isCasesControlsMapping,
  isCooccurrenceMapping,
  type ColumnMapping,
} from '../core/types/column-mapping.js';
import type { FileFamily } from '../core/types/file-types.js';
import type { RowSet } from '../core/types/row-set.js';
import type { FileValidationResult } from '../core/types/validation.js';
import { validateCasesControls } from './cases-controls.js';
import { validateCooccurrence } from './cooccurrence.js';

export { validateCasesControls } from './cases-controls.js';
export { validateCooccurrence } from './cooccurrence.js';
export { checkBreakdown } from './breakdown.js';
export type { BreakdownCheck, BreakdownEntry } from './breakdown.js';
export {
  checkCasesControlsSampleSize,
  checkCooccurrenceSampleSize,
  declaredSampleSize,
} from './sample-size-bounds.js';
export type { DeclaredSampleSizes } from './sample-size-bounds.js';

/**
 * Validate a table of the given family. Normalizes its count columns in place.
 */
export function validateFile(
  family: FileFamily,
  rowSet: RowSet,
  mapping: ColumnMapping,
  validCodes: ReadonlySet<string>
): FileValidationResult {
  if (family === 'cases_controls') {
    if (!isCasesControlsMapping(mapping)) {
      return { error: 'Column mapping does not describe a cases/controls file', warning: null };
    }
    return validateCasesControls(rowSet, mapping, validCodes);
  }

  if (!isCooccurrenceMapping(mapping)) {
    return { error: 'Column mapping does not describe a co-occurrence file', warning: null };
  }
  return { error: validateCooccurrence(rowSet, mapping, validCodes), warning: null };
}
