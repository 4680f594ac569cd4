/**
 * Cases/Controls file validation
 *
 * Checks a parsed cases/controls table against its column mapping and the
 * phenotype registry. Missing columns stop validation immediately; every
 * other problem is collected so the uploader sees all of them at once.
 * Breakdown shortfalls are reported as warnings and do not block the upload.
 *
 * The `cases` and `controls` columns of the given row set are normalized in
 * place (`<5` -> 0).
 *
 * @module validators/cases-controls
 */

import type { CasesControlsMapping } from '../core/types/column-mapping.js';
import type { RowSet } from '../core/types/row-set.js';
import { joinMessages, type CasesControlsValidationResult } from '../core/types/validation.js';
import { duplicates, formatList, formatSample } from '../core/utils/format.js';
import { numericColumn } from '../tabular/numeric-column.js';
import { normalizeSuppressedColumn } from '../tabular/suppressed-values.js';
import { checkBreakdown } from './breakdown.js';
import {
  codeColumn,
  countColumnError,
  emptyValuesError,
  missingColumnsError,
  unknownCodes,
} from './column-rules.js';

export function validateCasesControls(
  rowSet: RowSet,
  mapping: CasesControlsMapping,
  validCodes: ReadonlySet<string>
): CasesControlsValidationResult {
  const missing = missingColumnsError(rowSet, [mapping.phenotype, mapping.cases, mapping.controls]);
  if (missing) {
    return { error: missing, warning: null };
  }

  normalizeSuppressedColumn(rowSet, mapping.cases);
  normalizeSuppressedColumn(rowSet, mapping.controls);

  const errors: string[] = [];
  const warnings: string[] = [];

  const codes = codeColumn(rowSet.rows, mapping.phenotype);
  const emptyCodes = emptyValuesError(mapping.phenotype, codes);
  if (emptyCodes) errors.push(emptyCodes);

  const invalid = unknownCodes(codes, validCodes);
  if (invalid.length > 0) {
    errors.push(`Invalid phenotype codes: ${formatList(invalid)}`);
  }

  const repeated = duplicates(codes.filter((code): code is string => code !== null));
  if (repeated.length > 0) {
    errors.push(`Duplicate phenotypes found: ${formatSample(repeated)}`);
  }

  const cases = numericColumn(rowSet.rows, mapping.cases);
  const casesError = countColumnError(mapping.cases, cases);
  if (casesError) errors.push(casesError);

  const controlsError = countColumnError(mapping.controls, numericColumn(rowSet.rows, mapping.controls));
  if (controlsError) errors.push(controlsError);

  const breakdownColumn = mapping.breakdown;
  if (breakdownColumn !== undefined && rowSet.columns.includes(breakdownColumn)) {
    rowSet.rows.forEach((row, index) => {
      const value = row[breakdownColumn];
      if (value === null || value === undefined || String(value).trim() === '') {
        return;
      }
      const code = codes[index];
      const label = code ? `Phenotype '${code}'` : `Row ${index + 1}`;
      const cell = cases[index];
      const check = checkBreakdown(label, String(value), cell?.kind === 'number' ? cell.value : null);
      errors.push(...check.errors);
      warnings.push(...check.warnings);
    });
  }

  return { error: joinMessages(errors), warning: joinMessages(warnings) };
}
