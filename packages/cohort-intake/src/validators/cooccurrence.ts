/**
 * Co-Occurrence file validation
 *
 * Same structure as the cases/controls validator, for tables of phenotype
 * pairs. A pair and its reverse are the same pair.
 *
 * @module validators/cooccurrence
 */

import type { CooccurrenceMapping } from '../core/types/column-mapping.js';
import type { RowSet } from '../core/types/row-set.js';
import { joinMessages, type CooccurrenceValidationResult } from '../core/types/validation.js';
import { pairKey, splitPairKey } from '../core/types/metadata.js';
import { duplicates, formatList, formatSample } from '../core/utils/format.js';
import { numericColumn } from '../tabular/numeric-column.js';
import { normalizeSuppressedColumn } from '../tabular/suppressed-values.js';
import {
  codeColumn,
  countColumnError,
  emptyValuesError,
  missingColumnsError,
  unknownCodes,
} from './column-rules.js';

export function validateCooccurrence(
  rowSet: RowSet,
  mapping: CooccurrenceMapping,
  validCodes: ReadonlySet<string>
): CooccurrenceValidationResult {
  const missing = missingColumnsError(rowSet, [
    mapping.phenotype1,
    mapping.phenotype2,
    mapping.cooccurrence_count,
  ]);
  if (missing) {
    return missing;
  }

  normalizeSuppressedColumn(rowSet, mapping.cooccurrence_count);

  const errors: string[] = [];
  const first = codeColumn(rowSet.rows, mapping.phenotype1);
  const second = codeColumn(rowSet.rows, mapping.phenotype2);

  for (const [column, codes] of [
    [mapping.phenotype1, first],
    [mapping.phenotype2, second],
  ] as const) {
    const empty = emptyValuesError(column, codes);
    if (empty) errors.push(empty);
  }

  for (const [column, codes] of [
    [mapping.phenotype1, first],
    [mapping.phenotype2, second],
  ] as const) {
    const invalid = unknownCodes(codes, validCodes);
    if (invalid.length > 0) {
      errors.push(`Invalid phenotype codes in ${column}: ${formatList(invalid)}`);
    }
  }

  const keys: string[] = [];
  first.forEach((a, index) => {
    const b = second[index];
    if (a !== null && b !== null && b !== undefined) {
      keys.push(pairKey(a, b));
    }
  });
  const repeated = duplicates(keys).map((key) => {
    const [a, b] = splitPairKey(key);
    return `(${a}, ${b})`;
  });
  if (repeated.length > 0) {
    errors.push(`Duplicate phenotype pairs found: ${formatSample(repeated)}`);
  }

  const countError = countColumnError(
    mapping.cooccurrence_count,
    numericColumn(rowSet.rows, mapping.cooccurrence_count)
  );
  if (countError) errors.push(countError);

  return joinMessages(errors);
}
