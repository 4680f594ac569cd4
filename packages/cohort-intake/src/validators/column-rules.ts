/**
 * Column-level rules shared by the file validators
 *
 * @module validators/column-rules
 */

import type { NumericCell, Row, RowSet } from '../core/types/row-set.js';
import { formatList, unique } from '../core/utils/format.js';
import { cellText } from '../tabular/numeric-column.js';

export function missingColumnsError(rowSet: RowSet, headers: readonly string[]): string | null {
  const missing = unique(headers.filter((header) => !rowSet.columns.includes(header)));
  return missing.length > 0 ? `Missing required columns: ${formatList(missing)}` : null;
}

/**
 * Phenotype codes of a column, `null` where the cell is empty.
 */
export function codeColumn(rows: readonly Row[], column: string): (string | null)[] {
  return rows.map((row) => cellText(row[column]));
}

export function emptyValuesError(column: string, values: readonly (string | null)[]): string | null {
  return values.some((value) => value === null) ? `Column '${column}' contains empty values` : null;
}

/**
 * Distinct codes absent from the registry, in order of first appearance.
 */
export function unknownCodes(
  values: readonly (string | null)[],
  validCodes: ReadonlySet<string>
): string[] {
  return unique(
    values.filter((value): value is string => value !== null && !validCodes.has(value))
  );
}

/**
 * First failing rule of a count column: empty, non-numeric, negative,
 * fractional.
 */
export function countColumnError(column: string, cells: readonly NumericCell[]): string | null {
  if (cells.some((cell) => cell.kind === 'empty')) {
    return `Column '${column}' contains empty values`;
  }
  if (cells.some((cell) => cell.kind === 'invalid')) {
    return `Column '${column}' contains non-numeric values`;
  }
  const values = cells.flatMap((cell) => (cell.kind === 'number' ? [cell.value] : []));
  if (values.some((value) => value < 0)) {
    return `Column '${column}' must contain only non-negative integers`;
  }
  if (values.some((value) => !Number.isInteger(value))) {
    return `Column '${column}' must contain integers, not decimals`;
  }
  return null;
}
