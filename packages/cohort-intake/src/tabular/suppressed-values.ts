/**
 * Suppressed-value normalization
 *
 * Counts below a privacy threshold arrive as strings such as `<5`. Every
 * such value is treated as 0 before any numeric rule runs.
 *
 * @module tabular/suppressed-values
 */

import type { CellValue, RowSet } from '../core/types/row-set.js';

export function isSuppressed(value: CellValue): boolean {
  return value !== null && String(value).trim().startsWith('<');
}

/**
 * Replace suppressed values with 0; everything else passes through.
 */
export function normalizeSuppressedValues(values: readonly CellValue[]): CellValue[] {
  return values.map((value) => (isSuppressed(value) ? 0 : value));
}

/**
 * Normalize one column of a row set in place. Missing columns are ignored.
 */
export function normalizeSuppressedColumn(rowSet: RowSet, column: string): void {
  if (!rowSet.columns.includes(column)) {
    return;
  }
  for (const row of rowSet.rows) {
    const value = row[column] ?? null;
    if (isSuppressed(value)) {
      row[column] = 0;
    }
  }
}
