/**
 * Tab-separated serialization of row sets
 *
 * @module tabular/row-set-writer
 */

import type { CellValue, RowSet } from '../core/types/row-set.js';

export const TSV_CONTENT_TYPE = 'text/tab-separated-values';

/**
 * Quote a field that would otherwise split a line or a record
 */
function escapeTsv(value: string): string {
  if (value.includes('\t') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function fieldOf(value: CellValue | undefined): string {
  return value === null || value === undefined ? '' : escapeTsv(String(value));
}

/**
 * Serialize with a header line; null cells become empty fields. Every line,
 * the last included, ends with `\n`.
 */
export function toTsv(rowSet: RowSet): string {
  const headerRow = rowSet.columns.map(escapeTsv).join('\t');
  const dataRows = rowSet.rows.map((row) => rowSet.columns.map((column) => fieldOf(row[column])).join('\t'));
  return `${[headerRow, ...dataRows].join('\n')}\n`;
}
