/**
 * Typed numeric column view
 *
 * Each numeric column is coerced exactly once into a list of
 * `empty | number | invalid` cells; validators and extractors read that list
 * instead of re-parsing raw cells.
 *
 * @module tabular/numeric-column
 */

import type { CellValue, NumericCell, Row } from '../core/types/row-set.js';

const DECIMAL_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function isDecimalLiteral(text: string): boolean {
  return DECIMAL_LITERAL.test(text);
}

export function toNumericCell(value: CellValue): NumericCell {
  if (value === null) {
    return { kind: 'empty' };
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? { kind: 'number', value } : { kind: 'invalid', raw: String(value) };
  }
  const text = value.trim();
  if (text === '') {
    return { kind: 'empty' };
  }
  if (!isDecimalLiteral(text)) {
    return { kind: 'invalid', raw: text };
  }
  return { kind: 'number', value: Number(text) };
}

export function numericColumn(rows: readonly Row[], column: string): NumericCell[] {
  return rows.map((row) => toNumericCell(row[column] ?? null));
}

/**
 * Integer value of a cell for aggregation: decimals truncate, anything
 * unparseable becomes null.
 */
export function integerOrNull(cell: NumericCell): number | null {
  return cell.kind === 'number' ? Math.trunc(cell.value) : null;
}

/**
 * Like {@link integerOrNull} but unparseable cells count as 0.
 */
export function integerOrZero(cell: NumericCell): number {
  return integerOrNull(cell) ?? 0;
}

/**
 * Text of a cell for code comparisons; empty cells yield null.
 */
export function cellText(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const text = String(value).trim();
  return text === '' ? null : text;
}
