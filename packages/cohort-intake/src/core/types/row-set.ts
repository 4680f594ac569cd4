/**
 * In-memory tabular data
 *
 * @module core/types/row-set
 */

/**
 * A single cell. Parsers yield trimmed strings and `null` for empty cells;
 * numbers appear once a column has been normalized or aggregated.
 */
export type CellValue = string | number | null;

export type Row = Record<string, CellValue>;

export interface RowSet {
  /** Header names in file order */
  readonly columns: readonly string[];
  readonly rows: Row[];
}

/**
 * Classification of one cell of a numeric column.
 *
 * Built once per column so that every rule checking that column reads the
 * same coercion result.
 */
export type NumericCell =
  | { readonly kind: 'empty' }
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'invalid'; readonly raw: string };
