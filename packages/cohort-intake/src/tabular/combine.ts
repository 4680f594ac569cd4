/**
 * Male + female -> both merge
 *
 * Pure part of the file combiner: renames both inputs to canonical column
 * names, coerces counts, concatenates male then female, and aggregates by
 * phenotype (cases/controls) or by unordered phenotype pair (co-occurrence).
 *
 * @module tabular/combine
 */

import {
  DEFAULT_CASES_CONTROLS_MAPPING,
  DEFAULT_COOCCURRENCE_MAPPING,
  type CasesControlsMapping,
  type ColumnMapping,
  type CooccurrenceMapping,
  isCasesControlsMapping,
  isCooccurrenceMapping,
} from '../core/types/column-mapping.js';
import type { FileFamily } from '../core/types/file-types.js';
import type { CellValue, Row, RowSet } from '../core/types/row-set.js';
import { pairKey } from '../core/types/metadata.js';
import { formatList } from '../core/utils/format.js';
import { cellText, integerOrZero, toNumericCell } from './numeric-column.js';
import { isSuppressed } from './suppressed-values.js';

export interface CombineInput {
  readonly rowSet: RowSet;
  /** Mapping supplied at upload time; canonical names are assumed when null */
  readonly mapping: ColumnMapping | null;
}

export const COMBINED_CASES_CONTROLS_COLUMNS = ['phenotype', 'cases', 'controls'] as const;
export const COMBINED_COOCCURRENCE_COLUMNS = ['phenotype1', 'phenotype2', 'cooccurrence_count'] as const;

/**
 * Count used during aggregation: suppressed -> 0, unparseable -> 0,
 * decimals truncated.
 */
function countOf(value: CellValue | undefined): number {
  const cell = value ?? null;
  return isSuppressed(cell) ? 0 : integerOrZero(toNumericCell(cell));
}

function requireColumns(rowSet: RowSet, headers: readonly string[]): void {
  const missing = headers.filter((header) => !rowSet.columns.includes(header));
  if (missing.length > 0) {
    throw new Error(`Missing required columns: ${formatList(missing)}`);
  }
}

function casesControlsMapping(mapping: ColumnMapping | null): CasesControlsMapping {
  if (mapping === null) return DEFAULT_CASES_CONTROLS_MAPPING;
  if (!isCasesControlsMapping(mapping)) {
    throw new Error('Column mapping does not describe a cases/controls file');
  }
  return mapping;
}

function cooccurrenceMapping(mapping: ColumnMapping | null): CooccurrenceMapping {
  if (mapping === null) return DEFAULT_COOCCURRENCE_MAPPING;
  if (!isCooccurrenceMapping(mapping)) {
    throw new Error('Column mapping does not describe a co-occurrence file');
  }
  return mapping;
}

// ============================================================================
// Cases / Controls
// ============================================================================

interface PhenotypeGroup {
  cases: number;
  controls: number;
  readonly breakdowns: string[];
}

function combineCasesControls(inputs: readonly CombineInput[]): RowSet {
  const groups = new Map<string, PhenotypeGroup>();
  let hasBreakdown = false;

  for (const input of inputs) {
    const mapping = casesControlsMapping(input.mapping);
    requireColumns(input.rowSet, [mapping.phenotype, mapping.cases, mapping.controls]);
    const breakdownColumn =
      mapping.breakdown !== undefined && input.rowSet.columns.includes(mapping.breakdown)
        ? mapping.breakdown
        : null;
    if (breakdownColumn !== null) {
      hasBreakdown = true;
    }

    for (const row of input.rowSet.rows) {
      const code = cellText(row[mapping.phenotype]);
      if (code === null) continue;

      let group = groups.get(code);
      if (!group) {
        group = { cases: 0, controls: 0, breakdowns: [] };
        groups.set(code, group);
      }
      group.cases += countOf(row[mapping.cases]);
      group.controls += countOf(row[mapping.controls]);
      if (breakdownColumn !== null) {
        const breakdown = cellText(row[breakdownColumn]);
        if (breakdown !== null) {
          group.breakdowns.push(breakdown);
        }
      }
    }
  }

  const columns: string[] = [...COMBINED_CASES_CONTROLS_COLUMNS];
  if (hasBreakdown) {
    columns.push('breakdown');
  }

  const rows: Row[] = [];
  for (const [phenotype, group] of groups) {
    const row: Row = { phenotype, cases: group.cases, controls: group.controls };
    if (hasBreakdown) {
      row.breakdown = group.breakdowns.length > 0 ? group.breakdowns.join(';') : null;
    }
    rows.push(row);
  }

  return { columns, rows };
}

// ============================================================================
// Co-Occurrence
// ============================================================================

interface PairGroup {
  readonly phenotype1: string;
  readonly phenotype2: string;
  count: number;
}

function combineCooccurrence(inputs: readonly CombineInput[]): RowSet {
  const groups = new Map<string, PairGroup>();

  for (const input of inputs) {
    const mapping = cooccurrenceMapping(input.mapping);
    requireColumns(input.rowSet, [mapping.phenotype1, mapping.phenotype2, mapping.cooccurrence_count]);

    for (const row of input.rowSet.rows) {
      const a = cellText(row[mapping.phenotype1]);
      const b = cellText(row[mapping.phenotype2]);
      if (a === null || b === null) continue;

      const key = pairKey(a, b);
      let group = groups.get(key);
      if (!group) {
        group = a <= b ? { phenotype1: a, phenotype2: b, count: 0 } : { phenotype1: b, phenotype2: a, count: 0 };
        groups.set(key, group);
      }
      group.count += countOf(row[mapping.cooccurrence_count]);
    }
  }

  const rows: Row[] = [...groups.values()].map((group) => ({
    phenotype1: group.phenotype1,
    phenotype2: group.phenotype2,
    cooccurrence_count: group.count,
  }));

  return { columns: [...COMBINED_COOCCURRENCE_COLUMNS], rows };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Merge the male and female tables of one family into the `both` table.
 *
 * @throws Error when an input lacks a mapped column
 */
export function combineRowSets(family: FileFamily, male: CombineInput, female: CombineInput): RowSet {
  return family === 'cases_controls'
    ? combineCasesControls([male, female])
    : combineCooccurrence([male, female]);
}

/**
 * Mapping for a combined table, taking its leading columns positionally.
 */
export function positionalMapping(family: FileFamily, columns: readonly string[]): ColumnMapping {
  if (family === 'cases_controls') {
    const [phenotype = 'phenotype', cases = 'cases', controls = 'controls', breakdown] = columns;
    return breakdown === undefined ? { phenotype, cases, controls } : { phenotype, cases, controls, breakdown };
  }
  const [phenotype1 = 'phenotype1', phenotype2 = 'phenotype2', cooccurrence_count = 'cooccurrence_count'] = columns;
  return { phenotype1, phenotype2, cooccurrence_count };
}
