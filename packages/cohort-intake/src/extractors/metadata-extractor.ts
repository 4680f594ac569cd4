/**
 * Metadata extraction from validated tables
 *
 * Produces the aggregate summaries stored beside each file record. Input
 * row sets are never mutated; suppressed values are read as 0 and
 * unparseable counts are left out of per-key maps (and count as 0 in
 * totals). When a phenotype or pair appears more than once the last row
 * wins in the per-key map. Per-key maps are built as `Map`s so that any
 * code, `__proto__` included, becomes an own key of the result.
 *
 * @module extractors/metadata-extractor
 */

import {
  isCasesControlsMapping,
  type CasesControlsMapping,
  type ColumnMapping,
  type CooccurrenceMapping,
} from '../core/types/column-mapping.js';
import type { CasesControlsMetadata, CooccurrenceMetadata, FileMetadata, PhenotypeCount } from '../core/types/metadata.js';
import { pairKey } from '../core/types/metadata.js';
import type { CellValue, NumericCell, RowSet } from '../core/types/row-set.js';
import { cellText, integerOrNull, toNumericCell } from '../tabular/numeric-column.js';
import { isSuppressed } from '../tabular/suppressed-values.js';

function countCell(value: CellValue | undefined): NumericCell {
  const cell = value ?? null;
  return toNumericCell(isSuppressed(cell) ? 0 : cell);
}

export function extractCasesControlsMetadata(
  rowSet: RowSet,
  mapping: CasesControlsMapping
): CasesControlsMetadata {
  const phenotypes = new Set<string>();
  const phenotypeCounts = new Map<string, PhenotypeCount>();
  let totalCases = 0;
  let totalControls = 0;

  for (const row of rowSet.rows) {
    const code = cellText(row[mapping.phenotype]);
    const cases = integerOrNull(countCell(row[mapping.cases]));
    const controls = integerOrNull(countCell(row[mapping.controls]));

    totalCases += cases ?? 0;
    totalControls += controls ?? 0;

    if (code === null) continue;
    phenotypes.add(code);
    if (cases !== null && controls !== null) {
      phenotypeCounts.set(code, { cases, controls });
    }
  }

  return {
    distinctPhenotypes: [...phenotypes],
    totalCases,
    totalControls,
    phenotypeCounts: Object.fromEntries(phenotypeCounts),
  };
}

export function extractCooccurrenceMetadata(
  rowSet: RowSet,
  mapping: CooccurrenceMapping
): CooccurrenceMetadata {
  const phenotypes = new Set<string>();
  const phenotypePairCounts = new Map<string, number>();
  let totalCooccurrenceCount = 0;

  for (const row of rowSet.rows) {
    const a = cellText(row[mapping.phenotype1]);
    const b = cellText(row[mapping.phenotype2]);
    const count = integerOrNull(countCell(row[mapping.cooccurrence_count]));

    totalCooccurrenceCount += count ?? 0;
    if (a !== null) phenotypes.add(a);
    if (b !== null) phenotypes.add(b);

    if (a !== null && b !== null && count !== null) {
      phenotypePairCounts.set(pairKey(a, b), count);
    }
  }

  return {
    distinctPhenotypes: [...phenotypes].sort(),
    totalPairs: rowSet.rows.length,
    totalCooccurrenceCount,
    phenotypePairCounts: Object.fromEntries(phenotypePairCounts),
  };
}

/**
 * Extract the metadata matching the mapping's family.
 */
export function extractMetadata(rowSet: RowSet, mapping: ColumnMapping): FileMetadata {
  return isCasesControlsMapping(mapping)
    ? extractCasesControlsMetadata(rowSet, mapping)
    : extractCooccurrenceMetadata(rowSet, mapping);
}
