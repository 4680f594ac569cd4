/**
 * Aggregate metadata extracted from validated files
 *
 * @module core/types/metadata
 */

export interface PhenotypeCount {
  readonly cases: number;
  readonly controls: number;
}

export interface CasesControlsMetadata {
  /** Phenotype codes in order of first appearance */
  readonly distinctPhenotypes: readonly string[];
  readonly totalCases: number;
  readonly totalControls: number;
  /** Phenotype code -> counts (last row wins on repeated codes) */
  readonly phenotypeCounts: Readonly<Record<string, PhenotypeCount>>;
}

export interface CooccurrenceMetadata {
  /** Sorted union of both phenotype columns */
  readonly distinctPhenotypes: readonly string[];
  /** Row count, not the sum of counts */
  readonly totalPairs: number;
  readonly totalCooccurrenceCount: number;
  /** `"A|B"` with A <= B -> count */
  readonly phenotypePairCounts: Readonly<Record<string, number>>;
}

export type FileMetadata = CasesControlsMetadata | CooccurrenceMetadata;

export function isCasesControlsMetadata(metadata: FileMetadata): metadata is CasesControlsMetadata {
  return 'phenotypeCounts' in metadata;
}

export const PAIR_KEY_SEPARATOR = '|';

/**
 * Order-independent key for a phenotype pair.
 */
export function pairKey(a: string, b: string): string {
  return a <= b ? `${a}${PAIR_KEY_SEPARATOR}${b}` : `${b}${PAIR_KEY_SEPARATOR}${a}`;
}

export function splitPairKey(key: string): readonly [string, string] {
  const index = key.indexOf(PAIR_KEY_SEPARATOR);
  if (index < 0) {
    return [key, ''];
  }
  return [key.slice(0, index), key.slice(index + 1)];
}
