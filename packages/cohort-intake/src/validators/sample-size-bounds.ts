/**
 * Declared sample sizes as upper bounds
 *
 * A cohort may declare its total, male and female sample sizes. For every
 * phenotype, cases + controls cannot exceed the declared size of the file's
 * sex stratum, and no pair can co-occur in more people than that. Bounds
 * that are not declared (null or 0) are not checked.
 *
 * @module validators/sample-size-bounds
 */

import type { Sex } from '../core/types/file-types.js';
import { splitPairKey, type CasesControlsMetadata, type CooccurrenceMetadata } from '../core/types/metadata.js';
import { formatSample } from '../core/utils/format.js';

export interface DeclaredSampleSizes {
  readonly totalSampleSize: number | null;
  readonly numberOfMales: number | null;
  readonly numberOfFemales: number | null;
}

export function declaredSampleSize(sizes: DeclaredSampleSizes, sex: Sex): number | null {
  const declared =
    sex === 'male' ? sizes.numberOfMales : sex === 'female' ? sizes.numberOfFemales : sizes.totalSampleSize;
  return declared !== null && declared > 0 ? declared : null;
}

export function checkCasesControlsSampleSize(
  label: string,
  metadata: CasesControlsMetadata,
  limit: number | null
): string | null {
  if (limit === null) return null;

  const violations = Object.entries(metadata.phenotypeCounts)
    .filter(([, counts]) => counts.cases + counts.controls > limit)
    .map(([code, counts]) => `${code}: ${counts.cases + counts.controls}`);

  return violations.length > 0
    ? `${label} has phenotypes where cases + controls exceed the declared sample size (${limit}): ${formatSample(violations)}`
    : null;
}

export function checkCooccurrenceSampleSize(
  label: string,
  metadata: CooccurrenceMetadata,
  limit: number | null
): string | null {
  if (limit === null) return null;

  const violations = Object.entries(metadata.phenotypePairCounts)
    .filter(([, count]) => count > limit)
    .map(([key, count]) => {
      const [a, b] = splitPairKey(key);
      return `(${a}, ${b}): ${count}`;
    });

  return violations.length > 0
    ? `${label} has co-occurrence counts exceeding the declared sample size (${limit}): ${formatSample(violations)}`
    : null;
}
