/**
 * Cross-File Consistency Engine
 *
 * Decides whether a cohort's uploaded files form a complete, coherent set.
 * Three checks run in order and the first failure wins:
 *
 *   1. cases/controls completeness: male, female and both files present,
 *      and the both file agrees with male + female
 *   2. co-occurrence completeness: the same for co-occurrence files
 *   3. cross-family integrity: co-occurrence files only reference
 *      phenotypes of the matching cases/controls file, and no pair count
 *      exceeds the smaller case count of its two phenotypes
 *
 * Check failures are returned as prefixed messages, never thrown. The
 * cohort's validation flag is set only when all three pass.
 */

import { CohortNotFoundError } from '../core/errors.js';
import type { CohortSnapshot } from '../core/types/cohort.js';
import {
  FILE_FAMILIES,
  SEXES,
  fileTypeOf,
  requiredFileTypes,
  type FileFamily,
  type FileType,
} from '../core/types/file-types.js';
import {
  splitPairKey,
  type CasesControlsMetadata,
  type CooccurrenceMetadata,
} from '../core/types/metadata.js';
import { formatList, formatSample } from '../core/utils/format.js';
import { createLogger } from '../core/utils/logger.js';
import type { CohortRepository } from '../persistence/repository.js';
import { CohortLock } from '../resilience/cohort-lock.js';
import {
  checkCasesControlsSampleSize,
  checkCooccurrenceSampleSize,
  declaredSampleSize,
} from '../validators/sample-size-bounds.js';
import type { FileCombiner } from './file-combiner.js';

const logger = createLogger({ module: 'consistency-engine' });

export const CHECK_PREFIXES: Readonly<Record<FileFamily | 'cross', string>> = {
  cases_controls: 'cases/controls check',
  cooccurrence: 'co-occurrence check',
  cross: 'co-occurrence + cases/controls check',
};

export interface CohortValidationOutcome {
  readonly cohortId: string;
  readonly validationStatus: boolean;
  /** Message of the first failing check */
  readonly error: string | null;
}

// ============================================================================
// Helpers
// ============================================================================

function presentTypes(snapshot: CohortSnapshot): Set<FileType> {
  return new Set(snapshot.files.map((file) => file.fileType));
}

function missingFrom(expected: Iterable<string>, actual: ReadonlySet<string>): string[] {
  return [...expected].filter((item) => !actual.has(item));
}

function phenotypeSetError(
  maleFemale: readonly string[],
  both: readonly string[]
): string | null {
  const union = new Set(maleFemale);
  const combined = new Set(both);
  const absent = missingFrom(union, combined);
  if (absent.length > 0) {
    return `Phenotypes in male/female files but missing from 'both' file: ${formatSample(absent)}`;
  }
  const extra = missingFrom(combined, union);
  if (extra.length > 0) {
    return `Extra phenotypes in 'both' file not found in male/female files: ${formatSample(extra)}`;
  }
  return null;
}

function totalMismatch(label: string, male: number, female: number, both: number): string | null {
  return male + female === both
    ? null
    : `Total ${label} mismatch: male (${male}) + female (${female}) = ${male + female}, but 'both' has ${both}`;
}

// ============================================================================
// Family Checks
// ============================================================================

function casesControlsAggregateError(
  snapshot: CohortSnapshot,
  male: CasesControlsMetadata,
  female: CasesControlsMetadata,
  both: CasesControlsMetadata
): string | null {
  const phenotypes = phenotypeSetError(
    [...male.distinctPhenotypes, ...female.distinctPhenotypes],
    both.distinctPhenotypes
  );
  if (phenotypes) return phenotypes;

  const totals =
    totalMismatch('cases', male.totalCases, female.totalCases, both.totalCases) ??
    totalMismatch('controls', male.totalControls, female.totalControls, both.totalControls);
  if (totals) return totals;

  const mismatches: string[] = [];
  for (const [code, counts] of Object.entries(both.phenotypeCounts)) {
    const cases = (male.phenotypeCounts[code]?.cases ?? 0) + (female.phenotypeCounts[code]?.cases ?? 0);
    const controls =
      (male.phenotypeCounts[code]?.controls ?? 0) + (female.phenotypeCounts[code]?.controls ?? 0);
    if (cases !== counts.cases || controls !== counts.controls) {
      mismatches.push(`${code}: expected ${cases}/${controls}, found ${counts.cases}/${counts.controls}`);
    }
  }
  if (mismatches.length > 0) {
    return `Per-phenotype counts in 'both' file do not equal male + female (cases/controls): ${formatSample(mismatches)}`;
  }

  const bounds: Array<[FileType, CasesControlsMetadata, number | null]> = [
    ['cases_controls_male', male, declaredSampleSize(snapshot.cohort, 'male')],
    ['cases_controls_female', female, declaredSampleSize(snapshot.cohort, 'female')],
    ['cases_controls_both', both, declaredSampleSize(snapshot.cohort, 'both')],
  ];
  for (const [fileType, metadata, limit] of bounds) {
    const error = checkCasesControlsSampleSize(`${fileType} file`, metadata, limit);
    if (error) return error;
  }

  return null;
}

function cooccurrenceAggregateError(
  snapshot: CohortSnapshot,
  male: CooccurrenceMetadata,
  female: CooccurrenceMetadata,
  both: CooccurrenceMetadata
): string | null {
  const phenotypes = phenotypeSetError(
    [...male.distinctPhenotypes, ...female.distinctPhenotypes],
    both.distinctPhenotypes
  );
  if (phenotypes) return phenotypes;

  const totals = totalMismatch(
    'co-occurrence count',
    male.totalCooccurrenceCount,
    female.totalCooccurrenceCount,
    both.totalCooccurrenceCount
  );
  if (totals) return totals;

  const mismatches: string[] = [];
  for (const [key, count] of Object.entries(both.phenotypePairCounts)) {
    const expected = (male.phenotypePairCounts[key] ?? 0) + (female.phenotypePairCounts[key] ?? 0);
    if (expected !== count) {
      const [a, b] = splitPairKey(key);
      mismatches.push(`(${a}, ${b}): expected ${expected}, found ${count}`);
    }
  }
  if (mismatches.length > 0) {
    return `Per-pair counts in 'both' file do not equal male + female: ${formatSample(mismatches)}`;
  }

  const bounds: Array<[FileType, CooccurrenceMetadata, number | null]> = [
    ['cooccurrence_male', male, declaredSampleSize(snapshot.cohort, 'male')],
    ['cooccurrence_female', female, declaredSampleSize(snapshot.cohort, 'female')],
    ['cooccurrence_both', both, declaredSampleSize(snapshot.cohort, 'both')],
  ];
  for (const [fileType, metadata, limit] of bounds) {
    const error = checkCooccurrenceSampleSize(`${fileType} file`, metadata, limit);
    if (error) return error;
  }

  return null;
}

function familyCheck(snapshot: CohortSnapshot, family: FileFamily): string | null {
  const prefix = CHECK_PREFIXES[family];
  const required = requiredFileTypes(family);

  const missing = missingFrom(required, presentTypes(snapshot));
  if (missing.length > 0) {
    return `${prefix}: Missing required file types: ${formatList(missing)}`;
  }

  const [maleType, femaleType, bothType] = required;
  if (maleType === undefined || femaleType === undefined || bothType === undefined) {
    return null;
  }

  let error: string | null;
  if (family === 'cases_controls') {
    const male = snapshot.casesControlsMetadata.get(maleType);
    const female = snapshot.casesControlsMetadata.get(femaleType);
    const both = snapshot.casesControlsMetadata.get(bothType);
    if (!male || !female || !both) {
      return `${prefix}: Missing metadata for file types: ${formatList(
        required.filter((type) => !snapshot.casesControlsMetadata.has(type))
      )}`;
    }
    error = casesControlsAggregateError(snapshot, male, female, both);
  } else {
    const male = snapshot.cooccurrenceMetadata.get(maleType);
    const female = snapshot.cooccurrenceMetadata.get(femaleType);
    const both = snapshot.cooccurrenceMetadata.get(bothType);
    if (!male || !female || !both) {
      return `${prefix}: Missing metadata for file types: ${formatList(
        required.filter((type) => !snapshot.cooccurrenceMetadata.has(type))
      )}`;
    }
    error = cooccurrenceAggregateError(snapshot, male, female, both);
  }

  return error ? `${prefix}: ${error}` : null;
}

// ============================================================================
// Public Checks
// ============================================================================

export function checkCasesControlsCompleteness(snapshot: CohortSnapshot): string | null {
  return familyCheck(snapshot, 'cases_controls');
}

export function checkCooccurrenceCompleteness(snapshot: CohortSnapshot): string | null {
  return familyCheck(snapshot, 'cooccurrence');
}

/**
 * Referential integrity between co-occurrence and cases/controls metadata
 * of each sex stratum. Every violation found is reported.
 *
 * Pairs where either phenotype has 0 cases are not bounded: a zero there
 * usually stands for suppressed or unavailable data.
 */
export function checkCrossFamilyConsistency(snapshot: CohortSnapshot): string | null {
  const messages: string[] = [];

  for (const sex of SEXES) {
    const casesType = fileTypeOf('cases_controls', sex);
    const cooccurType = fileTypeOf('cooccurrence', sex);
    const cases = snapshot.casesControlsMetadata.get(casesType);
    const cooccur = snapshot.cooccurrenceMetadata.get(cooccurType);
    if (!cases || !cooccur) continue;

    const known = new Set(cases.distinctPhenotypes);
    const unknown = cooccur.distinctPhenotypes.filter((code) => !known.has(code));
    if (unknown.length > 0) {
      messages.push(
        `${CHECK_PREFIXES.cross}: ${cooccurType} file references phenotypes not found in ${casesType} file: ${formatSample(unknown)}`
      );
    }

    const violations: string[] = [];
    for (const [key, count] of Object.entries(cooccur.phenotypePairCounts)) {
      const [a, b] = splitPairKey(key);
      const casesA = cases.phenotypeCounts[a]?.cases ?? 0;
      const casesB = cases.phenotypeCounts[b]?.cases ?? 0;
      if (casesA === 0 || casesB === 0) continue;

      const bound = Math.min(casesA, casesB);
      if (count > bound) {
        violations.push(`(${a}, ${b}): ${count} > ${bound}`);
      }
    }
    if (violations.length > 0) {
      messages.push(
        `${CHECK_PREFIXES.cross}: ${cooccurType} file has co-occurrence counts exceeding min(cases): ${formatSample(violations)}`
      );
    }
  }

  return messages.length > 0 ? messages.join('; ') : null;
}

/**
 * All checks in order; the first failing message, or null.
 */
export function runConsistencyChecks(snapshot: CohortSnapshot): string | null {
  return (
    checkCasesControlsCompleteness(snapshot) ??
    checkCooccurrenceCompleteness(snapshot) ??
    checkCrossFamilyConsistency(snapshot)
  );
}

// ============================================================================
// Engine
// ============================================================================

export class ConsistencyEngine {
  constructor(
    private readonly repository: CohortRepository,
    private readonly combiner: FileCombiner,
    private readonly lock: CohortLock = new CohortLock()
  ) {}

  /**
   * Regenerate both `both` files, run every check, and record the outcome
   * on the cohort.
   *
   * @throws CohortNotFoundError
   * @throws CombineFilesError when a `both` file cannot be rebuilt
   */
  async validateCohort(cohortId: string): Promise<CohortValidationOutcome> {
    return this.lock.run(cohortId, async () => {
      const cohort = await this.repository.getCohort(cohortId);
      if (!cohort) {
        throw new CohortNotFoundError(cohortId);
      }

      await this.repository.setValidationStatus(cohortId, false);

      for (const family of FILE_FAMILIES) {
        await this.combiner.regenerate(cohortId, family);
      }

      const snapshot = await this.repository.getCohortSnapshot(cohortId);
      if (!snapshot) {
        throw new CohortNotFoundError(cohortId);
      }

      const error = runConsistencyChecks(snapshot);
      if (error) {
        logger.warn('Cohort failed consistency checks', { cohortId, error });
        return { cohortId, validationStatus: false, error };
      }

      await this.repository.setValidationStatus(cohortId, true);
      logger.info('Cohort passed consistency checks', { cohortId });
      return { cohortId, validationStatus: true, error: null };
    });
  }
}
