/**
 * Cohort and cohort file domain objects
 *
 * @module core/types/cohort
 */

import type { ColumnMapping } from './column-mapping.js';
import type { FileType } from './file-types.js';
import type { CasesControlsMetadata, CooccurrenceMetadata } from './metadata.js';

export interface Cohort {
  readonly id: string;
  readonly name: string;
  readonly uploadedBy: string;
  readonly totalSampleSize: number | null;
  readonly numberOfMales: number | null;
  readonly numberOfFemales: number | null;
  readonly cohortMetadata: Readonly<Record<string, unknown>>;
  readonly validationStatus: boolean;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export interface CohortFile {
  readonly id: string;
  readonly cohortId: string;
  readonly fileType: FileType;
  /** `<scheme>://<bucket>/<key>` */
  readonly filePath: string;
  readonly storageKey: string;
  readonly fileName: string;
  readonly fileSize: number;
  readonly columnMapping: ColumnMapping | null;
  readonly createdAt: string;
}

/**
 * Everything the consistency checks need to know about one cohort.
 */
export interface CohortSnapshot {
  readonly cohort: Cohort;
  readonly files: readonly CohortFile[];
  readonly casesControlsMetadata: ReadonlyMap<FileType, CasesControlsMetadata>;
  readonly cooccurrenceMetadata: ReadonlyMap<FileType, CooccurrenceMetadata>;
}
