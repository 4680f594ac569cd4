/**
 * Cohort Upload Orchestrator
 *
 * Sequences the intake pipeline for one cohort:
 *
 *   upload  -> parse -> validate -> extract -> sample-size bounds
 *           -> store bytes -> record file + metadata -> reset status
 *           -> rebuild `both` when the other sex is present
 *   delete  -> drop record, metadata, bytes and the stale `both` file
 *   validate-> consistency engine
 *   remove cohort -> drop records (cascading) and every key under the cohort
 *
 * A rejected upload persists nothing. Every operation that changes a
 * cohort's file set resets its validation status. Operations on one cohort
 * are serialized through {@link CohortLock}.
 */

import {
  CohortFileNotFoundError,
  CohortNotFoundError,
  DuplicateFileTypeError,
  FileParseError,
  InvalidFileTypeError,
  UploadRejectedError,
} from '../core/errors.js';
import type { Cohort, CohortFile } from '../core/types/cohort.js';
import { parseColumnMapping, type ColumnMapping } from '../core/types/column-mapping.js';
import {
  fileTypeOf,
  isFileType,
  parseFileType,
  type FileFamily,
  type Sex,
} from '../core/types/file-types.js';
import { isCasesControlsMetadata, type FileMetadata } from '../core/types/metadata.js';
import type { RowSet } from '../core/types/row-set.js';
import { createLogger } from '../core/utils/logger.js';
import { extractMetadata } from '../extractors/metadata-extractor.js';
import type { CohortInsert, CohortUpdate } from '../persistence/schema.types.js';
import type { CohortRepository } from '../persistence/repository.js';
import type { PhenotypeRegistry } from '../registry/phenotype-registry.js';
import { CohortLock } from '../resilience/cohort-lock.js';
import type { BlobStore } from '../storage/blob-store.js';
import { cohortPrefix, DEFAULT_KEY_PREFIX, uploadKey } from '../storage/storage-keys.js';
import { parseRowSet } from '../tabular/row-set-parser.js';
import { TSV_CONTENT_TYPE } from '../tabular/row-set-writer.js';
import { validateFile } from '../validators/index.js';
import {
  checkCasesControlsSampleSize,
  checkCooccurrenceSampleSize,
  declaredSampleSize,
  type DeclaredSampleSizes,
} from '../validators/sample-size-bounds.js';
import { ConsistencyEngine, type CohortValidationOutcome } from './consistency-engine.js';
import { FileCombiner, type CombinedFileResult } from './file-combiner.js';

const logger = createLogger({ module: 'upload-orchestrator' });

// ============================================================================
// Types
// ============================================================================

export interface CohortUploadOrchestratorOptions {
  readonly repository: CohortRepository;
  readonly blobStore: BlobStore;
  readonly registry: PhenotypeRegistry;
  /** Shared with any other component that mutates the same cohorts */
  readonly lock?: CohortLock;
  /** Storage key prefix (default `sgc`) */
  readonly keyPrefix?: string;
}

export interface UploadFileRequest {
  readonly cohortId: string;
  /** One of the `*_male` / `*_female` file types */
  readonly fileType: string;
  readonly fileName: string;
  readonly content: Uint8Array;
  readonly contentType?: string;
  /** Canonical role -> header name; canonical headers assumed when absent */
  readonly columnMapping?: unknown;
}

export interface UploadFileResult {
  readonly file: CohortFile;
  readonly metadata: FileMetadata;
  readonly warning: string | null;
  /** The regenerated `both` file, when the other sex was already present */
  readonly combined: CombinedFileResult | null;
}

export interface PreviewFileRequest {
  readonly fileName: string;
  readonly content: Uint8Array;
  readonly family: FileFamily;
  readonly columnMapping?: unknown;
}

export interface PreviewFileResult {
  readonly valid: boolean;
  readonly columns: readonly string[];
  readonly rowCount: number;
  readonly error: string | null;
  readonly warning: string | null;
}

export interface DeleteFileResult {
  readonly cohortId: string;
  /** Ids of every removed file record, the requested one first */
  readonly deletedFileIds: readonly string[];
}

export interface UpsertCohortResult {
  readonly cohort: Cohort;
  readonly created: boolean;
}

export interface CohortWithFiles {
  readonly cohort: Cohort;
  readonly files: readonly CohortFile[];
}

export interface DownloadedFile {
  readonly file: CohortFile;
  readonly body: Uint8Array;
  readonly contentType: string;
}

export interface DeleteCohortResult {
  readonly cohortId: string;
  readonly deletedFileIds: readonly string[];
  /** Every storage key removed under the cohort's prefix */
  readonly deletedKeys: readonly string[];
}

// ============================================================================
// Helpers
// ============================================================================

export function contentTypeForFileName(fileName: string): string {
  const name = fileName.toLowerCase();
  if (name.endsWith('.gz')) return 'application/gzip';
  if (name.endsWith('.tsv') || name.endsWith('.txt')) return TSV_CONTENT_TYPE;
  if (name.endsWith('.csv')) return 'text/csv';
  return 'application/octet-stream';
}

function sampleSizeError(
  cohort: DeclaredSampleSizes,
  fileType: string,
  sex: Sex,
  metadata: FileMetadata
): string | null {
  const limit = declaredSampleSize(cohort, sex);
  const label = `${fileType} file`;
  return isCasesControlsMetadata(metadata)
    ? checkCasesControlsSampleSize(label, metadata, limit)
    : checkCooccurrenceSampleSize(label, metadata, limit);
}

// ============================================================================
// Orchestrator
// ============================================================================

export class CohortUploadOrchestrator {
  private readonly repository: CohortRepository;
  private readonly blobStore: BlobStore;
  private readonly registry: PhenotypeRegistry;
  private readonly lock: CohortLock;
  private readonly keyPrefix: string;
  private readonly combiner: FileCombiner;
  private readonly engine: ConsistencyEngine;

  constructor(options: CohortUploadOrchestratorOptions) {
    this.repository = options.repository;
    this.blobStore = options.blobStore;
    this.registry = options.registry;
    this.lock = options.lock ?? new CohortLock();
    this.keyPrefix = options.keyPrefix ?? DEFAULT_KEY_PREFIX;
    this.combiner = new FileCombiner(this.repository, this.blobStore, { keyPrefix: this.keyPrefix });
    this.engine = new ConsistencyEngine(this.repository, this.combiner, this.lock);
  }

  // ==========================================================================
  // Cohorts
  // ==========================================================================

  /**
   * Create a cohort, or update the one with the same name and uploader.
   * Updates reset the validation status.
   */
  async upsertCohort(input: CohortInsert): Promise<UpsertCohortResult> {
    const existing = await this.repository.getCohortByName(input.name, input.uploadedBy);
    if (!existing) {
      const cohort = await this.repository.createCohort(input);
      logger.info('Created cohort', { cohortId: cohort.id, name: cohort.name });
      return { cohort, created: true };
    }

    const update: CohortUpdate = {
      totalSampleSize: input.totalSampleSize,
      numberOfMales: input.numberOfMales,
      numberOfFemales: input.numberOfFemales,
      cohortMetadata: input.cohortMetadata,
    };
    const cohort = await this.lock.run(existing.id, () =>
      this.repository.updateCohort(existing.id, update)
    );
    logger.info('Updated cohort', { cohortId: cohort.id, name: cohort.name });
    return { cohort, created: false };
  }

  /**
   * Cohorts with their files, oldest first; only one uploader's when given.
   */
  async listCohorts(uploadedBy?: string): Promise<CohortWithFiles[]> {
    const cohorts = await this.repository.listCohorts(uploadedBy);
    const result: CohortWithFiles[] = [];
    for (const cohort of cohorts) {
      result.push({ cohort, files: await this.repository.listFiles(cohort.id) });
    }
    return result;
  }

  /**
   * @throws CohortNotFoundError
   */
  async getCohort(cohortId: string): Promise<CohortWithFiles> {
    const cohort = await this.repository.getCohort(cohortId);
    if (!cohort) {
      throw new CohortNotFoundError(cohortId);
    }
    return { cohort, files: await this.repository.listFiles(cohort.id) };
  }

  /**
   * Remove a cohort, its file records and metadata, and every stored object
   * under its key prefix.
   *
   * @throws CohortNotFoundError
   */
  async deleteCohort(cohortId: string): Promise<DeleteCohortResult> {
    return this.lock.run(cohortId, async () => {
      const cohort = await this.repository.getCohort(cohortId);
      if (!cohort) {
        throw new CohortNotFoundError(cohortId);
      }

      const files = await this.repository.listFiles(cohort.id);
      await this.repository.deleteCohort(cohort.id);

      const keys = await this.blobStore.list(cohortPrefix(this.keyPrefix, cohort.id));
      for (const key of keys) {
        await this.blobStore.delete(key);
      }

      logger.info('Deleted cohort', { cohortId: cohort.id, files: files.length, keys: keys.length });
      return {
        cohortId: cohort.id,
        deletedFileIds: files.map((file) => file.id),
        deletedKeys: keys,
      };
    });
  }

  // ==========================================================================
  // Files
  // ==========================================================================

  /**
   * Parse and validate a file without storing anything.
   */
  async previewFile(request: PreviewFileRequest): Promise<PreviewFileResult> {
    const mapping = parseColumnMapping(request.family, request.columnMapping);
    if (!mapping.success) {
      return { valid: false, columns: [], rowCount: 0, error: mapping.error, warning: null };
    }

    let rowSet: RowSet;
    try {
      rowSet = parseRowSet(request.content, request.fileName);
    } catch (error) {
      if (error instanceof FileParseError) {
        return { valid: false, columns: [], rowCount: 0, error: error.message, warning: null };
      }
      throw error;
    }

    const validCodes = await this.registry.getValidCodes();
    const result = validateFile(request.family, rowSet, mapping.data, validCodes);
    return {
      valid: result.error === null,
      columns: rowSet.columns,
      rowCount: rowSet.rows.length,
      error: result.error,
      warning: result.warning,
    };
  }

  /**
   * Validate and store a male or female file.
   *
   * @throws InvalidFileTypeError for unknown or `both` file types
   * @throws CohortNotFoundError
   * @throws DuplicateFileTypeError when the cohort already has this type
   * @throws UploadRejectedError when the content fails validation
   * @throws CombineFilesError when the `both` file cannot be rebuilt
   */
  async uploadFile(request: UploadFileRequest): Promise<UploadFileResult> {
    if (!isFileType(request.fileType)) {
      throw new InvalidFileTypeError(request.fileType);
    }
    const fileType = request.fileType;
    const { family, sex } = parseFileType(fileType);
    if (sex === 'both') {
      throw new InvalidFileTypeError(fileType, 'Combined files are generated and cannot be uploaded');
    }

    const mapping = parseColumnMapping(family, request.columnMapping);
    if (!mapping.success) {
      throw new UploadRejectedError(mapping.error);
    }

    return this.lock.run(request.cohortId, async () => {
      const cohort = await this.repository.getCohort(request.cohortId);
      if (!cohort) {
        throw new CohortNotFoundError(request.cohortId);
      }
      if (await this.repository.getFileByType(cohort.id, fileType)) {
        throw new DuplicateFileTypeError(cohort.id, fileType);
      }

      const { metadata, warning } = await this.validateContent(
        cohort,
        request,
        family,
        sex,
        mapping.data
      );

      const key = uploadKey(this.keyPrefix, cohort.id, fileType, request.fileName);
      await this.blobStore.put(
        key,
        request.content,
        request.contentType ?? contentTypeForFileName(request.fileName)
      );

      let file: CohortFile;
      try {
        file = await this.repository.transaction(async () => {
          const record = await this.repository.insertFile({
            cohortId: cohort.id,
            fileType,
            filePath: this.blobStore.uri(key),
            storageKey: key,
            fileName: request.fileName,
            fileSize: request.content.byteLength,
            columnMapping: mapping.data,
          });
          await this.repository.insertMetadata(record.id, metadata);
          await this.repository.setValidationStatus(cohort.id, false);
          return record;
        });
      } catch (error) {
        await this.blobStore.delete(key);
        throw error;
      }

      logger.info('Accepted upload', {
        cohortId: cohort.id,
        fileType,
        fileId: file.id,
        bytes: file.fileSize,
        warning,
      });

      const combined = await this.combiner.regenerate(cohort.id, family);
      return { file, metadata, warning, combined };
    });
  }

  private async validateContent(
    cohort: Cohort,
    request: UploadFileRequest,
    family: FileFamily,
    sex: Sex,
    mapping: ColumnMapping
  ): Promise<{ metadata: FileMetadata; warning: string | null }> {
    let rowSet: RowSet;
    try {
      rowSet = parseRowSet(request.content, request.fileName);
    } catch (error) {
      if (error instanceof FileParseError) {
        throw new UploadRejectedError(error.message);
      }
      throw error;
    }

    const validCodes = await this.registry.getValidCodes();
    const validation = validateFile(family, rowSet, mapping, validCodes);
    if (validation.error) {
      logger.info('Rejected upload', {
        cohortId: cohort.id,
        fileType: request.fileType,
        error: validation.error,
      });
      throw new UploadRejectedError(validation.error, validation.warning);
    }

    const metadata = extractMetadata(rowSet, mapping);
    const boundsError = sampleSizeError(cohort, request.fileType, sex, metadata);
    if (boundsError) {
      logger.info('Rejected upload', { cohortId: cohort.id, fileType: request.fileType, error: boundsError });
      throw new UploadRejectedError(boundsError, validation.warning);
    }

    return { metadata, warning: validation.warning };
  }

  /**
   * Stored bytes of a file.
   *
   * @throws CohortFileNotFoundError
   * @throws BlobNotFoundError when the record has no stored object
   */
  async downloadFile(fileId: string): Promise<DownloadedFile> {
    const file = await this.repository.getFile(fileId);
    if (!file) {
      throw new CohortFileNotFoundError(fileId);
    }
    const stored = await this.blobStore.get(file.storageKey);
    return { file, body: stored.body, contentType: stored.contentType };
  }

  /**
   * Remove a file with its metadata and bytes. Removing a male or female
   * file also removes the family's `both` file, which no longer matches.
   *
   * @throws CohortFileNotFoundError
   */
  async deleteFile(fileId: string): Promise<DeleteFileResult> {
    const target = await this.repository.getFile(fileId);
    if (!target) {
      throw new CohortFileNotFoundError(fileId);
    }

    return this.lock.run(target.cohortId, async () => {
      const file = await this.repository.getFile(fileId);
      if (!file) {
        throw new CohortFileNotFoundError(fileId);
      }

      const { family, sex } = parseFileType(file.fileType);
      const removed: CohortFile[] = [file];
      if (sex !== 'both') {
        const both = await this.repository.getFileByType(file.cohortId, fileTypeOf(family, 'both'));
        if (both) removed.push(both);
      }

      await this.repository.transaction(async () => {
        for (const record of removed) {
          await this.repository.deleteFile(record.id);
        }
        await this.repository.setValidationStatus(file.cohortId, false);
      });

      for (const record of removed) {
        await this.blobStore.delete(record.storageKey);
      }

      logger.info('Deleted cohort files', {
        cohortId: file.cohortId,
        fileIds: removed.map((record) => record.id),
      });

      return { cohortId: file.cohortId, deletedFileIds: removed.map((record) => record.id) };
    });
  }

  // ==========================================================================
  // Validation
  // ==========================================================================

  /**
   * Rebuild `both` files and run the consistency checks.
   */
  async validateCohort(cohortId: string): Promise<CohortValidationOutcome> {
    return this.engine.validateCohort(cohortId);
  }
}
