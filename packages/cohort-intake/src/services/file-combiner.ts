/**
 * File Combiner Service
 *
 * Regenerates a cohort's synthetic `both` file for one family from its male
 * and female files. Always a full rebuild: the previous `both` record and
 * its metadata are removed first.
 *
 * STORAGE: `{prefix}/{cohortId}/{family}_both/combined_{family}_both.tsv`,
 * tab-separated regardless of the input delimiters.
 */

import { CombineFilesError } from '../core/errors.js';
import type { CohortFile } from '../core/types/cohort.js';
import { fileTypeOf, type FileFamily } from '../core/types/file-types.js';
import type { FileMetadata } from '../core/types/metadata.js';
import { createLogger } from '../core/utils/logger.js';
import { extractMetadata } from '../extractors/metadata-extractor.js';
import type { CohortRepository } from '../persistence/repository.js';
import type { BlobStore } from '../storage/blob-store.js';
import { combinedFileName, combinedKey, DEFAULT_KEY_PREFIX } from '../storage/storage-keys.js';
import { combineRowSets, positionalMapping } from '../tabular/combine.js';
import { parseRowSet } from '../tabular/row-set-parser.js';
import { toTsv, TSV_CONTENT_TYPE } from '../tabular/row-set-writer.js';

const logger = createLogger({ module: 'file-combiner' });

export interface CombinedFileResult {
  readonly file: CohortFile;
  readonly metadata: FileMetadata;
  readonly rowCount: number;
}

export interface FileCombinerOptions {
  /** Storage key prefix (default `sgc`) */
  readonly keyPrefix?: string;
}

export class FileCombiner {
  private readonly keyPrefix: string;

  constructor(
    private readonly repository: CohortRepository,
    private readonly blobStore: BlobStore,
    options: FileCombinerOptions = {}
  ) {
    this.keyPrefix = options.keyPrefix ?? DEFAULT_KEY_PREFIX;
  }

  /**
   * Rebuild the `both` file of a family.
   *
   * @returns null when the cohort lacks the male or the female file
   * @throws CombineFilesError naming both source files on any failure
   */
  async regenerate(cohortId: string, family: FileFamily): Promise<CombinedFileResult | null> {
    const male = await this.repository.getFileByType(cohortId, fileTypeOf(family, 'male'));
    const female = await this.repository.getFileByType(cohortId, fileTypeOf(family, 'female'));
    if (!male || !female) {
      return null;
    }

    try {
      return await this.combine(cohortId, family, male, female);
    } catch (error) {
      logger.error('Failed to combine files', {
        cohortId,
        family,
        male: male.filePath,
        female: female.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new CombineFilesError(male.filePath, female.filePath, error);
    }
  }

  private async combine(
    cohortId: string,
    family: FileFamily,
    male: CohortFile,
    female: CohortFile
  ): Promise<CombinedFileResult> {
    const bothType = fileTypeOf(family, 'both');
    const key = combinedKey(this.keyPrefix, cohortId, bothType);

    const existing = await this.repository.getFileByType(cohortId, bothType);
    if (existing) {
      await this.repository.deleteFile(existing.id);
      if (existing.storageKey !== key) {
        await this.blobStore.delete(existing.storageKey);
      }
    }

    const [maleObject, femaleObject] = await Promise.all([
      this.blobStore.get(male.storageKey),
      this.blobStore.get(female.storageKey),
    ]);

    const combined = combineRowSets(
      family,
      { rowSet: parseRowSet(maleObject.body, male.fileName), mapping: male.columnMapping },
      { rowSet: parseRowSet(femaleObject.body, female.fileName), mapping: female.columnMapping }
    );

    const body = Buffer.from(toTsv(combined), 'utf-8');
    await this.blobStore.put(key, body, TSV_CONTENT_TYPE);

    const mapping = positionalMapping(family, combined.columns);
    const metadata = extractMetadata(combined, mapping);

    const file = await this.repository.transaction(async () => {
      const record = await this.repository.insertFile({
        cohortId,
        fileType: bothType,
        filePath: this.blobStore.uri(key),
        storageKey: key,
        fileName: combinedFileName(bothType),
        fileSize: body.byteLength,
        columnMapping: mapping,
      });
      await this.repository.insertMetadata(record.id, metadata);
      return record;
    });

    logger.info('Combined male and female files', {
      cohortId,
      fileType: bothType,
      rows: combined.rows.length,
      bytes: body.byteLength,
    });

    return { file, metadata, rowCount: combined.rows.length };
  }
}
