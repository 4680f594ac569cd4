/**
 * Cohort Intake Database Repository
 *
 * Type-safe database operations over cohorts, their files, the metadata
 * extracted from those files, and the phenotype registry. Works with both
 * SQLite (better-sqlite3) and PostgreSQL (pg) through {@link DatabaseAdapter}.
 *
 *   1. All queries return domain objects mapped from typed rows
 *   2. Transactions for multi-statement writes
 *   3. Prepared statements with `?` placeholders
 */

import type { Cohort, CohortFile, CohortSnapshot } from '../core/types/cohort.js';
import type { FileType } from '../core/types/file-types.js';
import {
  isCasesControlsMetadata,
  type CasesControlsMetadata,
  type CooccurrenceMetadata,
  type FileMetadata,
} from '../core/types/metadata.js';
import { DuplicateFileTypeError, DuplicatePhenotypeError, isUniqueViolation } from '../core/errors.js';
import {
  generateId,
  nowISO8601,
  toCasesControlsMetadata,
  toCohort,
  toCohortFile,
  toCooccurrenceMetadata,
  type CasesControlsMetadataRow,
  type CohortFileInsert,
  type CohortFileRow,
  type CohortInsert,
  type CohortRow,
  type CohortUpdate,
  type CooccurrenceMetadataRow,
  type PhenotypeCaseTotals,
  type PhenotypeRow,
} from './schema.types.js';

// ============================================================================
// Database Adapter Interface - Supports SQLite and PostgreSQL
// ============================================================================

/**
 * Unified database interface for SQLite and PostgreSQL.
 * Implementations handle driver-specific details.
 */
export interface DatabaseAdapter {
  /**
   * Execute query returning single row or null.
   */
  queryOne<T>(sql: string, params?: ReadonlyArray<unknown>): Promise<T | null>;

  /**
   * Execute query returning multiple rows.
   */
  queryMany<T>(sql: string, params?: ReadonlyArray<unknown>): Promise<ReadonlyArray<T>>;

  /**
   * Execute statement (INSERT, UPDATE, DELETE).
   * Returns number of affected rows.
   */
  execute(sql: string, params?: ReadonlyArray<unknown>): Promise<number>;

  /**
   * Execute transaction with automatic rollback on error.
   */
  transaction<T>(fn: () => Promise<T>): Promise<T>;

  /**
   * Close database connection.
   */
  close(): Promise<void>;
}

// ============================================================================
// Repository Implementation
// ============================================================================

export class CohortRepository {
  constructor(private readonly db: DatabaseAdapter) {}

  transaction<T>(fn: () => Promise<T>): Promise<T> {
    return this.db.transaction(fn);
  }

  // ==========================================================================
  // Cohorts
  // ==========================================================================

  async createCohort(insert: CohortInsert): Promise<Cohort> {
    const id = insert.id ?? generateId();
    const now = nowISO8601();

    await this.db.execute(
      `INSERT INTO sgc_cohorts (
        id, name, uploaded_by, total_sample_size, number_of_males, number_of_females,
        cohort_metadata, validation_status, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, 0, ?, ?)`,
      [
        id,
        insert.name,
        insert.uploadedBy,
        insert.totalSampleSize ?? null,
        insert.numberOfMales ?? null,
        insert.numberOfFemales ?? null,
        JSON.stringify(insert.cohortMetadata ?? {}),
        now,
        now,
      ]
    );

    const cohort = await this.getCohort(id);
    if (!cohort) {
      throw new Error(`Failed to create cohort: ${id}`);
    }
    return cohort;
  }

  async getCohort(id: string): Promise<Cohort | null> {
    const row = await this.db.queryOne<CohortRow>('SELECT * FROM sgc_cohorts WHERE id = ?', [id]);
    return row ? toCohort(row) : null;
  }

  async getCohortByName(name: string, uploadedBy: string): Promise<Cohort | null> {
    const row = await this.db.queryOne<CohortRow>(
      'SELECT * FROM sgc_cohorts WHERE name = ? AND uploaded_by = ?',
      [name, uploadedBy]
    );
    return row ? toCohort(row) : null;
  }

  async listCohorts(uploadedBy?: string): Promise<Cohort[]> {
    const rows =
      uploadedBy === undefined
        ? await this.db.queryMany<CohortRow>('SELECT * FROM sgc_cohorts ORDER BY created_at, name')
        : await this.db.queryMany<CohortRow>(
            'SELECT * FROM sgc_cohorts WHERE uploaded_by = ? ORDER BY created_at, name',
            [uploadedBy]
          );
    return rows.map(toCohort);
  }

  /**
   * Update declared fields. Any update resets the validation status.
   */
  async updateCohort(id: string, update: CohortUpdate): Promise<Cohort> {
    const setClauses: string[] = ['validation_status = 0', 'updated_at = ?'];
    const values: unknown[] = [nowISO8601()];

    if (update.name !== undefined) {
      setClauses.push('name = ?');
      values.push(update.name);
    }
    if (update.totalSampleSize !== undefined) {
      setClauses.push('total_sample_size = ?');
      values.push(update.totalSampleSize);
    }
    if (update.numberOfMales !== undefined) {
      setClauses.push('number_of_males = ?');
      values.push(update.numberOfMales);
    }
    if (update.numberOfFemales !== undefined) {
      setClauses.push('number_of_females = ?');
      values.push(update.numberOfFemales);
    }
    if (update.cohortMetadata !== undefined) {
      setClauses.push('cohort_metadata = ?');
      values.push(JSON.stringify(update.cohortMetadata));
    }

    values.push(id);
    await this.db.execute(`UPDATE sgc_cohorts SET ${setClauses.join(', ')} WHERE id = ?`, values);

    const cohort = await this.getCohort(id);
    if (!cohort) {
      throw new Error(`Failed to update cohort: ${id}`);
    }
    return cohort;
  }

  async setValidationStatus(id: string, status: boolean): Promise<void> {
    await this.db.execute(
      'UPDATE sgc_cohorts SET validation_status = ?, updated_at = ? WHERE id = ?',
      [status ? 1 : 0, nowISO8601(), id]
    );
  }

  async deleteCohort(id: string): Promise<boolean> {
    const changes = await this.db.execute('DELETE FROM sgc_cohorts WHERE id = ?', [id]);
    return changes > 0;
  }

  // ==========================================================================
  // Cohort Files
  // ==========================================================================

  /**
   * @throws DuplicateFileTypeError when the cohort already has this file type
   */
  async insertFile(insert: CohortFileInsert): Promise<CohortFile> {
    const id = generateId();

    try {
      await this.db.execute(
        `INSERT INTO sgc_cohort_files (
          id, cohort_id, file_type, file_path, storage_key, file_name, file_size,
          column_mapping, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          id,
          insert.cohortId,
          insert.fileType,
          insert.filePath,
          insert.storageKey,
          insert.fileName,
          insert.fileSize,
          insert.columnMapping === null ? null : JSON.stringify(insert.columnMapping),
          nowISO8601(),
        ]
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateFileTypeError(insert.cohortId, insert.fileType);
      }
      throw error;
    }

    const file = await this.getFile(id);
    if (!file) {
      throw new Error(`Failed to create cohort file: ${id}`);
    }
    return file;
  }

  async getFile(id: string): Promise<CohortFile | null> {
    const row = await this.db.queryOne<CohortFileRow>('SELECT * FROM sgc_cohort_files WHERE id = ?', [id]);
    return row ? toCohortFile(row) : null;
  }

  async getFileByType(cohortId: string, fileType: FileType): Promise<CohortFile | null> {
    const row = await this.db.queryOne<CohortFileRow>(
      'SELECT * FROM sgc_cohort_files WHERE cohort_id = ? AND file_type = ?',
      [cohortId, fileType]
    );
    return row ? toCohortFile(row) : null;
  }

  async listFiles(cohortId: string): Promise<CohortFile[]> {
    const rows = await this.db.queryMany<CohortFileRow>(
      'SELECT * FROM sgc_cohort_files WHERE cohort_id = ? ORDER BY file_type',
      [cohortId]
    );
    return rows.map(toCohortFile);
  }

  /**
   * Delete a file record together with its metadata.
   */
  async deleteFile(id: string): Promise<boolean> {
    return this.db.transaction(async () => {
      await this.deleteMetadata(id);
      const changes = await this.db.execute('DELETE FROM sgc_cohort_files WHERE id = ?', [id]);
      return changes > 0;
    });
  }

  // ==========================================================================
  // Extracted Metadata
  // ==========================================================================

  async insertCasesControlsMetadata(fileId: string, metadata: CasesControlsMetadata): Promise<void> {
    await this.db.execute(
      `INSERT INTO sgc_cases_controls_metadata (
        file_id, distinct_phenotypes, total_cases, total_controls, phenotype_counts, created_at
      ) VALUES (?, ?, ?, ?, ?, ?)`,
      [
        fileId,
        JSON.stringify(metadata.distinctPhenotypes),
        metadata.totalCases,
        metadata.totalControls,
        JSON.stringify(metadata.phenotypeCounts),
        nowISO8601(),
      ]
    );
  }

  async insertCooccurrenceMetadata(fileId: string, metadata: CooccurrenceMetadata): Promise<void> {
    await this.db.execute(
      `INSERT INTO sgc_cooccurrence_metadata (
        file_id, distinct_phenotypes, total_pairs, total_cooccurrence_count,
        phenotype_pair_counts, created_at
      ) VALUES (?, ?, ?, ?, ?, ?)`,
      [
        fileId,
        JSON.stringify(metadata.distinctPhenotypes),
        metadata.totalPairs,
        metadata.totalCooccurrenceCount,
        JSON.stringify(metadata.phenotypePairCounts),
        nowISO8601(),
      ]
    );
  }

  async insertMetadata(fileId: string, metadata: FileMetadata): Promise<void> {
    if (isCasesControlsMetadata(metadata)) {
      await this.insertCasesControlsMetadata(fileId, metadata);
    } else {
      await this.insertCooccurrenceMetadata(fileId, metadata);
    }
  }

  async getCasesControlsMetadata(fileId: string): Promise<CasesControlsMetadata | null> {
    const row = await this.db.queryOne<CasesControlsMetadataRow>(
      'SELECT * FROM sgc_cases_controls_metadata WHERE file_id = ?',
      [fileId]
    );
    return row ? toCasesControlsMetadata(row) : null;
  }

  async getCooccurrenceMetadata(fileId: string): Promise<CooccurrenceMetadata | null> {
    const row = await this.db.queryOne<CooccurrenceMetadataRow>(
      'SELECT * FROM sgc_cooccurrence_metadata WHERE file_id = ?',
      [fileId]
    );
    return row ? toCooccurrenceMetadata(row) : null;
  }

  async deleteMetadata(fileId: string): Promise<void> {
    await this.db.execute('DELETE FROM sgc_cases_controls_metadata WHERE file_id = ?', [fileId]);
    await this.db.execute('DELETE FROM sgc_cooccurrence_metadata WHERE file_id = ?', [fileId]);
  }

  /**
   * Cohort, files and every stored metadata record, keyed by file type.
   */
  async getCohortSnapshot(cohortId: string): Promise<CohortSnapshot | null> {
    const cohort = await this.getCohort(cohortId);
    if (!cohort) {
      return null;
    }

    const files = await this.listFiles(cohortId);
    const casesControlsMetadata = new Map<FileType, CasesControlsMetadata>();
    const cooccurrenceMetadata = new Map<FileType, CooccurrenceMetadata>();

    for (const file of files) {
      if (file.fileType.startsWith('cases_controls_')) {
        const metadata = await this.getCasesControlsMetadata(file.id);
        if (metadata) casesControlsMetadata.set(file.fileType, metadata);
      } else {
        const metadata = await this.getCooccurrenceMetadata(file.id);
        if (metadata) cooccurrenceMetadata.set(file.fileType, metadata);
      }
    }

    return { cohort, files, casesControlsMetadata, cooccurrenceMetadata };
  }

  // ==========================================================================
  // Phenotype Registry
  // ==========================================================================

  async upsertPhenotype(phenotypeCode: string, description: string): Promise<void> {
    await this.db.execute(
      `INSERT INTO sgc_phenotypes (phenotype_code, description, created_at)
       VALUES (?, ?, ?)
       ON CONFLICT (phenotype_code) DO UPDATE SET description = excluded.description`,
      [phenotypeCode, description, nowISO8601()]
    );
  }

  /**
   * @throws DuplicatePhenotypeError when the code is already registered
   */
  async insertPhenotype(phenotypeCode: string, description: string): Promise<PhenotypeRow> {
    try {
      await this.db.execute(
        'INSERT INTO sgc_phenotypes (phenotype_code, description, created_at) VALUES (?, ?, ?)',
        [phenotypeCode, description, nowISO8601()]
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicatePhenotypeError(phenotypeCode);
      }
      throw error;
    }

    const row = await this.db.queryOne<PhenotypeRow>('SELECT * FROM sgc_phenotypes WHERE phenotype_code = ?', [
      phenotypeCode,
    ]);
    if (!row) {
      throw new Error(`Failed to create phenotype: ${phenotypeCode}`);
    }
    return row;
  }

  async listPhenotypes(): Promise<ReadonlyArray<PhenotypeRow>> {
    return this.db.queryMany<PhenotypeRow>('SELECT * FROM sgc_phenotypes ORDER BY phenotype_code');
  }

  async getPhenotypeCodes(): Promise<Set<string>> {
    const rows = await this.db.queryMany<Pick<PhenotypeRow, 'phenotype_code'>>(
      'SELECT phenotype_code FROM sgc_phenotypes'
    );
    return new Set(rows.map((row) => row.phenotype_code));
  }

  async deletePhenotype(phenotypeCode: string): Promise<boolean> {
    const changes = await this.db.execute('DELETE FROM sgc_phenotypes WHERE phenotype_code = ?', [
      phenotypeCode,
    ]);
    return changes > 0;
  }

  /**
   * Sum cases and controls per phenotype over every cohort's combined
   * cases/controls file.
   */
  async getPhenotypeCaseTotals(): Promise<PhenotypeCaseTotals[]> {
    const rows = await this.db.queryMany<CasesControlsMetadataRow>(
      `SELECT m.* FROM sgc_cases_controls_metadata m
       JOIN sgc_cohort_files f ON f.id = m.file_id
       WHERE f.file_type = ?`,
      ['cases_controls_both']
    );

    const totals = new Map<string, { cases: number; controls: number; cohorts: number }>();
    for (const row of rows) {
      const metadata = toCasesControlsMetadata(row);
      for (const [code, counts] of Object.entries(metadata.phenotypeCounts)) {
        const entry = totals.get(code) ?? { cases: 0, controls: 0, cohorts: 0 };
        entry.cases += counts.cases;
        entry.controls += counts.controls;
        entry.cohorts += 1;
        totals.set(code, entry);
      }
    }

    return [...totals.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([phenotypeCode, entry]) => ({
        phenotypeCode,
        totalCases: entry.cases,
        totalControls: entry.controls,
        cohortCount: entry.cohorts,
      }));
  }
}
