/**
 * Cohort Intake Persistence Schema Types
 *
 * Row types match schema.sql exactly. JSON columns are stored as TEXT and
 * parsed through zod on the way out.
 *
 * Conventions:
 *   1. ISO8601 timestamp strings (not Date objects - DB format)
 *   2. Readonly properties for database rows
 *   3. Separate Insert/Update types from Row types
 *   4. Explicit null handling (not undefined)
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import {
  CasesControlsMappingSchema,
  CooccurrenceMappingSchema,
  type ColumnMapping,
} from '../core/types/column-mapping.js';
import type { Cohort, CohortFile } from '../core/types/cohort.js';
import { isFileType, type FileType } from '../core/types/file-types.js';
import type { CasesControlsMetadata, CooccurrenceMetadata } from '../core/types/metadata.js';

// ============================================================================
// ISO8601 Timestamp Type - Database format
// ============================================================================

/**
 * ISO8601 timestamp string in UTC, e.g. "2025-12-17T10:30:00.000Z".
 */
export type ISO8601Timestamp = string;

export function nowISO8601(): ISO8601Timestamp {
  return new Date().toISOString();
}

/**
 * 32-character hex identifier (a UUID without dashes).
 */
export function generateId(): string {
  return randomUUID().replace(/-/g, '');
}

// ============================================================================
// Phenotypes
// ============================================================================

export interface PhenotypeRow {
  readonly phenotype_code: string;
  readonly description: string;
  readonly created_at: ISO8601Timestamp;
}

// ============================================================================
// Cohorts
// ============================================================================

export interface CohortRow {
  readonly id: string;
  readonly name: string;
  readonly uploaded_by: string;
  readonly total_sample_size: number | null;
  readonly number_of_males: number | null;
  readonly number_of_females: number | null;
  /** JSON object */
  readonly cohort_metadata: string;
  /** 0 or 1 */
  readonly validation_status: number;
  readonly created_at: ISO8601Timestamp;
  readonly updated_at: ISO8601Timestamp;
}

export interface CohortInsert {
  readonly id?: string;
  readonly name: string;
  readonly uploadedBy: string;
  readonly totalSampleSize?: number | null;
  readonly numberOfMales?: number | null;
  readonly numberOfFemales?: number | null;
  readonly cohortMetadata?: Readonly<Record<string, unknown>>;
}

export interface CohortUpdate {
  readonly name?: string;
  readonly totalSampleSize?: number | null;
  readonly numberOfMales?: number | null;
  readonly numberOfFemales?: number | null;
  readonly cohortMetadata?: Readonly<Record<string, unknown>>;
}

// ============================================================================
// Cohort Files
// ============================================================================

export interface CohortFileRow {
  readonly id: string;
  readonly cohort_id: string;
  readonly file_type: string;
  readonly file_path: string;
  readonly storage_key: string;
  readonly file_name: string;
  readonly file_size: number;
  /** JSON object or null */
  readonly column_mapping: string | null;
  readonly created_at: ISO8601Timestamp;
}

export interface CohortFileInsert {
  readonly cohortId: string;
  readonly fileType: FileType;
  readonly filePath: string;
  readonly storageKey: string;
  readonly fileName: string;
  readonly fileSize: number;
  readonly columnMapping: ColumnMapping | null;
}

// ============================================================================
// Metadata
// ============================================================================

export interface CasesControlsMetadataRow {
  readonly file_id: string;
  readonly distinct_phenotypes: string;
  readonly total_cases: number;
  readonly total_controls: number;
  readonly phenotype_counts: string;
  readonly created_at: ISO8601Timestamp;
}

export interface CooccurrenceMetadataRow {
  readonly file_id: string;
  readonly distinct_phenotypes: string;
  readonly total_pairs: number;
  readonly total_cooccurrence_count: number;
  readonly phenotype_pair_counts: string;
  readonly created_at: ISO8601Timestamp;
}

/**
 * Per-phenotype sums across cohorts.
 */
export interface PhenotypeCaseTotals {
  readonly phenotypeCode: string;
  readonly totalCases: number;
  readonly totalControls: number;
  readonly cohortCount: number;
}

// ============================================================================
// JSON Column Parsing
// ============================================================================

const StringListSchema = z.array(z.string());

/**
 * Objects become entry lists first: `z.record` skips a `__proto__` key,
 * which is a legal phenotype code here.
 */
function entriesOf(raw: unknown): unknown {
  return typeof raw === 'object' && raw !== null && !Array.isArray(raw) ? Object.entries(raw) : raw;
}

const PhenotypeCountsSchema = z
  .preprocess(entriesOf, z.array(z.tuple([z.string(), z.object({ cases: z.number(), controls: z.number() })])))
  .transform((entries) => Object.fromEntries(entries));
const PairCountsSchema = z
  .preprocess(entriesOf, z.array(z.tuple([z.string(), z.number()])))
  .transform((entries) => Object.fromEntries(entries));
const CohortMetadataSchema = z.record(z.unknown());
const ColumnMappingSchema = z.union([CasesControlsMappingSchema, CooccurrenceMappingSchema]);

function parseJsonColumn<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string, column: string): T {
  const result = schema.safeParse(JSON.parse(raw));
  if (!result.success) {
    throw new Error(`Corrupt ${column} column: ${result.error.errors[0]?.message ?? 'invalid JSON'}`);
  }
  return result.data;
}

// ============================================================================
// Row Mappers
// ============================================================================

export function toCohort(row: CohortRow): Cohort {
  return {
    id: row.id,
    name: row.name,
    uploadedBy: row.uploaded_by,
    totalSampleSize: row.total_sample_size,
    numberOfMales: row.number_of_males,
    numberOfFemales: row.number_of_females,
    cohortMetadata: parseJsonColumn(CohortMetadataSchema, row.cohort_metadata, 'cohort_metadata'),
    validationStatus: Number(row.validation_status) === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toCohortFile(row: CohortFileRow): CohortFile {
  if (!isFileType(row.file_type)) {
    throw new Error(`Unknown file type in database: ${row.file_type}`);
  }
  return {
    id: row.id,
    cohortId: row.cohort_id,
    fileType: row.file_type,
    filePath: row.file_path,
    storageKey: row.storage_key,
    fileName: row.file_name,
    fileSize: Number(row.file_size),
    columnMapping:
      row.column_mapping === null
        ? null
        : parseJsonColumn(ColumnMappingSchema, row.column_mapping, 'column_mapping'),
    createdAt: row.created_at,
  };
}

export function toCasesControlsMetadata(row: CasesControlsMetadataRow): CasesControlsMetadata {
  return {
    distinctPhenotypes: parseJsonColumn(StringListSchema, row.distinct_phenotypes, 'distinct_phenotypes'),
    totalCases: Number(row.total_cases),
    totalControls: Number(row.total_controls),
    phenotypeCounts: parseJsonColumn(PhenotypeCountsSchema, row.phenotype_counts, 'phenotype_counts'),
  };
}

export function toCooccurrenceMetadata(row: CooccurrenceMetadataRow): CooccurrenceMetadata {
  return {
    distinctPhenotypes: parseJsonColumn(StringListSchema, row.distinct_phenotypes, 'distinct_phenotypes'),
    totalPairs: Number(row.total_pairs),
    totalCooccurrenceCount: Number(row.total_cooccurrence_count),
    phenotypePairCounts: parseJsonColumn(PairCountsSchema, row.phenotype_pair_counts, 'phenotype_pair_counts'),
  };
}
