/**
 * Cohort intake: validation, combination and consistency checks for
 * consortium cohort files.
 *
 * @packageDocumentation
 */

export * from './core/types/index.js';
export * from './core/errors.js';
export { loadConfig, resolveStorageRoot, DEFAULT_CONFIG, IntakeConfigSchema } from './core/config.js';
export type { IntakeConfig, LoadConfigOptions } from './core/config.js';
export { logger, createLogger, Logger } from './core/utils/logger.js';
export type { LogLevel, LogMetadata } from './core/utils/logger.js';

// Tabular
export { isSuppressed, normalizeSuppressedValues, normalizeSuppressedColumn } from './tabular/suppressed-values.js';
export { toNumericCell, numericColumn } from './tabular/numeric-column.js';
export { parseRowSet, parseDelimitedText, delimiterForFileName } from './tabular/row-set-parser.js';
export { toTsv, TSV_CONTENT_TYPE } from './tabular/row-set-writer.js';
export { combineRowSets, positionalMapping } from './tabular/combine.js';
export type { CombineInput } from './tabular/combine.js';

// Validation and metadata
export * from './validators/index.js';
export {
  extractCasesControlsMetadata,
  extractCooccurrenceMetadata,
  extractMetadata,
} from './extractors/metadata-extractor.js';

// Storage
export type { BlobStore, StoredObject } from './storage/blob-store.js';
export { MemoryBlobStore } from './storage/memory-blob-store.js';
export { FilesystemBlobStore } from './storage/filesystem-blob-store.js';
export { uploadKey, combinedKey, combinedFileName } from './storage/storage-keys.js';

// Persistence
export { CohortRepository } from './persistence/repository.js';
export type { DatabaseAdapter } from './persistence/repository.js';
export type { CohortInsert, CohortUpdate, PhenotypeCaseTotals, PhenotypeRow } from './persistence/schema.types.js';
export { SQLiteAdapter } from './persistence/adapters/sqlite.js';
export { PostgreSQLAdapter } from './persistence/adapters/postgresql.js';
export { createDatabaseAdapter, parseDatabaseUrl, DEFAULT_SCHEMA_PATH } from './persistence/adapters/factory.js';

// Registry
export {
  RepositoryPhenotypeRegistry,
  StaticPhenotypeRegistry,
  loadPhenotypeDefinitions,
  seedPhenotypes,
  DEFAULT_PHENOTYPE_FILE,
} from './registry/phenotype-registry.js';
export type { PhenotypeRegistry, PhenotypeDefinition } from './registry/phenotype-registry.js';

// Services
export { CohortLock } from './resilience/cohort-lock.js';
export { FileCombiner } from './services/file-combiner.js';
export type { CombinedFileResult } from './services/file-combiner.js';
export {
  ConsistencyEngine,
  runConsistencyChecks,
  checkCasesControlsCompleteness,
  checkCooccurrenceCompleteness,
  checkCrossFamilyConsistency,
  CHECK_PREFIXES,
} from './services/consistency-engine.js';
export type { CohortValidationOutcome } from './services/consistency-engine.js';
export { CohortUploadOrchestrator, contentTypeForFileName } from './services/cohort-upload-orchestrator.js';
export type {
  CohortUploadOrchestratorOptions,
  UploadFileRequest,
  UploadFileResult,
  PreviewFileRequest,
  PreviewFileResult,
  DeleteFileResult,
  UpsertCohortResult,
} from './services/cohort-upload-orchestrator.js';
