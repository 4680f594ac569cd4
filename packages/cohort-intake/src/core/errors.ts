/**
 * Cohort intake error types
 *
 * Content problems found while validating a file are not exceptions: they
 * travel as message strings inside validation results. The classes below
 * cover the conditions that abort an operation.
 *
 * @module core/errors
 */

import type { FileType } from './types/file-types.js';

// ============================================================================
// Upload Errors
// ============================================================================

/**
 * An uploaded file failed validation. Nothing was persisted.
 */
export class UploadRejectedError extends Error {
  readonly validationError: string;
  readonly warning: string | null;

  constructor(validationError: string, warning: string | null = null) {
    super(validationError);
    this.name = 'UploadRejectedError';
    this.validationError = validationError;
    this.warning = warning;
    Object.setPrototypeOf(this, UploadRejectedError.prototype);
  }
}

/**
 * The cohort already has a file of this type.
 */
export class DuplicateFileTypeError extends Error {
  readonly cohortId: string;
  readonly fileType: FileType;

  constructor(cohortId: string, fileType: FileType) {
    super(
      `A file of type '${fileType}' already exists for this cohort. Delete the existing file first.`
    );
    this.name = 'DuplicateFileTypeError';
    this.cohortId = cohortId;
    this.fileType = fileType;
    Object.setPrototypeOf(this, DuplicateFileTypeError.prototype);
  }
}

/**
 * A file type string that is unknown, or a `both` type offered for upload.
 */
export class InvalidFileTypeError extends Error {
  readonly value: string;

  constructor(value: string, reason: string = 'Unknown file type') {
    super(`${reason}: ${value}`);
    this.name = 'InvalidFileTypeError';
    this.value = value;
    Object.setPrototypeOf(this, InvalidFileTypeError.prototype);
  }
}

/**
 * The uploaded bytes could not be read as a delimited table.
 */
export class FileParseError extends Error {
  readonly fileName: string;

  constructor(fileName: string, message: string, options?: { cause?: unknown }) {
    super(`Could not read '${fileName}': ${message}`, options);
    this.name = 'FileParseError';
    this.fileName = fileName;
    Object.setPrototypeOf(this, FileParseError.prototype);
  }
}

// ============================================================================
// Lookup Errors
// ============================================================================

export class CohortNotFoundError extends Error {
  readonly cohortId: string;

  constructor(cohortId: string) {
    super(`Cohort not found: ${cohortId}`);
    this.name = 'CohortNotFoundError';
    this.cohortId = cohortId;
    Object.setPrototypeOf(this, CohortNotFoundError.prototype);
  }
}

export class CohortFileNotFoundError extends Error {
  readonly fileId: string;

  constructor(fileId: string) {
    super(`Cohort file not found: ${fileId}`);
    this.name = 'CohortFileNotFoundError';
    this.fileId = fileId;
    Object.setPrototypeOf(this, CohortFileNotFoundError.prototype);
  }
}

export class BlobNotFoundError extends Error {
  readonly key: string;

  constructor(key: string) {
    super(`Object not found: ${key}`);
    this.name = 'BlobNotFoundError';
    this.key = key;
    Object.setPrototypeOf(this, BlobNotFoundError.prototype);
  }
}

export class PhenotypeNotFoundError extends Error {
  readonly phenotypeCode: string;

  constructor(phenotypeCode: string) {
    super(`Phenotype code '${phenotypeCode}' not found`);
    this.name = 'PhenotypeNotFoundError';
    this.phenotypeCode = phenotypeCode;
    Object.setPrototypeOf(this, PhenotypeNotFoundError.prototype);
  }
}

// ============================================================================
// Registry Errors
// ============================================================================

export class DuplicatePhenotypeError extends Error {
  readonly phenotypeCode: string;

  constructor(phenotypeCode: string) {
    super(`Phenotype code '${phenotypeCode}' already exists`);
    this.name = 'DuplicatePhenotypeError';
    this.phenotypeCode = phenotypeCode;
    Object.setPrototypeOf(this, DuplicatePhenotypeError.prototype);
  }
}

/**
 * A phenotype definition that cannot be registered.
 */
export class InvalidPhenotypeError extends Error {
  readonly phenotypeCode: string;

  constructor(phenotypeCode: string, reason: string) {
    super(`Invalid phenotype '${phenotypeCode}': ${reason}`);
    this.name = 'InvalidPhenotypeError';
    this.phenotypeCode = phenotypeCode;
    Object.setPrototypeOf(this, InvalidPhenotypeError.prototype);
  }
}

// ============================================================================
// Infrastructure Errors
// ============================================================================

/**
 * Merging the male and female files of a family failed.
 */
export class CombineFilesError extends Error {
  readonly malePath: string;
  readonly femalePath: string;

  constructor(malePath: string, femalePath: string, cause: unknown) {
    super(
      `Failed to combine ${malePath} and ${femalePath}: ${errorMessage(cause)}`,
      { cause }
    );
    this.name = 'CombineFilesError';
    this.malePath = malePath;
    this.femalePath = femalePath;
    Object.setPrototypeOf(this, CombineFilesError.prototype);
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Unique-constraint violation from better-sqlite3 or pg.
 */
export function isUniqueViolation(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  const { code } = error;
  return (
    code === 'SQLITE_CONSTRAINT_UNIQUE' ||
    code === 'SQLITE_CONSTRAINT_PRIMARYKEY' ||
    code === '23505'
  );
}
