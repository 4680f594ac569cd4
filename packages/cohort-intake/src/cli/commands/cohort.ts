/**
 * Cohort commands: create, inspect and delete cohorts, upload, download and
 * delete their files, and run the cross-file consistency checks.
 *
 * @module cli/commands/cohort
 */

import { readFile, writeFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { Cohort, CohortFile } from '../../core/types/cohort.js';
import type { FileType } from '../../core/types/file-types.js';
import type {
  CohortUploadOrchestrator,
  CohortWithFiles,
  DeleteCohortResult,
  DeleteFileResult,
} from '../../services/cohort-upload-orchestrator.js';
import type { CohortValidationOutcome } from '../../services/consistency-engine.js';
import { parseJsonOption } from '../lib/output.js';

export interface UpsertCohortOptions {
  readonly name: string;
  readonly uploadedBy: string;
  readonly totalSampleSize?: number;
  readonly males?: number;
  readonly females?: number;
  /** Free-form cohort metadata as a JSON object */
  readonly metadata?: string;
}

export interface UpsertCohortReport {
  readonly cohort: Cohort;
  readonly created: boolean;
}

export interface UploadFileOptions {
  readonly cohortId: string;
  readonly fileType: string;
  readonly file: string;
  readonly mapping?: string;
}

export interface UploadFileReport {
  readonly fileId: string;
  readonly fileType: FileType;
  readonly filePath: string;
  readonly warning: string | null;
  /** Id of the regenerated `both` file */
  readonly combinedFileId: string | null;
}

export interface CohortListEntry {
  readonly id: string;
  readonly name: string;
  readonly uploadedBy: string;
  readonly validationStatus: boolean;
  readonly fileTypes: readonly string[];
}

export interface DownloadFileOptions {
  readonly fileId: string;
  /** Destination path; the bytes are only returned when absent */
  readonly out?: string;
}

export interface DownloadFileReport {
  readonly file: CohortFile;
  readonly contentType: string;
  readonly output: string | null;
  readonly body: Uint8Array;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function upsertCohortCommand(
  orchestrator: CohortUploadOrchestrator,
  options: UpsertCohortOptions
): Promise<UpsertCohortReport> {
  const metadata = parseJsonOption(options.metadata, '--metadata');
  if (metadata !== undefined && !isRecord(metadata)) {
    throw new Error('--metadata must be a JSON object');
  }

  return orchestrator.upsertCohort({
    name: options.name,
    uploadedBy: options.uploadedBy,
    totalSampleSize: options.totalSampleSize ?? null,
    numberOfMales: options.males ?? null,
    numberOfFemales: options.females ?? null,
    cohortMetadata: metadata ?? {},
  });
}

export async function uploadFileCommand(
  orchestrator: CohortUploadOrchestrator,
  options: UploadFileOptions
): Promise<UploadFileReport> {
  const result = await orchestrator.uploadFile({
    cohortId: options.cohortId,
    fileType: options.fileType,
    fileName: basename(options.file),
    content: await readFile(options.file),
    columnMapping: parseJsonOption(options.mapping, '--mapping'),
  });

  return {
    fileId: result.file.id,
    fileType: result.file.fileType,
    filePath: result.file.filePath,
    warning: result.warning,
    combinedFileId: result.combined?.file.id ?? null,
  };
}

export async function deleteFileCommand(
  orchestrator: CohortUploadOrchestrator,
  fileId: string
): Promise<DeleteFileResult> {
  return orchestrator.deleteFile(fileId);
}

export async function validateCohortCommand(
  orchestrator: CohortUploadOrchestrator,
  cohortId: string
): Promise<CohortValidationOutcome> {
  return orchestrator.validateCohort(cohortId);
}

export async function listCohortsCommand(
  orchestrator: CohortUploadOrchestrator,
  uploadedBy?: string
): Promise<CohortListEntry[]> {
  const cohorts = await orchestrator.listCohorts(uploadedBy);
  return cohorts.map(({ cohort, files }) => ({
    id: cohort.id,
    name: cohort.name,
    uploadedBy: cohort.uploadedBy,
    validationStatus: cohort.validationStatus,
    fileTypes: files.map((file) => file.fileType),
  }));
}

export async function showCohortCommand(
  orchestrator: CohortUploadOrchestrator,
  cohortId: string
): Promise<CohortWithFiles> {
  return orchestrator.getCohort(cohortId);
}

export async function downloadFileCommand(
  orchestrator: CohortUploadOrchestrator,
  options: DownloadFileOptions
): Promise<DownloadFileReport> {
  const { file, body, contentType } = await orchestrator.downloadFile(options.fileId);
  if (options.out) {
    await writeFile(options.out, body);
  }
  return { file, contentType, output: options.out ?? null, body };
}

export async function deleteCohortCommand(
  orchestrator: CohortUploadOrchestrator,
  cohortId: string
): Promise<DeleteCohortResult> {
  return orchestrator.deleteCohort(cohortId);
}
