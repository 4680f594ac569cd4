/**
 * Storage key layout for cohort files
 *
 *   {prefix}/{cohortId}/{fileType}/{fileName}
 *   {prefix}/{cohortId}/{fileType}/combined_{fileType}.tsv
 *
 * @module storage/storage-keys
 */

import type { FileType } from '../core/types/file-types.js';

export const DEFAULT_KEY_PREFIX = 'sgc';

/**
 * Strip any directory part and characters that do not belong in a key.
 */
export function sanitizeFileName(fileName: string): string {
  const base = fileName.split(/[\\/]/).pop() ?? '';
  const cleaned = base.replace(/[^A-Za-z0-9._-]/g, '_').replace(/^\.+/, '');
  return cleaned === '' ? 'upload' : cleaned;
}

/** Every key of a cohort starts with this */
export function cohortPrefix(prefix: string, cohortId: string): string {
  return `${prefix}/${cohortId}/`;
}

export function uploadKey(prefix: string, cohortId: string, fileType: FileType, fileName: string): string {
  return `${cohortPrefix(prefix, cohortId)}${fileType}/${sanitizeFileName(fileName)}`;
}

export function combinedFileName(fileType: FileType): string {
  return `combined_${fileType}.tsv`;
}

export function combinedKey(prefix: string, cohortId: string, fileType: FileType): string {
  return `${cohortPrefix(prefix, cohortId)}${fileType}/${combinedFileName(fileType)}`;
}
