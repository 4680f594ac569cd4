/**
 * validate command
 *
 * Checks one local file against the rules of its family without touching
 * the database or object storage.
 *
 * Usage:
 *   cohort-intake validate cases.csv --family cases_controls
 *   cohort-intake validate pairs.tsv --family cooccurrence \
 *     --mapping '{"phenotype1":"a","phenotype2":"b","cooccurrence_count":"n"}'
 *
 * @module cli/commands/validate-file
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { FileParseError } from '../../core/errors.js';
import type { FileFamily } from '../../core/types/file-types.js';
import type { FileMetadata } from '../../core/types/metadata.js';
import type { RowSet } from '../../core/types/row-set.js';
import { extractMetadata } from '../../extractors/metadata-extractor.js';
import {
  DEFAULT_PHENOTYPE_FILE,
  loadPhenotypeDefinitions,
  StaticPhenotypeRegistry,
  type PhenotypeRegistry,
} from '../../registry/phenotype-registry.js';
import { parseRowSet } from '../../tabular/row-set-parser.js';
import { validateFile } from '../../validators/index.js';
import { mappingFromOption } from '../lib/mapping-option.js';

export interface ValidateFileOptions {
  readonly file: string;
  readonly family: FileFamily;
  /** Column mapping as JSON */
  readonly mapping?: string;
  /** Phenotype definitions file; the bundled list when absent */
  readonly phenotypes?: string;
  /** Takes precedence over `phenotypes` */
  readonly registry?: PhenotypeRegistry;
}

export interface ValidateFileReport {
  readonly file: string;
  readonly family: FileFamily;
  readonly columns: readonly string[];
  readonly rowCount: number;
  readonly error: string | null;
  readonly warning: string | null;
  /** Present only for files that pass */
  readonly metadata: FileMetadata | null;
}

async function registryFor(options: ValidateFileOptions): Promise<PhenotypeRegistry> {
  if (options.registry) return options.registry;
  const definitions = await loadPhenotypeDefinitions(options.phenotypes ?? DEFAULT_PHENOTYPE_FILE);
  return new StaticPhenotypeRegistry(definitions.map((definition) => definition.phenotype_code));
}

export async function validateFileCommand(options: ValidateFileOptions): Promise<ValidateFileReport> {
  const mapping = mappingFromOption(options.family, options.mapping);
  const registry = await registryFor(options);
  const content = await readFile(options.file);
  const fileName = basename(options.file);

  const empty = { file: options.file, family: options.family, warning: null, metadata: null };
  let rowSet: RowSet;
  try {
    rowSet = parseRowSet(content, fileName);
  } catch (error) {
    if (error instanceof FileParseError) {
      return { ...empty, columns: [], rowCount: 0, error: error.message };
    }
    throw error;
  }

  const result = validateFile(options.family, rowSet, mapping, await registry.getValidCodes());
  return {
    file: options.file,
    family: options.family,
    columns: rowSet.columns,
    rowCount: rowSet.rows.length,
    error: result.error,
    warning: result.warning,
    metadata: result.error === null ? extractMetadata(rowSet, mapping) : null,
  };
}
