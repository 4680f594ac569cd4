/**
 * combine command
 *
 * Builds the `both` table from a local male and female file of one family
 * and writes it as TSV.
 *
 * @module cli/commands/combine-files
 */

import { readFile, writeFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { FileFamily } from '../../core/types/file-types.js';
import { combineRowSets, type CombineInput } from '../../tabular/combine.js';
import { parseRowSet } from '../../tabular/row-set-parser.js';
import { toTsv } from '../../tabular/row-set-writer.js';
import { mappingFromOption } from '../lib/mapping-option.js';

export interface CombineFilesOptions {
  readonly male: string;
  readonly female: string;
  readonly family: FileFamily;
  readonly maleMapping?: string;
  readonly femaleMapping?: string;
  /** Destination path; the TSV is only returned when absent */
  readonly out?: string;
}

export interface CombineFilesReport {
  readonly family: FileFamily;
  readonly columns: readonly string[];
  readonly rowCount: number;
  readonly output: string | null;
  readonly tsv: string;
}

async function loadInput(path: string, family: FileFamily, mapping: string | undefined, option: string): Promise<CombineInput> {
  return {
    rowSet: parseRowSet(await readFile(path), basename(path)),
    mapping: mapping === undefined ? null : mappingFromOption(family, mapping, option),
  };
}

export async function combineFilesCommand(options: CombineFilesOptions): Promise<CombineFilesReport> {
  const male = await loadInput(options.male, options.family, options.maleMapping, '--male-mapping');
  const female = await loadInput(options.female, options.family, options.femaleMapping, '--female-mapping');

  const combined = combineRowSets(options.family, male, female);
  const tsv = toTsv(combined);

  if (options.out) {
    await writeFile(options.out, tsv, 'utf-8');
  }

  return {
    family: options.family,
    columns: combined.columns,
    rowCount: combined.rows.length,
    output: options.out ?? null,
    tsv,
  };
}
