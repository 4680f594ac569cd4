/**
 * Phenotype registry commands.
 *
 * @module cli/commands/phenotypes
 */

import type { CohortRepository } from '../../persistence/repository.js';
import type { PhenotypeCaseTotals, PhenotypeRow } from '../../persistence/schema.types.js';
import {
  addPhenotype,
  DEFAULT_PHENOTYPE_FILE,
  loadPhenotypeDefinitions,
  removePhenotype,
  seedPhenotypes,
} from '../../registry/phenotype-registry.js';

export interface SeedPhenotypesReport {
  readonly file: string;
  readonly count: number;
}

export async function seedPhenotypesCommand(
  repository: CohortRepository,
  file: string = DEFAULT_PHENOTYPE_FILE
): Promise<SeedPhenotypesReport> {
  const definitions = await loadPhenotypeDefinitions(file);
  const count = await seedPhenotypes(repository, definitions);
  return { file, count };
}

export async function listPhenotypesCommand(repository: CohortRepository): Promise<ReadonlyArray<PhenotypeRow>> {
  return repository.listPhenotypes();
}

export async function addPhenotypeCommand(
  repository: CohortRepository,
  phenotypeCode: string,
  description?: string
): Promise<PhenotypeRow> {
  return addPhenotype(repository, phenotypeCode, description);
}

export async function deletePhenotypeCommand(
  repository: CohortRepository,
  phenotypeCode: string
): Promise<{ readonly phenotypeCode: string }> {
  await removePhenotype(repository, phenotypeCode);
  return { phenotypeCode };
}

/**
 * Cases and controls per phenotype summed over every cohort's `both` file.
 */
export async function phenotypeTotalsCommand(repository: CohortRepository): Promise<PhenotypeCaseTotals[]> {
  return repository.getPhenotypeCaseTotals();
}
