/**
 * Phenotype code registry
 *
 * Validators receive the set of valid codes as an argument; these classes
 * produce that set once per validation run.
 *
 * @module registry/phenotype-registry
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { InvalidPhenotypeError, PhenotypeNotFoundError } from '../core/errors.js';
import { PAIR_KEY_SEPARATOR } from '../core/types/metadata.js';
import type { CohortRepository } from '../persistence/repository.js';
import type { PhenotypeRow } from '../persistence/schema.types.js';

export interface PhenotypeRegistry {
  getValidCodes(): Promise<ReadonlySet<string>>;
}

/**
 * Reads the registry table on every call.
 */
export class RepositoryPhenotypeRegistry implements PhenotypeRegistry {
  constructor(private readonly repository: CohortRepository) {}

  async getValidCodes(): Promise<ReadonlySet<string>> {
    return this.repository.getPhenotypeCodes();
  }
}

/**
 * Fixed set of codes.
 */
export class StaticPhenotypeRegistry implements PhenotypeRegistry {
  private readonly codes: ReadonlySet<string>;

  constructor(codes: Iterable<string>) {
    this.codes = new Set(codes);
  }

  async getValidCodes(): Promise<ReadonlySet<string>> {
    return this.codes;
  }
}

// ============================================================================
// Seed Data
// ============================================================================

/** Pair keys join two codes with the separator, so codes may not contain it */
export const PhenotypeDefinitionSchema = z.object({
  phenotype_code: z
    .string()
    .trim()
    .min(1)
    .refine((code) => !code.includes(PAIR_KEY_SEPARATOR), {
      message: `Phenotype codes must not contain '${PAIR_KEY_SEPARATOR}'`,
    }),
  description: z.string().default(''),
});

export const PhenotypeFileSchema = z.array(PhenotypeDefinitionSchema);

export type PhenotypeDefinition = z.infer<typeof PhenotypeDefinitionSchema>;

export const DEFAULT_PHENOTYPE_FILE = fileURLToPath(
  new URL('../../data/sgc-phenotypes.json', import.meta.url)
);

/**
 * Load phenotype definitions from a JSON file: an array of
 * `{ phenotype_code, description }` objects.
 */
export async function loadPhenotypeDefinitions(
  filePath: string = DEFAULT_PHENOTYPE_FILE
): Promise<PhenotypeDefinition[]> {
  const raw: unknown = JSON.parse(await readFile(filePath, 'utf-8'));
  const result = PhenotypeFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.errors[0];
    throw new Error(
      `Invalid phenotype file ${filePath}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown error'}`
    );
  }
  return result.data;
}

/**
 * Insert or update every definition; returns how many were written.
 */
export async function seedPhenotypes(
  repository: CohortRepository,
  definitions: readonly PhenotypeDefinition[]
): Promise<number> {
  await repository.transaction(async () => {
    for (const definition of definitions) {
      await repository.upsertPhenotype(definition.phenotype_code, definition.description);
    }
  });
  return definitions.length;
}

/**
 * Register one new code.
 *
 * @throws InvalidPhenotypeError for an empty code or one containing `|`
 * @throws DuplicatePhenotypeError
 */
export async function addPhenotype(
  repository: CohortRepository,
  phenotypeCode: string,
  description: string = ''
): Promise<PhenotypeRow> {
  const result = PhenotypeDefinitionSchema.safeParse({ phenotype_code: phenotypeCode, description });
  if (!result.success) {
    throw new InvalidPhenotypeError(phenotypeCode, result.error.errors[0]?.message ?? 'invalid definition');
  }
  return repository.insertPhenotype(result.data.phenotype_code, result.data.description);
}

/**
 * @throws PhenotypeNotFoundError
 */
export async function removePhenotype(repository: CohortRepository, phenotypeCode: string): Promise<void> {
  if (!(await repository.deletePhenotype(phenotypeCode))) {
    throw new PhenotypeNotFoundError(phenotypeCode);
  }
}
