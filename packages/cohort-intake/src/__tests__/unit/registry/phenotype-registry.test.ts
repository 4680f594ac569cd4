/**
 * Phenotype registry tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  DuplicatePhenotypeError,
  InvalidPhenotypeError,
  PhenotypeNotFoundError,
} from '../../../core/errors.js';
import type { SQLiteAdapter } from '../../../persistence/adapters/sqlite.js';
import type { CohortRepository } from '../../../persistence/repository.js';
import {
  addPhenotype,
  loadPhenotypeDefinitions,
  removePhenotype,
  RepositoryPhenotypeRegistry,
  seedPhenotypes,
  StaticPhenotypeRegistry,
} from '../../../registry/phenotype-registry.js';
import { createTestRepository } from '../../utils/fixtures.js';

describe('StaticPhenotypeRegistry', () => {
  it('returns the distinct codes it was given', async () => {
    expect(await new StaticPhenotypeRegistry(['L20', 'L40', 'L20']).getValidCodes()).toEqual(new Set(['L20', 'L40']));
  });
});

describe('loadPhenotypeDefinitions', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cohort-intake-phenotypes-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads the bundled list by default', async () => {
    const definitions = await loadPhenotypeDefinitions();

    expect(definitions).toHaveLength(93);
    expect(definitions).toContainEqual({ phenotype_code: 'L20', description: 'Atopic dermatitis' });
  });

  it('defaults a missing description to empty', async () => {
    const file = join(dir, 'codes.json');
    await writeFile(file, JSON.stringify([{ phenotype_code: ' X01 ' }]));

    expect(await loadPhenotypeDefinitions(file)).toEqual([{ phenotype_code: 'X01', description: '' }]);
  });

  it('names the offending entry of an invalid file', async () => {
    const file = join(dir, 'broken.json');
    await writeFile(file, JSON.stringify([{ description: 'no code' }]));

    await expect(loadPhenotypeDefinitions(file)).rejects.toThrow(
      `Invalid phenotype file ${file}: 0.phenotype_code: Required`
    );
  });

  it('rejects codes containing the pair separator', async () => {
    const file = join(dir, 'pipes.json');
    await writeFile(file, JSON.stringify([{ phenotype_code: 'L20' }, { phenotype_code: 'A|B' }]));

    await expect(loadPhenotypeDefinitions(file)).rejects.toThrow(
      `Invalid phenotype file ${file}: 1.phenotype_code: Phenotype codes must not contain '|'`
    );
  });
});

describe('seedPhenotypes', () => {
  it('writes definitions that the repository registry then serves', async () => {
    const { repo, adapter } = await createTestRepository();

    const count = await seedPhenotypes(repo, [
      { phenotype_code: 'L20', description: 'Atopic dermatitis' },
      { phenotype_code: 'L40', description: 'Psoriasis' },
    ]);

    expect(count).toBe(2);
    expect(await new RepositoryPhenotypeRegistry(repo).getValidCodes()).toEqual(new Set(['L20', 'L40']));
    await adapter.close();
  });
});

describe('addPhenotype / removePhenotype', () => {
  let repo: CohortRepository;
  let adapter: SQLiteAdapter;

  beforeEach(async () => {
    ({ repo, adapter } = await createTestRepository());
  });

  afterEach(async () => {
    await adapter.close();
  });

  it('registers a trimmed code with its description', async () => {
    const row = await addPhenotype(repo, ' L20 ', 'Atopic dermatitis');

    expect(row.phenotype_code).toBe('L20');
    expect(row.description).toBe('Atopic dermatitis');
    expect(await repo.getPhenotypeCodes()).toEqual(new Set(['L20']));
  });

  it('refuses a code that is already registered', async () => {
    await addPhenotype(repo, 'L20');

    await expect(addPhenotype(repo, 'L20', 'again')).rejects.toThrow(new DuplicatePhenotypeError('L20'));
  });

  it('refuses a code containing the pair separator', async () => {
    await expect(addPhenotype(repo, 'L20|L40')).rejects.toThrow(
      new InvalidPhenotypeError('L20|L40', "Phenotype codes must not contain '|'")
    );
    expect(await repo.getPhenotypeCodes()).toEqual(new Set());
  });

  it('removes a registered code and reports an unknown one', async () => {
    await addPhenotype(repo, 'L40', 'Psoriasis');

    await removePhenotype(repo, 'L40');

    expect(await repo.getPhenotypeCodes()).toEqual(new Set());
    await expect(removePhenotype(repo, 'L40')).rejects.toThrow(new PhenotypeNotFoundError('L40'));
  });
});
