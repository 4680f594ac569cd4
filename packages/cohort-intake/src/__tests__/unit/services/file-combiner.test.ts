/**
 * File Combiner Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CombineFilesError } from '../../../core/errors.js';
import type { Cohort, CohortFile } from '../../../core/types/cohort.js';
import type { FileType } from '../../../core/types/file-types.js';
import type { SQLiteAdapter } from '../../../persistence/adapters/sqlite.js';
import type { CohortRepository } from '../../../persistence/repository.js';
import { FileCombiner } from '../../../services/file-combiner.js';
import { MemoryBlobStore } from '../../../storage/memory-blob-store.js';
import { bytes, createTestCohort, createTestRepository, lines } from '../../utils/fixtures.js';

describe('FileCombiner', () => {
  let repo: CohortRepository;
  let adapter: SQLiteAdapter;
  let store: MemoryBlobStore;
  let combiner: FileCombiner;
  let cohort: Cohort;

  async function storeFile(fileType: FileType, fileName: string, text: string | null): Promise<CohortFile> {
    const key = `sgc/${cohort.id}/${fileType}/${fileName}`;
    const body = bytes(text ?? '');
    if (text !== null) {
      await store.put(key, body, 'text/plain');
    }
    return repo.insertFile({
      cohortId: cohort.id,
      fileType,
      filePath: store.uri(key),
      storageKey: key,
      fileName,
      fileSize: body.byteLength,
      columnMapping: null,
    });
  }

  beforeEach(async () => {
    ({ repo, adapter } = await createTestRepository());
    store = new MemoryBlobStore('test');
    combiner = new FileCombiner(repo, store);
    cohort = await repo.createCohort(createTestCohort());
  });

  afterEach(async () => {
    await adapter.close();
  });

  it('returns null until both sexes are present', async () => {
    await storeFile('cases_controls_male', 'male.csv', lines('phenotype,cases,controls', 'L20,10,20'));

    expect(await combiner.regenerate(cohort.id, 'cases_controls')).toBeNull();
    expect(await repo.getFileByType(cohort.id, 'cases_controls_both')).toBeNull();
  });

  it('merges a CSV and a TSV file into a stored TSV', async () => {
    await storeFile('cases_controls_male', 'male.csv', lines('phenotype,cases,controls', 'L20,10,20', 'L40,0,7'));
    await storeFile('cases_controls_female', 'female.tsv', lines('phenotype\tcases\tcontrols', 'L20\t5\t15'));

    const result = await combiner.regenerate(cohort.id, 'cases_controls');

    const key = `sgc/${cohort.id}/cases_controls_both/combined_cases_controls_both.tsv`;
    expect(result?.rowCount).toBe(2);
    expect(result?.file.fileName).toBe('combined_cases_controls_both.tsv');
    expect(result?.file.storageKey).toBe(key);
    expect(result?.file.filePath).toBe(`memory://test/${key}`);
    expect(result?.metadata).toEqual({
      distinctPhenotypes: ['L20', 'L40'],
      totalCases: 15,
      totalControls: 42,
      phenotypeCounts: {
        L20: { cases: 15, controls: 35 },
        L40: { cases: 0, controls: 7 },
      },
    });

    const stored = await store.get(key);
    expect(new TextDecoder().decode(stored.body)).toBe('phenotype\tcases\tcontrols\nL20\t15\t35\nL40\t0\t7\n');
    expect(stored.contentType).toBe('text/tab-separated-values');
  });

  it('orders co-occurrence pairs and sums reversed pairs', async () => {
    await storeFile('cooccurrence_male', 'male.csv', lines('phenotype1,phenotype2,cooccurrence_count', 'L40,L20,2'));
    await storeFile('cooccurrence_female', 'female.csv', lines('phenotype1,phenotype2,cooccurrence_count', 'L20,L40,1'));

    const result = await combiner.regenerate(cohort.id, 'cooccurrence');

    expect(result?.metadata).toEqual({
      distinctPhenotypes: ['L20', 'L40'],
      totalPairs: 1,
      totalCooccurrenceCount: 3,
      phenotypePairCounts: { 'L20|L40': 3 },
    });
  });

  it('replaces the previous combined file on every run', async () => {
    await storeFile('cases_controls_male', 'male.csv', lines('phenotype,cases,controls', 'L20,10,20'));
    await storeFile('cases_controls_female', 'female.csv', lines('phenotype,cases,controls', 'L20,5,15'));

    const first = await combiner.regenerate(cohort.id, 'cases_controls');
    const second = await combiner.regenerate(cohort.id, 'cases_controls');

    expect(first).not.toBeNull();
    expect(second).not.toBeNull();
    expect(second?.file.id).not.toBe(first?.file.id);
    expect(second?.metadata).toEqual(first?.metadata);
    expect(await repo.listFiles(cohort.id)).toHaveLength(3);
    if (first) {
      expect(await repo.getCasesControlsMetadata(first.file.id)).toBeNull();
    }
    if (second) {
      expect(await repo.getCasesControlsMetadata(second.file.id)).toEqual(second.metadata);
    }
  });

  it('names both source files when a blob is missing', async () => {
    const male = await storeFile('cases_controls_male', 'male.csv', lines('phenotype,cases,controls', 'L20,10,20'));
    const female = await storeFile('cases_controls_female', 'female.csv', null);

    const attempt = combiner.regenerate(cohort.id, 'cases_controls');

    await expect(attempt).rejects.toThrow(CombineFilesError);
    await expect(attempt).rejects.toThrow(
      `Failed to combine ${male.filePath} and ${female.filePath}: Object not found: ${female.storageKey}`
    );
    expect(await repo.getFileByType(cohort.id, 'cases_controls_both')).toBeNull();
  });
});
