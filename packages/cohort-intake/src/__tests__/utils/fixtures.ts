/**
 * Shared fixtures: small tables, an in-memory repository and cohort inserts.
 */

import { readFile } from 'node:fs/promises';
import type { RowSet } from '../../core/types/row-set.js';
import { DEFAULT_SCHEMA_PATH } from '../../persistence/adapters/factory.js';
import { SQLiteAdapter } from '../../persistence/adapters/sqlite.js';
import { CohortRepository } from '../../persistence/repository.js';
import type { CohortInsert } from '../../persistence/schema.types.js';
import { parseDelimitedText } from '../../tabular/row-set-parser.js';

/** Codes accepted by the validators in unit tests */
export const TEST_CODES: ReadonlySet<string> = new Set(['L20', 'L40', 'L70', 'L02', 'L03']);

/** Lines joined into a file body with a trailing newline */
export function lines(...content: string[]): string {
  return `${content.join('\n')}\n`;
}

export function bytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

/** Comma-separated lines parsed into a row set */
export function table(...content: string[]): RowSet {
  return parseDelimitedText(lines(...content), ',');
}

export async function createTestRepository(): Promise<{
  repo: CohortRepository;
  adapter: SQLiteAdapter;
}> {
  const schemaSQL = await readFile(DEFAULT_SCHEMA_PATH, 'utf-8');
  const adapter = new SQLiteAdapter(':memory:');
  await adapter.initializeSchema(schemaSQL);
  return { repo: new CohortRepository(adapter), adapter };
}

export function createTestCohort(overrides: Partial<CohortInsert> = {}): CohortInsert {
  return {
    name: 'Test Cohort',
    uploadedBy: 'tester@example.org',
    totalSampleSize: 1000,
    numberOfMales: 500,
    numberOfFemales: 500,
    cohortMetadata: { country: 'NO' },
    ...overrides,
  };
}
