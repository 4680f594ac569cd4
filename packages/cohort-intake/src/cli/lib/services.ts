/**
 * Wires configuration to concrete adapters for commands that touch the
 * database or object storage.
 *
 * @module cli/lib/services
 */

import { resolveStorageRoot, type IntakeConfig } from '../../core/config.js';
import { createDatabaseAdapter } from '../../persistence/adapters/factory.js';
import { CohortRepository, type DatabaseAdapter } from '../../persistence/repository.js';
import { RepositoryPhenotypeRegistry } from '../../registry/phenotype-registry.js';
import { CohortUploadOrchestrator } from '../../services/cohort-upload-orchestrator.js';
import type { BlobStore } from '../../storage/blob-store.js';
import { FilesystemBlobStore } from '../../storage/filesystem-blob-store.js';

export interface IntakeServices {
  readonly adapter: DatabaseAdapter;
  readonly repository: CohortRepository;
  readonly blobStore: BlobStore;
  readonly orchestrator: CohortUploadOrchestrator;
}

export async function openServices(config: IntakeConfig): Promise<IntakeServices> {
  const adapter = await createDatabaseAdapter(config.database.url);
  const repository = new CohortRepository(adapter);
  const blobStore = new FilesystemBlobStore(resolveStorageRoot(config), config.storage.bucket);
  const orchestrator = new CohortUploadOrchestrator({
    repository,
    blobStore,
    registry: new RepositoryPhenotypeRegistry(repository),
    keyPrefix: config.storage.prefix,
  });
  return { adapter, repository, blobStore, orchestrator };
}

/**
 * Open services, run `fn`, and close the database connection afterwards.
 */
export async function withServices<T>(
  config: IntakeConfig,
  fn: (services: IntakeServices) => Promise<T>
): Promise<T> {
  const services = await openServices(config);
  try {
    return await fn(services);
  } finally {
    await services.adapter.close();
  }
}
