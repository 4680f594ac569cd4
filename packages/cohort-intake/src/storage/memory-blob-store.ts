/**
 * In-process object store
 *
 * @module storage/memory-blob-store
 */

import { BlobNotFoundError } from '../core/errors.js';
import { assertValidKey, type BlobStore, type StoredObject } from './blob-store.js';

export class MemoryBlobStore implements BlobStore {
  private readonly objects = new Map<string, StoredObject>();

  constructor(readonly bucket: string = 'memory') {}

  async get(key: string): Promise<StoredObject> {
    const object = this.objects.get(key);
    if (!object) {
      throw new BlobNotFoundError(key);
    }
    return { ...object, body: object.body.slice() };
  }

  async put(key: string, body: Uint8Array, contentType: string): Promise<void> {
    assertValidKey(key);
    this.objects.set(key, { key, body: body.slice(), contentType });
  }

  async delete(key: string): Promise<boolean> {
    return this.objects.delete(key);
  }

  async list(prefix: string): Promise<string[]> {
    return [...this.objects.keys()].filter((key) => key.startsWith(prefix)).sort();
  }

  uri(key: string): string {
    return `memory://${this.bucket}/${key}`;
  }
}
