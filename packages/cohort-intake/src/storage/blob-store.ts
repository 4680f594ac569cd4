/**
 * Object storage contract
 *
 * Objects are addressed by a bucket and a slash-delimited key. Writes to an
 * existing key overwrite it.
 *
 * @module storage/blob-store
 */

export interface StoredObject {
  readonly key: string;
  readonly body: Uint8Array;
  readonly contentType: string;
}

export interface BlobStore {
  readonly bucket: string;

  /**
   * @throws BlobNotFoundError when nothing is stored under the key
   */
  get(key: string): Promise<StoredObject>;

  put(key: string, body: Uint8Array, contentType: string): Promise<void>;

  /**
   * @returns false when the key did not exist
   */
  delete(key: string): Promise<boolean>;

  /** Keys under a prefix, sorted */
  list(prefix: string): Promise<string[]>;

  /** Addressable location recorded on file records */
  uri(key: string): string;
}

export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

/**
 * Reject keys that could escape the bucket or address nothing.
 */
export function assertValidKey(key: string): void {
  const segments = key.split('/');
  if (
    key === '' ||
    key.startsWith('/') ||
    segments.some((segment) => segment === '' || segment === '.' || segment === '..')
  ) {
    throw new Error(`Invalid storage key: '${key}'`);
  }
}
