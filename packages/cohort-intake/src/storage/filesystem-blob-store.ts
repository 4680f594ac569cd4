/**
 * Directory-backed object store
 *
 * Each object is a file under `{root}/{bucket}/{key}` with a
 * `.meta.json` sidecar holding its content type. Writes go to a temporary
 * file first and are renamed into place, so readers never see a partial
 * object.
 *
 * @module storage/filesystem-blob-store
 */

import { mkdir, readFile, readdir, rename, rm, unlink, writeFile } from 'node:fs/promises';
import { dirname, join, relative, sep } from 'node:path';
import { BlobNotFoundError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import { assertValidKey, DEFAULT_CONTENT_TYPE, type BlobStore, type StoredObject } from './blob-store.js';

const logger = createLogger({ module: 'filesystem-blob-store' });

const META_SUFFIX = '.meta.json';

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

async function atomicWrite(filePath: string, data: Uint8Array | string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data);
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

function parseContentType(raw: string): string {
  const parsed: unknown = JSON.parse(raw);
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'contentType' in parsed &&
    typeof parsed.contentType === 'string'
  ) {
    return parsed.contentType;
  }
  return DEFAULT_CONTENT_TYPE;
}

export class FilesystemBlobStore implements BlobStore {
  private readonly directory: string;

  constructor(
    root: string,
    readonly bucket: string
  ) {
    this.directory = join(root, bucket);
  }

  private pathFor(key: string): string {
    assertValidKey(key);
    return join(this.directory, ...key.split('/'));
  }

  async get(key: string): Promise<StoredObject> {
    const filePath = this.pathFor(key);
    let body: Buffer;
    try {
      body = await readFile(filePath);
    } catch (error) {
      if (isNotFound(error)) {
        throw new BlobNotFoundError(key);
      }
      throw error;
    }

    let contentType = DEFAULT_CONTENT_TYPE;
    try {
      contentType = parseContentType(await readFile(`${filePath}${META_SUFFIX}`, 'utf-8'));
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
      logger.debug('Object has no metadata sidecar', { key });
    }

    return { key, body: new Uint8Array(body), contentType };
  }

  async put(key: string, body: Uint8Array, contentType: string): Promise<void> {
    const filePath = this.pathFor(key);
    await atomicWrite(filePath, body);
    await atomicWrite(`${filePath}${META_SUFFIX}`, JSON.stringify({ contentType }));
    logger.debug('Stored object', { key, bytes: body.byteLength });
  }

  async delete(key: string): Promise<boolean> {
    const filePath = this.pathFor(key);
    try {
      await unlink(filePath);
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
    await rm(`${filePath}${META_SUFFIX}`, { force: true });
    return true;
  }

  async list(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    await this.walk(this.directory, keys);
    return keys.filter((key) => key.startsWith(prefix)).sort();
  }

  private async walk(directory: string, keys: string[]): Promise<void> {
    const entries = await readdir(directory, { withFileTypes: true }).catch((error: unknown) => {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    });
    if (entries === null) {
      return;
    }

    for (const entry of entries) {
      const fullPath = join(directory, entry.name);
      if (entry.isDirectory()) {
        await this.walk(fullPath, keys);
      } else if (!entry.name.endsWith(META_SUFFIX) && !entry.name.endsWith('.tmp')) {
        keys.push(relative(this.directory, fullPath).split(sep).join('/'));
      }
    }
  }

  uri(key: string): string {
    return `file://${this.bucket}/${key}`;
  }
}
