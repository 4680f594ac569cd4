/**
 * Directory-backed object store tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { BlobNotFoundError } from '../../../core/errors.js';
import { FilesystemBlobStore } from '../../../storage/filesystem-blob-store.js';
import { bytes } from '../../utils/fixtures.js';

const text = (body: Uint8Array): string => Buffer.from(body).toString('utf-8');
const KEY = 'sgc/c1/cases_controls_male/cases.csv';

describe('FilesystemBlobStore', () => {
  let root: string;
  let store: FilesystemBlobStore;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'cohort-intake-blobs-'));
    store = new FilesystemBlobStore(root, 'uploads');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('round-trips body and content type', async () => {
    await store.put(KEY, bytes('phenotype,cases\n'), 'text/csv');

    const object = await store.get(KEY);

    expect(text(object.body)).toBe('phenotype,cases\n');
    expect(object.contentType).toBe('text/csv');
  });

  it('leaves only the object and its sidecar on disk', async () => {
    await store.put(KEY, bytes('a'), 'text/csv');
    await store.put(KEY, bytes('b'), 'text/csv');

    const files = await readdir(join(root, 'uploads', 'sgc', 'c1', 'cases_controls_male'));

    expect(files.sort()).toEqual(['cases.csv', 'cases.csv.meta.json']);
    expect(text((await store.get(KEY)).body)).toBe('b');
  });

  it('lists stored keys without sidecars', async () => {
    await store.put(KEY, bytes('a'), 'text/csv');
    await store.put('sgc/c2/cooccurrence_female/pairs.tsv', bytes('b'), 'text/tab-separated-values');

    expect(await store.list('sgc/')).toEqual(['sgc/c1/cases_controls_male/cases.csv', 'sgc/c2/cooccurrence_female/pairs.tsv']);
    expect(await store.list('sgc/c2/')).toEqual(['sgc/c2/cooccurrence_female/pairs.tsv']);
  });

  it('returns an empty list before anything is stored', async () => {
    expect(await store.list('')).toEqual([]);
  });

  it('deletes objects and reports missing ones', async () => {
    await store.put(KEY, bytes('a'), 'text/csv');

    expect(await store.delete(KEY)).toBe(true);
    expect(await store.delete(KEY)).toBe(false);
    await expect(store.get(KEY)).rejects.toBeInstanceOf(BlobNotFoundError);
  });

  it('builds file URIs with the bucket name', () => {
    expect(store.uri(KEY)).toBe(`file://uploads/${KEY}`);
  });
});
