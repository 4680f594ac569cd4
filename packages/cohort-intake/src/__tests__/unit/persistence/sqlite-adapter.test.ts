/**
 * SQLite adapter transaction tests
 *
 * Concurrent callers share one connection; each transaction must commit or
 * roll back only its own statements.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SQLiteAdapter } from '../../../persistence/adapters/sqlite.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('SQLiteAdapter', () => {
  let adapter: SQLiteAdapter;

  const insert = (value: string): Promise<number> => adapter.execute('INSERT INTO items (v) VALUES (?)', [value]);
  const values = (): Promise<ReadonlyArray<{ v: string }>> =>
    adapter.queryMany<{ v: string }>('SELECT v FROM items ORDER BY v');

  beforeEach(async () => {
    adapter = new SQLiteAdapter(':memory:');
    await adapter.initializeSchema('CREATE TABLE items (v TEXT NOT NULL)');
  });

  afterEach(async () => {
    await adapter.close();
  });

  it('keeps a concurrent transaction out of another one that rolls back', async () => {
    const gate = deferred();

    const failing = adapter.transaction(async () => {
      await insert('a1');
      await gate.promise;
      throw new Error('abort a');
    });
    const succeeding = adapter.transaction(async () => {
      await insert('b1');
    });

    gate.resolve();
    const [first, second] = await Promise.allSettled([failing, succeeding]);

    expect(first.status).toBe('rejected');
    expect(second.status).toBe('fulfilled');
    expect(await values()).toEqual([{ v: 'b1' }]);
  });

  it('does not roll back a statement issued outside an open transaction', async () => {
    const gate = deferred();

    const failing = adapter.transaction(async () => {
      await insert('inside');
      await gate.promise;
      throw new Error('abort');
    });
    const outside = insert('outside');

    gate.resolve();
    await expect(failing).rejects.toThrow('abort');
    await expect(outside).resolves.toBe(1);

    expect(await values()).toEqual([{ v: 'outside' }]);
  });

  it('rolls back only the nested transaction when its error is caught', async () => {
    await adapter.transaction(async () => {
      await insert('outer');
      await expect(
        adapter.transaction(async () => {
          await insert('inner');
          throw new Error('inner failed');
        })
      ).rejects.toThrow('inner failed');
    });

    expect(await values()).toEqual([{ v: 'outer' }]);
  });

  it('returns the callback result once committed', async () => {
    const result = await adapter.transaction(async () => {
      await insert('x');
      return 'committed';
    });

    expect(result).toBe('committed');
    expect(await values()).toEqual([{ v: 'x' }]);
  });
});
