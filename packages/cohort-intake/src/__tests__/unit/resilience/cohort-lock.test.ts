/**
 * Per-cohort lock tests
 */

import { describe, it, expect } from 'vitest';
import { CohortLock } from '../../../resilience/cohort-lock.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('CohortLock', () => {
  it('runs operations on one cohort one at a time, in call order', async () => {
    const lock = new CohortLock();
    const gate = deferred();
    const events: string[] = [];

    const first = lock.run('c1', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = lock.run('c1', async () => {
      events.push('second');
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  it('lets different cohorts proceed independently', async () => {
    const lock = new CohortLock();
    const gate = deferred();

    let blockedDone = false;

    const blocked = lock.run('c1', async () => {
      await gate.promise;
      blockedDone = true;
    });
    const other = await lock.run('c2', async () => 'done');

    expect(other).toBe('done');
    expect(blockedDone).toBe(false);

    gate.resolve();
    await blocked;
    expect(blockedDone).toBe(true);
  });

  it('releases the lock when an operation fails', async () => {
    const lock = new CohortLock();

    const failing = lock.run('c1', async () => {
      throw new Error('boom');
    });
    const next = lock.run('c1', async () => 42);

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe(42);
  });

  it('accepts new work on a cohort after its queue drains', async () => {
    const lock = new CohortLock();

    await lock.run('c1', async () => 'first');

    await expect(lock.run('c1', async () => 'again')).resolves.toBe('again');
  });
});
