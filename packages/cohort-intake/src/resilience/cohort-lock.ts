/**
 * Per-Cohort Advisory Lock
 *
 * Serializes operations that read and rewrite one cohort's file set and
 * validation flag (upload, delete, validate-all). Operations on different
 * cohorts run concurrently. The lock is in-process only: separate
 * processes sharing one database are not excluded.
 *
 * DESIGN:
 * - One promise chain per cohort id
 * - A failed operation releases the lock for the next waiter
 * - Chains are dropped once idle
 */

import { createLogger } from '../core/utils/logger.js';

const logger = createLogger({ module: 'cohort-lock' });

export class CohortLock {
  private readonly tails = new Map<string, Promise<void>>();
  private readonly waiting = new Map<string, number>();

  /**
   * Run `fn` once every earlier operation on the same cohort has settled.
   *
   * @example
   * ```typescript
   * const lock = new CohortLock();
   * const outcome = await lock.run(cohortId, () => engine.runChecks(cohortId));
   * ```
   */
  async run<T>(cohortId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(cohortId) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(cohortId, tail);

    const queued = (this.waiting.get(cohortId) ?? 0) + 1;
    this.waiting.set(cohortId, queued);
    if (queued > 1) {
      logger.debug('Waiting for cohort lock', { cohortId, queued });
    }

    await previous;
    try {
      return await fn();
    } finally {
      release();
      const remaining = (this.waiting.get(cohortId) ?? 1) - 1;
      if (remaining === 0) {
        this.waiting.delete(cohortId);
        if (this.tails.get(cohortId) === tail) {
          this.tails.delete(cohortId);
        }
      } else {
        this.waiting.set(cohortId, remaining);
      }
    }
  }
}
