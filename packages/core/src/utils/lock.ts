import { busyError } from '../errors.js';

/** What a caller does when the connection is already running a statement */
export type BusyPolicy = 'wait' | 'reject';

/**
 * Serializes work on one connection. With `reject`, a caller arriving while
 * anything is queued or running fails with Busy instead of waiting.
 */
export class ExclusiveLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get busy(): boolean {
    return this.pending > 0;
  }

  async run<T>(policy: BusyPolicy, fn: () => Promise<T>): Promise<T> {
    if (policy === 'reject' && this.pending > 0) {
      throw busyError();
    }
    this.pending++;
    const result = this.tail.then(fn);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    try {
      return await result;
    } finally {
      this.pending--;
    }
  }
}
