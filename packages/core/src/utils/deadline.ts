/**
 * Deadline and cancellation plumbing shared by the compile and execute phases.
 */

import { cancelledError, timeoutError } from '../errors.js';

export type Phase = 'compile' | 'execute' | 'connect';

/**
 * Run `task` with a signal that aborts when `timeoutMs` elapses or `parent` aborts.
 * The task receives the signal so it can abort its outstanding network call;
 * the returned promise settles with Timeout / Cancelled as soon as the signal fires.
 */
export async function withDeadline<T>(
  phase: Phase,
  timeoutMs: number,
  parent: AbortSignal | undefined,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  if (parent?.aborted) {
    throw cancelledError(phase);
  }

  const controller = new AbortController();
  let timedOut = false;

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener(
      'abort',
      () => reject(timedOut ? timeoutError(phase, timeoutMs) : cancelledError(phase)),
      { once: true },
    );
  });

  const onParentAbort = (): void => controller.abort();
  parent?.addEventListener('abort', onParentAbort, { once: true });
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  try {
    return await Promise.race([task(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
