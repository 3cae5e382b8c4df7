/**
 * @module abort
 *
 * Deadlines for async work.
 */

import { QueryAbortedError, abortReason, toError } from './errors.js';

/**
 * Run `run` with a signal that aborts after `timeoutMs` or when `parent`
 * aborts, whichever comes first.
 *
 * The returned promise rejects as soon as the signal aborts, even if `run`
 * ignores it. `run` then finishes in the background and its outcome is
 * dropped.
 *
 * @throws {QueryAbortedError} On timeout; the parent's abort reason when
 *   the parent aborts.
 *
 * @example
 * ```typescript
 * const buildings = await withDeadline(5000, request.signal, (signal) =>
 *   store.queryInBBox(bbox, signal),
 * );
 * ```
 */
export function withDeadline<T>(
  timeoutMs: number,
  parent: AbortSignal | undefined,
  run: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const { signal } = controller;

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort(new QueryAbortedError(`Timed out after ${timeoutMs} ms`));
    }, timeoutMs);

    const onParentAbort = (): void => {
      if (parent) controller.abort(abortReason(parent));
    };
    const onAbort = (): void => {
      cleanup();
      reject(abortReason(signal));
    };
    const cleanup = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
      parent?.removeEventListener('abort', onParentAbort);
    };

    signal.addEventListener('abort', onAbort, { once: true });
    if (parent?.aborted) {
      onParentAbort();
      return;
    }
    parent?.addEventListener('abort', onParentAbort, { once: true });

    // Settling an already rejected promise is a no-op, so a late result
    // after the deadline goes nowhere.
    void run(signal).then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(toError(err));
      },
    );
  });
}
