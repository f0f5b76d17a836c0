/**
 * Bounded, cancellable waits on collaborator calls.
 */

import { CancelledError, NetworkError } from './errors.js';

export interface DeadlineOptions {
  timeoutMs: number;
  /** Caller's cancellation signal */
  signal?: AbortSignal;
  /** Used in error messages, e.g. "Stream resolution for t1" */
  label: string;
}

/**
 * Run `task` with its own abort signal, rejecting with a timed-out
 * NetworkError after `timeoutMs` or a CancelledError when the caller's signal
 * aborts. The task is aborted in both cases; its late result is ignored.
 */
export function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  { timeoutMs, signal, label }: DeadlineOptions,
): Promise<T> {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError(`${label} cancelled`));
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined;

    const settle = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };

    const onAbort = (): void => {
      settle();
      controller.abort();
      reject(new CancelledError(`${label} cancelled`));
    };

    timer = setTimeout(() => {
      settle();
      controller.abort();
      reject(new NetworkError(`${label} timed out after ${timeoutMs} ms`, true));
    }, timeoutMs);
    signal?.addEventListener('abort', onAbort, { once: true });

    task(controller.signal).then(
      (value) => {
        settle();
        resolve(value);
      },
      (error: unknown) => {
        settle();
        reject(error);
      },
    );
  });
}

/**
 * Resolve after `ms`, or reject with CancelledError if the signal aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError('Wait cancelled'));
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError('Wait cancelled'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
