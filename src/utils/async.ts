/**
 * @fileoverview Async Utilities
 *
 * Shared async helpers: abortable delays and a FIFO mutex.
 *
 * @packageDocumentation
 */

/**
 * Error used to reject abortable waits.
 */
export class AbortedError extends Error {
  constructor(message = 'Aborted') {
    super(message);
    this.name = 'AbortedError';
  }
}

/**
 * Sleep for `ms`. Rejects with AbortedError as soon as `signal` aborts.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new AbortedError());
  }
  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new AbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * FIFO mutual exclusion for async critical sections.
 *
 * @example
 * ```typescript
 * const lock = new Mutex();
 * await lock.runExclusive(async () => mutateBuffer());
 * ```
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get isLocked(): boolean {
    return this.pending > 0;
  }

  runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    this.pending++;
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => this.release(),
      () => this.release(),
    );
    return run;
  }

  private release(): void {
    this.pending--;
  }
}
