export type Limiter = <R>(fn: () => Promise<R>) => Promise<R>;

/**
 * Run async functions with limited concurrency.
 * Uses a simple semaphore approach: at most `concurrency` functions run at
 * the same time, the rest wait in FIFO order.
 */
export function createLimiter(concurrency: number): Limiter {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  let active = 0;
  const waiting: (() => void)[] = [];

  function release(): void {
    const next = waiting.shift();
    if (next) {
      next();
    } else {
      active--;
    }
  }

  return async function limit<R>(fn: () => Promise<R>): Promise<R> {
    if (active < concurrency) {
      active++;
    } else {
      // The releasing caller hands its slot straight to us.
      await new Promise<void>((resolve) => waiting.push(resolve));
    }
    try {
      return await fn();
    } finally {
      release();
    }
  };
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts.
 * Aborting abandons only this wait; `promise` keeps running for anyone else.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(signal.reason);

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}
