/**
 * Cancellation Token with AbortController
 *
 * Coordinates cooperative cancellation of a call's relay tasks. Every
 * suspension point (backend receive, inter-turn pause) takes the token's
 * signal so a draining call unblocks promptly.
 */

export class CancellationToken {
  private readonly abortController = new AbortController();

  /**
   * AbortSignal for abort-aware APIs.
   */
  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  abort(): void {
    this.abortController.abort();
  }

  isCancelled(): boolean {
    return this.abortController.signal.aborted;
  }
}

/**
 * Wait `ms` milliseconds. Resolves early (without throwing) when the signal aborts.
 *
 * @returns false if the wait was cut short by cancellation
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return Promise.resolve(false);
  }
  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Race a promise against a timeout.
 *
 * @returns the promise's value, or `timedOut` if the timeout fires first
 */
export async function withTimeout<T, F>(promise: Promise<T>, ms: number, timedOut: F): Promise<T | F> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<F>((resolve) => {
    timer = setTimeout(() => resolve(timedOut), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
