export interface BackoffOptions {
  initialDelay: number;
  maxDelay: number;
  factor: number;
}

export function nextDelay(delay: number, options: BackoffOptions): number {
  return Math.min(delay * options.factor, options.maxDelay);
}

/**
 * Waits `ms` milliseconds. Resolves `false` instead if the signal aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
