export type BackoffOptions = {
  initialDelayMs?: number;
  maxDelayMs?: number;
};

/** Delay before retry `attempt` (1-based): initial, doubled each attempt, capped. */
export function backoffDelayMs(attempt: number, options: BackoffOptions = {}): number {
  const initial = options.initialDelayMs ?? 1_000;
  const max = options.maxDelayMs ?? 60_000;
  const exponent = Math.max(0, attempt - 1);
  // 2^6 already exceeds the default cap; avoid overflowing on large attempts.
  return Math.min(max, initial * 2 ** Math.min(exponent, 30));
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts. Never rejects; the
 * return value tells whether the full delay elapsed.
 */
export function sleepUnlessAborted(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);

  return new Promise((resolve) => {
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
