export interface RetryOptions {
  maxAttempts: number;
  initialDelay: number;
  maxDelay: number;
  factor: number;
}

/** Connection retries wait a fixed interval between attempts. */
export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelay: 3000,
  maxDelay: 3000,
  factor: 1,
};

/**
 * Resolves after `ms`, or early with `false` when `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
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

export interface RetryControl<T> {
  /** Whether `result` of attempt `attempt` (1-based) should be retried. */
  shouldRetry: (result: T, attempt: number) => boolean;
  onRetry?: (result: T, attempt: number, delay: number) => void;
  signal?: AbortSignal;
}

/**
 * Re-runs `fn` while `shouldRetry` accepts its result. Results are values,
 * not exceptions: the last result is returned once attempts run out, the
 * predicate declines, or the signal aborts during a delay.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  control: RetryControl<T>,
  options: RetryOptions = DEFAULT_RETRY_OPTIONS
): Promise<T> {
  let delay = options.initialDelay;
  let attempt = 1;

  for (;;) {
    const result = await fn(attempt);

    if (attempt >= options.maxAttempts || !control.shouldRetry(result, attempt)) {
      return result;
    }

    control.onRetry?.(result, attempt, delay);
    const waited = await sleep(delay, control.signal);
    if (!waited) {
      return result;
    }

    delay = Math.min(delay * options.factor, options.maxDelay);
    attempt++;
  }
}
