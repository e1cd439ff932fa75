export class CallTimeoutError extends Error {
  readonly name = 'CallTimeoutError';

  constructor(readonly timeoutMs: number) {
    super(`Call timed out after ${timeoutMs}ms`);
  }
}

/**
 * Runs `call` with an abort signal that fires after `timeoutMs`. The returned promise
 * rejects at the deadline even if the callee ignores the signal.
 */
export const callWithTimeout = async <T>(call: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> => {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new CallTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([call(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
};

export interface RetryPolicy {
  /** Extra attempts after the first one. */
  retries: number;
  backoffMs: number;
  onRetry?: (error: unknown, attempt: number) => void;
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/** Retries with exponential backoff: backoffMs, 2 * backoffMs, ... */
export const retryWithBackoff = async <T>(call: () => Promise<T>, policy: RetryPolicy): Promise<T> => {
  let attempt = 0;

  for (;;) {
    try {
      return await call();
    } catch (error) {
      if (attempt >= policy.retries) {
        throw error;
      }

      attempt += 1;
      policy.onRetry?.(error, attempt);

      if (policy.backoffMs > 0) {
        await sleep(policy.backoffMs * 2 ** (attempt - 1));
      }
    }
  }
};
