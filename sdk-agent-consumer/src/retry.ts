export interface RetryOptions {
  /** Retries after the first attempt. */
  maxRetries: number;
  backoffMs: number;
  isRetryable: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
  signal?: AbortSignal;
}

/** Waits `ms`, or rejects with the abort reason as soon as `signal` fires. */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export async function callWithRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (!options.isRetryable(error) || attempt === options.maxRetries || options.signal?.aborted) {
        throw error;
      }

      options.onRetry?.(error, attempt + 1);
      const backoffMs = options.backoffMs * Math.pow(2, attempt);
      if (backoffMs > 0) {
        await sleep(backoffMs, options.signal);
      }
    }
  }

  throw lastError;
}
