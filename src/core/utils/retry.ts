/**
 * Reusable retry logic utility
 */

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  backoffMultiplier?: number;
  jitterMs?: number;
  maxDelayMs?: number;
  retryCondition?: (error: Error) => boolean;
  /** Extra wait the failed attempt asks for, e.g. from a 429 */
  delayHint?: (error: Error) => number | undefined;
  signal?: AbortSignal;
}

export class RetryError extends Error {
  constructor(
    message: string,
    public originalError: Error,
    public attempt: number,
  ) {
    super(message, { cause: originalError });
    this.name = "RetryError";
  }
}

const toError = (e: unknown): Error =>
  e instanceof Error ? e : new Error(String(e));

/**
 * Executes an operation with retry logic
 * @param operation - The operation to retry, given the 0-based attempt
 * @param options - Retry configuration
 * @throws RetryError if all retries are exhausted
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const {
    maxRetries,
    baseDelayMs,
    backoffMultiplier = 2,
    jitterMs = 250,
    maxDelayMs = Number.POSITIVE_INFINITY,
    retryCondition = () => true,
    delayHint,
    signal,
  } = options;

  for (let attempt = 0; ; attempt++) {
    signal?.throwIfAborted();
    try {
      return await operation(attempt);
    } catch (e) {
      const lastError = toError(e);

      if (signal?.aborted || !retryCondition(lastError)) {
        throw lastError;
      }

      if (attempt >= maxRetries) {
        throw new RetryError(
          `Operation failed after ${attempt + 1} attempts: ${lastError.message}`,
          lastError,
          attempt + 1,
        );
      }

      const jitter = jitterMs > 0 ? Math.floor(Math.random() * jitterMs) : 0;
      const backoff = Math.min(
        baseDelayMs * Math.pow(backoffMultiplier, attempt) + jitter,
        maxDelayMs,
      );
      await sleep(Math.max(backoff, delayHint?.(lastError) ?? 0), signal);
    }
  }
}

/** Resolves after `ms`, rejects early with the signal's reason */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) return Promise.resolve();
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
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
