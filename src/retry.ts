import { log } from "./logger.js";

export interface RetryOptions {
  attempts: number;
  initialBackoffMs: number;
  /** Label used in debug output. */
  operation: string;
}

const DEFAULT_RETRY: RetryOptions = {
  attempts: 3,
  initialBackoffMs: 500,
  operation: "call",
};

/**
 * Run `fn` up to `attempts` times with exponential backoff. Errors for which
 * `isRetryable` returns false are rethrown immediately.
 */
export async function callWithRetry<T>(
  fn: () => Promise<T>,
  isRetryable: (error: unknown) => boolean,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const { attempts, initialBackoffMs, operation } = { ...DEFAULT_RETRY, ...options };
  let lastError: unknown;

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (!isRetryable(error)) throw error;
      if (attempt < attempts - 1) {
        const backoffMs = initialBackoffMs * Math.pow(2, attempt);
        log.debug(`${operation}: attempt ${attempt + 1}/${attempts} failed, retrying in ${backoffMs}ms`);
        await new Promise((resolve) => setTimeout(resolve, backoffMs));
      }
    }
  }

  throw lastError;
}

/** Reject with `onTimeout()` if `promise` has not settled within `timeoutMs`. */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
