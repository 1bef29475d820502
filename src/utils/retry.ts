/**
 * Retry and Timeout Helpers
 *
 * Every external call (embedding API, live search, model completion) goes
 * through these so it has a bounded wait and a bounded number of attempts.
 */

// ============================================================================
// TIMEOUT
// ============================================================================

/**
 * Error raised when a call does not settle in time.
 */
export class TimeoutError extends Error {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Race a call against a timer; the timer is cleared once either side settles.
 */
export async function withTimeout<T>(
  operation: () => Promise<T>,
  timeoutMs: number,
  label = 'Operation'
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([operation(), timeoutPromise]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
  }
}

// ============================================================================
// RETRY
// ============================================================================

export interface RetryOptions {
  /** Total attempts including the first (>= 1) */
  maxAttempts: number;
  /** Delay before the second attempt; doubles after each failure */
  baseDelayMs: number;
  /** Upper bound for a single delay */
  maxDelayMs?: number;
  /** Return false to stop retrying on errors that won't go away */
  shouldRetry?: (error: Error, attempt: number) => boolean;
  /** Called before each wait */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_MAX_DELAY_MS = 30000;

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before attempt `attempt + 1`: base * 2^(attempt - 1), capped.
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs = DEFAULT_MAX_DELAY_MS): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

/**
 * Failure after the last attempt; keeps every attempt's error.
 */
export class RetryExhaustedError extends Error {
  constructor(public readonly errors: Error[]) {
    const last = errors[errors.length - 1];
    super(`Failed after ${errors.length} attempt(s): ${last?.message ?? 'unknown error'}`);
    this.name = 'RetryExhaustedError';
  }

  get lastError(): Error | undefined {
    return this.errors[this.errors.length - 1];
  }
}

/**
 * Run `operation` until it succeeds or the attempt cap is reached.
 *
 * @throws RetryExhaustedError when every attempt failed, or when
 *   shouldRetry() rejected an error early
 *
 * @example
 * ```typescript
 * const text = await retryWithBackoff(
 *   () => withTimeout(() => provider.complete(request), 60000, 'Model call'),
 *   { maxAttempts: 3, baseDelayMs: 1000 }
 * );
 * ```
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
  const sleep = options.sleep ?? defaultSleep;
  const errors: Error[] = [];

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      errors.push(err);

      const retryable = options.shouldRetry?.(err, attempt) ?? true;
      if (!retryable || attempt === maxAttempts) {
        break;
      }

      const delay = backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs);
      options.onRetry?.(err, attempt, delay);
      await sleep(delay);
    }
  }

  throw new RetryExhaustedError(errors);
}
