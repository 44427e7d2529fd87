interface RetryInput<T> {
  run: (attempt: number) => Promise<T>;
  maxRetries: number;
  baseDelayMs: number;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
}

export class RetryExhaustedError extends Error {
  public readonly attempts: number;
  public readonly lastError: unknown;

  public constructor(attempts: number, lastError: unknown) {
    const detail =
      lastError instanceof Error ? lastError.message : String(lastError);
    super(detail);
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelayMs(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * Math.pow(2, attempt);
}

/**
 * Runs `run` up to `maxRetries + 1` times. The final failure is wrapped in
 * RetryExhaustedError so callers know how many attempts were made.
 */
export async function retryWithBackoff<T>(input: RetryInput<T>): Promise<T> {
  let attempt = 0;

  for (;;) {
    try {
      return await input.run(attempt);
    } catch (error) {
      const exhausted = attempt >= input.maxRetries;
      if (exhausted || input.signal?.aborted) {
        throw new RetryExhaustedError(attempt + 1, error);
      }

      const delayMs = backoffDelayMs(input.baseDelayMs, attempt);
      input.onRetry?.(error, attempt + 1, delayMs);
      await sleep(delayMs);
      attempt += 1;
    }
  }
}
