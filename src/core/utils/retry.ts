/**
 * Reusable retry logic utility
 */

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  backoffMultiplier?: number;
  jitterMs?: number;
  retryCondition?: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

export class RetryError extends Error {
  constructor(
    message: string,
    public originalError: Error,
    public attempt: number,
  ) {
    super(message);
    this.name = "RetryError";
  }
}

const toError = (e: unknown): Error =>
  e instanceof Error ? e : new Error(String(e));

/**
 * Executes an operation with retry logic
 * @param operation - The operation to retry
 * @param options - Retry configuration
 * @returns Promise that resolves with the operation result
 * @throws RetryError if all retries are exhausted
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const {
    maxRetries,
    baseDelayMs,
    backoffMultiplier = 2,
    jitterMs = 250,
    retryCondition = () => true,
    onRetry,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (e) {
      const error = toError(e);

      if (!retryCondition(error)) {
        throw error;
      }

      if (attempt >= maxRetries) {
        throw new RetryError(
          `Operation failed after ${attempt + 1} attempts: ${error.message}`,
          error,
          attempt + 1,
        );
      }

      const jitter = jitterMs > 0 ? Math.floor(Math.random() * jitterMs) : 0;
      const delay = baseDelayMs * Math.pow(backoffMultiplier, attempt) + jitter;
      onRetry?.(error, attempt + 1, delay);
      await sleep(delay);
    }
  }
}

/**
 * Default retry options for catalog HTTP requests
 */
export const HTTP_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 800,
  backoffMultiplier: 2,
  jitterMs: 250,
  retryCondition: (error) => {
    // Retry on network errors, timeouts, throttling and 5xx errors
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("aborted") ||
      message.includes("network") ||
      message.includes("fetch failed") ||
      message.includes("http 429") ||
      message.includes("http 5")
    );
  },
};

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));
