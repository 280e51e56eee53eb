// pattern: Imperative Shell

/**
 * Retry with exponential backoff for completion-service calls.
 * The adapter decides which errors are worth another attempt.
 */

export type RetryOptions = {
  maxRetries?: number;
  initialBackoffMs?: number;
  onError?: (error: unknown, attempt: number) => void;
};

const MAX_RETRIES = 3;
const INITIAL_BACKOFF_MS = 1000;

export async function callWithRetry<T>(
  fn: () => Promise<T>,
  isRetryableError: (error: unknown) => boolean,
  options: RetryOptions = {}
): Promise<T> {
  const maxRetries = options.maxRetries ?? MAX_RETRIES;
  const initialBackoffMs = options.initialBackoffMs ?? INITIAL_BACKOFF_MS;
  let lastError: unknown;

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (options.onError) {
        options.onError(error, attempt);
      }

      if (!isRetryableError(error)) {
        throw error;
      }

      if (attempt < maxRetries - 1) {
        const backoffMs = initialBackoffMs * Math.pow(2, attempt);
        await new Promise((resolve) => setTimeout(resolve, backoffMs));
      }
    }
  }

  throw lastError;
}
