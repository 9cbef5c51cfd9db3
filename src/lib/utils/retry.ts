/**
 * Retry utility with exponential backoff
 */

export interface RetryOptions {
  /** Extra attempts after the first one */
  retries: number;
  baseDelay: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, delay: number, error: unknown) => void;
}

export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(0, options.retries) + 1;
  let lastError: unknown = new Error('Max retries exceeded');

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (options.shouldRetry && !options.shouldRetry(error)) {
        throw error;
      }

      if (attempt < attempts - 1) {
        const delay = options.baseDelay * Math.pow(2, attempt);
        options.onRetry?.(attempt + 1, delay, error);
        await sleep(delay);
      }
    }
  }

  throw lastError;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
