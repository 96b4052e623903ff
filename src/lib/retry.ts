export interface RetryOptions {
  retries?: number;
  delayMs?: number;
  /** Only errors this accepts are retried; the rest are thrown at once */
  shouldRetry?: (error: unknown) => boolean;
}

/**
 * Run `fn`, retrying up to `retries` more times with a fixed delay.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { retries = 3, delayMs = 500, shouldRetry = () => true } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= retries || !shouldRetry(error)) throw error;
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }
}
