/**
 * Exponential backoff for transport reconnects.
 */

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 8000,
  multiplier: 2,
};

export interface RetryAttempt {
  attempt: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

export type ShouldRetry = (error: unknown) => boolean;

/**
 * Runs `fn` until it succeeds or `maxAttempts` is reached, then rethrows the
 * last error unchanged so callers can map it to their own taxonomy.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  onAttempt?: (log: RetryAttempt) => void,
  shouldRetry: ShouldRetry = () => true,
): Promise<T> {
  let lastError: unknown = null;
  let delay = config.initialDelayMs;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      const result = await fn(attempt);
      onAttempt?.({ attempt, success: true });
      return result;
    } catch (error) {
      lastError = error;
      const canRetry = attempt < config.maxAttempts && shouldRetry(error);

      onAttempt?.({
        attempt,
        success: false,
        error: error instanceof Error ? error.message : String(error),
        nextRetryInMs: canRetry ? delay : undefined,
      });

      if (!canRetry) {
        break;
      }

      await sleep(delay);
      delay = Math.min(delay * config.multiplier, config.maxDelayMs);
    }
  }

  throw lastError;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
