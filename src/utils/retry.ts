/**
 * Retry with exponential backoff, used while waiting for the model server to come up
 */

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  timeoutMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 4,
  initialDelayMs: 1000,
  maxDelayMs: 8000,
  multiplier: 2,
  timeoutMs: 30000,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  delay: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

/**
 * Executes a function with exponential backoff retry logic
 * @param fn - Async function to execute
 * @param config - Retry configuration
 * @param onLog - Optional callback for retry logging
 * @param shouldRetry - Return false to give up immediately and rethrow the error as-is
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  onLog?: (log: RetryLog) => void,
  shouldRetry: (error: unknown) => boolean = () => true
): Promise<T> {
  let lastError: unknown = null;
  let lastDelay = config.initialDelayMs;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    let timer: NodeJS.Timeout | undefined;
    try {
      const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(
          () => reject(new Error(`Timeout after ${config.timeoutMs}ms`)),
          config.timeoutMs
        );
      });

      // Race between the function and timeout
      const result = await Promise.race([fn(), timeoutPromise]);

      if (onLog) {
        onLog({
          timestamp: new Date(),
          attempt,
          delay: 0,
          success: true,
        });
      }

      return result;
    } catch (error) {
      lastError = error;
      const retryable = shouldRetry(error);

      if (onLog) {
        onLog({
          timestamp: new Date(),
          attempt,
          delay: lastDelay,
          success: false,
          error: error instanceof Error ? error.message : String(error),
          nextRetryInMs: retryable && attempt < config.maxAttempts ? lastDelay : undefined,
        });
      }

      if (!retryable) {
        throw error;
      }

      // If this was the last attempt, throw
      if (attempt === config.maxAttempts) {
        break;
      }

      await sleep(lastDelay);

      // Calculate next delay (exponential backoff)
      lastDelay = Math.min(lastDelay * config.multiplier, config.maxDelayMs);
    } finally {
      clearTimeout(timer);
    }
  }

  const lastMessage = lastError instanceof Error ? lastError.message : String(lastError);
  throw new Error(`Failed after ${config.maxAttempts} attempts. Last error: ${lastMessage}`, {
    cause: lastError,
  });
}

/**
 * Sleep utility function
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
