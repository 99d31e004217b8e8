import { logger } from '../core/logger';

export interface RetryPolicy {
  // Retries after the first attempt
  readonly retries: number;
  readonly baseDelayMs: number;
  readonly jitterMs?: number;
}

// Sleep utility
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

// Exponential backoff with jitter
export function getDelayWithJitter(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const baseDelay = policy.baseDelayMs * Math.pow(2, attempt - 1);
  const jitter = random() * (policy.jitterMs ?? 0);
  return Math.floor(baseDelay + jitter);
}

/**
 * Run `operation`, retrying while `shouldRetry` accepts the error.
 * The last error is rethrown unchanged once the retries are spent.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  shouldRetry: (error: unknown) => boolean,
  operationName: string,
  context: Record<string, unknown> = {}
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt > policy.retries || !shouldRetry(error)) {
        throw error;
      }

      const delay = getDelayWithJitter(policy, attempt);
      logger.warn({
        ...context,
        operationName,
        attempt,
        delay,
        error: error instanceof Error ? error.message : String(error),
      }, `${operationName} attempt failed, retrying`);

      if (delay > 0) {
        await sleep(delay);
      }
    }
  }
}
