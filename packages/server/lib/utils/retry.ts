import { logger } from '../logger.js';
import { ProviderError, toError } from '../errors.js';

/**
 * Retry policy applied at an outbound call site
 */
export interface RetryPolicy {
  /** Total attempts including the first call */
  maxAttempts: number;
  /** Delay before the second attempt, in milliseconds */
  baseDelayMs: number;
  /** Multiplier for exponential backoff */
  backoffMultiplier: number;
  /** Upper bound for any single delay */
  maxDelayMs: number;
  /** Amount of jitter to add (0-1); 0 keeps the schedule exact */
  jitterFactor: number;
  /** Whether an error should trigger another attempt */
  shouldRetry: (error: Error, attempt: number) => boolean;
  /** Label used in log lines */
  context: string;
}

/**
 * Provider errors flagged transient (network, 429, 5xx) are retried;
 * validation, configuration and 4xx failures are not.
 */
export function isTransientProviderError(error: Error): boolean {
  return error instanceof ProviderError && error.transient;
}

/**
 * Policy for job submission: 3 attempts, waiting 1s then 2s, no jitter.
 * The 4s cap bounds the schedule if maxAttempts is raised.
 */
export const SUBMISSION_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  maxAttempts: 3,
  baseDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 4000,
  jitterFactor: 0,
  shouldRetry: isTransientProviderError,
  context: 'transcription job submission'
});

/**
 * Executes a function under a retry policy
 *
 * @param fn Function to execute
 * @param policy Retry policy for this call site
 * @param sleep Delay implementation, replaceable in tests
 * @returns The function result
 * @throws The last error once attempts are exhausted or the error is not retryable
 *
 * @example
 * ```typescript
 * const handle = await withRetry(
 *   () => client.submit(mediaUrl, metadata, { callbackUrl }),
 *   SUBMISSION_RETRY_POLICY
 * );
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy,
  sleep: (ms: number) => Promise<void> = defaultSleep
): Promise<T> {
  let lastError: Error = new Error(`${policy.context} was not attempted`);

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      const result = await fn();

      if (attempt > 1) {
        logger.info('system', `${policy.context} succeeded after retry`, {
          metadata: { attempt, maxAttempts: policy.maxAttempts }
        });
      }

      return result;
    } catch (error) {
      lastError = toError(error);

      const isLastAttempt = attempt === policy.maxAttempts;
      const shouldRetry = policy.shouldRetry(lastError, attempt);

      logger.warn('system', `${policy.context} attempt failed`, {
        error: lastError.message,
        metadata: {
          attempt,
          maxAttempts: policy.maxAttempts,
          willRetry: shouldRetry && !isLastAttempt
        }
      });

      if (isLastAttempt || !shouldRetry) {
        throw lastError;
      }

      await sleep(calculateDelay(attempt, policy));
    }
  }

  throw lastError;
}

/**
 * Delay before the attempt following `attempt`:
 * baseDelay * multiplier^(attempt-1), capped, with optional jitter
 */
export function calculateDelay(attempt: number, policy: RetryPolicy): number {
  const exponentialDelay = policy.baseDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, policy.maxDelayMs);

  const jitterRange = cappedDelay * policy.jitterFactor;
  const jitter = (Math.random() - 0.5) * 2 * jitterRange;

  return Math.round(Math.max(0, cappedDelay + jitter));
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
