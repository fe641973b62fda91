import { wrapStoreError } from '../errors.js';
import { createLogger } from '../utils/log.js';

const log = createLogger('Retry');

export interface RetryOptions {
  /** Total attempts including the first one. */
  attempts: number;
  /** Delay before the second attempt; doubles on each further attempt. */
  baseDelayMs: number;
  /** Upper bound for a single backoff delay. */
  maxDelayMs?: number;
}

export const DEFAULT_RETRY: RetryOptions = {
  attempts: 5,
  baseDelayMs: 50,
  maxDelayMs: 1000,
};

export function backoffDelay(attempt: number, options: RetryOptions): number {
  const delay = options.baseDelayMs * 2 ** (attempt - 1);
  return Math.min(delay, options.maxDelayMs ?? Number.POSITIVE_INFINITY);
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Run a store operation, retrying while another process holds the write lock.
 * Anything other than contention is wrapped and rethrown immediately.
 */
export async function withBusyRetry<T>(
  operation: string,
  key: string | undefined,
  options: RetryOptions,
  fn: () => T
): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  for (let attempt = 1; ; attempt++) {
    try {
      return fn();
    } catch (error) {
      const wrapped = wrapStoreError(error, operation, key);
      if (!wrapped.retryable || attempt >= attempts) {
        throw wrapped;
      }
      const delay = backoffDelay(attempt, options);
      log.debug(`${operation} busy, retry ${attempt}/${attempts - 1} in ${delay}ms`);
      await sleep(delay);
    }
  }
}
