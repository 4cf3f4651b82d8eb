import { createLogger } from '../logger';
import { ConnectionError } from '../types/errors';

const log = createLogger('objects:retry');

export async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Exponential backoff with jitter.
 *
 * @param attempt - Zero-based attempt that just failed
 * @param base - Base delay in milliseconds
 * @param cap - Upper bound in milliseconds
 * @returns Delay before the next attempt
 */
export function expBackoff(attempt: number, base = 300, cap = 5000): number {
  const jitter = Math.random() * base;
  return Math.min(cap, base * 2 ** attempt + jitter);
}

export interface RetryOptions {
  /** Retries after the first attempt */
  retries: number;
  /** Base delay for {@link expBackoff} (default: 300) */
  baseDelayMs?: number;
  /** Stops retrying once aborted */
  signal?: AbortSignal;
}

/**
 * Connection failures, timeouts and 5xx responses may succeed on a second try.
 * Auth failures and client errors will not.
 */
export function isTransientError(error: unknown): boolean {
  return error instanceof ConnectionError;
}

/**
 * Run an idempotent request, retrying transient failures.
 *
 * Only for reads, existence lookups and deletes. Writes are never retried.
 *
 * @param action - Name used in log lines (e.g., 'list_page')
 * @param fn - Request to run
 * @param options - Retry count, delay and abort signal
 * @returns Result of the first successful attempt
 * @throws The last error once retries are exhausted, or any non-transient error
 */
export async function withRetry<T>(
  action: string,
  fn: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  let attempt = 0;
  for (;;) {
    try {
      return await fn();
    } catch (error) {
      if (!isTransientError(error) || attempt >= options.retries || options.signal?.aborted) {
        throw error;
      }
      const delay = expBackoff(attempt, options.baseDelayMs);
      attempt++;
      log.warn(
        {
          'event.action': action,
          'retry.attempt': attempt,
          'retry.delay_ms': Math.round(delay),
          'error.message': error instanceof Error ? error.message : String(error),
        },
        `${action} failed, retrying in ${String(Math.round(delay))}ms (attempt ${String(attempt)}/${String(options.retries)})`,
      );
      await sleep(delay);
    }
  }
}
