import type { Logger } from 'pino';
import { errorCodeOf, errorMessage, StoreError } from './errors';

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
}

export const DEFAULT_STORE_RETRY: RetryPolicy = { attempts: 3, baseDelayMs: 200, maxDelayMs: 60000 };

// SQLSTATE codes worth another attempt; class 08 is matched by prefix
const TRANSIENT_SQLSTATES = new Set(['40001', '40P01', '57P01', '57P02', '57P03', '53300']);
const TRANSIENT_SOCKET_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE']);

export function isTransientStoreError(error: unknown): boolean {
  if (error instanceof StoreError) return error.transient;
  const code = errorCodeOf(error);
  if (!code) return false;
  return code.startsWith('08') || TRANSIENT_SQLSTATES.has(code) || TRANSIENT_SOCKET_CODES.has(code);
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * Math.pow(1.5, attempt), policy.maxDelayMs ?? 60000);
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Runs `fn` until it succeeds, throws a non-retryable error, or the policy
 * runs out of attempts. The last error is rethrown.
 */
export async function withRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  policy: RetryPolicy,
  log: Logger,
  isRetryable: (error: unknown) => boolean = isTransientStoreError
): Promise<T> {
  let attempt = 0;
  for (;;) {
    try {
      return await fn();
    } catch (error) {
      attempt++;
      if (attempt >= policy.attempts || !isRetryable(error)) throw error;
      const delay = backoffDelay(policy, attempt);
      log.warn({ operation, attempt, delay, err: errorMessage(error) }, 'transient store failure, retrying');
      await sleep(delay);
    }
  }
}
