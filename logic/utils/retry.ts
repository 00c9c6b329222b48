import { TransportError } from './errorUtils';

export interface RetryPolicy {
  /** Total attempts per trigger, including the first */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Exponential backoff delay before the next attempt
 * @param attempt - Attempt that just failed (1-based)
 * @param policy - Retry policy
 * @returns Delay in milliseconds: base * 2^(attempt - 1), capped at maxDelayMs
 */
export function computeBackoffDelay(attempt: number, policy: RetryPolicy): number {
  const delay = policy.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Promise-based sleep that rejects when the signal aborts
 */
export const sleep: SleepFn = (ms, signal) => new Promise<void>((resolve, reject) => {
  if (signal?.aborted) {
    reject(new TransportError('Aborted'));
    return;
  }
  const onAbort = () => {
    clearTimeout(timer);
    reject(new TransportError('Aborted'));
  };
  const timer = setTimeout(() => {
    signal?.removeEventListener('abort', onAbort);
    resolve();
  }, ms);
  signal?.addEventListener('abort', onAbort, { once: true });
});
