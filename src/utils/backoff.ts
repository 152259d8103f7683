/**
 * Backoff helpers for the panel HTTP client.
 */

import type { RetryPolicy } from '../types/HttpTypes';

/**
 * Delay before retrying after failed attempt `attempt` (1-based):
 * base * multiplier^(attempt-1), shifted by uniform jitter in [-jitterMs, +jitterMs],
 * clamped to [0, maxDelayMs].
 *
 * @param random - returns a value in [0, 1)
 */
export function computeBackoffDelay(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random
): number {
  const exponential = policy.baseDelayMs * Math.pow(policy.multiplier, attempt - 1);
  const jitter = policy.jitterMs > 0 ? (random() * 2 - 1) * policy.jitterMs : 0;
  const delay = Math.round(exponential + jitter);
  return Math.min(policy.maxDelayMs, Math.max(0, delay));
}

export class SleepAbortedError extends Error {
  constructor() {
    super('Sleep aborted');
    this.name = 'SleepAbortedError';
  }
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * setTimeout-based sleep that rejects with SleepAbortedError when `signal` aborts.
 */
export const abortableSleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new SleepAbortedError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new SleepAbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
