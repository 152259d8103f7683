/**
 * Common types shared across the integration core.
 */

export interface TraceContext {
  traceId: string;
  userId?: string;
  operation?: string;
}

/**
 * Time source in epoch milliseconds. Injected so breaker, cache and token
 * expiry can be driven deterministically in tests.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export const MS_PER_SECOND = 1000;
export const SECONDS_PER_DAY = 86400;
