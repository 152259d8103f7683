/**
 * Transport-level request/response and retry policy types.
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface PanelHttpRequest {
  method: HttpMethod;
  /** Path relative to the panel base URL, e.g. `/api/user/user_42_1700000000` */
  path: string;
  body?: unknown;
  params?: Record<string, string | number>;
}

export interface PanelHttpResponse {
  status: number;
  data: unknown;
  requestId: string;
}

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly multiplier: number;
  /** Delay is shifted by a uniform random amount in [-jitterMs, +jitterMs] */
  readonly jitterMs: number;
  readonly maxDelayMs: number;
  readonly retryableStatuses: readonly number[];
  readonly retryableErrorCodes: readonly string[];
}

export const DEFAULT_RETRYABLE_STATUSES: readonly number[] = [408, 429, 500, 502, 503, 504];

export const DEFAULT_RETRYABLE_ERROR_CODES: readonly string[] = [
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNABORTED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ECONNREFUSED',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENETDOWN',
  'ERR_NETWORK',
];

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 3,
  baseDelayMs: 1000,
  multiplier: 1.5,
  jitterMs: 250,
  maxDelayMs: 10000,
  retryableStatuses: DEFAULT_RETRYABLE_STATUSES,
  retryableErrorCodes: DEFAULT_RETRYABLE_ERROR_CODES,
});

/**
 * Credential used to sign outbound panel requests.
 * Replaced as a whole on refresh; never mutated.
 */
export interface Credential {
  readonly token: string;
  readonly issuedAt: number;
  readonly expiresAt?: number;
}

export interface CredentialProvider {
  getCredential(): Promise<Credential>;
  forceRefresh(): Promise<Credential>;
}

export interface ExecuteOptions {
  /** Bounds the entire call, retries and backoff included */
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
}
