/**
 * Resilient HTTP Client
 *
 * Single choke point for calls to the panel: circuit breaker, credential
 * injection, one refresh-and-retry on 401, bounded retries with exponential
 * backoff, and an overall deadline. No panel call bypasses this client.
 *
 * Error semantics:
 * - Retryable (any request that got no response, per-attempt timeout, 5xx,
 *   policy statuses): retried, then recorded once as a breaker failure and thrown.
 * - Non-retryable transport failure: recorded as a breaker failure and thrown.
 * - Non-retryable 4xx: HttpStatusError thrown at once, breaker untouched.
 * - 401 after a refresh: AuthenticationError, breaker untouched.
 * - Deadline exceeded: TimeoutError (DEADLINE_EXCEEDED), recorded as a failure.
 */

import { AxiosError, AxiosInstance } from 'axios';
import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../core/Logger';
import type { CircuitBreakerService } from './CircuitBreakerService';
import type { CircuitState } from '../../types/CircuitBreakerTypes';
import type {
  Credential,
  CredentialProvider,
  ExecuteOptions,
  PanelHttpRequest,
  PanelHttpResponse,
  RetryPolicy,
} from '../../types/HttpTypes';
import {
  AuthenticationError,
  CircuitOpenError,
  HttpStatusError,
  PanelError,
  TimeoutError,
  TransientNetworkError,
} from '../../types/PanelErrors';
import { abortableSleep, computeBackoffDelay, SleepAbortedError, SleepFn } from '../../utils/backoff';

export interface ResilientHttpClientConfig {
  /** Per-attempt socket timeout */
  requestTimeoutMs: number;
  /** Default bound for a whole execute() call */
  callTimeoutMs: number;
  retryPolicy: RetryPolicy;
}

export interface ResilientHttpClientDeps {
  http: AxiosInstance;
  credentials: CredentialProvider;
  circuitBreaker: CircuitBreakerService;
  logger: Logger;
  sleep?: SleepFn;
  random?: () => number;
}

const TIMEOUT_ERROR_CODES = ['ECONNABORTED', 'ETIMEDOUT'];

export class ResilientHttpClient {
  private readonly http: AxiosInstance;
  private readonly credentials: CredentialProvider;
  private readonly circuitBreaker: CircuitBreakerService;
  private readonly logger: Logger;
  private readonly sleep: SleepFn;
  private readonly random: () => number;

  constructor(
    private readonly config: ResilientHttpClientConfig,
    deps: ResilientHttpClientDeps
  ) {
    this.http = deps.http;
    this.credentials = deps.credentials;
    this.circuitBreaker = deps.circuitBreaker;
    this.logger = deps.logger;
    this.sleep = deps.sleep ?? abortableSleep;
    this.random = deps.random ?? Math.random;
  }

  async execute(request: PanelHttpRequest, options: ExecuteOptions = {}): Promise<PanelHttpResponse> {
    const policy = options.retryPolicy ?? this.config.retryPolicy;
    const timeoutMs = options.timeoutMs ?? this.config.callTimeoutMs;
    const requestId = uuidv4();
    const logMeta = { requestId, method: request.method, path: request.path };

    const permit = this.circuitBreaker.allowRequest();
    if (!permit.allowed) {
      this.logger.warn('Panel call rejected, circuit open', {
        ...logMeta,
        retryAfterSeconds: permit.retryAfterSeconds,
      });
      throw new CircuitOpenError(permit.retryAfterSeconds ?? 1);
    }

    // The HALF_OPEN probe is a single trial request
    const maxAttempts = permit.probe ? 1 : Math.max(1, policy.maxAttempts);
    const deadline = new AbortController();
    const timer = setTimeout(() => deadline.abort(), timeoutMs);
    let verdictRecorded = false;
    let refreshed = false;
    let attempt = 1;

    try {
      for (;;) {
        let failure: PanelError;
        try {
          const credential = await this.withDeadline(this.credentials.getCredential(), deadline.signal);
          const response = await this.dispatch(request, credential, deadline.signal, requestId);

          if (response.status >= 200 && response.status < 300) {
            this.circuitBreaker.recordSuccess(permit);
            verdictRecorded = true;
            if (attempt > 1) {
              this.logger.info('Panel call succeeded after retry', { ...logMeta, attempt });
            }
            return response;
          }

          if (response.status === 401 && !refreshed) {
            refreshed = true;
            this.logger.info('Panel rejected credential, refreshing', logMeta);
            await this.withDeadline(this.credentials.forceRefresh(), deadline.signal);
            continue;
          }

          failure = this.classifyStatus(response, policy);
        } catch (error) {
          failure = this.classifyError(error, deadline.signal, timeoutMs, policy);
        }

        if (!failure.retryable) {
          if (failure instanceof TimeoutError || failure instanceof TransientNetworkError) {
            this.circuitBreaker.recordFailure(permit);
            verdictRecorded = true;
            this.logger.error('Panel call failed', {
              ...logMeta,
              attempt,
              timeoutMs,
              error: failure.message,
              errorCode: failure.error_code,
            });
          }
          throw failure;
        }

        if (attempt >= maxAttempts) {
          this.circuitBreaker.recordFailure(permit);
          verdictRecorded = true;
          this.logger.error('Panel call failed after retries', {
            ...logMeta,
            attempts: attempt,
            error: failure.message,
            errorCode: failure.error_code,
          });
          throw failure;
        }

        const delayMs = computeBackoffDelay(policy, attempt, this.random);
        this.logger.warn('Panel call retry', {
          ...logMeta,
          attempt,
          maxAttempts,
          delayMs,
          error: failure.message,
        });

        try {
          await this.sleep(delayMs, deadline.signal);
        } catch (error) {
          if (error instanceof SleepAbortedError) {
            this.circuitBreaker.recordFailure(permit);
            verdictRecorded = true;
            this.logger.error('Panel call deadline exceeded during backoff', { ...logMeta, attempt, timeoutMs });
            throw this.deadlineError(timeoutMs);
          }
          throw error;
        }
        attempt++;
      }
    } finally {
      clearTimeout(timer);
      if (permit.probe && !verdictRecorded) {
        this.circuitBreaker.releaseProbe(permit);
      }
    }
  }

  getHealth(): { circuitState: CircuitState; failureCount: number } {
    const state = this.circuitBreaker.getState();
    return { circuitState: state.state, failureCount: state.failure_count };
  }

  private async dispatch(
    request: PanelHttpRequest,
    credential: Credential,
    signal: AbortSignal,
    requestId: string
  ): Promise<PanelHttpResponse> {
    // The token is captured here, at dispatch; a concurrent refresh cannot swap it mid-request
    const response = await this.http.request({
      method: request.method,
      url: request.path,
      data: request.body,
      params: request.params,
      headers: {
        Authorization: `Bearer ${credential.token}`,
        'X-Request-Id': requestId,
      },
      timeout: this.config.requestTimeoutMs,
      signal,
    });
    return { status: response.status, data: response.data, requestId };
  }

  private classifyStatus(response: PanelHttpResponse, policy: RetryPolicy): PanelError {
    const { status } = response;
    if (status === 401) {
      return new AuthenticationError('Panel rejected a freshly refreshed credential', 'CREDENTIAL_REJECTED');
    }
    if (status >= 500 || policy.retryableStatuses.includes(status)) {
      return new TransientNetworkError(`Panel responded with HTTP ${status}`, status, `HTTP_${status}`);
    }
    return new HttpStatusError(status, response.data);
  }

  private classifyError(
    error: unknown,
    deadline: AbortSignal,
    timeoutMs: number,
    policy: RetryPolicy
  ): PanelError {
    if (deadline.aborted) {
      return this.deadlineError(timeoutMs);
    }
    if (error instanceof PanelError) {
      return error;
    }
    if (error instanceof AxiosError) {
      const code = error.code ?? 'UNKNOWN';
      // Sent but unanswered: the panel is unreachable, whatever the socket code
      const unanswered = error.request !== undefined && error.response === undefined;
      const retryable = unanswered || policy.retryableErrorCodes.includes(code);
      if (TIMEOUT_ERROR_CODES.includes(code)) {
        return new TimeoutError(`Panel attempt timed out after ${this.config.requestTimeoutMs}ms`, retryable);
      }
      return new TransientNetworkError(`Panel request failed: ${error.message}`, undefined, code, retryable);
    }
    throw error;
  }

  private deadlineError(timeoutMs: number): TimeoutError {
    return new TimeoutError(`Panel call exceeded its ${timeoutMs}ms deadline`, false);
  }

  /**
   * Bound a non-cancellable step (credential fetch) by the call deadline.
   */
  private withDeadline<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const onAbort = () => reject(new TimeoutError('Panel call deadline exceeded', false));
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
      promise.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }
}
