/**
 * ResilientHttpClient Unit Tests
 *
 * Real axios over the pooled transport, upstream intercepted with nock.
 */

import nock from 'nock';
import { ResilientHttpClient } from '../../../../services/connector/ResilientHttpClient';
import { CircuitBreakerService } from '../../../../services/connector/CircuitBreakerService';
import { createPooledTransport, PooledTransport } from '../../../../services/connector/PooledHttpTransport';
import { Logger } from '../../../../services/core/Logger';
import type { CircuitBreakerConfig } from '../../../../types/CircuitBreakerTypes';
import { Credential, CredentialProvider, DEFAULT_RETRY_POLICY, RetryPolicy } from '../../../../types/HttpTypes';
import {
  AuthenticationError,
  CircuitOpenError,
  HttpStatusError,
  TimeoutError,
  TransientNetworkError,
} from '../../../../types/PanelErrors';
import { abortableSleep, SleepFn } from '../../../../utils/backoff';

const BASE_URL = 'http://panel.test';
const USER_PATH = '/api/user/alice';

describe('ResilientHttpClient', () => {
  let transport: PooledTransport;
  let now: number;
  let token: string;
  let credentials: CredentialProvider & {
    getCredential: jest.Mock<Promise<Credential>, []>;
    forceRefresh: jest.Mock<Promise<Credential>, []>;
  };
  let sleep: jest.Mock<Promise<void>, [number, AbortSignal | undefined]>;
  let breaker: CircuitBreakerService;

  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, jitterMs: 0 };

  function buildClient(
    breakerConfig: CircuitBreakerConfig = { failureThreshold: 5, windowSeconds: 60, cooldownSeconds: 10 },
    overrides: { sleep?: SleepFn; callTimeoutMs?: number; requestTimeoutMs?: number } = {}
  ): ResilientHttpClient {
    breaker = new CircuitBreakerService(new Logger('CircuitBreakerTest'), breakerConfig, () => now);
    return new ResilientHttpClient(
      {
        requestTimeoutMs: overrides.requestTimeoutMs ?? 5_000,
        callTimeoutMs: overrides.callTimeoutMs ?? 10_000,
        retryPolicy: policy,
      },
      {
        http: transport.http,
        credentials,
        circuitBreaker: breaker,
        logger: new Logger('ResilientHttpClientTest'),
        sleep: overrides.sleep ?? sleep,
        random: () => 0.5,
      }
    );
  }

  beforeEach(() => {
    transport = createPooledTransport({ baseUrl: `${BASE_URL}/`, maxSockets: 4 });
    now = 1_700_000_000_000;
    token = 'token-1';
    credentials = {
      getCredential: jest.fn<Promise<Credential>, []>(async () => ({ token, issuedAt: now })),
      forceRefresh: jest.fn<Promise<Credential>, []>(async () => {
        token = 'token-2';
        return { token, issuedAt: now };
      }),
    };
    sleep = jest.fn<Promise<void>, [number, AbortSignal | undefined]>(async () => undefined);
  });

  afterEach(() => {
    transport.close();
  });

  describe('success path', () => {
    it('sends the bearer token and a request id, and returns the response', async () => {
      const scope = nock(BASE_URL)
        .get(USER_PATH)
        .matchHeader('authorization', 'Bearer token-1')
        .matchHeader('x-request-id', /^[0-9a-f-]{36}$/)
        .reply(200, { username: 'alice' });
      const client = buildClient();

      const response = await client.execute({ method: 'GET', path: USER_PATH });

      expect(response.status).toBe(200);
      expect(response.data).toEqual({ username: 'alice' });
      expect(response.requestId).toMatch(/^[0-9a-f-]{36}$/);
      expect(scope.isDone()).toBe(true);
    });

    it('sends the JSON body on POST', async () => {
      const scope = nock(BASE_URL).post('/api/user', { username: 'bob' }).reply(200, { ok: true });
      const client = buildClient();

      await client.execute({ method: 'POST', path: '/api/user', body: { username: 'bob' } });

      expect(scope.isDone()).toBe(true);
    });
  });

  describe('retries', () => {
    it('retries a 503 with exponential backoff and succeeds', async () => {
      nock(BASE_URL).get(USER_PATH).reply(503).get(USER_PATH).reply(200, {});
      const client = buildClient();

      const response = await client.execute({ method: 'GET', path: USER_PATH });

      expect(response.status).toBe(200);
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep.mock.calls[0][0]).toBe(1000);
      expect(breaker.getState().failure_count).toBe(0);
    });

    it('throws after maxAttempts and records a single breaker failure', async () => {
      nock(BASE_URL).get(USER_PATH).times(3).reply(500);
      const client = buildClient();

      const error = await client.execute({ method: 'GET', path: USER_PATH }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransientNetworkError);
      expect(error).toMatchObject({ status: 500, error_code: 'HTTP_500' });
      expect(sleep.mock.calls.map((call) => call[0])).toEqual([1000, 1500]);
      expect(breaker.getState().failure_count).toBe(1);
    });

    it('retries network errors listed in the policy', async () => {
      nock(BASE_URL)
        .get(USER_PATH)
        .times(3)
        .replyWithError({ code: 'ECONNRESET', message: 'socket hang up' });
      const client = buildClient();

      const error = await client.execute({ method: 'GET', path: USER_PATH }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransientNetworkError);
      expect(error).toMatchObject({ error_code: 'ECONNRESET', retryable: true });
      expect(sleep).toHaveBeenCalledTimes(2);
    });

    it('retries an unanswered request whatever its socket code and counts it against the breaker', async () => {
      nock(BASE_URL)
        .get(USER_PATH)
        .times(3)
        .replyWithError({ code: 'EHOSTUNREACH', message: 'connect EHOSTUNREACH' });
      const client = buildClient({ failureThreshold: 1, windowSeconds: 60, cooldownSeconds: 10 });

      const error = await client.execute({ method: 'GET', path: USER_PATH }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransientNetworkError);
      expect(error).toMatchObject({ error_code: 'EHOSTUNREACH', retryable: true });
      expect(sleep).toHaveBeenCalledTimes(2);
      expect(client.getHealth()).toEqual({ circuitState: 'OPEN', failureCount: 1 });
    });

    it('retries an unanswered request with a code outside the policy list', async () => {
      nock(BASE_URL)
        .get(USER_PATH)
        .replyWithError({ code: 'EPROTO', message: 'write EPROTO' })
        .get(USER_PATH)
        .reply(200, {});
      const client = buildClient();

      const response = await client.execute({ method: 'GET', path: USER_PATH });

      expect(response.status).toBe(200);
      expect(sleep).toHaveBeenCalledTimes(1);
    });

    it('treats a per-attempt timeout as retryable', async () => {
      nock(BASE_URL).get(USER_PATH).delay(500).reply(200, {});
      const client = buildClient(undefined, { requestTimeoutMs: 20 });

      const error = await client
        .execute({ method: 'GET', path: USER_PATH }, { retryPolicy: { ...policy, maxAttempts: 1 } })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TimeoutError);
      expect(error).toMatchObject({ error_code: 'ATTEMPT_TIMEOUT', retryable: true });
    });

    it('fails a non-retryable 4xx at once without touching the breaker', async () => {
      nock(BASE_URL).get(USER_PATH).reply(404, { detail: 'User not found' });
      const client = buildClient();

      const error = await client.execute({ method: 'GET', path: USER_PATH }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(HttpStatusError);
      expect(error).toMatchObject({ status: 404, responseBody: { detail: 'User not found' } });
      expect(sleep).not.toHaveBeenCalled();
      expect(breaker.getState().failure_count).toBe(0);
    });
  });

  describe('credential refresh', () => {
    it('refreshes once on 401 and retries without consuming an attempt', async () => {
      const scope = nock(BASE_URL)
        .get(USER_PATH)
        .matchHeader('authorization', 'Bearer token-1')
        .reply(401)
        .get(USER_PATH)
        .matchHeader('authorization', 'Bearer token-2')
        .reply(200, { username: 'alice' });
      const client = buildClient();

      const response = await client.execute(
        { method: 'GET', path: USER_PATH },
        { retryPolicy: { ...policy, maxAttempts: 1 } }
      );

      expect(response.status).toBe(200);
      expect(credentials.forceRefresh).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
      expect(scope.isDone()).toBe(true);
    });

    it('raises AuthenticationError on a second 401 without looping', async () => {
      nock(BASE_URL).get(USER_PATH).times(2).reply(401);
      const client = buildClient();

      const error = await client.execute({ method: 'GET', path: USER_PATH }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error).toMatchObject({ error_code: 'CREDENTIAL_REJECTED' });
      expect(credentials.forceRefresh).toHaveBeenCalledTimes(1);
      expect(breaker.getState().failure_count).toBe(0);
    });
  });

  describe('circuit breaker', () => {
    const singleAttempt = { retryPolicy: { ...policy, maxAttempts: 1 } };

    it('opens after the threshold and then fails fast without a network call', async () => {
      nock(BASE_URL).get(USER_PATH).times(2).reply(500);
      const client = buildClient({ failureThreshold: 2, windowSeconds: 60, cooldownSeconds: 30 });

      await expect(client.execute({ method: 'GET', path: USER_PATH }, singleAttempt)).rejects.toBeInstanceOf(
        TransientNetworkError
      );
      await expect(client.execute({ method: 'GET', path: USER_PATH }, singleAttempt)).rejects.toBeInstanceOf(
        TransientNetworkError
      );

      const error = await client.execute({ method: 'GET', path: USER_PATH }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CircuitOpenError);
      expect(error).toMatchObject({ retryAfterSeconds: 30 });
      expect(credentials.getCredential).toHaveBeenCalledTimes(2);
      expect(client.getHealth()).toEqual({ circuitState: 'OPEN', failureCount: 2 });
    });

    it('gives the half-open probe a single attempt and reopens on failure', async () => {
      nock(BASE_URL).get(USER_PATH).times(2).reply(500);
      const client = buildClient({ failureThreshold: 1, windowSeconds: 60, cooldownSeconds: 10 });

      await expect(client.execute({ method: 'GET', path: USER_PATH }, singleAttempt)).rejects.toBeInstanceOf(
        TransientNetworkError
      );
      now += 10_000;

      await expect(client.execute({ method: 'GET', path: USER_PATH })).rejects.toBeInstanceOf(
        TransientNetworkError
      );

      expect(sleep).not.toHaveBeenCalled();
      expect(breaker.getState().state).toBe('OPEN');
    });

    it('closes the circuit when the probe succeeds', async () => {
      nock(BASE_URL).get(USER_PATH).reply(500).get(USER_PATH).reply(200, {});
      const client = buildClient({ failureThreshold: 1, windowSeconds: 60, cooldownSeconds: 10 });

      await expect(client.execute({ method: 'GET', path: USER_PATH }, singleAttempt)).rejects.toBeInstanceOf(
        TransientNetworkError
      );
      now += 10_000;

      await client.execute({ method: 'GET', path: USER_PATH });

      expect(client.getHealth()).toEqual({ circuitState: 'CLOSED', failureCount: 0 });
    });

    it('lets only the half-open trial call decide when an earlier call succeeds late', async () => {
      nock(BASE_URL).get('/api/user/slow').delay(300).reply(200, {});
      nock(BASE_URL).get(USER_PATH).reply(500).get(USER_PATH).delay(600).reply(503);
      const client = buildClient({ failureThreshold: 1, windowSeconds: 60, cooldownSeconds: 10 });

      const slowCall = client.execute({ method: 'GET', path: '/api/user/slow' });
      await expect(client.execute({ method: 'GET', path: USER_PATH }, singleAttempt)).rejects.toBeInstanceOf(
        TransientNetworkError
      );
      now += 10_000;
      const probeCall = client.execute({ method: 'GET', path: USER_PATH }).catch((e: unknown) => e);

      await slowCall;
      expect(breaker.getState()).toMatchObject({ state: 'HALF_OPEN', half_open_probe_in_flight: true });

      expect(await probeCall).toBeInstanceOf(TransientNetworkError);
      expect(breaker.getState().state).toBe('OPEN');
    });

    it('releases the probe slot when the probe gets a non-retryable response', async () => {
      nock(BASE_URL).get(USER_PATH).reply(500).get(USER_PATH).reply(404);
      const client = buildClient({ failureThreshold: 1, windowSeconds: 60, cooldownSeconds: 10 });

      await expect(client.execute({ method: 'GET', path: USER_PATH }, singleAttempt)).rejects.toBeInstanceOf(
        TransientNetworkError
      );
      now += 10_000;
      await expect(client.execute({ method: 'GET', path: USER_PATH })).rejects.toBeInstanceOf(HttpStatusError);

      expect(breaker.getState()).toMatchObject({ state: 'HALF_OPEN', half_open_probe_in_flight: false });
    });
  });

  describe('deadline', () => {
    it('aborts a backoff sleep and fails with DEADLINE_EXCEEDED', async () => {
      nock(BASE_URL).get(USER_PATH).reply(503);
      const client = buildClient(undefined, { sleep: abortableSleep });
      const slowPolicy: RetryPolicy = { ...policy, baseDelayMs: 60_000, maxDelayMs: 60_000 };

      const error = await client
        .execute({ method: 'GET', path: USER_PATH }, { timeoutMs: 50, retryPolicy: slowPolicy })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TimeoutError);
      expect(error).toMatchObject({ error_code: 'DEADLINE_EXCEEDED', retryable: false });
      expect(breaker.getState().failure_count).toBe(1);
    });

    it('aborts the in-flight request when the deadline passes', async () => {
      nock(BASE_URL).get(USER_PATH).delay(300).reply(200, {});
      const client = buildClient();

      const error = await client
        .execute({ method: 'GET', path: USER_PATH }, { timeoutMs: 20 })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TimeoutError);
      expect(error).toMatchObject({ error_code: 'DEADLINE_EXCEEDED' });
      expect(breaker.getState().failure_count).toBe(1);
    });
  });
});
