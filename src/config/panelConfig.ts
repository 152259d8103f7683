/**
 * Panel integration config: environment (and .env) parsed into a validated,
 * deep-frozen object. Every tunable has a default except the panel endpoint and
 * admin credentials.
 */

import { config as loadDotEnv } from 'dotenv';
import { z } from 'zod';
import type { CircuitBreakerConfig } from '../types/CircuitBreakerTypes';
import {
  DEFAULT_RETRYABLE_ERROR_CODES,
  DEFAULT_RETRYABLE_STATUSES,
  RetryPolicy,
} from '../types/HttpTypes';
import { ValidationError } from '../types/PanelErrors';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const PanelEnvSchema = z.object({
  PANEL_URL: z.string().url(),
  PANEL_USERNAME: z.string().min(1),
  PANEL_PASSWORD: z.string().min(1),
  PANEL_TOKEN_TTL_SECONDS: positiveInt(3600),
  PANEL_REQUEST_TIMEOUT_MS: positiveInt(30000),
  PANEL_CALL_TIMEOUT_MS: positiveInt(60000),
  PANEL_MAX_SOCKETS: positiveInt(10),
  PANEL_PROXY_PROTOCOLS: z
    .string()
    .default('vless')
    .transform((value) =>
      value
        .split(',')
        .map((protocol) => protocol.trim())
        .filter((protocol) => protocol.length > 0)
    )
    .pipe(z.array(z.string()).min(1)),

  RETRY_MAX_ATTEMPTS: positiveInt(3),
  RETRY_BASE_DELAY_MS: nonNegativeInt(1000),
  RETRY_MULTIPLIER: z.coerce.number().min(1).default(1.5),
  RETRY_JITTER_MS: nonNegativeInt(250),
  RETRY_MAX_DELAY_MS: nonNegativeInt(10000),

  CIRCUIT_FAILURE_THRESHOLD: positiveInt(5),
  CIRCUIT_WINDOW_SECONDS: positiveInt(60),
  CIRCUIT_COOLDOWN_SECONDS: positiveInt(60),

  CACHE_TTL_SHORT_SECONDS: positiveInt(300),
  CACHE_TTL_MEDIUM_SECONDS: positiveInt(1800),
  CACHE_TTL_LONG_SECONDS: positiveInt(3600),
  CACHE_SWEEP_INTERVAL_SECONDS: positiveInt(300),

  TRIAL_DATA_LIMIT: positiveInt(5368709120),
  TRIAL_EXPIRE_DAYS: positiveInt(3),
  EXPIRY_WARNING_DAYS: nonNegativeInt(3),

  SUBSCRIPTION_TABLE_NAME: z.string().min(1).optional(),
  AWS_REGION: z.string().min(1).optional(),
});

export interface PanelConfig {
  readonly panel: {
    readonly baseUrl: string;
    readonly username: string;
    readonly password: string;
    readonly tokenTtlSeconds: number;
    readonly requestTimeoutMs: number;
    readonly callTimeoutMs: number;
    readonly maxSockets: number;
    readonly proxyProtocols: readonly string[];
  };
  readonly retry: RetryPolicy;
  readonly circuitBreaker: Readonly<CircuitBreakerConfig>;
  readonly cache: {
    /** Seconds. short: traffic usage, medium: subscription status, long: stored records */
    readonly ttl: {
      readonly short: number;
      readonly medium: number;
      readonly long: number;
    };
    readonly sweepIntervalSeconds: number;
  };
  readonly subscription: {
    readonly trialDataLimit: number;
    readonly trialExpireDays: number;
    readonly expiryWarningDays: number;
  };
  readonly store: {
    readonly tableName?: string;
    readonly region?: string;
  };
}

/**
 * Build the config from `env`. When no env is passed, `.env` is loaded into
 * process.env first (existing variables win).
 *
 * @throws ValidationError listing every invalid variable
 */
export function loadPanelConfig(env?: NodeJS.ProcessEnv): PanelConfig {
  if (!env) {
    loadDotEnv();
  }
  const parsed = PanelEnvSchema.safeParse(env ?? process.env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError('config', `Invalid panel configuration: ${problems.join('; ')}`, 'INVALID_CONFIG');
  }

  const e = parsed.data;
  const panelConfig: PanelConfig = {
    panel: {
      baseUrl: e.PANEL_URL,
      username: e.PANEL_USERNAME,
      password: e.PANEL_PASSWORD,
      tokenTtlSeconds: e.PANEL_TOKEN_TTL_SECONDS,
      requestTimeoutMs: e.PANEL_REQUEST_TIMEOUT_MS,
      callTimeoutMs: e.PANEL_CALL_TIMEOUT_MS,
      maxSockets: e.PANEL_MAX_SOCKETS,
      proxyProtocols: e.PANEL_PROXY_PROTOCOLS,
    },
    retry: {
      maxAttempts: e.RETRY_MAX_ATTEMPTS,
      baseDelayMs: e.RETRY_BASE_DELAY_MS,
      multiplier: e.RETRY_MULTIPLIER,
      jitterMs: e.RETRY_JITTER_MS,
      maxDelayMs: e.RETRY_MAX_DELAY_MS,
      retryableStatuses: [...DEFAULT_RETRYABLE_STATUSES],
      retryableErrorCodes: [...DEFAULT_RETRYABLE_ERROR_CODES],
    },
    circuitBreaker: {
      failureThreshold: e.CIRCUIT_FAILURE_THRESHOLD,
      windowSeconds: e.CIRCUIT_WINDOW_SECONDS,
      cooldownSeconds: e.CIRCUIT_COOLDOWN_SECONDS,
    },
    cache: {
      ttl: {
        short: e.CACHE_TTL_SHORT_SECONDS,
        medium: e.CACHE_TTL_MEDIUM_SECONDS,
        long: e.CACHE_TTL_LONG_SECONDS,
      },
      sweepIntervalSeconds: e.CACHE_SWEEP_INTERVAL_SECONDS,
    },
    subscription: {
      trialDataLimit: e.TRIAL_DATA_LIMIT,
      trialExpireDays: e.TRIAL_EXPIRE_DAYS,
      expiryWarningDays: e.EXPIRY_WARNING_DAYS,
    },
    store: {
      ...(e.SUBSCRIPTION_TABLE_NAME ? { tableName: e.SUBSCRIPTION_TABLE_NAME } : {}),
      ...(e.AWS_REGION ? { region: e.AWS_REGION } : {}),
    },
  };
  return deepFreeze(panelConfig);
}

function deepFreeze<T extends object>(value: T): T {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  Object.freeze(value);
  return value;
}
