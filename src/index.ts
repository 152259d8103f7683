/**
 * Panel subscription core
 *
 * Composition root: wires config, transport, credentials, breaker, cache and
 * record store into a SubscriptionService. The bot front end calls
 * createSubscriptionCore() once at startup and shutdown() on exit.
 */

import { loadPanelConfig, PanelConfig } from './config/panelConfig';
import { SUBSCRIPTION_PLANS } from './config/planConfig';
import { Logger } from './services/core/Logger';
import { TtlCache } from './services/cache/TtlCache';
import { CircuitBreakerService } from './services/connector/CircuitBreakerService';
import { createPooledTransport } from './services/connector/PooledHttpTransport';
import { ResilientHttpClient } from './services/connector/ResilientHttpClient';
import { TokenManager, DEFAULT_TOKEN_MANAGER_CONFIG } from './services/auth/TokenManager';
import { PanelAuthenticator } from './adapters/panel/PanelAuthenticator';
import { PanelApiClient } from './adapters/panel/PanelApiClient';
import type { IPanelApiClient } from './adapters/IPanelApiClient';
import { SubscriptionCaches, SubscriptionService } from './services/subscription/SubscriptionService';
import type { ISubscriptionRecordStore } from './services/subscription/ISubscriptionRecordStore';
import { InMemorySubscriptionRecordStore } from './services/subscription/InMemorySubscriptionRecordStore';
import { DynamoSubscriptionRecordStore } from './services/subscription/DynamoSubscriptionRecordStore';
import { Clock, MS_PER_SECOND, systemClock } from './types/CommonTypes';
import type { SubscriptionRecord, SubscriptionStatusView, TrafficUsageView } from './types/SubscriptionTypes';

export interface SubscriptionCoreOverrides {
  store?: ISubscriptionRecordStore;
  logger?: Logger;
  clock?: Clock;
}

export interface SubscriptionCore {
  subscriptions: SubscriptionService;
  panel: IPanelApiClient;
  httpClient: ResilientHttpClient;
  tokenManager: TokenManager;
  caches: SubscriptionCaches;
  shutdown(): void;
}

export function createSubscriptionCore(
  config: PanelConfig = loadPanelConfig(),
  overrides: SubscriptionCoreOverrides = {}
): SubscriptionCore {
  const logger = overrides.logger ?? new Logger('SubscriptionCore');
  const clock = overrides.clock ?? systemClock;

  const transport = createPooledTransport({
    baseUrl: config.panel.baseUrl,
    maxSockets: config.panel.maxSockets,
  });

  const authenticator = new PanelAuthenticator(
    transport.http,
    {
      username: config.panel.username,
      password: config.panel.password,
      requestTimeoutMs: config.panel.requestTimeoutMs,
    },
    logger.child('PanelAuthenticator'),
    clock
  );
  const tokenManager = new TokenManager(
    authenticator,
    logger.child('TokenManager'),
    { ...DEFAULT_TOKEN_MANAGER_CONFIG, defaultTokenTtlSeconds: config.panel.tokenTtlSeconds },
    clock
  );

  const circuitBreaker = new CircuitBreakerService(
    logger.child('CircuitBreakerService'),
    config.circuitBreaker,
    clock
  );
  const httpClient = new ResilientHttpClient(
    {
      requestTimeoutMs: config.panel.requestTimeoutMs,
      callTimeoutMs: config.panel.callTimeoutMs,
      retryPolicy: config.retry,
    },
    {
      http: transport.http,
      credentials: tokenManager,
      circuitBreaker,
      logger: logger.child('ResilientHttpClient'),
    }
  );
  const panel = new PanelApiClient(
    httpClient,
    { proxyProtocols: config.panel.proxyProtocols },
    logger.child('PanelApiClient')
  );

  const cacheLogger = logger.child('TtlCache');
  const caches: SubscriptionCaches = {
    status: new TtlCache<SubscriptionStatusView>({ clock, logger: cacheLogger }),
    usage: new TtlCache<TrafficUsageView>({ clock, logger: cacheLogger }),
    records: new TtlCache<SubscriptionRecord>({ clock, logger: cacheLogger }),
  };
  const allCaches = [caches.status, caches.usage, caches.records];
  for (const cache of allCaches) {
    cache.startSweep(config.cache.sweepIntervalSeconds * MS_PER_SECOND);
  }

  const store = overrides.store ?? createRecordStore(config, logger);

  const subscriptions = new SubscriptionService(
    {
      trialDataLimit: config.subscription.trialDataLimit,
      trialExpireDays: config.subscription.trialExpireDays,
      expiryWarningDays: config.subscription.expiryWarningDays,
      cacheTtlMs: {
        short: config.cache.ttl.short * MS_PER_SECOND,
        medium: config.cache.ttl.medium * MS_PER_SECOND,
        long: config.cache.ttl.long * MS_PER_SECOND,
      },
      plans: SUBSCRIPTION_PLANS,
    },
    { panel, store, caches, logger: logger.child('SubscriptionService'), clock }
  );

  logger.info('Subscription core ready', {
    panelUrl: config.panel.baseUrl,
    store: config.store.tableName ? 'dynamodb' : 'memory',
  });

  return {
    subscriptions,
    panel,
    httpClient,
    tokenManager,
    caches,
    shutdown(): void {
      for (const cache of allCaches) {
        cache.stopSweep();
        cache.clear();
      }
      tokenManager.invalidate();
      transport.close();
      logger.info('Subscription core stopped');
    },
  };
}

function createRecordStore(config: PanelConfig, logger: Logger): ISubscriptionRecordStore {
  if (config.store.tableName) {
    return new DynamoSubscriptionRecordStore(logger.child('DynamoSubscriptionRecordStore'), {
      tableName: config.store.tableName,
      ...(config.store.region ? { region: config.store.region } : {}),
    });
  }
  logger.warn('SUBSCRIPTION_TABLE_NAME not set, records are kept in memory');
  return new InMemorySubscriptionRecordStore();
}

export { loadPanelConfig } from './config/panelConfig';
export type { PanelConfig } from './config/panelConfig';
export { SUBSCRIPTION_PLANS, getPlan } from './config/planConfig';
export { SubscriptionService } from './services/subscription/SubscriptionService';
export type { CacheTtls, SubscriptionCaches } from './services/subscription/SubscriptionService';
export { InMemorySubscriptionRecordStore } from './services/subscription/InMemorySubscriptionRecordStore';
export { DynamoSubscriptionRecordStore } from './services/subscription/DynamoSubscriptionRecordStore';
export type { ISubscriptionRecordStore } from './services/subscription/ISubscriptionRecordStore';
export * from './services/validation/InputValidators';
export * from './types/PanelErrors';
export * from './types/SubscriptionTypes';
export { toUserFacingError } from './utils/user-error-mapping';
export type { UserFacingError, UserFacingErrorKind } from './utils/user-error-mapping';
