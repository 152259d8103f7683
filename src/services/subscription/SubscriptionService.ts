/**
 * Subscription Service
 *
 * Domain operations over the panel and the record store. Lifecycle is derived,
 * never stored: NON_EXISTENT -> TRIAL -> ACTIVE -> EXPIRED, renew re-enters
 * ACTIVE, any state -> DISABLED.
 *
 * Write order is panel first, store second. When the store write fails after
 * the panel accepted a change, the panel change is undone best-effort and the
 * store error is rethrown. Mutations for one user run one at a time.
 *
 * Cache tiers: short for traffic usage, medium for status views, long for
 * stored records (read paths only; mutations always read the store).
 */

import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../core/Logger';
import { TtlCache } from '../cache/TtlCache';
import type { IPanelApiClient } from '../../adapters/IPanelApiClient';
import type { ISubscriptionRecordStore } from './ISubscriptionRecordStore';
import { Clock, MS_PER_SECOND, SECONDS_PER_DAY, systemClock } from '../../types/CommonTypes';
import {
  AlreadyExistsError,
  NotFoundError,
  ValidationError,
  errorMessage,
} from '../../types/PanelErrors';
import {
  ExpiryCheckResult,
  LifecycleState,
  PanelUser,
  RenewalResult,
  SubscriptionPlan,
  SubscriptionRecord,
  SubscriptionStatus,
  SubscriptionStatusView,
  TrafficUsageView,
  TrialResult,
  UpdatePanelUserInput,
} from '../../types/SubscriptionTypes';
import {
  unwrapOrThrow,
  validatePlanSelection,
  validateRenewDays,
  validateUserId,
} from '../validation/InputValidators';

export interface SubscriptionServiceConfig {
  trialDataLimit: number;
  trialExpireDays: number;
  expiryWarningDays: number;
  cacheTtlMs: CacheTtls;
  plans: Readonly<Record<string, SubscriptionPlan>>;
}

export interface CacheTtls {
  short: number;
  medium: number;
  long: number;
}

export interface SubscriptionCaches {
  status: TtlCache<SubscriptionStatusView>;
  usage: TtlCache<TrafficUsageView>;
  records: TtlCache<SubscriptionRecord>;
}

export interface SubscriptionServiceDeps {
  panel: IPanelApiClient;
  store: ISubscriptionRecordStore;
  caches: SubscriptionCaches;
  logger: Logger;
  clock?: Clock;
}

type UsageFields = Pick<PanelUser, 'status' | 'expireAt' | 'usedTraffic' | 'dataLimit'>;

export const STATUS_CACHE_PREFIX = 'status:';

export const USAGE_CACHE_PREFIX = 'usage:';
export const RECORD_CACHE_PREFIX = 'record:';

export function statusCacheKey(userId: string): string {
  return `${STATUS_CACHE_PREFIX}${userId}`;
}

export function usageCacheKey(userId: string): string {
  return `${USAGE_CACHE_PREFIX}${userId}`;
}

export function recordCacheKey(userId: string): string {
  return `${RECORD_CACHE_PREFIX}${userId}`;
}

/**
 * active iff not expired and under quota; null expiry and a 0 limit mean
 * unlimited. A panel-side disable wins, a panel-side expired/limited is honored.
 */
export function computeStatus(usage: UsageFields, nowSeconds: number): SubscriptionStatus {
  if (usage.status === 'disabled') {
    return 'disabled';
  }
  if (usage.status === 'expired' || usage.status === 'limited') {
    return 'expired';
  }
  const withinTime = usage.expireAt === null || nowSeconds < usage.expireAt;
  const withinQuota = usage.dataLimit === 0 || usage.usedTraffic < usage.dataLimit;
  return withinTime && withinQuota ? 'active' : 'expired';
}

export function deriveLifecycleState(
  record: SubscriptionRecord | null,
  status: SubscriptionStatus
): LifecycleState {
  if (!record) return 'NON_EXISTENT';
  if (status === 'disabled') return 'DISABLED';
  if (status === 'expired') return 'EXPIRED';
  return record.tier === 'trial' ? 'TRIAL' : 'ACTIVE';
}

export function generatePanelUsername(userId: string, nowSeconds: number): string {
  return `user_${userId}_${nowSeconds}`;
}

/** null when traffic is unlimited */
export function remainingTraffic(dataLimit: number, usedTraffic: number): number | null {
  return dataLimit === 0 ? null : Math.max(0, dataLimit - usedTraffic);
}

/** Whole days left; 0 once expired, null when the subscription never expires */
export function daysRemaining(expireAt: number | null, nowSeconds: number): number | null {
  if (expireAt === null) return null;
  return Math.max(0, Math.floor((expireAt - nowSeconds) / SECONDS_PER_DAY));
}

export class SubscriptionService {
  private readonly panel: IPanelApiClient;
  private readonly store: ISubscriptionRecordStore;
  private readonly caches: SubscriptionCaches;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly trialsInFlight = new Set<string>();
  // Tail of each user's mutation queue; removed once the queue drains
  private readonly userQueues = new Map<string, Promise<void>>();

  constructor(
    private readonly config: SubscriptionServiceConfig,
    deps: SubscriptionServiceDeps
  ) {
    this.panel = deps.panel;
    this.store = deps.store;
    this.caches = deps.caches;
    this.logger = deps.logger;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Create a trial for a user with no subscription, or whose subscription expired.
   * A re-trial removes the previous panel user once the new record is saved.
   *
   * @throws AlreadyExistsError when a live subscription exists or a trial is being created
   */
  async createTrial(userIdInput: string | number): Promise<TrialResult> {
    const userId = unwrapOrThrow(validateUserId(userIdInput));

    if (this.trialsInFlight.has(userId)) {
      throw new AlreadyExistsError(userId, 'TRIAL');
    }
    this.trialsInFlight.add(userId);

    try {
      return await this.withUserLock(userId, 'createTrial', async (log) => {
        const existing = await this.store.load(userId);
        if (existing) {
          const state = deriveLifecycleState(existing, this.recordStatus(existing));
          if (state !== 'EXPIRED') {
            throw new AlreadyExistsError(userId, state);
          }
        }

        const nowSeconds = this.nowSeconds();
        const expireAt = nowSeconds + this.config.trialExpireDays * SECONDS_PER_DAY;
        const user = await this.panel.createUser({
          username: generatePanelUsername(userId, nowSeconds),
          dataLimit: this.config.trialDataLimit,
          expireAt,
        });

        try {
          await this.saveRecord(userId, this.toRecord(userId, user, 'trial', nowSeconds));
        } catch (error) {
          await this.compensate(log, () => this.panel.deleteUser(user.username));
          throw error;
        }
        this.invalidateViews(userId);

        if (existing && existing.panelUsername !== user.username) {
          await this.retirePanelUser(existing.panelUsername, log);
        }

        log.info('Trial created', { panelUsername: user.username, expireAt });
        return {
          userId,
          panelUsername: user.username,
          subscriptionUrl: user.subscriptionUrl,
          dataLimit: this.config.trialDataLimit,
          expireDays: this.config.trialExpireDays,
          expireAt,
        };
      });
    } finally {
      this.trialsInFlight.delete(userId);
    }
  }

  /**
   * Current status from the panel, cached per user. Concurrent misses share
   * one upstream fetch.
   *
   * @throws NotFoundError when the user has no subscription
   */
  async getStatus(userIdInput: string | number): Promise<SubscriptionStatusView> {
    const userId = unwrapOrThrow(validateUserId(userIdInput));
    return this.caches.status.getOrLoad(
      statusCacheKey(userId),
      () => this.loadStatus(userId),
      this.config.cacheTtlMs.medium
    );
  }

  /**
   * Traffic snapshot from the panel, cached on the short tier.
   *
   * @throws NotFoundError when the user has no subscription
   */
  async getUsage(userIdInput: string | number): Promise<TrafficUsageView> {
    const userId = unwrapOrThrow(validateUserId(userIdInput));
    return this.caches.usage.getOrLoad(
      usageCacheKey(userId),
      () => this.loadUsage(userId),
      this.config.cacheTtlMs.short
    );
  }

  /**
   * Extend from the later of now and the current panel expiry.
   *
   * @throws NotFoundError when the user has no subscription
   */
  async renew(userIdInput: string | number, days: number, dataLimit?: number): Promise<RenewalResult> {
    const userId = unwrapOrThrow(validateUserId(userIdInput));
    const renewDays = unwrapOrThrow(validateRenewDays(days));
    if (dataLimit !== undefined && (!Number.isSafeInteger(dataLimit) || dataLimit < 0)) {
      throw new ValidationError('dataLimit', 'dataLimit must be a non-negative integer');
    }

    return this.withUserLock(userId, 'renew', async (log) => {
      const record = await this.requireRecord(userId);
      const current = await this.panel.getUser(record.panelUsername);

      const nowSeconds = this.nowSeconds();
      const base = Math.max(nowSeconds, current.expireAt ?? nowSeconds);
      const expireAt = base + renewDays * SECONDS_PER_DAY;

      const update: UpdatePanelUserInput = {
        expireAt,
        status: 'active',
        ...(dataLimit !== undefined ? { dataLimit } : {}),
      };
      const updated = await this.panel.updateUser(record.panelUsername, update);

      try {
        await this.saveRecord(userId, this.toRecord(userId, updated, 'paid', nowSeconds, record));
      } catch (error) {
        await this.compensate(log, () =>
          this.panel.updateUser(record.panelUsername, {
            // 0 is the panel's "never expires"
            expireAt: current.expireAt ?? 0,
            dataLimit: current.dataLimit,
            status: current.status === 'disabled' ? 'disabled' : 'active',
          })
        );
        throw error;
      }
      this.invalidateViews(userId);

      log.info('Subscription renewed', {
        days: renewDays,
        previousExpireAt: current.expireAt,
        expireAt,
      });
      return {
        userId,
        panelUsername: record.panelUsername,
        previousExpireAt: current.expireAt,
        expireAt,
        dataLimit: updated.dataLimit,
      };
    });
  }

  async renewWithPlan(userIdInput: string | number, planId: string | number): Promise<RenewalResult> {
    const plan = unwrapOrThrow(validatePlanSelection(planId, this.config.plans));
    return this.renew(userIdInput, plan.days, plan.dataLimit);
  }

  /**
   * Expiry summary from the stored record; no panel call.
   */
  async checkExpiry(
    userIdInput: string | number,
    warnWithinDays: number = this.config.expiryWarningDays
  ): Promise<ExpiryCheckResult> {
    const userId = unwrapOrThrow(validateUserId(userIdInput));
    if (!Number.isInteger(warnWithinDays) || warnWithinDays < 0) {
      throw new ValidationError('warnWithinDays', 'warnWithinDays must be a non-negative integer');
    }

    const record = await this.readRecord(userId);
    const status = this.recordStatus(record);
    const remaining = daysRemaining(record.expireAt, this.nowSeconds());
    return {
      userId,
      status,
      lifecycleState: deriveLifecycleState(record, status),
      expireAt: record.expireAt,
      daysRemaining: remaining,
      expiringSoon: status === 'active' && remaining !== null && remaining <= warnWithinDays,
    };
  }

  /**
   * Refresh stored traffic, limit, expiry and status from the panel.
   */
  async syncWithPanel(userIdInput: string | number): Promise<SubscriptionRecord> {
    const userId = unwrapOrThrow(validateUserId(userIdInput));
    return this.withUserLock(userId, 'syncWithPanel', async (log) => {
      const record = await this.requireRecord(userId);
      const user = await this.panel.getUser(record.panelUsername);

      const synced = this.toRecord(userId, user, record.tier, this.nowSeconds(), record);
      await this.saveRecord(userId, synced);
      this.invalidateViews(userId);
      log.debug('Subscription synced with panel', { status: synced.status });
      return synced;
    });
  }

  async disable(userIdInput: string | number): Promise<SubscriptionRecord> {
    return this.setPanelStatus(userIdInput, 'disabled');
  }

  async enable(userIdInput: string | number): Promise<SubscriptionRecord> {
    return this.setPanelStatus(userIdInput, 'active');
  }

  /**
   * Remove the panel user, then the stored record. A panel user that is
   * already gone does not block the store delete.
   */
  async deleteSubscription(userIdInput: string | number): Promise<void> {
    const userId = unwrapOrThrow(validateUserId(userIdInput));
    return this.withUserLock(userId, 'deleteSubscription', async (log) => {
      const record = await this.requireRecord(userId);

      try {
        await this.panel.deleteUser(record.panelUsername);
      } catch (error) {
        if (!(error instanceof NotFoundError)) {
          throw error;
        }
        log.warn('Panel user already absent', { panelUsername: record.panelUsername });
      }

      await this.store.delete(userId);
      this.caches.records.invalidate(recordCacheKey(userId));
      this.invalidateViews(userId);
      log.info('Subscription deleted');
    });
  }

  private async setPanelStatus(
    userIdInput: string | number,
    status: 'active' | 'disabled'
  ): Promise<SubscriptionRecord> {
    const userId = unwrapOrThrow(validateUserId(userIdInput));
    return this.withUserLock(userId, status === 'disabled' ? 'disable' : 'enable', async (log) => {
      const record = await this.requireRecord(userId);
      const updated = await this.panel.updateUser(record.panelUsername, { status });

      const next = this.toRecord(userId, updated, record.tier, this.nowSeconds(), record);
      await this.saveRecord(userId, next);
      this.invalidateViews(userId);
      log.info('Subscription status changed', { status: next.status });
      return next;
    });
  }

  /**
   * Run `work` after every earlier mutation for the same user has settled.
   */
  private async withUserLock<T>(
    userId: string,
    operation: string,
    work: (log: Logger) => Promise<T>
  ): Promise<T> {
    const previous = this.userQueues.get(userId) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => done);
    this.userQueues.set(userId, tail);

    try {
      await previous;
      return await work(this.logger.withContext({ traceId: uuidv4(), userId, operation }));
    } finally {
      release();
      if (this.userQueues.get(userId) === tail) {
        this.userQueues.delete(userId);
      }
    }
  }

  private async loadStatus(userId: string): Promise<SubscriptionStatusView> {
    const record = await this.readRecord(userId);
    const user = await this.panel.getUser(record.panelUsername);
    const nowSeconds = this.nowSeconds();
    const status = computeStatus(user, nowSeconds);

    return {
      userId,
      panelUsername: record.panelUsername,
      status,
      lifecycleState: deriveLifecycleState(record, status),
      dataLimit: user.dataLimit,
      usedTraffic: user.usedTraffic,
      remainingTraffic: remainingTraffic(user.dataLimit, user.usedTraffic),
      expireAt: user.expireAt,
      daysRemaining: daysRemaining(user.expireAt, nowSeconds),
      subscriptionUrl: user.subscriptionUrl || record.subscriptionUrl,
      checkedAt: new Date(this.clock()).toISOString(),
    };
  }

  private async loadUsage(userId: string): Promise<TrafficUsageView> {
    const record = await this.readRecord(userId);
    const usage = await this.panel.getUserUsage(record.panelUsername);
    return {
      userId,
      status: computeStatus(usage, this.nowSeconds()),
      dataLimit: usage.dataLimit,
      usedTraffic: usage.usedTraffic,
      remainingTraffic: remainingTraffic(usage.dataLimit, usage.usedTraffic),
      expireAt: usage.expireAt,
      checkedAt: new Date(this.clock()).toISOString(),
    };
  }

  /** Cached record for read paths; absent records are not cached */
  private readRecord(userId: string): Promise<SubscriptionRecord> {
    return this.caches.records.getOrLoad(
      recordCacheKey(userId),
      () => this.requireRecord(userId),
      this.config.cacheTtlMs.long
    );
  }

  private async requireRecord(userId: string): Promise<SubscriptionRecord> {
    const record = await this.store.load(userId);
    if (!record) {
      throw new NotFoundError('Subscription', userId);
    }
    return record;
  }

  private async saveRecord(userId: string, record: SubscriptionRecord): Promise<void> {
    const key = recordCacheKey(userId);
    // Detach reads that started before this write
    this.caches.records.invalidate(key);
    await this.store.save(userId, record);
    this.caches.records.invalidate(key);
    this.caches.records.set(key, record, this.config.cacheTtlMs.long);
  }

  private invalidateViews(userId: string): void {
    this.caches.status.invalidate(statusCacheKey(userId));
    this.caches.usage.invalidate(usageCacheKey(userId));
  }

  /**
   * Delete a replaced panel user. Failure leaves an orphan upstream, logged for cleanup.
   */
  private async retirePanelUser(panelUsername: string, log: Logger): Promise<void> {
    try {
      await this.panel.deleteUser(panelUsername);
      log.info('Previous panel user removed', { panelUsername });
    } catch (error) {
      if (error instanceof NotFoundError) {
        return;
      }
      log.warn('Previous panel user could not be removed', {
        panelUsername,
        error: errorMessage(error),
      });
    }
  }

  private recordStatus(record: SubscriptionRecord): SubscriptionStatus {
    if (record.status === 'disabled') return 'disabled';
    return computeStatus({ ...record, status: 'active' }, this.nowSeconds());
  }

  private toRecord(
    userId: string,
    user: PanelUser,
    tier: SubscriptionRecord['tier'],
    nowSeconds: number,
    previous?: SubscriptionRecord
  ): SubscriptionRecord {
    return {
      userId,
      panelUsername: user.username,
      tier,
      dataLimit: user.dataLimit,
      usedTraffic: user.usedTraffic,
      expireAt: user.expireAt,
      status: computeStatus(user, nowSeconds),
      subscriptionUrl: user.subscriptionUrl || previous?.subscriptionUrl || '',
      updatedAt: new Date(this.clock()).toISOString(),
    };
  }

  private async compensate(log: Logger, undo: () => Promise<unknown>): Promise<void> {
    log.error('Store write failed after panel change, compensating');
    try {
      await undo();
    } catch (error) {
      log.error('Compensation failed; panel and store may disagree', { error: errorMessage(error) });
    }
  }

  private nowSeconds(): number {
    return Math.floor(this.clock() / MS_PER_SECOND);
  }
}
