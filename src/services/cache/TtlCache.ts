import { Logger } from '../core/Logger';
import { Clock, systemClock } from '../../types/CommonTypes';

export interface CacheEntry<V> {
  readonly value: V;
  readonly createdAt: number;
  readonly ttlMs: number;
}

export interface TtlCacheOptions {
  clock?: Clock;
  logger?: Logger;
}

/**
 * TtlCache - in-process TTL cache
 *
 * An entry is never returned once `now - createdAt >= ttlMs`; expired entries are
 * removed on read or by sweep(). No eviction beyond TTL, so keys must come from a
 * bounded space (one entry per known user id).
 *
 * All mutations run synchronously on the event loop, which makes each one atomic
 * with respect to concurrent async callers. Last set() wins.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly inFlight = new Map<string, Promise<V>>();
  // Bumped on invalidate so a load that started earlier cannot repopulate the key
  private readonly generations = new Map<string, number>();
  private readonly clock: Clock;
  private readonly logger?: Logger;
  private sweepTimer?: NodeJS.Timeout;

  constructor(options: TtlCacheOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger;
  }

  /**
   * Get cached value (undefined on miss or expiry)
   */
  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.logger?.debug('Cache miss', { key });
      return undefined;
    }

    if (this.isExpired(entry)) {
      this.entries.delete(key);
      this.logger?.debug('Cache expired', { key });
      return undefined;
    }

    this.logger?.debug('Cache hit', { key });
    return entry.value;
  }

  set(key: string, value: V, ttlMs: number): void {
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
      throw new RangeError(`Cache TTL must be a positive number of milliseconds, got ${ttlMs}`);
    }
    const entry: CacheEntry<V> = Object.freeze({ value, createdAt: this.clock(), ttlMs });
    this.entries.set(key, entry);
    this.logger?.debug('Cache set', { key, ttlMs });
  }

  /**
   * Remove an entry and detach any in-flight load for it.
   * Returns whether a stored entry was removed.
   */
  invalidate(key: string): boolean {
    this.generations.set(key, this.generation(key) + 1);
    this.inFlight.delete(key);
    const removed = this.entries.delete(key);
    if (removed) {
      this.logger?.debug('Cache invalidate', { key });
    }
    return removed;
  }

  /**
   * Number of stored entries, including expired ones not yet swept
   */
  size(): number {
    return this.entries.size;
  }

  clear(): void {
    for (const key of this.entries.keys()) {
      this.generations.set(key, this.generation(key) + 1);
    }
    for (const key of this.inFlight.keys()) {
      this.generations.set(key, this.generation(key) + 1);
    }
    this.entries.clear();
    this.inFlight.clear();
  }

  /**
   * Cache-first read; concurrent misses for the same key share one loader call.
   * Loader failures are not cached and propagate to every waiting caller.
   */
  async getOrLoad(key: string, loader: () => Promise<V>, ttlMs: number): Promise<V> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      this.logger?.debug('Cache load coalesced', { key });
      return pending;
    }

    const startedGeneration = this.generation(key);
    const load: Promise<V> = Promise.resolve()
      .then(loader)
      .then((value) => {
        if (this.generation(key) === startedGeneration) {
          this.set(key, value, ttlMs);
        }
        return value;
      })
      .finally(() => {
        if (this.inFlight.get(key) === load) {
          this.inFlight.delete(key);
        }
      });

    this.inFlight.set(key, load);
    return load;
  }

  /**
   * Remove every expired entry. Returns the number removed.
   */
  sweep(): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger?.info('Cleaned up expired cache entries', { removed });
    }
    return removed;
  }

  /**
   * Periodic sweep on an unref'd timer; never keeps the process alive.
   */
  startSweep(intervalMs: number): void {
    this.stopSweep();
    this.sweepTimer = setInterval(() => {
      this.sweep();
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stopSweep(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  private isExpired(entry: CacheEntry<V>): boolean {
    return this.clock() - entry.createdAt >= entry.ttlMs;
  }

  private generation(key: string): number {
    return this.generations.get(key) ?? 0;
  }
}
