import type { SubscriptionRecord } from '../../types/SubscriptionTypes';
import type { ISubscriptionRecordStore } from './ISubscriptionRecordStore';

/**
 * Process-local store for tests and local runs. Records are copied on the way
 * in and out so callers cannot mutate stored state.
 */
export class InMemorySubscriptionRecordStore implements ISubscriptionRecordStore {
  private readonly records = new Map<string, Readonly<SubscriptionRecord>>();

  async load(userId: string): Promise<SubscriptionRecord | null> {
    const record = this.records.get(userId);
    return record ? { ...record } : null;
  }

  async save(userId: string, record: SubscriptionRecord): Promise<void> {
    this.records.set(userId, Object.freeze({ ...record }));
  }

  async delete(userId: string): Promise<boolean> {
    return this.records.delete(userId);
  }

  size(): number {
    return this.records.size;
  }
}
