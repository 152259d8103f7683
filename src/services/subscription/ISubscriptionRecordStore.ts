/**
 * Key-value store of subscription records keyed by the bot user id.
 * The core never sees the storage engine behind it.
 */

import type { SubscriptionRecord } from '../../types/SubscriptionTypes';

export interface ISubscriptionRecordStore {
  load(userId: string): Promise<SubscriptionRecord | null>;

  /** Full replace */
  save(userId: string, record: SubscriptionRecord): Promise<void>;

  /** Returns false when there was nothing to delete */
  delete(userId: string): Promise<boolean>;
}
