import { InMemorySubscriptionRecordStore } from '../../../../services/subscription/InMemorySubscriptionRecordStore';
import type { SubscriptionRecord } from '../../../../types/SubscriptionTypes';

const record: SubscriptionRecord = {
  userId: '7',
  panelUsername: 'user_7_1700000000',
  tier: 'paid',
  dataLimit: 0,
  usedTraffic: 0,
  expireAt: null,
  status: 'active',
  subscriptionUrl: '',
  updatedAt: '2023-11-14T22:13:20.000Z',
};

describe('InMemorySubscriptionRecordStore', () => {
  it('round-trips a record as a copy', async () => {
    const store = new InMemorySubscriptionRecordStore();
    await store.save('7', record);

    const loaded = await store.load('7');
    expect(loaded).toEqual(record);
    expect(loaded).not.toBe(record);
  });

  it('is not affected by mutating a loaded record', async () => {
    const store = new InMemorySubscriptionRecordStore();
    await store.save('7', record);

    const loaded = await store.load('7');
    if (loaded) loaded.status = 'disabled';

    await expect(store.load('7')).resolves.toMatchObject({ status: 'active' });
  });

  it('delete reports whether a record existed', async () => {
    const store = new InMemorySubscriptionRecordStore();
    await store.save('7', record);

    await expect(store.delete('7')).resolves.toBe(true);
    await expect(store.delete('7')).resolves.toBe(false);
    await expect(store.load('7')).resolves.toBeNull();
  });
});
