/**
 * End-to-end wiring through createSubscriptionCore with the panel on nock.
 */

import nock from 'nock';
import { createSubscriptionCore, SubscriptionCore } from '../../index';
import { loadPanelConfig } from '../../config/panelConfig';
import { InMemorySubscriptionRecordStore } from '../../services/subscription/InMemorySubscriptionRecordStore';
import { Logger } from '../../services/core/Logger';
import { toUserFacingError } from '../../utils/user-error-mapping';

const BASE_URL = 'http://panel.test';
const NOW_MS = 1_700_000_000_000;
const USERNAME = 'user_42_1700000000';
const EXPIRE = 1_700_000_000 + 3 * 86400;

describe('createSubscriptionCore', () => {
  let core: SubscriptionCore;
  let store: InMemorySubscriptionRecordStore;

  beforeEach(() => {
    store = new InMemorySubscriptionRecordStore();
    core = createSubscriptionCore(
      loadPanelConfig({
        PANEL_URL: BASE_URL,
        PANEL_USERNAME: 'admin',
        PANEL_PASSWORD: 'test-secret',
        RETRY_MAX_ATTEMPTS: '1',
      }),
      { store, logger: new Logger('SubscriptionCoreTest'), clock: () => NOW_MS }
    );
  });

  afterEach(() => {
    core.shutdown();
  });

  it('authenticates once and serves trial creation and status', async () => {
    const envelope = {
      username: USERNAME,
      data_limit: 5368709120,
      used_traffic: 0,
      expire: EXPIRE,
      status: 'active',
      subscription_url: '/sub/abc',
    };
    const scope = nock(BASE_URL)
      .post('/api/admin/token', 'username=admin&password=test-secret')
      .reply(200, { access_token: 'test-token', token_type: 'bearer' })
      .post('/api/user', {
        username: USERNAME,
        proxies: { vless: {} },
        data_limit: 5368709120,
        expire: EXPIRE,
        status: 'active',
      })
      .matchHeader('authorization', 'Bearer test-token')
      .reply(200, envelope)
      .get(`/api/user/${USERNAME}`)
      .matchHeader('authorization', 'Bearer test-token')
      .reply(200, { ...envelope, used_traffic: 1024 });

    const trial = await core.subscriptions.createTrial(42);
    const status = await core.subscriptions.getStatus(42);

    expect(trial).toMatchObject({ panelUsername: USERNAME, expireAt: EXPIRE, subscriptionUrl: '/sub/abc' });
    expect(status).toMatchObject({ status: 'active', lifecycleState: 'TRIAL', usedTraffic: 1024 });
    expect(core.httpClient.getHealth()).toEqual({ circuitState: 'CLOSED', failureCount: 0 });
    expect(core.tokenManager.hasValidCredential()).toBe(true);
    expect(scope.isDone()).toBe(true);
  });

  it('surfaces an unavailable panel as a user-facing TEMPORARILY_UNAVAILABLE', async () => {
    nock(BASE_URL)
      .post('/api/admin/token')
      .reply(200, { access_token: 'test-token', token_type: 'bearer' })
      .post('/api/user')
      .reply(503);

    const error = await core.subscriptions.createTrial(42).catch((e: unknown) => e);

    expect(toUserFacingError(error).kind).toBe('TEMPORARILY_UNAVAILABLE');
    expect(store.size()).toBe(0);
  });
});
