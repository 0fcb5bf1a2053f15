import { describe, expect, it } from 'vitest';
import { createDependencyOrchestrator, type DependencyOrchestrator } from '../dependencies/orchestrator.js';
import { createMetricsBundle } from '../metrics/registry.js';
import { createOfferService } from '../offers/service.js';
import {
  createFakeClients,
  isTransportError,
  noSleep,
  silentLogger,
  TransportError,
} from './helpers/fakes.js';
import { createMemoryOfferStore } from './helpers/memoryOfferStore.js';

const EPOCH = Date.UTC(2024, 0, 1);

const setup = () => {
  let tick = 0;
  const store = createMemoryOfferStore(() => {
    tick += 1;
    return new Date(EPOCH + tick * 1000);
  });
  const clients = createFakeClients({
    1: { ownerId: 'alice' },
    2: { ownerId: 'alice' },
    3: { ownerId: 'bob' },
    4: { ownerId: 'bob', isActive: false },
  });
  const metrics = createMetricsBundle();
  const dependencies = createDependencyOrchestrator({
    clients,
    settings: {
      failureThreshold: 5,
      resetTimeoutMs: 60_000,
      maxAttempts: 3,
      baseDelayMs: 1000,
      maxDelayMs: 10_000,
      timeoutMs: 5_000,
    },
    logger: silentLogger(),
    metrics,
    isRetryable: isTransportError,
    sleep: noSleep,
  });
  const service = createOfferService({ store, dependencies, logger: silentLogger(), metrics });

  return { store, clients, metrics, dependencies, service };
};

const proposeDefault = async (service: ReturnType<typeof setup>['service']) => {
  const result = await service.proposeTradeOffer({
    proposerId: 'alice',
    receiverId: 'bob',
    offeredItemIds: [1, 2],
    requestedItemIds: [3],
    message: 'Fancy a swap?',
  });
  if (!result.ok) {
    throw new Error(`Expected proposal to succeed: ${result.error.code}`);
  }
  return result.offer;
};

describe('proposeTradeOffer', () => {
  it('stores a pending offer after validating the items once', async () => {
    const { service, store, clients, metrics } = setup();

    const offer = await proposeDefault(service);

    expect(offer).toMatchObject({
      id: 1,
      proposerId: 'alice',
      receiverId: 'bob',
      offeredItemIds: [1, 2],
      requestedItemIds: [3],
      status: 'pending',
      message: 'Fancy a swap?',
      respondedAt: null,
    });
    expect(store.records.size).toBe(1);
    expect(clients.catalog.calls).toEqual([[1, 2, 3]]);
    expect((await metrics.offersCreated.get()).values[0]?.value).toBe(1);
  });

  it('stores a missing message as null', async () => {
    const { service } = setup();

    const result = await service.proposeTradeOffer({
      proposerId: 'alice',
      receiverId: 'bob',
      offeredItemIds: [1],
      requestedItemIds: [3],
    });

    expect(result.ok && result.offer.message).toBeNull();
  });

  it('rejects malformed proposals without contacting the catalog', async () => {
    const { service, clients, store } = setup();

    const result = await service.proposeTradeOffer({
      proposerId: 'alice',
      receiverId: 'bob',
      offeredItemIds: [1, 1],
      requestedItemIds: [3],
    });

    expect(result).toEqual({
      ok: false,
      error: { code: 'duplicate_items', side: 'offered', itemIds: [1] },
    });
    expect(clients.catalog.calls).toHaveLength(0);
    expect(store.records.size).toBe(0);
  });

  it('surfaces ownership failures', async () => {
    const { service } = setup();

    const inactive = await service.proposeTradeOffer({
      proposerId: 'alice',
      receiverId: 'bob',
      offeredItemIds: [1],
      requestedItemIds: [4],
    });
    const stolen = await service.proposeTradeOffer({
      proposerId: 'alice',
      receiverId: 'bob',
      offeredItemIds: [3],
      requestedItemIds: [1],
    });

    expect(inactive).toEqual({ ok: false, error: { code: 'items_inactive', itemIds: [4] } });
    expect(stolen).toEqual({
      ok: false,
      error: { code: 'wrong_owner', role: 'proposer', itemIds: [3] },
    });
  });

  it('refuses to create offers while the catalog is unavailable', async () => {
    const { service, clients, store } = setup();
    clients.catalog.failWith = new TransportError();

    const result = await service.proposeTradeOffer({
      proposerId: 'alice',
      receiverId: 'bob',
      offeredItemIds: [1],
      requestedItemIds: [3],
    });

    expect(result).toEqual({
      ok: false,
      error: { code: 'dependency_unavailable', dependency: 'catalog' },
    });
    expect(store.records.size).toBe(0);
  });
});

describe('transition', () => {
  it('accepts an offer, notifies the proposer and opens a chat room', async () => {
    const { service, clients } = setup();
    const offer = await proposeDefault(service);

    const result = await service.transition(offer.id, 'accepted', 'bob');

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect(result.offer.status).toBe('accepted');
    expect(result.offer.respondedAt).toEqual(result.offer.updatedAt);
    expect(clients.notifications.sent).toEqual([
      {
        recipientId: 'alice',
        type: 'trade_offer_accepted',
        title: 'Trade offer accepted',
        body: 'Good news! Your trade offer has been accepted.',
        relatedOfferId: offer.id,
        relatedUserId: 'bob',
      },
    ]);
    expect(clients.chat.rooms).toEqual([{ offerId: offer.id, userAId: 'alice', userBId: 'bob' }]);
  });

  it('commits the acceptance even when notifications are down', async () => {
    const { service, clients, store } = setup();
    const offer = await proposeDefault(service);
    clients.notifications.failWith = new TransportError();

    const result = await service.transition(offer.id, 'accepted', 'bob');

    expect(result.ok).toBe(true);
    expect(store.records.get(offer.id)?.status).toBe('accepted');
    expect(clients.notifications.attempts).toBe(3);
    expect(clients.chat.rooms).toHaveLength(1);
  });

  it('commits the acceptance when notifications and chat are both down', async () => {
    const { service, clients, store } = setup();
    const offer = await proposeDefault(service);
    clients.notifications.failWith = new TransportError();
    clients.chat.failWith = new TransportError();

    const result = await service.transition(offer.id, 'accepted', 'bob');

    expect(result.ok && result.offer.status).toBe('accepted');
    expect(store.records.get(offer.id)?.status).toBe('accepted');
    expect(clients.notifications.attempts).toBe(3);
    expect(clients.chat.attempts).toBe(3);
    expect(clients.chat.rooms).toHaveLength(0);
  });

  it('commits the acceptance even when side effects throw unexpectedly', async () => {
    const { store, metrics } = setup();
    const offer = await store.createOffer({
      proposerId: 'alice',
      receiverId: 'bob',
      offeredItemIds: [1],
      requestedItemIds: [3],
      message: null,
    });
    const dependencies: DependencyOrchestrator = {
      validateItems: async () => ({ ok: true, value: [] }),
      notify: () => Promise.reject(new Error('unexpected')),
      provisionChatRoom: async () => true,
      health: () => ({
        catalog: { state: 'closed', consecutiveFailures: 0, openedAt: null },
        notification: { state: 'closed', consecutiveFailures: 0, openedAt: null },
        chat: { state: 'closed', consecutiveFailures: 0, openedAt: null },
      }),
    };
    const service = createOfferService({ store, dependencies, logger: silentLogger(), metrics });

    const result = await service.transition(offer.id, 'accepted', 'bob');

    expect(result.ok).toBe(true);
    expect(store.records.get(offer.id)?.status).toBe('accepted');
  });

  it('notifies the proposer of a rejection without opening a chat room', async () => {
    const { service, clients } = setup();
    const offer = await proposeDefault(service);

    const result = await service.transition(offer.id, 'rejected', 'bob');

    expect(result.ok && result.offer.respondedAt).toBeInstanceOf(Date);
    expect(clients.notifications.sent.map((payload) => [payload.recipientId, payload.type])).toEqual([
      ['alice', 'trade_offer_rejected'],
    ]);
    expect(clients.chat.rooms).toHaveLength(0);
  });

  it('notifies the receiver when the proposer cancels', async () => {
    const { service, clients } = setup();
    const offer = await proposeDefault(service);

    const result = await service.transition(offer.id, 'cancelled', 'alice');

    expect(result.ok && result.offer.respondedAt).toBeNull();
    expect(clients.notifications.sent.map((payload) => [payload.recipientId, payload.type])).toEqual([
      ['bob', 'trade_offer_cancelled'],
    ]);
  });

  it('keeps the response time when the trade is completed', async () => {
    const { service, clients } = setup();
    const offer = await proposeDefault(service);
    const accepted = await service.transition(offer.id, 'accepted', 'bob');
    if (!accepted.ok) {
      throw new Error('Expected acceptance to succeed');
    }

    const completed = await service.transition(offer.id, 'completed', 'alice');

    expect(completed.ok).toBe(true);
    if (!completed.ok) {
      return;
    }
    expect(completed.offer.status).toBe('completed');
    expect(completed.offer.respondedAt).toEqual(accepted.offer.respondedAt);
    expect(completed.offer.updatedAt.getTime()).toBeGreaterThan(accepted.offer.updatedAt.getTime());
    expect(clients.notifications.sent.at(-1)).toMatchObject({
      recipientId: 'bob',
      type: 'trade_completed',
      relatedUserId: 'alice',
    });
  });

  it('rejects transitions outside the lifecycle', async () => {
    const { service, clients } = setup();
    const offer = await proposeDefault(service);

    expect(await service.transition(offer.id, 'cancelled', 'bob')).toEqual({
      ok: false,
      reason: 'invalid_transition',
    });
    expect(await service.transition(offer.id, 'completed', 'alice')).toEqual({
      ok: false,
      reason: 'invalid_transition',
    });
    expect(await service.transition(offer.id, 'accepted', 'carol')).toEqual({
      ok: false,
      reason: 'unauthorized',
    });
    expect(await service.transition(999, 'accepted', 'bob')).toEqual({
      ok: false,
      reason: 'not_found',
    });
    expect(clients.notifications.sent).toHaveLength(0);
  });

  it('re-evaluates against the winner when another writer commits first', async () => {
    const { service, store, clients } = setup();
    const offer = await proposeDefault(service);
    store.beforeWrite = (offerId) => {
      const record = store.records.get(offerId);
      if (record) {
        record.status = 'cancelled';
      }
      store.beforeWrite = undefined;
    };

    const result = await service.transition(offer.id, 'accepted', 'bob');

    expect(result).toEqual({ ok: false, reason: 'invalid_transition' });
    expect(store.records.get(offer.id)?.status).toBe('cancelled');
    expect(clients.notifications.sent).toHaveLength(0);
    expect(clients.chat.rooms).toHaveLength(0);
  });
});

describe('deleteOffer', () => {
  it('lets the proposer delete a pending offer', async () => {
    const { service, store } = setup();
    const offer = await proposeDefault(service);

    expect(await service.deleteOffer(offer.id, 'alice')).toEqual({ ok: true });
    expect(store.records.has(offer.id)).toBe(false);
  });

  it('refuses the receiver', async () => {
    const { service } = setup();
    const offer = await proposeDefault(service);

    expect(await service.deleteOffer(offer.id, 'bob')).toEqual({ ok: false, reason: 'unauthorized' });
  });

  it('refuses answered offers', async () => {
    const { service } = setup();
    const offer = await proposeDefault(service);
    await service.transition(offer.id, 'rejected', 'bob');

    expect(await service.deleteOffer(offer.id, 'alice')).toEqual({ ok: false, reason: 'invalid_state' });
  });

  it('reports a concurrent answer as an invalid state', async () => {
    const { service, store } = setup();
    const offer = await proposeDefault(service);
    store.beforeWrite = (offerId) => {
      const record = store.records.get(offerId);
      if (record) {
        record.status = 'accepted';
      }
    };

    expect(await service.deleteOffer(offer.id, 'alice')).toEqual({ ok: false, reason: 'invalid_state' });
    expect(store.records.has(offer.id)).toBe(true);
  });

  it('reports unknown offers as not found', async () => {
    const { service } = setup();

    expect(await service.deleteOffer(42, 'alice')).toEqual({ ok: false, reason: 'not_found' });
  });
});

describe('queries', () => {
  it('only shows an offer to its parties', async () => {
    const { service } = setup();
    const offer = await proposeDefault(service);

    expect((await service.getOffer(offer.id, 'bob')).ok).toBe(true);
    expect(await service.getOffer(offer.id, 'carol')).toEqual({ ok: false, reason: 'unauthorized' });
    expect(await service.getOffer(999, 'bob')).toEqual({ ok: false, reason: 'not_found' });
  });

  it('filters listings by role and status', async () => {
    const { service } = setup();
    const first = await proposeDefault(service);
    const second = await proposeDefault(service);
    await service.transition(first.id, 'rejected', 'bob');

    const page = { limit: 20, offset: 0 };
    const ids = async (filter: Parameters<typeof service.listOffers>[0]) =>
      (await service.listOffers(filter)).map((offer) => offer.id);

    expect(await ids({ userId: 'alice', role: 'any', ...page })).toEqual([second.id, first.id]);
    expect(await ids({ userId: 'alice', role: 'receiver', ...page })).toEqual([]);
    expect(await ids({ userId: 'bob', role: 'receiver', status: 'pending', ...page })).toEqual([second.id]);
    expect(await ids({ userId: 'bob', role: 'any', limit: 1, offset: 1 })).toEqual([first.id]);
  });

  it('finds offers that include an item on either side', async () => {
    const { service } = setup();
    const offer = await proposeDefault(service);

    const byRequested = await service.listOffersByItem({ userId: 'alice', itemId: 3 });
    const byOutsider = await service.listOffersByItem({ userId: 'carol', itemId: 3 });

    expect(byRequested.map((entry) => entry.id)).toEqual([offer.id]);
    expect(byOutsider).toEqual([]);
  });

  it('counts offers per status', async () => {
    const { service } = setup();
    const first = await proposeDefault(service);
    await proposeDefault(service);
    await service.transition(first.id, 'accepted', 'bob');

    expect(await service.getStatistics('bob')).toEqual({
      totalOffers: 2,
      pendingOffers: 1,
      acceptedOffers: 1,
      rejectedOffers: 0,
      cancelledOffers: 0,
      completedOffers: 0,
    });
  });
});
