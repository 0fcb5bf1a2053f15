import { describe, expect, it } from 'vitest';
import type { NotificationPayload } from '@tradepost/schemas';
import {
  createDependencyOrchestrator,
  type DependencyOrchestratorOptions,
  type ResilienceSettings,
} from '../dependencies/orchestrator.js';
import { createMetricsBundle, type MetricsBundle } from '../metrics/registry.js';
import {
  createFakeClients,
  isTransportError,
  noSleep,
  silentLogger,
  TransportError,
  type FakeDependencyClients,
} from './helpers/fakes.js';

const SETTINGS: ResilienceSettings = {
  failureThreshold: 5,
  resetTimeoutMs: 60_000,
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 10_000,
  timeoutMs: 5_000,
};

const NOTIFICATION: NotificationPayload = {
  recipientId: 'alice',
  type: 'trade_offer_accepted',
  title: 'Trade offer accepted',
  body: 'Good news! Your trade offer has been accepted.',
  relatedOfferId: 7,
  relatedUserId: 'bob',
};

const setup = (overrides: Partial<DependencyOrchestratorOptions> = {}) => {
  const clients: FakeDependencyClients = createFakeClients({ 1: { ownerId: 'alice' } });
  const metrics: MetricsBundle = createMetricsBundle();
  let current = 0;
  const clock = {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
  const orchestrator = createDependencyOrchestrator({
    clients,
    settings: SETTINGS,
    logger: silentLogger(),
    metrics,
    isRetryable: isTransportError,
    now: clock.now,
    sleep: noSleep,
    ...overrides,
  });

  return { clients, metrics, clock, orchestrator };
};

const counterValue = async (
  metrics: MetricsBundle,
  labels: { dependency: string; outcome: string },
): Promise<number | undefined> => {
  const snapshot = await metrics.dependencyCalls.get();
  return snapshot.values.find(
    (entry) => entry.labels.dependency === labels.dependency && entry.labels.outcome === labels.outcome,
  )?.value;
};

describe('createDependencyOrchestrator', () => {
  it('returns one verdict per requested id in request order', async () => {
    const { orchestrator } = setup();

    const outcome = await orchestrator.validateItems([2, 1]);

    expect(outcome).toEqual({
      ok: true,
      value: [
        { itemId: 2, exists: false, isActive: false, ownerId: null },
        { itemId: 1, exists: true, isActive: true, ownerId: 'alice' },
      ],
    });
  });

  it('retries transient failures and reports exhaustion', async () => {
    const { clients, orchestrator, metrics } = setup();
    clients.catalog.failWith = new TransportError();

    const outcome = await orchestrator.validateItems([1]);

    expect(outcome).toEqual({
      ok: false,
      failure: 'unavailable',
      dependency: 'catalog',
      cause: 'retries_exhausted',
    });
    expect(clients.catalog.calls).toHaveLength(3);
    expect(await counterValue(metrics, { dependency: 'catalog', outcome: 'retries_exhausted' })).toBe(1);
  });

  it('recovers when a retry succeeds', async () => {
    const { clients, orchestrator } = setup();
    let failuresLeft = 2;
    const validate = clients.catalog.validateItems.bind(clients.catalog);
    clients.catalog.validateItems = async (itemIds) => {
      if (failuresLeft > 0) {
        failuresLeft -= 1;
        throw new TransportError();
      }
      return validate(itemIds);
    };

    const outcome = await orchestrator.validateItems([1]);

    expect(outcome.ok).toBe(true);
    expect(orchestrator.health().catalog).toEqual({
      state: 'closed',
      consecutiveFailures: 0,
      openedAt: null,
    });
  });

  it('does not retry permanent failures', async () => {
    const { clients, orchestrator } = setup();
    clients.catalog.failWith = new Error('Unexpected payload');

    const outcome = await orchestrator.validateItems([1]);

    expect(outcome).toMatchObject({ ok: false, cause: 'rejected' });
    expect(clients.catalog.calls).toHaveLength(1);
  });

  it('opens the circuit after repeated failures and then fails fast', async () => {
    const { clients, orchestrator, metrics, clock } = setup();
    clients.catalog.failWith = new TransportError();
    clock.advance(500);

    await orchestrator.validateItems([1]);
    const second = await orchestrator.validateItems([1]);

    expect(second).toMatchObject({ ok: false, cause: 'circuit_open' });
    expect(clients.catalog.calls).toHaveLength(5);
    expect(orchestrator.health().catalog).toEqual({
      state: 'open',
      consecutiveFailures: 5,
      openedAt: 500,
    });

    const third = await orchestrator.validateItems([1]);
    expect(third).toMatchObject({ ok: false, cause: 'circuit_open' });
    expect(clients.catalog.calls).toHaveLength(5);

    const gauge = await metrics.breakerState.get();
    expect(gauge.values.find((entry) => entry.labels.dependency === 'catalog')?.value).toBe(1);
  });

  it('lets a probe through after the reset timeout and closes on success', async () => {
    const { clients, orchestrator, clock } = setup();
    clients.catalog.failWith = new TransportError();
    await orchestrator.validateItems([1]);
    await orchestrator.validateItems([1]);
    expect(orchestrator.health().catalog.state).toBe('open');

    clients.catalog.failWith = null;
    clock.advance(60_000);
    const outcome = await orchestrator.validateItems([1]);

    expect(outcome.ok).toBe(true);
    expect(orchestrator.health().catalog.state).toBe('closed');
  });

  it('keeps breakers independent per dependency', async () => {
    const { clients, orchestrator } = setup();
    clients.catalog.failWith = new TransportError();
    await orchestrator.validateItems([1]);
    await orchestrator.validateItems([1]);

    expect(await orchestrator.notify(NOTIFICATION)).toBe(true);
    expect(orchestrator.health()).toMatchObject({
      catalog: { state: 'open' },
      notification: { state: 'closed' },
      chat: { state: 'closed' },
    });
  });

  it('reports undelivered notifications as false', async () => {
    const { clients, orchestrator } = setup();
    clients.notifications.failWith = new TransportError();

    expect(await orchestrator.notify(NOTIFICATION)).toBe(false);
    expect(clients.notifications.attempts).toBe(3);
  });

  it('provisions chat rooms through the chat client', async () => {
    const { clients, orchestrator } = setup();

    const provisioned = await orchestrator.provisionChatRoom({ offerId: 7, userAId: 'alice', userBId: 'bob' });

    expect(provisioned).toBe(true);
    expect(clients.chat.rooms).toEqual([{ offerId: 7, userAId: 'alice', userBId: 'bob' }]);
  });

  it('treats a hung dependency as a retryable timeout', async () => {
    const { clients, orchestrator } = setup({
      settings: { ...SETTINGS, timeoutMs: 5 },
      isRetryable: undefined,
    });
    clients.chat.createRoom = () => new Promise<void>(() => undefined);

    const provisioned = await orchestrator.provisionChatRoom({ offerId: 1, userAId: 'a', userBId: 'b' });

    expect(provisioned).toBe(false);
    expect(orchestrator.health().chat.consecutiveFailures).toBe(3);
  });
});
