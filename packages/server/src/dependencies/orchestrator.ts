// @module: server-dependency-orchestrator
// @tags: resilience, dependencies, catalog, notifications, chat

import type { FastifyBaseLogger } from 'fastify';
import type {
  ChatRoomRequest,
  DependencyName,
  ItemValidation,
  NotificationPayload,
} from '@tradepost/schemas';
import type { CatalogClient } from '../clients/catalog.js';
import type { ChatClient } from '../clients/chat.js';
import type { NotificationClient } from '../clients/notifications.js';
import { BREAKER_STATE_VALUES, type MetricsBundle } from '../metrics/registry.js';
import {
  createCircuitBreaker,
  type CircuitBreaker,
  type DependencyHealth,
} from '../resilience/circuitBreaker.js';
import { isRetryableError } from '../resilience/classify.js';
import { createRetryPolicy } from '../resilience/retry.js';
import { withTimeout } from '../resilience/timeout.js';
import type { CallFailure, RemoteOperation } from '../resilience/types.js';

export type ValidationVerdict = ItemValidation;

export interface DependencyClients {
  catalog: CatalogClient;
  notifications: NotificationClient;
  chat: ChatClient;
}

export interface ResilienceSettings {
  failureThreshold: number;
  resetTimeoutMs: number;
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
  jitter?: boolean;
}

export type UnavailableCause = 'circuit_open' | 'retries_exhausted' | 'rejected';

export type DependencyOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; failure: 'unavailable'; dependency: DependencyName; cause: UnavailableCause };

export interface DependencyOrchestrator {
  validateItems(itemIds: readonly number[]): Promise<DependencyOutcome<ValidationVerdict[]>>;
  notify(payload: NotificationPayload): Promise<boolean>;
  provisionChatRoom(request: ChatRoomRequest): Promise<boolean>;
  health(): Record<DependencyName, DependencyHealth>;
}

export interface DependencyOrchestratorOptions {
  clients: DependencyClients;
  settings: ResilienceSettings;
  logger: FastifyBaseLogger;
  metrics: MetricsBundle;
  isRetryable?: (error: unknown) => boolean;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export const createDependencyOrchestrator = ({
  clients,
  settings,
  logger,
  metrics,
  isRetryable = isRetryableError,
  now,
  sleep,
}: DependencyOrchestratorOptions): DependencyOrchestrator => {
  const buildBreaker = (dependency: DependencyName): CircuitBreaker => {
    metrics.breakerState.set({ dependency }, BREAKER_STATE_VALUES.closed);

    return createCircuitBreaker({
      name: dependency,
      failureThreshold: settings.failureThreshold,
      resetTimeoutMs: settings.resetTimeoutMs,
      now,
      onStateChange: ({ from, to, consecutiveFailures }) => {
        metrics.breakerState.set({ dependency }, BREAKER_STATE_VALUES[to]);
        const details = { dependency, from, to, consecutiveFailures };
        if (to === 'closed') {
          logger.info(details, 'Circuit breaker closed');
        } else {
          logger.warn(details, 'Circuit breaker state changed');
        }
      },
    });
  };

  const breakers: Record<DependencyName, CircuitBreaker> = {
    catalog: buildBreaker('catalog'),
    notification: buildBreaker('notification'),
    chat: buildBreaker('chat'),
  };

  const retryPolicy = createRetryPolicy({
    maxAttempts: settings.maxAttempts,
    baseDelayMs: settings.baseDelayMs,
    maxDelayMs: settings.maxDelayMs,
    jitter: settings.jitter,
    sleep,
  });

  const classifyFailure = (failure: CallFailure): UnavailableCause => {
    if (failure.kind === 'circuit_open') {
      return 'circuit_open';
    }

    return isRetryable(failure.error) ? 'retries_exhausted' : 'rejected';
  };

  // Retry wraps the breaker, which wraps the timed attempt.
  const invoke = async <T>(
    dependency: DependencyName,
    operation: RemoteOperation<T>,
  ): Promise<DependencyOutcome<T>> => {
    const breaker = breakers[dependency];
    const result = await retryPolicy.withRetry(
      () => breaker.call(() => withTimeout(operation, settings.timeoutMs)),
      isRetryable,
      ({ attempt, delayMs, error }) => {
        logger.warn({ dependency, attempt, delayMs, err: error }, 'Dependency call failed; retrying');
      },
    );

    if (result.ok) {
      metrics.dependencyCalls.inc({ dependency, outcome: 'success' });
      return { ok: true, value: result.value };
    }

    const cause = classifyFailure(result.failure);
    metrics.dependencyCalls.inc({ dependency, outcome: cause });
    logger.warn(
      {
        dependency,
        cause,
        attempts: result.attempts,
        err: result.failure.kind === 'error' ? result.failure.error : undefined,
      },
      'Dependency unavailable',
    );

    return { ok: false, failure: 'unavailable', dependency, cause };
  };

  const validateItems: DependencyOrchestrator['validateItems'] = async (itemIds) => {
    const outcome = await invoke('catalog', () => clients.catalog.validateItems(itemIds));
    if (!outcome.ok) {
      return outcome;
    }

    const verdictsById = new Map(outcome.value.map((verdict) => [verdict.itemId, verdict]));
    const verdicts = itemIds.map(
      (itemId): ValidationVerdict =>
        verdictsById.get(itemId) ?? { itemId, exists: false, isActive: false, ownerId: null },
    );

    return { ok: true, value: verdicts };
  };

  const notify: DependencyOrchestrator['notify'] = async (payload) => {
    const outcome = await invoke('notification', () => clients.notifications.send(payload));
    if (!outcome.ok) {
      return false;
    }

    logger.debug(
      { offerId: payload.relatedOfferId, recipientId: payload.recipientId, type: payload.type },
      'Notification delivered',
    );
    return true;
  };

  const provisionChatRoom: DependencyOrchestrator['provisionChatRoom'] = async (request) => {
    const outcome = await invoke('chat', () => clients.chat.createRoom(request));
    if (!outcome.ok) {
      return false;
    }

    logger.debug({ offerId: request.offerId }, 'Chat room provisioned');
    return true;
  };

  return {
    validateItems,
    notify,
    provisionChatRoom,
    health: () => ({
      catalog: breakers.catalog.snapshot(),
      notification: breakers.notification.snapshot(),
      chat: breakers.chat.snapshot(),
    }),
  };
};
