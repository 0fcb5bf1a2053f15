// @module: server-resilience-breaker
// @tags: resilience, circuit-breaker, dependencies

import type { BreakerState } from '@tradepost/schemas';
import type { CallResult, RemoteOperation } from './types.js';

export const DEFAULT_FAILURE_THRESHOLD = 5;
export const DEFAULT_RESET_TIMEOUT_MS = 60_000;

export interface DependencyHealth {
  state: BreakerState;
  consecutiveFailures: number;
  openedAt: number | null;
}

export interface BreakerStateChange {
  name: string;
  from: BreakerState;
  to: BreakerState;
  consecutiveFailures: number;
}

export interface CircuitBreakerOptions {
  name: string;
  failureThreshold?: number;
  resetTimeoutMs?: number;
  now?: () => number;
  onStateChange?: (change: BreakerStateChange) => void;
}

export interface CircuitBreaker {
  readonly name: string;
  call<T>(operation: RemoteOperation<T>): Promise<CallResult<T>>;
  snapshot(): DependencyHealth;
}

type Admission = 'pass' | 'probe' | 'reject';

/**
 * Three-state breaker guarding a single dependency.
 *
 * All bookkeeping runs synchronously between awaits, so admission and
 * resolution are atomic with respect to other callers on the event loop.
 * While half-open, only one probe may be outstanding; everyone else is
 * rejected as if the circuit were open until the probe settles.
 */
export const createCircuitBreaker = ({
  name,
  failureThreshold = DEFAULT_FAILURE_THRESHOLD,
  resetTimeoutMs = DEFAULT_RESET_TIMEOUT_MS,
  now = Date.now,
  onStateChange,
}: CircuitBreakerOptions): CircuitBreaker => {
  let state: BreakerState = 'closed';
  let consecutiveFailures = 0;
  let openedAt: number | null = null;
  let probeInFlight = false;

  const transitionTo = (next: BreakerState): void => {
    if (state === next) {
      return;
    }

    const from = state;
    state = next;
    onStateChange?.({ name, from, to: next, consecutiveFailures });
  };

  const trip = (): void => {
    openedAt = now();
    transitionTo('open');
  };

  const admit = (): Admission => {
    if (state === 'open') {
      if (openedAt === null || now() - openedAt < resetTimeoutMs) {
        return 'reject';
      }

      transitionTo('half_open');
    }

    if (state === 'half_open') {
      if (probeInFlight) {
        return 'reject';
      }

      probeInFlight = true;
      return 'probe';
    }

    return 'pass';
  };

  const recordSuccess = (probe: boolean): void => {
    if (probe) {
      probeInFlight = false;
      consecutiveFailures = 0;
      openedAt = null;
      transitionTo('closed');
      return;
    }

    // Late results from calls admitted before the circuit tripped are ignored.
    if (state === 'closed') {
      consecutiveFailures = 0;
    }
  };

  const recordFailure = (probe: boolean): void => {
    if (probe) {
      probeInFlight = false;
      consecutiveFailures += 1;
      trip();
      return;
    }

    if (state !== 'closed') {
      return;
    }

    consecutiveFailures += 1;
    if (consecutiveFailures >= failureThreshold) {
      trip();
    }
  };

  const call = async <T>(operation: RemoteOperation<T>): Promise<CallResult<T>> => {
    const admission = admit();
    if (admission === 'reject') {
      return { ok: false, failure: { kind: 'circuit_open', dependency: name } };
    }

    const probe = admission === 'probe';
    let value: T;
    try {
      value = await operation();
    } catch (error) {
      recordFailure(probe);
      return { ok: false, failure: { kind: 'error', dependency: name, error } };
    }

    recordSuccess(probe);
    return { ok: true, value };
  };

  return {
    name,
    call,
    snapshot: () => ({ state, consecutiveFailures, openedAt }),
  };
};
