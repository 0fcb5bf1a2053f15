// @module: server-resilience-retry
// @tags: resilience, retry, backoff

import { setTimeout as delay } from 'node:timers/promises';
import type { CallResult } from './types.js';

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BASE_DELAY_MS = 1000;
export const DEFAULT_MAX_DELAY_MS = 10_000;

export interface RetryPolicyOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Scales each wait by a random factor in [0.5, 1]; never exceeds the capped delay. */
  jitter?: boolean;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface RetryAttempt {
  attempt: number;
  delayMs: number;
  error: unknown;
}

export type RetryResult<T> = CallResult<T> & { attempts: number };

export interface RetryPolicy {
  withRetry<T>(
    operation: () => Promise<CallResult<T>>,
    isRetryable: (error: unknown) => boolean,
    onRetry?: (attempt: RetryAttempt) => void,
  ): Promise<RetryResult<T>>;
}

/** Wait before retry number `retry` (1-based): min(max, base * 2^(retry - 1)). */
export const computeBackoffDelay = (
  retry: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number => Math.min(maxDelayMs, baseDelayMs * 2 ** (retry - 1));

const defaultSleep = async (ms: number): Promise<void> => {
  await delay(ms);
};

export const createRetryPolicy = ({
  maxAttempts = DEFAULT_MAX_ATTEMPTS,
  baseDelayMs = DEFAULT_BASE_DELAY_MS,
  maxDelayMs = DEFAULT_MAX_DELAY_MS,
  jitter = false,
  sleep = defaultSleep,
  random = Math.random,
}: RetryPolicyOptions = {}): RetryPolicy => {
  const nextDelay = (retry: number): number => {
    const capped = computeBackoffDelay(retry, baseDelayMs, maxDelayMs);
    if (!jitter) {
      return capped;
    }

    return Math.floor(capped * (0.5 + random() * 0.5));
  };

  const withRetry: RetryPolicy['withRetry'] = async (operation, isRetryable, onRetry) => {
    for (let attempt = 1; ; attempt += 1) {
      const result = await operation();
      if (result.ok) {
        return { ...result, attempts: attempt };
      }

      const { failure } = result;
      // An open circuit is never retried.
      if (failure.kind === 'circuit_open') {
        return { ...result, attempts: attempt };
      }

      if (attempt >= maxAttempts || !isRetryable(failure.error)) {
        return { ...result, attempts: attempt };
      }

      const delayMs = nextDelay(attempt);
      onRetry?.({ attempt, delayMs, error: failure.error });
      await sleep(delayMs);
    }
  };

  return { withRetry };
};
