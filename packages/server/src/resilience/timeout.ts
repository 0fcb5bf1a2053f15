import type { RemoteOperation } from './types.js';

export class DependencyTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Dependency call timed out after ${timeoutMs}ms`);
    this.name = 'DependencyTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Rejects once `timeoutMs` elapses. The underlying call is not interrupted;
 * the caller simply stops waiting for it.
 */
export const withTimeout = <T>(operation: RemoteOperation<T>, timeoutMs: number): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new DependencyTimeoutError(timeoutMs));
    }, timeoutMs);

    Promise.resolve()
      .then(operation)
      .then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        },
      );
  });
