// @module: server-resilience-types
// @tags: resilience, results

export type CallFailure =
  | { kind: 'circuit_open'; dependency: string }
  | { kind: 'error'; dependency: string; error: unknown };

export type CallResult<T> = { ok: true; value: T } | { ok: false; failure: CallFailure };

export type RemoteOperation<T> = () => Promise<T>;
