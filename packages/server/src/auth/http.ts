// @module: server-auth-http
// @tags: auth, http

import type { ServerConfig } from '../config.js';
import { decodeToken } from './jwt.js';
import type { AuthenticatedUser } from './types.js';

const BEARER_PATTERN = /^bearer\s+(\S+)\s*$/i;

export const extractBearerToken = (authorization?: string): string | null => {
  if (!authorization) {
    return null;
  }

  const match = BEARER_PATTERN.exec(authorization);
  return match?.[1] ?? null;
};

export type ActorResolution =
  | { ok: true; user: AuthenticatedUser }
  | { ok: false; reason: 'missing_token' | 'invalid_token'; error?: unknown };

/** Identifies the acting user from an Authorization header. */
export const resolveActor = (
  authorization: string | undefined,
  config: Pick<ServerConfig, 'JWT_SECRET' | 'JWT_ISSUER' | 'JWT_AUDIENCE'>,
): ActorResolution => {
  const token = extractBearerToken(authorization);
  if (!token) {
    return { ok: false, reason: 'missing_token' };
  }

  try {
    return { ok: true, user: decodeToken(token, config) };
  } catch (error) {
    return { ok: false, reason: 'invalid_token', error };
  }
};
