// @module: server-auth-jwt
// @tags: auth, jwt, tokens

import jwt from 'jsonwebtoken';
import { userIdSchema } from '@tradepost/schemas';
import type { ServerConfig } from '../config.js';
import type { AuthenticatedUser } from './types.js';

export interface TokenClaims extends jwt.JwtPayload {
  sub: string;
}

function assertValidClaims(claims: jwt.JwtPayload): asserts claims is TokenClaims {
  if (typeof claims.sub !== 'string' || claims.sub.length === 0) {
    throw new Error('Token is missing required subject claim');
  }

  if (!userIdSchema.safeParse(claims.sub).success) {
    throw new Error('Token subject is not a valid user id');
  }
}

export const decodeToken = (
  token: string,
  config: Pick<ServerConfig, 'JWT_SECRET' | 'JWT_ISSUER' | 'JWT_AUDIENCE'>,
): AuthenticatedUser => {
  const decoded = jwt.verify(token, config.JWT_SECRET, {
    issuer: config.JWT_ISSUER,
    audience: config.JWT_AUDIENCE,
  });

  if (typeof decoded === 'string') {
    throw new Error('Unexpected token payload type');
  }

  assertValidClaims(decoded);

  return { id: decoded.sub };
};
