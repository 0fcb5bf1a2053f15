// @module: server-offers-lifecycle
// @tags: offers, state-machine

import type { TradeOfferStatus } from '@tradepost/schemas';
import type { TradeOfferRecord } from '../db/offers.js';

export type ActorRole = 'proposer' | 'receiver';

type OfferParties = Pick<TradeOfferRecord, 'proposerId' | 'receiverId'>;

/**
 * Allowed transitions keyed by current status, then requested status, listing
 * the roles permitted to perform them. Every status must appear, so adding a
 * status without deciding its transitions fails to compile.
 */
const TRANSITIONS: Record<TradeOfferStatus, Partial<Record<TradeOfferStatus, readonly ActorRole[]>>> = {
  pending: {
    cancelled: ['proposer'],
    accepted: ['receiver'],
    rejected: ['receiver'],
  },
  accepted: {
    completed: ['proposer', 'receiver'],
  },
  rejected: {},
  cancelled: {},
  completed: {},
};

export const resolveActorRole = (offer: OfferParties, actorId: string): ActorRole | null => {
  if (actorId === offer.proposerId) {
    return 'proposer';
  }

  if (actorId === offer.receiverId) {
    return 'receiver';
  }

  return null;
};

export const counterpartyOf = (offer: OfferParties, role: ActorRole): string =>
  role === 'proposer' ? offer.receiverId : offer.proposerId;

export type TransitionDecision =
  | {
      ok: true;
      role: ActorRole;
      from: TradeOfferStatus;
      to: TradeOfferStatus;
      stampRespondedAt: boolean;
    }
  | { ok: false; reason: 'unauthorized' | 'invalid_transition' };

export const evaluateTransition = (
  offer: OfferParties & Pick<TradeOfferRecord, 'status'>,
  target: TradeOfferStatus,
  actorId: string,
): TransitionDecision => {
  const role = resolveActorRole(offer, actorId);
  if (!role) {
    return { ok: false, reason: 'unauthorized' };
  }

  const allowedRoles = TRANSITIONS[offer.status][target];
  if (!allowedRoles || !allowedRoles.includes(role)) {
    return { ok: false, reason: 'invalid_transition' };
  }

  return {
    ok: true,
    role,
    from: offer.status,
    to: target,
    stampRespondedAt: offer.status === 'pending' && (target === 'accepted' || target === 'rejected'),
  };
};

export type DeletionDecision = { ok: true } | { ok: false; reason: 'unauthorized' | 'invalid_state' };

export const evaluateDeletion = (
  offer: OfferParties & Pick<TradeOfferRecord, 'status'>,
  actorId: string,
): DeletionDecision => {
  if (resolveActorRole(offer, actorId) !== 'proposer') {
    return { ok: false, reason: 'unauthorized' };
  }

  if (offer.status !== 'pending') {
    return { ok: false, reason: 'invalid_state' };
  }

  return { ok: true };
};
