// @module: server-offers-service
// @tags: offers, lifecycle, side-effects

import type { FastifyBaseLogger } from 'fastify';
import type { OfferStatistics, TradeOfferStatus } from '@tradepost/schemas';
import type { OfferListFilter, TradeOfferRecord, TradeOfferStore } from '../db/offers.js';
import type { DependencyOrchestrator } from '../dependencies/orchestrator.js';
import type { MetricsBundle } from '../metrics/registry.js';
import { evaluateDeletion, evaluateTransition, resolveActorRole, type ActorRole } from './lifecycle.js';
import { buildStatusNotification } from './notifications.js';
import { createItemOwnershipValidator, type OwnershipError } from './ownership.js';
import { checkOfferShape, type OfferShapeError, type TradeOfferProposal } from './rules.js';

// A lost race always moves the offer forward; the status graph is two steps deep.
const MAX_TRANSITION_ATTEMPTS = 3;

export type ProposalError = OfferShapeError | OwnershipError;

export type ProposeResult =
  | { ok: true; offer: TradeOfferRecord }
  | { ok: false; error: ProposalError };

export type TransitionResult =
  | { ok: true; offer: TradeOfferRecord }
  | { ok: false; reason: 'not_found' | 'unauthorized' | 'invalid_transition' };

export type DeleteResult =
  | { ok: true }
  | { ok: false; reason: 'not_found' | 'unauthorized' | 'invalid_state' };

export type ViewResult =
  | { ok: true; offer: TradeOfferRecord }
  | { ok: false; reason: 'not_found' | 'unauthorized' };

export interface OfferService {
  proposeTradeOffer(proposal: TradeOfferProposal): Promise<ProposeResult>;
  transition(offerId: number, status: TradeOfferStatus, actorId: string): Promise<TransitionResult>;
  deleteOffer(offerId: number, actorId: string): Promise<DeleteResult>;
  getOffer(offerId: number, actorId: string): Promise<ViewResult>;
  listOffers(filter: OfferListFilter): Promise<TradeOfferRecord[]>;
  listOffersByItem(params: {
    userId: string;
    itemId: number;
    status?: TradeOfferStatus;
  }): Promise<TradeOfferRecord[]>;
  getStatistics(userId: string): Promise<OfferStatistics>;
}

export interface OfferServiceOptions {
  store: TradeOfferStore;
  dependencies: DependencyOrchestrator;
  logger: FastifyBaseLogger;
  metrics: MetricsBundle;
}

export const createOfferService = ({
  store,
  dependencies,
  logger,
  metrics,
}: OfferServiceOptions): OfferService => {
  const ownershipValidator = createItemOwnershipValidator(dependencies);

  /**
   * Best-effort follow-ups to a committed transition. Failures are logged and
   * never reach the caller; the stored status is already authoritative.
   */
  const dispatchSideEffects = async (
    offer: TradeOfferRecord,
    actorRole: ActorRole,
    actorId: string,
  ): Promise<void> => {
    try {
      const notification = buildStatusNotification(offer, actorRole, actorId);
      if (notification) {
        const delivered = await dependencies.notify(notification);
        if (!delivered) {
          logger.warn(
            { offerId: offer.id, status: offer.status, recipientId: notification.recipientId },
            'Trade offer notification was not delivered',
          );
        }
      }

      if (offer.status === 'accepted') {
        const provisioned = await dependencies.provisionChatRoom({
          offerId: offer.id,
          userAId: offer.proposerId,
          userBId: offer.receiverId,
        });
        if (!provisioned) {
          logger.warn({ offerId: offer.id }, 'Chat room was not provisioned for accepted offer');
        }
      }
    } catch (error) {
      logger.error({ err: error, offerId: offer.id }, 'Trade offer side effects failed');
    }
  };

  const proposeTradeOffer: OfferService['proposeTradeOffer'] = async (proposal) => {
    const shapeError = checkOfferShape(proposal);
    if (shapeError) {
      return { ok: false, error: shapeError };
    }

    const ownership = await ownershipValidator.validateOwnership({
      offeredItemIds: proposal.offeredItemIds,
      requestedItemIds: proposal.requestedItemIds,
      proposerId: proposal.proposerId,
      receiverId: proposal.receiverId,
    });
    if (!ownership.ok) {
      logger.info(
        { proposerId: proposal.proposerId, receiverId: proposal.receiverId, error: ownership.error },
        'Trade offer rejected by item validation',
      );
      return { ok: false, error: ownership.error };
    }

    const offer = await store.createOffer({
      proposerId: proposal.proposerId,
      receiverId: proposal.receiverId,
      offeredItemIds: proposal.offeredItemIds,
      requestedItemIds: proposal.requestedItemIds,
      message: proposal.message ?? null,
    });

    metrics.offersCreated.inc();
    logger.info(
      { offerId: offer.id, proposerId: offer.proposerId, receiverId: offer.receiverId },
      'Trade offer created',
    );

    return { ok: true, offer };
  };

  const transition: OfferService['transition'] = async (offerId, status, actorId) => {
    for (let attempt = 1; attempt <= MAX_TRANSITION_ATTEMPTS; attempt += 1) {
      const current = await store.getOfferById(offerId);
      if (!current) {
        return { ok: false, reason: 'not_found' };
      }

      const decision = evaluateTransition(current, status, actorId);
      if (!decision.ok) {
        return decision;
      }

      const updated = await store.updateOfferStatus({
        offerId,
        status,
        expectedStatus: current.status,
        stampRespondedAt: decision.stampRespondedAt,
      });

      if (!updated) {
        logger.info(
          { offerId, expectedStatus: current.status, requestedStatus: status, attempt },
          'Trade offer changed concurrently; re-evaluating transition',
        );
        continue;
      }

      metrics.offerTransitions.inc({ status });
      logger.info(
        { offerId, from: decision.from, to: decision.to, actorId },
        'Trade offer status updated',
      );

      await dispatchSideEffects(updated, decision.role, actorId);
      return { ok: true, offer: updated };
    }

    return { ok: false, reason: 'invalid_transition' };
  };

  const deleteOffer: OfferService['deleteOffer'] = async (offerId, actorId) => {
    const offer = await store.getOfferById(offerId);
    if (!offer) {
      return { ok: false, reason: 'not_found' };
    }

    const decision = evaluateDeletion(offer, actorId);
    if (!decision.ok) {
      return decision;
    }

    const deleted = await store.deleteOffer({ offerId, expectedStatus: 'pending' });
    if (!deleted) {
      const latest = await store.getOfferById(offerId);
      return { ok: false, reason: latest ? 'invalid_state' : 'not_found' };
    }

    logger.info({ offerId, actorId }, 'Trade offer deleted');
    return { ok: true };
  };

  const getOffer: OfferService['getOffer'] = async (offerId, actorId) => {
    const offer = await store.getOfferById(offerId);
    if (!offer) {
      return { ok: false, reason: 'not_found' };
    }

    if (!resolveActorRole(offer, actorId)) {
      return { ok: false, reason: 'unauthorized' };
    }

    return { ok: true, offer };
  };

  return {
    proposeTradeOffer,
    transition,
    deleteOffer,
    getOffer,
    listOffers: (filter) => store.listOffersForUser(filter),
    listOffersByItem: (params) => store.listOffersByItem(params),
    getStatistics: (userId) => store.getStatistics(userId),
  };
};
