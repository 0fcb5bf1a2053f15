import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import {
  createTradeOfferBodySchema,
  itemParamsSchema,
  listOffersQuerySchema,
  offerParamsSchema,
  offersByItemQuerySchema,
  updateTradeOfferBodySchema,
  type TradeOffer,
} from '@tradepost/schemas';
import { resolveActor } from '../auth/http.js';
import type { ServerConfig } from '../config.js';
import type { TradeOfferRecord } from '../db/offers.js';
import type {
  DeleteResult,
  OfferService,
  ProposalError,
  TransitionResult,
  ViewResult,
} from '../offers/service.js';

interface OfferRoutesOptions {
  config: ServerConfig;
  offers: OfferService;
}

interface ErrorReply {
  status: 400 | 403 | 404 | 503;
  body: { message: string; code: string; itemIds?: number[] };
}

export const serializeOffer = (offer: TradeOfferRecord): TradeOffer => ({
  id: offer.id,
  proposerId: offer.proposerId,
  receiverId: offer.receiverId,
  offeredItemIds: [...offer.offeredItemIds],
  requestedItemIds: [...offer.requestedItemIds],
  status: offer.status,
  message: offer.message,
  createdAt: offer.createdAt.toISOString(),
  updatedAt: offer.updatedAt.toISOString(),
  respondedAt: offer.respondedAt ? offer.respondedAt.toISOString() : null,
});

export const mapProposalError = (error: ProposalError): ErrorReply => {
  switch (error.code) {
    case 'self_trade':
      return {
        status: 400,
        body: { code: error.code, message: 'Cannot create trade offer with yourself' },
      };
    case 'empty_items':
      return {
        status: 400,
        body: { code: error.code, message: `At least one ${error.side} item is required` },
      };
    case 'duplicate_items':
      return {
        status: 400,
        body: {
          code: error.code,
          message: `Duplicate item IDs in ${error.side} items`,
          itemIds: error.itemIds,
        },
      };
    case 'overlapping_items':
      return {
        status: 400,
        body: {
          code: error.code,
          message: 'Same item cannot be both offered and requested',
          itemIds: error.itemIds,
        },
      };
    case 'message_too_long':
      return {
        status: 400,
        body: { code: error.code, message: `Message must be at most ${error.maxLength} characters` },
      };
    case 'items_not_found':
      return {
        status: 404,
        body: { code: error.code, message: 'Items not found', itemIds: error.itemIds },
      };
    case 'items_inactive':
      return {
        status: 400,
        body: { code: error.code, message: 'Items are not active', itemIds: error.itemIds },
      };
    case 'wrong_owner':
      return {
        status: 403,
        body: {
          code: error.code,
          message:
            error.role === 'proposer'
              ? 'Proposer does not own offered items'
              : 'Receiver does not own requested items',
          itemIds: error.itemIds,
        },
      };
    case 'dependency_unavailable':
      return {
        status: 503,
        body: { code: error.code, message: 'Catalog service unavailable' },
      };
    default: {
      const exhaustive: never = error;
      return exhaustive;
    }
  }
};

type OfferFailureReason =
  | Extract<TransitionResult, { ok: false }>['reason']
  | Extract<DeleteResult, { ok: false }>['reason']
  | Extract<ViewResult, { ok: false }>['reason'];

const OFFER_FAILURES: Record<OfferFailureReason, ErrorReply> = {
  not_found: { status: 404, body: { code: 'not_found', message: 'Trade offer not found' } },
  unauthorized: {
    status: 403,
    body: { code: 'unauthorized', message: 'User not authorized to modify this trade offer' },
  },
  invalid_transition: {
    status: 400,
    body: { code: 'invalid_transition', message: 'Invalid status transition' },
  },
  invalid_state: {
    status: 400,
    body: { code: 'invalid_state', message: 'Can only delete pending trade offers' },
  },
};

export const offerRoutes: FastifyPluginAsync<OfferRoutesOptions> = async (app, options) => {
  const { config, offers } = options;

  const requireAuth = (request: FastifyRequest): { userId: string } | null => {
    const actor = resolveActor(request.headers.authorization, config);
    if (!actor.ok) {
      if (actor.reason === 'invalid_token') {
        app.log.warn({ err: actor.error }, 'Failed to decode auth token for offer route');
      }
      return null;
    }

    return { userId: actor.user.id };
  };

  app.post('/api/v1/offers', async (request, reply) => {
    const auth = requireAuth(request);
    if (!auth) {
      await reply.code(401).send({ message: 'Authentication required' });
      return;
    }

    const bodyResult = createTradeOfferBodySchema.safeParse(request.body);
    if (!bodyResult.success) {
      await reply.code(400).send({ message: 'Invalid trade offer payload', issues: bodyResult.error.issues });
      return;
    }

    const result = await offers.proposeTradeOffer({
      proposerId: auth.userId,
      ...bodyResult.data,
    });

    if (!result.ok) {
      const { status, body } = mapProposalError(result.error);
      await reply.code(status).send(body);
      return;
    }

    await reply.code(201).send({ offer: serializeOffer(result.offer) });
  });

  app.get('/api/v1/offers', async (request, reply) => {
    const auth = requireAuth(request);
    if (!auth) {
      await reply.code(401).send({ message: 'Authentication required' });
      return;
    }

    const queryResult = listOffersQuerySchema.safeParse(request.query);
    if (!queryResult.success) {
      await reply.code(400).send({ message: 'Invalid query parameters', issues: queryResult.error.issues });
      return;
    }

    const records = await offers.listOffers({ userId: auth.userId, ...queryResult.data });
    await reply.send({ offers: records.map(serializeOffer) });
  });

  app.get('/api/v1/offers/by-item/:itemId', async (request, reply) => {
    const auth = requireAuth(request);
    if (!auth) {
      await reply.code(401).send({ message: 'Authentication required' });
      return;
    }

    const paramsResult = itemParamsSchema.safeParse(request.params);
    const queryResult = offersByItemQuerySchema.safeParse(request.query);
    if (!paramsResult.success || !queryResult.success) {
      const issues = [
        ...(paramsResult.success ? [] : paramsResult.error.issues),
        ...(queryResult.success ? [] : queryResult.error.issues),
      ];
      await reply.code(400).send({ message: 'Invalid request parameters', issues });
      return;
    }

    const records = await offers.listOffersByItem({
      userId: auth.userId,
      itemId: paramsResult.data.itemId,
      status: queryResult.data.status,
    });
    await reply.send({ offers: records.map(serializeOffer) });
  });

  app.get('/api/v1/offers/:offerId', async (request, reply) => {
    const auth = requireAuth(request);
    if (!auth) {
      await reply.code(401).send({ message: 'Authentication required' });
      return;
    }

    const paramsResult = offerParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      await reply.code(400).send({ message: 'Invalid route parameters', issues: paramsResult.error.issues });
      return;
    }

    const result = await offers.getOffer(paramsResult.data.offerId, auth.userId);
    if (!result.ok) {
      const { status, body } = OFFER_FAILURES[result.reason];
      await reply.code(status).send(body);
      return;
    }

    await reply.send({ offer: serializeOffer(result.offer) });
  });

  app.patch('/api/v1/offers/:offerId', async (request, reply) => {
    const auth = requireAuth(request);
    if (!auth) {
      await reply.code(401).send({ message: 'Authentication required' });
      return;
    }

    const paramsResult = offerParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      await reply.code(400).send({ message: 'Invalid route parameters', issues: paramsResult.error.issues });
      return;
    }

    const bodyResult = updateTradeOfferBodySchema.safeParse(request.body);
    if (!bodyResult.success) {
      await reply.code(400).send({ message: 'Invalid status update payload', issues: bodyResult.error.issues });
      return;
    }

    const result = await offers.transition(
      paramsResult.data.offerId,
      bodyResult.data.status,
      auth.userId,
    );
    if (!result.ok) {
      const { status, body } = OFFER_FAILURES[result.reason];
      await reply.code(status).send(body);
      return;
    }

    await reply.send({ offer: serializeOffer(result.offer) });
  });

  app.delete('/api/v1/offers/:offerId', async (request, reply) => {
    const auth = requireAuth(request);
    if (!auth) {
      await reply.code(401).send({ message: 'Authentication required' });
      return;
    }

    const paramsResult = offerParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      await reply.code(400).send({ message: 'Invalid route parameters', issues: paramsResult.error.issues });
      return;
    }

    const result = await offers.deleteOffer(paramsResult.data.offerId, auth.userId);
    if (!result.ok) {
      const { status, body } = OFFER_FAILURES[result.reason];
      await reply.code(status).send(body);
      return;
    }

    await reply.code(204).send();
  });

  app.get('/api/v1/statistics', async (request, reply) => {
    const auth = requireAuth(request);
    if (!auth) {
      await reply.code(401).send({ message: 'Authentication required' });
      return;
    }

    await reply.send(await offers.getStatistics(auth.userId));
  });
};
