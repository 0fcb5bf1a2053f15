// @module: shared-rest-offers
// @tags: rest, offers, schema
import { z } from 'zod';

export const MAX_OFFER_MESSAGE_LENGTH = 1000;
export const MAX_USER_ID_LENGTH = 100;
export const MAX_OFFER_PAGE_SIZE = 100;
export const DEFAULT_OFFER_PAGE_SIZE = 20;
/** Upper bound of a Postgres `integer`, the type of offer and item ids. */
export const MAX_RECORD_ID = 2_147_483_647;

export const TRADE_OFFER_STATUSES = [
  'pending',
  'accepted',
  'rejected',
  'cancelled',
  'completed',
] as const;

export const tradeOfferStatusSchema = z.enum(TRADE_OFFER_STATUSES);

export type TradeOfferStatus = z.infer<typeof tradeOfferStatusSchema>;

export const userIdSchema = z.string().min(1).max(MAX_USER_ID_LENGTH);

export const itemIdSchema = z.number().int().positive().max(MAX_RECORD_ID);

export const offerRoleFilterSchema = z.enum(['any', 'proposer', 'receiver']);

export type OfferRoleFilter = z.infer<typeof offerRoleFilterSchema>;

export const createTradeOfferBodySchema = z.object({
  receiverId: userIdSchema,
  offeredItemIds: z.array(itemIdSchema).min(1, 'offeredItemIds must not be empty'),
  requestedItemIds: z.array(itemIdSchema).min(1, 'requestedItemIds must not be empty'),
  message: z.string().max(MAX_OFFER_MESSAGE_LENGTH).optional(),
});

export type CreateTradeOfferBody = z.infer<typeof createTradeOfferBodySchema>;

export const updateTradeOfferBodySchema = z.object({
  status: tradeOfferStatusSchema,
});

export const offerParamsSchema = z.object({
  offerId: z.coerce
    .number()
    .int()
    .positive('offerId must be a positive integer')
    .max(MAX_RECORD_ID, 'offerId is out of range'),
});

export const itemParamsSchema = z.object({
  itemId: z.coerce
    .number()
    .int()
    .positive('itemId must be a positive integer')
    .max(MAX_RECORD_ID, 'itemId is out of range'),
});

export const listOffersQuerySchema = z.object({
  role: offerRoleFilterSchema.default('any'),
  status: tradeOfferStatusSchema.optional(),
  limit: z.coerce.number().int().min(1).max(MAX_OFFER_PAGE_SIZE).default(DEFAULT_OFFER_PAGE_SIZE),
  offset: z.coerce.number().int().min(0).default(0),
});

export type ListOffersQuery = z.infer<typeof listOffersQuerySchema>;

export const offersByItemQuerySchema = z.object({
  status: tradeOfferStatusSchema.optional(),
});

export const tradeOfferSchema = z.object({
  id: z.number().int().positive().max(MAX_RECORD_ID),
  proposerId: userIdSchema,
  receiverId: userIdSchema,
  offeredItemIds: z.array(itemIdSchema).min(1),
  requestedItemIds: z.array(itemIdSchema).min(1),
  status: tradeOfferStatusSchema,
  message: z.string().max(MAX_OFFER_MESSAGE_LENGTH).nullable(),
  createdAt: z.string().min(1),
  updatedAt: z.string().min(1),
  respondedAt: z.string().min(1).nullable(),
});

export type TradeOffer = z.infer<typeof tradeOfferSchema>;

export const tradeOfferResponseSchema = z.object({
  offer: tradeOfferSchema,
});

export const tradeOfferListResponseSchema = z.object({
  offers: z.array(tradeOfferSchema),
});

export const offerStatisticsSchema = z.object({
  totalOffers: z.number().int().nonnegative(),
  pendingOffers: z.number().int().nonnegative(),
  acceptedOffers: z.number().int().nonnegative(),
  rejectedOffers: z.number().int().nonnegative(),
  cancelledOffers: z.number().int().nonnegative(),
  completedOffers: z.number().int().nonnegative(),
});

export type OfferStatistics = z.infer<typeof offerStatisticsSchema>;
