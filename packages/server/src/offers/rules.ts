import { MAX_OFFER_MESSAGE_LENGTH } from '@tradepost/schemas';

export type ItemSide = 'offered' | 'requested';

export interface TradeOfferProposal {
  proposerId: string;
  receiverId: string;
  offeredItemIds: number[];
  requestedItemIds: number[];
  message?: string | null;
}

export type OfferShapeError =
  | { code: 'self_trade' }
  | { code: 'empty_items'; side: ItemSide }
  | { code: 'duplicate_items'; side: ItemSide; itemIds: number[] }
  | { code: 'overlapping_items'; itemIds: number[] }
  | { code: 'message_too_long'; maxLength: number };

const findDuplicates = (itemIds: readonly number[]): number[] => {
  const seen = new Set<number>();
  const duplicates = new Set<number>();
  for (const itemId of itemIds) {
    if (seen.has(itemId)) {
      duplicates.add(itemId);
    }
    seen.add(itemId);
  }

  return Array.from(duplicates);
};

/**
 * Structural checks that need no remote lookup. Runs before the catalog is
 * contacted so malformed proposals never reach a dependency.
 */
export const checkOfferShape = (proposal: TradeOfferProposal): OfferShapeError | null => {
  if (proposal.proposerId === proposal.receiverId) {
    return { code: 'self_trade' };
  }

  if (proposal.offeredItemIds.length === 0) {
    return { code: 'empty_items', side: 'offered' };
  }

  if (proposal.requestedItemIds.length === 0) {
    return { code: 'empty_items', side: 'requested' };
  }

  const offeredDuplicates = findDuplicates(proposal.offeredItemIds);
  if (offeredDuplicates.length > 0) {
    return { code: 'duplicate_items', side: 'offered', itemIds: offeredDuplicates };
  }

  const requestedDuplicates = findDuplicates(proposal.requestedItemIds);
  if (requestedDuplicates.length > 0) {
    return { code: 'duplicate_items', side: 'requested', itemIds: requestedDuplicates };
  }

  const offered = new Set(proposal.offeredItemIds);
  const overlap = proposal.requestedItemIds.filter((itemId) => offered.has(itemId));
  if (overlap.length > 0) {
    return { code: 'overlapping_items', itemIds: overlap };
  }

  if (proposal.message && proposal.message.length > MAX_OFFER_MESSAGE_LENGTH) {
    return { code: 'message_too_long', maxLength: MAX_OFFER_MESSAGE_LENGTH };
  }

  return null;
};
