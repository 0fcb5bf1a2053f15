import type { NotificationPayload, NotificationType, TradeOfferStatus } from '@tradepost/schemas';
import type { TradeOfferRecord } from '../db/offers.js';
import { counterpartyOf, type ActorRole } from './lifecycle.js';

interface NotificationCopy {
  type: NotificationType;
  title: string;
  body: string;
}

const copyForStatus = (status: TradeOfferStatus): NotificationCopy | null => {
  switch (status) {
    case 'accepted':
      return {
        type: 'trade_offer_accepted',
        title: 'Trade offer accepted',
        body: 'Good news! Your trade offer has been accepted.',
      };
    case 'rejected':
      return {
        type: 'trade_offer_rejected',
        title: 'Trade offer declined',
        body: 'Your trade offer was declined. Keep exploring!',
      };
    case 'cancelled':
      return {
        type: 'trade_offer_cancelled',
        title: 'Trade offer cancelled',
        body: 'A trade offer you received has been cancelled.',
      };
    case 'completed':
      return {
        type: 'trade_completed',
        title: 'Trade completed',
        body: 'Congratulations! Your trade has been completed.',
      };
    case 'pending':
      return null;
    default: {
      const exhaustive: never = status;
      return exhaustive;
    }
  }
};

/** Notification for the party that did not perform the transition, if the new status has one. */
export const buildStatusNotification = (
  offer: Pick<TradeOfferRecord, 'id' | 'proposerId' | 'receiverId' | 'status'>,
  actorRole: ActorRole,
  actorId: string,
): NotificationPayload | null => {
  const copy = copyForStatus(offer.status);
  if (!copy) {
    return null;
  }

  return {
    recipientId: counterpartyOf(offer, actorRole),
    type: copy.type,
    title: copy.title,
    body: copy.body,
    relatedOfferId: offer.id,
    relatedUserId: actorId,
  };
};
