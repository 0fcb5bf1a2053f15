import { z } from 'zod';
import {
  tradeOfferStatusSchema,
  type ListOffersQuery,
  type OfferRoleFilter,
  type OfferStatistics,
  type TradeOfferStatus,
} from '@tradepost/schemas';

export interface TradeOfferRecord {
  id: number;
  proposerId: string;
  receiverId: string;
  offeredItemIds: number[];
  requestedItemIds: number[];
  status: TradeOfferStatus;
  message: string | null;
  createdAt: Date;
  updatedAt: Date;
  respondedAt: Date | null;
}

export interface NewTradeOffer {
  proposerId: string;
  receiverId: string;
  offeredItemIds: number[];
  requestedItemIds: number[];
  message: string | null;
}

export interface OfferListFilter extends ListOffersQuery {
  userId: string;
}

export interface TradeOfferStore {
  createOffer(offer: NewTradeOffer): Promise<TradeOfferRecord>;
  getOfferById(offerId: number): Promise<TradeOfferRecord | null>;
  /**
   * Conditional write: only applies while the stored status still equals
   * `expectedStatus`. Returns null when another writer got there first.
   */
  updateOfferStatus(params: {
    offerId: number;
    status: TradeOfferStatus;
    expectedStatus: TradeOfferStatus;
    stampRespondedAt: boolean;
  }): Promise<TradeOfferRecord | null>;
  deleteOffer(params: { offerId: number; expectedStatus: TradeOfferStatus }): Promise<boolean>;
  listOffersForUser(filter: OfferListFilter): Promise<TradeOfferRecord[]>;
  listOffersByItem(params: {
    userId: string;
    itemId: number;
    status?: TradeOfferStatus;
  }): Promise<TradeOfferRecord[]>;
  getStatistics(userId: string): Promise<OfferStatistics>;
}

/** The slice of `pg.Pool` the store runs its statements through. */
export interface OfferQueryRunner {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

const tradeOfferRowSchema = z.object({
  id: z.number().int(),
  proposer_id: z.string(),
  receiver_id: z.string(),
  offered_item_ids: z.array(z.number().int()),
  requested_item_ids: z.array(z.number().int()),
  status: tradeOfferStatusSchema,
  message: z.string().nullable(),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date(),
  responded_at: z.coerce.date().nullable(),
});

const statusCountRowSchema = z.object({
  status: z.string(),
  count: z.coerce.number().int(),
});

const OFFER_COLUMNS = `id, proposer_id, receiver_id, offered_item_ids, requested_item_ids, status,
                       message, created_at, updated_at, responded_at`;

const mapOfferRow = (raw: unknown): TradeOfferRecord => {
  const row = tradeOfferRowSchema.parse(raw);
  return {
    id: row.id,
    proposerId: row.proposer_id,
    receiverId: row.receiver_id,
    offeredItemIds: row.offered_item_ids,
    requestedItemIds: row.requested_item_ids,
    status: row.status,
    message: row.message,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    respondedAt: row.responded_at,
  };
};

const ROLE_CLAUSES: Record<OfferRoleFilter, string> = {
  any: '(proposer_id = $1 OR receiver_id = $1)',
  proposer: 'proposer_id = $1',
  receiver: 'receiver_id = $1',
};

export const emptyStatistics = (): OfferStatistics => ({
  totalOffers: 0,
  pendingOffers: 0,
  acceptedOffers: 0,
  rejectedOffers: 0,
  cancelledOffers: 0,
  completedOffers: 0,
});

export const STATISTICS_KEYS: Record<TradeOfferStatus, keyof OfferStatistics> = {
  pending: 'pendingOffers',
  accepted: 'acceptedOffers',
  rejected: 'rejectedOffers',
  cancelled: 'cancelledOffers',
  completed: 'completedOffers',
};

export const createTradeOfferStore = (pool: OfferQueryRunner): TradeOfferStore => {
  const createOffer: TradeOfferStore['createOffer'] = async ({
    proposerId,
    receiverId,
    offeredItemIds,
    requestedItemIds,
    message,
  }) => {
    const result = await pool.query(
      `INSERT INTO trade_offer (proposer_id, receiver_id, offered_item_ids, requested_item_ids, status, message)
         VALUES ($1, $2, $3::integer[], $4::integer[], 'pending', $5)
      RETURNING ${OFFER_COLUMNS}`,
      [proposerId, receiverId, offeredItemIds, requestedItemIds, message],
    );

    if (result.rowCount === 0) {
      throw new Error('Failed to insert trade offer');
    }

    return mapOfferRow(result.rows[0]);
  };

  const getOfferById: TradeOfferStore['getOfferById'] = async (offerId) => {
    const result = await pool.query(
      `SELECT ${OFFER_COLUMNS}
         FROM trade_offer
        WHERE id = $1`,
      [offerId],
    );

    if (result.rowCount === 0) {
      return null;
    }

    return mapOfferRow(result.rows[0]);
  };

  const updateOfferStatus: TradeOfferStore['updateOfferStatus'] = async ({
    offerId,
    status,
    expectedStatus,
    stampRespondedAt,
  }) => {
    const result = await pool.query(
      `UPDATE trade_offer
          SET status = $2,
              updated_at = now(),
              responded_at = CASE WHEN $4::boolean THEN COALESCE(responded_at, now()) ELSE responded_at END
        WHERE id = $1
          AND status = $3
        RETURNING ${OFFER_COLUMNS}`,
      [offerId, status, expectedStatus, stampRespondedAt],
    );

    if (result.rowCount === 0) {
      return null;
    }

    return mapOfferRow(result.rows[0]);
  };

  const deleteOffer: TradeOfferStore['deleteOffer'] = async ({ offerId, expectedStatus }) => {
    const result = await pool.query(
      `DELETE FROM trade_offer
        WHERE id = $1
          AND status = $2`,
      [offerId, expectedStatus],
    );

    return (result.rowCount ?? 0) > 0;
  };

  const listOffersForUser: TradeOfferStore['listOffersForUser'] = async ({
    userId,
    role,
    status,
    limit,
    offset,
  }) => {
    const result = await pool.query(
      `SELECT ${OFFER_COLUMNS}
         FROM trade_offer
        WHERE ${ROLE_CLAUSES[role]}
          AND ($2::text IS NULL OR status = $2)
        ORDER BY created_at DESC, id DESC
        LIMIT $3 OFFSET $4`,
      [userId, status ?? null, limit, offset],
    );

    return result.rows.map((row) => mapOfferRow(row));
  };

  const listOffersByItem: TradeOfferStore['listOffersByItem'] = async ({ userId, itemId, status }) => {
    const result = await pool.query(
      `SELECT ${OFFER_COLUMNS}
         FROM trade_offer
        WHERE (proposer_id = $1 OR receiver_id = $1)
          AND ($2 = ANY(offered_item_ids) OR $2 = ANY(requested_item_ids))
          AND ($3::text IS NULL OR status = $3)
        ORDER BY created_at DESC, id DESC`,
      [userId, itemId, status ?? null],
    );

    return result.rows.map((row) => mapOfferRow(row));
  };

  const getStatistics: TradeOfferStore['getStatistics'] = async (userId) => {
    const result = await pool.query(
      `SELECT status, count(*)::integer AS count
         FROM trade_offer
        WHERE proposer_id = $1 OR receiver_id = $1
        GROUP BY status`,
      [userId],
    );

    const statistics = emptyStatistics();
    for (const raw of result.rows) {
      const row = statusCountRowSchema.parse(raw);
      const parsed = tradeOfferStatusSchema.safeParse(row.status);
      if (!parsed.success) {
        continue;
      }

      statistics[STATISTICS_KEYS[parsed.data]] += row.count;
      statistics.totalOffers += row.count;
    }

    return statistics;
  };

  return {
    createOffer,
    getOfferById,
    updateOfferStatus,
    deleteOffer,
    listOffersForUser,
    listOffersByItem,
    getStatistics,
  };
};
