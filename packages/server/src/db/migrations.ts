import type { Pool, PoolClient } from 'pg';
import { MAX_USER_ID_LENGTH, TRADE_OFFER_STATUSES } from '@tradepost/schemas';

interface Migration {
  id: string;
  statements: string[];
}

const MIGRATION_TABLE = 'schema_migration';

const STATUS_SQL_LIST = TRADE_OFFER_STATUSES.map((status) => `'${status}'`).join(', ');

const MIGRATIONS: Migration[] = [
  {
    id: '0001_trade_offer',
    statements: [
      `CREATE TABLE IF NOT EXISTS trade_offer (
        id serial PRIMARY KEY,
        proposer_id varchar(${MAX_USER_ID_LENGTH}) NOT NULL,
        receiver_id varchar(${MAX_USER_ID_LENGTH}) NOT NULL,
        offered_item_ids integer[] NOT NULL,
        requested_item_ids integer[] NOT NULL,
        status varchar(20) NOT NULL DEFAULT 'pending',
        message text,
        created_at timestamptz NOT NULL DEFAULT now(),
        updated_at timestamptz NOT NULL DEFAULT now(),
        responded_at timestamptz,
        CONSTRAINT trade_offer_distinct_parties CHECK (proposer_id <> receiver_id),
        CONSTRAINT trade_offer_status_known CHECK (status IN (${STATUS_SQL_LIST})),
        CONSTRAINT trade_offer_items_present CHECK (
          cardinality(offered_item_ids) > 0 AND cardinality(requested_item_ids) > 0
        )
      )`,
      `CREATE INDEX IF NOT EXISTS trade_offer_proposer_idx
         ON trade_offer (proposer_id, created_at DESC)`,
      `CREATE INDEX IF NOT EXISTS trade_offer_receiver_idx
         ON trade_offer (receiver_id, created_at DESC)`,
      `CREATE INDEX IF NOT EXISTS trade_offer_status_idx
         ON trade_offer (status)`,
    ],
  },
  {
    id: '0002_trade_offer_item_indexes',
    statements: [
      `CREATE INDEX IF NOT EXISTS trade_offer_offered_items_idx
         ON trade_offer USING gin (offered_item_ids)`,
      `CREATE INDEX IF NOT EXISTS trade_offer_requested_items_idx
         ON trade_offer USING gin (requested_item_ids)`,
    ],
  },
];

const ensureMigrationTable = async (pool: Pool): Promise<void> => {
  await pool.query(
    `CREATE TABLE IF NOT EXISTS ${MIGRATION_TABLE} (
      id text PRIMARY KEY,
      applied_at timestamptz NOT NULL DEFAULT now()
    )`,
  );
};

const hasMigrationRun = async (client: PoolClient, id: string): Promise<boolean> => {
  const result = await client.query<{ id: string }>(
    `SELECT id FROM ${MIGRATION_TABLE} WHERE id = $1 LIMIT 1`,
    [id],
  );
  return (result.rowCount ?? 0) > 0;
};

const recordMigration = async (client: PoolClient, id: string): Promise<void> => {
  await client.query(
    `INSERT INTO ${MIGRATION_TABLE} (id) VALUES ($1) ON CONFLICT (id) DO NOTHING`,
    [id],
  );
};

export const runMigrations = async (pool: Pool): Promise<void> => {
  await ensureMigrationTable(pool);

  for (const migration of MIGRATIONS) {
    const client = await pool.connect();
    let inTransaction = false;
    try {
      const applied = await hasMigrationRun(client, migration.id);
      if (applied) {
        continue;
      }

      await client.query('BEGIN');
      inTransaction = true;
      for (const statement of migration.statements) {
        await client.query(statement);
      }
      await recordMigration(client, migration.id);
      await client.query('COMMIT');
      inTransaction = false;
    } catch (error) {
      if (inTransaction) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackError) {
          // eslint-disable-next-line no-console
          console.error('Failed to rollback migration', rollbackError);
        }
      }
      throw error;
    } finally {
      client.release();
    }
  }
};
