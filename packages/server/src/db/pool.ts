import type { FastifyBaseLogger } from 'fastify';
import { Pool } from 'pg';
import type { ServerConfig } from '../config.js';

type PoolConfig = Pick<
  ServerConfig,
  'PGHOST' | 'PGPORT' | 'PGDATABASE' | 'PGUSER' | 'PGPASSWORD' | 'PG_POOL_MIN' | 'PG_POOL_MAX'
>;

export const createPgPool = (config: PoolConfig, logger: FastifyBaseLogger): Pool => {
  const pool = new Pool({
    host: config.PGHOST,
    port: config.PGPORT,
    database: config.PGDATABASE,
    user: config.PGUSER,
    password: config.PGPASSWORD,
    min: config.PG_POOL_MIN,
    max: config.PG_POOL_MAX,
    application_name: 'tradepost',
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  pool.on('error', (error) => {
    logger.error({ err: error }, 'Idle Postgres client errored');
  });

  return pool;
};
