// @module: server-runtime
// @tags: fastify, infrastructure, dependencies

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { DependencyHealthResponse, DependencyHealthView } from '@tradepost/schemas';
import type { ReadinessController } from './readiness.js';
import type { ServerConfig } from './config.js';
import { resolveCorsOrigins } from './config.js';
import { offerRoutes } from './api/offers.js';
import { createCatalogClient } from './clients/catalog.js';
import { createChatClient } from './clients/chat.js';
import { createNotificationClient } from './clients/notifications.js';
import { createTradeOfferStore, type TradeOfferStore } from './db/offers.js';
import { runMigrations } from './db/migrations.js';
import { createPgPool } from './db/pool.js';
import {
  createDependencyOrchestrator,
  type DependencyClients,
} from './dependencies/orchestrator.js';
import { createMetricsBundle } from './metrics/registry.js';
import type { DependencyHealth } from './resilience/circuitBreaker.js';
import { createOfferService } from './offers/service.js';

export interface ServerCollaborators {
  offerStore: TradeOfferStore;
  clients: DependencyClients;
}

export interface CreateServerOptions {
  config: ServerConfig;
  readiness: ReadinessController;
  /** Replaces the Postgres store or the HTTP dependency clients. */
  collaborators?: Partial<ServerCollaborators>;
}

const buildDependencyClients = (config: ServerConfig): DependencyClients => {
  const timeoutMs = config.DEPENDENCY_TIMEOUT_MS;
  return {
    catalog: createCatalogClient({ baseUrl: config.CATALOG_SERVICE_URL, timeoutMs }),
    notifications: createNotificationClient({ baseUrl: config.NOTIFICATION_SERVICE_URL, timeoutMs }),
    chat: createChatClient({ baseUrl: config.CHAT_SERVICE_URL, timeoutMs }),
  };
};

const toHealthView = (health: DependencyHealth): DependencyHealthView => ({
  state: health.state,
  consecutiveFailures: health.consecutiveFailures,
  openedAt: health.openedAt === null ? null : new Date(health.openedAt).toISOString(),
});

export const createServer = async ({
  config,
  readiness,
  collaborators = {},
}: CreateServerOptions): Promise<FastifyInstance> => {
  const app = Fastify({
    logger: {
      level: config.LOG_LEVEL,
      transport: config.NODE_ENV === 'development' ? { target: 'pino-pretty' } : undefined,
    },
  });

  let offerStore = collaborators.offerStore;
  if (!offerStore) {
    const pool = createPgPool(config, app.log.child({ scope: 'postgres' }));
    await runMigrations(pool);
    offerStore = createTradeOfferStore(pool);
    app.addHook('onClose', async () => {
      await pool.end();
    });
  }

  const metrics = createMetricsBundle();
  const dependencies = createDependencyOrchestrator({
    clients: collaborators.clients ?? buildDependencyClients(config),
    settings: {
      failureThreshold: config.BREAKER_FAILURE_THRESHOLD,
      resetTimeoutMs: config.BREAKER_RESET_TIMEOUT_MS,
      maxAttempts: config.RETRY_MAX_ATTEMPTS,
      baseDelayMs: config.RETRY_BASE_DELAY_MS,
      maxDelayMs: config.RETRY_MAX_DELAY_MS,
      timeoutMs: config.DEPENDENCY_TIMEOUT_MS,
    },
    logger: app.log.child({ scope: 'dependencies' }),
    metrics,
  });
  const offers = createOfferService({
    store: offerStore,
    dependencies,
    logger: app.log.child({ scope: 'offers' }),
    metrics,
  });

  app.decorate('readiness', readiness);
  app.decorate('dependencies', dependencies);
  await app.register(cors, {
    origin: resolveCorsOrigins(config.CLIENT_ORIGIN),
    credentials: true,
  });

  await app.register(offerRoutes, { config, offers });

  app.get('/healthz', async () => ({ status: 'ok' }));

  app.get('/readyz', async (request, reply) => {
    const phase = app.readiness.phase();
    if (phase !== 'ready') {
      await reply.code(503).send({ status: phase });
      return;
    }

    return { status: phase };
  });

  app.get('/health/dependencies', async (): Promise<DependencyHealthResponse> => {
    const snapshot = app.dependencies.health();
    return {
      dependencies: {
        catalog: toHealthView(snapshot.catalog),
        notification: toHealthView(snapshot.notification),
        chat: toHealthView(snapshot.chat),
      },
    };
  });

  app.get('/metrics', async (request, reply) => {
    reply.header('Content-Type', metrics.registry.contentType);
    return reply.send(await metrics.registry.metrics());
  });

  return app;
};
