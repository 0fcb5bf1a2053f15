// @module: server-bootstrap
// @tags: entrypoint, lifecycle, readiness

import 'dotenv/config';
import { ZodError } from 'zod';
import { loadConfig, type ServerConfig } from './config.js';
import { createReadinessController } from './readiness.js';
import { createServer } from './server.js';

const readConfig = (): ServerConfig => {
  try {
    return loadConfig();
  } catch (error) {
    const details = error instanceof ZodError ? error.issues : error;
    // eslint-disable-next-line no-console
    console.error('Invalid configuration', details);
    process.exit(1);
  }
};

const bootstrap = async (): Promise<void> => {
  const config = readConfig();
  const readiness = createReadinessController();
  const app = await createServer({ config, readiness });

  let shuttingDown = false;
  const shutdownServer = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;
    readiness.markDraining();
    app.log.info({ signal }, 'Received shutdown signal');
    try {
      await app.close();
    } catch (error) {
      app.log.error({ err: error }, 'Error while shutting down server');
    }
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      void shutdownServer(signal).then(() => process.exit(0));
    });
  }

  try {
    await app.listen({ host: config.HOST, port: config.PORT });
    readiness.markReady();
    app.log.info(
      {
        host: config.HOST,
        port: config.PORT,
        catalog: config.CATALOG_SERVICE_URL,
        notifications: config.NOTIFICATION_SERVICE_URL,
        chat: config.CHAT_SERVICE_URL,
      },
      'Trade offer service is listening',
    );
  } catch (error) {
    app.log.error({ err: error }, 'Failed to start server');
    readiness.markDraining();
    process.exit(1);
  }
};

void bootstrap();
