import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import http from 'http';
import { config } from './config';
import { logger } from './utils/logger';
import { APP_VERSION } from './utils/appVersion';
import { AppError, errorHandler, notFoundHandler } from './middleware/errorHandler';
import { ApiServices, createRoutes } from './routes';
import HostStore from './services/hostStore';
import HealthProber from './services/healthProber';
import DiscoveryScanner from './services/discoveryScanner';
import PeerClient from './services/peerClient';
import LocalIdentity from './services/localIdentity';
import FleetSyncCoordinator from './services/fleetSync';
import HostStreamBroker from './services/hostStreamBroker';
import { createWebSocketServer } from './websocket/server';

/**
 * True when `origin` may call the API under the configured allow list.
 */
export function isOriginAllowed(origin: string | undefined, allowed: string[]): boolean {
  if (!origin) {
    return true;
  }
  return allowed.includes('*') || allowed.includes(origin);
}

export function createApp(services: ApiServices): Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(
    cors({
      origin: (origin, callback) => {
        if (isOriginAllowed(origin, config.cors.origins)) {
          return callback(null, true);
        }
        logger.warn(`CORS: Rejected origin: ${origin}`);
        return callback(
          new AppError(`Origin ${origin} is not allowed by CORS policy`, 403, 'FORBIDDEN')
        );
      },
      methods: ['GET', 'POST', 'PUT', 'DELETE'],
    })
  );

  // Rosters of a few thousand hosts fit well within this
  app.use(express.json({ limit: '5mb' }));

  app.use('/api', createRoutes(services));

  // 404 handler
  app.use(notFoundHandler);

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}

async function startServer(): Promise<void> {
  logger.info('Starting signage fleet node', {
    version: APP_VERSION,
    environment: config.server.env,
    nodeRuntime: process.version,
  });

  const store = await HostStore.open(config.database.path, {
    maxBackups: config.backups.maxBackups,
  });
  const identity = new LocalIdentity();
  const fleet = new FleetSyncCoordinator({
    store,
    prober: new HealthProber(),
    scanner: new DiscoveryScanner(),
    peers: new PeerClient(),
    identity,
  });
  const broker = new HostStreamBroker(store);

  const app = createApp({
    store,
    fleet,
    broker,
    managementPort: config.network.managementPort,
    manualMaxBackups: config.backups.manualMaxBackups,
  });

  const server = http.createServer(app);
  const wss = createWebSocketServer(server, broker);

  server.listen(config.server.port, config.server.host, () => {
    logger.info(`Listening at http://${config.server.host}:${config.server.port}`, {
      nodeId: identity.getId(),
      address: identity.primaryAddress(),
    });
    fleet.start();
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    fleet.stop();
    broker.shutdown();
    wss.close();
    server.close(() => {
      store
        .close()
        .then(() => {
          logger.info('Database closed successfully');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error('Error during shutdown:', {
            error: error instanceof Error ? error.message : String(error),
          });
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
  startServer().catch((error: unknown) => {
    logger.error('Failed to start server:', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  });
}
