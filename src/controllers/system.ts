import { Request, Response } from 'express';
import HostStore from '../services/hostStore';
import FleetSyncCoordinator from '../services/fleetSync';
import HostStreamBroker from '../services/hostStreamBroker';

export interface SystemControllerDeps {
  store: HostStore;
  fleet: FleetSyncCoordinator;
  broker?: HostStreamBroker;
}

export function createSystemController({ store, fleet, broker }: SystemControllerDeps) {
  return {
    /**
     * GET /api/health
     * Peers treat anything but 200 as an unhealthy node.
     */
    async health(_req: Request, res: Response): Promise<void> {
      const health = {
        status: 'ok',
        uptime: process.uptime(),
        timestamp: Date.now(),
        checks: {
          database: 'unknown',
          discovery: fleet.isScanInProgress() ? 'running' : 'idle',
        },
        streamClients: broker?.getStats().activeClients ?? 0,
        changeFeed: store.getFeedStats(),
      };

      try {
        await store.getAll();
        health.checks.database = 'healthy';
      } catch {
        health.checks.database = 'unhealthy';
        health.status = 'degraded';
      }

      res.status(health.status === 'ok' ? 200 : 503).json(health);
    },

    async version(_req: Request, res: Response): Promise<void> {
      res.status(200).json(fleet.versionInfo());
    },

    /**
     * GET /api/host/local
     */
    async localHost(_req: Request, res: Response): Promise<void> {
      res.status(200).json(await fleet.describeSelf());
    },
  };
}

export type SystemController = ReturnType<typeof createSystemController>;
