import { Request, Response } from 'express';
import FleetSyncCoordinator from '../services/fleetSync';

export function createDiscoveryController({ fleet }: { fleet: FleetSyncCoordinator }) {
  return {
    /**
     * POST /api/discovery/scan
     * Starts a scan in the background; only one runs at a time.
     */
    async startScan(_req: Request, res: Response): Promise<void> {
      const { interface_ip }: { interface_ip?: string } = res.locals.query;
      const started = fleet.launchDiscovery(interface_ip);

      if (!started) {
        res.status(409).json({
          error: 'Conflict',
          code: 'SCAN_IN_PROGRESS',
          message: 'Scan already in progress',
        });
        return;
      }

      res.status(202).json({
        message: 'Discovery scan started',
        interface_ip: interface_ip ?? null,
      });
    },

    async scanStatus(_req: Request, res: Response): Promise<void> {
      res.status(200).json({
        scanInProgress: fleet.isScanInProgress(),
        lastScanTime: fleet.getLastScanTime(),
      });
    },
  };
}

export type DiscoveryController = ReturnType<typeof createDiscoveryController>;
