import express, { Router } from 'express';
import HostStore from '../services/hostStore';
import FleetSyncCoordinator from '../services/fleetSync';
import HostStreamBroker from '../services/hostStreamBroker';
import { createHostsController } from '../controllers/hosts';
import { createBackupsController } from '../controllers/backups';
import { createDiscoveryController } from '../controllers/discovery';
import { createSystemController } from '../controllers/system';
import { apiLimiter, backupLimiter, scanLimiter } from '../middleware/rateLimiter';
import { validateRequest } from '../middleware/validateRequest';
import { restoreBackupSchema, scanQuerySchema } from '../validators/hostValidator';
import { createHostsRouter } from './hosts';

export interface ApiServices {
  store: HostStore;
  fleet: FleetSyncCoordinator;
  broker?: HostStreamBroker;
  managementPort: number;
  manualMaxBackups: number;
}

const SNAPSHOT_LIMIT = '50mb';

export function createRoutes(services: ApiServices): Router {
  const router = express.Router();

  const hostsController = createHostsController(services);
  const backupsController = createBackupsController(services);
  const discoveryController = createDiscoveryController(services);
  const systemController = createSystemController(services);

  router.use(apiLimiter);

  router.get('/health', systemController.health);
  router.get('/version', systemController.version);
  router.get('/host/local', systemController.localHost);

  router.use('/hosts', createHostsRouter(hostsController));

  router.get('/discovery/status', discoveryController.scanStatus);
  router.post(
    '/discovery/scan',
    scanLimiter,
    validateRequest(scanQuerySchema, 'query'),
    discoveryController.startScan
  );

  router.get('/backups', backupsController.listBackups);
  router.get('/backups/snapshot', backupLimiter, backupsController.downloadSnapshot);
  router.post('/backups', backupLimiter, backupsController.createBackup);
  router.post(
    '/backups/restore',
    backupLimiter,
    validateRequest(restoreBackupSchema, 'body'),
    backupsController.restoreBackup
  );
  router.post(
    '/backups/import',
    backupLimiter,
    express.raw({ type: 'application/octet-stream', limit: SNAPSHOT_LIMIT }),
    backupsController.importSnapshot
  );

  return router;
}

export default createRoutes;
