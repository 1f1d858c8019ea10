import express, { Router } from 'express';
import { HostsController } from '../controllers/hosts';
import { validateRequest } from '../middleware/validateRequest';
import {
  addHostSchema,
  pushBodySchema,
  receiveQuerySchema,
  rosterPayloadSchema,
  updateHostSchema,
} from '../validators/hostValidator';

export function createHostsRouter(controller: HostsController): Router {
  const router = express.Router();

  router.get('/', controller.getAllHosts);
  router.get('/export', controller.exportHosts);

  router.post('/import', validateRequest(rosterPayloadSchema, 'body'), controller.importHosts);

  // Gossip endpoints
  router.post(
    '/receive',
    validateRequest(receiveQuerySchema, 'query'),
    validateRequest(rosterPayloadSchema, 'body'),
    controller.receiveHosts
  );
  router.post('/push', validateRequest(pushBodySchema, 'body'), controller.pushHosts);

  router.post('/check', controller.checkAll);
  router.post('/:ip/check', controller.checkOne);

  router.post('/', validateRequest(addHostSchema, 'body'), controller.addHost);
  router.get('/:id', controller.getHost);
  router.put('/:ip', validateRequest(updateHostSchema, 'body'), controller.updateHost);
  router.delete('/:ip', controller.deleteHost);
  router.post('/:id/primary', controller.setPrimary);

  return router;
}

export default createHostsRouter;
