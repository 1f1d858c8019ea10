import { Request, Response } from 'express';
import { logger } from '../utils/logger';
import {
  clearVpnNetwork,
  dashboardUrlFor,
  resetPrimaryNetwork,
  resetVpnNetwork,
} from '../utils/hostRecord';
import HostStore from '../services/hostStore';
import FleetSyncCoordinator from '../services/fleetSync';
import { UpdateHostInput } from '../validators/hostValidator';
import { Host } from '../types';

export interface HostsControllerDeps {
  store: HostStore;
  fleet: FleetSyncCoordinator;
  managementPort: number;
}

export interface AddHostInput {
  nickname: string;
  ip_address: string;
  vpn_ip_address: string;
  hostname: string;
  notes: string;
}

/**
 * Applies an inline edit. Moving an address resets the network state that
 * was measured on the old one.
 */
export function applyHostEdit(host: Host, edit: UpdateHostInput, port: number): void {
  if (edit.nickname !== undefined) {
    host.nickname = edit.nickname;
  }
  if (edit.notes !== undefined) {
    host.notes = edit.notes;
  }
  if (edit.ip_address !== undefined && edit.ip_address !== host.ip_address) {
    host.ip_address = edit.ip_address;
    resetPrimaryNetwork(host, port);
  }
  if (edit.vpn_ip_address !== undefined) {
    if (edit.vpn_ip_address === '') {
      clearVpnNetwork(host);
    } else if (edit.vpn_ip_address !== host.vpn_ip_address) {
      host.vpn_ip_address = edit.vpn_ip_address;
      resetVpnNetwork(host, port);
    }
  }
}

export function createHostsController({ store, fleet, managementPort }: HostsControllerDeps) {
  return {
    /**
     * GET /api/hosts
     */
    async getAllHosts(_req: Request, res: Response): Promise<void> {
      res.status(200).json(await store.getAll());
    },

    /**
     * GET /api/hosts/export
     */
    async exportHosts(_req: Request, res: Response): Promise<void> {
      const hosts = await store.getAll();
      res.setHeader('Content-Disposition', 'attachment; filename="hosts.json"');
      res.status(200).json(hosts);
    },

    /**
     * POST /api/hosts/import
     */
    async importHosts(req: Request, res: Response): Promise<void> {
      const hosts: Host[] = req.body;
      const result = await fleet.receive(hosts, { merge: false });
      logger.info('Imported roster from file', { hosts: result.applied });
      res.status(200).json(result);
    },

    async getHost(req: Request, res: Response): Promise<void> {
      res.status(200).json(await store.getById(req.params.id));
    },

    /**
     * POST /api/hosts
     */
    async addHost(req: Request, res: Response): Promise<void> {
      const input: AddHostInput = req.body;
      const host = await store.add({
        ...input,
        dashboard_url: dashboardUrlFor(input.ip_address, managementPort),
        dashboard_url_vpn: dashboardUrlFor(input.vpn_ip_address, managementPort),
      });
      fleet.launchProbe(host);
      res.status(201).json(host);
    },

    /**
     * PUT /api/hosts/:ip
     */
    async updateHost(req: Request, res: Response): Promise<void> {
      const edit: UpdateHostInput = req.body;
      const before = await store.getByIp(req.params.ip);
      const updated = await store.update(req.params.ip, (host) =>
        applyHostEdit(host, edit, managementPort)
      );

      if (
        updated.ip_address !== before.ip_address ||
        updated.vpn_ip_address !== before.vpn_ip_address
      ) {
        fleet.launchProbe(updated);
      }
      res.status(200).json(updated);
    },

    async deleteHost(req: Request, res: Response): Promise<void> {
      await store.delete(req.params.ip);
      res.status(200).json({ message: 'Host deleted', ip: req.params.ip });
    },

    /**
     * POST /api/hosts/:id/primary
     */
    async setPrimary(req: Request, res: Response): Promise<void> {
      res.status(200).json(await fleet.setPrimary(req.params.id));
    },

    /**
     * POST /api/hosts/check
     */
    async checkAll(_req: Request, res: Response): Promise<void> {
      const started = fleet.launchSweep();
      res.status(202).json({
        message: started ? 'Health check started' : 'Health check already in progress',
        started,
      });
    },

    /**
     * POST /api/hosts/:ip/check
     */
    async checkOne(req: Request, res: Response): Promise<void> {
      res.status(200).json(await fleet.probeOne(req.params.ip));
    },

    /**
     * POST /api/hosts/push
     */
    async pushHosts(req: Request, res: Response): Promise<void> {
      const { targets }: { targets?: string[] } = req.body;
      const resolved = await fleet.launchPush(targets);
      res.status(202).json({ message: 'Push started', targets: resolved });
    },

    /**
     * POST /api/hosts/receive
     */
    async receiveHosts(req: Request, res: Response): Promise<void> {
      const hosts: Host[] = req.body;
      const { merge }: { merge: boolean } = res.locals.query;
      res.status(200).json(await fleet.receive(hosts, { merge }));
    },
  };
}

export type HostsController = ReturnType<typeof createHostsController>;
