import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import request from 'supertest';
import { Express } from 'express';
import { createApp, isOriginAllowed } from '../app';
import HostStore from '../services/hostStore';
import FleetSyncCoordinator from '../services/fleetSync';
import { ScanOptions } from '../services/discoveryScanner';
import { PeerIdentity } from '../services/peerClient';
import { buildHost } from '../utils/hostRecord';
import { APP_VERSION } from '../utils/appVersion';
import { PeerUnreachableError } from '../utils/errors';
import { DiscoveryCandidate, Host } from '../types';

jest.mock('../utils/logger');

const selfRecord = (): Host =>
  buildHost({
    id: 'self-id',
    nickname: 'screen-self',
    hostname: 'screen-self',
    ip_address: '10.0.0.1',
    status: 'Healthy',
    nsm_status: 'NSM Online',
    nsm_version: APP_VERSION,
    dashboard_url: 'http://10.0.0.1:8080',
    last_checked: '2026-01-01T00:00:00.000Z',
  });

const settle = () => new Promise<void>((resolve) => setTimeout(resolve, 25));

describe('API', () => {
  let dir: string;
  let store: HostStore;
  let fleet: FleetSyncCoordinator;
  let app: Express;
  let releaseScan: () => void;
  let sendRoster: jest.Mock<Promise<void>, [string, number, Host[], { merge: boolean }]>;

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), 'api-test-'));
    store = await HostStore.open(join(dir, 'hosts.db'), { legacyJsonPath: null });

    const gate = new Promise<void>((resolve) => {
      releaseScan = resolve;
    });
    sendRoster = jest
      .fn<Promise<void>, [string, number, Host[], { merge: boolean }]>()
      .mockResolvedValue(undefined);
    const unreachable = async (ip: string): Promise<never> => {
      throw new PeerUnreachableError(ip, new Error('connect ECONNREFUSED'));
    };

    fleet = new FleetSyncCoordinator(
      {
        store,
        prober: {
          probeHost: async (host: Host) => ({
            ...host,
            status: 'Healthy',
            asset_count: 2,
            last_checked: '2026-01-01T00:00:00.000Z',
          }),
        },
        scanner: {
          async *scan(_options: ScanOptions): AsyncGenerator<DiscoveryCandidate> {
            await gate;
            yield* [];
          },
        },
        peers: {
          fetchSelfDescription: (ip: string): Promise<Host> => unreachable(ip),
          fetchIdentity: (ip: string): Promise<PeerIdentity> => unreachable(ip),
          sendRoster,
        },
        identity: {
          getId: () => 'self-id',
          getHostname: () => 'screen-self',
          primaryAddress: () => '10.0.0.1',
          describe: selfRecord,
        },
      },
      { managementPort: 8080, scanBudgetMs: 5000, maxBackups: 5, sweepEnabled: false }
    );

    app = createApp({ store, fleet, managementPort: 8080, manualMaxBackups: 10 });
  });

  afterEach(async () => {
    releaseScan();
    await settle();
    await store.close();
    rmSync(dir, { recursive: true, force: true });
  });

  describe('system', () => {
    it('GET /api/health reports a healthy node', async () => {
      const response = await request(app).get('/api/health');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        status: 'ok',
        checks: { database: 'healthy', discovery: 'idle' },
        streamClients: 0,
        changeFeed: { subscribers: 0, dropped: 0 },
      });
    });

    it('GET /api/health reports 503 when the store is unusable', async () => {
      await store.close();

      const response = await request(app).get('/api/health');

      expect(response.status).toBe(503);
      expect(response.body).toMatchObject({ status: 'degraded', checks: { database: 'unhealthy' } });
    });

    it('GET /api/version identifies the node', async () => {
      const response = await request(app).get('/api/version');
      expect(response.body).toEqual({
        version: APP_VERSION,
        status: 'ok',
        hostname: 'screen-self',
        id: 'self-id',
      });
    });

    it('GET /api/host/local describes the node', async () => {
      const response = await request(app).get('/api/host/local');
      expect(response.status).toBe(200);
      expect(response.body).toEqual(selfRecord());
    });

    it('answers unknown routes with 404', async () => {
      const response = await request(app).get('/api/nope');

      expect(response.status).toBe(404);
      expect(response.body.error).toMatchObject({
        code: 'NOT_FOUND',
        message: 'Route not found',
        statusCode: 404,
        path: '/api/nope',
      });
    });
  });

  describe('hosts', () => {
    it('adds, lists, edits and deletes a host', async () => {
      const created = await request(app)
        .post('/api/hosts')
        .send({ nickname: 'Lobby', ip_address: '10.0.0.5' });

      expect(created.status).toBe(201);
      expect(created.body).toMatchObject({
        nickname: 'Lobby',
        ip_address: '10.0.0.5',
        dashboard_url: 'http://10.0.0.5:8080',
        dashboard_url_vpn: '',
      });

      const fetched = await request(app).get(`/api/hosts/${created.body.id}`);
      expect(fetched.body).toMatchObject({ nickname: 'Lobby' });

      const edited = await request(app).put('/api/hosts/10.0.0.5').send({ nickname: 'Hall' });
      expect(edited.status).toBe(200);
      expect(edited.body).toMatchObject({ nickname: 'Hall', ip_address: '10.0.0.5' });

      const removed = await request(app).delete('/api/hosts/10.0.0.5');
      expect(removed.body).toEqual({ message: 'Host deleted', ip: '10.0.0.5' });

      const listed = await request(app).get('/api/hosts');
      expect(listed.body).toEqual([]);
    });

    it('rejects a host without an address', async () => {
      const response = await request(app).post('/api/hosts').send({ nickname: 'Lobby' });

      expect(response.status).toBe(400);
      expect(response.body.error).toMatchObject({
        code: 'VALIDATION_ERROR',
        message: '"ip_address" ip_address is required',
      });
    });

    it('rejects a malformed address', async () => {
      const response = await request(app).post('/api/hosts').send({ ip_address: '10.0.0' });

      expect(response.status).toBe(400);
      expect(response.body.error).toMatchObject({
        code: 'INVALID_ADDRESS',
        message: "Invalid IPv4 address for ip_address: '10.0.0'",
      });
    });

    it('rejects a duplicate address', async () => {
      await store.add({ id: 'h1', ip_address: '10.0.0.5' });

      const response = await request(app).post('/api/hosts').send({ ip_address: '10.0.0.5' });

      expect(response.status).toBe(409);
      expect(response.body.error).toMatchObject({
        code: 'HOST_CONFLICT',
        message: "Host with IP '10.0.0.5' already exists",
      });
    });

    it('rejects an empty edit', async () => {
      await store.add({ id: 'h1', ip_address: '10.0.0.5' });

      const response = await request(app).put('/api/hosts/10.0.0.5').send({});

      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe('At least one field must be provided for update');
    });

    it('reports a missing host', async () => {
      const response = await request(app).get('/api/hosts/missing');

      expect(response.status).toBe(404);
      expect(response.body.error).toMatchObject({
        code: 'NOT_FOUND',
        message: "Host with id 'missing' not found",
      });
    });

    it('probes a single host on request', async () => {
      await store.add({ id: 'h1', nickname: 'Lobby', ip_address: '10.0.0.5' });

      const response = await request(app).post('/api/hosts/10.0.0.5/check');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ nickname: 'Lobby', status: 'Healthy', asset_count: 2 });
    });

    it('starts a sweep in the background', async () => {
      const response = await request(app).post('/api/hosts/check');

      expect(response.status).toBe(202);
      expect(response.body).toEqual({ message: 'Health check started', started: true });
    });

    it('keeps one record per hostname when setting a primary', async () => {
      await store.add({ id: 'a', hostname: 'screen-x', ip_address: '10.0.0.5' });
      await store.add({ id: 'b', hostname: 'screen-x', ip_address: '10.0.0.6' });

      const response = await request(app).post('/api/hosts/a/primary');

      expect(response.status).toBe(200);
      expect(response.body.removed).toEqual(['b']);
      expect((await store.getAll()).map((host) => host.id)).toEqual(['a']);
    });
  });

  describe('gossip', () => {
    it('merges a received roster', async () => {
      const response = await request(app)
        .post('/api/hosts/receive?merge=true')
        .send([{ id: 'p1', nickname: 'Peer', ip_address: '10.0.0.8' }]);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ mode: 'merge', received: 1, applied: 1, failed: 0 });
      await expect(store.getById('p1')).resolves.toMatchObject({ nickname: 'Peer', status: 'Unreachable' });
    });

    it('replaces the roster by default', async () => {
      await store.add({ id: 'old', ip_address: '10.0.0.2' });

      const response = await request(app)
        .post('/api/hosts/receive')
        .send([{ id: 'p1', ip_address: '10.0.0.8' }]);

      expect(response.body).toMatchObject({ mode: 'replace', received: 1, applied: 1, failed: 0 });
      expect((await store.getAll()).map((host) => host.id)).toEqual(['p1']);
    });

    it('rejects a payload that is not a list of hosts', async () => {
      const response = await request(app).post('/api/hosts/receive').send({ id: 'p1' });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('VALIDATION_ERROR');
    });

    it('pushes to explicit targets', async () => {
      const response = await request(app).post('/api/hosts/push').send({ targets: ['10.0.0.9'] });

      expect(response.status).toBe(202);
      expect(response.body).toEqual({ message: 'Push started', targets: ['10.0.0.9'] });
      await settle();
      expect(sendRoster).toHaveBeenCalledWith('10.0.0.9', 8080, [], { merge: false });
    });

    it('pushes to every listed peer without a body', async () => {
      await store.add({ id: 'h5', ip_address: '10.0.0.5' });
      await store.add(selfRecord());

      const response = await request(app).post('/api/hosts/push');

      expect(response.body).toEqual({ message: 'Push started', targets: ['10.0.0.5'] });
    });

    it('round-trips the roster through export and import', async () => {
      await store.add({ id: 'h5', nickname: 'Lobby', ip_address: '10.0.0.5' });

      const exported = await request(app).get('/api/hosts/export');
      expect(exported.headers['content-disposition']).toBe('attachment; filename="hosts.json"');

      await store.deleteById('h5');
      const imported = await request(app).post('/api/hosts/import').send(exported.body);

      expect(imported.status).toBe(200);
      expect(imported.body).toMatchObject({ mode: 'replace', received: 1, applied: 1 });
      await expect(store.getById('h5')).resolves.toMatchObject({ nickname: 'Lobby' });
    });
  });

  describe('discovery', () => {
    it('reports scan state', async () => {
      const response = await request(app).get('/api/discovery/status');
      expect(response.body).toEqual({ scanInProgress: false, lastScanTime: null });
    });

    it('rejects an invalid interface address', async () => {
      const response = await request(app).post('/api/discovery/scan?interface_ip=10.0.0');

      expect(response.status).toBe(400);
      expect(response.body.error).toMatchObject({
        code: 'INVALID_ADDRESS',
        message: "Invalid IPv4 address for interface_ip: '10.0.0'",
      });
    });

    it('runs one scan at a time', async () => {
      const started = await request(app).post('/api/discovery/scan');
      expect(started.status).toBe(202);
      expect(started.body).toEqual({ message: 'Discovery scan started', interface_ip: null });

      const refused = await request(app).post('/api/discovery/scan');
      expect(refused.status).toBe(409);
      expect(refused.body).toEqual({
        error: 'Conflict',
        code: 'SCAN_IN_PROGRESS',
        message: 'Scan already in progress',
      });

      releaseScan();
      await settle();
      const status = await request(app).get('/api/discovery/status');
      expect(status.body.scanInProgress).toBe(false);
      expect(typeof status.body.lastScanTime).toBe('string');
    });
  });

  describe('backups', () => {
    it('creates, lists and restores a backup', async () => {
      await store.add({ id: 'h5', ip_address: '10.0.0.5' });

      const created = await request(app).post('/api/backups');
      expect(created.status).toBe(201);
      expect(created.body.message).toBe('Backup created');

      const listed = await request(app).get('/api/backups');
      expect(listed.body.backups).toHaveLength(1);
      const [backup] = listed.body.backups;

      await store.deleteById('h5');
      const restored = await request(app).post('/api/backups/restore');

      expect(restored.status).toBe(200);
      expect(restored.body).toEqual({ message: 'Backup restored', file: backup.filename });
      await expect(store.getById('h5')).resolves.toMatchObject({ ip_address: '10.0.0.5' });
    });

    it('reports an unknown backup', async () => {
      const response = await request(app).post('/api/backups/restore').send({ file: 'nope.db' });

      expect(response.status).toBe(404);
      expect(response.body.error).toMatchObject({
        code: 'BACKUP_UNAVAILABLE',
        message: "Backup 'nope.db' not found",
      });
    });

    it('serves the live database as a download', async () => {
      const response = await request(app).get('/api/backups/snapshot');

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toBe('application/octet-stream');
      expect(response.headers['content-disposition']).toBe('attachment; filename="hosts.db"');
    });

    it('imports a snapshot and rejects garbage', async () => {
      await store.add({ id: 'h5', ip_address: '10.0.0.5' });
      const snapshot = await store.exportSnapshot();
      await store.deleteById('h5');

      const imported = await request(app)
        .post('/api/backups/import')
        .set('Content-Type', 'application/octet-stream')
        .send(snapshot);

      expect(imported.status).toBe(200);
      expect(imported.body.message).toBe('Snapshot imported');
      await expect(store.getById('h5')).resolves.toMatchObject({ ip_address: '10.0.0.5' });

      const rejected = await request(app)
        .post('/api/backups/import')
        .set('Content-Type', 'application/octet-stream')
        .send(Buffer.from('not a database'));

      expect(rejected.status).toBe(400);
      expect(rejected.body.error).toMatchObject({
        code: 'INVALID_SNAPSHOT',
        message: 'Invalid snapshot: not a readable host database',
      });
    });
  });
});

describe('isOriginAllowed', () => {
  it('allows requests without an origin and wildcard lists', () => {
    expect(isOriginAllowed(undefined, [])).toBe(true);
    expect(isOriginAllowed('http://panel.test', ['*'])).toBe(true);
  });

  it('matches listed origins exactly', () => {
    expect(isOriginAllowed('http://panel.test', ['http://panel.test'])).toBe(true);
    expect(isOriginAllowed('http://other.test', ['http://panel.test'])).toBe(false);
  });
});
