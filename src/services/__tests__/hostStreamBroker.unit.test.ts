import http from 'http';
import { AddressInfo } from 'net';
import WebSocket from 'ws';
import { HostStreamBroker, RosterFeedSource } from '../hostStreamBroker';
import { createWebSocketServer, HOSTS_WS_PATH } from '../../websocket/server';
import { RosterChange } from '../../types';

jest.mock('../../utils/logger');

class FakeRoster implements RosterFeedSource {
  listeners = new Set<(change: RosterChange) => void>();
  hosts: unknown[] = [{ id: 'a' }, { id: 'b' }];

  subscribe(listener: (change: RosterChange) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async getAll(): Promise<unknown[]> {
    return this.hosts;
  }

  emit(change: RosterChange): void {
    for (const listener of this.listeners) {
      listener(change);
    }
  }
}

function nextMessage(client: WebSocket): Promise<Record<string, unknown>> {
  return new Promise((resolve) => {
    client.once('message', (data) => {
      const parsed: unknown = JSON.parse(data.toString());
      resolve(typeof parsed === 'object' && parsed !== null ? { ...parsed } : {});
    });
  });
}

function waitFor(predicate: () => boolean): Promise<void> {
  return new Promise((resolve) => {
    const poll = () => (predicate() ? resolve() : setTimeout(poll, 5));
    poll();
  });
}

describe('HostStreamBroker', () => {
  let server: http.Server;
  let wss: WebSocket.Server;
  let roster: FakeRoster;
  let broker: HostStreamBroker;
  let url: string;

  beforeEach(async () => {
    roster = new FakeRoster();
    broker = new HostStreamBroker(roster);
    server = http.createServer();
    wss = createWebSocketServer(server, broker);
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
    const address: AddressInfo | string | null = server.address();
    const port = typeof address === 'object' && address ? address.port : 0;
    url = `ws://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    broker.shutdown();
    await new Promise<void>((resolve) => wss.close(() => resolve()));
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  async function connect(): Promise<{ client: WebSocket; welcome: Record<string, unknown> }> {
    const client = new WebSocket(`${url}${HOSTS_WS_PATH}`);
    const welcome = await nextMessage(client);
    return { client, welcome };
  }

  it('greets new clients with the roster size', async () => {
    const { client, welcome } = await connect();

    expect(welcome).toMatchObject({ type: 'welcome', payload: { hosts: 2 } });
    expect(broker.getStats()).toMatchObject({ activeClients: 1, totalConnections: 1 });

    client.close(1000);
    await waitFor(() => broker.getStats().activeClients === 0);
    expect(broker.getStats()).toMatchObject({ totalDisconnects: 1, closeCodes: { '1000': 1 } });
  });

  it('relays roster changes to connected clients', async () => {
    const { client } = await connect();

    const received = nextMessage(client);
    roster.emit({ reason: 'upsert', at: '2026-01-01T00:00:00.000Z' });

    await expect(received).resolves.toEqual({
      type: 'hosts.changed',
      reason: 'upsert',
      timestamp: '2026-01-01T00:00:00.000Z',
    });
    expect(broker.getStats().events).toEqual({
      totalBroadcasts: 1,
      byReason: { upsert: 1 },
      deliveries: 1,
      droppedNoSubscribers: 0,
      sendFailures: 0,
    });
    client.close(1000);
  });

  it('counts changes nobody is listening to', () => {
    roster.emit({ reason: 'delete', at: '2026-01-01T00:00:00.000Z' });
    expect(broker.getStats().events).toMatchObject({ totalBroadcasts: 1, droppedNoSubscribers: 1 });
  });

  it('refuses upgrades on other paths', async () => {
    const client = new WebSocket(`${url}/ws/other`);
    const failure = await new Promise<Error>((resolve) => client.once('error', resolve));

    expect(failure).toBeInstanceOf(Error);
    expect(broker.getStats().totalConnections).toBe(0);
  });

  it('closes clients and stops listening on shutdown', async () => {
    const { client } = await connect();
    const closed = new Promise<number>((resolve) => client.once('close', (code) => resolve(code)));

    broker.shutdown();

    await expect(closed).resolves.toBe(1000);
    expect(roster.listeners.size).toBe(0);
  });
});
