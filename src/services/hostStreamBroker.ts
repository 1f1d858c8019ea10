import WebSocket from 'ws';
import { logger } from '../utils/logger';
import { RosterChange, RosterChangeReason } from '../types';

export type HostStreamEvent =
  | { type: 'welcome'; timestamp: string; payload: { hosts: number } }
  | { type: 'hosts.changed'; reason: RosterChangeReason; timestamp: string };

export interface RosterFeedSource {
  subscribe(listener: (change: RosterChange) => void): () => void;
  getAll(): Promise<unknown[]>;
}

type HostStreamBrokerStats = {
  activeClients: number;
  totalConnections: number;
  totalDisconnects: number;
  totalErrors: number;
  closeCodes: Record<string, number>;
  events: {
    totalBroadcasts: number;
    byReason: Record<string, number>;
    deliveries: number;
    droppedNoSubscribers: number;
    sendFailures: number;
  };
};

/**
 * Relays roster change signals to connected dashboard clients
 */
export class HostStreamBroker {
  private readonly clients = new Set<WebSocket>();
  private readonly unsubscribe: () => void;
  private totalConnections = 0;
  private totalDisconnects = 0;
  private totalErrors = 0;
  private totalBroadcasts = 0;
  private totalDeliveries = 0;
  private droppedNoSubscribers = 0;
  private sendFailures = 0;
  private readonly closeCodeCounts = new Map<string, number>();
  private readonly reasonCounts = new Map<string, number>();

  constructor(private readonly store: RosterFeedSource) {
    this.unsubscribe = this.store.subscribe((change) => {
      this.broadcast({ type: 'hosts.changed', reason: change.reason, timestamp: change.at });
    });
  }

  handleConnection(ws: WebSocket): void {
    this.clients.add(ws);
    this.totalConnections += 1;
    void this.sendWelcome(ws);

    ws.on('close', (code: number) => {
      this.clients.delete(ws);
      this.totalDisconnects += 1;
      this.increment(this.closeCodeCounts, String(code));

      if (code === 1000) {
        logger.info('Host stream websocket closed', { code, activeClients: this.clients.size });
        return;
      }
      logger.warn('Host stream websocket closed unexpectedly', {
        code,
        activeClients: this.clients.size,
      });
    });

    ws.on('error', (error: Error) => {
      this.totalErrors += 1;
      logger.warn('Host stream websocket error', { error: error.message });
      this.clients.delete(ws);
    });
  }

  getStats(): HostStreamBrokerStats {
    return {
      activeClients: this.clients.size,
      totalConnections: this.totalConnections,
      totalDisconnects: this.totalDisconnects,
      totalErrors: this.totalErrors,
      closeCodes: Object.fromEntries(this.closeCodeCounts),
      events: {
        totalBroadcasts: this.totalBroadcasts,
        byReason: Object.fromEntries(this.reasonCounts),
        deliveries: this.totalDeliveries,
        droppedNoSubscribers: this.droppedNoSubscribers,
        sendFailures: this.sendFailures,
      },
    };
  }

  shutdown(): void {
    this.unsubscribe();
    for (const client of this.clients) {
      client.close(1000, 'Server shutdown');
    }
    this.clients.clear();
  }

  private async sendWelcome(ws: WebSocket): Promise<void> {
    let hosts = 0;
    try {
      hosts = (await this.store.getAll()).length;
    } catch (error) {
      logger.warn('Failed to count hosts for welcome event', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    this.sendDirect(ws, {
      type: 'welcome',
      timestamp: new Date().toISOString(),
      payload: { hosts },
    });
  }

  private sendDirect(ws: WebSocket, event: HostStreamEvent): void {
    try {
      ws.send(JSON.stringify(event));
    } catch (error) {
      this.sendFailures += 1;
      logger.warn('Failed to send host stream event', {
        type: event.type,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private broadcast(event: Extract<HostStreamEvent, { type: 'hosts.changed' }>): void {
    this.totalBroadcasts += 1;
    this.increment(this.reasonCounts, event.reason);

    if (this.clients.size === 0) {
      this.droppedNoSubscribers += 1;
      return;
    }

    const serialized = JSON.stringify(event);
    for (const client of this.clients) {
      if (client.readyState !== WebSocket.OPEN) {
        continue;
      }
      try {
        client.send(serialized);
        this.totalDeliveries += 1;
      } catch (error) {
        this.sendFailures += 1;
        logger.warn('Failed to send host stream event', {
          type: event.type,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  private increment(counter: Map<string, number>, key: string): void {
    counter.set(key, (counter.get(key) ?? 0) + 1);
  }
}

export default HostStreamBroker;
