import WebSocket from 'ws';
import { Server as HTTPServer } from 'http';
import { HostStreamBroker } from '../services/hostStreamBroker';
import { logger } from '../utils/logger';

export const HOSTS_WS_PATH = '/ws/hosts';

/**
 * Attaches the roster change stream to `httpServer`. Upgrades on any other
 * path are refused.
 */
export function createWebSocketServer(
  httpServer: HTTPServer,
  broker: HostStreamBroker
): WebSocket.Server {
  const wss = new WebSocket.Server({ noServer: true, maxPayload: 64 * 1024 });

  httpServer.on('upgrade', (request, socket, head) => {
    const pathname = request.url?.split('?')[0];
    if (pathname !== HOSTS_WS_PATH) {
      socket.destroy();
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      wss.emit('connection', ws, request);
      logger.info('New host stream WebSocket connection', {
        clientIp: request.socket.remoteAddress || 'unknown',
      });
      broker.handleConnection(ws);
    });
  });

  wss.on('error', (error) => {
    logger.error('WebSocket server error', { error: error.message });
  });

  return wss;
}

export default createWebSocketServer;
