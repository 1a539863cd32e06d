import { WebSocketServer, WebSocket } from 'ws';
import type { Server } from 'node:http';
import type { WsScanMessage } from '@curbwatch/shared';

export function createScanWSS(server: Server): {
  broadcast: (message: WsScanMessage) => void;
  close: () => void;
} {
  const wss = new WebSocketServer({ server, path: '/ws/scans' });
  const clients = new Set<WebSocket>();

  wss.on('connection', (ws) => {
    clients.add(ws);
    ws.on('close', () => clients.delete(ws));
    ws.on('error', () => clients.delete(ws));
  });

  const broadcast = (message: WsScanMessage) => {
    const data = JSON.stringify(message);
    for (const client of clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(data);
      }
    }
  };

  const close = () => {
    for (const client of clients) {
      client.close(1001, 'Server shutting down');
    }
    wss.close();
  };

  return { broadcast, close };
}
