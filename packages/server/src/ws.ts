import fp from 'fastify-plugin';
import Websocket from '@fastify/websocket';
import type { OrderManager, OrderManagerEvents } from './execution/orderManager.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('ws');

export interface UpdatesStreamOptions {
  manager: OrderManager;
}

const CHANNELS = {
  orderUpdate: 'order_update',
  positionUpdate: 'position_update',
  pnlUpdate: 'pnl_update',
} as const satisfies Record<keyof OrderManagerEvents, string>;

/** Pushes every order, position and P&L update to connected clients on /ws/updates. */
export default fp<UpdatesStreamOptions>(async (app, opts) => {
  await app.register(Websocket);

  const clients = new Set<{ send(data: string): void }>();
  const broadcast = (type: string, data: unknown) => {
    const msg = JSON.stringify({ type, data });
    for (const client of clients) {
      try {
        client.send(msg);
      } catch (err) {
        logger.warn('Dropping update for client', { type, error: err instanceof Error ? err.message : String(err) });
      }
    }
  };

  const unsubscribe = [
    opts.manager.on('orderUpdate', (u) => broadcast(CHANNELS.orderUpdate, u)),
    opts.manager.on('positionUpdate', (u) => broadcast(CHANNELS.positionUpdate, u)),
    opts.manager.on('pnlUpdate', (u) => broadcast(CHANNELS.pnlUpdate, u)),
  ];
  app.addHook('onClose', async () => {
    for (const off of unsubscribe) off();
    clients.clear();
  });

  app.get('/ws/updates', { websocket: true }, (conn) => {
    const socket = conn.socket;
    clients.add(socket);
    socket.send(JSON.stringify({ type: CHANNELS.pnlUpdate, data: opts.manager.getPnl() }));
    socket.on('close', () => {
      clients.delete(socket);
    });
  });
});
