import type { FastifyInstance } from 'fastify';
import type { OrderManager } from '../execution/orderManager.js';

export async function registerPortfolioRoute(app: FastifyInstance, manager: OrderManager) {
  app.get('/api/positions', async () => {
    return { positions: manager.getPositions(), openOrders: manager.getOpenOrders() };
  });

  app.get('/api/pnl', async () => {
    return manager.getPnl();
  });
}
