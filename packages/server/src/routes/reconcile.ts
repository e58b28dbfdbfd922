import type { FastifyInstance } from 'fastify';
import type { OrderManager } from '../execution/orderManager.js';
import type { TradeLedger } from '../execution/tradeLedger.js';

export async function registerReconcileRoute(app: FastifyInstance, manager: OrderManager, tradeLedger: TradeLedger) {
  app.get('/api/reconcile', async () => {
    const { error, ...report } = await manager.reconcile(tradeLedger);
    return { ...report, error: error?.message };
  });
}
