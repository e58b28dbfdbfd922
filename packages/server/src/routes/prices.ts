import type { FastifyInstance } from 'fastify';
import type { OrderManager } from '../execution/orderManager.js';
import { MarkPriceBody, invalidBody } from './schemas.js';

/** Last-price feed: marks the symbol and runs the stop-loss / take-profit check. */
export async function registerPriceRoute(app: FastifyInstance, manager: OrderManager) {
  app.post('/api/price', async (req, reply) => {
    const parsed = MarkPriceBody.safeParse(req.body);
    if (!parsed.success) return reply.code(400).send(invalidBody(parsed.error));
    manager.markPrice(parsed.data.symbol, parsed.data.price);
    manager.tick();
    const exits = await manager.checkStopLossTakeProfit();
    return { symbol: parsed.data.symbol, price: parsed.data.price, exits, pnl: manager.getPnl() };
  });
}
