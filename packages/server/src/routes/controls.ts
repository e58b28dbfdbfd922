import type { FastifyInstance } from 'fastify';
import type { OrderManager } from '../execution/orderManager.js';
import { ControlsBody, invalidBody } from './schemas.js';

export async function registerControlsRoute(app: FastifyInstance, manager: OrderManager) {
  app.post('/api/controls', async (req, reply) => {
    const parsed = ControlsBody.safeParse(req.body);
    if (!parsed.success) return reply.code(400).send(invalidBody(parsed.error));

    if (parsed.data.action === 'kill') {
      const pnl = await manager.engageKillSwitch(parsed.data.reason ?? 'operator request');
      return { killSwitch: true, pnl };
    }
    const pnl = await manager.resetHalt();
    return { killSwitch: false, dailyLossHalted: false, pnl };
  });
}

export default registerControlsRoute;
