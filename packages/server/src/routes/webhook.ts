import type { FastifyInstance } from 'fastify';
import type { OrderManager } from '../execution/orderManager.js';
import { OrderUpdateBody, invalidBody } from './schemas.js';

/** Broker callback. Delivery is at-least-once, so repeats answer 200 with a duplicate disposition. */
export async function registerWebhookRoute(app: FastifyInstance, manager: OrderManager) {
  app.post('/webhook/order-update', async (req, reply) => {
    const parsed = OrderUpdateBody.safeParse(req.body);
    if (!parsed.success) return reply.code(400).send(invalidBody(parsed.error));
    const { timestamp, ...event } = parsed.data;

    const dispositions = await manager.applyBrokerEvent({ ...event, timestamp: timestamp ?? new Date().toISOString() });
    if (dispositions.includes('unknown-order')) {
      return reply.code(404).send({ error: `unknown order ${event.orderId}`, dispositions });
    }
    if (dispositions.includes('frozen')) {
      return reply.code(409).send({ error: 'transition rejected, order frozen', dispositions });
    }
    return { ok: true, dispositions };
  });
}
