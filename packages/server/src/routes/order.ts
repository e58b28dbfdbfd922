import type { FastifyInstance } from 'fastify';
import type { OrderManager } from '../execution/orderManager.js';
import { outcomeStatus } from './signal.js';
import { CancelOrderBody, OrdersQuery, PlaceOrderBody, invalidBody } from './schemas.js';

export async function registerOrderRoute(app: FastifyInstance, manager: OrderManager) {
  app.post('/api/order', async (req, reply) => {
    const parsed = PlaceOrderBody.safeParse(req.body);
    if (!parsed.success) return reply.code(400).send(invalidBody(parsed.error));
    const outcome = await manager.placeManualOrder(parsed.data);
    if (outcome.kind === 'rejected' && outcome.reasonCode === 'INVALID_ORDER') {
      return reply.code(400).send(outcome);
    }
    return reply.code(outcomeStatus(outcome)).send(outcome);
  });

  app.post('/api/order/cancel', async (req, reply) => {
    const parsed = CancelOrderBody.safeParse(req.body);
    if (!parsed.success) return reply.code(400).send(invalidBody(parsed.error));
    const outcome = await manager.cancelOrder(parsed.data.orderId);
    if (outcome.ok) return outcome;
    return reply.code(outcome.reason === 'NOT_FOUND' ? 404 : 409).send(outcome);
  });

  app.get('/api/orders', async (req, reply) => {
    const parsed = OrdersQuery.safeParse(req.query);
    if (!parsed.success) return reply.code(400).send(invalidBody(parsed.error));
    const { symbol, status, limit } = parsed.data;
    const orders = await manager.listOrders({ symbol, statuses: status ? [status] : undefined, limit });
    return { orders };
  });

  app.get<{ Params: { orderId: string } }>('/api/orders/:orderId', async (req, reply) => {
    const order = await manager.getOrder(req.params.orderId);
    if (!order) return reply.code(404).send({ error: `unknown order ${req.params.orderId}` });
    return order;
  });
}

export default registerOrderRoute;
