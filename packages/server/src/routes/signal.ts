import { timingSafeEqual } from 'crypto';
import type { FastifyInstance } from 'fastify';
import type { OrderManager } from '../execution/orderManager.js';
import type { SignalOutcome } from '../execution/types.js';
import { SignalBody, invalidBody } from './schemas.js';

function secretMatches(expected: string, given: string | undefined): boolean {
  if (given === undefined) return false;
  const a = Buffer.from(expected);
  const b = Buffer.from(given);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function outcomeStatus(outcome: SignalOutcome): number {
  return outcome.kind === 'order' ? 201 : 409;
}

export async function registerSignalRoute(app: FastifyInstance, manager: OrderManager, webhookSecret?: string) {
  app.post('/api/signal', async (req, reply) => {
    const parsed = SignalBody.safeParse(req.body);
    if (!parsed.success) return reply.code(400).send(invalidBody(parsed.error));
    const body = parsed.data;

    if (webhookSecret) {
      const header = req.headers['x-webhook-secret'];
      const given = typeof header === 'string' ? header : body.secret;
      if (!secretMatches(webhookSecret, given)) return reply.code(401).send({ error: 'invalid webhook secret' });
    }

    const price = body.price || manager.getMark(body.symbol);
    if (price === undefined || price <= 0) {
      return reply.code(400).send({ error: `no price given and no market price known for ${body.symbol}` });
    }

    const outcome = await manager.onSignal({
      symbol: body.symbol,
      action: body.action,
      price,
      strategy: body.strategy,
      generatedAt: body.timestamp ?? new Date().toISOString(),
    });
    return reply.code(outcomeStatus(outcome)).send(outcome);
  });
}
