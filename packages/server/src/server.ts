import Fastify, { type FastifyInstance } from 'fastify';
import type { ExecutionStore } from './db/store.js';
import { describeError } from './execution/errors.js';
import type { OrderManager } from './execution/orderManager.js';
import type { TradeLedger } from './execution/tradeLedger.js';
import { registerControlsRoute } from './routes/controls.js';
import { registerHealthzRoute } from './routes/healthz.js';
import { registerOrderRoute } from './routes/order.js';
import { registerPortfolioRoute } from './routes/portfolio.js';
import { registerPriceRoute } from './routes/prices.js';
import { registerReconcileRoute } from './routes/reconcile.js';
import { registerSignalRoute } from './routes/signal.js';
import { registerWebhookRoute } from './routes/webhook.js';
import { createLogger } from './utils/logger.js';
import wsPlugin from './ws.js';

const logger = createLogger('server');

export interface ServerDeps {
  manager: OrderManager;
  tradeLedger: TradeLedger;
  store: ExecutionStore;
  webhookSecret?: string;
  /** Fastify request logging. */
  requestLogging?: boolean;
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const app = Fastify({ logger: deps.requestLogging ?? false });

  app.setErrorHandler((err, req, reply) => {
    if (err.statusCode !== undefined && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ error: err.message });
    }
    logger.error('Request failed', { method: req.method, url: req.url, error: describeError(err) });
    return reply.code(500).send({ error: 'internal error' });
  });

  await app.register(wsPlugin, { manager: deps.manager });
  await registerHealthzRoute(app, deps.store);
  await registerSignalRoute(app, deps.manager, deps.webhookSecret);
  await registerOrderRoute(app, deps.manager);
  await registerPortfolioRoute(app, deps.manager);
  await registerControlsRoute(app, deps.manager);
  await registerPriceRoute(app, deps.manager);
  await registerReconcileRoute(app, deps.manager, deps.tradeLedger);
  await registerWebhookRoute(app, deps.manager);

  return app;
}
