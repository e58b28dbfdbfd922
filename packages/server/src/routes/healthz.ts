import type { FastifyInstance } from 'fastify';
import type { ExecutionStore } from '../db/store.js';

export async function registerHealthzRoute(app: FastifyInstance, store: ExecutionStore) {
  app.get('/healthz', async () => {
    return { status: 'ok', store: store.kind, timestamp: new Date().toISOString() };
  });
}
