import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import type { FastifyInstance } from 'fastify';
import { TradeLedger } from '../src/execution/tradeLedger.js';
import { buildServer } from '../src/server.js';
import { setupManager } from './helpers.js';

const SECRET = { 'x-webhook-secret': 'test-secret' };

describe('HTTP API', () => {
  let h: ReturnType<typeof setupManager>;
  let app: FastifyInstance;

  beforeEach(async () => {
    h = setupManager();
    app = await buildServer({
      manager: h.manager,
      tradeLedger: new TradeLedger(h.store, h.config.accountId, h.clock),
      store: h.store,
      webhookSecret: 'test-secret',
    });
  });

  afterEach(async () => {
    await app.close();
  });

  async function placeManual(qty = 10, price = 100, symbol = 'INFY'): Promise<string> {
    const res = await app.inject({ method: 'POST', url: '/api/order', payload: { symbol, side: 'BUY', qty, price } });
    expect(res.statusCode).toBe(201);
    return res.json().order.orderId;
  }

  it('reports health with the store kind', async () => {
    const res = await app.inject({ method: 'GET', url: '/healthz' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: 'ok', store: 'memory' });
  });

  describe('POST /api/signal', () => {
    it('requires the webhook secret', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/signal', payload: { symbol: 'TCS', action: 'BUY', price: 2500 } });
      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({ error: 'invalid webhook secret' });
    });

    it('accepts the secret in the body', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/signal',
        payload: { symbol: 'TCS', action: 'BUY', price: 2500, secret: 'test-secret' },
      });
      expect(res.statusCode).toBe(201);
    });

    it('creates an order for an approved signal', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/signal',
        headers: SECRET,
        payload: { symbol: 'TCS', action: 'buy', price: 2500, strategy: 'breakout' },
      });
      expect(res.statusCode).toBe(201);
      expect(res.json()).toMatchObject({ kind: 'order', order: { symbol: 'TCS', side: 'BUY', qty: 200, strategy: 'breakout', status: 'NEW' } });
    });

    it('answers 409 with the rejection reason', async () => {
      const payload = { symbol: 'TCS', action: 'BUY', price: 2500 };
      await app.inject({ method: 'POST', url: '/api/signal', headers: SECRET, payload });
      const res = await app.inject({ method: 'POST', url: '/api/signal', headers: SECRET, payload });
      expect(res.statusCode).toBe(409);
      expect(res.json()).toMatchObject({ kind: 'rejected', reasonCode: 'DUPLICATE' });
    });

    it('falls back to the last marked price', async () => {
      const missing = await app.inject({ method: 'POST', url: '/api/signal', headers: SECRET, payload: { symbol: 'INFY', action: 'BUY' } });
      expect(missing.statusCode).toBe(400);
      expect(missing.json()).toEqual({ error: 'no price given and no market price known for INFY' });

      const mark = await app.inject({ method: 'POST', url: '/api/price', payload: { symbol: 'INFY', price: 1500 } });
      expect(mark.json()).toMatchObject({ symbol: 'INFY', price: 1500, exits: [] });

      const res = await app.inject({ method: 'POST', url: '/api/signal', headers: SECRET, payload: { symbol: 'INFY', action: 'BUY', price: 0 } });
      expect(res.statusCode).toBe(201);
      expect(res.json()).toMatchObject({ order: { price: 1500, qty: 333 } });
    });

    it('rejects a malformed body', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/signal', headers: SECRET, payload: { symbol: '', action: 'HOLD' } });
      expect(res.statusCode).toBe(400);
      const body = res.json();
      expect(body.error).toBe('invalid request');
      expect(body.issues).toHaveLength(2);
    });
  });

  describe('orders', () => {
    it('places, lists, fetches and cancels a manual order', async () => {
      const orderId = await placeManual();

      const one = await app.inject({ method: 'GET', url: `/api/orders/${orderId}` });
      expect(one.json()).toMatchObject({ orderId, status: 'NEW', strategy: 'manual' });

      const cancel = await app.inject({ method: 'POST', url: '/api/order/cancel', payload: { orderId } });
      expect(cancel.statusCode).toBe(200);
      expect(cancel.json()).toMatchObject({ ok: true, order: { status: 'CANCELLED' } });

      const list = await app.inject({ method: 'GET', url: '/api/orders?status=CANCELLED' });
      expect(list.json().orders.map((o: { orderId: string }) => o.orderId)).toEqual([orderId]);

      const again = await app.inject({ method: 'POST', url: '/api/order/cancel', payload: { orderId } });
      expect(again.statusCode).toBe(409);
      expect(again.json()).toMatchObject({ ok: false, reason: 'NOT_CANCELABLE' });
    });

    it('answers 404 for unknown orders', async () => {
      expect((await app.inject({ method: 'GET', url: '/api/orders/nope' })).statusCode).toBe(404);
      const cancel = await app.inject({ method: 'POST', url: '/api/order/cancel', payload: { orderId: 'nope' } });
      expect(cancel.statusCode).toBe(404);
      expect(cancel.json()).toEqual({ ok: false, reason: 'NOT_FOUND' });
    });

    it('answers 400 for a structurally invalid manual order', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/order', payload: { symbol: 'TCS', side: 'BUY', qty: 0, price: 100 } });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({ reasonCode: 'INVALID_ORDER' });
    });

    it('validates the list query', async () => {
      expect((await app.inject({ method: 'GET', url: '/api/orders?limit=0' })).statusCode).toBe(400);
    });
  });

  describe('portfolio and controls', () => {
    it('shows positions, open orders and pnl', async () => {
      const orderId = await placeManual();
      h.broker.emit(orderId, 'ACK');
      h.broker.emit(orderId, 'FILLED', 10, 100);
      await h.manager.idle();
      await placeManual(5, 2500, 'TCS');

      const res = await app.inject({ method: 'GET', url: '/api/positions' });
      const body = res.json();
      expect(body.positions).toEqual([{ symbol: 'INFY', side: 'BUY', qty: 10, avgEntryPrice: 100, margin: 1_000 }]);
      expect(body.openOrders).toHaveLength(1);

      const pnl = await app.inject({ method: 'GET', url: '/api/pnl' });
      expect(pnl.json()).toEqual({ realizedPnl: 0, unrealizedPnl: 0, totalPnl: 0, availableCapital: 986_500 });
    });

    it('engages and resets the kill switch', async () => {
      const kill = await app.inject({ method: 'POST', url: '/api/controls', payload: { action: 'kill', reason: 'drill' } });
      expect(kill.json()).toMatchObject({ killSwitch: true });

      const signal = await app.inject({ method: 'POST', url: '/api/signal', headers: SECRET, payload: { symbol: 'TCS', action: 'BUY', price: 2500 } });
      expect(signal.json()).toMatchObject({ reasonCode: 'KILL_SWITCH' });

      const reset = await app.inject({ method: 'POST', url: '/api/controls', payload: { action: 'reset' } });
      expect(reset.json()).toMatchObject({ killSwitch: false, dailyLossHalted: false });
      expect(h.ledger.snapshot().killSwitch).toBe(false);
    });

    it('runs a reconciliation on demand', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/reconcile' });
      expect(res.json()).toMatchObject({ match: true, discrepancy: 0, tradeCount: 0 });
      expect(res.json().error).toBeUndefined();
    });
  });

  describe('POST /webhook/order-update', () => {
    it('applies, deduplicates and refuses broker callbacks', async () => {
      const orderId = await placeManual();
      const ack = { orderId, status: 'ACK', filledQty: 0, avgPrice: 0 };

      const first = await app.inject({ method: 'POST', url: '/webhook/order-update', payload: ack });
      expect(first.json()).toEqual({ ok: true, dispositions: ['applied'] });

      const repeat = await app.inject({ method: 'POST', url: '/webhook/order-update', payload: ack });
      expect(repeat.json()).toEqual({ ok: true, dispositions: ['duplicate'] });

      const illegal = await app.inject({
        method: 'POST',
        url: '/webhook/order-update',
        payload: { orderId, status: 'FILLED', filledQty: 5, avgPrice: 100 },
      });
      expect(illegal.statusCode).toBe(409);
      expect(illegal.json()).toEqual({ error: 'transition rejected, order frozen', dispositions: ['frozen'] });
    });

    it('treats a callback for a settled order as a repeat or a conflict', async () => {
      const orderId = await placeManual();
      const post = (payload: Record<string, unknown>) => app.inject({ method: 'POST', url: '/webhook/order-update', payload });
      await post({ orderId, status: 'ACK', filledQty: 0, avgPrice: 0 });
      await post({ orderId, status: 'FILLED', filledQty: 10, avgPrice: 100 });

      const redelivered = await post({ orderId, status: 'FILLED', filledQty: 10, avgPrice: 100 });
      expect(redelivered.statusCode).toBe(200);
      expect(redelivered.json()).toEqual({ ok: true, dispositions: ['duplicate'] });

      const cancelled = await post({ orderId, status: 'CANCELLED', filledQty: 10, avgPrice: 100 });
      expect(cancelled.statusCode).toBe(409);
      expect(h.manager.liveOrderCount).toBe(0);
    });

    it('answers 404 for an unknown order and 400 for a bad status', async () => {
      const unknown = await app.inject({
        method: 'POST',
        url: '/webhook/order-update',
        payload: { orderId: 'nope', status: 'ACK', filledQty: 0, avgPrice: 0 },
      });
      expect(unknown.statusCode).toBe(404);

      const bad = await app.inject({
        method: 'POST',
        url: '/webhook/order-update',
        payload: { orderId: 'nope', status: 'NEW', filledQty: 0, avgPrice: 0 },
      });
      expect(bad.statusCode).toBe(400);
    });
  });
});
