import { expect } from '@jest/globals';
import { loadConfig, type ExecutionConfig } from '../src/config.js';
import { MemoryExecutionStore } from '../src/db/memoryStore.js';
import { CapitalLedger } from '../src/execution/capitalLedger.js';
import { BrokerRejectedError, BrokerTransportError } from '../src/execution/errors.js';
import type { BrokerAdapter, BrokerEvent, BrokerEventHandler } from '../src/execution/interface.js';
import { OrderManager } from '../src/execution/orderManager.js';
import type { Clock, Order } from '../src/execution/types.js';

export const T0 = Date.parse('2026-01-05T09:15:00.000Z');

export class FakeClock implements Clock {
  constructor(public t: number = T0) {}

  now(): number {
    return this.t;
  }

  advance(ms: number): void {
    this.t += ms;
  }
}

/** Venue double: submissions are recorded and events are emitted by the test. */
export class ScriptedBroker implements BrokerAdapter {
  readonly name = 'scripted';
  readonly placed: Order[] = [];
  readonly cancelled: string[] = [];
  transportFailures = 0;
  /** When set, the next submission is refused with this reason. */
  rejectNext?: string;
  cancelResult = true;
  /** Runs inside cancel() before it answers, e.g. to emit a fill that races the cancel. */
  beforeCancelReturns?: (orderId: string) => void;
  private handler?: BrokerEventHandler;
  private readonly seqs = new Map<string, number>();

  onEvent(handler: BrokerEventHandler): void {
    this.handler = handler;
  }

  async place(order: Readonly<Order>): Promise<void> {
    this.placed.push({ ...order });
    if (this.transportFailures > 0) {
      this.transportFailures -= 1;
      throw new BrokerTransportError('connection reset by venue');
    }
    if (this.rejectNext !== undefined) {
      const reason = this.rejectNext;
      this.rejectNext = undefined;
      throw new BrokerRejectedError(order.orderId, reason);
    }
  }

  async cancel(orderId: string): Promise<boolean> {
    this.cancelled.push(orderId);
    this.beforeCancelReturns?.(orderId);
    return this.cancelResult;
  }

  /** Emit with the next sequence number for the order. */
  emit(orderId: string, status: BrokerEvent['status'], filledQty = 0, avgPrice = 0): BrokerEvent {
    const seq = (this.seqs.get(orderId) ?? 0) + 1;
    this.seqs.set(orderId, seq);
    const event: BrokerEvent = { orderId, seq, status, filledQty, avgPrice, timestamp: new Date(T0).toISOString() };
    this.deliver(event);
    return event;
  }

  deliver(event: BrokerEvent): void {
    if (!this.handler) throw new Error('no handler registered');
    this.handler(event);
  }
}

export function testConfig(env: NodeJS.ProcessEnv = {}): ExecutionConfig {
  return loadConfig({ NODE_ENV: 'test', ...env });
}

export function setupManager(env: NodeJS.ProcessEnv = {}) {
  const config = testConfig(env);
  const clock = new FakeClock();
  const store = new MemoryExecutionStore();
  const broker = new ScriptedBroker();
  const ledger = new CapitalLedger({
    accountId: config.accountId,
    initialCapital: config.initialCapital,
    dailyLossLimit: config.risk.dailyLossLimit,
  });
  let n = 0;
  const manager = new OrderManager({
    settings: config,
    ledger,
    broker,
    store,
    clock,
    idFactory: () => `id-${++n}`,
    retryDelayMs: 0,
  });
  return { config, clock, store, broker, ledger, manager };
}

export function expectConserved(ledger: CapitalLedger): void {
  const s = ledger.snapshot();
  expect(s.availableCapital + s.usedMargin).toBeCloseTo(s.initialCapital + s.realizedPnl, 6);
  expect(s.availableCapital).toBeGreaterThanOrEqual(0);
  expect(s.usedMargin).toBeGreaterThanOrEqual(0);
}

/** Deterministic stand-in for Math.random: yields `values` in order, then `fallback`. */
export function sequence(values: number[], fallback = 0.99): () => number {
  const queue = [...values];
  return () => queue.shift() ?? fallback;
}

/** Small seeded PRNG (mulberry32). */
export function seeded(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
