import type { BrokerSettings } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { BrokerTransportError } from './errors.js';
import type { BrokerAdapter, BrokerEvent, BrokerEventHandler } from './interface.js';
import { isoAt, systemClock, type Clock, type Order } from './types.js';

const logger = createLogger('simBroker');

type TimerHandle = ReturnType<typeof setTimeout>;

export interface Timers {
  setTimeout(fn: () => void, ms: number): TimerHandle;
  clearTimeout(handle: TimerHandle): void;
}

export interface SimulatedBrokerOptions extends BrokerSettings {
  /** Probability that a submission fails in transport before reaching the venue. */
  transportFailureProbability?: number;
  random?: () => number;
  timers?: Timers;
  clock?: Clock;
}

interface SimOrder {
  order: Readonly<Order>;
  seq: number;
  filledQty: number;
  filledNotional: number;
  partialDone: boolean;
  terminal: boolean;
  timer?: TimerHandle;
}

const round2 = (value: number): number => Math.round(value * 100) / 100;

/**
 * In-process venue. Each order is acknowledged after a short delay, may be
 * partially filled, and then reaches a terminal FILLED or REJECTED event.
 * Every fill is priced with adverse slippage.
 */
export class SimulatedBroker implements BrokerAdapter {
  readonly name = 'simulated';
  private readonly orders = new Map<string, SimOrder>();
  private readonly handlers: BrokerEventHandler[] = [];
  private readonly random: () => number;
  private readonly timers: Timers;
  private readonly clock: Clock;
  private readonly transportFailureProbability: number;

  constructor(private readonly settings: SimulatedBrokerOptions) {
    this.random = settings.random ?? Math.random;
    this.timers = settings.timers ?? {
      setTimeout: (fn, ms) => setTimeout(fn, ms),
      clearTimeout: (handle) => clearTimeout(handle),
    };
    this.clock = settings.clock ?? systemClock;
    this.transportFailureProbability = settings.transportFailureProbability ?? 0;
  }

  onEvent(handler: BrokerEventHandler): void {
    this.handlers.push(handler);
  }

  async place(order: Readonly<Order>): Promise<void> {
    if (this.transportFailureProbability > 0 && this.random() < this.transportFailureProbability) {
      throw new BrokerTransportError(`simulated transport failure submitting ${order.orderId}`);
    }
    if (this.orders.has(order.orderId)) {
      logger.debug('Duplicate submission ignored', { orderId: order.orderId });
      return;
    }

    const sim: SimOrder = { order, seq: 0, filledQty: 0, filledNotional: 0, partialDone: false, terminal: false };
    this.orders.set(order.orderId, sim);
    logger.debug('Order accepted by venue', { orderId: order.orderId, symbol: order.symbol, qty: order.qty });

    const ackDelay = this.uniform(this.settings.minLatencyMs, this.settings.maxLatencyMs / 2);
    this.schedule(sim, ackDelay, () => this.acknowledge(sim));
  }

  async cancel(orderId: string): Promise<boolean> {
    const sim = this.orders.get(orderId);
    if (!sim || sim.terminal) return false;
    if (sim.timer !== undefined) this.timers.clearTimeout(sim.timer);
    sim.timer = undefined;
    sim.terminal = true;
    logger.debug('Order cancelled at venue', { orderId, filledQty: sim.filledQty });
    return true;
  }

  /** Number of orders that still have a pending venue event. */
  get liveOrders(): number {
    let live = 0;
    for (const sim of this.orders.values()) if (!sim.terminal) live += 1;
    return live;
  }

  private acknowledge(sim: SimOrder): void {
    const { order } = sim;
    if (!Number.isInteger(order.qty) || order.qty <= 0 || !(order.price > 0)) {
      sim.terminal = true;
      this.emit(sim, 'REJECTED', `invalid order qty=${order.qty} price=${order.price}`);
      return;
    }
    this.emit(sim, 'ACK');

    if (order.qty > 10 && this.random() < this.settings.partialFillProbability) {
      this.schedule(sim, this.eventDelay(), () => {
        const partialQty = 1 + Math.floor(this.random() * (order.qty - 1));
        this.fill(sim, partialQty);
        sim.partialDone = true;
        this.emit(sim, 'PARTIAL');
        this.schedule(sim, this.eventDelay(), () => this.finish(sim));
      });
    } else {
      this.schedule(sim, this.eventDelay(), () => this.finish(sim));
    }
  }

  private finish(sim: SimOrder): void {
    sim.terminal = true;
    if (!sim.partialDone && this.random() < this.settings.rejectProbability) {
      this.emit(sim, 'REJECTED', 'rejected by venue');
      return;
    }
    this.fill(sim, sim.order.qty - sim.filledQty);
    this.emit(sim, 'FILLED');
  }

  private fill(sim: SimOrder, qty: number): void {
    const { side, price } = sim.order;
    const slip = this.settings.slippagePct / 100;
    const fillPrice = round2(side === 'BUY' ? price * (1 + slip) : price * (1 - slip));
    sim.filledQty += qty;
    sim.filledNotional += qty * fillPrice;
  }

  private emit(sim: SimOrder, status: BrokerEvent['status'], reason?: string): void {
    sim.seq += 1;
    const event: BrokerEvent = {
      orderId: sim.order.orderId,
      seq: sim.seq,
      status,
      filledQty: sim.filledQty,
      avgPrice: sim.filledQty > 0 ? sim.filledNotional / sim.filledQty : 0,
      timestamp: isoAt(this.clock),
      reason,
    };
    for (const handler of this.handlers) handler(event);
  }

  private schedule(sim: SimOrder, delayMs: number, fn: () => void): void {
    sim.timer = this.timers.setTimeout(() => {
      sim.timer = undefined;
      if (sim.terminal) return;
      fn();
    }, delayMs);
  }

  private eventDelay(): number {
    return this.uniform(this.settings.minLatencyMs, this.settings.maxLatencyMs);
  }

  private uniform(min: number, max: number): number {
    return min + this.random() * Math.max(0, max - min);
  }
}
