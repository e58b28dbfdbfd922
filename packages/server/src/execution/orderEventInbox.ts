import type { BrokerEvent } from './interface.js';
import type { OrderStatus } from './types.js';

interface OrderStream {
  nextSeq: number;
  pending: Map<number, BrokerEvent>;
  unsequenced: BrokerEvent[];
  applied: Set<string>;
}

export interface EventKey {
  orderId: string;
  status: OrderStatus;
  filledQty: number;
}

export function eventKey(event: EventKey): string {
  return `${event.orderId}|${event.status}|${event.filledQty}`;
}

/**
 * Per-order buffer between the venue and the order manager, for live orders
 * only. Events carrying a sequence number are released strictly in sequence;
 * a gap holds back everything after it. Also remembers which
 * `(orderId, status, filledQty)` keys were applied so redeliveries can be
 * dropped. All of an order's state goes once it is forgotten.
 */
export class OrderEventInbox {
  private readonly streams = new Map<string, OrderStream>();

  /** Buffer an event. Returns false when its sequence number was already consumed. */
  push(event: BrokerEvent): boolean {
    const stream = this.stream(event.orderId);
    if (event.seq === undefined) {
      stream.unsequenced.push(event);
      return true;
    }
    if (event.seq < stream.nextSeq || stream.pending.has(event.seq)) return false;
    stream.pending.set(event.seq, event);
    return true;
  }

  /** Remove and return the events for `orderId` that may be applied now, in order. */
  takeReady(orderId: string): BrokerEvent[] {
    const stream = this.streams.get(orderId);
    if (!stream) return [];

    const ready = stream.unsequenced.splice(0);
    let next = stream.pending.get(stream.nextSeq);
    while (next) {
      stream.pending.delete(stream.nextSeq);
      ready.push(next);
      stream.nextSeq += 1;
      next = stream.pending.get(stream.nextSeq);
    }
    return ready;
  }

  /** Events held back behind a sequence gap. */
  pendingCount(orderId: string): number {
    return this.streams.get(orderId)?.pending.size ?? 0;
  }

  /** Orders with buffered state. */
  get size(): number {
    return this.streams.size;
  }

  isApplied(key: EventKey): boolean {
    return this.streams.get(key.orderId)?.applied.has(eventKey(key)) ?? false;
  }

  markApplied(key: EventKey): void {
    this.stream(key.orderId).applied.add(eventKey(key));
  }

  /**
   * Drop everything held for an order that is no longer live. Returns the
   * events still buffered for it, in arrival order then sequence order.
   */
  forget(orderId: string): BrokerEvent[] {
    const stream = this.streams.get(orderId);
    if (!stream) return [];
    this.streams.delete(orderId);
    const held = [...stream.pending.entries()].sort(([a], [b]) => a - b).map(([, event]) => event);
    return [...stream.unsequenced, ...held];
  }

  private stream(orderId: string): OrderStream {
    let stream = this.streams.get(orderId);
    if (!stream) {
      stream = { nextSeq: 1, pending: new Map(), unsequenced: [], applied: new Set() };
      this.streams.set(orderId, stream);
    }
    return stream;
  }
}
