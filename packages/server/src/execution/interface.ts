import type { Order, OrderStatus } from './types.js';

/** Status report from a venue. Quantities and prices are cumulative for the order. */
export interface BrokerEvent {
  orderId: string;
  /** Per-order sequence number, starting at 1. Absent on callbacks that carry none. */
  seq?: number;
  status: Exclude<OrderStatus, 'NEW'>;
  filledQty: number;
  avgPrice: number;
  timestamp: string;
  reason?: string;
}

export type BrokerEventHandler = (event: BrokerEvent) => void;

/**
 * Capability interface every venue adapter implements. `place` resolves once
 * the venue has accepted the submission; fills arrive later through `onEvent`.
 * It throws `BrokerTransportError` when the submission may not have arrived
 * (retried) and `BrokerRejectedError` when the venue refused it (final).
 * Resubmitting a known orderId must be a no-op.
 */
export interface BrokerAdapter {
  readonly name: string;
  place(order: Readonly<Order>): Promise<void>;
  /** Resolves true only if the venue cancelled before committing a terminal event. */
  cancel(orderId: string): Promise<boolean>;
  onEvent(handler: BrokerEventHandler): void;
}
