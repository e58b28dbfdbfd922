import { IllegalTransitionError } from './errors.js';
import { TERMINAL_STATUSES, type OrderStatus } from './types.js';

const TRANSITIONS: Readonly<Record<OrderStatus, ReadonlySet<OrderStatus>>> = {
  NEW: new Set<OrderStatus>(['ACK', 'CANCELLED', 'REJECTED']),
  ACK: new Set<OrderStatus>(['PARTIAL', 'FILLED', 'CANCELLED', 'REJECTED']),
  // repeated partials carry a larger cumulative filledQty
  PARTIAL: new Set<OrderStatus>(['PARTIAL', 'FILLED', 'CANCELLED']),
  FILLED: new Set<OrderStatus>(),
  CANCELLED: new Set<OrderStatus>(),
  REJECTED: new Set<OrderStatus>(),
};

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return TRANSITIONS[from].has(to);
}

export function assertTransition(orderId: string, from: OrderStatus, to: OrderStatus): void {
  if (!canTransition(from, to)) throw new IllegalTransitionError(orderId, from, to);
}

export function isTerminal(status: OrderStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}
