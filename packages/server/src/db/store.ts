import type { AccountState, Incident, Order, OrderStatus, Position, Trade } from '../execution/types.js';

export interface OrderQuery {
  symbol?: string;
  statuses?: readonly OrderStatus[];
  limit?: number;
}

/**
 * Durable storage the execution core writes through. Orders and positions are
 * upserted by key; trades and incidents are append-only.
 */
export interface ExecutionStore {
  readonly kind: string;
  upsertAccount(account: AccountState): Promise<void>;
  getAccount(accountId: string): Promise<AccountState | undefined>;
  upsertOrder(order: Order): Promise<void>;
  getOrder(orderId: string): Promise<Order | undefined>;
  /** Newest first. */
  listOrders(accountId: string, query?: OrderQuery): Promise<Order[]>;
  insertTrade(trade: Trade): Promise<void>;
  /** Oldest first, the order fills were applied in. */
  listTrades(accountId: string): Promise<Trade[]>;
  upsertPosition(accountId: string, position: Position): Promise<void>;
  listPositions(accountId: string): Promise<Position[]>;
  insertIncident(incident: Incident): Promise<void>;
  listIncidents(accountId: string): Promise<Incident[]>;
  close(): Promise<void>;
}
