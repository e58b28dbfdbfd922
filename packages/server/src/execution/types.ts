export type Side = 'BUY' | 'SELL';
export type PositionSide = Side | 'FLAT';
export type OrderType = 'MARKET' | 'LIMIT';

export type OrderStatus = 'NEW' | 'ACK' | 'PARTIAL' | 'FILLED' | 'CANCELLED' | 'REJECTED';

export const TERMINAL_STATUSES: ReadonlySet<OrderStatus> = new Set(['FILLED', 'CANCELLED', 'REJECTED']);
export const CANCELABLE_STATUSES: ReadonlySet<OrderStatus> = new Set(['NEW', 'ACK', 'PARTIAL']);

export interface Signal {
  symbol: string;
  action: Side;
  price: number;
  strategy: string;
  generatedAt: string;
}

export interface Order {
  orderId: string;
  accountId: string;
  symbol: string;
  side: Side;
  qty: number;
  price: number;
  orderType: OrderType;
  status: OrderStatus;
  filledQty: number;
  avgFillPrice: number;
  strategy: string;
  stopLossPrice: number;
  takeProfitPrice: number;
  /** Quantity still covered by the creation-time capital reservation. */
  reservedQty: number;
  reason?: string;
  frozen: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface Position {
  symbol: string;
  side: PositionSide;
  qty: number;
  avgEntryPrice: number;
  /** Notional locked in usedMargin for this position. */
  margin: number;
}

export interface AccountState {
  accountId: string;
  initialCapital: number;
  availableCapital: number;
  usedMargin: number;
  realizedPnl: number;
  dailyLossHalted: boolean;
  killSwitch: boolean;
}

export interface Trade {
  tradeId: string;
  orderId: string;
  accountId: string;
  symbol: string;
  side: Side;
  qty: number;
  price: number;
  pnl: number;
  timestamp: string;
}

export type RejectionCode =
  | 'INVALID_ORDER'
  | 'KILL_SWITCH'
  | 'DAILY_HALT'
  | 'DAILY_LOSS_BREACH'
  | 'DUPLICATE'
  | 'TICK_COOLDOWN'
  | 'TIME_COOLDOWN'
  | 'SAME_DIRECTION'
  | 'MAX_POSITIONS'
  | 'INSUFFICIENT_CAPITAL'
  | 'EXPOSURE_CAP';

export type ValidationResult =
  | { approved: true }
  | { approved: false; reasonCode: RejectionCode; detail: string };

export interface PlaceOrderRequest {
  symbol: string;
  side: Side;
  qty: number;
  price: number;
  slPct?: number;
  tpPct?: number;
}

export interface CancelOrderRequest {
  orderId: string;
}

export type SignalOutcome =
  | { kind: 'order'; order: Order }
  | { kind: 'rejected'; reasonCode: RejectionCode; detail: string }
  | { kind: 'sized-out'; detail: string };

export type CancelOutcome =
  | { ok: true; order: Order }
  | { ok: false; reason: 'NOT_FOUND' | 'NOT_CANCELABLE' | 'BROKER_REFUSED'; order?: Order };

export interface OrderUpdate {
  orderId: string;
  symbol: string;
  side: Side;
  qty: number;
  status: OrderStatus;
  filledQty: number;
  avgFillPrice: number;
  reason?: string;
  updatedAt: string;
}

export interface PositionUpdate {
  symbol: string;
  qty: number;
  avgEntryPrice: number;
  side: PositionSide;
}

export interface PnLUpdate {
  realizedPnl: number;
  unrealizedPnl: number;
  totalPnl: number;
  availableCapital: number;
}

/** Time source; every timestamp in the core comes from here. */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

export function isoAt(clock: Clock): string {
  return new Date(clock.now()).toISOString();
}

export function opposite(side: Side): Side {
  return side === 'BUY' ? 'SELL' : 'BUY';
}

export type IncidentKind = 'ILLEGAL_TRANSITION' | 'CONSISTENCY' | 'CAPITAL_INVARIANT' | 'EVENT_FAILURE';

/** Operator-facing record of something that needs manual inspection. */
export interface Incident {
  incidentId: string;
  accountId: string;
  kind: IncidentKind;
  orderId?: string;
  detail: string;
  timestamp: string;
}
