import type { RiskLimits, ValidatorSettings } from '../config.js';
import { signalFingerprint, type SignalHistory } from './signalHistory.js';
import type {
  AccountState,
  PlaceOrderRequest,
  Position,
  RejectionCode,
  Side,
  Signal,
  ValidationResult,
} from './types.js';

/** Read-only view of account state a validation runs against. */
export interface ValidationState {
  account: Readonly<AccountState>;
  positions: ReadonlyMap<string, Position>;
  history: SignalHistory;
  now: number;
}

type Guard = (state: ValidationState) => ValidationResult;

const APPROVED: ValidationResult = { approved: true };

function reject(reasonCode: RejectionCode, detail: string): ValidationResult {
  return { approved: false, reasonCode, detail };
}

function openPosition(positions: ReadonlyMap<string, Position>, symbol: string): Position | undefined {
  const position = positions.get(symbol);
  return position && position.side !== 'FLAT' && position.qty > 0 ? position : undefined;
}

/** Quantity of an order on `side` that would open or add to exposure rather than close it. */
export function openingQty(side: Side, qty: number, position: Position | undefined): number {
  if (!position || position.side === 'FLAT' || position.side === side) return qty;
  return Math.max(0, qty - position.qty);
}

/**
 * Ordered pre-trade guards. Evaluation stops at the first failure; nothing
 * here mutates the state it is given.
 */
export class OrderValidator {
  constructor(private readonly limits: RiskLimits, private readonly settings: ValidatorSettings) {}

  validateSignal(signal: Signal, state: ValidationState): ValidationResult {
    const { symbol, action, price } = signal;
    const position = openPosition(state.positions, symbol);
    const opening = openingQty(action, this.limits.minOrderQty, position) * price;

    return this.run(state, [
      this.killSwitch,
      this.dailyHalt,
      this.dailyLossBreach,
      (s) => this.duplicate(s, symbol, action, price),
      (s) => this.tickCooldown(s, symbol),
      (s) => this.timeCooldown(s, symbol),
      () => this.sameDirection(symbol, action, position),
      (s) => this.maxPositions(s, symbol, position),
      (s) => this.capital(s, opening),
      (s) => this.exposure(s, opening),
    ]);
  }

  validateManualOrder(request: PlaceOrderRequest, state: ValidationState): ValidationResult {
    const invalid = this.structural(request);
    if (invalid) return invalid;

    const { symbol, side, qty, price } = request;
    const position = openPosition(state.positions, symbol);
    const opening = openingQty(side, qty, position) * price;

    return this.run(state, [
      this.killSwitch,
      this.dailyHalt,
      (s) => this.duplicate(s, symbol, side, price),
      (s) => this.maxPositions(s, symbol, position),
      (s) => this.capital(s, opening),
      (s) => this.exposure(s, opening),
    ]);
  }

  private run(state: ValidationState, guards: Guard[]): ValidationResult {
    for (const guard of guards) {
      const result = guard(state);
      if (!result.approved) return result;
    }
    return APPROVED;
  }

  private structural(request: PlaceOrderRequest): ValidationResult | undefined {
    if (!request.symbol.trim()) return reject('INVALID_ORDER', 'symbol is required');
    if (request.side !== 'BUY' && request.side !== 'SELL') {
      return reject('INVALID_ORDER', `unknown side ${String(request.side)}`);
    }
    if (!Number.isInteger(request.qty) || request.qty <= 0) {
      return reject('INVALID_ORDER', `qty must be a positive integer, got ${request.qty}`);
    }
    if (request.qty > this.limits.maxQtyPerOrder) {
      return reject('INVALID_ORDER', `qty ${request.qty} exceeds per-order limit ${this.limits.maxQtyPerOrder}`);
    }
    if (!Number.isFinite(request.price) || request.price <= 0) {
      return reject('INVALID_ORDER', `price must be positive, got ${request.price}`);
    }
    for (const [name, pct] of [['slPct', request.slPct], ['tpPct', request.tpPct]] as const) {
      if (pct !== undefined && !(pct > 0 && pct < 100)) {
        return reject('INVALID_ORDER', `${name} must be between 0 and 100, got ${pct}`);
      }
    }
    return undefined;
  }

  private killSwitch = ({ account }: ValidationState): ValidationResult =>
    account.killSwitch ? reject('KILL_SWITCH', 'kill switch engaged') : APPROVED;

  private dailyHalt = ({ account }: ValidationState): ValidationResult =>
    account.dailyLossHalted ? reject('DAILY_HALT', 'trading halted for the day') : APPROVED;

  private dailyLossBreach = ({ account }: ValidationState): ValidationResult =>
    account.realizedPnl <= -this.limits.dailyLossLimit
      ? reject(
          'DAILY_LOSS_BREACH',
          `realized pnl ${account.realizedPnl.toFixed(2)} at or below -${this.limits.dailyLossLimit}`
        )
      : APPROVED;

  private duplicate(state: ValidationState, symbol: string, side: Side, price: number): ValidationResult {
    const fingerprint = signalFingerprint(symbol, side, price);
    return state.history.isDuplicate(fingerprint, state.now)
      ? reject('DUPLICATE', `${fingerprint} seen within ${this.settings.idempotencyWindowMs}ms`)
      : APPROVED;
  }

  private tickCooldown(state: ValidationState, symbol: string): ValidationResult {
    const last = state.history.lastAcceptedFor(symbol);
    if (!last) return APPROVED;
    const elapsed = state.history.currentTick - last.tick;
    return elapsed < this.settings.cooldownTicks
      ? reject('TICK_COOLDOWN', `${elapsed} of ${this.settings.cooldownTicks} ticks since last signal on ${symbol}`)
      : APPROVED;
  }

  private timeCooldown(state: ValidationState, symbol: string): ValidationResult {
    const last = state.history.lastAcceptedFor(symbol);
    if (!last) return APPROVED;
    const elapsedSec = (state.now - last.at) / 1000;
    return elapsedSec < this.settings.cooldownSeconds
      ? reject('TIME_COOLDOWN', `${elapsedSec.toFixed(1)}s of ${this.settings.cooldownSeconds}s since last signal on ${symbol}`)
      : APPROVED;
  }

  private sameDirection(symbol: string, side: Side, position: Position | undefined): ValidationResult {
    return position?.side === side
      ? reject('SAME_DIRECTION', `already ${side} ${position.qty} ${symbol}`)
      : APPROVED;
  }

  private maxPositions(state: ValidationState, symbol: string, position: Position | undefined): ValidationResult {
    if (position) return APPROVED;
    let open = 0;
    for (const p of state.positions.values()) {
      if (p.side !== 'FLAT' && p.qty > 0) open += 1;
    }
    return open >= this.limits.maxOpenPositions
      ? reject('MAX_POSITIONS', `${open} open positions, limit ${this.limits.maxOpenPositions}, cannot open ${symbol}`)
      : APPROVED;
  }

  private capital({ account }: ValidationState, required: number): ValidationResult {
    return account.availableCapital < required
      ? reject(
          'INSUFFICIENT_CAPITAL',
          `required ${required.toFixed(2)} exceeds available ${account.availableCapital.toFixed(2)}`
        )
      : APPROVED;
  }

  private exposure({ account }: ValidationState, openingNotional: number): ValidationResult {
    if (openingNotional <= 0) return APPROVED;
    const cap = (this.limits.maxTotalExposurePct / 100) * (account.initialCapital + account.realizedPnl);
    const projected = account.usedMargin + openingNotional;
    return projected > cap
      ? reject('EXPOSURE_CAP', `exposure ${projected.toFixed(2)} would exceed cap ${cap.toFixed(2)}`)
      : APPROVED;
  }
}
