import { CapitalInvariantViolation, InsufficientCapitalError } from './errors.js';
import type { AccountState } from './types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('capitalLedger');

/** Absolute tolerance for floating-point comparisons on money amounts. */
export const MONEY_EPSILON = 1e-6;

export type ReserveResult = { ok: true } | { ok: false; error: InsufficientCapitalError };

export interface CapitalLedgerOptions {
  accountId: string;
  initialCapital: number;
  dailyLossLimit: number;
}

/**
 * Single source of truth for one account's cash.
 *
 * Every method runs to completion without yielding, so callers on the event
 * loop observe each mutation atomically. After each mutation the conservation
 * equation `available + usedMargin == initial + realized` is re-checked; a
 * violation engages the kill switch and throws.
 */
export class CapitalLedger {
  readonly accountId: string;
  readonly dailyLossLimit: number;
  private state: AccountState;

  constructor(opts: CapitalLedgerOptions) {
    if (!(opts.initialCapital > 0)) {
      throw new RangeError(`initialCapital must be positive, got ${opts.initialCapital}`);
    }
    this.accountId = opts.accountId;
    this.dailyLossLimit = opts.dailyLossLimit;
    this.state = {
      accountId: opts.accountId,
      initialCapital: opts.initialCapital,
      availableCapital: opts.initialCapital,
      usedMargin: 0,
      realizedPnl: 0,
      dailyLossHalted: false,
      killSwitch: false,
    };
  }

  reserveCapital(qty: number, price: number): ReserveResult {
    const notional = this.notional(qty, price);
    if (this.state.availableCapital + MONEY_EPSILON < notional) {
      return { ok: false, error: new InsufficientCapitalError(notional, this.state.availableCapital) };
    }
    this.state.availableCapital -= notional;
    this.state.usedMargin += notional;
    if (this.state.availableCapital < 0) {
      // rounding residue within MONEY_EPSILON
      this.state.usedMargin += this.state.availableCapital;
      this.state.availableCapital = 0;
    }
    this.commit('reserve', notional);
    return { ok: true };
  }

  releaseCapital(qty: number, price: number): void {
    this.releaseAmount(this.notional(qty, price));
  }

  /**
   * Release an already-computed notional, e.g. the proportional margin of a
   * position whose entry notional is not `qty * price` of any single fill.
   */
  releaseAmount(amount: number): void {
    if (!(amount >= 0) || !Number.isFinite(amount)) {
      throw new RangeError(`release amount must be a non-negative number, got ${amount}`);
    }
    if (amount > this.state.usedMargin + MONEY_EPSILON) {
      this.violate(`release of ${amount.toFixed(2)} exceeds used margin ${this.state.usedMargin.toFixed(2)}`);
    }
    this.state.usedMargin -= amount;
    this.state.availableCapital += amount;
    if (Math.abs(this.state.usedMargin) < MONEY_EPSILON) {
      this.state.availableCapital += this.state.usedMargin;
      this.state.usedMargin = 0;
    }
    this.commit('release', amount);
  }

  recordPnl(amount: number): void {
    if (!Number.isFinite(amount)) {
      throw new RangeError(`pnl amount must be finite, got ${amount}`);
    }
    this.state.realizedPnl += amount;
    this.state.availableCapital += amount;
    this.commit('pnl', amount);
  }

  /** Sets the sticky halt flag once realized P&L reaches the loss limit. */
  checkDailyLossLimit(): boolean {
    if (this.state.dailyLossHalted) return true;
    if (this.state.realizedPnl <= -this.dailyLossLimit) {
      this.state.dailyLossHalted = true;
      logger.warn('Daily loss limit breached, trading halted', {
        realizedPnl: this.state.realizedPnl.toFixed(2),
        limit: this.dailyLossLimit,
      });
      this.commit('halt', 0);
      return true;
    }
    return false;
  }

  engageKillSwitch(reason: string): void {
    if (this.state.killSwitch) return;
    this.state.killSwitch = true;
    logger.warn('Kill switch engaged', { reason });
    this.commit('kill', 0);
  }

  /** Explicit operator reset of both the daily-loss halt and the kill switch. */
  resetHalt(): void {
    this.state.dailyLossHalted = false;
    this.state.killSwitch = false;
    logger.info('Halt flags reset by operator');
    this.commit('reset', 0);
  }

  /** Load a persisted account row. Only valid before trading starts. */
  restore(saved: AccountState): void {
    if (saved.accountId !== this.accountId) {
      throw new Error(`cannot restore account ${saved.accountId} into ledger ${this.accountId}`);
    }
    this.state = { ...saved };
    this.assertConservation('restore');
  }

  snapshot(): Readonly<AccountState> {
    return Object.freeze({ ...this.state });
  }

  private notional(qty: number, price: number): number {
    if (!(qty >= 0) || !(price >= 0) || !Number.isFinite(qty * price)) {
      throw new RangeError(`invalid qty/price ${qty} @ ${price}`);
    }
    return qty * price;
  }

  private commit(operation: string, amount: number): void {
    this.assertConservation(operation);
    logger.debug(`ledger ${operation}`, {
      amount: amount.toFixed(2),
      available: this.state.availableCapital.toFixed(2),
      usedMargin: this.state.usedMargin.toFixed(2),
      realizedPnl: this.state.realizedPnl.toFixed(2),
    });
  }

  private assertConservation(operation: string): void {
    const { availableCapital, usedMargin, initialCapital, realizedPnl } = this.state;
    const lhs = availableCapital + usedMargin;
    const rhs = initialCapital + realizedPnl;
    const tolerance = Math.max(MONEY_EPSILON, Math.abs(rhs) * 1e-12);
    if (Math.abs(lhs - rhs) > tolerance || usedMargin < -MONEY_EPSILON) {
      this.violate(
        `conservation failed after ${operation}: available ${availableCapital} + used ${usedMargin} != initial ${initialCapital} + realized ${realizedPnl}`
      );
    }
  }

  private violate(message: string): never {
    this.state.killSwitch = true;
    logger.logFatal(`capital invariant violated on account ${this.accountId}`, { detail: message });
    throw new CapitalInvariantViolation(message);
  }
}
