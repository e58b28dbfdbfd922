import { randomUUID } from 'crypto';
import { EventEmitter } from 'events';
import type { ExecutionConfig } from '../config.js';
import type { ExecutionStore, OrderQuery } from '../db/store.js';
import { notify } from '../ops/alertService.js';
import { sizePosition, stopLossPrice, takeProfitPrice } from '../risk/positionSizing.js';
import { createLogger } from '../utils/logger.js';
import type { CapitalLedger } from './capitalLedger.js';
import {
  BrokerRejectedError,
  BrokerTransportError,
  CapitalInvariantViolation,
  IllegalTransitionError,
  PersistenceError,
  describeError,
} from './errors.js';
import type { BrokerAdapter, BrokerEvent } from './interface.js';
import { OrderEventInbox } from './orderEventInbox.js';
import { OrderValidator, openingQty, type ValidationState } from './orderValidator.js';
import { PositionBook, type FillApplication } from './positionBook.js';
import { SignalHistory, signalFingerprint } from './signalHistory.js';
import { canTransition, isTerminal } from './stateMachine.js';
import { TaskQueue } from './taskQueue.js';
import type { ReconciliationReport, TradeLedger } from './tradeLedger.js';
import {
  CANCELABLE_STATUSES,
  isoAt,
  opposite,
  systemClock,
  type CancelOutcome,
  type Clock,
  type IncidentKind,
  type Order,
  type OrderStatus,
  type OrderUpdate,
  type PlaceOrderRequest,
  type PnLUpdate,
  type Position,
  type PositionUpdate,
  type RejectionCode,
  type Side,
  type Signal,
  type SignalOutcome,
  type Trade,
} from './types.js';

const logger = createLogger('orderManager');

/** Rejections decided before the duplicate guard; these leave no fingerprint. */
const UNFINGERPRINTED: ReadonlySet<RejectionCode> = new Set([
  'INVALID_ORDER',
  'KILL_SWITCH',
  'DAILY_HALT',
  'DAILY_LOSS_BREACH',
  'DUPLICATE',
]);

const OPEN_STATUSES: readonly OrderStatus[] = ['NEW', 'ACK', 'PARTIAL'];

export type EventDisposition = 'applied' | 'duplicate' | 'frozen' | 'unknown-order';

export interface OrderManagerEvents {
  orderUpdate: OrderUpdate;
  positionUpdate: PositionUpdate;
  pnlUpdate: PnLUpdate;
}

export type OrderManagerSettings = Pick<
  ExecutionConfig,
  'accountId' | 'risk' | 'validator' | 'maxSubmitAttempts' | 'orderTimeoutSec'
>;

export interface OrderManagerDeps {
  settings: OrderManagerSettings;
  ledger: CapitalLedger;
  broker: BrokerAdapter;
  store: ExecutionStore;
  clock?: Clock;
  idFactory?: () => string;
  /** Pause between submission attempts. */
  retryDelayMs?: number;
}

interface OrderDraft {
  symbol: string;
  side: Side;
  qty: number;
  price: number;
  strategy: string;
  slPct: number;
  tpPct: number;
}

interface ExitLevels {
  stopLoss: number;
  takeProfit: number;
}

/**
 * Orchestrates one account: validation, sizing, capital reservation, broker
 * submission and fill application. Every public mutation runs on a single
 * task queue, and the ledger and state-machine work inside a task never
 * awaits, so no two mutations of the account interleave.
 */
export class OrderManager {
  readonly accountId: string;
  private readonly settings: OrderManagerSettings;
  private readonly ledger: CapitalLedger;
  private readonly broker: BrokerAdapter;
  private readonly store: ExecutionStore;
  private readonly clock: Clock;
  private readonly newId: () => string;
  private readonly retryDelayMs: number;

  private readonly validator: OrderValidator;
  private readonly history: SignalHistory;
  private readonly book = new PositionBook();
  private readonly inbox = new OrderEventInbox();
  private readonly queue = new TaskQueue();
  private readonly emitter = new EventEmitter();
  private readonly orders = new Map<string, Order>();
  private readonly marks = new Map<string, number>();
  private readonly exits = new Map<string, ExitLevels>();

  constructor(deps: OrderManagerDeps) {
    this.settings = deps.settings;
    this.accountId = deps.settings.accountId;
    this.ledger = deps.ledger;
    this.broker = deps.broker;
    this.store = deps.store;
    this.clock = deps.clock ?? systemClock;
    this.newId = deps.idFactory ?? randomUUID;
    this.retryDelayMs = deps.retryDelayMs ?? 250;
    this.validator = new OrderValidator(deps.settings.risk, deps.settings.validator);
    this.history = new SignalHistory(deps.settings.validator.idempotencyWindowMs);

    this.broker.onEvent((event) => this.receive(event));
  }

  on<K extends keyof OrderManagerEvents>(event: K, listener: (payload: OrderManagerEvents[K]) => void): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  // ---------------------------------------------------------------------------
  // Entry points
  // ---------------------------------------------------------------------------

  onSignal(signal: Signal): Promise<SignalOutcome> {
    return this.exclusive(async () => {
      const now = this.clock.now();
      const { symbol, action, price, strategy } = signal;
      const verdict = this.validator.validateSignal(signal, this.validationState(now));

      if (verdict.approved || !UNFINGERPRINTED.has(verdict.reasonCode)) {
        this.history.recordFingerprint(signalFingerprint(symbol, action, price), now);
      }
      if (!verdict.approved) {
        if (verdict.reasonCode === 'DAILY_LOSS_BREACH' && this.ledger.checkDailyLossLimit()) {
          await this.persistAccount();
        }
        logger.logSignalDecision({ symbol, action, price, strategy, ...verdict });
        return { kind: 'rejected', reasonCode: verdict.reasonCode, detail: verdict.detail };
      }

      const account = this.ledger.snapshot();
      const position = this.book.get(symbol);
      const equity = account.initialCapital + account.realizedPnl;
      const { risk } = this.settings;
      const sizing = sizePosition(
        {
          price,
          slPct: risk.defaultStopLossPct,
          capital: equity,
          availableCapital: account.availableCapital,
          exposureHeadroom: (risk.maxTotalExposurePct / 100) * equity - account.usedMargin,
          closeQty: position.side !== 'FLAT' && position.side !== action ? this.closableQty(symbol, action) : undefined,
        },
        risk
      );
      if (!sizing.ok) {
        logger.logSignalDecision({ symbol, action, price, strategy, approved: false, reasonCode: 'SIZED_OUT', detail: sizing.detail });
        return { kind: 'sized-out', detail: sizing.detail };
      }

      const outcome = await this.createAndSubmit({
        symbol,
        side: action,
        qty: sizing.qty,
        price,
        strategy,
        slPct: Math.max(risk.defaultStopLossPct, risk.minStopLossPct),
        tpPct: risk.defaultTakeProfitPct,
      });
      if (outcome.kind === 'order') {
        this.history.markAccepted(symbol, now);
        logger.logSignalDecision({ symbol, action, price, strategy, approved: true, qty: sizing.qty, detail: sizing.limitedBy });
      }
      return outcome;
    });
  }

  placeManualOrder(request: PlaceOrderRequest): Promise<SignalOutcome> {
    return this.exclusive(async () => {
      const now = this.clock.now();
      const verdict = this.validator.validateManualOrder(request, this.validationState(now));
      if (verdict.approved || !UNFINGERPRINTED.has(verdict.reasonCode)) {
        this.history.recordFingerprint(signalFingerprint(request.symbol, request.side, request.price), now);
      }
      if (!verdict.approved) {
        logger.info('Manual order rejected', { symbol: request.symbol, reasonCode: verdict.reasonCode, detail: verdict.detail });
        return { kind: 'rejected', reasonCode: verdict.reasonCode, detail: verdict.detail };
      }
      const { risk } = this.settings;
      return this.createAndSubmit({
        symbol: request.symbol,
        side: request.side,
        qty: request.qty,
        price: request.price,
        strategy: 'manual',
        slPct: request.slPct ?? Math.max(risk.defaultStopLossPct, risk.minStopLossPct),
        tpPct: request.tpPct ?? risk.defaultTakeProfitPct,
      });
    });
  }

  /**
   * Apply a status report delivered outside the adapter's own channel, such as
   * the broker callback webhook. Delivery is at-least-once; repeats are no-ops.
   */
  applyBrokerEvent(event: BrokerEvent): Promise<EventDisposition[]> {
    if (!this.orders.has(event.orderId)) {
      return this.exclusive(async () => [await this.applyEvent(event)]);
    }
    if (!this.inbox.push(event)) return Promise.resolve(['duplicate']);
    return this.exclusive(() => this.pump(event.orderId));
  }

  /**
   * Cancel an open order. Events already delivered for the order are applied
   * first, so a fill the venue committed before the cancel always wins.
   */
  cancelOrder(orderId: string): Promise<CancelOutcome> {
    return this.exclusive(async () => {
      const order = this.orders.get(orderId) ?? (await this.settledOrder(orderId));
      if (!order) return { ok: false, reason: 'NOT_FOUND' };

      await this.pump(orderId);
      if (order.frozen || !CANCELABLE_STATUSES.has(order.status)) {
        return { ok: false, reason: 'NOT_CANCELABLE', order: { ...order } };
      }

      const accepted = await this.broker.cancel(orderId);
      await this.pump(orderId);

      if (order.frozen || !CANCELABLE_STATUSES.has(order.status)) {
        return { ok: false, reason: 'NOT_CANCELABLE', order: { ...order } };
      }
      if (!accepted) {
        logger.warn('Venue refused cancel', { orderId, symbol: order.symbol, status: order.status });
        return { ok: false, reason: 'BROKER_REFUSED', order: { ...order } };
      }

      await this.finalizeLocally(order, 'CANCELLED', 'cancelled by request');
      return { ok: true, order: { ...order } };
    });
  }

  /** Advance the signal tick counter used by the tick cooldown. */
  tick(): number {
    return this.history.tick();
  }

  markPrice(symbol: string, price: number): void {
    if (!(price > 0) || !Number.isFinite(price)) {
      throw new RangeError(`invalid mark price ${price} for ${symbol}`);
    }
    this.marks.set(symbol, price);
  }

  getMark(symbol: string): number | undefined {
    return this.marks.get(symbol);
  }

  /**
   * Close positions whose last marked price crossed the stop-loss or
   * take-profit of the latest opening fill. Exits bypass the signal guards.
   */
  checkStopLossTakeProfit(): Promise<Order[]> {
    return this.exclusive(async () => {
      const created: Order[] = [];
      for (const position of this.book.open()) {
        if (position.side === 'FLAT') continue;
        const mark = this.marks.get(position.symbol);
        const levels = this.exits.get(position.symbol);
        if (mark === undefined || !levels) continue;

        const hit = this.exitHit(position.side, mark, levels);
        if (!hit) continue;
        const strategy = `auto_${hit}_exit`;
        const side = opposite(position.side);
        // whatever live orders are already closing is not closed twice
        const qty = this.closableQty(position.symbol, side);
        if (qty === 0) continue;

        logger.info(`${hit.toUpperCase()} hit, closing position`, {
          symbol: position.symbol,
          mark,
          stopLoss: levels.stopLoss,
          takeProfit: levels.takeProfit,
          qty,
        });
        const outcome = await this.createAndSubmit({
          symbol: position.symbol,
          side,
          qty,
          price: mark,
          strategy,
          slPct: 0,
          tpPct: 0,
        });
        if (outcome.kind === 'order') created.push(outcome.order);
        else logger.warn('Exit order not placed', { symbol: position.symbol, strategy, detail: outcome.detail });
      }
      return created;
    });
  }

  /** Reject orders that never left NEW within the order timeout. */
  cleanupStaleOrders(): Promise<number> {
    return this.exclusive(async () => {
      const cutoff = this.clock.now() - this.settings.orderTimeoutSec * 1000;
      let expired = 0;
      for (const order of [...this.orders.values()]) {
        if (order.status !== 'NEW' || Date.parse(order.createdAt) > cutoff) continue;
        await this.pump(order.orderId);
        if (order.status !== 'NEW') continue;
        await this.broker.cancel(order.orderId);
        await this.pump(order.orderId);
        if (order.status !== 'NEW') continue;
        await this.finalizeLocally(order, 'REJECTED', `no acknowledgement within ${this.settings.orderTimeoutSec}s`);
        expired += 1;
      }
      if (expired > 0) logger.warn('Stale orders rejected', { count: expired });
      return expired;
    });
  }

  /** Load account, positions and open orders from the store. Call once before trading. */
  restore(): Promise<void> {
    return this.exclusive(async () => {
      const account = await this.store.getAccount(this.accountId);
      if (account) {
        this.ledger.restore(account);
      } else {
        await this.persistAccount();
      }
      this.book.restore(await this.store.listPositions(this.accountId));
      const open = await this.store.listOrders(this.accountId, { statuses: OPEN_STATUSES });
      for (const order of open) this.orders.set(order.orderId, order);
      // exit levels of restored positions come from their latest filled opening order
      const filled = await this.store.listOrders(this.accountId, { statuses: ['FILLED', 'PARTIAL'] });
      for (const order of [...filled].reverse()) {
        const position = this.book.get(order.symbol);
        if (position.side === order.side && order.stopLossPrice > 0) {
          this.exits.set(order.symbol, { stopLoss: order.stopLossPrice, takeProfit: order.takeProfitPrice });
        }
      }
      logger.info('State restored', {
        store: this.store.kind,
        openOrders: open.length,
        positions: this.book.open().length,
        availableCapital: this.ledger.snapshot().availableCapital,
      });
    });
  }

  engageKillSwitch(reason: string): Promise<PnLUpdate> {
    return this.exclusive(async () => {
      this.ledger.engageKillSwitch(reason);
      await this.persistAccount();
      return this.emitPnl();
    });
  }

  resetHalt(): Promise<PnLUpdate> {
    return this.exclusive(async () => {
      this.ledger.resetHalt();
      await this.persistAccount();
      return this.emitPnl();
    });
  }

  /** Run the trade-table audit while no fill can be applied. */
  reconcile(tradeLedger: TradeLedger): Promise<ReconciliationReport> {
    return this.exclusive(async () => {
      const report = await tradeLedger.verifyAgainstCapitalLedger(this.ledger);
      if (report.error) await this.recordIncident('CONSISTENCY', report.error.message);
      return report;
    });
  }

  /** Resolves once every queued operation has finished. */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  async getOrder(orderId: string): Promise<Order | undefined> {
    const live = this.orders.get(orderId);
    return live ? { ...live } : this.store.getOrder(orderId);
  }

  listOrders(query?: OrderQuery): Promise<Order[]> {
    return this.store.listOrders(this.accountId, query);
  }

  getOpenOrders(): Order[] {
    return [...this.orders.values()].filter((o) => CANCELABLE_STATUSES.has(o.status)).map((o) => ({ ...o }));
  }

  /** Orders held in memory: the live ones, plus any frozen before settling. */
  get liveOrderCount(): number {
    return this.orders.size;
  }

  getPositions(): Position[] {
    return this.book.open();
  }

  getPnl(): PnLUpdate {
    const account = this.ledger.snapshot();
    const unrealizedPnl = this.book.unrealizedPnl(this.marks);
    return {
      realizedPnl: account.realizedPnl,
      unrealizedPnl,
      totalPnl: account.realizedPnl + unrealizedPnl,
      availableCapital: account.availableCapital,
    };
  }

  // ---------------------------------------------------------------------------
  // Order creation and submission
  // ---------------------------------------------------------------------------

  private async createAndSubmit(draft: OrderDraft): Promise<SignalOutcome> {
    // Only the part that opens exposure needs cash; a close is funded by the position it closes.
    const reservedQty = draft.qty - Math.min(draft.qty, this.closableQty(draft.symbol, draft.side));
    const reservation = this.ledger.reserveCapital(reservedQty, draft.price);
    if (!reservation.ok) {
      return { kind: 'rejected', reasonCode: 'INSUFFICIENT_CAPITAL', detail: reservation.error.message };
    }

    const ts = isoAt(this.clock);
    const order: Order = {
      orderId: this.newId(),
      accountId: this.accountId,
      symbol: draft.symbol,
      side: draft.side,
      qty: draft.qty,
      price: draft.price,
      orderType: 'MARKET',
      status: 'NEW',
      filledQty: 0,
      avgFillPrice: 0,
      strategy: draft.strategy,
      stopLossPrice: draft.slPct > 0 ? stopLossPrice(draft.side, draft.price, draft.slPct) : 0,
      takeProfitPrice: draft.tpPct > 0 ? takeProfitPrice(draft.side, draft.price, draft.tpPct) : 0,
      reservedQty,
      frozen: false,
      createdAt: ts,
      updatedAt: ts,
    };

    try {
      await this.store.upsertOrder(order);
      await this.persistAccount();
    } catch (error) {
      this.ledger.releaseCapital(order.reservedQty, order.price);
      logger.error('Order not persisted, reservation released', {
        orderId: order.orderId,
        symbol: order.symbol,
        error: describeError(error),
      });
      throw error instanceof PersistenceError ? error : new PersistenceError('createOrder', error);
    }

    this.orders.set(order.orderId, order);
    this.emitOrder(order);
    this.emitPnl();

    await this.submitWithRetry(order);
    return { kind: 'order', order: { ...order } };
  }

  private async submitWithRetry(order: Order): Promise<void> {
    const maxAttempts = this.settings.maxSubmitAttempts;
    const base = { orderId: order.orderId, symbol: order.symbol, side: order.side, qty: order.qty, price: order.price, maxAttempts };
    let lastError = '';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        await this.broker.place(order);
        logger.logOrderPlacement({ ...base, attempt });
        return;
      } catch (error) {
        lastError = describeError(error);
        logger.logOrderPlacement({ ...base, attempt, error: lastError });
        if (error instanceof BrokerRejectedError) {
          await this.finalizeLocally(order, 'REJECTED', `venue rejected order: ${lastError}`);
          return;
        }
        if (!(error instanceof BrokerTransportError)) {
          await this.finalizeLocally(order, 'REJECTED', `submission error: ${lastError}`);
          return;
        }
        if (attempt < maxAttempts && this.retryDelayMs > 0) {
          await new Promise((resolve) => setTimeout(resolve, this.retryDelayMs * attempt));
        }
      }
    }

    await this.finalizeLocally(order, 'REJECTED', `submission failed after ${maxAttempts} attempts: ${lastError}`);
  }

  // ---------------------------------------------------------------------------
  // Broker events
  // ---------------------------------------------------------------------------

  private receive(event: BrokerEvent): void {
    if (!this.orders.has(event.orderId)) {
      this.exclusive(() => this.applyEvent(event)).catch((error: unknown) => this.reportEventFailure(event, error));
      return;
    }
    if (!this.inbox.push(event)) {
      logger.debug('Redelivered event dropped', { orderId: event.orderId, seq: event.seq });
      return;
    }
    this.exclusive(() => this.pump(event.orderId)).catch((error: unknown) => this.reportEventFailure(event, error));
  }

  private async pump(orderId: string): Promise<EventDisposition[]> {
    const dispositions: EventDisposition[] = [];
    for (const event of this.inbox.takeReady(orderId)) {
      dispositions.push(await this.applyEvent(event));
    }
    return dispositions;
  }

  private async applyEvent(event: BrokerEvent): Promise<EventDisposition> {
    const order = this.orders.get(event.orderId) ?? (await this.settledOrder(event.orderId));
    if (!order) {
      logger.warn('Event for unknown order ignored', { orderId: event.orderId, status: event.status });
      return 'unknown-order';
    }
    const repeated = event.status === order.status && event.filledQty === order.filledQty;
    // an earlier report of a settled order, redelivered after the sequence state was dropped
    const stale = isTerminal(order.status) && !isTerminal(event.status) && event.filledQty <= order.filledQty;
    if (this.inbox.isApplied(event) || repeated || stale) {
      logger.debug('Duplicate event ignored', { orderId: order.orderId, status: event.status, filledQty: event.filledQty });
      return 'duplicate';
    }
    if (order.frozen) {
      logger.warn('Event for frozen order ignored', { orderId: order.orderId, status: event.status });
      return 'frozen';
    }

    const fillQty = event.filledQty - order.filledQty;
    const illegal =
      !canTransition(order.status, event.status) ||
      fillQty < 0 ||
      event.filledQty > order.qty ||
      (event.status === 'FILLED' && event.filledQty !== order.qty) ||
      (fillQty > 0 && !(event.avgPrice > 0));
    if (illegal) {
      const error = new IllegalTransitionError(order.orderId, order.status, event.status);
      await this.freeze(
        order,
        'ILLEGAL_TRANSITION',
        `${error.message} (event filledQty=${event.filledQty}, order filledQty=${order.filledQty}/${order.qty})`
      );
      return 'frozen';
    }

    // An opening fill beyond the reservation (the position it was meant to close
    // went away first) takes fresh cash, or the order is frozen for inspection.
    if (fillQty > 0) {
      const shortfall = openingQty(order.side, fillQty, this.book.get(order.symbol)) - order.reservedQty;
      if (shortfall > 0) {
        const topUp = this.ledger.reserveCapital(shortfall, order.price);
        if (!topUp.ok) {
          const detail = `fill of ${fillQty} on ${order.orderId} opens ${shortfall} unreserved: ${topUp.error.message}`;
          await this.freeze(order, 'CAPITAL_INVARIANT', detail);
          return 'frozen';
        }
        order.reservedQty += shortfall;
      }
    }

    // Synchronous section: ledger, position and order state change together.
    let fill: { trade: Trade; application: FillApplication } | undefined;
    if (fillQty > 0) {
      const fillPrice = (event.avgPrice * event.filledQty - order.avgFillPrice * order.filledQty) / fillQty;
      fill = this.applyFill(order, fillQty, fillPrice, event.timestamp);
    }
    const from = order.status;
    order.status = event.status;
    order.updatedAt = isoAt(this.clock);
    if (event.reason) order.reason = event.reason;
    if (isTerminal(order.status)) this.releaseReservation(order);
    else this.inbox.markApplied(event);

    logger.logOrderTransition({
      orderId: order.orderId,
      symbol: order.symbol,
      from,
      to: order.status,
      filledQty: order.filledQty,
      avgFillPrice: order.avgFillPrice,
      reason: order.reason,
    });

    await this.store.upsertOrder(order);
    if (fill) {
      await this.store.insertTrade(fill.trade);
      await this.store.upsertPosition(this.accountId, fill.application.position);
    }
    await this.persistAccount();

    this.emitOrder(order);
    if (fill) this.emitPosition(fill.application.position);
    this.emitPnl();
    if (isTerminal(order.status)) await this.settle(order);
    return 'applied';
  }

  private applyFill(order: Order, qty: number, price: number, timestamp: string) {
    const application = this.book.applyFill(order.symbol, order.side, qty, price, order.price);

    // The opening share of the reservation stays locked as position margin.
    order.reservedQty -= Math.min(application.openedQty, order.reservedQty);
    if (application.closedQty > 0) {
      this.ledger.releaseAmount(application.releasedMargin);
      this.ledger.recordPnl(application.realizedPnl);
    }

    order.avgFillPrice = (order.avgFillPrice * order.filledQty + price * qty) / (order.filledQty + qty);
    order.filledQty += qty;

    const position = application.position;
    if (position.side === 'FLAT') {
      this.exits.delete(order.symbol);
    } else if (application.openedQty > 0 && order.stopLossPrice > 0) {
      this.exits.set(order.symbol, { stopLoss: order.stopLossPrice, takeProfit: order.takeProfitPrice });
    }

    const trade: Trade = {
      tradeId: this.newId(),
      orderId: order.orderId,
      accountId: this.accountId,
      symbol: order.symbol,
      side: order.side,
      qty,
      price,
      pnl: application.realizedPnl,
      timestamp,
    };
    logger.logTradeLifecycle(application.phase, trade);

    if (application.closedQty > 0) this.ledger.checkDailyLossLimit();
    return { trade, application };
  }

  private releaseReservation(order: Order): void {
    if (order.reservedQty > 0) {
      this.ledger.releaseCapital(order.reservedQty, order.price);
      order.reservedQty = 0;
    }
  }

  /** Terminal transition decided here rather than reported by the venue. */
  private async finalizeLocally(order: Order, to: 'CANCELLED' | 'REJECTED', reason: string): Promise<void> {
    if (!canTransition(order.status, to)) {
      await this.freeze(order, 'ILLEGAL_TRANSITION', new IllegalTransitionError(order.orderId, order.status, to).message);
      return;
    }
    const from = order.status;
    this.releaseReservation(order);
    order.status = to;
    order.reason = reason;
    order.updatedAt = isoAt(this.clock);
    logger.logOrderTransition({
      orderId: order.orderId,
      symbol: order.symbol,
      from,
      to,
      filledQty: order.filledQty,
      avgFillPrice: order.avgFillPrice,
      reason,
    });

    await this.store.upsertOrder(order);
    await this.persistAccount();
    this.emitOrder(order);
    this.emitPnl();
    await this.settle(order);
  }

  /**
   * Drop a terminal order from memory; queries and late events find it in the
   * store. Events still buffered for it are applied against that record.
   */
  private async settle(order: Order): Promise<void> {
    this.orders.delete(order.orderId);
    for (const late of this.inbox.forget(order.orderId)) {
      const disposition = await this.applyEvent(late);
      logger.debug('Late event for settled order', { orderId: order.orderId, status: late.status, disposition });
    }
  }

  private async settledOrder(orderId: string): Promise<Order | undefined> {
    const stored = await this.store.getOrder(orderId);
    return stored?.accountId === this.accountId ? stored : undefined;
  }

  /** Quantity of the opposing position on `symbol` that live orders on `side` are not already closing. */
  private closableQty(symbol: string, side: Side): number {
    const position = this.book.get(symbol);
    if (position.side === 'FLAT' || position.side === side) return 0;
    let closing = 0;
    for (const o of this.orders.values()) {
      if (o.symbol !== symbol || o.side !== side || isTerminal(o.status)) continue;
      closing += Math.max(0, o.qty - o.filledQty - o.reservedQty);
    }
    return Math.max(0, position.qty - closing);
  }

  private async freeze(order: Order, kind: IncidentKind, detail: string): Promise<void> {
    order.frozen = true;
    order.updatedAt = isoAt(this.clock);
    logger.logFatal('Order frozen', { orderId: order.orderId, symbol: order.symbol, detail });
    await this.recordIncident(kind, detail, order.orderId);
    await notify(`Order ${order.orderId} frozen: ${detail}`, 'critical');
    await this.store.upsertOrder(order);
    this.emitOrder(order);
  }

  private async reportEventFailure(event: BrokerEvent, error: unknown): Promise<void> {
    const detail = `failed to apply ${event.status} for ${event.orderId}: ${describeError(error)}`;
    logger.error('Broker event not applied', { orderId: event.orderId, error: describeError(error) });
    await this.recordIncident('EVENT_FAILURE', detail, event.orderId);
    await notify(detail, 'high');
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  /**
   * Queue a task. A capital invariant breach inside it is recorded and
   * alerted before the error reaches the caller.
   */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    return this.queue.run(async () => {
      try {
        return await task();
      } catch (error) {
        if (error instanceof CapitalInvariantViolation) {
          await this.persistKillSwitch();
          await this.recordIncident('CAPITAL_INVARIANT', error.message);
          await notify(`Capital invariant violated on ${this.accountId}: ${error.message}`, 'critical');
        }
        throw error;
      }
    });
  }

  private validationState(now: number): ValidationState {
    return { account: this.ledger.snapshot(), positions: this.book.asMap(), history: this.history, now };
  }

  private exitHit(side: Side, mark: number, levels: ExitLevels): 'sl' | 'tp' | undefined {
    if (side === 'BUY') {
      if (mark <= levels.stopLoss) return 'sl';
      if (levels.takeProfit > 0 && mark >= levels.takeProfit) return 'tp';
    } else {
      if (mark >= levels.stopLoss) return 'sl';
      if (levels.takeProfit > 0 && mark <= levels.takeProfit) return 'tp';
    }
    return undefined;
  }

  private async persistAccount(): Promise<void> {
    await this.store.upsertAccount({ ...this.ledger.snapshot() });
  }

  /** The ledger engaged its kill switch; keep it engaged across a restart. Best effort. */
  private async persistKillSwitch(): Promise<void> {
    try {
      await this.persistAccount();
    } catch (error) {
      logger.error('Kill switch not persisted', { accountId: this.accountId, error: describeError(error) });
    }
  }

  /** Incidents are best effort; a store failure here is logged, not rethrown. */
  private async recordIncident(kind: IncidentKind, detail: string, orderId?: string): Promise<void> {
    try {
      await this.store.insertIncident({
        incidentId: this.newId(),
        accountId: this.accountId,
        kind,
        orderId,
        detail,
        timestamp: isoAt(this.clock),
      });
    } catch (error) {
      logger.error('Incident not recorded', { kind, orderId, detail, error: describeError(error) });
    }
  }

  private emitOrder(order: Order): void {
    const update: OrderUpdate = {
      orderId: order.orderId,
      symbol: order.symbol,
      side: order.side,
      qty: order.qty,
      status: order.status,
      filledQty: order.filledQty,
      avgFillPrice: order.avgFillPrice,
      reason: order.reason,
      updatedAt: order.updatedAt,
    };
    this.emitter.emit('orderUpdate', update);
  }

  private emitPosition(position: Readonly<Position>): void {
    const update: PositionUpdate = {
      symbol: position.symbol,
      qty: position.qty,
      avgEntryPrice: position.avgEntryPrice,
      side: position.side,
    };
    this.emitter.emit('positionUpdate', update);
  }

  private emitPnl(): PnLUpdate {
    const update = this.getPnl();
    this.emitter.emit('pnlUpdate', update);
    return update;
  }
}
