import type { ExecutionStore } from '../db/store.js';
import { notify } from '../ops/alertService.js';
import { createLogger } from '../utils/logger.js';
import { MONEY_EPSILON, type CapitalLedger } from './capitalLedger.js';
import { ConsistencyError } from './errors.js';
import { PositionBook } from './positionBook.js';
import { isoAt, systemClock, type Clock, type Trade } from './types.js';

const logger = createLogger('tradeLedger');

export interface ReconciliationReport {
  match: boolean;
  /** Replayed realized P&L minus the capital ledger's. */
  discrepancy: number;
  recomputedPnl: number;
  /** Sum of the pnl column as written at fill time. */
  recordedPnl: number;
  ledgerPnl: number;
  tradeCount: number;
  checkedAt: string;
  error?: ConsistencyError;
}

export interface PnlSummary {
  realizedPnl: number;
  unrealizedPnl: number;
  totalPnl: number;
  capital: number;
  tradeCount: number;
  timestamp: string;
}

/** Realized P&L recomputed from scratch by replaying fills through a fresh position book. */
export function replayRealizedPnl(trades: readonly Trade[]): { total: number; book: PositionBook } {
  const book = new PositionBook();
  let total = 0;
  for (const t of trades) {
    total += book.applyFill(t.symbol, t.side, t.qty, t.price, t.price).realizedPnl;
  }
  return { total, book };
}

/**
 * Read-only auditor over the trades table. It never corrects the capital
 * ledger; a mismatch is reported and alerted.
 */
export class TradeLedger {
  constructor(
    private readonly store: ExecutionStore,
    readonly accountId: string,
    private readonly clock: Clock = systemClock
  ) {}

  async verifyAgainstCapitalLedger(ledger: CapitalLedger): Promise<ReconciliationReport> {
    const trades = await this.store.listTrades(this.accountId);
    const ledgerPnl = ledger.snapshot().realizedPnl;
    const { total: recomputedPnl } = replayRealizedPnl(trades);
    const recordedPnl = trades.reduce((sum, t) => sum + t.pnl, 0);

    const discrepancy = recomputedPnl - ledgerPnl;
    const recordedDrift = recordedPnl - ledgerPnl;
    const match = Math.abs(discrepancy) <= MONEY_EPSILON && Math.abs(recordedDrift) <= MONEY_EPSILON;

    const report: ReconciliationReport = {
      match,
      discrepancy,
      recomputedPnl,
      recordedPnl,
      ledgerPnl,
      tradeCount: trades.length,
      checkedAt: isoAt(this.clock),
    };
    logger.logReconciliation(report);

    if (!match) {
      report.error = new ConsistencyError(
        discrepancy,
        `realized pnl mismatch on ${this.accountId}: trades replay ${recomputedPnl.toFixed(2)}, recorded ${recordedPnl.toFixed(2)}, ledger ${ledgerPnl.toFixed(2)}`
      );
      await notify(report.error.message, 'high');
    }
    return report;
  }

  /** P&L summary rebuilt from the trades table, marked against `prices`. */
  async computePnl(initialCapital: number, prices: ReadonlyMap<string, number> = new Map()): Promise<PnlSummary> {
    const trades = await this.store.listTrades(this.accountId);
    const { total: realizedPnl, book } = replayRealizedPnl(trades);
    const unrealizedPnl = book.unrealizedPnl(prices);
    return {
      realizedPnl,
      unrealizedPnl,
      totalPnl: realizedPnl + unrealizedPnl,
      capital: initialCapital + realizedPnl + unrealizedPnl,
      tradeCount: trades.length,
      timestamp: isoAt(this.clock),
    };
  }
}
