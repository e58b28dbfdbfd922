import { describe, it, expect } from '@jest/globals';
import { MemoryExecutionStore } from '../src/db/memoryStore.js';
import { CapitalLedger } from '../src/execution/capitalLedger.js';
import { ConsistencyError } from '../src/execution/errors.js';
import { TradeLedger, replayRealizedPnl } from '../src/execution/tradeLedger.js';
import type { Side, Trade } from '../src/execution/types.js';
import { FakeClock } from './helpers.js';

let n = 0;
function trade(side: Side, qty: number, price: number, pnl: number, symbol = 'TCS'): Trade {
  n += 1;
  return {
    tradeId: `t-${n}`,
    orderId: `o-${n}`,
    accountId: 'acct-1',
    symbol,
    side,
    qty,
    price,
    pnl,
    timestamp: '2026-01-05T09:15:00.000Z',
  };
}

async function seed(trades: Trade[]) {
  const store = new MemoryExecutionStore();
  for (const t of trades) await store.insertTrade(t);
  return store;
}

describe('replayRealizedPnl', () => {
  it('replays closes and reversals', () => {
    const { total, book } = replayRealizedPnl([
      trade('BUY', 100, 2500, 0),
      trade('SELL', 150, 2600, 10_000),
      trade('BUY', 20, 2550, 1_000),
    ]);
    expect(total).toBe(11_000);
    expect(book.get('TCS')).toMatchObject({ side: 'SELL', qty: 30, avgEntryPrice: 2600 });
  });
});

describe('TradeLedger', () => {
  const clock = new FakeClock();
  const ledger = () => new CapitalLedger({ accountId: 'acct-1', initialCapital: 1_000_000, dailyLossLimit: 50_000 });

  it('matches a ledger that booked the same pnl', async () => {
    const store = await seed([trade('BUY', 100, 2500, 0), trade('SELL', 100, 2590, 9_000)]);
    const capital = ledger();
    capital.recordPnl(9_000);

    const report = await new TradeLedger(store, 'acct-1', clock).verifyAgainstCapitalLedger(capital);
    expect(report).toEqual({
      match: true,
      discrepancy: 0,
      recomputedPnl: 9_000,
      recordedPnl: 9_000,
      ledgerPnl: 9_000,
      tradeCount: 2,
      checkedAt: '2026-01-05T09:15:00.000Z',
    });
  });

  it('reports a discrepancy without touching the ledger', async () => {
    const store = await seed([trade('BUY', 100, 2500, 0), trade('SELL', 100, 2590, 9_000)]);
    const capital = ledger();
    capital.recordPnl(8_000);

    const report = await new TradeLedger(store, 'acct-1', clock).verifyAgainstCapitalLedger(capital);
    expect(report.match).toBe(false);
    expect(report.discrepancy).toBe(1_000);
    expect(report.error).toBeInstanceOf(ConsistencyError);
    expect(report.error?.message).toBe(
      'realized pnl mismatch on acct-1: trades replay 9000.00, recorded 9000.00, ledger 8000.00'
    );
    expect(capital.snapshot().realizedPnl).toBe(8_000);
  });

  it('flags a pnl column that disagrees with the replay', async () => {
    const store = await seed([trade('BUY', 100, 2500, 0), trade('SELL', 100, 2590, 9_500)]);
    const capital = ledger();
    capital.recordPnl(9_000);

    const report = await new TradeLedger(store, 'acct-1', clock).verifyAgainstCapitalLedger(capital);
    expect(report).toMatchObject({ match: false, discrepancy: 0, recordedPnl: 9_500 });
  });

  it('summarizes realized and unrealized pnl from the trades', async () => {
    const store = await seed([
      trade('BUY', 100, 2500, 0),
      trade('SELL', 50, 2600, 5_000),
      trade('SELL', 10, 1500, 0, 'INFY'),
    ]);
    const marks = new Map([
      ['TCS', 2520],
      ['INFY', 1450],
    ]);

    const summary = await new TradeLedger(store, 'acct-1', clock).computePnl(1_000_000, marks);
    expect(summary).toEqual({
      realizedPnl: 5_000,
      unrealizedPnl: 1_500,
      totalPnl: 6_500,
      capital: 1_006_500,
      tradeCount: 3,
      timestamp: '2026-01-05T09:15:00.000Z',
    });
  });
});
