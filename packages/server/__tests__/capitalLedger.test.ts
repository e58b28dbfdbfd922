import { describe, it, expect, beforeEach } from '@jest/globals';
import { CapitalLedger } from '../src/execution/capitalLedger.js';
import { CapitalInvariantViolation, InsufficientCapitalError } from '../src/execution/errors.js';
import { expectConserved } from './helpers.js';

describe('CapitalLedger', () => {
  let ledger: CapitalLedger;

  beforeEach(() => {
    ledger = new CapitalLedger({ accountId: 'acct-1', initialCapital: 1_000_000, dailyLossLimit: 1_000 });
  });

  it('moves notional between available and used margin', () => {
    expect(ledger.reserveCapital(100, 2500)).toEqual({ ok: true });
    expect(ledger.snapshot()).toMatchObject({ availableCapital: 750_000, usedMargin: 250_000 });

    ledger.releaseCapital(100, 2500);
    expect(ledger.snapshot()).toMatchObject({ availableCapital: 1_000_000, usedMargin: 0 });
    expectConserved(ledger);
  });

  it('refuses a reservation larger than available capital and leaves state untouched', () => {
    const result = ledger.reserveCapital(401, 2500);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InsufficientCapitalError);
      expect(result.error.message).toBe('required 1002500.00 exceeds available 1000000.00');
    }
    expect(ledger.snapshot()).toMatchObject({ availableCapital: 1_000_000, usedMargin: 0 });
  });

  it('credits realized pnl to available capital', () => {
    ledger.recordPnl(9000);
    expect(ledger.snapshot()).toMatchObject({ availableCapital: 1_009_000, realizedPnl: 9000 });
    ledger.recordPnl(-2500);
    expect(ledger.snapshot()).toMatchObject({ availableCapital: 1_006_500, realizedPnl: 6500 });
    expectConserved(ledger);
  });

  it('engages the kill switch when a release exceeds used margin', () => {
    ledger.reserveCapital(10, 100);
    expect(() => ledger.releaseAmount(5000)).toThrow(CapitalInvariantViolation);
    expect(ledger.snapshot().killSwitch).toBe(true);
    expect(ledger.snapshot().usedMargin).toBe(1000);
  });

  it('rejects negative and non-finite amounts', () => {
    expect(() => ledger.releaseAmount(-1)).toThrow(RangeError);
    expect(() => ledger.recordPnl(Number.NaN)).toThrow(RangeError);
    expect(() => ledger.reserveCapital(-1, 100)).toThrow(RangeError);
  });

  it('absorbs rounding residue instead of going negative', () => {
    const small = new CapitalLedger({ accountId: 'acct-2', initialCapital: 0.3, dailyLossLimit: 1 });
    expect(small.reserveCapital(3, 0.1)).toEqual({ ok: true });
    expect(small.snapshot().availableCapital).toBe(0);
    expectConserved(small);
  });

  it('latches the daily halt until an explicit reset', () => {
    ledger.recordPnl(-999);
    expect(ledger.checkDailyLossLimit()).toBe(false);

    ledger.recordPnl(-1);
    expect(ledger.checkDailyLossLimit()).toBe(true);
    expect(ledger.snapshot().dailyLossHalted).toBe(true);

    ledger.recordPnl(5000);
    expect(ledger.checkDailyLossLimit()).toBe(true);

    ledger.resetHalt();
    expect(ledger.snapshot().dailyLossHalted).toBe(false);
    expect(ledger.checkDailyLossLimit()).toBe(false);
  });

  it('clears the kill switch on reset', () => {
    ledger.engageKillSwitch('operator');
    expect(ledger.snapshot().killSwitch).toBe(true);
    ledger.resetHalt();
    expect(ledger.snapshot().killSwitch).toBe(false);
  });

  it('returns frozen snapshots', () => {
    expect(Object.isFrozen(ledger.snapshot())).toBe(true);
  });

  it('restores a consistent account row and refuses an inconsistent one', () => {
    ledger.restore({
      accountId: 'acct-1',
      initialCapital: 1_000_000,
      availableCapital: 700_000,
      usedMargin: 305_000,
      realizedPnl: 5_000,
      dailyLossHalted: false,
      killSwitch: false,
    });
    expect(ledger.snapshot().usedMargin).toBe(305_000);

    expect(() =>
      ledger.restore({
        accountId: 'acct-1',
        initialCapital: 1_000_000,
        availableCapital: 700_000,
        usedMargin: 100_000,
        realizedPnl: 0,
        dailyLossHalted: false,
        killSwitch: false,
      })
    ).toThrow(CapitalInvariantViolation);
    expect(() => ledger.restore({ ...ledger.snapshot(), accountId: 'other' })).toThrow(
      'cannot restore account other into ledger acct-1'
    );
  });

  it('requires positive initial capital', () => {
    expect(() => new CapitalLedger({ accountId: 'x', initialCapital: 0, dailyLossLimit: 1 })).toThrow(RangeError);
  });
});
