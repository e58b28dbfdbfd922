import { describe, it, expect } from '@jest/globals';
import type { BrokerEvent } from '../src/execution/interface.js';
import { OrderEventInbox } from '../src/execution/orderEventInbox.js';
import { TaskQueue } from '../src/execution/taskQueue.js';

function event(seq: number | undefined, status: BrokerEvent['status'], filledQty = 0): BrokerEvent {
  return { orderId: 'o-1', seq, status, filledQty, avgPrice: filledQty > 0 ? 100 : 0, timestamp: '2026-01-05T09:15:00.000Z' };
}

describe('OrderEventInbox', () => {
  it('holds events back behind a sequence gap', () => {
    const inbox = new OrderEventInbox();
    expect(inbox.push(event(2, 'FILLED', 10))).toBe(true);
    expect(inbox.takeReady('o-1')).toEqual([]);
    expect(inbox.pendingCount('o-1')).toBe(1);

    expect(inbox.push(event(1, 'ACK'))).toBe(true);
    expect(inbox.takeReady('o-1').map((e) => e.seq)).toEqual([1, 2]);
    expect(inbox.pendingCount('o-1')).toBe(0);
  });

  it('refuses a sequence number that was already consumed or is already pending', () => {
    const inbox = new OrderEventInbox();
    inbox.push(event(1, 'ACK'));
    inbox.takeReady('o-1');
    expect(inbox.push(event(1, 'ACK'))).toBe(false);

    inbox.push(event(3, 'FILLED', 10));
    expect(inbox.push(event(3, 'FILLED', 10))).toBe(false);
  });

  it('releases unsequenced events first and immediately', () => {
    const inbox = new OrderEventInbox();
    inbox.push(event(1, 'ACK'));
    inbox.push(event(undefined, 'PARTIAL', 4));
    expect(inbox.takeReady('o-1').map((e) => e.status)).toEqual(['PARTIAL', 'ACK']);
  });

  it('remembers applied keys', () => {
    const inbox = new OrderEventInbox();
    const key = { orderId: 'o-1', status: 'PARTIAL' as const, filledQty: 4 };
    expect(inbox.isApplied(key)).toBe(false);
    inbox.markApplied(key);
    expect(inbox.isApplied(key)).toBe(true);
    expect(inbox.isApplied({ ...key, filledQty: 5 })).toBe(false);
  });

  it('hands back held events and drops all state when an order is forgotten', () => {
    const inbox = new OrderEventInbox();
    inbox.push(event(1, 'ACK'));
    inbox.takeReady('o-1');
    inbox.markApplied({ orderId: 'o-1', status: 'ACK', filledQty: 0 });
    inbox.push(event(4, 'FILLED', 10));
    inbox.push(event(3, 'PARTIAL', 5));
    inbox.push(event(undefined, 'CANCELLED'));

    expect(inbox.forget('o-1').map((e) => [e.seq, e.status])).toEqual([
      [undefined, 'CANCELLED'],
      [3, 'PARTIAL'],
      [4, 'FILLED'],
    ]);
    expect(inbox.size).toBe(0);
    expect(inbox.isApplied({ orderId: 'o-1', status: 'ACK', filledQty: 0 })).toBe(false);
    expect(inbox.forget('o-1')).toEqual([]);
  });

  it('returns nothing for an unknown order', () => {
    expect(new OrderEventInbox().takeReady('missing')).toEqual([]);
  });
});

describe('TaskQueue', () => {
  it('runs tasks one at a time in submission order', async () => {
    const queue = new TaskQueue();
    const log: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = queue.run(async () => {
      log.push('first:start');
      await gate;
      log.push('first:end');
      return 1;
    });
    const second = queue.run(() => {
      log.push('second');
      return 2;
    });
    expect(queue.size).toBe(2);

    await Promise.resolve();
    expect(log).toEqual(['first:start']);

    release();
    await expect(first).resolves.toBe(1);
    await expect(second).resolves.toBe(2);
    await queue.idle();
    expect(log).toEqual(['first:start', 'first:end', 'second']);
    expect(queue.size).toBe(0);
  });

  it('keeps running after a task fails', async () => {
    const queue = new TaskQueue();
    const failed = queue.run(() => {
      throw new Error('boom');
    });
    const next = queue.run(() => 'ok');
    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});
