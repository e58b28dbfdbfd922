import type { Side } from './types.js';

interface AcceptedMark {
  tick: number;
  at: number;
}

export function signalFingerprint(symbol: string, action: Side, price: number): string {
  return `${symbol}|${action}|${price}`;
}

/**
 * Recent-signal memory used by the validator's duplicate and cooldown guards.
 * Mutated only by the order manager; the validator reads it.
 */
export class SignalHistory {
  private ticks = 0;
  private readonly fingerprints = new Map<string, number>();
  private readonly lastAccepted = new Map<string, AcceptedMark>();

  constructor(private readonly idempotencyWindowMs: number) {}

  get currentTick(): number {
    return this.ticks;
  }

  tick(): number {
    this.ticks += 1;
    return this.ticks;
  }

  /** True when the same fingerprint was seen less than the idempotency window ago. */
  isDuplicate(fingerprint: string, now: number): boolean {
    const seenAt = this.fingerprints.get(fingerprint);
    return seenAt !== undefined && now - seenAt < this.idempotencyWindowMs;
  }

  recordFingerprint(fingerprint: string, now: number): void {
    this.fingerprints.set(fingerprint, now);
    this.prune(now);
  }

  lastAcceptedFor(symbol: string): Readonly<AcceptedMark> | undefined {
    return this.lastAccepted.get(symbol);
  }

  markAccepted(symbol: string, now: number): void {
    this.lastAccepted.set(symbol, { tick: this.ticks, at: now });
  }

  private prune(now: number): void {
    for (const [key, seenAt] of this.fingerprints) {
      if (now - seenAt >= this.idempotencyWindowMs) this.fingerprints.delete(key);
    }
  }
}
