import type { Position, Side } from './types.js';

export type FillPhase = 'OPEN' | 'ADD' | 'REDUCE' | 'CLOSE' | 'REVERSE';

export interface FillApplication {
  phase: FillPhase;
  /** Quantity of the fill that reduced an opposing position. */
  closedQty: number;
  /** Quantity of the fill that opened or added exposure. */
  openedQty: number;
  realizedPnl: number;
  /** Position margin freed by the closing portion. */
  releasedMargin: number;
  position: Readonly<Position>;
}

export function flatPosition(symbol: string): Position {
  return { symbol, side: 'FLAT', qty: 0, avgEntryPrice: 0, margin: 0 };
}

/** Realized P&L of closing `qty` of a position entered at `entry`. */
export function closingPnl(positionSide: Side, entry: number, exit: number, qty: number): number {
  const sign = positionSide === 'BUY' ? 1 : -1;
  return (exit - entry) * qty * sign;
}

/**
 * Net position per symbol for one account. Holds the margin locked for each
 * position so a close can release exactly what the opening fills locked.
 */
export class PositionBook {
  private readonly positions = new Map<string, Position>();

  get(symbol: string): Readonly<Position> {
    return this.positions.get(symbol) ?? flatPosition(symbol);
  }

  asMap(): ReadonlyMap<string, Position> {
    return this.positions;
  }

  list(): Position[] {
    return [...this.positions.values()].map((p) => ({ ...p }));
  }

  open(): Position[] {
    return this.list().filter((p) => p.side !== 'FLAT' && p.qty > 0);
  }

  restore(saved: Position[]): void {
    this.positions.clear();
    for (const p of saved) this.positions.set(p.symbol, { ...p });
  }

  /**
   * Apply one fill. `marginPrice` is the price the opening portion's margin is
   * locked at (the order price, matching its reservation).
   */
  applyFill(symbol: string, side: Side, qty: number, fillPrice: number, marginPrice: number): FillApplication {
    const current = this.get(symbol);

    if (current.side === 'FLAT' || current.side === side) {
      const newQty = current.qty + qty;
      const next: Position = {
        symbol,
        side,
        qty: newQty,
        avgEntryPrice: (current.avgEntryPrice * current.qty + fillPrice * qty) / newQty,
        margin: current.margin + qty * marginPrice,
      };
      this.positions.set(symbol, next);
      return {
        phase: current.side === 'FLAT' ? 'OPEN' : 'ADD',
        closedQty: 0,
        openedQty: qty,
        realizedPnl: 0,
        releasedMargin: 0,
        position: { ...next },
      };
    }

    const closedQty = Math.min(qty, current.qty);
    const openedQty = qty - closedQty;
    const remaining = current.qty - closedQty;
    const realizedPnl = closingPnl(current.side, current.avgEntryPrice, fillPrice, closedQty);
    const releasedMargin = remaining === 0 ? current.margin : (current.margin * closedQty) / current.qty;

    let next: Position;
    let phase: FillPhase;
    if (remaining > 0) {
      next = { ...current, qty: remaining, margin: current.margin - releasedMargin };
      phase = 'REDUCE';
    } else if (openedQty > 0) {
      next = { symbol, side, qty: openedQty, avgEntryPrice: fillPrice, margin: openedQty * marginPrice };
      phase = 'REVERSE';
    } else {
      next = flatPosition(symbol);
      phase = 'CLOSE';
    }
    this.positions.set(symbol, next);
    return { phase, closedQty, openedQty, realizedPnl, releasedMargin, position: { ...next } };
  }

  /** Mark-to-market P&L of open positions against the given last prices. */
  unrealizedPnl(marks: ReadonlyMap<string, number>): number {
    let total = 0;
    for (const p of this.positions.values()) {
      const mark = marks.get(p.symbol);
      if (mark === undefined || p.side === 'FLAT' || p.qty === 0) continue;
      total += closingPnl(p.side, p.avgEntryPrice, mark, p.qty);
    }
    return total;
  }
}
