import type { RiskLimits } from '../config.js';
import type { Side } from '../execution/types.js';

export interface SizingInput {
  price: number;
  /** Stop-loss distance in percent of price. */
  slPct: number;
  /** Capital the risk budget is computed from (initial + realized). */
  capital: number;
  availableCapital: number;
  /** Notional still allowed under the total exposure cap. */
  exposureHeadroom: number;
  /** When set, the order closes an opposing position of this size instead of opening risk. */
  closeQty?: number;
}

export type SizingResult =
  | { ok: true; qty: number; limitedBy: string }
  | { ok: false; detail: string };

// Guards against 199.99999999 flooring to 199.
const floorQty = (value: number): number => Math.floor(value + 1e-9);

/**
 * Risk-based share count. The raw size risks `riskPerTradePct` of capital
 * over the stop distance and is then clamped by each cap in turn.
 */
export function sizePosition(input: SizingInput, limits: RiskLimits): SizingResult {
  const { price, capital, availableCapital } = input;
  if (!(price > 0) || !Number.isFinite(price)) {
    return { ok: false, detail: `invalid price ${price}` };
  }

  let qty: number;
  let limitedBy: string;
  const caps: Array<[string, number]> = [];

  if (input.closeQty !== undefined) {
    qty = input.closeQty;
    limitedBy = 'close-out';
  } else {
    if (input.slPct < limits.minStopDistancePct) {
      return {
        ok: false,
        detail: `stop distance ${input.slPct}% below minimum ${limits.minStopDistancePct}%`,
      };
    }
    const slPct = Math.max(input.slPct, limits.minStopLossPct);
    qty = floorQty((capital * limits.riskPerTradePct) / (price * slPct));
    limitedBy = 'risk';
    caps.push(
      ['notional-cap', floorQty((capital * limits.maxPositionPctOfCapital) / (100 * price))],
      ['per-trade-cap', limits.maxPositionSizePerTrade]
    );
  }

  caps.push(['per-order-cap', limits.maxQtyPerOrder], ['absolute-cap', limits.absoluteMaxQty]);
  // A close-out reserves nothing, so only opening orders are bound by cash and exposure.
  if (input.closeQty === undefined) {
    caps.push(
      ['available-capital', floorQty(availableCapital / price)],
      ['exposure-headroom', floorQty(Math.max(0, input.exposureHeadroom) / price)]
    );
  }

  for (const [name, cap] of caps) {
    if (cap < qty) {
      qty = cap;
      limitedBy = name;
    }
  }

  if (qty < limits.minOrderQty) {
    return {
      ok: false,
      detail: `sized qty ${Math.max(qty, 0)} below minimum ${limits.minOrderQty} (limited by ${limitedBy})`,
    };
  }
  return { ok: true, qty, limitedBy };
}

const round2 = (value: number): number => Math.round(value * 100) / 100;

export function stopLossPrice(side: Side, price: number, slPct: number): number {
  const distance = slPct / 100;
  return round2(side === 'BUY' ? price * (1 - distance) : price * (1 + distance));
}

export function takeProfitPrice(side: Side, price: number, tpPct: number): number {
  const distance = tpPct / 100;
  return round2(side === 'BUY' ? price * (1 + distance) : price * (1 - distance));
}
