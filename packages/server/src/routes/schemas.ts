import { z } from 'zod';

const side = z
  .string()
  .transform((s) => s.toUpperCase())
  .pipe(z.enum(['BUY', 'SELL']));

export const SignalBody = z.object({
  symbol: z.string().trim().min(1),
  action: side,
  /** 0 or absent means "at the last marked price". */
  price: z.coerce.number().nonnegative().optional(),
  strategy: z.string().min(1).default('webhook'),
  timestamp: z.string().optional(),
  secret: z.string().optional(),
});

export const PlaceOrderBody = z.object({
  symbol: z.string().trim().min(1),
  side,
  qty: z.coerce.number(),
  price: z.coerce.number(),
  slPct: z.coerce.number().optional(),
  tpPct: z.coerce.number().optional(),
});

export const CancelOrderBody = z.object({
  orderId: z.string().min(1),
});

export const OrdersQuery = z.object({
  symbol: z.string().optional(),
  status: z.enum(['NEW', 'ACK', 'PARTIAL', 'FILLED', 'CANCELLED', 'REJECTED']).optional(),
  limit: z.coerce.number().int().positive().max(1000).default(100),
});

export const ControlsBody = z.object({
  action: z.enum(['kill', 'reset']),
  reason: z.string().optional(),
});

export const OrderUpdateBody = z.object({
  orderId: z.string().min(1),
  seq: z.number().int().positive().optional(),
  status: z.enum(['ACK', 'PARTIAL', 'FILLED', 'CANCELLED', 'REJECTED']),
  filledQty: z.coerce.number().int().nonnegative(),
  avgPrice: z.coerce.number().nonnegative(),
  timestamp: z.string().optional(),
  reason: z.string().optional(),
});

/** Body for a 400 reply built from a zod failure. */
export function invalidBody(error: z.ZodError) {
  return {
    error: 'invalid request',
    issues: error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`),
  };
}

export const MarkPriceBody = z.object({
  symbol: z.string().trim().min(1),
  price: z.coerce.number().positive(),
});
