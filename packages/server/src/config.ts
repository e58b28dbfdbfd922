import { z } from 'zod';

const num = (fallback: number) => z.coerce.number().finite().default(fallback);
const positive = (fallback: number) => z.coerce.number().positive().default(fallback);
const count = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: count(3334),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional(),
  DATABASE_URL: z.string().min(1).optional(),
  ACCOUNT_ID: z.string().min(1).default('default'),

  INITIAL_CAPITAL: positive(1_000_000),
  RISK_PER_TRADE_PCT: positive(1),
  DEFAULT_STOP_LOSS_PCT: positive(2),
  DEFAULT_TAKE_PROFIT_PCT: positive(4),
  MIN_STOP_DISTANCE_PCT: num(0.5),
  MIN_STOP_LOSS_PCT: num(0.5),
  MAX_POSITION_PCT_OF_CAPITAL: positive(50),
  MAX_POSITION_SIZE_PER_TRADE: count(500),
  MAX_QTY_PER_ORDER: count(10_000),
  ABSOLUTE_MAX_QTY: count(5_000),
  MIN_ORDER_QTY: z.coerce.number().int().positive().default(1),
  MAX_OPEN_POSITIONS: count(10),
  MAX_TOTAL_EXPOSURE_PCT: positive(80),
  DAILY_LOSS_LIMIT: positive(50_000),

  COOLDOWN_TICKS: count(5),
  COOLDOWN_SECONDS: num(30),
  IDEMPOTENCY_WINDOW_SEC: num(60),
  MAX_SUBMIT_ATTEMPTS: z.coerce.number().int().min(1).max(3).default(3),
  ORDER_TIMEOUT_SEC: positive(60),

  BROKER_MIN_LATENCY_MS: count(200),
  BROKER_MAX_LATENCY_MS: count(800),
  SLIPPAGE_PCT: num(0.05),
  PARTIAL_FILL_PROBABILITY: z.coerce.number().min(0).max(1).default(0.3),
  REJECT_PROBABILITY: z.coerce.number().min(0).max(1).default(0.05),

  WEBHOOK_SECRET: z.string().min(1).optional(),
  RECONCILE_CRON: z.string().default('*/5 * * * *'),
  STALE_ORDER_CRON: z.string().default('*/30 * * * * *'),
});

export interface RiskLimits {
  riskPerTradePct: number;
  defaultStopLossPct: number;
  defaultTakeProfitPct: number;
  minStopDistancePct: number;
  minStopLossPct: number;
  maxPositionPctOfCapital: number;
  maxPositionSizePerTrade: number;
  maxQtyPerOrder: number;
  absoluteMaxQty: number;
  minOrderQty: number;
  maxOpenPositions: number;
  maxTotalExposurePct: number;
  dailyLossLimit: number;
}

export interface ValidatorSettings {
  cooldownTicks: number;
  cooldownSeconds: number;
  idempotencyWindowMs: number;
}

export interface BrokerSettings {
  minLatencyMs: number;
  maxLatencyMs: number;
  slippagePct: number;
  partialFillProbability: number;
  rejectProbability: number;
}

export type ExecutionConfig = {
  env: string;
  port: number;
  logLevel: 'error' | 'warn' | 'info' | 'debug';
  databaseUrl?: string;
  accountId: string;
  initialCapital: number;
  risk: RiskLimits;
  validator: ValidatorSettings;
  maxSubmitAttempts: number;
  orderTimeoutSec: number;
  broker: BrokerSettings;
  webhookSecret?: string;
  schedules: {
    reconcile: string;
    staleOrders: string;
  };
};

/**
 * Build the typed configuration from environment variables. Throws a ZodError
 * describing every invalid key.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExecutionConfig {
  const e = EnvSchema.parse(env);
  if (e.BROKER_MIN_LATENCY_MS > e.BROKER_MAX_LATENCY_MS) {
    throw new Error(`BROKER_MIN_LATENCY_MS (${e.BROKER_MIN_LATENCY_MS}) exceeds BROKER_MAX_LATENCY_MS (${e.BROKER_MAX_LATENCY_MS})`);
  }
  return {
    env: e.NODE_ENV,
    port: e.PORT,
    logLevel: e.LOG_LEVEL ?? (e.NODE_ENV === 'production' ? 'info' : 'debug'),
    databaseUrl: e.DATABASE_URL,
    accountId: e.ACCOUNT_ID,
    initialCapital: e.INITIAL_CAPITAL,
    risk: {
      riskPerTradePct: e.RISK_PER_TRADE_PCT,
      defaultStopLossPct: e.DEFAULT_STOP_LOSS_PCT,
      defaultTakeProfitPct: e.DEFAULT_TAKE_PROFIT_PCT,
      minStopDistancePct: e.MIN_STOP_DISTANCE_PCT,
      minStopLossPct: e.MIN_STOP_LOSS_PCT,
      maxPositionPctOfCapital: e.MAX_POSITION_PCT_OF_CAPITAL,
      maxPositionSizePerTrade: e.MAX_POSITION_SIZE_PER_TRADE,
      maxQtyPerOrder: e.MAX_QTY_PER_ORDER,
      absoluteMaxQty: e.ABSOLUTE_MAX_QTY,
      minOrderQty: e.MIN_ORDER_QTY,
      maxOpenPositions: e.MAX_OPEN_POSITIONS,
      maxTotalExposurePct: e.MAX_TOTAL_EXPOSURE_PCT,
      dailyLossLimit: e.DAILY_LOSS_LIMIT,
    },
    validator: {
      cooldownTicks: e.COOLDOWN_TICKS,
      cooldownSeconds: e.COOLDOWN_SECONDS,
      idempotencyWindowMs: e.IDEMPOTENCY_WINDOW_SEC * 1000,
    },
    maxSubmitAttempts: e.MAX_SUBMIT_ATTEMPTS,
    orderTimeoutSec: e.ORDER_TIMEOUT_SEC,
    broker: {
      minLatencyMs: e.BROKER_MIN_LATENCY_MS,
      maxLatencyMs: e.BROKER_MAX_LATENCY_MS,
      slippagePct: e.SLIPPAGE_PCT,
      partialFillProbability: e.PARTIAL_FILL_PROBABILITY,
      rejectProbability: e.REJECT_PROBABILITY,
    },
    webhookSecret: e.WEBHOOK_SECRET,
    schedules: {
      reconcile: e.RECONCILE_CRON,
      staleOrders: e.STALE_ORDER_CRON,
    },
  };
}
