import winston from 'winston';
import type { OrderStatus, RejectionCode, Side } from '../execution/types.js';

export type LogMeta = Record<string, unknown>;

export interface SignalContext {
  symbol: string;
  action: Side;
  price: number;
  strategy: string;
  approved: boolean;
  reasonCode?: RejectionCode | 'SIZED_OUT';
  detail?: string;
  qty?: number;
}

export interface ExecutionContext {
  orderId: string;
  symbol: string;
  side: Side;
  qty: number;
  price: number;
  attempt?: number;
  maxAttempts?: number;
  error?: string;
}

export interface TransitionContext {
  orderId: string;
  symbol: string;
  from: OrderStatus;
  to: OrderStatus;
  filledQty: number;
  avgFillPrice: number;
  reason?: string;
}

export interface TradeContext {
  tradeId: string;
  orderId: string;
  symbol: string;
  side: Side;
  qty: number;
  price: number;
  pnl: number;
}

export interface ReconciliationContext {
  match: boolean;
  recomputedPnl: number;
  ledgerPnl: number;
  recordedPnl: number;
  discrepancy: number;
  tradeCount: number;
}

const level = process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'production' ? 'info' : 'debug');

const baseLogger = winston.createLogger({
  level,
  silent: process.env.NODE_ENV === 'test' && process.env.LOG_IN_TESTS !== 'true',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json()
  ),
  defaultMeta: { service: 'ledgerline' },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, context, orderId, symbol, service: _service, ...rest }) => {
          const orderInfo = typeof orderId === 'string' ? `[${orderId.slice(0, 8)}]` : '';
          const symbolInfo = typeof symbol === 'string' ? `[${symbol}]` : '';
          const restStr = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
          return `[${String(timestamp)}] [${String(context)}]${orderInfo}${symbolInfo} ${level}: ${String(message)}${restStr}`;
        })
      ),
    }),
  ],
});

/**
 * Context-bound logger with structured helpers for the execution pipeline.
 */
export class EnhancedLogger {
  constructor(private readonly context: string, private readonly logger: winston.Logger = baseLogger) {}

  debug(message: string, meta: LogMeta = {}) {
    this.logger.debug(message, { ...meta, context: this.context });
  }

  info(message: string, meta: LogMeta = {}) {
    this.logger.info(message, { ...meta, context: this.context });
  }

  warn(message: string, meta: LogMeta = {}) {
    this.logger.warn(message, { ...meta, context: this.context });
  }

  error(message: string, meta: LogMeta = {}) {
    this.logger.error(message, { ...meta, context: this.context });
  }

  /**
   * Unrecoverable condition for one order or the account. Always error level,
   * tagged so operators can grep for it.
   */
  logFatal(message: string, meta: LogMeta = {}) {
    this.logger.error(`FATAL ${message}`, { ...meta, fatal: true, context: this.context });
  }

  logSignalDecision(data: SignalContext) {
    const status = data.approved ? 'ACCEPTED' : 'REJECTED';
    const log = data.approved ? this.info.bind(this) : this.debug.bind(this);
    log(`SIGNAL ${status}`, {
      symbol: data.symbol,
      action: data.action,
      price: data.price.toFixed(2),
      strategy: data.strategy,
      reasonCode: data.reasonCode,
      detail: data.detail,
      qty: data.qty,
    });
  }

  logOrderPlacement(data: ExecutionContext) {
    const attempt = data.attempt ?? 1;
    const maxAttempts = data.maxAttempts ?? 3;
    const meta = {
      orderId: data.orderId,
      symbol: data.symbol,
      side: data.side,
      qty: data.qty,
      price: data.price.toFixed(2),
      attempt,
      maxAttempts,
      error: data.error,
    };
    if (data.error) {
      this.warn(`ORDER SUBMISSION FAILED (${attempt}/${maxAttempts})`, meta);
    } else {
      this.info('ORDER SUBMITTED', meta);
    }
  }

  logOrderTransition(data: TransitionContext) {
    this.info(`ORDER ${data.from} -> ${data.to}`, {
      orderId: data.orderId,
      symbol: data.symbol,
      filledQty: data.filledQty,
      avgFillPrice: data.avgFillPrice.toFixed(4),
      reason: data.reason,
    });
  }

  logTradeLifecycle(phase: 'OPEN' | 'ADD' | 'REDUCE' | 'CLOSE' | 'REVERSE', data: TradeContext) {
    this.info(`TRADE ${phase}`, {
      tradeId: data.tradeId,
      orderId: data.orderId,
      symbol: data.symbol,
      side: data.side,
      qty: data.qty,
      price: data.price.toFixed(4),
      pnl: data.pnl.toFixed(2),
    });
  }

  logReconciliation(data: ReconciliationContext) {
    const meta = {
      recomputedPnl: data.recomputedPnl.toFixed(2),
      ledgerPnl: data.ledgerPnl.toFixed(2),
      recordedPnl: data.recordedPnl.toFixed(2),
      discrepancy: data.discrepancy.toFixed(6),
      tradeCount: data.tradeCount,
    };
    if (data.match) {
      this.info('RECONCILIATION OK', meta);
    } else {
      this.error('RECONCILIATION MISMATCH', meta);
    }
  }
}

export const createLogger = (context: string): EnhancedLogger => {
  return new EnhancedLogger(context);
};
