import { existsSync, readFileSync } from 'fs';
import path from 'path';
import pg from 'pg';
import { z } from 'zod';
import { PersistenceError } from '../execution/errors.js';
import type { AccountState, Incident, Order, Position, Trade } from '../execution/types.js';
import { createLogger } from '../utils/logger.js';
import type { ExecutionStore, OrderQuery } from './store.js';

const logger = createLogger('pgStore');

type Row = Record<string, unknown>;

/** The slice of a pg Pool the store uses. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: Row[] }>;
  end(): Promise<void>;
}

const side = z.enum(['BUY', 'SELL']);
const status = z.enum(['NEW', 'ACK', 'PARTIAL', 'FILLED', 'CANCELLED', 'REJECTED']);
const optionalText = z
  .string()
  .nullable()
  .transform((v) => v ?? undefined);

const AccountRow = z
  .object({
    account_id: z.string(),
    initial_capital: z.number(),
    available_capital: z.number(),
    used_margin: z.number(),
    realized_pnl: z.number(),
    daily_loss_halted: z.boolean(),
    kill_switch: z.boolean(),
  })
  .transform(
    (r): AccountState => ({
      accountId: r.account_id,
      initialCapital: r.initial_capital,
      availableCapital: r.available_capital,
      usedMargin: r.used_margin,
      realizedPnl: r.realized_pnl,
      dailyLossHalted: r.daily_loss_halted,
      killSwitch: r.kill_switch,
    })
  );

const OrderRow = z
  .object({
    order_id: z.string(),
    account_id: z.string(),
    symbol: z.string(),
    side,
    qty: z.number().int(),
    price: z.number(),
    order_type: z.enum(['MARKET', 'LIMIT']),
    status,
    filled_qty: z.number().int(),
    avg_fill_price: z.number(),
    strategy: z.string(),
    stop_loss_price: z.number(),
    take_profit_price: z.number(),
    reserved_qty: z.number().int(),
    reason: optionalText,
    frozen: z.boolean(),
    created_at: z.string(),
    updated_at: z.string(),
  })
  .transform(
    (r): Order => ({
      orderId: r.order_id,
      accountId: r.account_id,
      symbol: r.symbol,
      side: r.side,
      qty: r.qty,
      price: r.price,
      orderType: r.order_type,
      status: r.status,
      filledQty: r.filled_qty,
      avgFillPrice: r.avg_fill_price,
      strategy: r.strategy,
      stopLossPrice: r.stop_loss_price,
      takeProfitPrice: r.take_profit_price,
      reservedQty: r.reserved_qty,
      reason: r.reason,
      frozen: r.frozen,
      createdAt: r.created_at,
      updatedAt: r.updated_at,
    })
  );

const TradeRow = z
  .object({
    trade_id: z.string(),
    order_id: z.string(),
    account_id: z.string(),
    symbol: z.string(),
    side,
    qty: z.number().int(),
    price: z.number(),
    pnl: z.number(),
    timestamp: z.string(),
  })
  .transform(
    (r): Trade => ({
      tradeId: r.trade_id,
      orderId: r.order_id,
      accountId: r.account_id,
      symbol: r.symbol,
      side: r.side,
      qty: r.qty,
      price: r.price,
      pnl: r.pnl,
      timestamp: r.timestamp,
    })
  );

const PositionRow = z
  .object({
    symbol: z.string(),
    side: z.enum(['BUY', 'SELL', 'FLAT']),
    qty: z.number().int(),
    avg_entry_price: z.number(),
    margin: z.number(),
  })
  .transform(
    (r): Position => ({
      symbol: r.symbol,
      side: r.side,
      qty: r.qty,
      avgEntryPrice: r.avg_entry_price,
      margin: r.margin,
    })
  );

const IncidentRow = z
  .object({
    incident_id: z.string(),
    account_id: z.string(),
    kind: z.enum(['ILLEGAL_TRANSITION', 'CONSISTENCY', 'CAPITAL_INVARIANT', 'EVENT_FAILURE']),
    order_id: optionalText,
    detail: z.string(),
    timestamp: z.string(),
  })
  .transform(
    (r): Incident => ({
      incidentId: r.incident_id,
      accountId: r.account_id,
      kind: r.kind,
      orderId: r.order_id,
      detail: r.detail,
      timestamp: r.timestamp,
    })
  );

const ORDER_COLUMNS = [
  'order_id',
  'account_id',
  'symbol',
  'side',
  'qty',
  'price',
  'order_type',
  'status',
  'filled_qty',
  'avg_fill_price',
  'strategy',
  'stop_loss_price',
  'take_profit_price',
  'reserved_qty',
  'reason',
  'frozen',
  'created_at',
  'updated_at',
] as const;

const ORDER_UPSERT = `
  INSERT INTO orders (${ORDER_COLUMNS.join(', ')})
  VALUES (${ORDER_COLUMNS.map((_, i) => `$${i + 1}`).join(', ')})
  ON CONFLICT (order_id) DO UPDATE SET
    ${ORDER_COLUMNS.filter((c) => c !== 'order_id' && c !== 'created_at')
      .map((c) => `${c} = EXCLUDED.${c}`)
      .join(',\n    ')}`;

export function defaultSchemaPath(): string {
  const candidates = [
    path.resolve(__dirname, '../../sql/schema.sql'),
    path.resolve(process.cwd(), 'packages/server/sql/schema.sql'),
  ];
  return candidates.find((p) => existsSync(p)) ?? candidates[0];
}

export interface PgStoreOptions {
  connectionString?: string;
  /** Pre-built connection, used instead of opening a pool. */
  db?: Queryable;
  schemaPath?: string;
}

/** PostgreSQL-backed store on a `pg` connection pool. */
export class PgExecutionStore implements ExecutionStore {
  readonly kind = 'postgres';
  private readonly db: Queryable;
  private readonly schemaPath: string;

  constructor(opts: PgStoreOptions) {
    if (opts.db) {
      this.db = opts.db;
    } else {
      const pool = new pg.Pool({ connectionString: opts.connectionString, max: 4, statement_timeout: 30_000 });
      pool.on('error', (err) => logger.error('Idle pg client error', { error: err.message }));
      this.db = {
        query: (text, values) => pool.query(text, values),
        end: () => pool.end(),
      };
    }
    this.schemaPath = opts.schemaPath ?? defaultSchemaPath();
  }

  async migrate(): Promise<void> {
    const sql = readFileSync(this.schemaPath, 'utf8');
    await this.exec('migrate', sql);
    logger.info('Schema applied', { schemaPath: this.schemaPath });
  }

  async upsertAccount(a: AccountState): Promise<void> {
    await this.exec(
      'upsertAccount',
      `INSERT INTO accounts (account_id, initial_capital, available_capital, used_margin, realized_pnl, daily_loss_halted, kill_switch, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, NOW())
       ON CONFLICT (account_id) DO UPDATE SET
         initial_capital = EXCLUDED.initial_capital,
         available_capital = EXCLUDED.available_capital,
         used_margin = EXCLUDED.used_margin,
         realized_pnl = EXCLUDED.realized_pnl,
         daily_loss_halted = EXCLUDED.daily_loss_halted,
         kill_switch = EXCLUDED.kill_switch,
         updated_at = NOW()`,
      [a.accountId, a.initialCapital, a.availableCapital, a.usedMargin, a.realizedPnl, a.dailyLossHalted, a.killSwitch]
    );
  }

  async getAccount(accountId: string): Promise<AccountState | undefined> {
    const rows = await this.exec('getAccount', 'SELECT * FROM accounts WHERE account_id = $1', [accountId]);
    return rows.length > 0 ? AccountRow.parse(rows[0]) : undefined;
  }

  async upsertOrder(o: Order): Promise<void> {
    await this.exec('upsertOrder', ORDER_UPSERT, [
      o.orderId,
      o.accountId,
      o.symbol,
      o.side,
      o.qty,
      o.price,
      o.orderType,
      o.status,
      o.filledQty,
      o.avgFillPrice,
      o.strategy,
      o.stopLossPrice,
      o.takeProfitPrice,
      o.reservedQty,
      o.reason ?? null,
      o.frozen,
      o.createdAt,
      o.updatedAt,
    ]);
  }

  async getOrder(orderId: string): Promise<Order | undefined> {
    const rows = await this.exec('getOrder', 'SELECT * FROM orders WHERE order_id = $1', [orderId]);
    return rows.length > 0 ? OrderRow.parse(rows[0]) : undefined;
  }

  async listOrders(accountId: string, query: OrderQuery = {}): Promise<Order[]> {
    const where = ['account_id = $1'];
    const values: unknown[] = [accountId];
    if (query.symbol !== undefined) {
      values.push(query.symbol);
      where.push(`symbol = $${values.length}`);
    }
    if (query.statuses !== undefined) {
      values.push([...query.statuses]);
      where.push(`status = ANY($${values.length})`);
    }
    let text = `SELECT * FROM orders WHERE ${where.join(' AND ')} ORDER BY created_at DESC`;
    if (query.limit !== undefined) {
      values.push(query.limit);
      text += ` LIMIT $${values.length}`;
    }
    const rows = await this.exec('listOrders', text, values);
    return rows.map((r) => OrderRow.parse(r));
  }

  async insertTrade(t: Trade): Promise<void> {
    await this.exec(
      'insertTrade',
      `INSERT INTO trades (trade_id, order_id, account_id, symbol, side, qty, price, pnl, timestamp)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
      [t.tradeId, t.orderId, t.accountId, t.symbol, t.side, t.qty, t.price, t.pnl, t.timestamp]
    );
  }

  async listTrades(accountId: string): Promise<Trade[]> {
    const rows = await this.exec('listTrades', 'SELECT * FROM trades WHERE account_id = $1 ORDER BY seq ASC', [accountId]);
    return rows.map((r) => TradeRow.parse(r));
  }

  async upsertPosition(accountId: string, p: Position): Promise<void> {
    await this.exec(
      'upsertPosition',
      `INSERT INTO positions (account_id, symbol, side, qty, avg_entry_price, margin, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, NOW())
       ON CONFLICT (account_id, symbol) DO UPDATE SET
         side = EXCLUDED.side,
         qty = EXCLUDED.qty,
         avg_entry_price = EXCLUDED.avg_entry_price,
         margin = EXCLUDED.margin,
         updated_at = NOW()`,
      [accountId, p.symbol, p.side, p.qty, p.avgEntryPrice, p.margin]
    );
  }

  async listPositions(accountId: string): Promise<Position[]> {
    const rows = await this.exec('listPositions', 'SELECT * FROM positions WHERE account_id = $1 ORDER BY symbol', [
      accountId,
    ]);
    return rows.map((r) => PositionRow.parse(r));
  }

  async insertIncident(i: Incident): Promise<void> {
    await this.exec(
      'insertIncident',
      `INSERT INTO incidents (incident_id, account_id, kind, order_id, detail, timestamp)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [i.incidentId, i.accountId, i.kind, i.orderId ?? null, i.detail, i.timestamp]
    );
  }

  async listIncidents(accountId: string): Promise<Incident[]> {
    const rows = await this.exec(
      'listIncidents',
      'SELECT * FROM incidents WHERE account_id = $1 ORDER BY timestamp ASC',
      [accountId]
    );
    return rows.map((r) => IncidentRow.parse(r));
  }

  async close(): Promise<void> {
    await this.db.end();
  }

  private async exec(operation: string, text: string, values?: unknown[]): Promise<Row[]> {
    try {
      const result = await this.db.query(text, values);
      return result.rows;
    } catch (error) {
      throw new PersistenceError(operation, error);
    }
  }
}
